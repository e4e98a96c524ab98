/**
 * CSV payload decoding helpers.
 */

/**
 * Decodes a payload as UTF-8, falling back to Windows-1252 for the
 * Latin-1 exports some publishers still produce. A leading BOM is dropped.
 */
export const decodePayload = (bytes: Uint8Array): string => {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    text = new TextDecoder('windows-1252').decode(bytes);
  }
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
};

/**
 * Picks `;` when the header line holds more semicolons than commas.
 */
export const detectDelimiter = (text: string): ';' | ',' => {
  const newline = text.indexOf('\n');
  const headerLine = newline === -1 ? text : text.slice(0, newline);
  const semicolons = headerLine.split(';').length - 1;
  const commas = headerLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
};

/**
 * Type guard for a parsed CSV row keyed by header.
 */
export const isStringRecord = (value: unknown): value is Record<string, string> =>
  value !== null &&
  typeof value === 'object' &&
  !Array.isArray(value) &&
  Object.values(value).every((field) => typeof field === 'string');
