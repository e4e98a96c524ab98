import { describe, expect, it } from 'vitest';

import { decodePayload, detectDelimiter } from '@/modules/ingestion/index.js';

describe('decodePayload', () => {
  it('decodes UTF-8', () => {
    expect(decodePayload(new TextEncoder().encode('Région;Année'))).toBe('Région;Année');
  });

  it('falls back to Windows-1252 for Latin-1 exports', () => {
    // "Région" with é encoded as the single byte 0xE9
    const bytes = new Uint8Array([0x52, 0xe9, 0x67, 0x69, 0x6f, 0x6e]);

    expect(decodePayload(bytes)).toBe('Région');
  });

  it('drops a leading byte order mark', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0x3b, 0x62]);

    expect(decodePayload(bytes)).toBe('a;b');
  });
});

describe('detectDelimiter', () => {
  it('picks semicolons when the header has more of them', () => {
    expect(detectDelimiter('exer;reg;lbudg\n2023,1;11;x')).toBe(';');
  });

  it('picks commas otherwise', () => {
    expect(detectDelimiter('code_insee,nom_standard\n75056;Paris')).toBe(',');
    expect(detectDelimiter('single_column')).toBe(',');
  });
});
