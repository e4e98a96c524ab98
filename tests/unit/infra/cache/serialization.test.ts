import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { deserialize, serialize } from '@/infra/cache/index.js';

describe('Cache Serialization', () => {
  it('marks Decimal and Date instances', () => {
    expect(serialize({ debt: new Decimal('12.50') })).toBe('{"debt":{"__decimal__":"12.5"}}');
    expect(serialize(new Date('2024-01-15T00:00:00.000Z'))).toBe(
      '{"__date__":"2024-01-15T00:00:00.000Z"}'
    );
  });

  it('restores Decimal values nested in arrays', () => {
    const json = serialize([
      { regionCode: '11', revenuePerCapita: new Decimal('2'), population: 500 },
      { regionCode: '24', revenuePerCapita: null, population: null },
    ]);

    const result = deserialize(json);

    expect(result.ok).toBe(true);
    if (!result.ok || !Array.isArray(result.value)) {
      throw new Error('expected an array');
    }
    const [first, second] = result.value;
    expect(Decimal.isDecimal(first.revenuePerCapita)).toBe(true);
    expect(first.revenuePerCapita.toString()).toBe('2');
    expect(first.population).toBe(500);
    expect(second.revenuePerCapita).toBeNull();
  });

  it('restores Date values', () => {
    const result = deserialize('{"at":{"__date__":"2024-01-15T00:00:00.000Z"}}');

    expect(result).toEqual({ ok: true, value: { at: new Date('2024-01-15T00:00:00.000Z') } });
  });

  it('reports invalid JSON as a serialization error', () => {
    const result = deserialize('{not json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('SerializationError');
    }
  });
});
