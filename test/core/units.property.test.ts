import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { parseUnits, formatUnits, convertDecimals } from '../../src/core/units.js';

describe('units property-based tests', () => {
  test.prop([fc.bigInt({ min: -(10n ** 40n), max: 10n ** 40n }), fc.integer({ min: 0, max: 36 })])(
    'formatUnits output parses back to the same amount',
    (amount, decimals) => {
      expect(parseUnits(formatUnits(amount, decimals), decimals)).toBe(amount);
    }
  );

  test.prop([fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 18 }), fc.integer({ min: 0, max: 18 })])(
    'scaling up then down is lossless',
    (amount, from, extra) => {
      expect(convertDecimals(convertDecimals(amount, from, from + extra), from + extra, from)).toBe(amount);
    }
  );
});
