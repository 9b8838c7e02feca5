import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { roundToPlaintext, roundingTrace } from './rounding';
import { createParameterSet } from '../parameters';
import { LwrError, LwrErrorCode } from '../api/types';
import { PROPERTY_TEST_CONFIG, SMALL_PARAMS } from '../test-utils';

const params = createParameterSet('lwr-445-2048-32');

describe('roundToPlaintext', () => {
  it('maps zero to zero', () => {
    expect(roundToPlaintext(0, params)).toBe(0);
  });

  it('maps N to zero', () => {
    expect(roundingTrace(2048, params)).toEqual({
      sum: 2048,
      mod2N: 2048,
      modN: 0,
      msb: 1,
      rescaled: 0,
      output: 0,
    });
  });

  it('keeps the top bits of the lower half unchanged', () => {
    expect(roundToPlaintext(2047, params)).toBe(31);
    expect(roundToPlaintext(64, params)).toBe(1);
    expect(roundToPlaintext(63, params)).toBe(0);
  });

  it('negates in the upper half', () => {
    expect(roundToPlaintext(4095, params)).toBe(1);
    expect(roundToPlaintext(2048 + 64, params)).toBe(31);
  });

  it('wraps sums larger than 2N', () => {
    expect(roundingTrace(450702, params)).toEqual({
      sum: 450702,
      mod2N: 142,
      modN: 142,
      msb: 0,
      rescaled: 2,
      output: 2,
    });
  });

  it('traces the small parameter set', () => {
    expect(roundingTrace(1514, SMALL_PARAMS)).toEqual({
      sum: 1514,
      mod2N: 490,
      modN: 234,
      msb: 1,
      rescaled: 14,
      output: 2,
    });
  });

  it('always lands in [0, P)', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 445 * 4095 }), (sum) => {
        const out = roundToPlaintext(sum, params);
        return Number.isInteger(out) && out >= 0 && out < 32;
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('depends only on the sum mod 2N', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 4095 }), fc.integer({ min: 0, max: 400 }), (r, k) => {
        return roundToPlaintext(r, params) === roundToPlaintext(r + k * 4096, params);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('rejects moduli that are not powers of two', () => {
    const cases = [
      { name: 'p24', nLwr: 4, modulusN: 2048, plaintextModulus: 24 },
      { name: 'n1000', nLwr: 4, modulusN: 1000, plaintextModulus: 32 },
    ];
    for (const bad of cases) {
      try {
        roundingTrace(2047, bad);
        expect.unreachable();
      } catch (error) {
        expect(error instanceof LwrError && error.code).toBe(LwrErrorCode.INVALID_PARAMETERS);
      }
    }
  });

  it('rejects negative or fractional sums', () => {
    for (const sum of [-1, 1.5, Number.NaN]) {
      try {
        roundToPlaintext(sum, params);
        expect.unreachable();
      } catch (error) {
        expect(error instanceof LwrError && error.code).toBe(LwrErrorCode.INVALID_ACCUMULATOR);
      }
    }
  });
});
