import { describe, it, expect } from 'vitest';
import { LwrPrf } from './lwr-prf';
import { SecretMask } from './secret-mask';
import { createParameterSet } from '../parameters';
import { LwrError, LwrErrorCode } from '../api/types';
import { SMALL_PARAMS } from '../test-utils';

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

const params = createParameterSet('lwr-445-2048-32');
const mask = SecretMask.fromSeed(utf8('test-secret'), 445);
const prf = new LwrPrf(params, mask);

const smallPrf = new LwrPrf(SMALL_PARAMS, SecretMask.fromSeed(utf8('small-key'), 16));

describe('LwrPrf', () => {
  it('evaluates known outputs', () => {
    expect(prf.evaluateMany(utf8('some_seed'), 10)).toEqual([22, 11, 3, 4, 29, 9, 1, 16, 26, 17]);
  });

  it('evaluates with an integer nonce', () => {
    expect(prf.evaluateMany(0x0123456789abcdefn, 5)).toEqual([13, 10, 27, 20, 26]);
  });

  it('evaluates the small parameter set', () => {
    expect(smallPrf.evaluateMany(utf8('abc'), 8)).toEqual([2, 5, 10, 7, 6, 1, 5, 0]);
  });

  it('returns the full trace', () => {
    const trace = prf.evaluateDetailed(utf8('test_nonce'), 0);
    expect(trace).toMatchObject({
      index: 0n,
      sum: 450702,
      mod2N: 142,
      modN: 142,
      msb: 0,
      rescaled: 2,
      output: 2,
    });
    expect(trace.selectedTerms).toBeGreaterThan(0);
    expect(trace.selectedTerms).toBeLessThanOrEqual(218);
  });

  it('traces the small parameter set', () => {
    expect(smallPrf.evaluateDetailed(utf8('abc'), 0)).toMatchObject({
      sum: 1514,
      mod2N: 490,
      modN: 234,
      msb: 1,
      rescaled: 14,
      output: 2,
      selectedTerms: 7,
    });
  });

  it('is deterministic', () => {
    expect(prf.evaluate(utf8('n'), 4)).toBe(prf.evaluate(utf8('n'), 4));
  });

  it('agrees between evaluate and evaluateMany with an offset', () => {
    const many = smallPrf.evaluateMany(utf8('abc'), 3, 5);
    expect(many).toEqual([smallPrf.evaluate(utf8('abc'), 5), smallPrf.evaluate(utf8('abc'), 6), smallPrf.evaluate(utf8('abc'), 7)]);
    expect(many).toEqual([1, 5, 0]);
  });

  it('produces outputs in [0, P)', () => {
    for (const out of smallPrf.evaluateMany(utf8('range'), 32)) {
      expect(out).toBeGreaterThanOrEqual(0);
      expect(out).toBeLessThan(16);
    }
  });

  it('rejects a mask of the wrong length', () => {
    try {
      new LwrPrf(params, SecretMask.fromSeed(utf8('x'), 16));
      expect.unreachable();
    } catch (error) {
      expect(error instanceof LwrError && error.code).toBe(LwrErrorCode.KEY_MISMATCH);
    }
  });

  it('rejects invalid parameters', () => {
    expect(
      () => new LwrPrf({ name: 'bad', nLwr: 16, modulusN: 300, plaintextModulus: 16 }, SecretMask.fromBits([], 16))
    ).toThrow(LwrError);
  });

  it('rejects a count that runs past the 64-bit counter', () => {
    expect(() => smallPrf.evaluateMany(utf8('abc'), 2, 0xffffffffffffffffn)).toThrow(LwrError);
    expect(() => smallPrf.evaluateMany(utf8('abc'), -1)).toThrow(LwrError);
  });

  it('returns a copy of its parameters', () => {
    const copy = prf.getParams();
    copy.nLwr = 1;
    expect(prf.getParams().nLwr).toBe(445);
  });
});
