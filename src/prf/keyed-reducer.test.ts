import { describe, it, expect, vi } from 'vitest';
import { KeyedReducer, innerProduct } from './keyed-reducer';
import { SecretMask } from './secret-mask';
import { coefficientStream } from './coefficient-source';
import { LwrError, LwrErrorCode } from '../api/types';
import type { CoefficientItem } from '../api/types';
import { SMALL_PARAMS } from '../test-utils';

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

function items(coefficients: number[]): CoefficientItem[] {
  return coefficients.map((coefficient, i) => ({
    coefficient,
    maskAddress: i,
    last: i === coefficients.length - 1,
  }));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof LwrError ? error.code : 'not-an-LwrError';
  }
  return undefined;
}

describe('KeyedReducer', () => {
  it('sums the coefficients whose mask bit is set', () => {
    const mask = SecretMask.fromBits([1, 0, 1, 1], 4);
    expect(innerProduct(items([10, 20, 30, 40]), mask)).toBe(80);
  });

  it('includes the contribution of the last item', () => {
    const mask = SecretMask.fromBits([0, 0, 0, 1], 4);
    expect(innerProduct(items([5, 6, 7, 8]), mask)).toBe(8);
  });

  it('gives zero for an all-zero mask', () => {
    const mask = SecretMask.fromBits([0, 0, 0], 3);
    expect(innerProduct(items([100, 200, 300]), mask)).toBe(0);
  });

  it('matches the known small-parameter inner product', () => {
    const mask = SecretMask.fromSeed(utf8('small-key'), 16);
    expect(innerProduct(coefficientStream(utf8('abc'), 0, SMALL_PARAMS), mask)).toBe(1514);
  });

  it('raises done exactly once and latches the sum', () => {
    const onDone = vi.fn();
    const reducer = new KeyedReducer(SecretMask.fromBits([1, 1], 2), onDone);
    reducer.start();
    for (const item of items([3, 4])) reducer.consume(item);
    expect(onDone).toHaveBeenCalledTimes(1);
    expect(onDone).toHaveBeenCalledWith(7);
    expect(reducer.isDone()).toBe(true);
    expect(reducer.result()).toBe(7);
    expect(reducer.getSelectedTerms()).toBe(2);
  });

  it('rejects consumption before start and after done', () => {
    const reducer = new KeyedReducer(SecretMask.fromBits([1, 1], 2));
    const [first, second] = items([1, 2]);
    expect(codeOf(() => reducer.consume(first))).toBe(LwrErrorCode.REDUCER_STATE);
    reducer.start();
    reducer.consume(first);
    reducer.consume(second);
    expect(codeOf(() => reducer.consume(first))).toBe(LwrErrorCode.REDUCER_STATE);
  });

  it('has no result before the last item', () => {
    const reducer = new KeyedReducer(SecretMask.fromBits([1, 1], 2));
    reducer.start();
    reducer.consume(items([1, 2])[0]);
    expect(reducer.getPhase()).toBe('accumulating');
    expect(codeOf(() => reducer.result())).toBe(LwrErrorCode.REDUCER_STATE);
  });

  it('starts afresh on restart', () => {
    const reducer = new KeyedReducer(SecretMask.fromBits([1, 1], 2));
    reducer.start();
    for (const item of items([1, 2])) reducer.consume(item);
    reducer.start();
    for (const item of items([10, 20])) reducer.consume(item);
    expect(reducer.result()).toBe(30);
  });

  it('rejects a mask address outside the key', () => {
    const reducer = new KeyedReducer(SecretMask.fromBits([1], 1));
    reducer.start();
    expect(codeOf(() => reducer.consume({ coefficient: 1, maskAddress: 5, last: true }))).toBe(
      LwrErrorCode.MASK_ADDRESS_OUT_OF_RANGE
    );
  });
});
