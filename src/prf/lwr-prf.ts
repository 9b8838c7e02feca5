/**
 * @file prf/lwr-prf.ts
 * @brief Learning-With-Rounding PRF: (nonce, index) -> Z_P
 *
 * Each evaluation builds its own sponge and reducer; only the secret mask is
 * shared, and it is read-only.
 *
 * @example
 * ```typescript
 * const params = createParameterSet('lwr-445-2048-32');
 * const prf = new LwrPrf(params, SecretMask.generate(params.nLwr));
 * const k0 = prf.evaluate(new TextEncoder().encode('nonce'), 0);
 * ```
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { Nonce, PrfIndex, PrfTrace } from '../api/types';
import { assertValidParameterSet } from '../parameters/validator';
import type { LwrParameterSet } from '../parameters/types';
import { coefficientStream, normalizeIndex } from './coefficient-source';
import { KeyedReducer } from './keyed-reducer';
import { roundingTrace } from './rounding';
import type { SecretMask } from './secret-mask';

export class LwrPrf {
  private readonly params: LwrParameterSet;
  private readonly mask: SecretMask;

  constructor(params: LwrParameterSet, mask: SecretMask) {
    assertValidParameterSet(params);
    if (mask.length !== params.nLwr) {
      throw new LwrError(
        `Secret mask has ${mask.length} bits, parameter set ${params.name} needs ${params.nLwr}`,
        LwrErrorCode.KEY_MISMATCH,
        { expected: params.nLwr, actual: mask.length }
      );
    }
    this.params = { ...params };
    this.mask = mask;
  }

  getParams(): LwrParameterSet {
    return { ...this.params };
  }

  /**
   * Evaluate the PRF and return every intermediate value
   */
  evaluateDetailed(nonce: Nonce, index: PrfIndex): PrfTrace {
    const u64Index = normalizeIndex(index);
    const stream = coefficientStream(nonce, u64Index, this.params);
    const reducer = new KeyedReducer(this.mask);
    reducer.start();
    for (const item of stream) {
      reducer.consume(item);
    }
    const trace = roundingTrace(reducer.result(), this.params);
    return { ...trace, index: u64Index, selectedTerms: reducer.getSelectedTerms() };
  }

  /**
   * Evaluate the PRF at (nonce, index)
   */
  evaluate(nonce: Nonce, index: PrfIndex): number {
    return this.evaluateDetailed(nonce, index).output;
  }

  /**
   * Evaluate `count` consecutive indices starting at `startIndex`
   */
  evaluateMany(nonce: Nonce, count: number, startIndex: PrfIndex = 0): number[] {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new LwrError(`Output count must be a non-negative integer, got ${count}`, LwrErrorCode.INVALID_INDEX, {
        count,
      });
    }
    const first = normalizeIndex(startIndex);
    if (count > 0) {
      normalizeIndex(first + BigInt(count - 1));
    }
    const outputs: number[] = [];
    for (let i = 0; i < count; i++) {
      outputs.push(this.evaluate(nonce, first + BigInt(i)));
    }
    return outputs;
  }
}
