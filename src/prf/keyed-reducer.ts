/**
 * @file prf/keyed-reducer.ts
 * @brief Secret-mask-gated inner product over the coefficient stream
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { CoefficientItem } from '../api/types';
import type { SecretMask } from './secret-mask';

/**
 * Reducer lifecycle
 */
export type ReducerPhase = 'idle' | 'accumulating' | 'done';

/**
 * Accumulates the coefficients whose mask bit is 1. One instance belongs to
 * one evaluation at a time; `start()` begins the next one.
 *
 * The accumulator is a double. Parameter validation bounds the worst-case
 * sum nLwr * (2N - 1) below 2^53, so no term is ever lost before rounding.
 */
export class KeyedReducer {
  private readonly mask: SecretMask;
  private accumulator = 0;
  private selected = 0;
  private phase: ReducerPhase = 'idle';
  private latched: number | undefined;
  private readonly onDone: ((sum: number) => void) | undefined;

  constructor(mask: SecretMask, onDone?: (sum: number) => void) {
    this.mask = mask;
    this.onDone = onDone;
  }

  getPhase(): ReducerPhase {
    return this.phase;
  }

  /** Coefficients selected so far in this evaluation */
  getSelectedTerms(): number {
    return this.selected;
  }

  start(): void {
    this.accumulator = 0;
    this.selected = 0;
    this.latched = undefined;
    this.phase = 'accumulating';
  }

  /**
   * Fold one item in. The item's own contribution is added before the sum is
   * latched on `last`.
   */
  consume(item: CoefficientItem): void {
    if (this.phase !== 'accumulating') {
      throw new LwrError(
        `Reducer cannot consume while ${this.phase}`,
        LwrErrorCode.REDUCER_STATE,
        { phase: this.phase }
      );
    }
    if (this.mask.bit(item.maskAddress) === 1) {
      this.accumulator += item.coefficient;
      this.selected++;
    }
    if (item.last) {
      this.latched = this.accumulator;
      this.phase = 'done';
      this.onDone?.(this.accumulator);
    }
  }

  isDone(): boolean {
    return this.phase === 'done';
  }

  /**
   * The latched sum of the finished evaluation
   */
  result(): number {
    if (this.latched === undefined) {
      throw new LwrError('Reducer has not seen the last coefficient', LwrErrorCode.REDUCER_STATE, {
        phase: this.phase,
      });
    }
    return this.latched;
  }
}

/**
 * Run a complete evaluation over a coefficient stream
 */
export function innerProduct(stream: Iterable<CoefficientItem>, mask: SecretMask): number {
  const reducer = new KeyedReducer(mask);
  reducer.start();
  for (const item of stream) {
    reducer.consume(item);
    if (reducer.isDone()) break;
  }
  return reducer.result();
}
