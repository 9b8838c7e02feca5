/**
 * @file keccak/sponge.ts
 * @brief SHAKE256 extendable-output sponge on top of Keccak-f1600
 *
 * The sponge is driven either one 64-bit word at a time (`absorbWord` /
 * `squeezeLane`, each word carrying a byte-validity mask) or with plain byte
 * buffers (`update` / `digest`). Both paths share the same rate pointer and
 * padding logic, so they produce identical output for the same message.
 *
 * @example
 * ```typescript
 * const xof = new Shake256();
 * xof.update(new TextEncoder().encode('abc'));
 * const out = xof.digest(32);
 * ```
 */

import { LwrError, LwrErrorCode } from '../api/types';
import { LANE_MASK } from './constants';
import { createState, keccakF1600 } from './permutation';
import type { KeccakState } from './permutation';

// ============================================================================
// Geometry
// ============================================================================

/** Rate lanes for SHAKE256 (1088 bits) */
export const RATE_LANES = 17;

/** Rate in bytes */
export const RATE_BYTES = RATE_LANES * 8;

/** Capacity lanes (512 bits), never touched by absorb or squeeze */
export const CAPACITY_LANES = 8;

const LANE_BYTES = 8;
const FULL_KEEP = 0xff;
const SHAKE_SUFFIX = 0x1fn;
const FINAL_PAD_BYTE = 0x80n << 56n;

// ============================================================================
// Types
// ============================================================================

/**
 * Sponge lifecycle. DONE only returns to IDLE through `reset()` or `start()`.
 */
export enum SpongePhase {
  IDLE = 'IDLE',
  ABSORBING = 'ABSORBING',
  PADDED = 'PADDED',
  SQUEEZING = 'SQUEEZING',
  DONE = 'DONE',
}

/**
 * One output lane handed to the consumer
 */
export interface SqueezedLane {
  /** Lane value with invalid bytes cleared */
  readonly lane: bigint;
  /** Byte-validity mask (contiguous low bytes) */
  readonly keep: number;
  /** Set on the final lane of the requested output */
  readonly last: boolean;
}

// ============================================================================
// Byte-mask helpers
// ============================================================================

/**
 * True when `keep` selects 0..8 contiguous bytes from the low end
 */
export function isContiguousKeep(keep: number): boolean {
  return Number.isInteger(keep) && keep >= 0 && keep <= FULL_KEEP && (keep & (keep + 1)) === 0;
}

/**
 * Number of valid bytes selected by a contiguous keep mask
 */
export function keepToByteCount(keep: number): number {
  let count = 0;
  while (count < LANE_BYTES && (keep >> count) & 1) count++;
  return count;
}

/**
 * Keep mask selecting the low `count` bytes
 */
export function byteCountToKeep(count: number): number {
  return (1 << count) - 1;
}

function laneMaskFor(count: number): bigint {
  return count >= LANE_BYTES ? LANE_MASK : (1n << BigInt(count * 8)) - 1n;
}

/**
 * Pack up to 8 bytes into a lane, little-endian
 */
export function bytesToLane(bytes: ArrayLike<number>, offset = 0, count = LANE_BYTES): bigint {
  let lane = 0n;
  for (let j = count - 1; j >= 0; j--) {
    lane = (lane << 8n) | BigInt(bytes[offset + j] & 0xff);
  }
  return lane;
}

/**
 * Unpack the low `count` bytes of a lane into `out` at `offset`
 */
export function laneToBytes(lane: bigint, out: Uint8Array, offset = 0, count = LANE_BYTES): void {
  for (let j = 0; j < count; j++) {
    out[offset + j] = Number((lane >> BigInt(j * 8)) & 0xffn);
  }
}

// ============================================================================
// Sponge
// ============================================================================

/**
 * Streaming SHAKE256 context. One instance serves one hash invocation at a
 * time; independent evaluations must use independent instances.
 */
export class Shake256 {
  private readonly state: KeccakState = createState();
  private lanePtr = 0;
  private phase: SpongePhase = SpongePhase.IDLE;
  private pending: number[] = [];
  private remaining = 0;

  getPhase(): SpongePhase {
    return this.phase;
  }

  /** True once the final requested lane has been handed out */
  isDone(): boolean {
    return this.phase === SpongePhase.DONE;
  }

  /** Bytes still owed to the consumer in the current squeeze */
  getRemainingOutput(): number {
    return this.remaining;
  }

  /** Snapshot of the permutation state, for inspection only */
  getState(): KeccakState {
    return new BigUint64Array(this.state);
  }

  /**
   * Zero the state and return to IDLE, discarding any partial progress
   */
  reset(): void {
    this.state.fill(0n);
    this.lanePtr = 0;
    this.pending = [];
    this.remaining = 0;
    this.phase = SpongePhase.IDLE;
  }

  /**
   * Begin a new invocation. Allowed from IDLE and DONE only.
   */
  start(): void {
    if (this.phase !== SpongePhase.IDLE && this.phase !== SpongePhase.DONE) {
      throw new LwrError(
        `Cannot start a new hash while the sponge is ${this.phase}`,
        LwrErrorCode.SPONGE_STATE,
        { phase: this.phase }
      );
    }
    this.reset();
    this.phase = SpongePhase.ABSORBING;
  }

  private ensureAbsorbing(operation: string): void {
    if (this.phase === SpongePhase.IDLE) {
      this.phase = SpongePhase.ABSORBING;
      return;
    }
    if (this.phase !== SpongePhase.ABSORBING) {
      throw new LwrError(
        `Cannot ${operation} while the sponge is ${this.phase}`,
        LwrErrorCode.SPONGE_STATE,
        { phase: this.phase }
      );
    }
  }

  /**
   * Absorb one 64-bit word. Bytes outside `keep` are forced to zero.
   * With `last` set, SHAKE padding is applied and the state permuted.
   */
  absorbWord(word: bigint, keep: number, last: boolean): void {
    if (!isContiguousKeep(keep)) {
      throw new LwrError(
        `Byte-validity mask must select contiguous low bytes, got 0x${keep.toString(16)}`,
        LwrErrorCode.INVALID_BYTE_MASK,
        { keep }
      );
    }
    if (word < 0n || word > LANE_MASK) {
      throw new LwrError('Absorbed word must be a 64-bit unsigned value', LwrErrorCode.INVALID_STATE, {
        word: word.toString(16),
      });
    }
    if (this.pending.length > 0) {
      throw new LwrError(
        'Cannot absorb a word while a partial byte word is buffered',
        LwrErrorCode.SPONGE_STATE,
        { pendingBytes: this.pending.length }
      );
    }
    this.ensureAbsorbing('absorb');
    this.absorbLane(word, keepToByteCount(keep), last);
  }

  private absorbLane(word: bigint, validBytes: number, last: boolean): void {
    this.state[this.lanePtr] ^= word & laneMaskFor(validBytes);
    if (last) {
      this.pad(validBytes);
      return;
    }
    if (this.lanePtr === RATE_LANES - 1) {
      keccakF1600(this.state);
      this.lanePtr = 0;
    } else {
      this.lanePtr++;
    }
  }

  private pad(validBytes: number): void {
    let lane = this.lanePtr;
    let offset = validBytes;
    if (offset === LANE_BYTES) {
      if (lane === RATE_LANES - 1) {
        keccakF1600(this.state);
        lane = 0;
      } else {
        lane++;
      }
      offset = 0;
    }
    this.state[lane] ^= SHAKE_SUFFIX << BigInt(offset * 8);
    this.state[RATE_LANES - 1] ^= FINAL_PAD_BYTE;
    keccakF1600(this.state);
    this.lanePtr = 0;
    this.phase = SpongePhase.PADDED;
  }

  /**
   * Absorb arbitrary bytes. May be called any number of times before
   * `finalize()`; chunking never changes the result.
   */
  update(data: Uint8Array): this {
    this.ensureAbsorbing('update');
    for (let i = 0; i < data.length; i++) {
      this.pending.push(data[i]);
      if (this.pending.length === LANE_BYTES) {
        const word = bytesToLane(this.pending);
        this.pending = [];
        this.absorbLane(word, LANE_BYTES, false);
      }
    }
    return this;
  }

  /**
   * Mark end-of-input: absorb the buffered tail, pad and permute
   */
  finalize(): void {
    this.ensureAbsorbing('finalize');
    const tail = this.pending;
    this.pending = [];
    this.absorbLane(bytesToLane(tail, 0, tail.length), tail.length, true);
  }

  /**
   * Request `length` output bytes. Lanes are then pulled with `squeezeLane()`.
   */
  beginSqueeze(length: number): void {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new LwrError('Output length must be a non-negative integer', LwrErrorCode.SPONGE_STATE, {
        length,
      });
    }
    if (this.phase !== SpongePhase.PADDED) {
      throw new LwrError(
        `Cannot squeeze while the sponge is ${this.phase}`,
        LwrErrorCode.SPONGE_STATE,
        { phase: this.phase }
      );
    }
    this.remaining = length;
    this.phase = length === 0 ? SpongePhase.DONE : SpongePhase.SQUEEZING;
  }

  /**
   * Hand the next output lane to the consumer. The sponge never moves past a
   * lane until this is called for it; a fresh permutation is applied only when
   * more output is actually requested after the rate is exhausted.
   */
  squeezeLane(): SqueezedLane {
    if (this.phase !== SpongePhase.SQUEEZING) {
      throw new LwrError(
        `No output lane available while the sponge is ${this.phase}`,
        LwrErrorCode.SPONGE_STATE,
        { phase: this.phase }
      );
    }
    if (this.lanePtr === RATE_LANES) {
      keccakF1600(this.state);
      this.lanePtr = 0;
    }
    const count = Math.min(LANE_BYTES, this.remaining);
    const lane = this.state[this.lanePtr] & laneMaskFor(count);
    this.lanePtr++;
    this.remaining -= count;
    const last = this.remaining === 0;
    if (last) {
      this.phase = SpongePhase.DONE;
    }
    return { lane, keep: byteCountToKeep(count), last };
  }

  /**
   * Squeeze `length` bytes after `finalize()`
   */
  squeeze(length: number): Uint8Array {
    this.beginSqueeze(length);
    const out = new Uint8Array(length);
    let offset = 0;
    while (this.phase === SpongePhase.SQUEEZING) {
      const { lane, keep } = this.squeezeLane();
      const count = keepToByteCount(keep);
      laneToBytes(lane, out, offset, count);
      offset += count;
    }
    return out;
  }

  /**
   * Finalize (if still absorbing) and squeeze `length` bytes
   */
  digest(length: number): Uint8Array {
    if (this.phase === SpongePhase.IDLE || this.phase === SpongePhase.ABSORBING) {
      if (!Number.isSafeInteger(length) || length < 0) {
        throw new LwrError('Output length must be a non-negative integer', LwrErrorCode.SPONGE_STATE, {
          length,
        });
      }
      this.finalize();
    }
    return this.squeeze(length);
  }
}

/**
 * One-shot SHAKE256
 */
export function shake256(data: Uint8Array, length: number): Uint8Array {
  return new Shake256().update(data).digest(length);
}
