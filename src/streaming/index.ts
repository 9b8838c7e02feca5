/**
 * Streaming Operations for Counter-Mode Encryption
 *
 * This module provides async-iterable keystream and symbol pipelines plus the
 * Node.js stream classes. Every pipeline consumes one PRF index per symbol,
 * in order, so a stream and a one-shot `LwrStreamCipher.encrypt` over the
 * same nonce produce identical ciphertext.
 */

import type { Nonce, PrfIndex } from '../api/types';
import { decryptSymbol, encryptSymbol } from '../cipher/combiner';
import { normalizeIndex } from '../prf/coefficient-source';
import type { LwrPrf } from '../prf/lwr-prf';

/**
 * Progress information for streaming operations
 */
export interface StreamingProgress {
    stage: string;
    current: number;
    total: number;
    elapsedMs: number;
    estimatedRemainingMs: number;
    progressPercent: number;
}

/**
 * Progress callback type
 */
export type StreamingProgressCallback = (progress: StreamingProgress) => void;

/**
 * Endless keystream: PRF(nonce, startIndex), PRF(nonce, startIndex + 1), ...
 * Stops at the end of the 64-bit counter space.
 */
export function* keystream(prf: LwrPrf, nonce: Nonce, startIndex: PrfIndex = 0): Generator<number, void, undefined> {
    const maxIndex = 0xffffffffffffffffn;
    for (let index = normalizeIndex(startIndex); index <= maxIndex; index++) {
        yield prf.evaluate(nonce, index);
    }
}

async function* combineSymbols(
    source: AsyncIterable<number> | Iterable<number>,
    prf: LwrPrf,
    nonce: Nonce,
    startIndex: PrfIndex,
    combine: (symbol: number, k: number, p: number) => number
): AsyncGenerator<number, void, undefined> {
    const p = prf.getParams().plaintextModulus;
    const keys = keystream(prf, nonce, startIndex);
    for await (const symbol of source) {
        const next = keys.next();
        if (next.done === true) {
            return;
        }
        yield combine(symbol, next.value, p);
    }
}

/**
 * Encrypt symbols as they arrive
 */
export function encryptSymbols(
    source: AsyncIterable<number> | Iterable<number>,
    prf: LwrPrf,
    nonce: Nonce,
    startIndex: PrfIndex = 0
): AsyncGenerator<number, void, undefined> {
    return combineSymbols(source, prf, nonce, startIndex, encryptSymbol);
}

/**
 * Decrypt symbols as they arrive
 */
export function decryptSymbols(
    source: AsyncIterable<number> | Iterable<number>,
    prf: LwrPrf,
    nonce: Nonce,
    startIndex: PrfIndex = 0
): AsyncGenerator<number, void, undefined> {
    return combineSymbols(source, prf, nonce, startIndex, decryptSymbol);
}

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
    const out: T[] = [];
    for await (const item of source) {
        out.push(item);
    }
    return out;
}

export {
    SymbolReadableStream,
    SymbolWritableStream,
    EncryptionStream,
    DecryptionStream,
    asyncIterableToReadable,
} from './node-streams';
export type { SymbolStreamOptions, CipherStreamOptions } from './node-streams';
