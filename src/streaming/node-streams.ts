/**
 * Node.js Stream Interfaces for Symbol Encryption
 *
 * This module provides Node.js Readable/Writable/Transform stream interfaces
 * for counter-mode encryption, enabling pipe() between symbol sources and sinks.
 * Each cipher stream owns its counter; the PRF it shares is read-only.
 */

import { Readable, Writable, Transform, TransformCallback } from 'stream';
import type { Nonce, PrfIndex } from '../api/types';
import { decryptSymbol, encryptSymbol } from '../cipher/combiner';
import type { LwrPrf } from '../prf/lwr-prf';
import { normalizeIndex } from '../prf/coefficient-source';
import type { StreamingProgressCallback } from './index';

/**
 * Options for symbol streams
 */
export interface SymbolStreamOptions {
    progress?: StreamingProgressCallback;
    highWaterMark?: number;
}

/**
 * Options for cipher streams
 */
export interface CipherStreamOptions extends SymbolStreamOptions {
    /** Counter value used for the first symbol (default 0) */
    startIndex?: PrfIndex;
}

/**
 * Readable stream that emits symbols from an array
 */
export class SymbolReadableStream extends Readable {
    private symbols: readonly number[];
    private index: number = 0;
    private progressCallback: StreamingProgressCallback | undefined;
    private startTime: number;

    constructor(symbols: readonly number[], options: SymbolStreamOptions = {}) {
        super({
            objectMode: true,
            highWaterMark: options.highWaterMark ?? 16
        });
        this.symbols = symbols;
        this.progressCallback = options.progress;
        this.startTime = Date.now();
    }

    override _read(): void {
        if (this.index >= this.symbols.length) {
            this.push(null);
            return;
        }

        const symbol = this.symbols[this.index++];

        if (this.progressCallback) {
            const elapsed = Date.now() - this.startTime;
            const estimatedRemaining = (elapsed / this.index) * (this.symbols.length - this.index);

            this.progressCallback({
                stage: 'reading',
                current: this.index,
                total: this.symbols.length,
                elapsedMs: elapsed,
                estimatedRemainingMs: estimatedRemaining,
                progressPercent: (this.index / this.symbols.length) * 100
            });
        }

        this.push(symbol);
    }

    getProcessedCount(): number {
        return this.index;
    }
}

/**
 * Writable stream that collects symbols
 */
export class SymbolWritableStream extends Writable {
    private collected: number[] = [];
    private progressCallback: StreamingProgressCallback | undefined;
    private startTime: number;

    constructor(options: SymbolStreamOptions = {}) {
        super({
            objectMode: true,
            highWaterMark: options.highWaterMark ?? 16
        });
        this.progressCallback = options.progress;
        this.startTime = Date.now();
    }

    override _write(chunk: number, _encoding: string, callback: (error?: Error | null) => void): void {
        this.collected.push(chunk);

        if (this.progressCallback) {
            const elapsed = Date.now() - this.startTime;
            this.progressCallback({
                stage: 'writing',
                current: this.collected.length,
                total: this.collected.length,
                elapsedMs: elapsed,
                estimatedRemainingMs: 0,
                progressPercent: 0
            });
        }

        callback();
    }

    getCollected(): number[] {
        return this.collected;
    }

    getProcessedCount(): number {
        return this.collected.length;
    }
}

type CombineFn = (symbol: number, prf: number, p: number) => number;

/**
 * Transform stream combining each symbol with the PRF value at the next
 * counter index
 */
abstract class SymbolCipherStream extends Transform {
    private prf: LwrPrf;
    private nonce: Nonce;
    private nextIndex: bigint;
    private plaintextModulus: number;
    private progressCallback: StreamingProgressCallback | undefined;
    private processedCount: number = 0;
    private startTime: number;
    protected abstract readonly stage: string;
    protected abstract readonly combine: CombineFn;

    constructor(prf: LwrPrf, nonce: Nonce, options: CipherStreamOptions = {}) {
        super({
            objectMode: true,
            highWaterMark: options.highWaterMark ?? 16
        });
        this.prf = prf;
        this.nonce = nonce;
        this.nextIndex = normalizeIndex(options.startIndex ?? 0);
        this.plaintextModulus = prf.getParams().plaintextModulus;
        this.progressCallback = options.progress;
        this.startTime = Date.now();
    }

    override _transform(
        chunk: number,
        _encoding: string,
        callback: TransformCallback
    ): void {
        try {
            const k = this.prf.evaluate(this.nonce, this.nextIndex);
            const out = this.combine(chunk, k, this.plaintextModulus);
            this.nextIndex++;
            this.processedCount++;

            if (this.progressCallback) {
                const elapsed = Date.now() - this.startTime;
                this.progressCallback({
                    stage: this.stage,
                    current: this.processedCount,
                    total: this.processedCount,
                    elapsedMs: elapsed,
                    estimatedRemainingMs: 0,
                    progressPercent: 0
                });
            }

            callback(null, out);
        } catch (error) {
            callback(error instanceof Error ? error : new Error(String(error)));
        }
    }

    getProcessedCount(): number {
        return this.processedCount;
    }

    /** Counter index the next symbol will use */
    getNextIndex(): bigint {
        return this.nextIndex;
    }
}

/**
 * Transform stream that encrypts plaintext symbols
 */
export class EncryptionStream extends SymbolCipherStream {
    protected readonly stage = 'encrypting';
    protected readonly combine: CombineFn = encryptSymbol;
}

/**
 * Transform stream that decrypts ciphertext symbols
 */
export class DecryptionStream extends SymbolCipherStream {
    protected readonly stage = 'decrypting';
    protected readonly combine: CombineFn = decryptSymbol;
}

/**
 * Utility to convert async iterable to Node.js Readable stream
 */
export function asyncIterableToReadable<T>(
    iterable: AsyncIterable<T> | Iterable<T>
): Readable {
    return Readable.from(iterable, { objectMode: true });
}
