/**
 * @file api/lwr-context.ts
 * @brief High-level convenience API for the LWR-PRF stream cipher
 *
 * LwrContext bundles a parameter set, a secret mask and the counter-mode
 * cipher, and takes care of loading or creating the key.
 */

import { LwrStreamCipher } from '../cipher/stream-cipher';
import { logger } from '../logger';
import { resolveParameterSet } from '../parameters';
import type { CustomParameters, LwrParameterSet, ParameterPreset } from '../parameters/types';
import { normalizeIndex } from '../prf/coefficient-source';
import { loadSecretMask, saveSecretMask, secretKeyFileExists } from '../prf/key-store';
import { LwrPrf } from '../prf/lwr-prf';
import { SecretMask } from '../prf/secret-mask';
import { LwrError, LwrErrorCode } from './types';
import type { EncryptedMessage, Nonce, PrfIndex, PrfTrace, ProgressCallback } from './types';

/**
 * Context configuration options. Key sources are tried in order:
 * `mask`, `seed`, `keyFile`; with none given a fresh key is generated.
 */
export interface LwrContextOptions {
  /** Use this secret mask directly */
  mask?: SecretMask;
  /** Derive the secret mask from a seed */
  seed?: Uint8Array;
  /** JSON (or .mem) key store to load */
  keyFile?: string;
  /** When `keyFile` does not exist, generate a key and save it there */
  generateIfMissing?: boolean;
  /** Overwrite `keyFile` with a newly generated key */
  forceRegenerate?: boolean;
}

/**
 * High-level context for keystream generation and symbol encryption
 *
 * @example
 * ```typescript
 * const ctx = await LwrContext.create('lwr-445-2048-32', { keyFile: 'secret_key.json', generateIfMissing: true });
 * const nonce = new TextEncoder().encode('some_seed');
 * const { ciphertext } = await ctx.encrypt([10, 20, 15], nonce);
 * const message = await ctx.decrypt(nonce, ciphertext); // [10, 20, 15]
 * ctx.dispose();
 * ```
 */
export class LwrContext {
  private readonly params: LwrParameterSet;
  private readonly prf: LwrPrf;
  private readonly cipher: LwrStreamCipher;
  private disposed = false;

  private constructor(params: LwrParameterSet, mask: SecretMask) {
    this.params = params;
    this.prf = new LwrPrf(params, mask);
    this.cipher = new LwrStreamCipher(this.prf);
  }

  /**
   * Create a new context with the specified parameters
   */
  static async create(
    params: ParameterPreset | CustomParameters | LwrParameterSet,
    options: LwrContextOptions = {}
  ): Promise<LwrContext> {
    const resolved = resolveParameterSet(params);
    const mask = await LwrContext.resolveMask(resolved, options);
    logger.debug('lwr context created', { params: resolved.name, maskWeight: mask.weight });
    return new LwrContext(resolved, mask);
  }

  private static async resolveMask(params: LwrParameterSet, options: LwrContextOptions): Promise<SecretMask> {
    if (options.mask !== undefined) {
      return options.mask;
    }
    if (options.seed !== undefined) {
      return SecretMask.fromSeed(options.seed, params.nLwr);
    }
    if (options.keyFile === undefined) {
      return SecretMask.generate(params.nLwr);
    }

    const exists = secretKeyFileExists(options.keyFile);
    if (exists && options.forceRegenerate !== true) {
      return loadSecretMask(options.keyFile, params.nLwr);
    }
    if (!exists && options.generateIfMissing !== true && options.forceRegenerate !== true) {
      throw new LwrError(`Secret key file not found: ${options.keyFile}`, LwrErrorCode.SERIALIZATION_ERROR, {
        keyFile: options.keyFile,
      });
    }
    if (exists) {
      logger.warn('overwriting secret key', { keyFile: options.keyFile });
    }
    const mask = SecretMask.generate(params.nLwr);
    await saveSecretMask(options.keyFile, mask);
    return mask;
  }

  private checkDisposed(): void {
    if (this.disposed) {
      throw new LwrError('LwrContext has been disposed', LwrErrorCode.CONTEXT_DISPOSED);
    }
  }

  // ========================================================================
  // PRF
  // ========================================================================

  /** Evaluate the PRF at one index */
  async evaluate(nonce: Nonce, index: PrfIndex): Promise<number> {
    this.checkDisposed();
    return this.prf.evaluate(nonce, index);
  }

  /** Evaluate the PRF with all intermediate values */
  async evaluateDetailed(nonce: Nonce, index: PrfIndex): Promise<PrfTrace> {
    this.checkDisposed();
    return this.prf.evaluateDetailed(nonce, index);
  }

  /** Evaluate `count` consecutive indices, reporting progress per output */
  async evaluateMany(
    nonce: Nonce,
    count: number,
    startIndex: PrfIndex = 0,
    progress?: ProgressCallback
  ): Promise<number[]> {
    this.checkDisposed();
    if (progress === undefined) {
      return this.prf.evaluateMany(nonce, count, startIndex);
    }
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new LwrError(`Output count must be a non-negative integer, got ${count}`, LwrErrorCode.INVALID_INDEX, {
        count,
      });
    }
    const startTime = Date.now();
    const first = normalizeIndex(startIndex);
    if (count > 0) {
      normalizeIndex(first + BigInt(count - 1));
    }
    const outputs: number[] = [];
    for (let i = 0; i < count; i++) {
      outputs.push(this.prf.evaluate(nonce, first + BigInt(i)));
      progress({ stage: 'keystream', current: i + 1, total: count, elapsedMs: Date.now() - startTime });
    }
    return outputs;
  }

  // ========================================================================
  // Encryption/Decryption
  // ========================================================================

  /** Encrypt a message of symbols in [0, P) */
  async encrypt(message: readonly number[], nonce: Nonce, startIndex: PrfIndex = 0): Promise<EncryptedMessage> {
    this.checkDisposed();
    return this.cipher.encrypt(message, nonce, startIndex);
  }

  /** Decrypt a message of symbols in [0, P) */
  async decrypt(nonce: Nonce, ciphertext: readonly number[], startIndex: PrfIndex = 0): Promise<number[]> {
    this.checkDisposed();
    return this.cipher.decrypt(nonce, ciphertext, startIndex);
  }

  // ========================================================================
  // Accessors
  // ========================================================================

  getParams(): LwrParameterSet {
    return { ...this.params };
  }

  getPrf(): LwrPrf {
    this.checkDisposed();
    return this.prf;
  }

  getCipher(): LwrStreamCipher {
    this.checkDisposed();
    return this.cipher;
  }

  dispose(): void {
    this.disposed = true;
  }

  isDisposed(): boolean {
    return this.disposed;
  }
}

/** Context with the default 445/2048/32 parameters */
export function createDefaultContext(options: LwrContextOptions = {}): Promise<LwrContext> {
  return LwrContext.create('lwr-445-2048-32', options);
}
