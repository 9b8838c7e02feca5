/**
 * @file cipher/stream-cipher.ts
 * @brief Counter-mode message encryption with the LWR-PRF keystream
 *
 * Symbol i of a message is combined with PRF(nonce, startIndex + i). A
 * (nonce, index) pair must never encrypt two different symbols; there is no
 * authentication tag.
 */

import { LwrError, LwrErrorCode } from '../api/types';
import type { EncryptedMessage, Nonce, PrfIndex } from '../api/types';
import type { LwrPrf } from '../prf/lwr-prf';
import { decryptSymbol, encryptSymbol } from './combiner';

export class LwrStreamCipher {
  private readonly prf: LwrPrf;
  private readonly p: number;

  constructor(prf: LwrPrf) {
    this.prf = prf;
    this.p = prf.getParams().plaintextModulus;
  }

  getPlaintextModulus(): number {
    return this.p;
  }

  /**
   * PRF outputs for indices startIndex .. startIndex + length - 1
   */
  keystream(nonce: Nonce, length: number, startIndex: PrfIndex = 0): number[] {
    return this.prf.evaluateMany(nonce, length, startIndex);
  }

  private checkSymbols(name: string, symbols: readonly number[]): void {
    symbols.forEach((value, i) => {
      if (!Number.isInteger(value) || value < 0 || value >= this.p) {
        throw new LwrError(
          `${name}[${i}] must be an integer in [0, ${this.p}), got ${value}`,
          LwrErrorCode.SYMBOL_OUT_OF_RANGE,
          { position: i, value, plaintextModulus: this.p }
        );
      }
    });
  }

  encrypt(message: readonly number[], nonce: Nonce, startIndex: PrfIndex = 0): EncryptedMessage {
    this.checkSymbols('message', message);
    const stream = this.keystream(nonce, message.length, startIndex);
    const ciphertext = message.map((m, i) => encryptSymbol(m, stream[i], this.p));
    return { nonce, ciphertext };
  }

  decrypt(nonce: Nonce, ciphertext: readonly number[], startIndex: PrfIndex = 0): number[] {
    this.checkSymbols('ciphertext', ciphertext);
    const stream = this.keystream(nonce, ciphertext.length, startIndex);
    return ciphertext.map((c, i) => decryptSymbol(c, stream[i], this.p));
  }
}
