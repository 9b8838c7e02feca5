/**
 * Property-Based Tests for Sponge and Counter-Mode Equivalence
 *
 * Chunked absorption, word absorption and the one-shot hash agree; streamed
 * and one-shot encryption agree; decryption inverts encryption.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createHash } from 'crypto';
import { FAST_PROPERTY_TEST_CONFIG, PROPERTY_TEST_CONFIG, SMALL_PARAMS, arbitraryBits, arbitraryBytes, arbitrarySymbolVector } from './property-test-config';
import { Shake256, shake256, bytesToLane, byteCountToKeep } from '../keccak/sponge';
import { LwrPrf } from '../prf/lwr-prf';
import { SecretMask } from '../prf/secret-mask';
import { LwrStreamCipher } from '../cipher/stream-cipher';
import { collect, decryptSymbols, encryptSymbols } from '../streaming';

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

// ============================================================================
// Sponge
// ============================================================================

describe('Property: sponge absorption is chunking-independent', () => {
  it('matches node:crypto for any input and output length', () => {
    fc.assert(
      fc.property(arbitraryBytes(400), fc.integer({ min: 1, max: 300 }), (input, length) => {
        const expected = createHash('shake256', { outputLength: length }).update(input).digest('hex');
        return hex(shake256(input, length)) === expected;
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('gives the same digest for any split of the input', () => {
    fc.assert(
      fc.property(
        arbitraryBytes(300),
        fc.array(fc.integer({ min: 1, max: 40 }), { minLength: 1, maxLength: 20 }),
        (input, sizes) => {
          const xof = new Shake256();
          let offset = 0;
          let i = 0;
          while (offset < input.length) {
            const size = sizes[i % sizes.length];
            xof.update(input.subarray(offset, offset + size));
            offset += size;
            i++;
          }
          return hex(xof.digest(48)) === hex(shake256(input, 48));
        }
      ),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('gives the same digest through the word interface', () => {
    fc.assert(
      fc.property(arbitraryBytes(300), (input) => {
        const xof = new Shake256();
        xof.start();
        const fullWords = Math.floor(input.length / 8);
        const tail = input.length - fullWords * 8;
        for (let w = 0; w < fullWords; w++) {
          xof.absorbWord(bytesToLane(input, w * 8), 0xff, tail === 0 && w === fullWords - 1);
        }
        if (tail > 0 || fullWords === 0) {
          xof.absorbWord(bytesToLane(input, fullWords * 8, tail), byteCountToKeep(tail), true);
        }
        return hex(xof.squeeze(32)) === hex(shake256(input, 32));
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });
});

// ============================================================================
// Cipher
// ============================================================================

describe('Property: counter-mode encryption', () => {
  it('decrypts to the original message under any key', async () => {
    await fc.assert(
      fc.asyncProperty(
        arbitraryBits(SMALL_PARAMS.nLwr),
        arbitraryBytes(16),
        arbitrarySymbolVector(SMALL_PARAMS.plaintextModulus, 6),
        async (bits, nonce, message) => {
          const prf = new LwrPrf(SMALL_PARAMS, SecretMask.fromBits(bits, SMALL_PARAMS.nLwr));
          const streamed = await collect(encryptSymbols(message, prf, nonce));
          expect(streamed).toEqual(new LwrStreamCipher(prf).encrypt(message, nonce).ciphertext);
          expect(await collect(decryptSymbols(streamed, prf, nonce))).toEqual(message);
        }
      ),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('keeps PRF outputs inside [0, P)', () => {
    const prf = new LwrPrf(SMALL_PARAMS, SecretMask.fromSeed(new TextEncoder().encode('small-key'), 16));
    fc.assert(
      fc.property(arbitraryBytes(24), fc.bigInt({ min: 0n, max: 0xffffffffffffffffn }), (nonce, index) => {
        const out = prf.evaluate(nonce, index);
        return Number.isInteger(out) && out >= 0 && out < SMALL_PARAMS.plaintextModulus;
      }),
      { ...PROPERTY_TEST_CONFIG, numRuns: 50 }
    );
  });
});
