/**
 * @file encoding.ts
 * @brief Hex helpers for nonces and digests
 */

import { LwrError, LwrErrorCode } from './api/types';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Decode a hex string (optional 0x prefix) into bytes
 */
export function hexToBytes(hex: string): Uint8Array {
  const body = hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
  if (!HEX_PATTERN.test(body)) {
    throw new LwrError(`Invalid hex string: ${hex}`, LwrErrorCode.SERIALIZATION_ERROR, { hex });
  }
  return new Uint8Array(Buffer.from(body, 'hex'));
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}
