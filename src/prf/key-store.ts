/**
 * @file prf/key-store.ts
 * @brief Persisted forms of the secret mask
 *
 * Two formats are read:
 *   - JSON: `{ "n_lwr": 445, "secret_key": [0, 1, ...] }`
 *   - mem:  one bit per line, as loaded into a memory initializer
 * Only JSON is written.
 */

import * as fs from 'fs';
import { LwrError, LwrErrorCode } from '../api/types';
import { logger } from '../logger';
import { SecretMask } from './secret-mask';

interface SecretKeyFile {
  n_lwr: number;
  secret_key: unknown[];
}

function isSecretKeyFile(value: unknown): value is SecretKeyFile {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'n_lwr' in value &&
    typeof value.n_lwr === 'number' &&
    'secret_key' in value &&
    Array.isArray(value.secret_key)
  );
}

/**
 * Parse the JSON key format. With `expectedLength`, a different n_lwr is a
 * KEY_MISMATCH.
 */
export function parseSecretKeyJson(text: string, expectedLength?: number): SecretMask {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new LwrError('Secret key file is not valid JSON', LwrErrorCode.SERIALIZATION_ERROR, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (!isSecretKeyFile(parsed)) {
    throw new LwrError(
      'Secret key file must contain n_lwr and a secret_key array',
      LwrErrorCode.SERIALIZATION_ERROR
    );
  }
  if (expectedLength !== undefined && parsed.n_lwr !== expectedLength) {
    throw new LwrError(
      `Dimension mismatch: expected ${expectedLength}, got ${parsed.n_lwr} in file`,
      LwrErrorCode.KEY_MISMATCH,
      { expected: expectedLength, actual: parsed.n_lwr }
    );
  }
  return SecretMask.fromBits(parsed.secret_key, parsed.n_lwr);
}

/**
 * Parse the one-bit-per-line format
 */
export function parseSecretKeyMem(text: string, length: number): SecretMask {
  const entries = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => (line === '1' ? 1 : line === '0' ? 0 : Number.NaN));
  return SecretMask.fromBits(entries, length);
}

/**
 * Serialize to the JSON key format
 */
export function serializeSecretKey(mask: SecretMask): string {
  const file: SecretKeyFile = { n_lwr: mask.length, secret_key: mask.toBits() };
  return JSON.stringify(file, null, 2);
}

export async function loadSecretMask(path: string, expectedLength?: number): Promise<SecretMask> {
  const text = await fs.promises.readFile(path, 'utf-8');
  const mask = path.endsWith('.mem')
    ? parseSecretKeyMem(text, expectedLength ?? text.split(/\r?\n/).filter((l) => l.trim() !== '').length)
    : parseSecretKeyJson(text, expectedLength);
  logger.info('secret key loaded', { path, nLwr: mask.length });
  return mask;
}

export async function saveSecretMask(path: string, mask: SecretMask): Promise<void> {
  await fs.promises.writeFile(path, serializeSecretKey(mask) + '\n', 'utf-8');
  logger.info('secret key saved', { path, nLwr: mask.length });
}

export function secretKeyFileExists(path: string): boolean {
  return fs.existsSync(path);
}
