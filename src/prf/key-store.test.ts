import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  loadSecretMask,
  parseSecretKeyJson,
  parseSecretKeyMem,
  saveSecretMask,
  secretKeyFileExists,
  serializeSecretKey,
} from './key-store';
import { SecretMask } from './secret-mask';
import { LwrError, LwrErrorCode } from '../api/types';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof LwrError ? error.code : 'not-an-LwrError';
  }
  return undefined;
}

describe('key store', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lwr-key-'));
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('JSON format', () => {
    it('serializes n_lwr and the bit list', () => {
      const mask = SecretMask.fromBits([1, 0, 1], 3);
      expect(JSON.parse(serializeSecretKey(mask))).toEqual({ n_lwr: 3, secret_key: [1, 0, 1] });
    });

    it('parses what it serializes', () => {
      const mask = SecretMask.fromBits([0, 1, 1, 0, 1], 5);
      expect(parseSecretKeyJson(serializeSecretKey(mask)).equals(mask)).toBe(true);
    });

    it('reports a dimension mismatch', () => {
      const text = JSON.stringify({ n_lwr: 3, secret_key: [1, 0, 1] });
      try {
        parseSecretKeyJson(text, 445);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LwrError);
        if (error instanceof LwrError) {
          expect(error.code).toBe(LwrErrorCode.KEY_MISMATCH);
          expect(error.message).toBe('Dimension mismatch: expected 445, got 3 in file');
        }
      }
    });

    it('rejects malformed files', () => {
      expect(codeOf(() => parseSecretKeyJson('{not json'))).toBe(LwrErrorCode.SERIALIZATION_ERROR);
      expect(codeOf(() => parseSecretKeyJson('{"n_lwr": 3}'))).toBe(LwrErrorCode.SERIALIZATION_ERROR);
      expect(codeOf(() => parseSecretKeyJson('[1, 0]'))).toBe(LwrErrorCode.SERIALIZATION_ERROR);
    });
  });

  describe('mem format', () => {
    it('reads one bit per line', () => {
      expect(parseSecretKeyMem('1\n0\n1\n1\n', 4).toBits()).toEqual([1, 0, 1, 1]);
    });

    it('tolerates CRLF and blank lines', () => {
      expect(parseSecretKeyMem('0\r\n1\r\n\r\n1\r\n', 3).toBits()).toEqual([0, 1, 1]);
    });
  });

  describe('files', () => {
    it('saves and loads a JSON key', async () => {
      const file = path.join(dir, 'secret_key.json');
      const mask = SecretMask.fromSeed(new TextEncoder().encode('test-secret'), 445);
      await saveSecretMask(file, mask);
      expect(secretKeyFileExists(file)).toBe(true);
      const loaded = await loadSecretMask(file, 445);
      expect(loaded.equals(mask)).toBe(true);
    });

    it('loads a mem key, inferring its length', async () => {
      const file = path.join(dir, 'secret_key.mem');
      fs.writeFileSync(file, '1\n0\n0\n1\n1\n');
      const loaded = await loadSecretMask(file);
      expect(loaded.toBits()).toEqual([1, 0, 0, 1, 1]);
    });

    it('rejects a key of the wrong dimension', async () => {
      const file = path.join(dir, 'secret_key.json');
      await saveSecretMask(file, SecretMask.fromBits([1, 0, 1], 3));
      await expect(loadSecretMask(file, 445)).rejects.toMatchObject({ code: LwrErrorCode.KEY_MISMATCH });
    });

    it('reports missing files', async () => {
      const file = path.join(dir, 'absent.json');
      expect(secretKeyFileExists(file)).toBe(false);
      await expect(loadSecretMask(file)).rejects.toThrow();
    });
  });
});
