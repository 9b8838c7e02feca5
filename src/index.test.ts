import { describe, it, expect } from 'vitest';
import { version, LwrErrorCode, LwrError, LwrContext, shake256, createParameterSet } from './index';

describe('node-lwr-transcipher', () => {
  describe('Package metadata', () => {
    it('should export version', () => {
      expect(version).toBe('0.1.0');
    });
  });

  describe('LwrErrorCode enum', () => {
    it('should have string error codes', () => {
      expect(LwrErrorCode.INVALID_PARAMETERS).toBe('INVALID_PARAMETERS');
      expect(LwrErrorCode.INVALID_BYTE_MASK).toBe('INVALID_BYTE_MASK');
      expect(LwrErrorCode.KEY_MISMATCH).toBe('KEY_MISMATCH');
      expect(LwrErrorCode.SERIALIZATION_ERROR).toBe('SERIALIZATION_ERROR');
    });
  });

  describe('LwrError class', () => {
    it('should create error with code and message', () => {
      const error = new LwrError('Test error', LwrErrorCode.INVALID_PARAMETERS, { param: 'test' });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(LwrError);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe(LwrErrorCode.INVALID_PARAMETERS);
      expect(error.details).toEqual({ param: 'test' });
      expect(error.name).toBe('LwrError');
    });

    it('should work without details', () => {
      const error = new LwrError('Test error', LwrErrorCode.KEY_MISMATCH);

      expect(error.code).toBe(LwrErrorCode.KEY_MISMATCH);
      expect(error.details).toBeUndefined();
    });
  });

  describe('public surface', () => {
    it('should expose the context and primitives', async () => {
      const ctx = await LwrContext.create(createParameterSet('lwr-16-256-16'), {
        seed: new TextEncoder().encode('small-key'),
      });
      expect(await ctx.evaluate(new TextEncoder().encode('abc'), 0)).toBe(2);
      expect(Buffer.from(shake256(new Uint8Array(0), 4)).toString('hex')).toBe('46b9dd2b');
    });
  });
});
