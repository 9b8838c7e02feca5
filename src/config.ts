/**
 * Configuration loader.
 *
 * Optional env vars:
 *   LWR_PRESET    – parameter preset name (default lwr-445-2048-32)
 *   LWR_KEY_FILE  – JSON secret key store (default secret_key.json)
 *   LOG_LEVEL     – debug | info | warn | error (default info)
 */

import { LwrError, LwrErrorCode } from './api/types';
import { isLogLevel } from './logger';
import type { LogLevel } from './logger';
import { DEFAULT_PRESET, getAvailablePresets, isParameterPreset } from './parameters';
import type { ParameterPreset } from './parameters';

export interface Config {
  readonly preset: ParameterPreset;
  readonly keyFile: string;
  readonly logLevel: LogLevel;
}

const DEFAULT_KEY_FILE = 'secret_key.json';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawPreset = env.LWR_PRESET ?? DEFAULT_PRESET;
  if (!isParameterPreset(rawPreset)) {
    throw new LwrError(
      `LWR_PRESET must be one of ${getAvailablePresets().join(', ')}, got: ${rawPreset}`,
      LwrErrorCode.INVALID_CONFIG,
      { preset: rawPreset }
    );
  }

  const keyFile = env.LWR_KEY_FILE ?? DEFAULT_KEY_FILE;
  if (keyFile === '') {
    throw new LwrError('LWR_KEY_FILE must not be empty', LwrErrorCode.INVALID_CONFIG);
  }

  const rawLevel = env.LOG_LEVEL ?? 'info';
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info';

  return {
    preset: rawPreset,
    keyFile,
    logLevel,
  };
}
