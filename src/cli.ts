#!/usr/bin/env node
/**
 * @file cli.ts
 * @brief Command-line interface for the LWR-PRF stream cipher
 *
 * Usage:
 *   lwr-cipher keygen [--key-file secret_key.json] [--force]
 *   lwr-cipher prf --nonce some_seed --count 10
 *   lwr-cipher encrypt --nonce some_seed --symbols 10,20,15
 *   lwr-cipher decrypt --nonce some_seed --symbols 0,31,18
 *   lwr-cipher shake256 --input abc --length 32
 */

import { LwrContext } from './api/lwr-context';
import { LwrError } from './api/types';
import type { Nonce } from './api/types';
import { loadConfig } from './config';
import { bytesToHex, hexToBytes } from './encoding';
import { setLogLevel, setLogSink } from './logger';
import { createParameterSet, isParameterPreset, parameterSetToString } from './parameters';
import type { ParameterPreset } from './parameters/types';
import { shake256 } from './keccak/sponge';

// ============================================================================
// CLI Implementation
// ============================================================================

type Command = 'keygen' | 'prf' | 'encrypt' | 'decrypt' | 'shake256' | 'params' | 'help';

const COMMANDS: ReadonlySet<string> = new Set<Command>(['keygen', 'prf', 'encrypt', 'decrypt', 'shake256', 'params', 'help']);

function isCommand(value: string): value is Command {
  return COMMANDS.has(value);
}

interface CLIOptions {
  command: Command | undefined;
  preset: string | undefined;
  keyFile: string | undefined;
  nonce: string | undefined;
  nonceHex: string | undefined;
  index: string | undefined;
  count: string | undefined;
  symbols: string | undefined;
  input: string | undefined;
  inputHex: string | undefined;
  length: string | undefined;
  trace: boolean;
  force: boolean;
  verbose: boolean;
}

function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: undefined,
    preset: undefined,
    keyFile: undefined,
    nonce: undefined,
    nonceHex: undefined,
    index: undefined,
    count: undefined,
    symbols: undefined,
    input: undefined,
    inputHex: undefined,
    length: undefined,
    trace: false,
    force: false,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--preset':
      case '-p':
        options.preset = nextArg;
        i++;
        break;
      case '--key-file':
      case '-k':
        options.keyFile = nextArg;
        i++;
        break;
      case '--nonce':
      case '-n':
        options.nonce = nextArg;
        i++;
        break;
      case '--nonce-hex':
        options.nonceHex = nextArg;
        i++;
        break;
      case '--index':
      case '-i':
        options.index = nextArg;
        i++;
        break;
      case '--count':
      case '-c':
        options.count = nextArg;
        i++;
        break;
      case '--symbols':
      case '-s':
        options.symbols = nextArg;
        i++;
        break;
      case '--input':
        options.input = nextArg;
        i++;
        break;
      case '--input-hex':
        options.inputHex = nextArg;
        i++;
        break;
      case '--length':
      case '-l':
        options.length = nextArg;
        i++;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--force':
        options.force = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      default:
        if (options.command === undefined && isCommand(arg)) {
          options.command = arg;
        }
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
LWR-PRF Stream Cipher

Usage:
  lwr-cipher <command> [options]

Commands:
  keygen                  Generate a secret key and save it to the key file
  prf                     Evaluate the PRF for a nonce
  encrypt                 Encrypt comma-separated symbols in [0, P)
  decrypt                 Decrypt comma-separated symbols in [0, P)
  shake256                Hash an input with SHAKE256
  params                  Show the active parameter set
  help                    Show this help message

Options:
  -p, --preset <name>     Parameter preset (env LWR_PRESET)
  -k, --key-file <file>   Secret key store (env LWR_KEY_FILE)
  -n, --nonce <text>      Nonce as UTF-8 text
      --nonce-hex <hex>   Nonce as hex bytes
  -i, --index <n>         First PRF index (default 0)
  -c, --count <n>         Number of PRF outputs (default 1)
  -s, --symbols <list>    Symbols, e.g. 10,20,15
      --input <text>      SHAKE256 input as UTF-8 text
      --input-hex <hex>   SHAKE256 input as hex bytes
  -l, --length <n>        SHAKE256 output bytes (default 32)
      --trace             Print intermediate PRF values
      --force             Overwrite an existing key file
  -v, --verbose           Debug logging

Examples:
  lwr-cipher keygen --key-file secret_key.json
  lwr-cipher prf --nonce some_seed --count 10
  lwr-cipher encrypt --nonce some_seed --symbols 10,20,15,8,31
`);
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got: ${value}`);
  }
  return parsed;
}

function parseSymbols(value: string | undefined): number[] {
  if (value === undefined || value.trim() === '') {
    throw new Error('--symbols is required');
  }
  return value.split(',').map((part) => {
    const parsed = Number(part.trim());
    if (!Number.isInteger(parsed)) {
      throw new Error(`Invalid symbol: ${part}`);
    }
    return parsed;
  });
}

function resolveNonce(options: CLIOptions): Nonce {
  if (options.nonceHex !== undefined) {
    return hexToBytes(options.nonceHex);
  }
  if (options.nonce !== undefined) {
    return new TextEncoder().encode(options.nonce);
  }
  throw new Error('--nonce or --nonce-hex is required');
}

function resolvePreset(options: CLIOptions, fallback: ParameterPreset): ParameterPreset {
  if (options.preset === undefined) return fallback;
  if (!isParameterPreset(options.preset)) {
    throw new Error(`Unknown preset: ${options.preset}`);
  }
  return options.preset;
}

/**
 * Run one CLI invocation and return its exit code
 */
async function run(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const options = parseArgs(args);
  if (options.command === undefined || options.command === 'help') {
    printHelp();
    return options.command === 'help' ? 0 : 1;
  }

  const config = loadConfig(env);
  setLogSink('stderr');
  setLogLevel(options.verbose ? 'debug' : config.logLevel);
  const preset = resolvePreset(options, config.preset);
  const keyFile = options.keyFile ?? config.keyFile;

  switch (options.command) {
    case 'params': {
      console.log(parameterSetToString(createParameterSet(preset)));
      return 0;
    }
    case 'shake256': {
      const input = options.inputHex !== undefined
        ? hexToBytes(options.inputHex)
        : new TextEncoder().encode(options.input ?? '');
      console.log(bytesToHex(shake256(input, parseInteger('--length', options.length, 32))));
      return 0;
    }
    case 'keygen': {
      const ctx = await LwrContext.create(preset, {
        keyFile,
        generateIfMissing: true,
        forceRegenerate: options.force,
      });
      console.log(`Secret key ready in ${keyFile} (n_lwr = ${ctx.getParams().nLwr})`);
      ctx.dispose();
      return 0;
    }
    case 'prf': {
      const ctx = await LwrContext.create(preset, { keyFile });
      const nonce = resolveNonce(options);
      const start = parseInteger('--index', options.index, 0);
      const count = parseInteger('--count', options.count, 1);
      for (let i = 0; i < count; i++) {
        if (options.trace) {
          const t = await ctx.evaluateDetailed(nonce, start + i);
          console.log(
            `PRF[${start + i}] = ${t.output} (sum=${t.sum} mod2N=${t.mod2N} modN=${t.modN} msb=${t.msb} rounded=${t.rescaled})`
          );
        } else {
          console.log(`PRF[${start + i}] = ${await ctx.evaluate(nonce, start + i)}`);
        }
      }
      ctx.dispose();
      return 0;
    }
    case 'encrypt': {
      const ctx = await LwrContext.create(preset, { keyFile });
      const { ciphertext } = await ctx.encrypt(parseSymbols(options.symbols), resolveNonce(options), parseInteger('--index', options.index, 0));
      console.log(ciphertext.join(','));
      ctx.dispose();
      return 0;
    }
    case 'decrypt': {
      const ctx = await LwrContext.create(preset, { keyFile });
      const message = await ctx.decrypt(resolveNonce(options), parseSymbols(options.symbols), parseInteger('--index', options.index, 0));
      console.log(message.join(','));
      ctx.dispose();
      return 0;
    }
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  try {
    process.exit(await run(args));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof LwrError ? ` [${error.code}]` : '';
    console.error(`Error${code}: ${message}`);
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { main, run, parseArgs, printHelp };
