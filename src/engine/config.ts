import { ConfigError } from './errors';
import { DEFAULT_CHUNK_SIZE } from '../tape/tape';

export interface EngineOptions {
  stepByStep: boolean;
  showMemory: boolean;
  windowSize: number;
  margin: number;
  verbose: boolean;
  rawOutput: boolean;
  chunkSize: number;
  fromFile: boolean;
  maxSteps: number; // 0 = unlimited
}

export const DEFAULT_OPTIONS: Readonly<EngineOptions> = {
  stepByStep: false,
  showMemory: false,
  windowSize: 10,
  margin: 2,
  verbose: false,
  rawOutput: false,
  chunkSize: DEFAULT_CHUNK_SIZE,
  fromFile: false,
  maxSteps: 0,
};

type Env = Record<string, string | undefined>;

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_WORDS = new Set(['0', 'false', 'no', 'off']);

function envFlag(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(v)) return true;
  if (FALSE_WORDS.has(v)) return false;
  throw new ConfigError(`${name} must be a boolean (1/0, true/false), got ${JSON.stringify(raw)}`);
}

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = Number(raw.trim());
  if (!Number.isInteger(v)) {
    throw new ConfigError(`${name} must be an integer, got ${JSON.stringify(raw)}`);
  }
  return v;
}

export function optionsFromEnv(env: Env = process.env): Partial<EngineOptions> {
  const out: Partial<EngineOptions> = {};
  const stepByStep = envFlag(env, 'BF_STEP_BY_STEP');
  const showMemory = envFlag(env, 'BF_SHOW_MEMORY');
  const verbose = envFlag(env, 'BF_VERBOSE');
  const rawOutput = envFlag(env, 'BF_RAW_OUTPUT');
  const windowSize = envInt(env, 'BF_WINDOW_SIZE');
  const margin = envInt(env, 'BF_MARGIN');
  const chunkSize = envInt(env, 'BF_CHUNK_SIZE');
  const maxSteps = envInt(env, 'BF_MAX_STEPS');
  if (stepByStep !== undefined) out.stepByStep = stepByStep;
  if (showMemory !== undefined) out.showMemory = showMemory;
  if (verbose !== undefined) out.verbose = verbose;
  if (rawOutput !== undefined) out.rawOutput = rawOutput;
  if (windowSize !== undefined) out.windowSize = windowSize;
  if (margin !== undefined) out.margin = margin;
  if (chunkSize !== undefined) out.chunkSize = chunkSize;
  if (maxSteps !== undefined) out.maxSteps = maxSteps;
  return out;
}

export function validateOptions(opts: EngineOptions): EngineOptions {
  if (!Number.isInteger(opts.windowSize) || opts.windowSize < 1) {
    throw new ConfigError(`windowSize must be a positive integer, got ${opts.windowSize}`);
  }
  if (!Number.isInteger(opts.chunkSize) || opts.chunkSize < 1) {
    throw new ConfigError(`chunkSize must be a positive integer, got ${opts.chunkSize}`);
  }
  const maxMargin = Math.floor(opts.windowSize / 2);
  if (!Number.isInteger(opts.margin) || opts.margin < 0 || opts.margin > maxMargin) {
    throw new ConfigError(`margin must be between 0 and ${maxMargin} for windowSize ${opts.windowSize}, got ${opts.margin}`);
  }
  if (!Number.isInteger(opts.maxSteps) || opts.maxSteps < 0) {
    throw new ConfigError(`maxSteps must be a non-negative integer, got ${opts.maxSteps}`);
  }
  return opts;
}

// Precedence: defaults < environment < explicit overrides.
export function resolveEngineOptions(overrides: Partial<EngineOptions> = {}, env: Env = process.env): EngineOptions {
  return validateOptions({ ...DEFAULT_OPTIONS, ...optionsFromEnv(env), ...overrides });
}
