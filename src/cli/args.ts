import { ConfigError } from '../engine/errors';
import type { EngineOptions } from '../engine/config';

export interface CliArgs {
  files: string[];
  help: boolean;
  overrides: Partial<EngineOptions>;
}

type FlagKey = 'stepByStep' | 'showMemory' | 'verbose' | 'rawOutput';
type NumberKey = 'windowSize' | 'margin' | 'maxSteps';

const FLAGS = new Map<string, FlagKey>([
  ['--step-by-step', 'stepByStep'],
  ['-s', 'stepByStep'],
  ['--show-memory', 'showMemory'],
  ['-sm', 'showMemory'],
  ['--verbose', 'verbose'],
  ['-v', 'verbose'],
  ['--print-raw', 'rawOutput'],
  ['-r', 'rawOutput'],
]);

const NUMBERS = new Map<string, NumberKey>([
  ['--print-window', 'windowSize'],
  ['-pw', 'windowSize'],
  ['--head-margin', 'margin'],
  ['-hm', 'margin'],
  ['--max-steps', 'maxSteps'],
]);

export const USAGE = `
Usage: bf-stepper [options] [files...]

Runs each file in turn on one shared tape, or starts an interactive prompt
when no file is given.

Options:
  --step-by-step, -s         Wait for Enter after every instruction (files only)
  --print-window, -pw <n>    Number of memory cells shown [default: 10]
  --head-margin, -hm <n>     Cells kept between the head and the window edge [default: 2]
  --show-memory, -sm         Print the memory window after every instruction
  --verbose, -v              Describe every instruction as it runs
  --print-raw, -r            Print cell values as numbers instead of characters
  --max-steps=<n>            Abort a run after n instructions [default: unlimited]
  --help, -h                 Show this help
`;

function toInt(flag: string, raw: string | undefined): number {
  if (raw === undefined) throw new ConfigError(`${flag} expects a value`);
  const v = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(v)) {
    throw new ConfigError(`${flag} expects an integer, got ${JSON.stringify(raw)}`);
  }
  return v;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { files: [], help: false, overrides: {} };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('-') ? arg.indexOf('=') : -1;
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    if (name === '--help' || name === '-h') {
      out.help = true;
      continue;
    }
    const flag = FLAGS.get(name);
    const num = NUMBERS.get(name);
    if (flag) {
      out.overrides[flag] = inline === undefined ? true : inline !== '0' && inline !== 'false';
    } else if (num) {
      out.overrides[num] = toInt(name, inline ?? argv[++i]);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new ConfigError(`Unknown option ${arg}`);
    } else {
      out.files.push(arg);
    }
  }
  return out;
}
