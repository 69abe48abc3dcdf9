import fs from 'fs';
import { parseArgs, USAGE } from './args';
import { Engine } from '../engine/engine';
import { resolveEngineOptions } from '../engine/config';
import { InterpreterError, SourceUnavailableError } from '../engine/errors';
import type { LineSource, OutputSink } from '../engine/types';

export interface CliDeps {
  input: LineSource;
  output: OutputSink;
  errors: OutputSink;
  readFile?: (path: string) => string;
  env?: Record<string, string | undefined>;
}

export function readSourceFile(path: string): string {
  try {
    return fs.readFileSync(path, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new SourceUnavailableError('missing-file', path);
    }
    throw e;
  }
}

function report(errors: OutputSink, e: InterpreterError): void {
  errors.write(`[bf] ${e.name}: ${e.message}\n`);
}

// Returns the process exit code.
export function runCli(argv: readonly string[], deps: CliDeps): number {
  const { input, output, errors } = deps;
  let engine: Engine;
  let files: string[];
  try {
    const args = parseArgs(argv);
    if (args.help) {
      output.write(USAGE);
      return 0;
    }
    files = args.files;
    const options = resolveEngineOptions({ ...args.overrides, fromFile: files.length > 0 }, deps.env ?? process.env);
    engine = new Engine({ input, output, trace: (line) => output.write(line + '\n') }, options);
  } catch (e) {
    if (!(e instanceof InterpreterError)) throw e;
    report(errors, e);
    errors.write(USAGE);
    return 2;
  }

  if (files.length > 0) {
    const readFile = deps.readFile ?? readSourceFile;
    try {
      for (const file of files) {
        const { steps } = engine.evaluate(readFile(file));
        output.write(`\nCompleted in ${steps} steps.\n`);
      }
    } catch (e) {
      if (!(e instanceof InterpreterError)) throw e;
      report(errors, e);
      return 1;
    }
    return 0;
  }

  for (;;) {
    try {
      const { steps } = engine.evaluate(input.readLine('bf> '));
      output.write(`\nCompleted in ${steps} steps.\n`);
    } catch (e) {
      if (e instanceof SourceUnavailableError) {
        output.write('Goodbye\n');
        return 0;
      }
      if (!(e instanceof InterpreterError)) throw e;
      report(errors, e);
    }
  }
}
