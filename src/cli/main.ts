#!/usr/bin/env node
import { runCli } from './run';
import { StdinLineSource, StdoutSink } from '../io/lines';

const stdout = new StdoutSink();

try {
  process.exitCode = runCli(process.argv.slice(2), {
    input: new StdinLineSource(0, stdout, process.stdin.isTTY ? process.stdin : undefined),
    output: stdout,
    errors: { write: (text) => process.stderr.write(text) },
  });
} catch (e) {
  // eslint-disable-next-line no-console
  console.error('[bf] internal error:', e);
  process.exitCode = 70;
}
