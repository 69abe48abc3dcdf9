import fs from 'fs';
import { Engine } from '../src/engine/engine';
import { resolveEngineOptions } from '../src/engine/config';
import { BufferSink, ScriptedLineSource } from '../src/io/lines';
import { readSourceFile } from '../src/cli/run';
import { renderTapePng } from '../src/view/png';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

function main(): void {
  const args = parseArgs(process.argv);
  const programPath = args.program || process.env.BF_PROGRAM;
  const outPath = args.out || 'tape.png';
  const cellWidth = Number.isFinite(Number(args.cellWidth)) ? Math.max(1, Number(args.cellWidth)) : 8;
  const height = Number.isFinite(Number(args.height)) ? Math.max(1, Number(args.height)) : 32;
  const inputLines = (args.input ?? '').split(',').filter((s) => s.length > 0);

  if (!programPath) {
    console.error('Usage: npm run snapshot -- --program=path/to/prog.b --out=./tape.png [--cellWidth=8] [--height=32] [--input=1,2,3] [--maxSteps=N]');
    process.exit(1);
  }

  const output = new BufferSink();
  const options = resolveEngineOptions({
    fromFile: true,
    ...(args.maxSteps !== undefined ? { maxSteps: Number(args.maxSteps) } : {}),
  });
  const engine = new Engine({ input: new ScriptedLineSource(inputLines), output }, options);
  const { steps } = engine.evaluate(readSourceFile(programPath));

  const { tape } = engine;
  const png = renderTapePng(tape, { from: tape.lowest, to: tape.highest + 1, cellWidth, height, pointer: engine.pointer });
  fs.writeFileSync(outPath, png);
  console.log(`[snapshot] program=${programPath} steps=${steps} tape=[${tape.lowest}, ${tape.highest}] pointer=${engine.pointer} out=${outPath}`);
  if (output.text.length > 0) console.log(`[snapshot] output: ${JSON.stringify(output.text)}`);
}

try {
  main();
} catch (e) {
  console.error('[snapshot] error:', e);
  process.exit(1);
}
