import { describe, it, expect } from 'vitest';
import { mkEngine } from '../helpers/engineKit';
import { Engine } from '../../src/engine/engine';
import { BufferSink, ScriptedLineSource } from '../../src/io/lines';
import { SourceUnavailableError } from '../../src/engine/errors';

describe('Engine: verbose trace', () => {
  it('describes moves and cell updates', () => {
    const { engine, trace } = mkEngine({ verbose: true });
    engine.evaluate('>+<');
    expect(trace).toEqual([
      'Moving the head right from cell 0 to 1.',
      'Incrementing the current cell.',
      'Moving the head left from cell 1 to 0.',
    ]);
  });

  it('describes loop decisions with jump targets', () => {
    const { engine, trace } = mkEngine({ verbose: true });
    engine.evaluate('++[-]');
    expect(trace).toEqual([
      'Incrementing the current cell.',
      'Incrementing the current cell.',
      'Current cell is not 0. Not jumping.',
      'Decrementing the current cell.',
      'Jumping to instruction 2.',
      'Decrementing the current cell.',
      'Current cell is 0. Not jumping.',
    ]);
  });

  it('reports a forward jump over a skipped loop', () => {
    const { engine, trace } = mkEngine({ verbose: true });
    engine.evaluate('[]');
    expect(trace).toEqual(['Jumping to instruction 1']);
  });

  it('ends only the backward jump line with a period', () => {
    const { engine, trace } = mkEngine({ verbose: true });
    engine.evaluate('[]++[-]');
    expect(trace.filter((l) => l.startsWith('Jumping'))).toEqual([
      'Jumping to instruction 1',
      'Jumping to instruction 4.',
    ]);
  });

  it('describes I/O instructions', () => {
    const { engine, trace, output } = mkEngine({ verbose: true, fromFile: true }, ['66']);
    engine.evaluate(',.');
    expect(trace).toEqual(['Waiting for input...', 'Writing cell to stdout.']);
    expect(output.text).toBe('B');
  });

  it('falls back to the output sink when no trace sink is given', () => {
    const output = new BufferSink();
    const engine = new Engine({ input: new ScriptedLineSource(), output }, { verbose: true });
    engine.evaluate('+');
    expect(output.text).toBe('Incrementing the current cell.\n');
  });

  it('stays silent when verbose is off', () => {
    const { engine, trace } = mkEngine();
    engine.evaluate('>+[-]<');
    expect(trace).toEqual([]);
  });
});

describe('Engine: memory window', () => {
  it('renders the window after every step', () => {
    const { engine, trace } = mkEngine({ showMemory: true, windowSize: 3, margin: 1 });
    engine.evaluate('+');
    expect(trace).toEqual([
      '\n  -1     0     1 \n+-----+-----+-----+\n|  0  |  1  |  0  |\n+-----+-----+-----+\n         ^',
    ]);
  });

  it('trails the head to the right once it reaches the margin', () => {
    const { engine } = mkEngine({ windowSize: 10, margin: 2 });
    expect(engine.window.windowStart).toBe(-2);
    engine.evaluate('>'.repeat(5));
    expect(engine.window.windowStart).toBe(-2);
    engine.evaluate('>');
    expect(engine.window.windowStart).toBe(-1);
    engine.evaluate('>>');
    expect(engine.window.windowStart).toBe(1);
    engine.evaluate('<');
    expect(engine.window.windowStart).toBe(1);
  });

  it('trails the head to the left past address zero', () => {
    const { engine } = mkEngine({ windowSize: 10, margin: 2 });
    engine.evaluate('<<<');
    expect(engine.pointer).toBe(-3);
    expect(engine.window.windowStart).toBe(-5);
  });
});

describe('Engine: step-by-step pause', () => {
  it('waits for a line after every step when running a file', () => {
    const { engine, input } = mkEngine({ stepByStep: true, fromFile: true }, ['', '']);
    engine.evaluate('++');
    expect(input.prompts).toEqual(['Enter to continue to next step...', 'Enter to continue to next step...']);
    expect(input.remaining).toBe(0);
  });

  it('does not pause in interactive mode', () => {
    const { engine, input } = mkEngine({ stepByStep: true, fromFile: false }, ['', '']);
    engine.evaluate('++');
    expect(input.prompts).toEqual([]);
    expect(input.remaining).toBe(2);
  });

  it('abandons the run where it stood when the pause loses its input', () => {
    const { engine } = mkEngine({ stepByStep: true, fromFile: true }, ['']);
    expect(() => engine.evaluate('+++')).toThrow(SourceUnavailableError);
    expect(engine.currentCell).toBe(2);
    expect(engine.steps).toBe(2);
    expect(engine.state).toBe('running');
  });
});
