import { DEFAULT_OPTIONS, validateOptions } from './config';
import type { EngineOptions } from './config';
import { InputFormatError, StepLimitError } from './errors';
import type { Cell, EngineIO, EvaluationResult } from './types';
import { preprocess } from '../program/preprocess';
import type { Instruction, JumpTable } from '../program/preprocess';
import { Head, Tape } from '../tape/tape';
import { TapeWindow } from '../view/window';
import { formatWindow } from '../view/format';

export type EngineState = 'idle' | 'running' | 'completed';

const INTEGER_LINE = /^\s*[+-]?\d+(?:_\d+)*\s*$/;

// Parses one input line the way `,` expects it and folds it into 0..255.
export function parseCellInput(line: string): Cell {
  if (!INTEGER_LINE.test(line)) throw new InputFormatError(line);
  const v = BigInt(line.trim().replace(/_/g, ''));
  return Number(((v % 256n) + 256n) % 256n);
}

export class Engine {
  readonly options: Readonly<EngineOptions>;
  readonly tape: Tape;
  readonly window: TapeWindow;
  private readonly head: Head;
  private jumps: JumpTable = { openToClose: new Map(), closeToOpen: new Map() };
  private pc = 0;
  private stepCount = 0;
  private status: EngineState = 'idle';

  constructor(private readonly io: EngineIO, options: Partial<EngineOptions> = {}) {
    this.options = validateOptions({ ...DEFAULT_OPTIONS, ...options });
    this.tape = new Tape(this.options.chunkSize);
    this.head = new Head(this.tape);
    this.window = new TapeWindow(this.options.windowSize, this.options.margin, this.head.pointer);
  }

  get pointer(): number { return this.head.pointer; }
  get programCounter(): number { return this.pc; }
  get steps(): number { return this.stepCount; }
  get state(): EngineState { return this.status; }
  get currentCell(): Cell { return this.head.getCurrent(); }

  evaluate(source: string): EvaluationResult {
    this.pc = 0;
    this.stepCount = 0;
    const program = preprocess(source);
    this.jumps = program.jumps;
    this.status = 'running';
    const { code } = program;
    const { showMemory, stepByStep, fromFile, maxSteps } = this.options;

    while (this.pc < code.length) {
      if (maxSteps > 0 && this.stepCount >= maxSteps) throw new StepLimitError(this.stepCount);
      this.stepCount++;
      this.execute(code[this.pc]);
      this.pc++;
      if (showMemory) this.emitTrace(this.renderWindow());
      if (stepByStep && fromFile) this.io.input.readLine('Enter to continue to next step...');
    }

    this.status = 'completed';
    return { steps: this.stepCount };
  }

  renderWindow(): string {
    return formatWindow(this.window.render(this.tape, this.head.pointer));
  }

  private execute(op: Instruction): void {
    switch (op) {
      case '>': {
        const from = this.head.pointer;
        this.verbose(`Moving the head right from cell ${from} to ${from + 1}.`);
        this.head.move(1);
        this.window.onPointerMove('right', this.head.pointer);
        return;
      }
      case '<': {
        const from = this.head.pointer;
        this.verbose(`Moving the head left from cell ${from} to ${from - 1}.`);
        this.head.move(-1);
        this.window.onPointerMove('left', this.head.pointer);
        return;
      }
      case '+':
        this.verbose('Incrementing the current cell.');
        this.head.setCurrent((this.head.getCurrent() + 1) % 256);
        return;
      case '-':
        this.verbose('Decrementing the current cell.');
        this.head.setCurrent((this.head.getCurrent() + 255) % 256);
        return;
      case '.': {
        this.verbose('Writing cell to stdout.');
        const v = this.head.getCurrent();
        const text = this.options.rawOutput ? String(v) : String.fromCharCode(v);
        this.io.output.write(this.options.fromFile ? text : text + '\n');
        return;
      }
      case ',':
        this.verbose('Waiting for input...');
        this.head.setCurrent(parseCellInput(this.io.input.readLine()));
        return;
      case '[':
        if (this.head.getCurrent() === 0) {
          const target = this.jumpTarget(this.jumps.openToClose);
          this.verbose(`Jumping to instruction ${target}`);
          this.pc = target;
        } else {
          this.verbose('Current cell is not 0. Not jumping.');
        }
        return;
      case ']':
        if (this.head.getCurrent() !== 0) {
          const target = this.jumpTarget(this.jumps.closeToOpen);
          this.verbose(`Jumping to instruction ${target}.`);
          this.pc = target;
        } else {
          this.verbose('Current cell is 0. Not jumping.');
        }
        return;
      default: {
        const unreachable: never = op;
        throw new Error(`Unknown instruction ${JSON.stringify(unreachable)} at ${this.pc}`);
      }
    }
  }

  private jumpTarget(table: ReadonlyMap<number, number>): number {
    const target = table.get(this.pc);
    if (target === undefined) throw new Error(`No jump recorded for instruction ${this.pc}`);
    return target;
  }

  private verbose(line: string): void {
    if (this.options.verbose) this.emitTrace(line);
  }

  private emitTrace(line: string): void {
    if (this.io.trace) this.io.trace(line);
    else this.io.output.write(line + '\n');
  }
}
