import fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { SourceUnavailableError } from '../engine/errors';
import type { LineSource, OutputSink } from '../engine/types';

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && 'code' in e && e.code === code;
}

// Terminal input whose line discipline can be turned off (tty.ReadStream).
export interface RawModeTerminal {
  setRawMode(mode: boolean): unknown;
}

const CTRL_C = 0x03;
const CTRL_D = 0x04;
const BACKSPACE = 0x08;
const LF = 0x0a;
const CR = 0x0d;
const DEL = 0x7f;

// Blocking line reader over a file descriptor (stdin by default).
// With a terminal, reads run in raw mode: echo and erase are done here and
// Ctrl+C surfaces as an 'interrupt' instead of a signal.
export class StdinLineSource implements LineSource {
  private readonly byte = Buffer.alloc(1);

  constructor(
    private readonly fd = 0,
    private readonly echo: OutputSink = new StdoutSink(),
    private readonly terminal?: RawModeTerminal,
  ) {}

  readLine(prompt?: string): string {
    if (prompt) this.echo.write(prompt);
    if (!this.terminal) return this.readCooked();
    this.terminal.setRawMode(true);
    try {
      return this.readRaw();
    } finally {
      this.terminal.setRawMode(false);
    }
  }

  // 0 at end of input.
  private readByte(): number {
    for (;;) {
      try {
        return fs.readSync(this.fd, this.byte, 0, 1, null);
      } catch (e) {
        if (isErrno(e, 'EAGAIN')) continue;
        if (isErrno(e, 'EOF')) return 0;
        throw e;
      }
    }
  }

  private readCooked(): string {
    const bytes: number[] = [];
    for (;;) {
      if (this.readByte() === 0) {
        if (bytes.length === 0) throw new SourceUnavailableError('end-of-input');
        break;
      }
      if (this.byte[0] === LF) break;
      bytes.push(this.byte[0]);
    }
    if (bytes.length > 0 && bytes[bytes.length - 1] === CR) bytes.pop();
    return Buffer.from(bytes).toString('utf8');
  }

  private readRaw(): string {
    const bytes: number[] = [];
    const decoder = new StringDecoder('utf8');
    for (;;) {
      if (this.readByte() === 0) {
        if (bytes.length === 0) throw new SourceUnavailableError('end-of-input');
        break;
      }
      const b = this.byte[0];
      if (b === CTRL_C) {
        this.echo.write('\n');
        throw new SourceUnavailableError('interrupt');
      }
      if (b === CTRL_D) {
        if (bytes.length === 0) throw new SourceUnavailableError('end-of-input');
        continue;
      }
      if (b === CR || b === LF) break;
      if (b === DEL || b === BACKSPACE) {
        if (bytes.length === 0) continue;
        // erase a whole UTF-8 sequence: continuation bytes, then the lead byte
        let dropped: number | undefined;
        do {
          dropped = bytes.pop();
        } while (dropped !== undefined && (dropped & 0xc0) === 0x80);
        this.echo.write('\b \b');
        continue;
      }
      bytes.push(b);
      const shown = decoder.write(this.byte);
      if (shown) this.echo.write(shown);
    }
    this.echo.write('\n');
    return Buffer.from(bytes).toString('utf8');
  }
}

export class ScriptedLineSource implements LineSource {
  readonly prompts: string[] = [];
  private readonly lines: string[];

  constructor(lines: Iterable<string> = []) {
    this.lines = [...lines];
  }

  get remaining(): number {
    return this.lines.length;
  }

  push(...lines: string[]): void {
    this.lines.push(...lines);
  }

  readLine(prompt?: string): string {
    if (prompt !== undefined) this.prompts.push(prompt);
    const line = this.lines.shift();
    if (line === undefined) throw new SourceUnavailableError('end-of-input');
    return line;
  }
}

export class StdoutSink implements OutputSink {
  write(text: string): void {
    process.stdout.write(text);
  }
}

export class BufferSink implements OutputSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}
