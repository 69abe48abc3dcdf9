export type Cell = number; // 0..255

export type Direction = 'left' | 'right';

export interface LineSource {
  // Blocks until a full line is available; the line terminator is stripped.
  readLine(prompt?: string): string;
}

export interface OutputSink {
  write(text: string): void;
}

export type TraceSink = (line: string) => void;

export interface EngineIO {
  input: LineSource;
  output: OutputSink;
  trace?: TraceSink;
}

export interface EvaluationResult {
  steps: number;
}
