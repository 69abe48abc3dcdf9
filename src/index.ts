export { Engine, parseCellInput } from './engine/engine';
export type { EngineState } from './engine/engine';
export { DEFAULT_OPTIONS, resolveEngineOptions, optionsFromEnv, validateOptions } from './engine/config';
export type { EngineOptions } from './engine/config';
export {
  InterpreterError,
  MalformedProgramError,
  InputFormatError,
  SourceUnavailableError,
  StepLimitError,
  ConfigError,
} from './engine/errors';
export type { BracketFault, SourceFault } from './engine/errors';
export type { Cell, Direction, LineSource, OutputSink, TraceSink, EngineIO, EvaluationResult } from './engine/types';
export { ALPHABET, isInstruction, filterSource, buildJumpTable, preprocess } from './program/preprocess';
export type { Instruction, JumpTable, Program } from './program/preprocess';
export { Tape, Head, DEFAULT_CHUNK_SIZE } from './tape/tape';
export { TapeWindow } from './view/window';
export type { WindowCell, WindowFrame } from './view/window';
export { formatWindow, center, border } from './view/format';
export { renderTapePng } from './view/png';
export type { TapePngOptions } from './view/png';
export { StdinLineSource, ScriptedLineSource, StdoutSink, BufferSink } from './io/lines';
export { runCli, readSourceFile } from './cli/run';
export type { CliDeps } from './cli/run';
export { parseArgs, USAGE } from './cli/args';
export type { CliArgs } from './cli/args';
