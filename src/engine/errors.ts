export class InterpreterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type BracketFault = 'unmatched-open' | 'unmatched-close';

export class MalformedProgramError extends InterpreterError {
  constructor(public readonly kind: BracketFault, public readonly index: number) {
    super(kind === 'unmatched-open'
      ? `Unmatched '[' at instruction ${index}`
      : `Unmatched ']' at instruction ${index}`);
  }
}

export class InputFormatError extends InterpreterError {
  constructor(public readonly line: string) {
    super(`Expected an integer, got ${JSON.stringify(line)}`);
  }
}

export type SourceFault = 'missing-file' | 'end-of-input' | 'interrupt';

const SOURCE_FAULT_MESSAGES: Record<Exclude<SourceFault, 'missing-file'>, string> = {
  'end-of-input': 'End of input',
  interrupt: 'Interrupted',
};

export class SourceUnavailableError extends InterpreterError {
  constructor(public readonly reason: SourceFault, detail?: string) {
    super(reason === 'missing-file'
      ? `No such file: ${detail ?? '<unknown>'}`
      : SOURCE_FAULT_MESSAGES[reason]);
  }
}

export class StepLimitError extends InterpreterError {
  constructor(public readonly steps: number) {
    super(`Step limit of ${steps} reached`);
  }
}

export class ConfigError extends InterpreterError {}
