import { MalformedProgramError } from '../engine/errors';

export type Instruction = '<' | '>' | '+' | '-' | '.' | ',' | '[' | ']';

export const ALPHABET: ReadonlySet<string> = new Set<Instruction>(['<', '>', '+', '-', '.', ',', '[', ']']);

export function isInstruction(ch: string): ch is Instruction {
  return ALPHABET.has(ch);
}

// Both directions are filled together so `]` never has to search for its `[`.
export interface JumpTable {
  readonly openToClose: ReadonlyMap<number, number>;
  readonly closeToOpen: ReadonlyMap<number, number>;
}

export interface Program {
  readonly code: readonly Instruction[];
  readonly jumps: JumpTable;
}

export function filterSource(source: string): Instruction[] {
  const code: Instruction[] = [];
  for (const ch of source) {
    if (isInstruction(ch)) code.push(ch);
  }
  return code;
}

export function buildJumpTable(code: readonly Instruction[]): JumpTable {
  const openToClose = new Map<number, number>();
  const closeToOpen = new Map<number, number>();
  const opens: number[] = [];
  for (let i = 0; i < code.length; i++) {
    if (code[i] === '[') {
      opens.push(i);
    } else if (code[i] === ']') {
      const open = opens.pop();
      if (open === undefined) throw new MalformedProgramError('unmatched-close', i);
      openToClose.set(open, i);
      closeToOpen.set(i, open);
    }
  }
  if (opens.length > 0) {
    throw new MalformedProgramError('unmatched-open', opens[opens.length - 1]);
  }
  return { openToClose, closeToOpen };
}

export function preprocess(source: string): Program {
  const code = filterSource(source);
  return { code: Object.freeze(code), jumps: buildJumpTable(code) };
}
