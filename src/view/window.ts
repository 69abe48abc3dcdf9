import type { Cell, Direction } from '../engine/types';
import type { Tape } from '../tape/tape';

export interface WindowCell {
  address: number;
  value: Cell;
}

export interface WindowFrame {
  start: number;
  cells: WindowCell[];
  // Pointer position relative to `start`; may fall outside the frame.
  pointerOffset: number;
}

// Visible slice of the tape. Scrolls one cell at a time so it trails the head.
export class TapeWindow {
  private start: number;

  constructor(public readonly size: number, public readonly margin: number, pointer = 0) {
    this.start = pointer - margin;
  }

  get windowStart(): number {
    return this.start;
  }

  get windowEnd(): number {
    return this.start + this.size;
  }

  onPointerMove(direction: Direction, pointer: number): boolean {
    if (direction === 'left' && pointer - this.start < this.margin) {
      this.start -= 1;
      return true;
    }
    if (direction === 'right' && this.start + this.size - pointer <= this.margin) {
      this.start += 1;
      return true;
    }
    return false;
  }

  render(tape: Tape, pointer: number): WindowFrame {
    const cells: WindowCell[] = [];
    for (let a = this.start; a < this.windowEnd; a++) {
      cells.push({ address: a, value: tape.get(a) });
    }
    return { start: this.start, cells, pointerOffset: pointer - this.start };
  }
}
