import type { Cell } from '../engine/types';

export const DEFAULT_CHUNK_SIZE = 32;

// Growable byte tape addressed by logical position. `offset` maps logical
// addresses onto `cells` so growing on the left never renumbers them.
export class Tape {
  private cells: Uint8Array;
  private offset = 0;

  constructor(public readonly chunkSize = DEFAULT_CHUNK_SIZE) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.cells = new Uint8Array(chunkSize);
  }

  get length(): number {
    return this.cells.length;
  }

  // Logical address of the leftmost backed cell.
  get lowest(): number {
    return 0 - this.offset;
  }

  // Logical address of the rightmost backed cell.
  get highest(): number {
    return this.cells.length - this.offset - 1;
  }

  contains(addr: number): boolean {
    const i = addr + this.offset;
    return i >= 0 && i < this.cells.length;
  }

  // Out-of-range reads return 0 and leave the tape as it is.
  get(addr: number): Cell {
    const i = addr + this.offset;
    return i >= 0 && i < this.cells.length ? this.cells[i] : 0;
  }

  set(addr: number, value: Cell): void {
    const i = addr + this.offset;
    if (i < 0 || i >= this.cells.length) {
      throw new RangeError(`Tape write outside backing storage at ${addr}`);
    }
    this.cells[i] = value & 0xff;
  }

  extendLeft(count = this.chunkSize): void {
    const next = new Uint8Array(this.cells.length + count);
    next.set(this.cells, count);
    this.cells = next;
    this.offset += count;
  }

  extendRight(count = this.chunkSize): void {
    const next = new Uint8Array(this.cells.length + count);
    next.set(this.cells, 0);
    this.cells = next;
  }

  // Grows by whole chunks until `addr` is backed. Returns the chunks added.
  ensure(addr: number): number {
    let chunks = 0;
    while (addr + this.offset < 0) {
      this.extendLeft();
      chunks++;
    }
    while (addr + this.offset >= this.cells.length) {
      this.extendRight();
      chunks++;
    }
    return chunks;
  }

  snapshot(from = this.lowest, to = this.highest + 1): Uint8Array {
    const out = new Uint8Array(Math.max(0, to - from));
    for (let a = from; a < to; a++) out[a - from] = this.get(a);
    return out;
  }
}

// Tape plus the head position. Reads and writes go through the head.
export class Head {
  private addr = 0;

  constructor(public readonly tape: Tape) {}

  get pointer(): number {
    return this.addr;
  }

  getCurrent(): Cell {
    return this.tape.get(this.addr);
  }

  setCurrent(value: Cell): void {
    this.tape.set(this.addr, value);
  }

  // Moves one cell and grows the tape only if the new address is unbacked.
  move(delta: -1 | 1): boolean {
    this.addr += delta;
    return this.tape.ensure(this.addr) > 0;
  }
}
