import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Head, Tape } from '../../src/tape/tape';

describe('Tape', () => {
  it('starts with one zeroed chunk at logical addresses 0..chunk-1', () => {
    const tape = new Tape(32);
    expect(tape.length).toBe(32);
    expect(tape.lowest).toBe(0);
    expect(tape.highest).toBe(31);
    expect(tape.get(0)).toBe(0);
    expect(tape.get(31)).toBe(0);
  });

  it('reports a positive zero as the lowest address of a fresh tape', () => {
    const tape = new Tape(4);
    expect(Object.is(tape.lowest, 0)).toBe(true);
    expect(Array.from(tape.snapshot())).toEqual([0, 0, 0, 0]);
    tape.extendLeft();
    expect(tape.lowest).toBe(-4);
  });

  it('reads outside backing storage as zero without growing', () => {
    const tape = new Tape(8);
    expect(tape.get(-1)).toBe(0);
    expect(tape.get(8)).toBe(0);
    expect(tape.get(1000)).toBe(0);
    expect(tape.length).toBe(8);
  });

  it('rejects writes outside backing storage', () => {
    const tape = new Tape(8);
    expect(() => tape.set(8, 1)).toThrow(RangeError);
    expect(() => tape.set(-1, 1)).toThrow(RangeError);
  });

  it('keeps logical addresses stable when growing left', () => {
    const tape = new Tape(4);
    tape.set(0, 5);
    tape.set(3, 9);
    tape.extendLeft(4);
    expect(tape.length).toBe(8);
    expect(tape.lowest).toBe(-4);
    expect(tape.highest).toBe(3);
    expect(tape.get(0)).toBe(5);
    expect(tape.get(3)).toBe(9);
    expect(tape.get(-4)).toBe(0);
  });

  it('extends right without moving existing cells', () => {
    const tape = new Tape(4);
    tape.set(2, 7);
    tape.extendRight(4);
    expect(tape.length).toBe(8);
    expect(tape.highest).toBe(7);
    expect(tape.get(2)).toBe(7);
  });

  it('masks stored values to a byte', () => {
    const tape = new Tape(4);
    tape.set(1, 0x1ff);
    expect(tape.get(1)).toBe(0xff);
  });

  it('snapshots a logical range including unbacked cells as zero', () => {
    const tape = new Tape(4);
    tape.set(0, 1);
    tape.set(3, 4);
    expect(Array.from(tape.snapshot(-1, 5))).toEqual([0, 1, 0, 0, 4, 0]);
  });

  it('refuses a non-positive chunk size', () => {
    expect(() => new Tape(0)).toThrow(RangeError);
  });
});

describe('Head', () => {
  it('grows right only when stepping past the last backed cell', () => {
    const head = new Head(new Tape(32));
    for (let i = 0; i < 31; i++) expect(head.move(1)).toBe(false);
    expect(head.pointer).toBe(31);
    expect(head.tape.length).toBe(32);
    expect(head.move(1)).toBe(true);
    expect(head.pointer).toBe(32);
    expect(head.tape.length).toBe(64);
  });

  it('grows left once per chunk, not on every negative move', () => {
    const head = new Head(new Tape(32));
    expect(head.move(-1)).toBe(true);
    expect(head.tape.length).toBe(64);
    expect(head.tape.lowest).toBe(-32);
    expect(head.move(-1)).toBe(false);
    expect(head.pointer).toBe(-2);
    expect(head.tape.length).toBe(64);
  });

  it('reads and writes through the pointer', () => {
    const head = new Head(new Tape(4));
    head.setCurrent(3);
    head.move(-1);
    head.setCurrent(8);
    head.move(1);
    expect(head.getCurrent()).toBe(3);
    expect(head.tape.get(-1)).toBe(8);
  });

  it('grows exactly when the pointer leaves backing storage and keeps whole chunks', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 8 }),
        fc.array(fc.boolean(), { maxLength: 200 }),
        (chunk, moves) => {
          const head = new Head(new Tape(chunk));
          for (const right of moves) {
            const d = right ? 1 : -1;
            const lo = head.tape.lowest;
            const hi = head.tape.highest;
            const target = head.pointer + d;
            const grew = head.move(d);
            expect(grew).toBe(target < lo || target > hi);
            expect(head.tape.contains(head.pointer)).toBe(true);
            expect(head.tape.length % chunk).toBe(0);
          }
        }
      ),
      { numRuns: 200 }
    );
  });
});
