import { PNG } from 'pngjs';
import type { Tape } from '../tape/tape';

export interface TapePngOptions {
  from: number;
  to: number; // exclusive
  cellWidth?: number;
  height?: number;
  pointer?: number;
}

// One vertical bar per cell, grey level = cell value. The head's column is tinted red.
export function renderTapePng(tape: Tape, opts: TapePngOptions): Buffer {
  const cellWidth = Math.max(1, opts.cellWidth ?? 4);
  const height = Math.max(1, opts.height ?? 16);
  const count = opts.to - opts.from;
  if (count < 1) throw new RangeError(`empty tape range [${opts.from}, ${opts.to})`);
  const width = count * cellWidth;
  const png = new PNG({ width, height });
  for (let c = 0; c < count; c++) {
    const addr = opts.from + c;
    const v = tape.get(addr);
    const isHead = opts.pointer === addr;
    for (let x = c * cellWidth; x < (c + 1) * cellWidth; x++) {
      for (let y = 0; y < height; y++) {
        const i = (y * width + x) * 4;
        png.data[i] = isHead ? 255 : v;
        png.data[i + 1] = v;
        png.data[i + 2] = v;
        png.data[i + 3] = 255;
      }
    }
  }
  return PNG.sync.write(png);
}
