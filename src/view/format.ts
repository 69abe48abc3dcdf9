import type { WindowFrame } from './window';

// Centers like a `^3` format field: extra padding goes to the right.
export function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + text + ' '.repeat(pad - left);
}

export function border(size: number): string {
  return '+-----'.repeat(size) + '+';
}

// Text layout of one frame: address row, boxed values, caret under the head.
// The leading empty line separates consecutive frames.
export function formatWindow(frame: WindowFrame): string {
  const size = frame.cells.length;
  const addresses = frame.cells
    .map((c, i) => (i === 0 ? '  ' : '   ') + center(String(c.address), 3))
    .join('');
  const values = frame.cells.map((c) => `| ${center(String(c.value), 3)} `).join('') + '|';
  const caret = '      '.repeat(Math.max(0, frame.pointerOffset)) + '   ^';
  return ['', addresses, border(size), values, border(size), caret].join('\n');
}
