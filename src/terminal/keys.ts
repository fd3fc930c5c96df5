/**
 * Raw terminal input parsing: escape sequences to DOM key names,
 * SGR mouse reports to click events.
 */

export type MouseButton = 'left' | 'middle' | 'right';

export interface MouseClick {
  button: MouseButton;
  /** 0-based terminal column */
  col: number;
  /** 0-based terminal row */
  row: number;
}

export const MOUSE_ENABLE = '\x1b[?1000h\x1b[?1006h';
export const MOUSE_DISABLE = '\x1b[?1000l\x1b[?1006l';

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])$/;

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  if (data === '\x03') return 'c';
  return data;
}

/**
 * Split a stdin chunk into individual key or mouse sequences.
 * Fast typing and mouse reports often arrive batched in one chunk.
 */
export function splitInput(data: string): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < data.length) {
    if (data[i] !== '\x1b' || i + 1 >= data.length) {
      tokens.push(data[i]);
      i++;
      continue;
    }
    const next = data[i + 1];
    if (next === 'O' && i + 2 < data.length) {
      tokens.push(data.slice(i, i + 3));
      i += 3;
      continue;
    }
    if (next === '[') {
      let j = i + 2;
      // CSI: parameter and intermediate bytes, then one final byte
      while (j < data.length && /[0-9;<?]/.test(data[j])) j++;
      tokens.push(data.slice(i, Math.min(j + 1, data.length)));
      i = j + 1;
      continue;
    }
    tokens.push('\x1b');
    i++;
  }
  return tokens;
}

export function isMouseSequence(token: string): boolean {
  return SGR_MOUSE.test(token);
}

/**
 * Parse an SGR mouse report. Only button presses produce a click;
 * releases, drags and wheel events return null.
 */
export function parseMouse(token: string): MouseClick | null {
  const match = SGR_MOUSE.exec(token);
  if (!match) return null;
  const code = Number(match[1]);
  if (match[4] !== 'M') return null;
  if (code & 32 || code & 64) return null;
  const buttons: MouseButton[] = ['left', 'middle', 'right'];
  const button = buttons[code & 3];
  if (!button) return null;
  return { button, col: Number(match[2]) - 1, row: Number(match[3]) - 1 };
}
