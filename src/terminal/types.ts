/**
 * Minimal terminal surface the console draws to.
 *
 * An xterm.js Terminal satisfies this structurally; the CLI provides a
 * Node adapter over stdin/stdout.
 */

export interface Disposable {
  dispose: () => void;
}

export interface TerminalSize {
  cols: number;
  rows: number;
}

export interface ConsoleTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  /** Null once an xterm.js terminal has been disposed */
  readonly element?: object | null;
  onData(listener: (data: string) => void): Disposable;
  onResize(listener: (size: TerminalSize) => void): Disposable;
}
