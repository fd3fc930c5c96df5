/**
 * Per-frame input
 *
 * Terminals report key presses but never releases, so held state is
 * synthesised: a key stays held for `keyHoldMs` after its last press
 * (auto-repeat keeps refreshing it).
 */

export type ClickButton = 'left' | 'right';

/** A mouse click already mapped to LED coordinates */
export interface GridClick {
  x: number;
  y: number;
  button: ClickButton;
}

export interface InputFrame {
  /** Seconds since the previous frame */
  dt: number;
  /** Keys pressed since the previous frame, in order */
  pressed: readonly string[];
  /** Keys currently considered held down */
  held: ReadonlySet<string>;
  clicks: readonly GridClick[];
}

/** Single characters are compared case-insensitively */
export function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

export function wasPressed(input: InputFrame, ...keys: string[]): boolean {
  return keys.some(k => input.pressed.includes(normalizeKey(k)));
}

export function isHeld(input: InputFrame, ...keys: string[]): boolean {
  return keys.some(k => input.held.has(normalizeKey(k)));
}

/** Build a frame by hand (tests, scripted demos) */
export function inputFrame(pressed: string[] = [], options: Partial<Omit<InputFrame, 'pressed'>> = {}): InputFrame {
  return {
    dt: options.dt ?? 0,
    pressed: pressed.map(normalizeKey),
    held: options.held ?? new Set(),
    clicks: options.clicks ?? [],
  };
}

export class InputTracker {
  private pressed: string[] = [];
  private clicks: GridClick[] = [];
  private heldUntil = new Map<string, number>();

  constructor(private readonly keyHoldMs = 80) {}

  keyDown(key: string, now: number): void {
    const k = normalizeKey(key);
    this.pressed.push(k);
    this.heldUntil.set(k, now + this.keyHoldMs);
  }

  click(click: GridClick): void {
    this.clicks.push(click);
  }

  /** Drop held keys, e.g. when switching screens */
  releaseAll(): void {
    this.heldUntil.clear();
  }

  /** Collect everything since the previous frame */
  frame(dt: number, now: number): InputFrame {
    const held = new Set<string>();
    for (const [key, until] of this.heldUntil) {
      if (until > now) {
        held.add(key);
      } else {
        this.heldUntil.delete(key);
      }
    }
    const frame: InputFrame = { dt, pressed: this.pressed, held, clicks: this.clicks };
    this.pressed = [];
    this.clicks = [];
    return frame;
  }
}
