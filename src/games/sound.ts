/**
 * Optional beeps
 *
 * Screens call playBeep() freely; whether anything is heard depends on
 * the enabled flag and on the sink the host installs (the console routes
 * beeps to the terminal bell).
 */

export type BeepSink = (frequency: number, durationMs: number) => void;

let enabled = true;
let sink: BeepSink | null = null;

export function setSoundEnabled(value: boolean): void {
  enabled = value;
}

/** Toggle sound on/off. Returns the new state. */
export function toggleSound(): boolean {
  enabled = !enabled;
  return enabled;
}

/** Install the output for beeps; null mutes without changing the flag */
export function setBeepSink(next: BeepSink | null): void {
  sink = next;
}

export function playBeep(frequency: number, durationMs = 50): void {
  if (!enabled || !sink) return;
  sink(Math.round(frequency), Math.round(durationMs));
}

/**
 * Terminal bell sink. Terminals have a single bell tone, so only the
 * rate is controlled: at most one bell per `minIntervalMs`.
 */
export function createBellSink(write: (data: string) => void, minIntervalMs = 100, now: () => number = Date.now): BeepSink {
  let last = -Infinity;
  return () => {
    const t = now();
    if (t - last < minIntervalMs) return;
    last = t;
    write('\x07');
  };
}
