/**
 * Console options and command-line parsing
 */

import type { EditorRequest } from './games/base';
import { games, getGame } from './games';
import type { HelpLayout } from './grid/renderer';
import { type PhosphorMode, isValidThemeMode } from './themes';

export type LedStyle = 'circle' | 'square';

export interface ConsoleOptions {
  /** Frames per second of the main loop */
  fps: number;
  /** Directory holding sprites.json and font_overrides.json */
  dataDir: string;
  theme: PhosphorMode;
  /** How long a key counts as held after its last press */
  keyHoldMs: number;
  sound: boolean;
  ledStyle: LedStyle;
  layout: HelpLayout;
  skipBoot: boolean;
  /** Game id to launch instead of the menu */
  startGame?: string;
  /** Editor to open instead of the menu */
  editor?: EditorRequest;
}

export const DEFAULT_OPTIONS: ConsoleOptions = {
  fps: 60,
  dataDir: 'data',
  theme: 'cyan',
  keyHoldMs: 80,
  sound: true,
  ledStyle: 'circle',
  layout: 'portrait',
  skipBoot: false,
};

export const FPS_RANGE = { min: 10, max: 120 } as const;
export const KEY_HOLD_RANGE = { min: 20, max: 500 } as const;

/** Sprites opened from the command line must fit inside the editor frame */
export const MAX_SPRITE_SIZE = 17;

function clampInt(value: number, range: { min: number; max: number }, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(range.min, Math.min(range.max, Math.round(value)));
}

/** Fill in defaults and pull numbers into range */
export function resolveOptions(options: Partial<ConsoleOptions> = {}): ConsoleOptions {
  const merged: ConsoleOptions = { ...DEFAULT_OPTIONS, ...options };
  if (!isValidThemeMode(merged.theme)) {
    console.warn(`[Config] Unknown theme "${merged.theme}", using ${DEFAULT_OPTIONS.theme}`);
    merged.theme = DEFAULT_OPTIONS.theme;
  }
  return {
    ...merged,
    fps: clampInt(merged.fps, FPS_RANGE, DEFAULT_OPTIONS.fps),
    keyHoldMs: clampInt(merged.keyHoldMs, KEY_HOLD_RANGE, DEFAULT_OPTIONS.keyHoldMs),
    dataDir: merged.dataDir || DEFAULT_OPTIONS.dataDir,
  };
}

// ============================================================================
// Command line
// ============================================================================

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'assets'; options: ConsoleOptions }
  | { kind: 'run'; options: ConsoleOptions }
  | { kind: 'error'; message: string };

/** Card name for a game id or card name, e.g. "basketball" or "bball" -> "BBALL" */
export function resolveCardName(value: string): string | undefined {
  return getGame(value)?.name ?? games.find(g => g.name === value.toUpperCase())?.name;
}

function parseSpriteSize(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n >= 1 && n <= MAX_SPRITE_SIZE ? n : null;
}

function parseEditor(command: string, rest: string[]): EditorRequest | string {
  switch (command) {
    case 'edit-font': {
      const char = rest[0];
      return char === undefined ? { kind: 'font' } : { kind: 'font', char };
    }
    case 'edit-sprite': {
      const [name, w, h] = rest;
      const width = parseSpriteSize(w);
      const height = parseSpriteSize(h);
      if (!name || width === null || height === null) {
        return `Usage: edit-sprite <name> <w> <h> (sizes 1-${MAX_SPRITE_SIZE})`;
      }
      return { kind: 'sprite', name, w: width, h: height };
    }
    default: {
      const gameName = rest[0] === undefined ? undefined : resolveCardName(rest[0]);
      if (!gameName) return `Usage: edit-card <game> (one of: ${games.map(g => g.id).join(', ')})`;
      return { kind: 'card', gameName };
    }
  }
}

const EDIT_COMMANDS = new Set(['edit-font', 'edit-sprite', 'edit-card']);

/**
 * Parse argv (without the node and script entries). Later flags win;
 * the first positional picks the command or the game to launch.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const options: Partial<ConsoleOptions> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--list':
      case '-l':
        return { kind: 'list' };
      case '--theme':
      case '--fps':
      case '--data-dir': {
        const value = argv[i + 1];
        if (value === undefined) return { kind: 'error', message: `Missing value for ${arg}` };
        i++;
        if (arg === '--theme') {
          if (!isValidThemeMode(value)) return { kind: 'error', message: `Unknown theme: ${value}` };
          options.theme = value;
        } else if (arg === '--fps') {
          const fps = Number(value);
          if (!Number.isFinite(fps)) return { kind: 'error', message: `Invalid --fps: ${value}` };
          options.fps = fps;
        } else {
          options.dataDir = value;
        }
        break;
      }
      case '--no-sound':
        options.sound = false;
        break;
      case '--square':
        options.ledStyle = 'square';
        break;
      case '--landscape':
        options.layout = 'landscape';
        break;
      case '--skip-boot':
        options.skipBoot = true;
        break;
      default:
        if (arg.startsWith('-')) return { kind: 'error', message: `Unknown option: ${arg}` };
        positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  if (command === undefined) return { kind: 'run', options: resolveOptions(options) };
  if (command === 'assets') return { kind: 'assets', options: resolveOptions(options) };

  if (EDIT_COMMANDS.has(command)) {
    const editor = parseEditor(command, rest);
    if (typeof editor === 'string') return { kind: 'error', message: editor };
    return { kind: 'run', options: resolveOptions({ ...options, editor, skipBoot: true }) };
  }

  const game = getGame(command);
  if (!game) {
    return {
      kind: 'error',
      message: `Unknown game: ${command}\nAvailable games: ${games.map(g => g.id).join(', ')}`,
    };
  }
  return { kind: 'run', options: resolveOptions({ ...options, startGame: game.id, skipBoot: true }) };
}
