/**
 * CLI entry point for led-console
 *
 * Provides a Node.js terminal adapter over stdin/stdout so the console
 * runs directly in any terminal emulator.
 */

import { type ConsoleOptions, MAX_SPRITE_SIZE, parseCliArgs } from './config';
import { runConsole } from './console';
import { games } from './games';
import { getCurrentThemeColor, getSubtleThemeColor, setTheme } from './games/utils';
import { MOUSE_DISABLE } from './terminal/keys';
import type { ConsoleTerminal, Disposable, TerminalSize } from './terminal/types';
import { ANSI_RESET, getThemeModes } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends ConsoleTerminal {
  cleanup: () => void;
}

function createNodeTerminal(): NodeTerminal {
  const dataListeners: ((data: string) => void)[] = [];
  const resizeListeners: ((size: TerminalSize) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    for (const listener of [...dataListeners]) {
      listener(data);
    }
  });

  process.stdout.on('resize', () => {
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  let cleanedUp = false;
  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write(MOUSE_DISABLE);
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  function subscribe<T>(listeners: T[], callback: T): Disposable {
    listeners.push(callback);
    return {
      dispose: () => {
        const idx = listeners.indexOf(callback);
        if (idx !== -1) listeners.splice(idx, 1);
      },
    };
  }

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  // Supported by Warp, iTerm2, kitty, foot, WezTerm, etc.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  const terminal: NodeTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    element: {}, // Truthy for isTerminalValid check
    onData: callback => subscribe(dataListeners, callback),
    onResize: callback => subscribe(resizeListeners, callback),
    cleanup,
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  const accent = getCurrentThemeColor();
  const subtle = getSubtleThemeColor();
  console.log(`
  ${accent}led-console${ANSI_RESET}: a 19x19 LED matrix game console

  Usage:
    led-console                       Boot animation, then the game menu
    led-console <game>                Launch a game directly
    led-console edit-font [char]      Edit the 3x5 font
    led-console edit-sprite <name> <w> <h>
                                      Edit a named sprite (sizes 1-${MAX_SPRITE_SIZE})
    led-console edit-card <game>      Edit a game's menu card overlay
    led-console assets                List, delete and reset saved assets
    led-console --list                List all games
    led-console --help                Show this help

  Options:
    --theme <theme>     Color of the help panel and CLI output
    --fps <n>           Frame rate (10-120, default 60)
    --data-dir <dir>    Where sprites.json and font_overrides.json live (default: data)
    --no-sound          Start muted
    --square            Square LEDs instead of round ones
    --landscape         Help panel beside the grid instead of below
    --skip-boot         Go straight to the menu

  Games:
    ${games.map(g => `${g.id.padEnd(16)} ${subtle}${g.description}${ANSI_RESET}`).join('\n    ')}

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    Arrow keys / WASD    Move / navigate
    Space / Enter        Confirm / select
    ESC                  Back to the menu
    + - [ ] , . T L      LED size, spacing, gap, style, layout
    O                    Sound on/off
    Q                    Quit

  Examples:
    led-console snake
    led-console --theme amber --square
    led-console edit-sprite hud_race_dist 3 5
`);
}

function startConsole(options: ConsoleOptions) {
  const terminal = createNodeTerminal();
  runConsole(terminal, options, {
    onStop: () => {
      terminal.cleanup();
      process.exit(0);
    },
  });
}

function main() {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      printHelp();
      process.exit(0);
      break;
    case 'list':
      for (const game of games) {
        console.log(`  ${game.id.padEnd(16)} ${game.description}`);
      }
      process.exit(0);
      break;
    case 'error':
      console.error(command.message);
      process.exit(1);
      break;
    case 'assets': {
      setTheme(command.options.theme);
      const options = command.options;
      void import('./assets')
        .then(m => m.assetsCommand(options))
        .catch((err: unknown) => {
          console.error('[Assets] Failed:', err);
          process.exit(1);
        });
      break;
    }
    case 'run':
      setTheme(command.options.theme);
      startConsole(command.options);
      break;
  }
}

main();
