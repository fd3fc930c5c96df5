/**
 * LED console runtime
 *
 * Wires a terminal to the grid, the asset stores and the GameManager and
 * drives the frame loop: input, update, render, paint. Global keys
 * (display tweaks, sound, quit) are handled here and are suspended while
 * an editor is open so editors can use every key.
 */

import type { Terminal } from '@xterm/xterm';
import { type ConsoleOptions, resolveOptions } from './config';
import { type GameInfo, createScreens, games, getGameIndex } from './games';
import { GameManager, GameState } from './games/base';
import { InputTracker } from './games/input';
import { createBellSink, playBeep, setBeepSink, setSoundEnabled, toggleSound } from './games/sound';
import { enterAlternateBuffer, exitAlternateBuffer, getCurrentThemeColor, getSubtleThemeColor, setTheme } from './games/utils';
import { LEDGrid } from './grid/ledGrid';
import { HELP_PANEL_HEIGHT, HELP_PANEL_WIDTH, type HelpLayout, renderGrid, renderHelp } from './grid/renderer';
import { type AssetStores, openAssetStores } from './storage';
import { MOUSE_DISABLE, MOUSE_ENABLE, isMouseSequence, parseKey, parseMouse, splitInput } from './terminal/keys';
import type { ConsoleTerminal } from './terminal/types';

export interface ConsoleController {
  stop: () => void;
  readonly isRunning: boolean;
  readonly grid: LEDGrid;
  readonly manager: GameManager;
}

export interface ConsoleHooks {
  /** Stores to use instead of loading them from the data directory */
  stores?: AssetStores;
  /** Called once after the console has stopped (quit key or stop()) */
  onStop?: () => void;
  /** Millisecond clock */
  now?: () => number;
}

/** Longest step fed to the simulation, e.g. after the process was suspended */
const MAX_DT = 0.1;

const DISPLAY_HELP = '+/- size  [ ] spacing  , . gap  T style  L layout  O sound';

/**
 * Help panel lines for the current screen. The first line is drawn in
 * the theme color, the rest muted.
 */
export function globalHelpLines(state: GameState, game?: GameInfo): string[] {
  switch (state) {
    case GameState.BOOT:
      return ['LED CONSOLE', 'Space skip  Q quit', DISPLAY_HELP];
    case GameState.MENU:
      return [
        'LED CONSOLE  Left/Right select  Space play',
        'E card  G logo  F font  M smooth  Q quit',
        DISPLAY_HELP,
      ];
    case GameState.PLAYING:
      return [game ? `${game.name}  ${game.help}` : 'PLAYING', 'Esc menu  Q quit', DISPLAY_HELP];
    case GameState.EDITOR:
      return [
        'EDITOR  Arrows move  Space paint  S save  Esc back',
        'C color  Backspace erase  Tab font view  R reset glyph  B bake card',
        'Click paints  Right click erases',
      ];
  }
}

export function runConsole(
  terminal: ConsoleTerminal,
  overrides: Partial<ConsoleOptions> = {},
  hooks: ConsoleHooks = {},
): ConsoleController {
  const options = resolveOptions(overrides);
  const now = hooks.now ?? Date.now;
  let layout: HelpLayout = options.layout;
  let running = true;
  let needsClear = true;

  setTheme(options.theme);
  setSoundEnabled(options.sound);
  setBeepSink(createBellSink(data => terminal.write(data)));

  const grid = new LEDGrid();
  grid.circularMode = options.ledStyle === 'circle';

  const layoutGrid = (cols: number, rows: number): void => {
    if (layout === 'portrait') {
      grid.updateWindowSize(cols, Math.max(1, rows - HELP_PANEL_HEIGHT));
    } else {
      grid.updateWindowSize(Math.max(1, cols - HELP_PANEL_WIDTH), rows);
    }
    needsClear = true;
  };
  layoutGrid(terminal.cols, terminal.rows);

  const stores = hooks.stores ?? openAssetStores(options.dataDir);
  const applySavedFont = (): void => grid.setFontOverrides(stores.fonts.getOverrides());
  applySavedFont();

  const manager = new GameManager(grid, createScreens(grid, stores), {
    onEditorClosed: applySavedFont,
    onScreenError: (err, state) => console.error(`[Console] Screen failed in ${state}:`, err),
  });

  if (options.editor) {
    manager.openEditor(options.editor);
  } else if (options.startGame !== undefined && getGameIndex(options.startGame) >= 0) {
    manager.startGameByIndex(getGameIndex(options.startGame));
  } else if (options.skipBoot) {
    manager.showMenu();
  } else {
    manager.startBoot();
  }

  const tracker = new InputTracker(options.keyHoldMs);

  // ==========================================================================
  // Input
  // ==========================================================================

  /** Display and app keys; every key still reaches the screen afterwards */
  const handleGlobalKey = (key: string): boolean => {
    switch (key) {
      case 'q':
        controller.stop();
        return false;
      case '+':
      case '=':
        grid.adjustLedSize(1);
        break;
      case '-':
        grid.adjustLedSize(-1);
        break;
      case '[':
        grid.adjustLedSpacing(-1);
        break;
      case ']':
        grid.adjustLedSpacing(1);
        break;
      case ',':
        grid.adjustLedGap(-1);
        break;
      case '.':
        grid.adjustLedGap(1);
        break;
      case 't':
        grid.toggleStyle();
        break;
      case 'l':
        layout = layout === 'portrait' ? 'landscape' : 'portrait';
        layoutGrid(terminal.cols, terminal.rows);
        break;
      case 'o':
        if (toggleSound()) playBeep(880, 60);
        return true;
      default:
        return true;
    }
    needsClear = true;
    return true;
  };

  const dataListener = terminal.onData(data => {
    if (!running) return;
    for (const token of splitInput(data)) {
      if (isMouseSequence(token)) {
        const click = parseMouse(token);
        if (!click || click.button === 'middle') continue;
        const led = grid.screenToGrid(click.col, click.row);
        if (led) tracker.click({ x: led.x, y: led.y, button: click.button });
        continue;
      }

      const key = parseKey(token);
      if (manager.state !== GameState.EDITOR) {
        const lower = key.length === 1 ? key.toLowerCase() : key;
        if (!handleGlobalKey(lower)) return;
      }
      tracker.keyDown(key, now());
    }
  });

  const resizeListener = terminal.onResize(size => {
    layoutGrid(size.cols, size.rows);
  });

  // ==========================================================================
  // Frame loop
  // ==========================================================================

  let last = now();

  const frame = (): void => {
    const t = now();
    const dt = Math.min(MAX_DT, Math.max(0, (t - last) / 1000));
    last = t;

    const before = manager.currentGame;
    manager.handleInput(tracker.frame(dt, t));
    manager.update(dt);
    if (manager.currentGame !== before) {
      tracker.releaseAll();
      needsClear = true;
    }
    manager.render();

    const game = manager.state === GameState.PLAYING ? games[manager.selectedGameIndex] : undefined;
    const help = renderHelp(grid, globalHelpLines(manager.state, game), layout, getCurrentThemeColor(), getSubtleThemeColor());
    terminal.write((needsClear ? '\x1b[2J' : '') + renderGrid(grid) + help);
    needsClear = false;
  };

  enterAlternateBuffer(terminal, 'led-console');
  terminal.write(MOUSE_ENABLE);

  const interval = setInterval(() => {
    if (!running) return;
    try {
      frame();
    } catch (err) {
      console.error('[Console] Frame failed:', err);
      controller.stop();
    }
  }, 1000 / options.fps);

  const controller: ConsoleController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(interval);
      dataListener.dispose();
      resizeListener.dispose();
      terminal.write(MOUSE_DISABLE);
      exitAlternateBuffer(terminal, 'led-console');
      setBeepSink(null);
      hooks.onStop?.();
    },
    get isRunning() {
      return running;
    },
    grid,
    manager,
  };

  return controller;
}

/** Run inside an xterm.js terminal, e.g. in a browser page */
export function runConsoleInXterm(
  terminal: Terminal,
  options: Partial<ConsoleOptions> = {},
  hooks: ConsoleHooks = {},
): ConsoleController {
  return runConsole(terminal, options, hooks);
}
