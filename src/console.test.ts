import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { type ConsoleController, globalHelpLines, runConsole } from './console';
import { GameState } from './games/base';
import { games } from './games';
import { MOUSE_DISABLE, MOUSE_ENABLE } from './terminal/keys';
import type { ConsoleTerminal } from './terminal/types';
import { FontStore } from './storage/fontStore';
import { SpriteStore } from './storage/spriteStore';
import type { AssetStores } from './storage';

const FRAME_MS = 17;

function fakeTerminal() {
  const writes: string[] = [];
  let listener: ((data: string) => void) | null = null;
  const terminal: ConsoleTerminal = {
    write: data => {
      writes.push(data);
    },
    cols: 80,
    rows: 40,
    element: {},
    onData: next => {
      listener = next;
      return {
        dispose: () => {
          listener = null;
        },
      };
    },
    onResize: () => ({ dispose: () => {} }),
  };
  const send = (data: string): void => {
    listener?.(data);
  };
  return { terminal, writes, send };
}

describe('globalHelpLines', () => {
  it('shows the controls of the game being played', () => {
    expect(globalHelpLines(GameState.PLAYING, games[2])[0]).toBe('FLAP  Space flap  R restart');
  });

  it('always has three lines', () => {
    for (const state of Object.values(GameState)) {
      expect(globalHelpLines(state)).toHaveLength(3);
    }
  });
});

describe('runConsole', () => {
  let dir: string;
  let stores: AssetStores;
  let controller: ConsoleController | null;

  beforeEach(() => {
    vi.useFakeTimers();
    dir = mkdtempSync(join(tmpdir(), 'console-'));
    stores = {
      sprites: new SpriteStore(join(dir, 'sprites.json')),
      fonts: new FontStore(join(dir, 'font_overrides.json')),
    };
    controller = null;
  });

  afterEach(() => {
    controller?.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts with the boot screen by default', () => {
    const { terminal, writes } = fakeTerminal();
    controller = runConsole(terminal, { sound: false }, { stores });
    expect(controller.manager.state).toBe(GameState.BOOT);
    expect(writes).toContain('\x1b[?1049h');
    expect(writes).toContain(MOUSE_ENABLE);
  });

  it('goes straight to the menu or a game when asked', () => {
    const menu = fakeTerminal();
    controller = runConsole(menu.terminal, { sound: false, skipBoot: true }, { stores });
    expect(controller.manager.state).toBe(GameState.MENU);
    controller.stop();

    const game = fakeTerminal();
    controller = runConsole(game.terminal, { sound: false, startGame: 'snake' }, { stores });
    expect(controller.manager.state).toBe(GameState.PLAYING);
    expect(controller.manager.selectedGameIndex).toBe(1);
  });

  it('paints the grid and the help panel every frame', () => {
    const { terminal, writes } = fakeTerminal();
    controller = runConsole(terminal, { sound: false, skipBoot: true }, { stores });
    writes.length = 0;
    vi.advanceTimersByTime(FRAME_MS);
    expect(writes).toHaveLength(1);
    expect(writes[0].startsWith('\x1b[2J')).toBe(true);
    expect(writes[0]).toContain('LED CONSOLE  Left/Right select  Space play');
  });

  it('feeds keys to the current screen', () => {
    const { terminal, send } = fakeTerminal();
    controller = runConsole(terminal, { sound: false, skipBoot: true }, { stores });
    send('\x1b[C');
    vi.advanceTimersByTime(FRAME_MS);
    expect(controller.manager.selectedGameIndex).toBe(1);
  });

  it('adjusts the display with global keys', () => {
    const { terminal, send } = fakeTerminal();
    controller = runConsole(terminal, { sound: false, skipBoot: true }, { stores });
    send('+');
    send('t');
    expect(controller.grid.ledSize).toBe(2);
    expect(controller.grid.circularMode).toBe(false);
  });

  it('suspends global keys inside editors', () => {
    const { terminal, send } = fakeTerminal();
    controller = runConsole(terminal, { sound: false, editor: { kind: 'font' } }, { stores });
    send('+');
    send('q');
    expect(controller.grid.ledSize).toBe(1);
    expect(controller.isRunning).toBe(true);
  });

  it('maps clicks to LEDs', () => {
    const { terminal, send } = fakeTerminal();
    controller = runConsole(
      terminal,
      { sound: false, editor: { kind: 'sprite', name: 'icon', w: 4, h: 4 } },
      { stores },
    );
    // 80x37 window leaves the grid at column 21, row 9; LED (2,2) starts at column 25, row 11
    send('\x1b[<0;26;12M');
    vi.advanceTimersByTime(FRAME_MS);
    expect(stores.sprites.get('icon')?.get(1, 1)).toEqual([255, 255, 255]);
  });

  it('restores saved glyphs when an editor closes', () => {
    const { terminal, send } = fakeTerminal();
    controller = runConsole(terminal, { sound: false, editor: { kind: 'font' } }, { stores });
    vi.advanceTimersByTime(FRAME_MS);
    expect(controller.grid.getFontOverrides().A).toBeDefined();

    send('\x1b');
    vi.advanceTimersByTime(FRAME_MS);
    expect(controller.manager.state).toBe(GameState.MENU);
    expect(controller.grid.getFontOverrides()).toEqual({});
  });

  it('quits on q and restores the terminal once', () => {
    const { terminal, writes, send } = fakeTerminal();
    const onStop = vi.fn();
    controller = runConsole(terminal, { sound: false, skipBoot: true }, { stores, onStop });
    send('q');
    expect(controller.isRunning).toBe(false);
    expect(writes).toContain(MOUSE_DISABLE);
    expect(writes).toContain('\x1b[?1049l');

    controller.stop();
    expect(onStop).toHaveBeenCalledTimes(1);
  });
});
