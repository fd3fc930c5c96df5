import { describe, it, expect, vi, afterEach } from 'vitest';
import { LEDGrid } from '../grid/ledGrid';
import { Game, GameManager, GameState, type EditorRequest, type ScreenRequest } from './base';
import { type InputFrame, inputFrame } from './input';

class StubScreen extends Game {
  request: ScreenRequest | null = null;
  inputs: InputFrame[] = [];
  failOnUpdate = false;

  constructor(grid: LEDGrid, readonly label: string) {
    super(grid);
  }

  update(_dt: number): void {
    if (this.failOnUpdate) throw new Error(`${this.label} broke`);
  }

  render(): void {}

  handleInput(input: InputFrame): void {
    this.inputs.push(input);
  }

  finish(request: ScreenRequest | null = null): void {
    this.request = request;
    this.running = false;
  }

  nextRequest(): ScreenRequest | null {
    return this.request;
  }
}

function setup(gameCount = 2) {
  const grid = new LEDGrid();
  const editors: EditorRequest[] = [];
  const onEditorClosed = vi.fn();
  const onScreenError = vi.fn();
  const manager = new GameManager(
    grid,
    {
      boot: () => new StubScreen(grid, 'boot'),
      menu: () => new StubScreen(grid, 'menu'),
      game: index => (index < gameCount ? new StubScreen(grid, `game${index}`) : null),
      editor: request => {
        editors.push(request);
        return new StubScreen(grid, 'editor');
      },
    },
    { onEditorClosed, onScreenError },
  );
  const current = (): StubScreen => {
    const screen = manager.currentGame;
    if (!(screen instanceof StubScreen)) throw new Error('no screen');
    return screen;
  };
  return { manager, editors, onEditorClosed, onScreenError, current };
}

describe('GameManager', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('moves from boot to the menu when the boot screen ends', () => {
    const { manager, current } = setup();
    manager.startBoot();
    expect(manager.state).toBe(GameState.BOOT);
    current().finish();
    manager.update(0.016);
    expect(manager.state).toBe(GameState.MENU);
    expect(current().label).toBe('menu');
  });

  it('starts the game the menu asked for', () => {
    const { manager, current } = setup();
    manager.showMenu();
    current().finish({ kind: 'play', gameIndex: 1 });
    manager.update(0.016);
    expect(manager.state).toBe(GameState.PLAYING);
    expect(manager.selectedGameIndex).toBe(1);
    expect(current().label).toBe('game1');
  });

  it('returns to the menu for an unknown game', () => {
    const { manager } = setup();
    manager.startGameByIndex(5);
    expect(manager.state).toBe(GameState.MENU);
    expect(manager.selectedGameIndex).toBe(0);
  });

  it('opens the requested editor from the menu', () => {
    const { manager, editors, current } = setup();
    manager.showMenu();
    current().finish({ kind: 'edit', editor: { kind: 'font', char: 'B' } });
    manager.update(0.016);
    expect(manager.state).toBe(GameState.EDITOR);
    expect(editors).toEqual([{ kind: 'font', char: 'B' }]);
  });

  it('rebuilds the menu when it stops without a request', () => {
    const { manager, current } = setup();
    manager.showMenu();
    const first = current();
    first.finish();
    manager.update(0.016);
    expect(manager.state).toBe(GameState.MENU);
    expect(current()).not.toBe(first);
  });

  it('goes back to the menu when a game ends', () => {
    const { manager, current, onEditorClosed } = setup();
    manager.startGameByIndex(0);
    current().finish();
    manager.update(0.016);
    expect(manager.state).toBe(GameState.MENU);
    expect(onEditorClosed).not.toHaveBeenCalled();
  });

  it('reports closed editors', () => {
    const { manager, current, onEditorClosed } = setup();
    manager.openEditor({ kind: 'sprite', name: 'icon', w: 3, h: 3 });
    current().finish();
    manager.update(0.016);
    expect(manager.state).toBe(GameState.MENU);
    expect(onEditorClosed).toHaveBeenCalledTimes(1);
  });

  it('does not pass input to a stopped screen', () => {
    const { manager, current } = setup();
    manager.startGameByIndex(0);
    const game = current();
    game.finish();
    manager.handleInput(inputFrame(['a']));
    expect(game.inputs).toHaveLength(0);
  });

  it('falls back to the menu when a game throws', () => {
    const { manager, current, onScreenError } = setup();
    manager.startGameByIndex(0);
    current().failOnUpdate = true;
    manager.update(0.016);
    expect(onScreenError).toHaveBeenCalledWith(new Error('game0 broke'), GameState.PLAYING);
    expect(manager.state).toBe(GameState.MENU);
  });

  it('rethrows errors from the menu itself', () => {
    const { manager, current } = setup();
    manager.showMenu();
    current().failOnUpdate = true;
    expect(() => manager.update(0.016)).toThrow('menu broke');
  });

  it('logs screen errors without a handler', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const grid = new LEDGrid();
    const broken = new StubScreen(grid, 'game');
    broken.failOnUpdate = true;
    const manager = new GameManager(grid, {
      boot: () => new StubScreen(grid, 'boot'),
      menu: () => new StubScreen(grid, 'menu'),
      game: () => broken,
      editor: () => new StubScreen(grid, 'editor'),
    });
    manager.startGameByIndex(0);
    manager.update(0.016);
    expect(error).toHaveBeenCalledWith('[GameManager] Screen failed in playing:', new Error('game broke'));
  });
});
