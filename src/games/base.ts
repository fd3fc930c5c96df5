/**
 * Screen base class and the console state machine
 *
 * Every screen (boot animation, menu, games, editors) is a Game: it is
 * updated, fed input and rendered once per frame, and signals that it is
 * done by clearing its running flag. The GameManager decides what comes
 * next.
 */

import type { LEDGrid } from '../grid/ledGrid';
import type { InputFrame } from './input';

// ============================================================================
// Game
// ============================================================================

export abstract class Game {
  protected running = true;

  constructor(protected readonly grid: LEDGrid) {}

  /** Advance the simulation by dt seconds */
  abstract update(dt: number): void;

  /** Draw the current state onto the grid */
  abstract render(): void;

  abstract handleInput(input: InputFrame): void;

  isRunning(): boolean {
    return this.running;
  }

  exit(): void {
    this.running = false;
  }

  /** What the manager should open after this screen stops, if anything */
  nextRequest(): ScreenRequest | null {
    return null;
  }
}

// ============================================================================
// State machine
// ============================================================================

export const GameState = {
  BOOT: 'boot',
  MENU: 'menu',
  PLAYING: 'playing',
  EDITOR: 'editor',
} as const;

export type GameState = (typeof GameState)[keyof typeof GameState];

export type EditorRequest =
  | { kind: 'font'; char?: string }
  | { kind: 'sprite'; name: string; w: number; h: number }
  | { kind: 'card'; gameName: string };

export type ScreenRequest =
  | { kind: 'play'; gameIndex: number }
  | { kind: 'edit'; editor: EditorRequest };

/** Builds screens on demand so each visit starts fresh */
export interface ScreenFactory {
  boot(): Game;
  menu(manager: GameManager): Game;
  game(index: number): Game | null;
  editor(request: EditorRequest): Game;
}

export interface GameManagerOptions {
  /** Called after an editor closes, e.g. to reapply saved font overrides */
  onEditorClosed?: () => void;
  /** Called when a screen throws; the manager returns to the menu afterwards */
  onScreenError?: (error: unknown, state: GameState) => void;
}

export class GameManager {
  state: GameState = GameState.BOOT;
  currentGame: Game | null = null;
  selectedGameIndex = 0;
  smoothTransitions = true;

  constructor(
    readonly grid: LEDGrid,
    private readonly screens: ScreenFactory,
    private readonly options: GameManagerOptions = {},
  ) {}

  setState(state: GameState): void {
    this.state = state;
  }

  startBoot(): void {
    this.currentGame = this.screens.boot();
    this.state = GameState.BOOT;
  }

  showMenu(): void {
    this.currentGame = this.screens.menu(this);
    this.state = GameState.MENU;
  }

  startGame(game: Game): void {
    this.currentGame = game;
    this.state = GameState.PLAYING;
  }

  /** Start a registered game by index; unknown indexes fall back to the menu */
  startGameByIndex(index: number): void {
    const game = this.screens.game(index);
    if (!game) {
      this.showMenu();
      return;
    }
    this.selectedGameIndex = index;
    this.startGame(game);
  }

  openEditor(request: EditorRequest): void {
    this.currentGame = this.screens.editor(request);
    this.state = GameState.EDITOR;
  }

  returnToMenu(): void {
    const wasEditor = this.state === GameState.EDITOR;
    this.showMenu();
    if (wasEditor) this.options.onEditorClosed?.();
  }

  update(dt: number): void {
    const game = this.currentGame;
    if (!game) return;
    this.guard(() => game.update(dt));
    if (!game.isRunning()) this.advance(game);
  }

  handleInput(input: InputFrame): void {
    const game = this.currentGame;
    if (!game || !game.isRunning()) return;
    this.guard(() => game.handleInput(input));
  }

  render(): void {
    const game = this.currentGame;
    if (!game) return;
    this.guard(() => game.render());
  }

  private advance(finished: Game): void {
    switch (this.state) {
      case GameState.BOOT:
        this.showMenu();
        break;
      case GameState.MENU: {
        const request = finished.nextRequest();
        if (request?.kind === 'play') {
          this.startGameByIndex(request.gameIndex);
        } else if (request?.kind === 'edit') {
          this.openEditor(request.editor);
        } else {
          this.showMenu();
        }
        break;
      }
      case GameState.PLAYING:
      case GameState.EDITOR:
        this.returnToMenu();
        break;
    }
  }

  /** Contain a failing screen: report it and fall back to the menu */
  private guard(step: () => void): void {
    try {
      step();
    } catch (err) {
      const state = this.state;
      if (this.options.onScreenError) {
        this.options.onScreenError(err, state);
      } else {
        console.error(`[GameManager] Screen failed in ${state}:`, err);
      }
      if (state === GameState.MENU) {
        throw err;
      }
      this.returnToMenu();
    }
  }
}
