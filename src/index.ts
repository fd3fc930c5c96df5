/**
 * led-console
 *
 * A simulated 19x19 RGB LED matrix game console for terminals.
 *
 * Library usage (xterm.js):
 *   import { runConsoleInXterm } from 'led-console';
 *   const controller = runConsoleInXterm(terminal, { theme: 'amber', skipBoot: true });
 *
 * CLI usage:
 *   led-console [game]
 */

// Console runtime
export {
  runConsole,
  runConsoleInXterm,
  globalHelpLines,
  type ConsoleController,
  type ConsoleHooks,
} from './console';

export {
  resolveOptions,
  parseCliArgs,
  DEFAULT_OPTIONS,
  type ConsoleOptions,
  type CliCommand,
  type LedStyle,
} from './config';

// Game registry and state machine
export { games, getGame, getGameIndex, menuCards, createScreens, createEditor, type GameInfo } from './games';
export {
  Game,
  GameManager,
  GameState,
  type EditorRequest,
  type ScreenRequest,
  type ScreenFactory,
  type GameManagerOptions,
} from './games/base';
export { InputTracker, inputFrame, isHeld, wasPressed, type InputFrame, type GridClick } from './games/input';
export { playBeep, setSoundEnabled, toggleSound, setBeepSink, type BeepSink } from './games/sound';

// Grid and rendering
export { LEDGrid, GRID_SIZE, type Glyph, type FontOverrides } from './grid/ledGrid';
export { type Color, coerceColor, blendColors, hsvToRgb, dimColor, brighten, scaleColor } from './grid/color';
export { drawCirclePixels, drawArrow, drawFrame } from './grid/draw';
export { renderGrid, renderHelp, type HelpLayout } from './grid/renderer';
export { TITLE, HINT, HUD_LEFT, HUD_RIGHT, textWidth, centeredX, type TextZone } from './grid/textLayout';

// Assets
export {
  Sprite,
  SpriteStore,
  FontStore,
  drawSprite,
  openAssetStores,
  type AssetStores,
} from './storage';

// Editors
export { FontEditor } from './editors/fontEditor';
export { SpriteEditor } from './editors/spriteEditor';
export { CardEditor } from './editors/cardEditor';

// Theme utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
  type PhosphorMode,
} from './games/utils';

export type { ConsoleTerminal, Disposable, TerminalSize } from './terminal/types';
