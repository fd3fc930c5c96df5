/**
 * Game registry and screen factory
 *
 * The registry order is the carousel order; card numbers start at 1.
 */

import type { LEDGrid } from '../grid/ledGrid';
import type { AssetStores } from '../storage';
import { CardEditor } from '../editors/cardEditor';
import { FontEditor } from '../editors/fontEditor';
import { SpriteEditor } from '../editors/spriteEditor';
import type { EditorRequest, Game, ScreenFactory } from './base';
import { BasketballGame } from './basketball';
import { BootScreen } from './boot';
import { FightGame } from './fight';
import { FlappyGame } from './flappy';
import { CarouselMenu, type MenuCard } from './menu';
import { PetsGame } from './pets';
import { PongGame } from './pong';
import { RaceGame } from './race';
import { SnakeGame } from './snake';
import { VacationGame } from './vacation';

/**
 * Game registry with metadata
 */
export interface GameInfo {
  id: string;
  /** Short name shown on the menu card */
  name: string;
  description: string;
  /** Controls line for the help panel */
  help: string;
  create: (grid: LEDGrid, stores: AssetStores) => Game;
}

export const games: GameInfo[] = [
  {
    id: 'pong',
    name: 'PONG',
    description: 'Classic paddle game',
    help: 'W/S left paddle  Up/Down right (2P)  Space serve',
    create: grid => new PongGame(grid),
  },
  {
    id: 'snake',
    name: 'SNAKE',
    description: 'Eat and grow',
    help: 'Arrows steer  Space restart',
    create: grid => new SnakeGame(grid),
  },
  {
    id: 'flappy',
    name: 'FLAP',
    description: 'Fly through the pipes',
    help: 'Space flap  R restart',
    create: grid => new FlappyGame(grid),
  },
  {
    id: 'basketball',
    name: 'BBALL',
    description: '2v2 hoops to 11',
    help: 'WASD move  Space shoot  P pass',
    create: grid => new BasketballGame(grid),
  },
  {
    id: 'pets',
    name: 'PETS',
    description: 'Look after a pet',
    help: 'A feed  S play  D rest  Left/Right pet',
    create: grid => new PetsGame(grid),
  },
  {
    id: 'vacation',
    name: 'VACAY',
    description: 'Scenic slideshow',
    help: 'Left/Right scene  Space pause',
    create: grid => new VacationGame(grid),
  },
  {
    id: 'fight',
    name: 'FIGHT',
    description: 'Stick figure brawl',
    help: 'A/D walk  W jump  J punch  Space restart',
    create: grid => new FightGame(grid),
  },
  {
    id: 'race',
    name: 'RACE',
    description: 'Dodge the traffic',
    help: 'Left/Right steer  Up/Down speed  Space restart',
    create: (grid, stores) => new RaceGame(grid, stores.sprites),
  },
];

/**
 * Get a game by ID
 */
export function getGame(id: string): GameInfo | undefined {
  return games.find(g => g.id === id.toLowerCase());
}

/** Carousel position of a game, -1 when unknown */
export function getGameIndex(id: string): number {
  return games.findIndex(g => g.id === id.toLowerCase());
}

export function menuCards(): MenuCard[] {
  return games.map((game, i) => ({ name: game.name, number: i + 1 }));
}

export function createEditor(grid: LEDGrid, stores: AssetStores, request: EditorRequest): Game {
  switch (request.kind) {
    case 'font':
      return new FontEditor(grid, stores.fonts, request.char);
    case 'sprite':
      return new SpriteEditor(grid, stores.sprites, request.name, request.w, request.h);
    case 'card': {
      const name = request.gameName.toUpperCase();
      const card = menuCards().find(c => c.name === name) ?? { name, number: 0 };
      return new CardEditor(grid, stores.sprites, card);
    }
  }
}

/** Screens for the GameManager, each built fresh on every visit */
export function createScreens(grid: LEDGrid, stores: AssetStores): ScreenFactory {
  return {
    boot: () => new BootScreen(grid),
    menu: manager => new CarouselMenu(grid, menuCards(), manager, stores.sprites),
    game: index => games[index]?.create(grid, stores) ?? null,
    editor: request => createEditor(grid, stores, request),
  };
}
