/**
 * Pets
 *
 * Tamagotchi-style care for three pets. Hunger, happiness and energy
 * (0-10) drain over time; A feeds, S plays, D rests. Left/Right switch
 * pets.
 */

import type { Color } from '../../grid/color';
import { drawArrow } from '../../grid/draw';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import type { InputFrame } from '../input';
import { playBeep } from '../sound';

export type PetKind = 'DOG' | 'CAT' | 'DINO';

export interface Pet {
  name: PetKind;
  primary: Color;
  accent: Color;
  hunger: number;
  happiness: number;
  energy: number;
}

export type PetStat = 'hunger' | 'happiness' | 'energy';

const STATS: readonly PetStat[] = ['hunger', 'happiness', 'energy'];

/** Loss per second for the selected pet */
export const PET_DECAY: Record<PetStat, number> = {
  hunger: 0.3,
  happiness: 0.18,
  energy: 0.22,
};

export const STAT_MAX = 10;
export const MESSAGE_TIME = 0.8;

interface PetAction {
  message: string;
  changes: Record<PetStat, number>;
  beep: number;
}

export const PET_ACTIONS: Record<'feed' | 'play' | 'rest', PetAction> = {
  feed: { message: 'FED', changes: { hunger: 3.0, energy: 0.5, happiness: -0.3 }, beep: 660 },
  play: { message: 'PLAY', changes: { happiness: 3.0, energy: -1.2, hunger: -0.8 }, beep: 740 },
  rest: { message: 'REST', changes: { energy: 3.0, happiness: 0.4, hunger: -0.5 }, beep: 520 },
};

const ACTION_KEYS = new Map<string, keyof typeof PET_ACTIONS>([
  ['a', 'feed'],
  ['s', 'play'],
  ['d', 'rest'],
]);

/**
 * Pet faces, 'c' primary, 'a' accent, 'k' black, 'n' nose.
 */
const PET_ART: Record<PetKind, readonly string[]> = {
  DOG: [
    'c.......c',
    '.ccccccc.',
    '.cckcckc.',
    '.ccccccc.',
    '....na...',
    '....aa...',
  ],
  CAT: [
    '..c...c..',
    '.ccccccc.',
    '.cckckcc.',
    'aaccaccaa',
  ],
  DINO: [
    '..a.a.....',
    '...a......',
    '..ccckc...',
    '.cccccc...',
    '..cccccccc',
    '...ccccc..',
    '....c.c...',
  ],
};

const STAT_COLORS: Record<PetStat, Color> = {
  hunger: [255, 180, 0],
  happiness: [255, 80, 180],
  energy: [80, 160, 255],
};

function clampStat(value: number): number {
  return Math.max(0, Math.min(STAT_MAX, value));
}

function createPets(): Pet[] {
  const base = { hunger: 7, happiness: 7, energy: 7 };
  return [
    { name: 'DOG', primary: [210, 150, 90], accent: [255, 255, 255], ...base },
    { name: 'CAT', primary: [180, 180, 180], accent: [255, 120, 180], ...base },
    { name: 'DINO', primary: [60, 200, 90], accent: [255, 240, 120], ...base },
  ];
}

export class PetsGame extends Game {
  pets: Pet[] = createPets();
  selectedIndex = 0;
  message = '';
  private messageTimer = 0;

  get pet(): Pet {
    return this.pets[this.selectedIndex];
  }

  update(dt: number): void {
    const pet = this.pet;
    for (const stat of STATS) {
      pet[stat] = clampStat(pet[stat] - PET_DECAY[stat] * dt);
    }

    if (this.messageTimer > 0) {
      this.messageTimer = Math.max(0, this.messageTimer - dt);
      if (this.messageTimer === 0) this.message = '';
    }
  }

  /** Apply a care action to the selected pet */
  act(action: keyof typeof PET_ACTIONS): void {
    const { message, changes, beep } = PET_ACTIONS[action];
    const pet = this.pet;
    for (const stat of STATS) {
      pet[stat] = clampStat(pet[stat] + changes[stat]);
    }
    playBeep(beep, 60);
    this.message = message;
    this.messageTimer = MESSAGE_TIME;
  }

  render(): void {
    const pet = this.pet;
    this.grid.clear([0, 0, 10]);

    this.grid.renderText('PETS', 2, 0, [120, 200, 255]);
    this.grid.renderText(pet.name, 2, 6, [0, 255, 255]);
    this.drawPet(pet, 4, 8);

    const bars: Array<[PetStat, number]> = [['hunger', 1], ['happiness', 7], ['energy', 13]];
    for (const [stat, x] of bars) {
      this.drawStatBar(x, 18, Math.round(pet[stat]), STAT_COLORS[stat]);
      this.grid.setPixel(x, 17, STAT_COLORS[stat]);
    }

    if (this.message) {
      this.grid.renderText(this.message, 1, 1, [255, 255, 0]);
    }

    drawArrow(this.grid, 1, 10, 'left', [120, 120, 120]);
    drawArrow(this.grid, 17, 10, 'right', [120, 120, 120]);
  }

  private drawPet(pet: Pet, x: number, y: number): void {
    const palette: Record<string, Color> = {
      c: pet.primary,
      a: pet.accent,
      k: [0, 0, 0],
      n: [40, 40, 40],
    };
    PET_ART[pet.name].forEach((row, dy) => {
      [...row].forEach((ch, dx) => {
        const color = palette[ch];
        if (color) this.grid.setPixel(x + dx, y + dy, color);
      });
    });
  }

  /** Five pixels, one per two points */
  private drawStatBar(x: number, y: number, value: number, color: Color): void {
    const filled = Math.round(clampStat(value) / 2);
    const dim: Color = [
      Math.max(10, Math.floor(color[0] / 5)),
      Math.max(10, Math.floor(color[1] / 5)),
      Math.max(10, Math.floor(color[2] / 5)),
    ];
    this.grid.fillRect(x, y, 5, 1, dim);
    this.grid.fillRect(x, y, filled, 1, color);
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (key === 'ArrowLeft') {
        playBeep(420, 35);
        this.selectedIndex = (this.selectedIndex + this.pets.length - 1) % this.pets.length;
      } else if (key === 'ArrowRight') {
        playBeep(520, 35);
        this.selectedIndex = (this.selectedIndex + 1) % this.pets.length;
      } else {
        const action = ACTION_KEYS.get(key);
        if (action) this.act(action);
      }
    }
  }
}
