/**
 * Fight
 *
 * One-on-one stick fighter against the computer. A/D walk, W jumps,
 * J punches. Ten hits and you're out; Space restarts after a KO.
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import { type InputFrame, isHeld } from '../input';
import { playBeep } from '../sound';

export const FIGHT = {
  groundY: 15,
  gravity: 24.0,
  jumpVelocity: -10.0,
  maxHp: 10,
  /** How long a punch can land */
  punchActive: 0.18,
  playerCooldown: 0.5,
  aiCooldown: 0.6,
  /** Pixels per second */
  walkSpeed: 4.0,
  aiSpeed: 2.2,
  /** Chance per update that a grounded AI jumps */
  aiJumpChance: 0.01,
  reachX: 2.0,
  reachY: 2.5,
} as const;

export interface Fighter {
  /** Feet position */
  x: number;
  y: number;
  vy: number;
  hp: number;
  cooldown: number;
  /** Remaining active time of the current punch */
  punch: number;
}

export type Winner = 'YOU' | 'AI';

const ARENA: Color = [5, 0, 10];
const GROUND: Color = [40, 40, 40];
const PLAYER_COLOR: Color = [255, 60, 60];
const AI_COLOR: Color = [60, 160, 255];

function createFighter(x: number): Fighter {
  return { x, y: FIGHT.groundY, vy: 0, hp: FIGHT.maxHp, cooldown: 0, punch: 0 };
}

function onGround(f: Fighter): boolean {
  return f.y >= FIGHT.groundY;
}

function tick(f: Fighter, dt: number): void {
  f.cooldown = Math.max(0, f.cooldown - dt);
  f.punch = Math.max(0, f.punch - dt);
  f.vy += FIGHT.gravity * dt;
  f.y += f.vy * dt;
  if (f.y >= FIGHT.groundY) {
    f.y = FIGHT.groundY;
    f.vy = 0;
  }
}

/** Start a punch if the cooldown allows; returns whether it started */
function startPunch(f: Fighter, cooldown: number): boolean {
  if (f.cooldown > 0) return false;
  f.punch = FIGHT.punchActive;
  f.cooldown = cooldown;
  return true;
}

export function inReach(a: Fighter, b: Fighter): boolean {
  return Math.abs(a.x - b.x) <= FIGHT.reachX && Math.abs(a.y - b.y) <= FIGHT.reachY;
}

export class FightGame extends Game {
  player: Fighter = createFighter(5);
  ai: Fighter = createFighter(13);
  gameOver = false;
  winner: Winner | null = null;

  constructor(grid: LEDGrid) {
    super(grid);
    this.reset();
  }

  reset(): void {
    this.player = createFighter(5);
    this.ai = createFighter(13);
    this.gameOver = false;
    this.winner = null;
  }

  private clampX(f: Fighter): void {
    f.x = Math.max(1, Math.min(this.grid.gridSize - 2, f.x));
  }

  update(dt: number): void {
    if (this.gameOver) return;

    tick(this.player, dt);
    tick(this.ai, dt);
    this.updateAi(dt);
    this.resolveHits();

    if (this.player.hp <= 0) {
      this.gameOver = true;
      this.winner = 'AI';
      playBeep(220, 200);
    } else if (this.ai.hp <= 0) {
      this.gameOver = true;
      this.winner = 'YOU';
      playBeep(880, 120);
    }
  }

  /** Walk toward the player, punch when close, hop now and then */
  updateAi(dt: number): void {
    const ai = this.ai;
    const gap = ai.x - this.player.x;
    if (Math.abs(gap) > 2.5) {
      ai.x += (gap > 0 ? -1 : 1) * FIGHT.aiSpeed * dt;
    } else if (startPunch(ai, FIGHT.aiCooldown)) {
      playBeep(620, 25);
    }

    if (onGround(ai) && Math.random() < FIGHT.aiJumpChance) {
      ai.vy = FIGHT.jumpVelocity;
    }
    this.clampX(ai);
  }

  /** An active punch in reach takes 1 HP and is used up */
  resolveHits(): void {
    if (this.player.punch > 0 && inReach(this.player, this.ai)) {
      this.ai.hp -= 1;
      this.player.punch = 0;
      playBeep(880, 20);
    }
    if (this.ai.punch > 0 && inReach(this.player, this.ai)) {
      this.player.hp -= 1;
      this.ai.punch = 0;
      playBeep(320, 20);
    }
  }

  render(): void {
    const size = this.grid.gridSize;
    this.grid.clear(ARENA);
    this.grid.fillRect(0, FIGHT.groundY + 1, size, 1, GROUND);

    this.drawStick(this.player, PLAYER_COLOR, 1);
    this.drawStick(this.ai, AI_COLOR, -1);

    this.drawHp(1, this.player.hp, PLAYER_COLOR);
    this.drawHp(10, this.ai.hp, AI_COLOR);
    this.grid.renderText('VS', 7, 0, [255, 255, 0]);

    if (this.gameOver && this.winner) {
      this.grid.renderText(this.winner, 2, 7, [255, 255, 0]);
      this.grid.renderText('WINS', 2, 12, [255, 255, 255]);
    }
  }

  /** Nine-pixel bar on row 2 */
  private drawHp(x: number, hp: number, color: Color): void {
    const dim: Color = [
      Math.max(10, Math.floor(color[0] / 5)),
      Math.max(10, Math.floor(color[1] / 5)),
      Math.max(10, Math.floor(color[2] / 5)),
    ];
    this.grid.fillRect(x, 2, 9, 1, dim);
    this.grid.fillRect(x, 2, Math.max(0, Math.min(FIGHT.maxHp, hp)), 1, color);
  }

  /** Six pixels tall, anchored at the feet */
  private drawStick(f: Fighter, color: Color, facing: 1 | -1): void {
    const x = Math.round(f.x);
    const y = Math.round(f.y);
    const armY = y - 3;

    for (let dy = 2; dy <= 5; dy++) {
      this.grid.setPixel(x, y - dy, color);
    }
    this.grid.setPixel(x - 1, y - 1, color);
    this.grid.setPixel(x + 1, y - 1, color);
    this.grid.setPixel(x - 1, y, color);
    this.grid.setPixel(x + 1, y, color);
    this.grid.setPixel(x - 1, armY, color);
    this.grid.setPixel(x + 1, armY, color);

    if (f.punch > 0) {
      this.grid.setPixel(x + 2 * facing, armY, color);
      this.grid.setPixel(x + 3 * facing, armY, color);
    }
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (this.gameOver) {
        if (key === ' ') this.reset();
        continue;
      }
      if (key === 'w' && onGround(this.player)) {
        this.player.vy = FIGHT.jumpVelocity;
        playBeep(520, 25);
      } else if (key === 'j' && startPunch(this.player, FIGHT.playerCooldown)) {
        playBeep(740, 20);
      }
    }

    if (this.gameOver) return;

    const step = FIGHT.walkSpeed * (input.dt || 1 / 60);
    if (isHeld(input, 'a')) this.player.x -= step;
    if (isHeld(input, 'd')) this.player.x += step;
    this.clampX(this.player);
  }
}
