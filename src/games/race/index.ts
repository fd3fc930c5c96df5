/**
 * Race
 *
 * Endless pseudo-3D racer. Left/Right steer, Up/Down change speed,
 * dodge the traffic; every car that drops off the bottom scores.
 * Space restarts after a crash.
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { type SpriteStore, drawSprite } from '../../storage/spriteStore';
import { Game } from '../base';
import { type InputFrame, isHeld } from '../input';
import { playBeep } from '../sound';
import { type RoadShape, roadCenterAt, roadHalfWidth } from './road';

export { roadCenterAt, roadHalfWidth } from './road';

export const RACE = {
  horizon: 4,
  startSpeed: 7.5,
  minSpeed: 3.0,
  maxSpeed: 13.0,
  /** Pixels per second */
  steerSpeed: 9.0,
  accel: 8.0,
  maxCurve: 5.0,
  /** Traffic approaches faster than the road scrolls */
  trafficFactor: 1.4,
  lanes: [-3, 0, 3],
} as const;

/** Sprites that replace the HUD letters when present */
export const HUD_SPRITES = {
  distance: 'hud_race_dist',
  score: 'hud_race_score',
} as const;

export interface TrafficCar {
  /** Offset from the road center */
  x: number;
  y: number;
  passed: boolean;
}

const SKY: Color = [0, 0, 18];
const GRASS: Color = [0, 40, 0];
const ASPHALT: Color = [25, 25, 25];
const EDGE: Color = [220, 220, 220];
const STRIPE: Color = [255, 220, 80];

export class RaceGame extends Game {
  readonly road: RoadShape;
  /** Player offset from the road center */
  playerX = 0;
  speed: number = RACE.startSpeed;
  scroll = 0;
  distance = 0;
  score = 0;
  traffic: TrafficCar[] = [];
  crashed = false;
  private spawnCooldown = 0.4;

  constructor(grid: LEDGrid, private readonly sprites?: SpriteStore) {
    super(grid);
    this.road = { size: grid.gridSize, horizon: RACE.horizon, curve: 0 };
    this.reset();
  }

  reset(): void {
    this.playerX = 0;
    this.road.curve = 0;
    this.speed = RACE.startSpeed;
    this.scroll = 0;
    this.distance = 0;
    this.score = 0;
    this.traffic = [];
    this.spawnCooldown = 0.4;
    this.crashed = false;
  }

  get playerRow(): number {
    return this.grid.gridSize - 3;
  }

  /** Screen position of the player's car (top-left of its 2x2 block) */
  playerPosition(): { x: number; y: number } {
    const y = this.playerRow;
    return { x: Math.round(roadCenterAt(this.road, y) + this.playerX), y };
  }

  spawnTraffic(): void {
    const y = this.road.horizon + 1;
    const hw = roadHalfWidth(this.road, y);
    const lane = RACE.lanes[Math.floor(Math.random() * RACE.lanes.length)];
    const x = Math.max(-hw + 1, Math.min(hw - 1, lane));
    this.traffic.push({ x, y, passed: false });
  }

  /** Seconds until the next car; shorter at higher speed */
  spawnInterval(): number {
    return Math.max(0.35, 1.1 - (this.speed - RACE.minSpeed) * 0.09);
  }

  checkCollision(): boolean {
    const player = this.playerPosition();
    return this.traffic.some(car => {
      const cy = Math.round(car.y);
      if (Math.abs(cy - player.y) > 1) return false;
      const cx = roadCenterAt(this.road, cy) + Math.round(car.x);
      return Math.abs(cx - player.x) <= 1;
    });
  }

  update(dt: number): void {
    if (this.crashed) return;
    const size = this.grid.gridSize;

    this.distance += this.speed * dt;
    this.scroll += this.speed * dt;

    this.road.curve += (Math.random() * 1.4 - 0.7) * dt;
    this.road.curve = Math.max(-RACE.maxCurve, Math.min(RACE.maxCurve, this.road.curve));

    this.spawnCooldown -= dt;
    if (this.spawnCooldown <= 0) {
      this.spawnTraffic();
      this.spawnCooldown = this.spawnInterval();
    }

    for (const car of this.traffic) {
      car.y += this.speed * dt * RACE.trafficFactor;
    }
    this.traffic = this.traffic.filter(car => {
      if (car.y <= size + 1) return true;
      if (car.passed) {
        this.score++;
        playBeep(700, 25);
      }
      return false;
    });

    for (const car of this.traffic) {
      if (!car.passed && car.y > this.playerRow + 0.5) car.passed = true;
    }

    if (this.checkCollision()) {
      this.crashed = true;
      playBeep(220, 180);
    }
  }

  render(): void {
    const size = this.grid.gridSize;
    this.grid.clear(SKY);

    for (let y = this.road.horizon; y < size; y++) {
      const center = roadCenterAt(this.road, y);
      const hw = roadHalfWidth(this.road, y);
      for (let x = 0; x < size; x++) {
        this.grid.setPixel(x, y, x < center - hw || x > center + hw ? GRASS : ASPHALT);
      }
      this.grid.setPixel(center - hw, y, EDGE);
      this.grid.setPixel(center + hw, y, EDGE);
      if (y > this.road.horizon && (Math.trunc(this.scroll * 6) + y) % 4 === 0) {
        this.grid.setPixel(center, y, STRIPE);
      }
    }

    for (const car of this.traffic) {
      const cy = Math.round(car.y);
      if (cy < 0 || cy >= size) continue;
      const cx = roadCenterAt(this.road, cy) + Math.round(car.x);
      this.drawCar(cx, cy, [255, 60, 60], [200, 20, 20]);
    }

    const player = this.playerPosition();
    this.drawCar(player.x, player.y, [60, 200, 255], [20, 120, 200]);

    this.renderHud();

    if (this.crashed) {
      this.grid.renderText('CRASH', 0, 12, [255, 255, 0]);
      this.grid.renderText('SP', 6, 13, [150, 150, 150]);
    }
  }

  private drawCar(x: number, y: number, light: Color, dark: Color): void {
    this.grid.setPixel(x, y, light);
    this.grid.setPixel(x + 1, y, dark);
    this.grid.setPixel(x, y + 1, dark);
    this.grid.setPixel(x + 1, y + 1, light);
  }

  private renderHud(): void {
    const distIcon = this.sprites?.get(HUD_SPRITES.distance);
    if (distIcon) {
      drawSprite(this.grid, distIcon, 0, 0);
    } else {
      this.grid.renderText('R', 0, 0, [120, 200, 255]);
    }
    this.grid.renderNumber(Math.trunc(this.distance) % 100, 4, 0, [255, 255, 255]);

    const scoreIcon = this.sprites?.get(HUD_SPRITES.score);
    if (scoreIcon) {
      drawSprite(this.grid, scoreIcon, 0, 6);
    } else {
      this.grid.renderText('S', 0, 6, STRIPE);
    }
    this.grid.renderNumber(this.score % 100, 4, 6, [255, 255, 255]);
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (this.crashed && key === ' ') this.reset();
    }

    if (this.crashed) return;

    const dt = Math.max(1 / 240, Math.min(1 / 15, input.dt || 1 / 60));
    let steer = 0;
    if (isHeld(input, 'ArrowLeft')) steer -= 1;
    if (isHeld(input, 'ArrowRight')) steer += 1;
    let accel = 0;
    if (isHeld(input, 'ArrowUp')) accel += 1;
    if (isHeld(input, 'ArrowDown')) accel -= 1;

    this.playerX += steer * RACE.steerSpeed * dt;
    this.speed = Math.max(RACE.minSpeed, Math.min(RACE.maxSpeed, this.speed + accel * RACE.accel * dt));

    // Stay on the tarmac: the 2x2 car keeps one pixel inside each edge
    const row = this.playerRow;
    const center = roadCenterAt(this.road, row);
    const hw = roadHalfWidth(this.road, row);
    const px = Math.max(center - hw + 1, Math.min(center + hw - 2, center + this.playerX));
    this.playerX = px - center;
  }
}
