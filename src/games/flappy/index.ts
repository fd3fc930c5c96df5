/**
 * Flappy
 *
 * Keep the bird between the pipes. Space flaps, R restarts after a
 * crash, Esc returns to the menu.
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import type { InputFrame } from '../input';
import { playBeep } from '../sound';

export const FLAPPY = {
  gravity: 18.0,
  flapVelocity: -7.0,
  pipeSpeed: 7.0,
  gapSize: 6,
  birdX: 5,
} as const;

export interface Pipe {
  x: number;
  /** Gap center row */
  gap: number;
  /** Already counted toward the score */
  passed: boolean;
}

const SKY: Color = [0, 0, 25];
const PIPE: Color = [0, 200, 80];
const PIPE_SHADE: Color = [0, 150, 60];
const BIRD: Color = [255, 230, 60];
const BIRD_SHADE: Color = [255, 180, 0];

function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

export class FlappyGame extends Game {
  readonly birdX = FLAPPY.birdX;
  birdY = 0;
  birdVy = 0;
  pipes: Pipe[] = [];
  score = 0;
  gameOver = false;

  constructor(grid: LEDGrid) {
    super(grid);
    this.reset();
  }

  reset(): void {
    const size = this.grid.gridSize;
    this.score = 0;
    this.gameOver = false;
    this.birdY = Math.floor(size / 2);
    this.birdVy = 0;
    this.pipes = [];
    this.spawnPipe(size + 2);
    this.spawnPipe(size + 10);
  }

  private spawnPipe(x: number): void {
    this.pipes.push({ x, gap: randomInt(5, this.grid.gridSize - 6), passed: false });
  }

  flap(): void {
    this.birdVy = FLAPPY.flapVelocity;
    playBeep(660, 30);
  }

  /** Gap rows of a pipe, inclusive */
  gapBounds(pipe: Pipe): { top: number; bottom: number } {
    const half = Math.floor(FLAPPY.gapSize / 2);
    return { top: pipe.gap - half, bottom: pipe.gap + half };
  }

  update(dt: number): void {
    if (this.gameOver) return;
    const size = this.grid.gridSize;

    this.birdVy += FLAPPY.gravity * dt;
    this.birdY += this.birdVy * dt;

    for (const pipe of this.pipes) {
      pipe.x -= FLAPPY.pipeSpeed * dt;
    }
    while (this.pipes.length > 0 && this.pipes[0].x < -2) {
      this.pipes.shift();
      this.spawnPipe(size + 2);
    }

    if (this.birdY < 0 || this.birdY > size - 1) {
      this.die();
      return;
    }

    const by = Math.round(this.birdY);
    for (const pipe of this.pipes) {
      if (Math.round(pipe.x) === this.birdX) {
        const { top, bottom } = this.gapBounds(pipe);
        if (by < top || by > bottom) {
          this.die();
          return;
        }
      }
      if (pipe.x < this.birdX && !pipe.passed) {
        pipe.passed = true;
        this.score++;
        playBeep(880, 45);
      }
    }
  }

  private die(): void {
    this.gameOver = true;
    playBeep(220, 150);
  }

  render(): void {
    const size = this.grid.gridSize;
    this.grid.clear(SKY);

    for (const pipe of this.pipes) {
      const px = Math.round(pipe.x);
      const { top, bottom } = this.gapBounds(pipe);
      for (let y = 0; y < size; y++) {
        if (y < top || y > bottom) {
          this.grid.setPixel(px, y, PIPE);
          this.grid.setPixel(px + 1, y, PIPE_SHADE);
        }
      }
    }

    const by = Math.round(this.birdY);
    this.grid.setPixel(this.birdX, by, BIRD);
    this.grid.setPixel(this.birdX, by + 1, BIRD);
    this.grid.setPixel(this.birdX + 1, by, BIRD_SHADE);
    this.grid.setPixel(this.birdX + 1, by + 1, BIRD_SHADE);

    this.grid.renderText('F', 0, 0, [120, 200, 255]);
    this.grid.renderNumber(this.score, 4, 0, [255, 255, 255]);

    if (this.gameOver) {
      this.grid.renderText('OVER', 2, 7, [255, 255, 0]);
      this.grid.renderText('R', 8, 13, [150, 150, 150]);
    }
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (this.gameOver) {
        if (key === 'r') this.reset();
        continue;
      }
      if (key === ' ') this.flap();
    }
  }
}
