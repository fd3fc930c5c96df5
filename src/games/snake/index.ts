/**
 * Snake
 *
 * Classic snake on the 19x19 grid: eat food to grow, hitting a wall or
 * yourself ends the run. Arrows steer, Space restarts, Esc returns to
 * the menu.
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import type { InputFrame } from '../input';
import { playBeep } from '../sound';

export interface Point {
  x: number;
  y: number;
}

/** Moves per second */
export const SNAKE_TICK_RATE = 8.0;

const HEAD_COLOR: Color = [0, 255, 0];
const BODY_COLOR: Color = [0, 150, 0];
const FOOD_COLOR: Color = [255, 60, 60];

const DIRECTIONS: Record<string, Point> = {
  ArrowUp: { x: 0, y: -1 },
  ArrowDown: { x: 0, y: 1 },
  ArrowLeft: { x: -1, y: 0 },
  ArrowRight: { x: 1, y: 0 },
};

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export class SnakeGame extends Game {
  /** Tail first, head last */
  snake: Point[] = [];
  direction: Point = { x: 1, y: 0 };
  nextDirection: Point = { x: 1, y: 0 };
  food: Point = { x: 0, y: 0 };
  score = 0;
  gameOver = false;
  private accumulator = 0;

  constructor(grid: LEDGrid) {
    super(grid);
    this.reset();
  }

  reset(): void {
    const c = Math.floor(this.grid.gridSize / 2);
    this.snake = [{ x: c - 1, y: c }, { x: c, y: c }, { x: c + 1, y: c }];
    this.direction = { x: 1, y: 0 };
    this.nextDirection = { x: 1, y: 0 };
    this.score = 0;
    this.gameOver = false;
    this.accumulator = 0;
    this.spawnFood();
  }

  get head(): Point {
    return this.snake[this.snake.length - 1];
  }

  /** Place food on a random free cell; (0,0) when the board is full */
  spawnFood(): void {
    const size = this.grid.gridSize;
    const free: Point[] = [];
    for (let y = 0; y < size; y++) {
      for (let x = 0; x < size; x++) {
        if (!this.snake.some(s => s.x === x && s.y === y)) free.push({ x, y });
      }
    }
    this.food = free.length > 0 ? free[Math.floor(Math.random() * free.length)] : { x: 0, y: 0 };
  }

  /** Buffer a turn; reversing onto the current direction is ignored */
  setNextDirection(dir: Point): void {
    if (this.direction.x === -dir.x && this.direction.y === -dir.y) return;
    this.nextDirection = dir;
    playBeep(520, 20);
  }

  update(dt: number): void {
    if (this.gameOver) return;
    this.accumulator += dt;
    const step = 1 / SNAKE_TICK_RATE;
    while (this.accumulator >= step && !this.gameOver) {
      this.accumulator -= step;
      this.step();
    }
  }

  /** Advance one cell */
  step(): void {
    this.direction = this.nextDirection;
    const size = this.grid.gridSize;
    const next: Point = { x: this.head.x + this.direction.x, y: this.head.y + this.direction.y };

    if (next.x < 0 || next.x >= size || next.y < 0 || next.y >= size) {
      this.die();
      return;
    }

    const willGrow = samePoint(next, this.food);
    const tail = this.snake[0];
    const hitsBody = this.snake.some(s => samePoint(s, next));
    // The tail cell frees up this step unless the snake grows
    if (hitsBody && !(samePoint(next, tail) && !willGrow)) {
      this.die();
      return;
    }

    this.snake.push(next);
    if (willGrow) {
      this.score++;
      playBeep(880, 60);
      this.spawnFood();
    } else {
      this.snake.shift();
    }
  }

  private die(): void {
    this.gameOver = true;
    playBeep(220, 150);
  }

  render(): void {
    this.grid.clear();
    this.grid.setPixel(this.food.x, this.food.y, FOOD_COLOR);

    this.snake.forEach((s, i) => {
      this.grid.setPixel(s.x, s.y, i === this.snake.length - 1 ? HEAD_COLOR : BODY_COLOR);
    });

    this.grid.renderText('S', 0, 0, [120, 255, 120]);
    this.grid.renderNumber(this.score, 4, 0, [255, 255, 255]);

    if (this.gameOver) {
      this.grid.renderText('OVER', 2, 7, [255, 255, 0]);
      this.grid.renderText('SP', 6, 13, [150, 150, 150]);
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
      const dir = DIRECTIONS[key];
      if (dir) this.setNextDirection(dir);
    }
  }
}
