/**
 * Pong
 *
 * Classic Pong on the LED grid with a rainbow ball trail.
 * Pick 1P (vs AI) or 2P with Left/Right, serve with Space.
 * W/S move the left paddle, Up/Down the right one in 2P.
 */

import { type Color, hsvToRgb } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import { type InputFrame, isHeld } from '../input';
import { playBeep } from '../sound';

export const PONG = {
  paddleHeight: 4,
  paddleSpeed: 12.0,
  ballSpeed: 8.0,
  maxScore: 5,
  trailLength: 5,
  aiSpeed: 0.8,
  /** Paddle travel per frame while a key is held */
  keySpeed: 0.8,
  scoreAnimation: 1.5,
} as const;

export type Side = 'left' | 'right';

const LEFT_COLOR: Color = [0, 255, 255];
const RIGHT_COLOR: Color = [255, 0, 255];

export class PongGame extends Game {
  modeSelected = false;
  /** 0 = vs AI, 1 = two players */
  modeIndex = 0;
  twoPlayer = false;

  leftPaddleY: number;
  rightPaddleY: number;

  ballX: number;
  ballY: number;
  ballVx = 0;
  ballVy = 0;
  trail: Array<[number, number]> = [];

  leftScore = 0;
  rightScore = 0;
  scoreTimer = 0;
  scoringPlayer: Side | null = null;

  started = false;
  gameOver = false;
  winner: Side | null = null;

  private elapsed = 0;

  constructor(grid: LEDGrid) {
    super(grid);
    const mid = Math.floor((grid.gridSize - PONG.paddleHeight) / 2);
    this.leftPaddleY = mid;
    this.rightPaddleY = mid;
    this.ballX = grid.gridSize / 2;
    this.ballY = grid.gridSize / 2;
  }

  /** Center the ball and launch it within 45 degrees of horizontal */
  resetBall(): void {
    this.ballX = this.grid.gridSize / 2;
    this.ballY = this.grid.gridSize / 2;
    const angle = (Math.random() * 2 - 1) * (Math.PI / 4);
    const direction = Math.random() < 0.5 ? -1 : 1;
    this.ballVx = Math.cos(angle) * PONG.ballSpeed * direction;
    this.ballVy = Math.sin(angle) * PONG.ballSpeed;
    this.trail = [];
  }

  update(dt: number): void {
    this.elapsed += dt;
    if (!this.modeSelected) return;

    if (this.scoreTimer > 0) {
      this.scoreTimer -= dt;
      if (this.scoreTimer <= 0) {
        this.scoringPlayer = null;
        if (!this.gameOver) {
          this.resetBall();
          this.started = true;
        }
      }
      return;
    }

    if (this.gameOver || !this.started) return;

    const size = this.grid.gridSize;
    this.ballX += this.ballVx * dt;
    this.ballY += this.ballVy * dt;

    this.trail.push([Math.trunc(this.ballX), Math.trunc(this.ballY)]);
    if (this.trail.length > PONG.trailLength) this.trail.shift();

    if (this.ballY <= 0 || this.ballY >= size - 1) {
      this.ballVy *= -1;
      this.ballY = Math.max(0, Math.min(size - 1, this.ballY));
      playBeep(330, 50);
    }

    const bx = Math.trunc(this.ballX);
    const by = Math.trunc(this.ballY);

    if (bx <= 1 && this.onPaddle(by, this.leftPaddleY)) {
      this.ballVx = Math.abs(this.ballVx);
      this.ballX = 2;
      this.addSpin(by, this.leftPaddleY);
      playBeep(440, 50);
    }

    if (bx >= size - 2 && this.onPaddle(by, this.rightPaddleY)) {
      this.ballVx = -Math.abs(this.ballVx);
      this.ballX = size - 3;
      this.addSpin(by, this.rightPaddleY);
      playBeep(440, 50);
    }

    if (this.ballX < 0) {
      this.score('right');
    } else if (this.ballX >= size) {
      this.score('left');
    }

    if (!this.twoPlayer && this.started && !this.gameOver && this.scoreTimer <= 0) {
      this.updateAi(dt);
    }
  }

  private onPaddle(by: number, paddleY: number): boolean {
    return paddleY <= by && by < paddleY + PONG.paddleHeight;
  }

  /** Deflect by where the ball met the paddle */
  addSpin(ballY: number, paddleY: number): void {
    const offset = (ballY - paddleY) / PONG.paddleHeight - 0.5;
    this.ballVy += offset * PONG.ballSpeed * 0.5;
    const maxVy = PONG.ballSpeed * 0.8;
    this.ballVy = Math.max(-maxVy, Math.min(maxVy, this.ballVy));
  }

  private score(side: Side): void {
    if (side === 'left') {
      this.leftScore++;
    } else {
      this.rightScore++;
    }
    this.scoringPlayer = side;
    this.scoreTimer = PONG.scoreAnimation;
    this.started = false;
    playBeep(220, 200);

    const points = side === 'left' ? this.leftScore : this.rightScore;
    if (points >= PONG.maxScore) {
      this.gameOver = true;
      this.winner = side;
      playBeep(880, 300);
    }
  }

  /** Right paddle follows the ball with a little jitter */
  updateAi(dt: number): void {
    const target = this.ballY - PONG.paddleHeight / 2 + (Math.random() * 0.6 - 0.3);
    const diff = target - this.rightPaddleY;
    const step = Math.max(0, PONG.paddleSpeed * PONG.aiSpeed * dt);
    if (Math.abs(diff) <= 0.25) return;
    if (diff > 0) {
      this.rightPaddleY = Math.min(this.grid.gridSize - PONG.paddleHeight, this.rightPaddleY + step);
    } else {
      this.rightPaddleY = Math.max(0, this.rightPaddleY - step);
    }
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  render(): void {
    this.grid.clear();

    if (!this.modeSelected) {
      this.renderModeSelect();
      return;
    }
    if (this.scoreTimer > 0) {
      this.renderScoreFlash();
      return;
    }
    if (this.gameOver) {
      this.renderGameOver();
      return;
    }

    const size = this.grid.gridSize;
    this.renderPaddle(0, Math.trunc(this.leftPaddleY), LEFT_COLOR);
    this.renderPaddle(size - 1, Math.trunc(this.rightPaddleY), RIGHT_COLOR);

    this.trail.forEach(([tx, ty], i) => {
      const intensity = (i + 1) / this.trail.length;
      const hue = (this.elapsed * 100 + i * 30) % 360;
      this.grid.setPixel(tx, ty, hsvToRgb(hue, 1.0, intensity * 0.6));
    });

    this.grid.setPixel(Math.trunc(this.ballX), Math.trunc(this.ballY), [255, 255, 255]);

    this.grid.renderNumber(this.leftScore, 3, 1, LEFT_COLOR);
    this.grid.renderNumber(this.rightScore, 13, 1, RIGHT_COLOR);

    const mid = Math.floor(size / 2);
    for (let y = 0; y < size; y += 2) {
      this.grid.setPixel(mid, y, [50, 50, 50]);
    }
  }

  private renderPaddle(x: number, y: number, color: Color): void {
    for (let i = 0; i < PONG.paddleHeight; i++) {
      this.grid.setPixel(x, y + i, color);
    }
  }

  private renderModeSelect(): void {
    const on: Color = [0, 255, 0];
    const off: Color = [100, 100, 100];
    this.grid.renderText('MODE', 4, 2, [255, 255, 0]);
    this.grid.renderText('1P', 3, 8, this.modeIndex === 0 ? on : off);
    this.grid.renderText('2P', 11, 8, this.modeIndex === 1 ? on : off);
    this.grid.renderText('LR', 5, 14, [150, 150, 150]);
  }

  private renderScoreFlash(): void {
    const size = this.grid.gridSize;
    const half = Math.floor(size / 2);
    const flash = Math.trunc(this.scoreTimer * 10) % 2 === 1;

    if (this.scoringPlayer === 'left') {
      const color: Color = flash ? [0, 255, 255] : [0, 150, 150];
      for (let x = 0; x < half; x++) {
        const k = 1 - x / half;
        for (let y = 0; y < size; y++) {
          this.grid.setPixel(x, y, [Math.trunc(color[0] * k), Math.trunc(color[1] * k), Math.trunc(color[2] * k)]);
        }
      }
    } else {
      const color: Color = flash ? [255, 0, 255] : [150, 0, 150];
      for (let x = half; x < size; x++) {
        const k = (x - half) / half;
        for (let y = 0; y < size; y++) {
          this.grid.setPixel(x, y, [Math.trunc(color[0] * k), Math.trunc(color[1] * k), Math.trunc(color[2] * k)]);
        }
      }
    }

    this.grid.renderNumber(this.leftScore, 3, 8, [255, 255, 255], 2);
    this.grid.renderNumber(this.rightScore, 11, 8, [255, 255, 255], 2);
  }

  private renderGameOver(): void {
    const size = this.grid.gridSize;
    for (let y = 0; y < size; y++) {
      for (let x = 0; x < size; x++) {
        const hue = (x * 10 + y * 10 + this.elapsed * 100) % 360;
        this.grid.setPixel(x, y, hsvToRgb(hue, 0.5, 0.3));
      }
    }
    if (this.winner === 'left') {
      this.grid.renderText('P1', 5, 6, LEFT_COLOR, 2);
    } else {
      this.grid.renderText('P2', 5, 6, RIGHT_COLOR, 2);
    }
    this.grid.renderText('WINS', 2, 12, [255, 255, 0]);
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (!this.modeSelected) {
        if (key === 'ArrowLeft') {
          this.modeIndex = 0;
        } else if (key === 'ArrowRight') {
          this.modeIndex = 1;
        } else if (key === ' ' || key === 'Enter') {
          this.modeSelected = true;
          this.twoPlayer = this.modeIndex === 1;
          this.resetBall();
        }
      } else if (!this.started && !this.gameOver && this.scoreTimer <= 0) {
        if (key === ' ' || key === 'Enter') this.started = true;
      }

      if (key === 'Escape') {
        this.running = false;
        return;
      }
    }

    if (!this.modeSelected || this.gameOver) return;

    const maxY = this.grid.gridSize - PONG.paddleHeight;
    if (isHeld(input, 'w')) this.leftPaddleY = Math.max(0, this.leftPaddleY - PONG.keySpeed);
    if (isHeld(input, 's')) this.leftPaddleY = Math.min(maxY, this.leftPaddleY + PONG.keySpeed);

    if (this.twoPlayer) {
      if (isHeld(input, 'ArrowUp')) this.rightPaddleY = Math.max(0, this.rightPaddleY - PONG.keySpeed);
      if (isHeld(input, 'ArrowDown')) this.rightPaddleY = Math.min(maxY, this.rightPaddleY + PONG.keySpeed);
    }
  }
}
