/**
 * Basketball
 *
 * 2v2 half-pixel hoops, first to 11. You control the bright red player:
 * WASD move, Space shoots, P passes. Everyone else is computer driven.
 */

import { type Color, brighten } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import { type InputFrame, isHeld } from '../input';
import { playBeep } from '../sound';
import { updateAi } from './ai';
import {
  type CourtState,
  BASKETBALL,
  advanceFlight,
  clampToCourt,
  createCourt,
  hoopFor,
  passBall,
  resetPositions,
  shoot,
  teammateOf,
} from './court';

export { BASKETBALL, shotProbability } from './court';

const COURT: Color = [20, 50, 20];
const LINE: Color = [255, 255, 255];
const RIM: Color = [255, 100, 0];
const TEAM_COLORS: Record<1 | 2, { bright: Color; dim: Color; label: string }> = {
  1: { bright: [200, 30, 45], dim: [100, 15, 22], label: 'RED' },
  2: { bright: [200, 200, 200], dim: [100, 100, 100], label: 'WHT' },
};

export class BasketballGame extends Game {
  court: CourtState;
  /** Player index under keyboard control */
  readonly controlled = 0;
  private aiTimer = 0;

  constructor(grid: LEDGrid) {
    super(grid);
    this.court = createCourt(grid.gridSize);
  }

  update(dt: number): void {
    const court = this.court;

    if (court.scoreTimer > 0) {
      court.scoreTimer -= dt;
      if (court.scoreTimer <= 0) {
        court.scoreTimer = 0;
        if (!court.gameOver) resetPositions(court);
        court.scoringTeam = null;
      }
      return;
    }

    if (court.gameOver || !court.started) return;

    if (court.flight) {
      const before = court.score[1] + court.score[2];
      advanceFlight(court, dt);
      if (court.score[1] + court.score[2] > before) {
        playBeep(court.gameOver ? 880 : 660, 150);
      }
      if (court.scoreTimer > 0) return;
    }

    this.aiTimer += dt;
    if (this.aiTimer >= BASKETBALL.aiInterval) {
      this.aiTimer = 0;
      updateAi(court, this.controlled);
    }

    if (court.holder !== null && !court.flight) {
      const holder = court.players[court.holder];
      court.ball = { x: holder.x, y: holder.y };
    }
  }

  render(): void {
    const court = this.court;
    const size = this.grid.gridSize;
    this.grid.clear(COURT);

    if (court.scoreTimer > 0) {
      const flash = Math.trunc(court.scoreTimer * 8) % 2 === 1;
      const colors = TEAM_COLORS[court.scoringTeam ?? 2];
      this.grid.clear(flash ? colors.bright : colors.dim);
      this.grid.renderNumber(court.score[1], 3, 8, LINE, 2);
      this.grid.renderNumber(court.score[2], 11, 8, LINE, 2);
      return;
    }

    if (court.gameOver) {
      const colors = TEAM_COLORS[court.winner ?? 2];
      this.grid.clear(colors.bright);
      this.grid.renderText(colors.label, 4, 6, [255, 255, 0], 2);
      this.grid.renderText('WINS', 2, 12, LINE);
      return;
    }

    const mid = Math.floor(size / 2);
    for (let y = 0; y < size; y++) {
      this.grid.setPixel(mid, y, LINE);
    }

    for (const team of [1, 2] as const) {
      const hoop = hoopFor(team, size);
      for (let dy = -1; dy <= 1; dy++) {
        this.grid.setPixel(hoop.x, hoop.y + dy, RIM);
      }
    }

    court.players.forEach((player, i) => {
      const color = i === this.controlled ? brighten(player.color, 50) : player.color;
      this.grid.setPixel(player.x, player.y, color);
    });

    this.grid.setPixel(court.ball.x, court.ball.y, court.flight ? [255, 200, 100] : [255, 140, 0]);

    this.grid.renderNumber(court.score[1], 2, 1, LINE);
    this.grid.renderNumber(court.score[2], 14, 1, LINE);
  }

  handleInput(input: InputFrame): void {
    const court = this.court;

    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (!court.started) {
        if (key === ' ' || key === 'Enter') court.started = true;
        continue;
      }
      if (court.holder !== this.controlled) continue;
      if (key === ' ') {
        shoot(court, this.controlled);
        playBeep(520, 40);
      } else if (key === 'p') {
        passBall(court, this.controlled, teammateOf(this.controlled));
        playBeep(400, 30);
      }
    }

    if (!court.started || court.gameOver) return;

    const player = court.players[this.controlled];
    const speed = BASKETBALL.moveSpeed;
    if (isHeld(input, 'w')) player.y -= speed;
    if (isHeld(input, 's')) player.y += speed;
    if (isHeld(input, 'a')) player.x -= speed;
    if (isHeld(input, 'd')) player.x += speed;
    clampToCourt(court, player);
  }
}
