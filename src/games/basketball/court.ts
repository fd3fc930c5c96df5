/**
 * Basketball court state and rules
 *
 * Pure state plus the moves that change it: shots and passes fly along
 * a straight arc, landing resolves the play. Rendering and input live in
 * the game wrapper, decisions for computer players in ai.ts.
 */

import type { Color } from '../../grid/color';

// ============================================================================
// Types
// ============================================================================

export type Team = 1 | 2;

export interface Point {
  x: number;
  y: number;
}

export interface Player extends Point {
  team: Team;
  color: Color;
}

export type Flight =
  | { kind: 'shot'; from: Point; to: Point; progress: number; duration: number; shooter: number; probability: number }
  | { kind: 'pass'; from: Point; to: Point; progress: number; duration: number; receiver: number };

export interface CourtState {
  size: number;
  /** Indexes 0-1 are team 1, 2-3 team 2 */
  players: Player[];
  ball: Point;
  holder: number | null;
  flight: Flight | null;
  score: Record<Team, number>;
  scoringTeam: Team | null;
  scoreTimer: number;
  started: boolean;
  gameOver: boolean;
  winner: Team | null;
}

// ============================================================================
// Constants
// ============================================================================

export const BASKETBALL = {
  maxScore: 11,
  pointsPerBasket: 2,
  shotDuration: 0.7,
  passDuration: 0.45,
  scoreAnimation: 1.0,
  /** Seconds between computer decisions */
  aiInterval: 0.06,
  /** Player travel per frame while a key is held */
  moveSpeed: 0.6,
} as const;

const START_POSITIONS: readonly Point[] = [
  { x: 3, y: 6 },
  { x: 3, y: 12 },
  { x: 15, y: 6 },
  { x: 15, y: 12 },
];

const PLAYER_COLORS: readonly Color[] = [
  [200, 30, 45],
  [150, 20, 35],
  [200, 200, 200],
  [180, 180, 180],
];

export function hoopFor(team: Team, size: number): Point {
  const y = Math.floor(size / 2);
  return team === 1 ? { x: size - 2, y } : { x: 1, y };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function teammateOf(index: number): number {
  return index ^ 1;
}

// ============================================================================
// State
// ============================================================================

export function createCourt(size: number): CourtState {
  return {
    size,
    players: START_POSITIONS.map((p, i): Player => ({ x: p.x, y: p.y, team: i < 2 ? 1 : 2, color: PLAYER_COLORS[i] })),
    ball: { x: size / 2, y: size / 2 },
    holder: 0,
    flight: null,
    score: { 1: 0, 2: 0 },
    scoringTeam: null,
    scoreTimer: 0,
    started: false,
    gameOver: false,
    winner: null,
  };
}

/** Back to the starting spots; the team that conceded gets the ball */
export function resetPositions(court: CourtState): void {
  court.players.forEach((player, i) => {
    player.x = START_POSITIONS[i].x;
    player.y = START_POSITIONS[i].y;
  });
  court.ball = { x: court.size / 2, y: court.size / 2 };
  court.holder = court.scoringTeam === 1 ? 2 : 0;
  court.flight = null;
}

export function clampToCourt(court: CourtState, player: Player): void {
  player.x = Math.max(1, Math.min(court.size - 2, player.x));
  player.y = Math.max(1, Math.min(court.size - 2, player.y));
}

/** Step a player toward a target; stops within half a pixel */
export function moveTowards(court: CourtState, player: Player, target: Point, speed = 0.55): void {
  const dx = target.x - player.x;
  const dy = target.y - player.y;
  const dist = Math.hypot(dx, dy);
  if (dist <= 0.5) return;
  player.x += (dx / dist) * speed;
  player.y += (dy / dist) * speed;
  clampToCourt(court, player);
}

// ============================================================================
// Plays
// ============================================================================

/**
 * Chance that a shot from the player's current spot goes in.
 * Falls off linearly with distance to the hoop.
 */
export function shotProbability(court: CourtState, shooter: number, hoop: Point): number {
  const dist = distance(court.players[shooter], hoop);
  return Math.max(0.1, Math.min(0.95, 0.95 - 0.07 * dist));
}

export function shoot(court: CourtState, shooter: number): void {
  const player = court.players[shooter];
  const hoop = hoopFor(player.team, court.size);
  court.flight = {
    kind: 'shot',
    from: { x: player.x, y: player.y },
    to: hoop,
    progress: 0,
    duration: BASKETBALL.shotDuration,
    shooter,
    probability: shotProbability(court, shooter, hoop),
  };
  court.holder = null;
}

export function passBall(court: CourtState, from: number, to: number): void {
  const a = court.players[from];
  const b = court.players[to];
  court.flight = {
    kind: 'pass',
    from: { x: a.x, y: a.y },
    to: { x: b.x, y: b.y },
    progress: 0,
    duration: BASKETBALL.passDuration,
    receiver: to,
  };
  court.holder = null;
}

/** Advance the ball in the air; resolves the play when it lands */
export function advanceFlight(court: CourtState, dt: number): void {
  const flight = court.flight;
  if (!flight) return;
  flight.progress += dt / flight.duration;
  if (flight.progress >= 1) {
    court.ball = { x: flight.to.x, y: flight.to.y };
    court.flight = null;
    land(court, flight);
    return;
  }
  const t = flight.progress;
  court.ball = {
    x: flight.from.x + (flight.to.x - flight.from.x) * t,
    y: flight.from.y + (flight.to.y - flight.from.y) * t,
  };
}

function land(court: CourtState, flight: Flight): void {
  if (flight.kind === 'pass') {
    court.holder = flight.receiver;
    return;
  }

  if (Math.random() >= flight.probability) {
    // Rebound: the ball stays loose under the hoop
    court.holder = null;
    return;
  }

  const team = court.players[flight.shooter].team;
  court.score[team] += BASKETBALL.pointsPerBasket;
  court.scoringTeam = team;
  court.scoreTimer = BASKETBALL.scoreAnimation;
  if (court.score[team] >= BASKETBALL.maxScore) {
    court.gameOver = true;
    court.winner = team;
  }
}
