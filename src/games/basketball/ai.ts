/**
 * Basketball AI
 *
 * Every computer player picks one behavior per decision tick based on
 * who has the ball: shoot or pass with it, chase it when loose, get open
 * when a teammate has it, guard and try to steal otherwise.
 */

import {
  type CourtState,
  type Player,
  distance,
  hoopFor,
  moveTowards,
  passBall,
  shoot,
  teammateOf,
} from './court';

/** Shoot from inside this distance when nobody is guarding */
const SHOOT_RANGE = 6;
/** An opponent this close counts as pressure */
const PRESSURE_RANGE = 3;
const PICKUP_RANGE = 1.5;
const STEAL_CHANCE = 0.08;

export function updateAi(court: CourtState, controlled: number): void {
  court.players.forEach((player, index) => {
    if (index === controlled) return;

    if (court.holder === index) {
      withBall(court, index, player);
    } else if (court.holder === null) {
      chaseBall(court, index, player);
    } else if (court.players[court.holder].team === player.team) {
      getOpen(court, index, player);
    } else {
      defend(court, index, player);
    }
  });
}

export function isPressured(court: CourtState, player: Player): boolean {
  return court.players.some(p => p.team !== player.team && distance(p, player) < PRESSURE_RANGE);
}

function withBall(court: CourtState, index: number, player: Player): void {
  const hoop = hoopFor(player.team, court.size);
  const pressured = isPressured(court, player);

  if (distance(player, hoop) < SHOOT_RANGE && !pressured) {
    shoot(court, index);
  } else if (pressured) {
    passBall(court, index, teammateOf(index));
  } else {
    moveTowards(court, player, hoop);
  }
}

function chaseBall(court: CourtState, index: number, player: Player): void {
  // Can't catch a ball that's still flying
  if (court.flight) return;
  moveTowards(court, player, court.ball);
  if (distance(player, court.ball) < PICKUP_RANGE) {
    court.holder = index;
  }
}

/** Spread out on the attacking half */
function getOpen(court: CourtState, index: number, player: Player): void {
  const target = {
    x: player.team === 1 ? 12 : 6,
    y: index % 2 === 0 ? 9 : 14,
  };
  moveTowards(court, player, target, 0.45);
}

function defend(court: CourtState, index: number, player: Player): void {
  if (court.holder === null) return;
  const carrier = court.players[court.holder];
  moveTowards(court, player, carrier, 0.5);
  if (distance(player, carrier) < PICKUP_RANGE && Math.random() < STEAL_CHANCE) {
    court.holder = index;
  }
}
