import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LEDGrid } from '../../grid/ledGrid';
import { inputFrame } from '../input';
import { setSoundEnabled } from '../sound';
import { PongGame, PONG } from './index';

function startedGame(): PongGame {
  const game = new PongGame(new LEDGrid());
  game.handleInput(inputFrame([' ']));
  game.handleInput(inputFrame([' ']));
  return game;
}

describe('PongGame', () => {
  beforeEach(() => {
    setSoundEnabled(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('mode select', () => {
    it('defaults to one player against the AI', () => {
      const game = new PongGame(new LEDGrid());
      game.handleInput(inputFrame(['Enter']));
      expect(game.modeSelected).toBe(true);
      expect(game.twoPlayer).toBe(false);
      expect(game.started).toBe(false);
    });

    it('picks two players with right arrow', () => {
      const game = new PongGame(new LEDGrid());
      game.handleInput(inputFrame(['ArrowRight', ' ']));
      expect(game.twoPlayer).toBe(true);
    });

    it('does not move the ball before a mode is chosen', () => {
      const game = new PongGame(new LEDGrid());
      game.update(1);
      expect(game.ballX).toBe(9.5);
    });
  });

  it('serves on the second space', () => {
    const game = startedGame();
    expect(game.started).toBe(true);
  });

  it('launches the ball at ball speed', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const game = new PongGame(new LEDGrid());
    game.resetBall();
    // angle 0, direction right
    expect(game.ballVx).toBeCloseTo(PONG.ballSpeed);
    expect(game.ballVy).toBeCloseTo(0);
  });

  describe('spin', () => {
    it('leaves a center hit unchanged', () => {
      const game = new PongGame(new LEDGrid());
      game.ballVy = 0;
      game.addSpin(5, 3);
      expect(game.ballVy).toBe(0);
    });

    it('deflects a low hit downward', () => {
      const game = new PongGame(new LEDGrid());
      game.ballVy = 0;
      game.addSpin(6, 3);
      expect(game.ballVy).toBe(1);
    });

    it('caps vertical speed', () => {
      const game = new PongGame(new LEDGrid());
      game.ballVy = 6;
      game.addSpin(6, 3);
      expect(game.ballVy).toBeCloseTo(PONG.ballSpeed * 0.8);
    });
  });

  it('bounces off the left paddle', () => {
    const game = startedGame();
    game.ballX = 1.5;
    game.ballY = 5;
    game.ballVx = -8;
    game.ballVy = 0;
    game.leftPaddleY = 4;
    game.update(0.01);
    expect(game.ballVx).toBe(8);
    expect(game.ballX).toBe(2);
    expect(game.ballVy).toBe(-1);
  });

  it('scores for the right side when the ball passes the left edge', () => {
    const game = startedGame();
    game.ballX = 0.1;
    game.ballY = 9;
    game.ballVx = -8;
    game.ballVy = 0;
    game.leftPaddleY = 0;
    game.update(0.1);
    expect(game.rightScore).toBe(1);
    expect(game.scoringPlayer).toBe('right');
    expect(game.scoreTimer).toBe(PONG.scoreAnimation);
    expect(game.started).toBe(false);
  });

  it('serves again after the score animation', () => {
    const game = startedGame();
    game.scoreTimer = 1.5;
    game.scoringPlayer = 'left';
    game.update(1.6);
    expect(game.scoringPlayer).toBeNull();
    expect(game.started).toBe(true);
    expect(game.trail).toEqual([]);
  });

  it('ends the match at five points', () => {
    const game = startedGame();
    game.leftScore = 4;
    game.ballX = 18.9;
    game.ballY = 9;
    game.ballVx = 8;
    game.ballVy = 0;
    game.rightPaddleY = 0;
    game.update(0.1);
    expect(game.leftScore).toBe(5);
    expect(game.gameOver).toBe(true);
    expect(game.winner).toBe('left');
  });

  it('moves the AI paddle toward the ball', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const game = startedGame();
    game.rightPaddleY = 0;
    game.ballY = 15;
    game.updateAi(0.1);
    expect(game.rightPaddleY).toBeCloseTo(PONG.paddleSpeed * PONG.aiSpeed * 0.1);
  });

  describe('paddles', () => {
    it('moves the left paddle while w is held', () => {
      const game = startedGame();
      game.leftPaddleY = 5;
      game.handleInput(inputFrame([], { held: new Set(['w']) }));
      expect(game.leftPaddleY).toBeCloseTo(4.2);
    });

    it('stops paddles at the edges', () => {
      const game = startedGame();
      game.leftPaddleY = 14.9;
      game.handleInput(inputFrame([], { held: new Set(['s']) }));
      expect(game.leftPaddleY).toBe(15);
    });

    it('ignores arrows for the right paddle against the AI', () => {
      const game = startedGame();
      game.rightPaddleY = 5;
      game.handleInput(inputFrame([], { held: new Set(['ArrowUp']) }));
      expect(game.rightPaddleY).toBe(5);
    });

    it('moves the right paddle with arrows in two player mode', () => {
      const game = new PongGame(new LEDGrid());
      game.handleInput(inputFrame(['ArrowRight', ' ']));
      game.rightPaddleY = 5;
      game.handleInput(inputFrame([], { held: new Set(['ArrowDown']) }));
      expect(game.rightPaddleY).toBeCloseTo(5.8);
    });
  });

  it('returns to the menu on escape', () => {
    const game = new PongGame(new LEDGrid());
    game.handleInput(inputFrame(['Escape']));
    expect(game.isRunning()).toBe(false);
  });
});
