/**
 * Vacation
 *
 * A small gallery of animated scenes to look at. Left/Right change the
 * scene, Space pauses the animation.
 */

import { type Color, hsvToRgb } from '../../grid/color';
import { drawArrow } from '../../grid/draw';
import type { LEDGrid } from '../../grid/ledGrid';
import { Game } from '../base';
import type { InputFrame } from '../input';
import { playBeep } from '../sound';

export interface Scene {
  name: string;
  draw: (grid: LEDGrid, t: number, animate: boolean) => void;
}

function drawBeach(grid: LEDGrid, t: number, animate: boolean): void {
  for (let y = 0; y < 6; y++) {
    grid.fillRect(0, y, 19, 1, [20, 60 + y * 10, 120 + y * 10]);
  }

  const sun: Color = [255, 220, 80];
  for (const [dx, dy] of [[0, 0], [-1, 0], [1, 0], [0, -1], [0, 1]]) {
    grid.setPixel(14 + dx, 2 + dy, sun);
  }

  for (let y = 6; y < 13; y++) {
    grid.fillRect(0, y, 19, 1, [0, 80 + (y - 6) * 8, 180]);
  }

  if (animate) {
    const phase = t * 3.0;
    for (let x = 0; x < 19; x++) {
      grid.setPixel(x, 8 + Math.round((Math.sin(phase + x * 0.6) + 1) * 0.8), [120, 220, 255]);
    }
  }

  grid.fillRect(0, 13, 19, 6, [180, 140, 70]);

  // Palm
  grid.fillRect(3, 9, 1, 7, [40, 30, 20]);
  for (const [dx, y] of [[-2, 8], [-1, 8], [0, 8], [1, 8], [2, 8], [-1, 9], [1, 9]]) {
    grid.setPixel(3 + dx, y, [20, 100, 40]);
  }
}

function drawFalls(grid: LEDGrid, t: number, animate: boolean): void {
  for (let y = 0; y < 6; y++) {
    grid.fillRect(0, y, 19, 1, [10, 20 + y * 8, 60 + y * 12]);
  }

  for (let x = 0; x < 19; x++) {
    const peak = 5 - Math.trunc(Math.abs(x - 6) * 0.6);
    for (let y = Math.max(0, peak); y < 7; y++) {
      grid.setPixel(x, y, [50, 60, 70]);
    }
  }

  const fallX = 10;
  for (let y = 4; y < 15; y++) {
    const shade = animate ? 180 + Math.trunc((Math.sin(t * 6 + y) + 1) * 40) : 200 + (y % 2) * 30;
    grid.setPixel(fallX, y, [80, shade, 255]);
    grid.setPixel(fallX + 1, y, [60, shade - 20, 230]);
  }

  grid.fillRect(0, 15, 19, 4, [0, 80, 140]);

  if (animate) {
    for (let x = 0; x < 19; x += 2) {
      const hue = (t * 80 + x * 15) % 360;
      grid.setPixel(x, x % 3 === 0 ? 17 : 16, hsvToRgb(hue, 0.4, 0.8));
    }
  }

  for (const [x, y] of [[2, 17], [3, 18], [15, 17], [16, 18]]) {
    grid.setPixel(x, y, [70, 70, 70]);
  }
}

export const SCENES: readonly Scene[] = [
  { name: 'BEACH', draw: drawBeach },
  { name: 'FALLS', draw: drawFalls },
];

export class VacationGame extends Game {
  sceneIndex = 0;
  animate = true;
  t = 0;

  get scene(): Scene {
    return SCENES[this.sceneIndex];
  }

  update(dt: number): void {
    if (this.animate) this.t += dt;
  }

  render(): void {
    this.grid.clear();
    this.scene.draw(this.grid, this.t, this.animate);

    this.grid.renderText('VACAY', 1, 0, [120, 200, 255]);
    this.grid.renderText(this.scene.name, 1, 6, [255, 255, 0]);

    drawArrow(this.grid, 1, 10, 'left', [130, 130, 130]);
    drawArrow(this.grid, 17, 10, 'right', [130, 130, 130]);
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (key === 'ArrowLeft') {
        this.sceneIndex = (this.sceneIndex + SCENES.length - 1) % SCENES.length;
        playBeep(420, 35);
      } else if (key === 'ArrowRight') {
        this.sceneIndex = (this.sceneIndex + 1) % SCENES.length;
        playBeep(520, 35);
      } else if (key === ' ') {
        this.animate = !this.animate;
        playBeep(660, 50);
      }
    }
  }
}
