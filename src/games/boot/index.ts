/**
 * Boot Screen
 *
 * Three second startup animation: rainbow rows sweep down, rainbow
 * columns sweep across, then a colored ring expands from the center.
 * Space or Enter skips it.
 */

import { hsvToRgb } from '../../grid/color';
import { Game } from '../base';
import { type InputFrame, wasPressed } from '../input';

export const BOOT_DURATION = 3.0;

export class BootScreen extends Game {
  timer = 0;

  update(dt: number): void {
    this.timer += dt;
    if (this.timer >= BOOT_DURATION) {
      this.running = false;
    }
  }

  render(): void {
    const size = this.grid.gridSize;
    this.grid.clear();
    const progress = this.timer / BOOT_DURATION;

    if (progress < 0.33) {
      const lines = Math.floor((progress / 0.33) * size);
      for (let i = 0; i < lines; i++) {
        this.grid.fillRect(0, i, size, 1, hsvToRgb((i * 20) % 360, 1, 1));
      }
    } else if (progress < 0.66) {
      const lines = Math.floor(((progress - 0.33) / 0.33) * size);
      for (let i = 0; i < lines; i++) {
        this.grid.fillRect(i, 0, 1, size, hsvToRgb((i * 20) % 360, 1, 1));
      }
    } else {
      this.renderRing(Math.min(1, (progress - 0.66) / 0.34));
    }
  }

  private renderRing(stageProgress: number): void {
    const size = this.grid.gridSize;
    const center = Math.floor(size / 2);
    const radius = stageProgress * center * 1.5;

    for (let y = 0; y < size; y++) {
      for (let x = 0; x < size; x++) {
        const dist = Math.hypot(x - center, y - center);
        const off = Math.abs(dist - radius);
        if (off < 3) {
          const hue = (dist * 10 + this.timer * 100) % 360;
          this.grid.setPixel(x, y, hsvToRgb(hue, 1, 1 - off / 3));
        }
      }
    }
  }

  handleInput(input: InputFrame): void {
    if (wasPressed(input, ' ', 'Enter')) {
      this.running = false;
    }
  }
}
