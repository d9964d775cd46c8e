/**
 * RGBA raster backed by pngjs
 *
 * @module renderer/raster
 */

import { PNG } from 'pngjs';

/**
 * 8-bit RGB color
 */
export interface RGBColor {
  r: number;
  g: number;
  b: number;
}

export type Point = readonly [x: number, y: number];

/**
 * Opaque RGBA pixel buffer with line drawing
 */
export class Raster {
  readonly width: number;
  readonly height: number;
  private png: PNG;

  constructor(width: number, height: number, background: RGBColor) {
    this.width = width;
    this.height = height;
    this.png = new PNG({ width, height });
    this.fill(background);
  }

  fill(color: RGBColor): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        this.setPixel(x, y, color);
      }
    }
  }

  /**
   * Set one pixel; coordinates outside the raster are ignored
   */
  setPixel(x: number, y: number, color: RGBColor): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;

    const idx = (this.width * y + x) << 2;
    this.png.data[idx] = color.r;
    this.png.data[idx + 1] = color.g;
    this.png.data[idx + 2] = color.b;
    this.png.data[idx + 3] = 255;
  }

  getPixel(x: number, y: number): RGBColor {
    const idx = (this.width * y + x) << 2;
    return {
      r: this.png.data[idx],
      g: this.png.data[idx + 1],
      b: this.png.data[idx + 2],
    };
  }

  /**
   * Bresenham line between integer pixel coordinates
   */
  drawLine(x0: number, y0: number, x1: number, y1: number, color: RGBColor): void {
    if (![x0, y0, x1, y1].every(Number.isFinite)) return;

    let x = Math.round(x0);
    let y = Math.round(y0);
    const xEnd = Math.round(x1);
    const yEnd = Math.round(y1);

    const dx = Math.abs(xEnd - x);
    const dy = -Math.abs(yEnd - y);
    const sx = x < xEnd ? 1 : -1;
    const sy = y < yEnd ? 1 : -1;
    let err = dx + dy;

    for (;;) {
      this.setPixel(x, y, color);
      if (x === xEnd && y === yEnd) break;

      const e2 = 2 * err;
      if (e2 >= dy) {
        err += dy;
        x += sx;
      }
      if (e2 <= dx) {
        err += dx;
        y += sy;
      }
    }
  }

  /**
   * Connect consecutive points
   */
  drawPolyline(points: readonly Point[], color: RGBColor): void {
    for (let i = 1; i < points.length; i++) {
      const [x0, y0] = points[i - 1];
      const [x1, y1] = points[i];
      this.drawLine(x0, y0, x1, y1, color);
    }
  }

  /**
   * Encode as PNG
   */
  toBuffer(): Buffer {
    return PNG.sync.write(this.png);
  }
}
