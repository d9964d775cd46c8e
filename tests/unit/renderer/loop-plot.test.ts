/**
 * Flow-volume loop plot tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PNG } from 'pngjs';
import { Raster, type RGBColor } from '../../../src/renderer/raster';
import {
  LoopPlotRenderer,
  loopBounds,
  renderLoopPlot,
  savePlot,
  PLOT_COLORS,
} from '../../../src/renderer/loop-plot';
import { analyzeWaveform } from '../../../src/signal/pipeline';
import { generateFlatWaveform, generateLinearPhaseWaveform } from '../../../src/signal/synthetic';
import { createSilentLogger } from '../../../src/utils/logger';

const silent = createSilentLogger('test');
const WHITE: RGBColor = { r: 255, g: 255, b: 255 };
const BLACK: RGBColor = { r: 0, g: 0, b: 0 };
const GREEN: RGBColor = { r: 0, g: 255, b: 0 };

function countPixels(png: PNG, color: RGBColor): number {
  let count = 0;
  for (let idx = 0; idx < png.data.length; idx += 4) {
    if (png.data[idx] === color.r && png.data[idx + 1] === color.g && png.data[idx + 2] === color.b) {
      count++;
    }
  }
  return count;
}

describe('Raster', () => {
  it('should fill with the background', () => {
    const raster = new Raster(4, 3, WHITE);
    expect(raster.getPixel(3, 2)).toEqual(WHITE);
  });

  it('should draw lines including both end points', () => {
    const raster = new Raster(4, 3, WHITE);
    raster.drawLine(0, 0, 3, 2, BLACK);

    expect(raster.getPixel(0, 0)).toEqual(BLACK);
    expect(raster.getPixel(3, 2)).toEqual(BLACK);
    expect(raster.getPixel(3, 0)).toEqual(WHITE);
  });

  it('should ignore pixels outside the raster and non-finite lines', () => {
    const raster = new Raster(4, 3, WHITE);
    raster.setPixel(-1, 5, BLACK);
    raster.drawLine(0, 0, NaN, 2, BLACK);

    expect(raster.getPixel(0, 0)).toEqual(WHITE);
  });

  it('should encode a PNG of its size', () => {
    const png = PNG.sync.read(new Raster(5, 7, WHITE).toBuffer());

    expect(png.width).toBe(5);
    expect(png.height).toBe(7);
  });
});

describe('loopBounds', () => {
  it('should cover all finite points and zero flow', () => {
    expect(
      loopBounds([
        [
          [1, 0.5],
          [3, 2],
        ],
        [[NaN, 9]],
      ])
    ).toEqual({ xMin: 1, xMax: 3, yMin: 0, yMax: 2 });
  });

  it('should fall back to a unit range without points', () => {
    expect(loopBounds([])).toEqual({ xMin: 0, xMax: 1, yMin: 0, yMax: 1 });
  });
});

describe('LoopPlotRenderer', () => {
  it('should map data bounds inside the margin', () => {
    const renderer = new LoopPlotRenderer({ width: 100, height: 100, margin: 10 });
    const bounds = { xMin: 0, xMax: 1, yMin: 0, yMax: 1 };

    expect(renderer.toPixel([0, 0], bounds)).toEqual([10, 90]);
    expect(renderer.toPixel([1, 1], bounds)).toEqual([90, 10]);
    expect(renderer.toPixel([0.5, 0.5], bounds)).toEqual([50, 50]);
  });

  it('should draw only the zero-flow axis without breaths', () => {
    const result = analyzeWaveform(generateFlatWaveform(), {}, silent);
    const raster = new LoopPlotRenderer({ width: 200, height: 150, margin: 40 }).render(result);

    expect(raster.getPixel(40, 110)).toEqual(BLACK);
    expect(raster.getPixel(160, 110)).toEqual(BLACK);
    expect(raster.getPixel(100, 50)).toEqual(WHITE);
    expect(raster.getPixel(20, 110)).toEqual(WHITE);
  });

  it('should scale to a reference loop and draw it without breaths', () => {
    const result = analyzeWaveform(generateFlatWaveform(), {}, silent);
    const raster = new LoopPlotRenderer({
      width: 100,
      height: 100,
      margin: 10,
      referenceLoop: { volume: [0, 1, 2], flow: [0, 1, 0] },
    }).render(result);

    // Bounds x 0..2, y 0..1: the peak maps to the top centre
    expect(raster.getPixel(50, 10)).toEqual(PLOT_COLORS.referenceLoop);
    expect(raster.getPixel(10, 90)).toEqual(PLOT_COLORS.referenceLoop);
    expect(raster.getPixel(90, 90)).toEqual(PLOT_COLORS.referenceLoop);
  });
});

describe('renderLoopPlot', () => {
  const result = analyzeWaveform(generateLinearPhaseWaveform(), { intervals: 10 }, silent);

  it('should encode a PNG of the requested size', () => {
    const png = PNG.sync.read(renderLoopPlot(result, { width: 320, height: 240 }));

    expect(png.width).toBe(320);
    expect(png.height).toBe(240);
  });

  it('should draw the averaged volume-bin loop on top', () => {
    const png = PNG.sync.read(renderLoopPlot(result, { width: 320, height: 240 }));
    expect(countPixels(png, PLOT_COLORS.volumeBinAverage)).toBeGreaterThan(0);
  });

  it('should use configured colors', () => {
    const png = PNG.sync.read(renderLoopPlot(result, { width: 320, height: 240, volumeBinColor: GREEN }));

    expect(countPixels(png, GREEN)).toBeGreaterThan(0);
    expect(countPixels(png, PLOT_COLORS.volumeBinAverage)).toBe(0);
  });

  it('should draw a reference loop in its own color', () => {
    const referenceLoop = { volume: [0, 0.25, 0.5], flow: [0, 0.75, 0] };

    const plain = PNG.sync.read(renderLoopPlot(result, { width: 320, height: 240 }));
    const withReference = PNG.sync.read(renderLoopPlot(result, { width: 320, height: 240, referenceLoop }));

    expect(countPixels(plain, PLOT_COLORS.referenceLoop)).toBe(0);
    expect(countPixels(withReference, PLOT_COLORS.referenceLoop)).toBeGreaterThan(0);
  });

  it('should leave out per-breath loops when asked', () => {
    const png = PNG.sync.read(
      renderLoopPlot(result, { width: 320, height: 240, showBreaths: false, breathColor: GREEN })
    );
    expect(countPixels(png, GREEN)).toBe(0);
  });
});

describe('savePlot', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should write the PNG, creating directories', async () => {
    dir = await mkdtemp(join(tmpdir(), 'breath-averager-'));
    const path = join(dir, 'plots', 'loops.png');

    await savePlot(renderLoopPlot(analyzeWaveform(generateFlatWaveform(), {}, silent)), path);

    const written = await readFile(path);
    expect(written.subarray(1, 4).toString('ascii')).toBe('PNG');
  });
});
