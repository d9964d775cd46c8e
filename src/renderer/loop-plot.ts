/**
 * Flow-Volume Loop Plot
 *
 * Volume on the x axis, flow on the y axis. Each breath's volume-bin loop
 * is drawn in grey, an optional reference loop in green, then the averaged
 * time-bin loop in blue and the averaged volume-bin loop in red, over a
 * zero-flow axis.
 *
 * @module renderer/loop-plot
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type {
  AnalysisResult,
  CompletedAnalysis,
  MethodAggregate,
  ReferenceLoop,
  VolumeBinGrid,
} from '../types';
import { createLogger } from '../utils/logger';
import { Raster, type Point, type RGBColor } from './raster';

const log = createLogger('renderer:loop-plot');

/**
 * Default plot colors
 */
export const PLOT_COLORS = {
  background: { r: 255, g: 255, b: 255 },
  axis: { r: 0, g: 0, b: 0 },
  breath: { r: 190, g: 190, b: 190 },
  referenceLoop: { r: 0, g: 160, b: 0 },
  timeBinAverage: { r: 0, g: 0, b: 255 },
  volumeBinAverage: { r: 255, g: 0, b: 0 },
} as const satisfies Record<string, RGBColor>;

/**
 * Loop plot configuration
 */
export interface LoopPlotOptions {
  /** Width in pixels (default: 800) */
  width?: number;
  /** Height in pixels (default: 600) */
  height?: number;
  /** Blank border in pixels (default: 40) */
  margin?: number;
  /** Draw each breath's loop (default: true) */
  showBreaths?: boolean;
  /** Loop drawn under the averages, such as a maximal manoeuvre */
  referenceLoop?: ReferenceLoop;
  backgroundColor?: RGBColor;
  axisColor?: RGBColor;
  breathColor?: RGBColor;
  referenceLoopColor?: RGBColor;
  timeBinColor?: RGBColor;
  volumeBinColor?: RGBColor;
}

/** Volume/flow pairs of one loop */
type Loop = Point[];

interface Layer {
  loop: Loop;
  color: RGBColor;
}

interface Bounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

function gridLoop(grid: { inspiration: VolumeBinGrid; expiration: VolumeBinGrid }): Loop {
  return [grid.inspiration, grid.expiration].flatMap(g =>
    g.volume.map((v, j): Point => [v, g.flow[j]])
  );
}

function referencePoints(reference: ReferenceLoop): Loop {
  return reference.volume.map((v, j): Point => [v, reference.flow[j]]);
}

function aggregateLoop(aggregate: MethodAggregate): Loop {
  return [aggregate.inspiration, aggregate.expiration].flatMap(p =>
    p.volume.map((r, j): Point => [r.mean, p.flow[j].mean])
  );
}

/**
 * Data bounds of all loops; the flow range always includes zero
 */
export function loopBounds(loops: readonly Loop[]): Bounds {
  const bounds: Bounds = { xMin: Infinity, xMax: -Infinity, yMin: 0, yMax: 0 };

  for (const loop of loops) {
    for (const [x, y] of loop) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
      bounds.xMin = Math.min(bounds.xMin, x);
      bounds.xMax = Math.max(bounds.xMax, x);
      bounds.yMin = Math.min(bounds.yMin, y);
      bounds.yMax = Math.max(bounds.yMax, y);
    }
  }

  if (!Number.isFinite(bounds.xMin)) {
    bounds.xMin = 0;
    bounds.xMax = 1;
  }
  if (bounds.xMax === bounds.xMin) bounds.xMax = bounds.xMin + 1;
  if (bounds.yMax === bounds.yMin) bounds.yMax = bounds.yMin + 1;

  return bounds;
}

/**
 * Flow-volume loop renderer
 */
export class LoopPlotRenderer {
  private config: Required<Omit<LoopPlotOptions, 'referenceLoop'>>;
  private referenceLoop?: ReferenceLoop;

  constructor(options: LoopPlotOptions = {}) {
    this.config = {
      width: options.width ?? 800,
      height: options.height ?? 600,
      margin: options.margin ?? 40,
      showBreaths: options.showBreaths ?? true,
      backgroundColor: options.backgroundColor ?? PLOT_COLORS.background,
      axisColor: options.axisColor ?? PLOT_COLORS.axis,
      breathColor: options.breathColor ?? PLOT_COLORS.breath,
      referenceLoopColor: options.referenceLoopColor ?? PLOT_COLORS.referenceLoop,
      timeBinColor: options.timeBinColor ?? PLOT_COLORS.timeBinAverage,
      volumeBinColor: options.volumeBinColor ?? PLOT_COLORS.volumeBinAverage,
    };
    this.referenceLoop = options.referenceLoop;
  }

  /**
   * Map data coordinates to pixels
   */
  toPixel(point: Point, bounds: Bounds): Point {
    const { width, height, margin } = this.config;
    const [x, y] = point;
    const px = margin + ((x - bounds.xMin) / (bounds.xMax - bounds.xMin)) * (width - 2 * margin);
    const py = height - margin - ((y - bounds.yMin) / (bounds.yMax - bounds.yMin)) * (height - 2 * margin);
    return [Math.round(px), Math.round(py)];
  }

  render(result: AnalysisResult): Raster {
    const { width, height, margin } = this.config;
    const raster = new Raster(width, height, this.config.backgroundColor);

    const layers = this.layers(result);
    const bounds = loopBounds(layers.map(l => l.loop));

    // Zero-flow axis
    const [, axisY] = this.toPixel([bounds.xMin, 0], bounds);
    raster.drawLine(margin, axisY, width - margin, axisY, this.config.axisColor);

    for (const layer of layers) {
      raster.drawPolyline(
        layer.loop.map(p => this.toPixel(p, bounds)),
        layer.color
      );
    }

    return raster;
  }

  private layers(result: AnalysisResult): Layer[] {
    const layers: Layer[] = [];
    const complete = result.status === 'complete';

    if (complete && this.config.showBreaths) {
      for (const grids of result.volumeBins.breaths) {
        layers.push({ loop: gridLoop(grids), color: this.config.breathColor });
      }
    }

    if (this.referenceLoop) {
      layers.push({ loop: referencePoints(this.referenceLoop), color: this.config.referenceLoopColor });
    }

    if (complete) layers.push(...this.averageLayers(result));

    return layers;
  }

  private averageLayers(result: CompletedAnalysis): Layer[] {
    return [
      { loop: aggregateLoop(result.aggregates.timeBins), color: this.config.timeBinColor },
      { loop: aggregateLoop(result.aggregates.volumeBins), color: this.config.volumeBinColor },
    ];
  }
}

/**
 * Render a result's flow-volume loops to PNG
 */
export function renderLoopPlot(result: AnalysisResult, options?: LoopPlotOptions): Buffer {
  const renderer = new LoopPlotRenderer(options);
  return renderer.render(result).toBuffer();
}

/**
 * Write a rendered plot, creating the directory if needed
 */
export async function savePlot(png: Buffer, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, png);
  log.debug('Plot saved', { path, bytes: png.length });
}
