/**
 * Renderer exports
 * @module renderer
 */

export { Raster, type RGBColor, type Point } from './raster';

export {
  LoopPlotRenderer,
  renderLoopPlot,
  savePlot,
  loopBounds,
  PLOT_COLORS,
  type LoopPlotOptions,
} from './loop-plot';
