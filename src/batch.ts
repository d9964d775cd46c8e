/**
 * Batch analysis of waveform files
 *
 * Each file is loaded, analyzed and written independently; one failure
 * does not stop the rest. Cancellation is checked between files.
 *
 * @module batch
 */

import { basename, dirname, extname, join } from 'path';
import type { AnalysisConfigInput } from './types';
import type { CSVExportOptions } from './export/csv';
import { buildAnalysisTables } from './export/tables';
import { writeResultTables } from './export/writer';
import { renderLoopPlot, savePlot, type LoopPlotOptions } from './renderer/loop-plot';
import { loadWaveformFile } from './signal/loader/csv';
import { analyzeWaveform } from './signal/pipeline';
import { createLogger, type Logger } from './utils/logger';

const log = createLogger('batch');

/**
 * Batch options
 */
export interface BatchOptions {
  /** Output directory (default: beside each input file) */
  outputDir?: string;
  config?: AnalysisConfigInput;
  /** Number formatting and `#` metadata lines of the written tables */
  csv?: CSVExportOptions;
  /** Also write `<base>_loops.png` */
  plot?: boolean | LoopPlotOptions;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Outcome for one input file
 */
export type FileOutcome =
  | { file: string; status: 'complete'; breaths: number; discarded: number; outputs: string[] }
  | { file: string; status: 'no-breaths'; discarded: number; outputs: string[] }
  | { file: string; status: 'failed'; error: string }
  | { file: string; status: 'cancelled' };

export type FileStatus = FileOutcome['status'];

export interface BatchReport {
  outcomes: FileOutcome[];
  counts: Record<FileStatus, number>;
}

/**
 * Analyze one file and write its tables (and plot)
 */
export async function processWaveformFile(
  file: string,
  options: BatchOptions = {}
): Promise<FileOutcome> {
  const logger = (options.logger ?? log).withContext({ file });

  try {
    const waveform = await loadWaveformFile(file);
    const result = analyzeWaveform(waveform, options.config, logger);

    const outputDir = options.outputDir ?? dirname(file);
    const baseName = basename(file, extname(file));
    const outputs = await writeResultTables(buildAnalysisTables(result), outputDir, baseName, {
      ...options.csv,
      metadata: { source: basename(file), ...options.csv?.metadata },
    });

    if (options.plot) {
      const plotPath = join(outputDir, `${baseName}_loops.png`);
      const plotOptions = typeof options.plot === 'object' ? options.plot : {};
      await savePlot(renderLoopPlot(result, plotOptions), plotPath);
      outputs.push(plotPath);
    }

    if (result.status === 'no-breaths') {
      return { file, status: 'no-breaths', discarded: result.discarded.length, outputs };
    }

    return {
      file,
      status: 'complete',
      breaths: result.breaths.length,
      discarded: result.discarded.length,
      outputs,
    };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('File failed', err);
    return { file, status: 'failed', error: err.message };
  }
}

/**
 * Process files in order; once `signal` aborts, the remaining files are
 * reported as cancelled.
 */
export async function processWaveformFiles(
  files: readonly string[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  const outcomes: FileOutcome[] = [];

  for (const file of files) {
    if (options.signal?.aborted) {
      outcomes.push({ file, status: 'cancelled' });
      continue;
    }
    outcomes.push(await processWaveformFile(file, options));
  }

  const counts: Record<FileStatus, number> = {
    complete: 0,
    'no-breaths': 0,
    failed: 0,
    cancelled: 0,
  };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }

  (options.logger ?? log).info('Batch finished', { files: files.length, ...counts });
  return { outcomes, counts };
}
