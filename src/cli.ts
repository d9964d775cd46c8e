/**
 * breath-averager command line
 *
 * Usage:
 *   breath-averager analyze recording.csv --intervals 100 --plot
 *   breath-averager format export.csv
 *   breath-averager compare s101.csv s102.csv --tlc 5.8 6.1
 *   breath-averager demo --out ./demo
 *
 * @module cli
 */

import 'dotenv/config';
import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import type { AnalysisConfigInput } from './types';
import { processWaveformFile, processWaveformFiles } from './batch';
import { compareSubjectFiles } from './comparison/files';
import { parseCrossingDirection, parseMeanShift } from './config/analysis-config';
import { COMPARISON_LAYOUTS, type ComparisonLayout } from './config/defaults';
import { exportTableToCSV } from './export/csv';
import { formatRawExportFile, formattedTable } from './signal/loader/raw-export';
import { loadReferenceLoopFile } from './signal/loader/reference-loop';
import { generateBreathingWaveform } from './signal/synthetic';
import {
  configureFromEnvironment,
  configureLogger,
  createLogger,
  parseLogLevel,
  setLogLevel,
} from './utils/logger';
import { ValidationError } from './utils/validation';
import { VERSION } from './index';

const log = createLogger('cli');

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

function parseDecimals(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 20) {
    throw new InvalidArgumentError('Must be an integer from 0 to 20.');
  }
  return parsed;
}

function collectNumber(value: string, previous: number[] = []): number[] {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('TLC values must be positive numbers.');
  }
  return [...previous, parsed];
}

function parseLayout(value: string): ComparisonLayout {
  const layout = COMPARISON_LAYOUTS.find(l => l === value);
  if (!layout) {
    throw new InvalidArgumentError(`Must be one of ${COMPARISON_LAYOUTS.join(', ')}.`);
  }
  return layout;
}

/** Wrap a config parser so commander reports its error */
function asArgumentParser<T>(parse: (value: string) => T): (value: string) => T {
  return value => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

interface AnalyzeOptions {
  intervals?: number;
  inspirationStart?: AnalysisConfigInput['inspirationStart'];
  meanShift?: AnalysisConfigInput['meanShift'];
  out?: string;
  plot?: boolean;
  maxLoop?: string;
  decimals?: number;
  metadata?: boolean;
}

/**
 * Build the command tree
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('breath-averager')
    .description('Segment respiratory flow/volume recordings into breaths and average them')
    .version(VERSION)
    .option('-l, --log-level <level>', 'Log level (debug, info, warn, error, silent)')
    .option('--json-logs', 'Write log entries as JSON')
    .hook('preAction', command => {
      const opts = command.opts<{ logLevel?: string; jsonLogs?: boolean }>();
      configureFromEnvironment();
      if (opts.logLevel) setLogLevel(parseLogLevel(opts.logLevel));
      if (opts.jsonLogs) configureLogger({ jsonOutput: true });
    });

  program
    .command('analyze')
    .description('Analyze waveform CSV files (Time, Vol, Flow columns)')
    .argument('<files...>', 'Input CSV files')
    .option('-n, --intervals <n>', 'Intervals per phase', parsePositiveInteger)
    .option(
      '-s, --inspiration-start <direction>',
      'Crossing that begins inspiration (pos-to-neg, neg-to-pos)',
      asArgumentParser(parseCrossingDirection)
    )
    .option(
      '-m, --mean-shift <value>',
      "Shift added to the averaged time-bin volume ('auto' or L)",
      asArgumentParser(parseMeanShift)
    )
    .option('-o, --out <dir>', 'Output directory (default: beside each input)')
    .option('-p, --plot', 'Write a flow-volume loop PNG per file')
    .option('--max-loop <file>', 'Draw a reference loop (Vol, Flow columns) on the plot; implies --plot')
    .option('-d, --decimals <n>', 'Decimal places in the written tables', parseDecimals)
    .option('--metadata', 'Start each table with # comment lines naming the table and source file')
    .action(async (files: string[], options: AnalyzeOptions) => {
      const config: AnalysisConfigInput = {
        intervals: options.intervals,
        inspirationStart: options.inspirationStart,
        meanShift: options.meanShift,
      };

      const referenceLoop = options.maxLoop ? await loadReferenceLoopFile(options.maxLoop) : undefined;
      const plot = referenceLoop ? { referenceLoop } : (options.plot ?? false);

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      const report = await processWaveformFiles(files, {
        outputDir: options.out,
        config,
        csv: { decimalPlaces: options.decimals, includeMetadata: options.metadata },
        plot,
        signal: controller.signal,
      });
      process.off('SIGINT', onSigint);

      for (const outcome of report.outcomes) {
        switch (outcome.status) {
          case 'complete':
            console.log(`✓ ${outcome.file}: ${outcome.breaths} breaths (${outcome.outputs.length} files written)`);
            break;
          case 'no-breaths':
            console.log(`- ${outcome.file}: no breaths found`);
            break;
          case 'failed':
            console.log(`✗ ${outcome.file}: ${outcome.error}`);
            break;
          case 'cancelled':
            console.log(`- ${outcome.file}: cancelled`);
            break;
        }
      }

      if (report.counts.failed > 0) process.exitCode = 1;
    });

  program
    .command('format')
    .description('Convert raw device exports (ltr/s and ltr blocks) to Time, Vol, Flow CSV')
    .argument('<files...>', 'Raw export files')
    .option('-o, --out <dir>', 'Output directory (default: beside each input)')
    .action(async (files: string[], options: { out?: string }) => {
      for (const file of files) {
        try {
          const result = await formatRawExportFile(file, options.out);
          console.log(`✓ ${file} -> ${result.outputPath} (${result.samples} samples)`);
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          log.error('Format failed', err, { file });
          console.log(`✗ ${file}: ${err.message}`);
          process.exitCode = 1;
        }
      }
    });

  program
    .command('compare')
    .description('Compare averaged loops of several subjects as % of TLC')
    .argument('<files...>', 'Averaged loop CSV files (Avg Vol Bin Data or Avg Time Bin Data)')
    .requiredOption('-t, --tlc <values...>', 'TLC (L) per file, in file order', collectNumber)
    .option('--layout <layout>', 'horizontal or separate', parseLayout, 'horizontal')
    .option('-o, --out <dir>', 'Output directory', '.')
    .action(
      async (files: string[], options: { tlc: number[]; layout: ComparisonLayout; out: string }) => {
        const report = await compareSubjectFiles(files, options.tlc, options.layout, options.out);

        for (const name of report.successful) console.log(`✓ ${name}`);
        for (const name of report.failed) console.log(`✗ ${name}`);
        for (const output of report.outputs) console.log(`  wrote ${output}`);

        if (report.failed.length > 0 || report.successful.length === 0) process.exitCode = 1;
      }
    );

  program
    .command('demo')
    .description('Write and analyze a synthetic recording')
    .option('-o, --out <dir>', 'Output directory', 'demo')
    .option('-b, --breaths <n>', 'Breaths to generate', parsePositiveInteger, 3)
    .option('--noise <level>', 'Peak flow noise (L/s)', parseNonNegative, 0)
    .action(async (options: { out: string; breaths: number; noise: number }) => {
      const waveform = generateBreathingWaveform({ breaths: options.breaths, noise: options.noise });
      const file = join(options.out, 'demo_waveform.csv');

      await mkdir(options.out, { recursive: true });
      await writeFile(file, exportTableToCSV(formattedTable(waveform)), 'utf-8');
      console.log(`Wrote ${file} (${waveform.time.length} samples)`);

      const outcome = await processWaveformFile(file, { plot: true });
      if (outcome.status === 'failed') {
        console.log(`✗ ${outcome.error}`);
        process.exitCode = 1;
      } else if (outcome.status === 'complete') {
        console.log(`✓ ${outcome.breaths} breaths, ${outcome.outputs.length} files written`);
      } else {
        console.log(`- ${outcome.status}`);
      }
    });

  return program;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      log.error('Command failed', err);
      process.exitCode = 1;
    });
}
