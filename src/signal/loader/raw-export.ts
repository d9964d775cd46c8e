/**
 * Raw device export formatter
 *
 * Device exports list flow under an `ltr/s` marker row and volume under an
 * `ltr` marker row, one value per row in the first column. The row after
 * each marker is a header; a block ends at the first empty cell.
 *
 * @module signal/loader/raw-export
 */

import { readFile, mkdir, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import type { ResultTable, Waveform } from '../../types';
import { RAW_EXPORT } from '../../config/defaults';
import { exportTableToCSV } from '../../export/csv';
import { columnsToRows } from '../../export/tables';
import { createLogger } from '../../utils/logger';
import { round } from '../../utils/math';
import { parseNumber, splitCSVLine } from './csv';

const log = createLogger('loader:raw-export');

type Block = 'flow' | 'volume';

/**
 * Extract the flow and volume blocks and attach a time column.
 * Time is interval * i for i = 1..n; the shorter column is padded with NaN.
 */
export function convertRawExport(
  cells: readonly (readonly string[])[],
  sampleInterval: number = RAW_EXPORT.sampleInterval
): Waveform {
  const values: Record<Block, number[]> = { flow: [], volume: [] };
  let active: Block | null = null;
  let skipHeader = false;

  for (const row of cells) {
    const first = (row[0] ?? '').trim();
    const lower = first.toLowerCase();

    if (active !== 'flow' && lower.includes(RAW_EXPORT.flowMarker)) {
      active = 'flow';
      skipHeader = true;
      continue;
    }

    if (active !== 'volume' && lower === RAW_EXPORT.volumeMarker) {
      active = 'volume';
      skipHeader = true;
      continue;
    }

    if (skipHeader) {
      skipHeader = false;
      continue;
    }

    if (!active) continue;

    if (first === '') {
      active = null;
      continue;
    }

    const value = parseNumber(first);
    if (Number.isFinite(value)) {
      values[active].push(value);
    }
  }

  const length = Math.max(values.flow.length, values.volume.length);
  const pad = (column: number[]): number[] =>
    column.concat(new Array<number>(length - column.length).fill(NaN));

  return {
    time: Array.from({ length }, (_, i) => round(sampleInterval * (i + 1), 2)),
    volume: pad(values.volume),
    flow: pad(values.flow),
  };
}

/**
 * Standard Time/Vol/Flow table of a converted export
 */
export function formattedTable(waveform: Waveform): ResultTable {
  return {
    name: 'Formatted',
    columns: ['Time', 'Vol', 'Flow'],
    rows: columnsToRows([waveform.time, waveform.volume, waveform.flow]),
  };
}

/**
 * Result of formatting one export file
 */
export interface FormattedExport {
  inputPath: string;
  outputPath: string;
  samples: number;
}

/**
 * Convert an export file and write `<base>_formatted.csv`
 */
export async function formatRawExportFile(
  inputPath: string,
  outputDir: string = dirname(inputPath)
): Promise<FormattedExport> {
  const text = await readFile(inputPath, 'utf-8');
  const cells = text.split(/\r?\n/).map(line => splitCSVLine(line));
  const waveform = convertRawExport(cells);

  const base = basename(inputPath, extname(inputPath));
  const outputPath = join(outputDir, `${base}${RAW_EXPORT.outputSuffix}.csv`);

  await mkdir(outputDir, { recursive: true });
  await writeFile(outputPath, exportTableToCSV(formattedTable(waveform)), 'utf-8');

  log.info('Export formatted', {
    input: inputPath,
    output: outputPath,
    samples: waveform.time.length,
  });

  return { inputPath, outputPath, samples: waveform.time.length };
}
