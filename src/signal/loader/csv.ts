/**
 * Delimited-text waveform reader
 *
 * Locates time, volume and flow columns by header fragments and reads
 * them into a waveform.
 *
 * @module signal/loader/csv
 */

import { readFile } from 'fs/promises';
import type { ParsedTable, Waveform } from '../../types';
import { WAVEFORM_COLUMN_PATTERNS, type WaveformColumnPatterns } from '../../config/defaults';
import { createLogger, type Logger } from '../../utils/logger';
import { ValidationError } from '../../utils/validation';

const log = createLogger('loader:csv');

const WAVEFORM_FIELDS = ['time', 'volume', 'flow'] as const;

/**
 * CSV parse options
 */
export interface CSVParseOptions {
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Lines starting with this prefix are skipped (default: '#') */
  commentPrefix?: string;
}

/**
 * Split one line into fields, honoring double quotes ("" escapes a quote)
 */
export function splitCSVLine(line: string, delimiter: string = ','): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (line.startsWith(delimiter, i)) {
      fields.push(field);
      field = '';
      i += delimiter.length - 1;
    } else {
      field += ch;
    }
  }

  fields.push(field);
  return fields;
}

/**
 * Parse delimited text. The first non-comment line is the header;
 * blank lines are skipped.
 */
export function parseCSV(text: string, options: CSVParseOptions = {}): ParsedTable {
  const delimiter = options.delimiter ?? ',';
  const commentPrefix = options.commentPrefix ?? '#';

  const lines = text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(line => line.trim() !== '' && !line.startsWith(commentPrefix));

  if (lines.length === 0) {
    return { headers: [], rows: [] };
  }

  const [headerLine, ...dataLines] = lines;
  return {
    headers: splitCSVLine(headerLine, delimiter).map(h => h.trim()),
    rows: dataLines.map(line => splitCSVLine(line, delimiter)),
  };
}

/**
 * Index of the first header containing every pattern (case-insensitive), or -1
 */
export function findColumn(headers: readonly string[], patterns: readonly string[]): number {
  const needles = patterns.map(p => p.toLowerCase());
  return headers.findIndex(header => {
    const lower = header.toLowerCase();
    return needles.every(n => lower.includes(n));
  });
}

/**
 * Parse a numeric cell; empty or non-numeric text gives NaN
 */
export function parseNumber(cell: string | undefined): number {
  const trimmed = cell?.trim() ?? '';
  return trimmed === '' ? NaN : Number(trimmed);
}

/**
 * Read a waveform from delimited text.
 * Rows with a missing or non-numeric value in any of the three columns are dropped.
 */
export function parseWaveformCSV(
  text: string,
  patterns: WaveformColumnPatterns = WAVEFORM_COLUMN_PATTERNS,
  logger: Logger = log
): Waveform {
  const table = parseCSV(text);

  const columns = { time: -1, volume: -1, flow: -1 };
  for (const key of WAVEFORM_FIELDS) {
    const index = findColumn(table.headers, patterns[key]);
    if (index === -1) {
      throw new ValidationError(
        `No column matching "${patterns[key].join('+')}"`,
        key,
        table.headers
      );
    }
    columns[key] = index;
  }

  const time: number[] = [];
  const volume: number[] = [];
  const flow: number[] = [];
  let dropped = 0;

  for (const row of table.rows) {
    const t = parseNumber(row[columns.time]);
    const v = parseNumber(row[columns.volume]);
    const f = parseNumber(row[columns.flow]);

    if (!Number.isFinite(t) || !Number.isFinite(v) || !Number.isFinite(f)) {
      dropped++;
      continue;
    }

    time.push(t);
    volume.push(v);
    flow.push(f);
  }

  if (dropped > 0) {
    logger.warn('Dropped rows with missing or non-numeric values', {
      dropped,
      kept: time.length,
    });
  }

  return { time, volume, flow };
}

/**
 * Load a waveform from a CSV file
 */
export async function loadWaveformFile(
  path: string,
  patterns: WaveformColumnPatterns = WAVEFORM_COLUMN_PATTERNS
): Promise<Waveform> {
  const text = await readFile(path, 'utf-8');
  return parseWaveformCSV(text, patterns, log.withContext({ file: path }));
}
