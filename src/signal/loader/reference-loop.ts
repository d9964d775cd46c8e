/**
 * Reference loop reader
 *
 * Reads a volume/flow loop recorded outside the analysis (for example a
 * maximal manoeuvre with `Vol` and `Flow` columns) for plotting beside the
 * averaged loops.
 *
 * @module signal/loader/reference-loop
 */

import { readFile } from 'fs/promises';
import type { ReferenceLoop } from '../../types';
import { REFERENCE_LOOP_PATTERNS } from '../../config/defaults';
import { ValidationError } from '../../utils/validation';
import { findColumn, parseCSV, parseNumber } from './csv';

/**
 * Read a reference loop from delimited text.
 * Rows missing either value are skipped.
 */
export function parseReferenceLoopCSV(text: string): ReferenceLoop {
  const table = parseCSV(text);

  const volumeColumn = findColumn(table.headers, REFERENCE_LOOP_PATTERNS.volume);
  const flowColumn = findColumn(table.headers, REFERENCE_LOOP_PATTERNS.flow);

  if (volumeColumn === -1) {
    throw new ValidationError('No column matching "vol"', 'volume', table.headers);
  }
  if (flowColumn === -1) {
    throw new ValidationError('No column matching "flow"', 'flow', table.headers);
  }

  const volume: number[] = [];
  const flow: number[] = [];

  for (const row of table.rows) {
    const v = parseNumber(row[volumeColumn]);
    const f = parseNumber(row[flowColumn]);
    if (!Number.isFinite(v) || !Number.isFinite(f)) continue;
    volume.push(v);
    flow.push(f);
  }

  if (volume.length < 2) {
    throw new ValidationError('Need at least 2 volume/flow rows', 'referenceLoop', volume.length);
  }

  return { volume, flow };
}

/**
 * Load a reference loop from a CSV file
 */
export async function loadReferenceLoopFile(path: string): Promise<ReferenceLoop> {
  return parseReferenceLoopCSV(await readFile(path, 'utf-8'));
}
