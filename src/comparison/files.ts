/**
 * File-level TLC comparison
 * @module comparison/files
 */

import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import type { ComparisonLayout } from '../config/defaults';
import { writeResultTables } from '../export/writer';
import { parseCSV } from '../signal/loader/csv';
import { createLogger } from '../utils/logger';
import { ValidationError } from '../utils/validation';
import { compareSubjects, extractSubjectId, readAverageLoop, type SubjectLoop } from './tlc';

const log = createLogger('comparison');

/**
 * Outcome of a comparison run
 */
export interface ComparisonReport {
  /** File names read successfully */
  successful: string[];
  /** File names that could not be read, with the reason */
  failed: string[];
  /** Paths written */
  outputs: string[];
}

/**
 * Read averaged-loop CSVs, convert them to %TLC and write the comparison tables
 * into `outputDir`. `tlcValues[i]` belongs to `files[i]`.
 */
export async function compareSubjectFiles(
  files: readonly string[],
  tlcValues: readonly number[],
  layout: ComparisonLayout,
  outputDir: string
): Promise<ComparisonReport> {
  if (files.length !== tlcValues.length) {
    throw new ValidationError(
      `Expected ${files.length} TLC values, got ${tlcValues.length}`,
      'tlc',
      tlcValues
    );
  }

  const report: ComparisonReport = { successful: [], failed: [], outputs: [] };
  const subjects: SubjectLoop[] = [];

  for (const [i, file] of files.entries()) {
    const name = basename(file);
    try {
      const table = parseCSV(await readFile(file, 'utf-8'));
      subjects.push({
        label: basename(file, extname(file)),
        subjectId: extractSubjectId(name),
        tlc: tlcValues[i],
        loop: readAverageLoop(table),
      });
      report.successful.push(name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn('Subject file skipped', { file, error: message });
      report.failed.push(`${name} (Error: ${message})`);
    }
  }

  if (subjects.length === 0) {
    log.warn('No subject files could be read', { files: files.length });
    return report;
  }

  for (const set of compareSubjects(subjects, layout)) {
    report.outputs.push(...(await writeResultTables(set.tables, outputDir, set.label)));
  }

  log.info('Comparison complete', {
    layout,
    subjects: subjects.length,
    failed: report.failed.length,
    outputs: report.outputs.length,
  });

  return report;
}
