/**
 * Result table file writer
 * @module export/writer
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ResultTable } from '../types';
import { createLogger } from '../utils/logger';
import { CSVExporter, type CSVExportOptions } from './csv';

const log = createLogger('export:writer');

/**
 * File-name fragment for a table name: "Avg Time Bin Data" -> "avg-time-bin-data"
 */
export function slugifyTableName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Path a table is written to
 */
export function tableFilePath(outputDir: string, baseName: string, tableName: string): string {
  return join(outputDir, `${baseName}_${slugifyTableName(tableName)}.csv`);
}

/**
 * Write each table as `<base>_<slug>.csv` and return the paths in table order
 */
export async function writeResultTables(
  tables: readonly ResultTable[],
  outputDir: string,
  baseName: string,
  options: CSVExportOptions = {}
): Promise<string[]> {
  const exporter = new CSVExporter(options);
  await mkdir(outputDir, { recursive: true });

  const paths: string[] = [];
  for (const table of tables) {
    const path = tableFilePath(outputDir, baseName, table.name);
    await writeFile(path, exporter.export(table), 'utf-8');
    paths.push(path);
  }

  log.debug('Tables written', { outputDir, baseName, count: paths.length });
  return paths;
}
