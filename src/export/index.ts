/**
 * Result export
 * @module export
 */

export { CSVExporter, exportTableToCSV, type CSVExportOptions } from './csv';

export {
  buildAnalysisTables,
  boundaryTable,
  originalBreathTable,
  timingTable,
  averageLoopTable,
  discardedTable,
  columnsToRows,
} from './tables';

export { writeResultTables, tableFilePath, slugifyTableName } from './writer';
