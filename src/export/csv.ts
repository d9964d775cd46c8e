/**
 * CSV Exporter
 * Export result tables to CSV for spreadsheets and analysis tools
 *
 * @module export/csv
 */

import type { ResultTable, TableCell } from '../types';

/**
 * CSV export options
 */
export interface CSVExportOptions {
  /** Delimiter (default: ',') */
  delimiter?: string;

  /** Line ending (default: '\n') */
  lineEnding?: string;

  /** Include header row (default: true) */
  includeHeader?: boolean;

  /** Decimal places for numbers; null writes full precision (default: null) */
  decimalPlaces?: number | null;

  /** Include metadata comments (default: false) */
  includeMetadata?: boolean;

  /** Extra metadata written as comment lines */
  metadata?: Record<string, string>;
}

/**
 * CSV Exporter class
 */
export class CSVExporter {
  private options: Required<CSVExportOptions>;

  constructor(options: CSVExportOptions = {}) {
    this.options = {
      delimiter: options.delimiter ?? ',',
      lineEnding: options.lineEnding ?? '\n',
      includeHeader: options.includeHeader ?? true,
      decimalPlaces: options.decimalPlaces ?? null,
      includeMetadata: options.includeMetadata ?? false,
      metadata: options.metadata ?? {},
    };
  }

  /**
   * Format one cell. Empty, NaN and infinite values are written empty.
   */
  formatCell(cell: TableCell | undefined): string {
    if (cell === null || cell === undefined) return '';

    if (typeof cell === 'number') {
      if (!Number.isFinite(cell)) return '';
      const { decimalPlaces } = this.options;
      return decimalPlaces === null ? String(cell) : cell.toFixed(decimalPlaces);
    }

    return this.quote(cell);
  }

  private quote(text: string): string {
    const { delimiter } = this.options;
    if (text.includes(delimiter) || text.includes('"') || /[\r\n]/.test(text)) {
      return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
  }

  /**
   * Export a result table to a CSV string
   */
  export(table: ResultTable): string {
    const { delimiter, lineEnding, includeHeader } = this.options;

    const lines: string[] = [];

    // Metadata comments
    if (this.options.includeMetadata) {
      lines.push(`# Table: ${table.name}`);
      lines.push(`# Rows: ${table.rows.length}`);
      for (const [key, value] of Object.entries(this.options.metadata)) {
        lines.push(`# ${key}: ${value}`);
      }
      lines.push('#');
    }

    // Header row
    if (includeHeader) {
      lines.push(table.columns.map(c => this.quote(c)).join(delimiter));
    }

    // Data rows, padded to the header width
    const width = table.columns.length;
    for (const row of table.rows) {
      const cells: string[] = [];
      for (let i = 0; i < Math.max(width, row.length); i++) {
        cells.push(this.formatCell(row[i]));
      }
      lines.push(cells.join(delimiter));
    }

    return lines.join(lineEnding) + lineEnding;
  }
}

/**
 * Convenience function for CSV export
 */
export function exportTableToCSV(table: ResultTable, options?: CSVExportOptions): string {
  const exporter = new CSVExporter(options);
  return exporter.export(table);
}
