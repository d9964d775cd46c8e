/**
 * Tabular result types
 * @module types/table
 */

/**
 * One cell of a result table; null is an empty cell
 */
export type TableCell = number | string | null;

/**
 * A named table of rows under a header
 */
export interface ResultTable {
  name: string;
  columns: string[];
  rows: TableCell[][];
}

/**
 * Raw text rows read from a delimited file
 */
export interface ParsedTable {
  headers: string[];
  rows: string[][];
}
