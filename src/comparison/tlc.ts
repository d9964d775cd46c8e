/**
 * Multi-subject TLC comparison
 *
 * Rescales each subject's averaged loop to percent of total lung capacity
 * (vol / TLC * 100), lays the subjects side by side, averages them and maps
 * the average back to absolute volume with the mean TLC.
 *
 * @module comparison/tlc
 */

import type { AggregateSeries, ParsedTable, ResultTable, TableCell } from '../types';
import { AVERAGE_LOOP_PATTERNS, type ComparisonLayout } from '../config/defaults';
import { columnsToRows } from '../export/tables';
import { aggregateColumns, rescaleAggregate } from '../signal/aggregator';
import { findColumn, parseNumber } from '../signal/loader/csv';
import { round } from '../utils/math';
import { ValidationError } from '../utils/validation';

/**
 * Averaged flow-volume loop of one subject
 */
export interface AverageLoop {
  inspiratoryVolume: number[];
  inspiratoryFlow: number[];
  expiratoryVolume: number[];
  expiratoryFlow: number[];
}

/**
 * One subject's loop with its reference capacity
 */
export interface SubjectLoop {
  /** File base name */
  label: string;
  /** May be empty */
  subjectId: string;
  /** Total lung capacity (L) */
  tlc: number;
  loop: AverageLoop;
}

/**
 * Tables destined for one output file set
 */
export interface ComparisonTableSet {
  label: string;
  tables: ResultTable[];
}

const LOOP_KEYS = [
  'inspiratoryVolume',
  'inspiratoryFlow',
  'expiratoryVolume',
  'expiratoryFlow',
] as const;

/**
 * First standalone 2-7 digit number in a file's base name, or ''
 */
export function extractSubjectId(fileName: string): string {
  const base = fileName.replace(/^.*[\\/]/, '').replace(/\.[^.]*$/, '');
  const match = /\b\d{2,7}\b/.exec(base);
  return match ? match[0] : '';
}

/**
 * Locate and read the four averaged-loop columns
 */
export function readAverageLoop(table: ParsedTable): AverageLoop {
  const loop: AverageLoop = {
    inspiratoryVolume: [],
    inspiratoryFlow: [],
    expiratoryVolume: [],
    expiratoryFlow: [],
  };

  for (const key of LOOP_KEYS) {
    const patterns = AVERAGE_LOOP_PATTERNS[key];
    const index = findColumn(table.headers, patterns);
    if (index === -1) {
      throw new ValidationError(`No column matching "${patterns.join('+')}"`, key, table.headers);
    }
    loop[key] = table.rows.map(row => parseNumber(row[index]));
  }

  return loop;
}

/**
 * Percent of TLC: vol / tlc * 100
 */
export function toPercentTLC(volumes: readonly number[], tlc: number): number[] {
  return volumes.map(v => (v / tlc) * 100);
}

function validateTLC(subject: SubjectLoop): void {
  if (!Number.isFinite(subject.tlc) || subject.tlc <= 0) {
    throw new ValidationError('TLC must be a positive number', `tlc.${subject.label}`, subject.tlc);
  }
}

function padTo(values: readonly number[], length: number): number[] {
  return values.concat(new Array<number>(Math.max(0, length - values.length)).fill(NaN));
}

/** Inspiration rows padded to `rows`, followed by expiration rows padded the same way */
function stack(inspiration: readonly number[], expiration: readonly number[], rows: number): number[] {
  return [...padTo(inspiration, rows), ...padTo(expiration, rows)];
}

function seriesMeans(series: AggregateSeries): number[] {
  return series.map(r => r.mean);
}

function roundedStd(series: AggregateSeries): TableCell[] {
  return series.map(r => (Number.isFinite(r.std) ? round(r.std, 3) : null));
}

/**
 * One `Data` table per subject: %TLC volume and flow, TLC below
 */
function separateTables(subject: SubjectLoop): ComparisonTableSet {
  const { loop, tlc, subjectId } = subject;
  const suffix = subjectId ? ` ${subjectId}` : '';

  const volume = [
    ...toPercentTLC(loop.inspiratoryVolume, tlc),
    ...toPercentTLC(loop.expiratoryVolume, tlc),
  ];
  const flow = [...loop.inspiratoryFlow, ...loop.expiratoryFlow];

  const rows = columnsToRows([volume, flow]);
  rows.push([null, null], ['TLC', tlc]);

  return {
    label: `${subject.label}_TLC_percent${suffix.replace(' ', '_')}`,
    tables: [{ name: 'Data', columns: ['Vol % TLC', `Flow${suffix}`], rows }],
  };
}

/**
 * All subjects side by side, with averages and absolute rescale
 */
function horizontalTables(subjects: readonly SubjectLoop[]): ComparisonTableSet {
  const rowsPerPhase = Math.max(
    0,
    ...subjects.flatMap(s => [s.loop.inspiratoryVolume.length, s.loop.expiratoryVolume.length])
  );

  const averageTLC = round(subjects.reduce((sum, s) => sum + s.tlc, 0) / subjects.length, 2);

  const rawColumns: string[] = [];
  const rawData: number[][] = [];
  const percentColumns: string[] = [];
  const percentData: number[][] = [];
  const absoluteColumns: string[] = [];
  const absoluteData: number[][] = [];
  const percentVolumes: number[][] = [];
  const flows: number[][] = [];

  subjects.forEach((s, i) => {
    const key = s.subjectId || String(i + 1);
    const flow = stack(s.loop.inspiratoryFlow, s.loop.expiratoryFlow, rowsPerPhase);
    const raw = stack(s.loop.inspiratoryVolume, s.loop.expiratoryVolume, rowsPerPhase);
    const percent = toPercentTLC(raw, s.tlc);

    rawColumns.push(`Raw Vol ${key}`, `Flow ${key}`);
    rawData.push(raw, flow);
    percentColumns.push(`Vol % TLC ${key}`, `Flow ${key}`);
    percentData.push(percent, flow);
    absoluteColumns.push(`Absolute Vol ${key}`, `Flow ${key}`);
    absoluteData.push(
      percent.map(p => (p * averageTLC) / 100),
      flow
    );

    percentVolumes.push(percent);
    flows.push(flow);
  });

  const volumeStats = aggregateColumns(percentVolumes);
  const flowStats = aggregateColumns(flows);
  const absoluteVolumeStats = rescaleAggregate(volumeStats, averageTLC);

  const summaryRows: TableCell[][] = subjects.map(s => [s.label, s.subjectId, s.tlc]);
  summaryRows.push(['Average TLC', null, averageTLC]);

  return {
    label: 'comparison',
    tables: [
      { name: 'Raw Data', columns: rawColumns, rows: columnsToRows(rawData) },
      { name: 'Individual Data', columns: percentColumns, rows: columnsToRows(percentData) },
      {
        name: 'Averages',
        columns: ['Average Vol % TLC', 'Average Flow'],
        rows: columnsToRows([seriesMeans(volumeStats), seriesMeans(flowStats)]),
      },
      { name: 'Absolute Volume Data', columns: absoluteColumns, rows: columnsToRows(absoluteData) },
      {
        name: 'Normalized Average Data',
        columns: ['Normalized Average Volume', 'Average Flow', 'Volume StdDev', 'Flow StdDev'],
        rows: columnsToRows([
          seriesMeans(absoluteVolumeStats),
          seriesMeans(flowStats),
          roundedStd(absoluteVolumeStats),
          roundedStd(flowStats),
        ]),
      },
      { name: 'TLC Summary', columns: ['File', 'Subject ID', 'TLC Value'], rows: summaryRows },
    ],
  };
}

/**
 * Build comparison tables for the chosen layout
 */
export function compareSubjects(
  subjects: readonly SubjectLoop[],
  layout: ComparisonLayout
): ComparisonTableSet[] {
  if (subjects.length === 0) {
    throw new ValidationError('At least one subject is required', 'subjects', 0);
  }
  subjects.forEach(validateTLC);

  return layout === 'separate' ? subjects.map(separateTables) : [horizontalTables(subjects)];
}
