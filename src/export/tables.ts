/**
 * Result table layout
 *
 * Lays out breath records, grids and aggregates as named tables.
 *
 * @module export/tables
 */

import type {
  AggregateSeries,
  AnalysisResult,
  Breath,
  BreathGrids,
  CompletedAnalysis,
  MethodAggregate,
  Phase,
  ResultTable,
  TableCell,
  TimeBinGrid,
  VolumeBinGrid,
  ZeroCrossingEvent,
} from '../types';
import { PHASES } from '../types';
import { AVERAGE_LOOP_COLUMNS, TABLE_NAMES } from '../config/defaults';
import { mean } from '../utils/math';

const PHASE_PREFIX = { inspiration: 'Insp', expiration: 'Exp' } as const;

/**
 * Transpose columns into rows, padding short columns with empty cells
 */
export function columnsToRows(columns: readonly (readonly TableCell[])[]): TableCell[][] {
  const length = Math.max(0, ...columns.map(c => c.length));
  const rows: TableCell[][] = [];

  for (let i = 0; i < length; i++) {
    rows.push(columns.map(c => (i < c.length ? c[i] : null)));
  }

  return rows;
}

function binColumn(length: number): number[] {
  return Array.from({ length }, (_, j) => j);
}

export function boundaryTable(events: readonly ZeroCrossingEvent[]): ResultTable {
  return {
    name: TABLE_NAMES.PHASE_BOUNDARIES,
    columns: ['Event', 'Time', 'Volume', 'Direction', 'Sample Index'],
    rows: events.map((e, i) => [i, e.time, e.volume, e.direction, e.index]),
  };
}

function phaseColumns(phase: Phase): TableCell[][] {
  return [
    phase.samples.map(s => s.time),
    phase.samples.map(s => s.volume),
    phase.samples.map(s => s.flow),
  ];
}

export function originalBreathTable(breath: Breath): ResultTable {
  return {
    name: `${TABLE_NAMES.ORIGINAL_BREATH} ${breath.index}`,
    columns: ['Insp_Time', 'Insp_Vol', 'Insp_Flow', 'Exp_Time', 'Exp_Vol', 'Exp_Flow'],
    rows: columnsToRows([...phaseColumns(breath.inspiration), ...phaseColumns(breath.expiration)]),
  };
}

function timeBinTable(name: string, grids: BreathGrids<TimeBinGrid>): ResultTable {
  const { inspiration: i, expiration: e } = grids;
  return {
    name: `${name} ${grids.breathIndex}`,
    columns: ['Bin', 'Insp_Time', 'Insp_Vol', 'Insp_Flow', 'Exp_Time', 'Exp_Vol', 'Exp_Flow'],
    rows: columnsToRows([
      binColumn(i.time.length),
      i.time,
      i.volume,
      i.flow,
      e.time,
      e.volume,
      e.flow,
    ]),
  };
}

function volumeBinTable(grids: BreathGrids<VolumeBinGrid>): ResultTable {
  const { inspiration: i, expiration: e } = grids;
  return {
    name: `${TABLE_NAMES.VOLUME_BINS} ${grids.breathIndex}`,
    columns: ['Bin', 'Insp_Vol', 'Insp_Time', 'Insp_Flow', 'Exp_Vol', 'Exp_Time', 'Exp_Flow'],
    rows: columnsToRows([
      binColumn(i.volume.length),
      i.volume,
      i.time,
      i.flow,
      e.volume,
      e.time,
      e.flow,
    ]),
  };
}

/**
 * Per-breath columns side by side with Avg, SD and SEM of each quantity
 */
function comparisonTable(
  name: string,
  grids: readonly BreathGrids<TimeBinGrid | VolumeBinGrid>[],
  aggregates: MethodAggregate
): ResultTable {
  const columns: string[] = ['Bin'];
  const data: TableCell[][] = [binColumn(aggregates.inspiration.volume.length)];

  for (const phase of PHASES) {
    for (const quantity of ['volume', 'flow'] as const) {
      const label = `${PHASE_PREFIX[phase]}_${quantity === 'volume' ? 'Vol' : 'Flow'}`;
      const series: AggregateSeries = aggregates[phase][quantity];

      for (const g of grids) {
        columns.push(`${label}_B${g.breathIndex}`);
        data.push(g[phase][quantity]);
      }

      columns.push(`${label}_Avg`, `${label}_SD`, `${label}_SEM`);
      data.push(
        series.map(r => r.mean),
        series.map(r => r.std),
        series.map(r => r.sem)
      );
    }
  }

  return { name, columns, rows: columnsToRows(data) };
}

export function timingTable(result: AnalysisResult): ResultTable {
  const { timings } = result;
  const rows: TableCell[][] = timings.map(t => [
    t.breathIndex,
    t.inspiratoryTidalVolume,
    t.expiratoryTidalVolume,
    t.inspiratoryTime,
    t.expiratoryTime,
  ]);

  if (timings.length > 0) {
    rows.push([
      'Average',
      mean(timings.map(t => t.inspiratoryTidalVolume)),
      mean(timings.map(t => t.expiratoryTidalVolume)),
      mean(timings.map(t => t.inspiratoryTime)),
      mean(timings.map(t => t.expiratoryTime)),
    ]);
  }

  return {
    name: TABLE_NAMES.TIMINGS,
    columns: ['Breath', 'Insp_Vt', 'Exp_Vt', 'Insp_Time', 'Exp_Time'],
    rows,
  };
}

/**
 * Averaged loop: mean volume and flow per phase, then their SEM
 */
export function averageLoopTable(name: string, aggregates: MethodAggregate): ResultTable {
  const { inspiration: i, expiration: e } = aggregates;
  return {
    name,
    columns: [
      'Bin',
      AVERAGE_LOOP_COLUMNS.inspiratoryVolume,
      AVERAGE_LOOP_COLUMNS.inspiratoryFlow,
      AVERAGE_LOOP_COLUMNS.expiratoryVolume,
      AVERAGE_LOOP_COLUMNS.expiratoryFlow,
      'SEM_Insp_Vol',
      'SEM_Insp_Flow',
      'SEM_Exp_Vol',
      'SEM_Exp_Flow',
    ],
    rows: columnsToRows([
      binColumn(i.volume.length),
      i.volume.map(r => r.mean),
      i.flow.map(r => r.mean),
      e.volume.map(r => r.mean),
      e.flow.map(r => r.mean),
      i.volume.map(r => r.sem),
      i.flow.map(r => r.sem),
      e.volume.map(r => r.sem),
      e.flow.map(r => r.sem),
    ]),
  };
}

export function discardedTable(result: AnalysisResult): ResultTable {
  return {
    name: TABLE_NAMES.DISCARDED,
    columns: ['Cycle', 'Start Time', 'Phase', 'Reason', 'Samples'],
    rows: result.discarded.map(d => [d.cycle, d.startTime, d.phase, d.reason, d.sampleCount]),
  };
}

function completedTables(result: CompletedAnalysis): ResultTable[] {
  const tables: ResultTable[] = [];

  for (const breath of result.breaths) {
    tables.push(originalBreathTable(breath));
  }
  for (const grids of result.timeBins.breaths) {
    tables.push(timeBinTable(TABLE_NAMES.RAW_TIME_BINS, grids));
  }
  for (const grids of result.timeBins.normalized) {
    tables.push(timeBinTable(TABLE_NAMES.NORMALIZED_TIME_BINS, grids));
  }
  for (const grids of result.volumeBins.breaths) {
    tables.push(volumeBinTable(grids));
  }

  tables.push(
    comparisonTable(
      TABLE_NAMES.COMPARISON_TIME_BINS,
      result.timeBins.normalized,
      result.aggregates.timeBins
    ),
    comparisonTable(
      TABLE_NAMES.COMPARISON_VOLUME_BINS,
      result.volumeBins.breaths,
      result.aggregates.volumeBins
    ),
    timingTable(result),
    averageLoopTable(TABLE_NAMES.AVERAGE_TIME_BINS, result.aggregates.timeBins),
    averageLoopTable(TABLE_NAMES.AVERAGE_VOLUME_BINS, result.aggregates.volumeBins)
  );

  return tables;
}

/**
 * Lay out an analysis result as named tables.
 * A result without breaths yields the boundaries and a summary.
 */
export function buildAnalysisTables(result: AnalysisResult): ResultTable[] {
  const tables: ResultTable[] = [boundaryTable(result.events)];

  if (result.status === 'complete') {
    tables.push(...completedTables(result));
  } else {
    tables.push({
      name: TABLE_NAMES.SUMMARY,
      columns: ['Field', 'Value'],
      rows: [
        ['Status', 'No breaths found'],
        ['Samples', result.sampleCount],
        ['Events', result.events.length],
        ['Discarded', result.discarded.length],
      ],
    });
  }

  if (result.discarded.length > 0) {
    tables.push(discardedTable(result));
  }

  return tables;
}
