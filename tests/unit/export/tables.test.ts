/**
 * Result table layout tests
 */

import { describe, it, expect } from 'vitest';
import {
  columnsToRows,
  boundaryTable,
  timingTable,
  averageLoopTable,
  buildAnalysisTables,
} from '../../../src/export/tables';
import { analyzeWaveform } from '../../../src/signal/pipeline';
import { generateFlatWaveform, generateLinearPhaseWaveform } from '../../../src/signal/synthetic';
import type { AnalysisResult, CompletedAnalysis } from '../../../src/types';
import { createSilentLogger } from '../../../src/utils/logger';

const silent = createSilentLogger('test');

function completed(): CompletedAnalysis {
  const result: AnalysisResult = analyzeWaveform(generateLinearPhaseWaveform(), { intervals: 4 }, silent);
  if (result.status !== 'complete') {
    throw new Error('Expected breaths in the linear waveform');
  }
  return result;
}

describe('columnsToRows', () => {
  it('should transpose and pad short columns', () => {
    expect(columnsToRows([[1, 2], ['a']])).toEqual([
      [1, 'a'],
      [2, null],
    ]);
  });

  it('should return no rows for no columns', () => {
    expect(columnsToRows([])).toEqual([]);
  });
});

describe('boundaryTable', () => {
  it('should list every event', () => {
    const table = boundaryTable(completed().events);

    expect(table.columns).toEqual(['Event', 'Time', 'Volume', 'Direction', 'Sample Index']);
    expect(table.rows).toHaveLength(6);
    expect(table.rows[0][0]).toBe(0);
    expect(table.rows[0][3]).toBe('pos-to-neg');
    expect(table.rows[0][4]).toBe(99);
    expect(table.rows[5][4]).toBe(599);
  });
});

describe('timingTable', () => {
  it('should append an average row', () => {
    const table = timingTable(completed());

    expect(table.columns).toEqual(['Breath', 'Insp_Vt', 'Exp_Vt', 'Insp_Time', 'Exp_Time']);
    expect(table.rows).toHaveLength(3);
    expect(table.rows[0][0]).toBe(0);
    expect(table.rows[2][0]).toBe('Average');

    const averageVt = table.rows[2][1];
    expect(typeof averageVt === 'number' ? averageVt : NaN).toBeCloseTo(0.495, 9);
  });
});

describe('averageLoopTable', () => {
  it('should lay out means then standard errors', () => {
    const result = completed();
    const table = averageLoopTable('Avg Vol Bin Data', result.aggregates.volumeBins);

    expect(table.columns).toEqual([
      'Bin',
      'Avg_Insp_Vol_Graph',
      'Avg_Insp_Flow_Graph',
      'Avg_Exp_Vol_Graph',
      'Avg_Exp_Flow_Graph',
      'SEM_Insp_Vol',
      'SEM_Insp_Flow',
      'SEM_Exp_Vol',
      'SEM_Exp_Flow',
    ]);
    expect(table.rows).toHaveLength(5);
    expect(table.rows.map(r => r[0])).toEqual([0, 1, 2, 3, 4]);
    expect(table.rows[0][1]).toBe(result.aggregates.volumeBins.inspiration.volume[0].mean);
  });
});

describe('buildAnalysisTables', () => {
  it('should emit tables in a fixed order', () => {
    const names = buildAnalysisTables(completed()).map(t => t.name);

    expect(names).toEqual([
      'Phase Boundaries',
      'Original Breath 0',
      'Original Breath 1',
      'Not Normalized Time Bin Breath 0',
      'Not Normalized Time Bin Breath 1',
      'Normalized Time Bin Breath 0',
      'Normalized Time Bin Breath 1',
      'Volume Bin Breath 0',
      'Volume Bin Breath 1',
      'Comparison Time Bin',
      'Comparison Volume Bin',
      'Tidal Volume and Time Data',
      'Avg Time Bin Data',
      'Avg Vol Bin Data',
    ]);
  });

  it('should lay out per-breath columns beside the statistics', () => {
    const comparison = buildAnalysisTables(completed()).find(t => t.name === 'Comparison Volume Bin');

    expect(comparison?.columns.slice(0, 6)).toEqual([
      'Bin',
      'Insp_Vol_B0',
      'Insp_Vol_B1',
      'Insp_Vol_Avg',
      'Insp_Vol_SD',
      'Insp_Vol_SEM',
    ]);
    expect(comparison?.columns).toHaveLength(21);
    expect(comparison?.columns[20]).toBe('Exp_Flow_SEM');
    expect(comparison?.rows).toHaveLength(5);
  });

  it('should order original breath columns inspiration first', () => {
    const original = buildAnalysisTables(completed())[1];

    expect(original.columns).toEqual(['Insp_Time', 'Insp_Vol', 'Insp_Flow', 'Exp_Time', 'Exp_Vol', 'Exp_Flow']);
    // 100 measured samples plus two boundaries
    expect(original.rows).toHaveLength(102);
    expect(original.rows[0][2]).toBe(0);
  });

  it('should summarize a recording without breaths', () => {
    const result = analyzeWaveform(generateFlatWaveform(), {}, silent);
    const tables = buildAnalysisTables(result);

    expect(tables.map(t => t.name)).toEqual(['Phase Boundaries', 'Summary']);
    expect(tables[0].rows).toEqual([]);
    expect(tables[1].rows).toEqual([
      ['Status', 'No breaths found'],
      ['Samples', 200],
      ['Events', 0],
      ['Discarded', 0],
    ]);
  });

  it('should append discarded breaths', () => {
    const result = analyzeWaveform(generateLinearPhaseWaveform(), { minSamplesPerPhase: 101 }, silent);
    const tables = buildAnalysisTables(result);
    const discarded = tables[tables.length - 1];

    expect(result.status).toBe('no-breaths');
    expect(discarded.name).toBe('Discarded Breaths');
    expect(discarded.columns).toEqual(['Cycle', 'Start Time', 'Phase', 'Reason', 'Samples']);
    expect(discarded.rows).toHaveLength(2);
    expect(discarded.rows[0][3]).toBe('insufficient-samples');
  });
});
