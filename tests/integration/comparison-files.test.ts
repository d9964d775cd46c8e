import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { compareSubjectFiles } from '../../src/comparison/files';

const HEADER = 'Bin,Avg_Insp_Vol_Graph,Avg_Insp_Flow_Graph,Avg_Exp_Vol_Graph,Avg_Exp_Flow_Graph';

describe('compareSubjectFiles', () => {
  let dir: string;
  let first: string;
  let second: string;
  let broken: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'breath-averager-'));
    first = join(dir, 'P-101-avg.csv');
    second = join(dir, 'P-202-avg.csv');
    broken = join(dir, 'broken.csv');

    await writeFile(first, `${HEADER}\n0,1,-1,2,1\n1,2,-2,1,2\n`, 'utf-8');
    await writeFile(second, `${HEADER}\n0,1,-3,1,3\n1,0.5,-1,0.5,1\n`, 'utf-8');
    await writeFile(broken, 'a,b\n1,2\n', 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the horizontal comparison tables', async () => {
    const out = join(dir, 'out');
    const report = await compareSubjectFiles([first, second], [4, 2], 'horizontal', out);

    expect(report.successful).toEqual(['P-101-avg.csv', 'P-202-avg.csv']);
    expect(report.failed).toEqual([]);
    expect(report.outputs).toEqual([
      join(out, 'comparison_raw-data.csv'),
      join(out, 'comparison_individual-data.csv'),
      join(out, 'comparison_averages.csv'),
      join(out, 'comparison_absolute-volume-data.csv'),
      join(out, 'comparison_normalized-average-data.csv'),
      join(out, 'comparison_tlc-summary.csv'),
    ]);

    expect(await readFile(join(out, 'comparison_tlc-summary.csv'), 'utf-8')).toBe(
      'File,Subject ID,TLC Value\nP-101-avg,101,4\nP-202-avg,202,2\nAverage TLC,,3\n'
    );
    expect(await readFile(join(out, 'comparison_individual-data.csv'), 'utf-8')).toBe(
      'Vol % TLC 101,Flow 101,Vol % TLC 202,Flow 202\n25,-1,50,-3\n50,-2,25,-1\n50,1,50,3\n25,2,25,1\n'
    );
  });

  it('should write one file per subject in the separate layout', async () => {
    const report = await compareSubjectFiles([first], [4], 'separate', dir);

    expect(report.outputs).toEqual([join(dir, 'P-101-avg_TLC_percent_101_data.csv')]);
    expect(await readFile(report.outputs[0], 'utf-8')).toBe(
      'Vol % TLC,Flow 101\n25,-1\n50,-2\n50,1\n25,2\n,\nTLC,4\n'
    );
  });

  it('should skip unreadable files and compare the rest', async () => {
    const report = await compareSubjectFiles([first, broken], [4, 5], 'separate', dir);

    expect(report.successful).toEqual(['P-101-avg.csv']);
    expect(report.failed).toEqual([
      'broken.csv (Error: inspiratoryVolume: No column matching "insp+vol")',
    ]);
    expect(report.outputs).toHaveLength(1);
  });

  it('should write nothing when no file can be read', async () => {
    const report = await compareSubjectFiles([broken], [5], 'horizontal', join(dir, 'out'));

    expect(report.successful).toEqual([]);
    expect(report.failed).toHaveLength(1);
    expect(report.outputs).toEqual([]);
  });

  it('should require one TLC value per file', async () => {
    await expect(compareSubjectFiles([first, second], [4], 'horizontal', dir)).rejects.toThrow(
      'tlc: Expected 2 TLC values, got 1'
    );
  });
});
