/**
 * Reference loop reader tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadReferenceLoopFile, parseReferenceLoopCSV } from '../../../src/signal/loader/reference-loop';
import { ValidationError } from '../../../src/utils/validation';

describe('parseReferenceLoopCSV', () => {
  it('should read the Vol and Flow columns', () => {
    const loop = parseReferenceLoopCSV('Time,Vol,Flow\n0,1.5,0\n0.1,1.2,-3\n0.2,0.9,-2.5\n');

    expect(loop).toEqual({ volume: [1.5, 1.2, 0.9], flow: [0, -3, -2.5] });
  });

  it('should skip rows missing a value', () => {
    const loop = parseReferenceLoopCSV('Vol,Flow\n1,2\n,3\n4,x\n5,6\n');
    expect(loop).toEqual({ volume: [1, 5], flow: [2, 6] });
  });

  it('should require both columns', () => {
    expect(() => parseReferenceLoopCSV('Volume,Pressure\n1,2\n')).toThrow('flow: No column matching "flow"');
    expect(() => parseReferenceLoopCSV('Flow\n1\n')).toThrow(ValidationError);
  });

  it('should require at least two points', () => {
    expect(() => parseReferenceLoopCSV('Vol,Flow\n1,2\n')).toThrow(
      'referenceLoop: Need at least 2 volume/flow rows'
    );
  });
});

describe('loadReferenceLoopFile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should load a loop from disk', async () => {
    dir = await mkdtemp(join(tmpdir(), 'breath-averager-'));
    const path = join(dir, 'max-loop.csv');
    await writeFile(path, 'Vol,Flow\r\n2,0\r\n1,4\r\n', 'utf-8');

    expect(await loadReferenceLoopFile(path)).toEqual({ volume: [2, 1], flow: [0, 4] });
  });
});
