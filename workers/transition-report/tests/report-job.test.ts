import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PrecursorMissingError } from '@burrow/core';
import { runTransitionReport } from '../src/report-job';

const fixture = (name: string) => path.resolve(__dirname, 'fixtures', name);

describe('runTransitionReport', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transition-report-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write the report to the output file', async () => {
    const outputFile = path.join(tmpDir, 'report.json');

    const report = await runTransitionReport({
      sessionFile: fixture('session.json'),
      outputFile,
      minDuration: 0,
      logLevel: 'silent'
    });

    const written = JSON.parse(await fs.readFile(outputFile, 'utf-8'));
    expect(written.edges).toEqual([
      { from: 'hill', to: 'burrow', rate: 0.5, count: 1 },
      { from: 'burrow', to: 'hill', rate: 1, count: 1 }
    ]);
    expect(written.burrowCount).toBe(1);
    expect(report.frameCount).toBe(7);
  });

  it('should write to the provided writer without an output file', async () => {
    const chunks: string[] = [];

    await runTransitionReport(
      { sessionFile: fixture('session.json'), minDuration: 0, logLevel: 'silent' },
      text => chunks.push(text)
    );

    expect(chunks).toHaveLength(1);
    expect(JSON.parse(chunks[0]).nodes).toEqual([
      { category: 'hill', duration: 2, dwell: '2 seconds' },
      { category: 'burrow', duration: 1, dwell: '1 second' }
    ]);
  });

  it('should fail when the session has no trajectory', async () => {
    await expect(
      runTransitionReport(
        {
          sessionFile: fixture('session-without-trajectory.json'),
          minDuration: 0,
          logLevel: 'silent'
        },
        () => undefined
      )
    ).rejects.toThrow(PrecursorMissingError);
  });
});
