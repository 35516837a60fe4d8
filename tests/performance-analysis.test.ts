import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runPerformanceAnalysis, formatRunStamp } from '../src/runner/index.js';
import { discoverLatestRuns, resolveExplicitRun } from '../src/tools/run-discovery.js';
import { InvalidRunNameError } from '../src/core/errors.js';
import type { AnalysisObserver } from '../src/types/observer.js';
import { memoryEntry, timeEntry } from './helpers/logs.js';

const CLIENT_RUN = '2025-03-01_10-00-00_HE_BatchNr:1_BatchSize:2_IntSize:8_client_HE.txt';
const OLD_CLIENT_RUN = '2025-02-01_10-00-00_HE_BatchNr:1_BatchSize:2_IntSize:8_client_HE.txt';
const SERVER_RUN = '2025-03-01_11-00-00_HHE_BatchNr:1_BatchSize:2_IntSize:8_server_HHE.txt';
const TTP_RUN = '2025-03-01_12-00-00_HHE_BatchNr:1_BatchSize:2_IntSize:8_ttp_HHE.txt';

const T1 = '2025-03-01 10:00:00.000000';
const T2 = '2025-03-01 10:00:04.000000';
const NOW = new Date(2025, 2, 1, 12, 30, 5);

let root: string;
let timeDir: string;
let memoryDir: string;
let outputDir: string;

const writeLog = async (dir: string, name: string, lines: string[]): Promise<void> => {
  await writeFile(join(dir, name), `${lines.join('\n')}\n`, 'utf8');
};

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'perf-log-'));
  timeDir = join(root, 'data_time');
  memoryDir = join(root, 'data_memory');
  outputDir = join(root, 'data_analysed');
  await mkdir(timeDir);
  await mkdir(memoryDir);

  await writeLog(timeDir, CLIENT_RUN, [timeEntry(T1, 'Batch Start'), timeEntry(T2, 'Batch End')]);
  await writeLog(memoryDir, CLIENT_RUN, [
    `${T1} : Batch Start`,
    `${T1} RAM: 1000 kB`,
    `${T2} : Batch End`,
    `${T2} RAM: 2000 kB`,
  ]);

  await writeLog(timeDir, OLD_CLIENT_RUN, [timeEntry(T1, 'Integer Start'), timeEntry(T2, 'Integer End')]);
  await writeLog(memoryDir, OLD_CLIENT_RUN, memoryEntry(T1, 'Integer Start', { ram: 10 }));

  await writeLog(timeDir, SERVER_RUN, [timeEntry(T1, 'Server Batch Start'), timeEntry(T2, 'Server Batch End')]);
  await writeLog(memoryDir, SERVER_RUN, [`${T1} : Server Batch Start`, `${T2} : Server Batch End`]);

  await writeLog(timeDir, TTP_RUN, [timeEntry(T1, 'TTP Batch Start')]);
  await writeLog(timeDir, 'README.txt', ['not a run']);

  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { recursive: true, force: true });
});

describe('discoverLatestRuns', () => {
  it('pairs logs by file name and keeps the newest run per component and variant', async () => {
    const runs = await discoverLatestRuns(timeDir, memoryDir);

    expect(runs.map((run) => [run.metadata.fileName, run.timeLogPath, run.memoryLogPath])).toEqual([
      [CLIENT_RUN, join(timeDir, CLIENT_RUN), join(memoryDir, CLIENT_RUN)],
      [SERVER_RUN, join(timeDir, SERVER_RUN), join(memoryDir, SERVER_RUN)],
    ]);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await discoverLatestRuns(join(root, 'missing'), memoryDir)).toEqual([]);
  });
});

describe('resolveExplicitRun', () => {
  it('rejects file names outside the run grammar', () => {
    expect(() => resolveExplicitRun(join(timeDir, 'README.txt'), join(memoryDir, 'README.txt'))).toThrow(
      InvalidRunNameError,
    );
  });
});

describe('runPerformanceAnalysis', () => {
  it('correlates a time log with its memory log', async () => {
    const result = await runPerformanceAnalysis({ timeDir, memoryDir, outputDir, now: NOW });

    expect(result.analysed.map((run) => run.metadata.fileName)).toEqual([CLIENT_RUN, SERVER_RUN]);
    expect(result.analysed[0].records).toEqual([
      {
        name: 'Batch',
        category: 'Batch',
        durationSeconds: 4,
        ramDeltaKb: 1000,
        swapDeltaKb: 0,
        ramPeakKb: 0,
        memoryMatched: true,
      },
    ]);
    expect(result.analysed[0].categories.map((entry) => [entry.category, entry.stats.count])).toEqual([
      ['Batch', 1],
    ]);
  });

  it('reports durations of a run without memory samples', async () => {
    const result = await runPerformanceAnalysis({ timeDir, memoryDir, outputDir, now: NOW });

    expect(result.analysed[1].series.samples).toEqual([]);
    expect(result.analysed[1].records).toEqual([
      {
        name: 'Server Batch',
        category: 'Batch',
        durationSeconds: 4,
        ramDeltaKb: 0,
        swapDeltaKb: 0,
        ramPeakKb: 0,
        memoryMatched: false,
      },
    ]);
  });

  it('writes the report, the series and the skipped series', async () => {
    const result = await runPerformanceAnalysis({ timeDir, memoryDir, outputDir, now: NOW });
    const runDirectory = join(outputDir, '20250301_123005');

    expect(result.runDirectory).toBe(runDirectory);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({
      key: 'server_HHE',
      fileName: SERVER_RUN,
      scope: 'series',
      code: 'NO_VALID_DATA',
    });

    expect(result.reportPath).toBe(join(runDirectory, 'analysis.txt'));
    const report = await readFile(join(runDirectory, 'analysis.txt'), 'utf8');
    expect(report).toContain('COMPONENT: CLIENT | VARIANT: HE');
    expect(report).toContain('Batch Average (n=1):');
    expect(report).toContain('   Time diff: 4.000000 s (0 h 0 m 4 s)');
    expect(report).toContain('   RAM diff: 0.98 MB (1000 kB)');
    expect(report).toContain('COMPONENT: SERVER | VARIANT: HHE');
    expect(report).toContain(`Source file: ${SERVER_RUN}`);

    expect(result.seriesPaths).toEqual([join(runDirectory, 'client_HE_series.json')]);
    const series = JSON.parse(await readFile(join(runDirectory, 'client_HE_series.json'), 'utf8'));
    expect(series.points.map((point: { ramMb: number }) => point.ramMb)).toEqual([1000 / 1024, 2000 / 1024]);

    expect(result.failureReportPath).toBe(join(runDirectory, 'skipped-runs.json'));
    const skipped = JSON.parse(await readFile(join(runDirectory, 'skipped-runs.json'), 'utf8'));
    expect(skipped.totalFailures).toBe(1);
    expect(skipped.failures[0]).toMatchObject({ run: 'server_HHE', scope: 'series', code: 'NO_VALID_DATA' });
  });

  it('keeps analysing sibling runs when a log cannot be read', async () => {
    const onRunFailed = vi.fn();
    const onRunComplete = vi.fn();
    const observer: AnalysisObserver = { onRunFailed, onRunComplete };

    const result = await runPerformanceAnalysis({
      timeDir,
      memoryDir,
      outputDir,
      now: NOW,
      exportSeries: false,
      observer,
      runs: [
        resolveExplicitRun(join(timeDir, TTP_RUN), join(memoryDir, TTP_RUN)),
        resolveExplicitRun(join(timeDir, CLIENT_RUN), join(memoryDir, CLIENT_RUN)),
      ],
    });

    expect(result.failures.map((failure) => [failure.key, failure.scope, failure.code])).toEqual([
      ['ttp_HHE', 'run', 'LOG_UNREADABLE'],
    ]);
    expect(result.analysed.map((run) => run.metadata.fileName)).toEqual([CLIENT_RUN]);
    expect(result.seriesPaths).toEqual([]);
    expect(onRunFailed).toHaveBeenCalledTimes(1);
    expect(onRunComplete).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'client_HE', records: 1, samples: 2, categories: 1 }),
    );
  });

  it('leaves the series of a run without samples unreported when series export is off', async () => {
    const result = await runPerformanceAnalysis({ timeDir, memoryDir, outputDir, now: NOW, exportSeries: false });

    expect(result.analysed).toHaveLength(2);
    expect(result.failures).toEqual([]);
    expect(result.failureReportPath).toBeUndefined();
  });

  it('scales the exported series for the configured device', async () => {
    const result = await runPerformanceAnalysis({ timeDir, memoryDir, outputDir, now: NOW, piType: 'zero' });

    const series = JSON.parse(await readFile(result.seriesPaths[0], 'utf8'));
    expect(series.chart).toMatchObject({ piType: 'zero', timeAxis: 'piecewise', swapUnit: 'MB' });
    expect(series.points.map((point: { axisTime: number }) => point.axisTime)).toEqual([0, 0.16]);
  });

  it('writes nothing when no runs are found', async () => {
    const onDiscovery = vi.fn();
    const result = await runPerformanceAnalysis({
      timeDir: join(root, 'missing'),
      memoryDir,
      outputDir,
      now: NOW,
      observer: { onDiscovery },
    });

    expect(onDiscovery).toHaveBeenCalledWith({ runs: 0 });
    expect(result.analysed).toEqual([]);
    expect(result.reportPath).toBeUndefined();
  });
});

describe('formatRunStamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatRunStamp(new Date(2025, 0, 9, 7, 5, 3))).toBe('20250109_070503');
  });
});
