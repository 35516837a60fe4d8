/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { join } from 'node:path';
import { analyseRunLogs, type RunAnalysis } from '../core/pipeline/run-analysis.js';
import { NoValidDataError, isAnalysisError, type AnalysisError } from '../core/errors.js';
import { logConsole } from '../core/logging.js';
import { runKey } from '../core/run-metadata.js';
import type { PiType } from '../core/types.js';
import {
  discoverLatestRuns,
  ensureDirectory,
  readLogLines,
  writeAnalysisReport,
  writeSeriesFile,
  type RunLogPair,
} from '../tools/index.js';
import type { AnalysisObserver, FailureScope, RunFailure } from '../types/observer.js';
import { writeFailureReport } from './report-writers.js';

export interface PerformanceAnalysisOptions {
  timeDir: string;
  memoryDir: string;
  outputDir: string;
  /** Analyse exactly these runs instead of discovering them. */
  runs?: RunLogPair[];
  includeUnlistedCategories?: boolean;
  /** Write `<component>_<variant>_series.json` per run. Defaults to true. */
  exportSeries?: boolean;
  /** Chart scaling written into the series hints. Defaults to `3b`. */
  piType?: PiType;
  observer?: AnalysisObserver;
  /** Clock used to name the output directory. */
  now?: Date;
}

export interface PerformanceAnalysisResult {
  runDirectory: string;
  analysed: RunAnalysis[];
  failures: RunFailure[];
  reportPath?: string;
  seriesPaths: string[];
  failureReportPath?: string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export const formatRunStamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Analyses every run sequentially. A run whose logs are unreadable is skipped
 * and recorded; the others still make it into the report. A memory log without
 * samples only costs the run its series export.
 */
export async function runPerformanceAnalysis(
  options: PerformanceAnalysisOptions,
): Promise<PerformanceAnalysisResult> {
  const { observer } = options;
  const runDirectory = join(options.outputDir, formatRunStamp(options.now ?? new Date()));
  const runs = options.runs ?? (await discoverLatestRuns(options.timeDir, options.memoryDir));
  observer?.onDiscovery?.({ runs: runs.length });

  const result: PerformanceAnalysisResult = {
    runDirectory,
    analysed: [],
    failures: [],
    seriesPaths: [],
  };

  if (runs.length === 0) {
    logConsole('warn', 'No matching file pairs found', [
      ['time logs', options.timeDir],
      ['memory logs', options.memoryDir],
    ]);
    return result;
  }

  await ensureDirectory(runDirectory);
  logConsole('info', 'Starting analysis', [
    ['runs', runs.length],
    ['output', runDirectory],
  ]);

  const recordFailure = (pair: RunLogPair, scope: FailureScope, error: AnalysisError): void => {
    const key = runKey(pair.metadata);
    const failure: RunFailure = {
      key,
      fileName: pair.metadata.fileName,
      scope,
      code: error.code,
      reason: error.message,
      timestamp: new Date().toISOString(),
    };
    result.failures.push(failure);
    logConsole(
      error.code === 'NO_VALID_DATA' ? 'warn' : 'error',
      scope === 'run' ? `Skipped ${key}` : `Skipped series for ${key}`,
      [
        ['code', failure.code],
        ['reason', failure.reason],
      ],
    );
    observer?.onRunFailed?.(failure);
  };

  for (const [index, pair] of runs.entries()) {
    const key = runKey(pair.metadata);
    observer?.onRunStart?.({ key, index, total: runs.length, metadata: pair.metadata });

    let analysis: RunAnalysis;
    try {
      const timeLines = await readLogLines(pair.timeLogPath);
      const memoryLines = await readLogLines(pair.memoryLogPath);
      analysis = analyseRunLogs(
        pair.metadata,
        { timeLines, memoryLines },
        { includeUnlisted: options.includeUnlistedCategories },
      );
    } catch (error) {
      if (!isAnalysisError(error)) {
        throw error;
      }
      recordFailure(pair, 'run', error);
      continue;
    }
    result.analysed.push(analysis);

    if (options.exportSeries ?? true) {
      if (analysis.series.samples.length === 0) {
        recordFailure(pair, 'series', new NoValidDataError(pair.memoryLogPath));
      } else {
        const seriesPath = join(runDirectory, `${key}_series.json`);
        await writeSeriesFile(seriesPath, pair.metadata, analysis.series, options.piType);
        result.seriesPaths.push(seriesPath);
      }
    }

    logConsole('info', `Analysed ${key}`, [
      ['file', pair.metadata.fileName],
      ['time operations', analysis.timeOperations],
      ['memory operations', analysis.memoryOperations],
      ['samples', analysis.series.samples.length],
    ]);
    observer?.onRunComplete?.({
      key,
      metadata: pair.metadata,
      records: analysis.records.length,
      samples: analysis.series.samples.length,
      categories: analysis.categories.length,
    });
  }

  if (result.analysed.length > 0) {
    result.reportPath = join(runDirectory, 'analysis.txt');
    await writeAnalysisReport(result.reportPath, result.analysed);
  }
  if (result.failures.length > 0) {
    result.failureReportPath = join(runDirectory, 'skipped-runs.json');
    await writeFailureReport(result.failureReportPath, result.failures);
  }

  return result;
}
