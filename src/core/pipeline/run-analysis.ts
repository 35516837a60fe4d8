/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CategoryReportEntry,
  CategoryStats,
  CombinedRecord,
  MeasurementSeries,
  MemorySnapshot,
  RunMetadata,
} from '../types.js';
import { logConsole } from '../logging.js';
import { runKey } from '../run-metadata.js';
import { parseTimeLog } from '../streams/time-log.js';
import { parseMemoryLog } from '../streams/memory-log.js';
import { buildMeasurementSeries } from '../series/series-builder.js';
import { matchStreams } from '../correlation/cross-stream-matcher.js';
import {
  aggregateByCategory,
  orderCategoryReport,
  type CategoryReportOptions,
} from '../stats/aggregator.js';

export type RunAnalysisOptions = CategoryReportOptions;

export interface RunAnalysis {
  metadata: RunMetadata;
  series: MeasurementSeries;
  records: CombinedRecord[];
  stats: Map<string, CategoryStats>;
  /** Categories in report order. */
  categories: CategoryReportEntry[];
  /** Memory state right after initialization, from the memory log. */
  initialization?: MemorySnapshot;
  timeOperations: number;
  memoryOperations: number;
}

export interface RunLogSources {
  timeLines: Iterable<string>;
  memoryLines: Iterable<string>;
}

/**
 * Runs both pipelines over one run's logs: the measurement series from the
 * memory log, and the cross-stream operation statistics. The two are
 * independent; a memory log without samples leaves the series empty and the
 * operation records without memory deltas.
 */
export const analyseRunLogs = (
  metadata: RunMetadata,
  sources: RunLogSources,
  options: RunAnalysisOptions = {},
): RunAnalysis => {
  const memoryLines = [...sources.memoryLines];
  const series = buildMeasurementSeries(memoryLines);
  const time = parseTimeLog(sources.timeLines);
  const memory = parseMemoryLog(memoryLines);
  logConsole('debug', `Correlated ${runKey(metadata)}`, [
    ['time spans', time.closed.length],
    ['time unmatched ends', time.unmatchedEnds],
    ['time unclosed', time.discardedOpen],
    ['memory spans', memory.closed.length],
    ['memory unmatched ends', memory.unmatchedEnds],
    ['memory unclosed', memory.discardedOpen],
    ['samples', series.samples.length],
  ]);

  const records = matchStreams(time.closed, memory.closed);
  const stats = aggregateByCategory(records);
  return {
    metadata,
    series,
    records,
    stats,
    categories: orderCategoryReport(stats, options),
    initialization: memory.initialization,
    timeOperations: time.closed.length + time.discardedOpen,
    memoryOperations: memory.closed.length + memory.discardedOpen,
  };
};
