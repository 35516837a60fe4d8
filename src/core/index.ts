/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './logging.js';
export * from './run-metadata.js';
export { parseLogTimestamp, compareTimestamps, elapsedSeconds } from './parsing/timestamp.js';
export { tokenizeLine } from './parsing/tokenizer.js';
export {
  classifyPayload,
  categorizeOperation,
  extractOperation,
  matchLifecyclePhrase,
  LIFECYCLE_PHRASES,
} from './parsing/classifier.js';
export { SpanCorrelator, type SpanCorrelation } from './correlation/span-correlator.js';
export { matchStreams } from './correlation/cross-stream-matcher.js';
export { parseTimeLog, type TimeLogData } from './streams/time-log.js';
export { parseMemoryLog, type MemoryLogData } from './streams/memory-log.js';
export { MeasurementSeriesBuilder, buildMeasurementSeries } from './series/series-builder.js';
export * from './stats/aggregator.js';
export { analyseRunLogs, type RunAnalysis, type RunAnalysisOptions } from './pipeline/run-analysis.js';
