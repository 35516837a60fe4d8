/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runPerformanceAnalysis,
  formatRunStamp,
  type PerformanceAnalysisOptions,
  type PerformanceAnalysisResult,
} from './performance-analysis.js';

export { writeFailureReport } from './report-writers.js';
