/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AnalysisErrorCode } from '../core/errors.js';
import type { RunMetadata } from '../core/types.js';

/**
 * `run`: the run is left out of the report. `series`: the run is reported
 * but its measurement series is not exported.
 */
export type FailureScope = 'run' | 'series';

export interface RunFailure {
  key: string;
  fileName: string;
  scope: FailureScope;
  code: AnalysisErrorCode;
  reason: string;
  timestamp: string;
}

export interface RunCompletion {
  key: string;
  metadata: RunMetadata;
  records: number;
  samples: number;
  categories: number;
}

/**
 * Progress callbacks of an analysis run. All optional.
 */
export interface AnalysisObserver {
  onDiscovery?(info: { runs: number }): void;
  onRunStart?(info: { key: string; index: number; total: number; metadata: RunMetadata }): void;
  onRunComplete?(info: RunCompletion): void;
  onRunFailed?(failure: RunFailure): void;
}
