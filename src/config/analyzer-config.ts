/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import type { PiType } from '../core/types.js';

export interface AnalyzerEnvConfig {
  timeDir: string;
  memoryDir: string;
  outputDir: string;
  piType: PiType;
}

const DEFAULT_TIME_DIR = 'data_time';
const DEFAULT_MEMORY_DIR = 'data_memory';
const DEFAULT_OUTPUT_DIR = 'data_analysed';
const DEFAULT_PI_TYPE: PiType = '3b';

export const parsePiType = (value: unknown): PiType | undefined =>
  value === '3b' || value === 'zero' ? value : undefined;

/**
 * Directory defaults, overridable through PERF_DATA_TIME_DIR,
 * PERF_DATA_MEMORY_DIR and PERF_OUTPUT_DIR. Relative paths resolve against `cwd`.
 * PERF_PI_TYPE selects the chart scaling; unknown values fall back to `3b`.
 */
export function resolveAnalyzerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AnalyzerEnvConfig {
  return {
    timeDir: resolve(cwd, env['PERF_DATA_TIME_DIR'] || DEFAULT_TIME_DIR),
    memoryDir: resolve(cwd, env['PERF_DATA_MEMORY_DIR'] || DEFAULT_MEMORY_DIR),
    outputDir: resolve(cwd, env['PERF_OUTPUT_DIR'] || DEFAULT_OUTPUT_DIR),
    piType: parsePiType(env['PERF_PI_TYPE']) ?? DEFAULT_PI_TYPE,
  };
}
