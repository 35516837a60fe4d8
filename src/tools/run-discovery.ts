/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { basename, join } from 'node:path';
import type { RunMetadata } from '../core/types.js';
import { InvalidRunNameError } from '../core/errors.js';
import { logConsole } from '../core/logging.js';
import { parseRunFileName, runKey } from '../core/run-metadata.js';
import { fileExists } from './files.js';

export interface RunLogPair {
  metadata: RunMetadata;
  timeLogPath: string;
  memoryLogPath: string;
}

/**
 * Pairs time and memory logs that share a file name and keeps the newest run
 * per component/variant. Results are sorted by `component_variant`.
 */
export const discoverLatestRuns = async (
  timeDir: string,
  memoryDir: string,
): Promise<RunLogPair[]> => {
  if (!(await fileExists(timeDir))) {
    logConsole('warn', 'Time log directory not found', [['path', timeDir]]);
    return [];
  }

  const latest = new Map<string, RunLogPair>();
  const entries = await fs.readdir(timeDir);
  for (const fileName of entries) {
    if (!fileName.endsWith('.txt')) {
      continue;
    }
    const metadata = parseRunFileName(fileName);
    if (!metadata) {
      continue;
    }
    const memoryLogPath = join(memoryDir, fileName);
    if (!(await fileExists(memoryLogPath))) {
      continue;
    }
    const key = runKey(metadata);
    const current = latest.get(key);
    if (!current || metadata.timestamp > current.metadata.timestamp) {
      latest.set(key, { metadata, timeLogPath: join(timeDir, fileName), memoryLogPath });
    }
  }

  return [...latest.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, pair]) => pair);
};

/**
 * Builds a run from an explicit pair of files; metadata comes from the time
 * log's file name.
 *
 * @throws InvalidRunNameError when the name does not follow the run grammar
 */
export const resolveExplicitRun = (timeLogPath: string, memoryLogPath: string): RunLogPair => {
  const metadata = parseRunFileName(basename(timeLogPath));
  if (!metadata) {
    throw new InvalidRunNameError(timeLogPath);
  }
  return { metadata, timeLogPath, memoryLogPath };
};
