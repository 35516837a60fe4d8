/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import type { RunFailure } from '../types/observer.js';

/**
 * Writes the runs, or run series, that were skipped, and why, to a JSON file.
 *
 * @param path - Output file path
 * @param failures - Skipped runs
 */
export async function writeFailureReport(path: string, failures: RunFailure[]): Promise<void> {
  const report = {
    timestamp: new Date().toISOString(),
    totalFailures: failures.length,
    failures: failures.map((f) => ({
      run: f.key,
      fileName: f.fileName,
      scope: f.scope,
      code: f.code,
      reason: f.reason,
      timestamp: f.timestamp,
    })),
  };
  await fs.writeFile(path, JSON.stringify(report, null, 2), 'utf-8');
}
