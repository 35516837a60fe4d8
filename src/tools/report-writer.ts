/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CategoryReportEntry, MemorySnapshot, RunMetadata } from '../core/types.js';
import { runKey } from '../core/run-metadata.js';
import { writeTextFile } from './files.js';

export interface ReportRun {
  metadata: RunMetadata;
  initialization?: MemorySnapshot;
  categories: CategoryReportEntry[];
}

const RULE = '='.repeat(100);
const THIN_RULE = '-'.repeat(100);

/** `(1 h 2 m 3 s)`, whole seconds. */
export const formatDuration = (seconds: number): string => {
  const total = Math.trunc(seconds);
  const hours = Math.trunc(total / 3600);
  const minutes = Math.trunc((total % 3600) / 60);
  const secs = total % 60;
  return `(${hours} h ${minutes} m ${secs} s)`;
};

/** `12.34 MB (12636 kB)` */
export const formatMemory = (kb: number): string =>
  `${(kb / 1024).toFixed(2)} MB (${kb.toFixed(0)} kB)`;

const formatRun = (run: ReportRun): string[] => {
  const { metadata } = run;
  const lines = [
    '',
    RULE,
    `COMPONENT: ${metadata.component.toUpperCase()} | VARIANT: ${metadata.variant}`,
    RULE,
    `Source file: ${metadata.fileName}`,
    `Batch count: ${metadata.batchCount} | Batch size: ${metadata.batchSize} | Integer size: ${metadata.integerBits} bit`,
    '',
  ];

  if (run.initialization) {
    lines.push(
      'AFTER INITIALIZATION:',
      THIN_RULE,
      `SWAP: ${formatMemory(run.initialization.swapKb ?? 0)}`,
      `RAM: ${formatMemory(run.initialization.ramKb ?? 0)}`,
      `RAM Peak: ${formatMemory(run.initialization.ramPeakKb ?? 0)}`,
      '',
    );
  }

  lines.push('OPERATION AVERAGES:', THIN_RULE);
  for (const { category, stats } of run.categories) {
    lines.push(
      '',
      `${category} Average (n=${stats.count}):`,
      `   Time diff: ${stats.avgDurationSeconds.toFixed(6)} s ${formatDuration(stats.avgDurationSeconds)}`,
      `   SWAP diff: ${formatMemory(stats.avgSwapDeltaKb)}`,
      `   RAM diff: ${formatMemory(stats.avgRamDeltaKb)}`,
      `   RAM Peak: ${formatMemory(stats.maxRamPeakKb)}`,
    );
  }
  lines.push('');
  return lines;
};

/**
 * Renders the text report. One section per component/variant, in key order;
 * the first run given for a key wins.
 */
export const formatAnalysisReport = (runs: ReadonlyArray<ReportRun>): string => {
  const byKey = new Map<string, ReportRun>();
  for (const run of runs) {
    const key = runKey(run.metadata);
    if (!byKey.has(key)) {
      byKey.set(key, run);
    }
  }
  const keys = [...byKey.keys()].sort();

  const lines = [RULE, 'PERFORMANCE ANALYSIS', RULE, ''];
  for (const key of keys) {
    const run = byKey.get(key);
    if (run) {
      lines.push(...formatRun(run));
    }
  }
  lines.push(RULE, 'END OF ANALYSIS', RULE);
  return lines.join('\n');
};

export const writeAnalysisReport = async (
  filePath: string,
  runs: ReadonlyArray<ReportRun>,
): Promise<void> => {
  await writeTextFile(filePath, formatAnalysisReport(runs));
};
