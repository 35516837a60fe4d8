/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CategoryReportEntry, CategoryStats, CombinedRecord } from '../types.js';

/** Section order of the operation report. */
export const REPORT_CATEGORY_ORDER = [
  'Batch',
  'Batch Transmission',
  'Integer',
  'Encryption',
  'Transciphering',
  'Decryption',
] as const;

const EMPTY_STATS: CategoryStats = {
  count: 0,
  avgDurationSeconds: 0,
  avgRamDeltaKb: 0,
  avgSwapDeltaKb: 0,
  maxRamPeakKb: 0,
};

export const groupByCategory = (
  records: ReadonlyArray<CombinedRecord>,
): Map<string, CombinedRecord[]> => {
  const groups = new Map<string, CombinedRecord[]>();
  for (const record of records) {
    const group = groups.get(record.category);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.category, [record]);
    }
  }
  return groups;
};

export const computeCategoryStats = (records: ReadonlyArray<CombinedRecord>): CategoryStats => {
  if (records.length === 0) {
    return { ...EMPTY_STATS };
  }
  const mean = (pick: (record: CombinedRecord) => number): number =>
    records.reduce((sum, record) => sum + pick(record), 0) / records.length;
  return {
    count: records.length,
    avgDurationSeconds: mean((record) => record.durationSeconds),
    avgRamDeltaKb: mean((record) => record.ramDeltaKb),
    avgSwapDeltaKb: mean((record) => record.swapDeltaKb),
    maxRamPeakKb: records.reduce(
      (max, record) => Math.max(max, record.ramPeakKb),
      records[0].ramPeakKb,
    ),
  };
};

export const aggregateByCategory = (
  records: ReadonlyArray<CombinedRecord>,
): Map<string, CategoryStats> => {
  const stats = new Map<string, CategoryStats>();
  for (const [category, group] of groupByCategory(records)) {
    stats.set(category, computeCategoryStats(group));
  }
  return stats;
};

export interface CategoryReportOptions {
  /**
   * Append categories outside {@link REPORT_CATEGORY_ORDER}, sorted by name.
   * The default report leaves them out.
   */
  includeUnlisted?: boolean;
}

/**
 * Orders non-empty categories for reporting.
 */
export const orderCategoryReport = (
  stats: ReadonlyMap<string, CategoryStats>,
  options: CategoryReportOptions = {},
): CategoryReportEntry[] => {
  const listed: readonly string[] = REPORT_CATEGORY_ORDER;
  const categories = listed.filter((category) => stats.has(category));
  if (options.includeUnlisted) {
    const unlisted = [...stats.keys()]
      .filter((category) => !listed.includes(category))
      .sort();
    categories.push(...unlisted);
  }
  return categories.flatMap((category) => {
    const entry = stats.get(category);
    return entry && entry.count > 0 ? [{ category, stats: entry }] : [];
  });
};
