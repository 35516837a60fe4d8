/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ClosedSpan, CombinedRecord, LogTimestamp, MemorySnapshot } from '../types.js';
import { elapsedSeconds } from '../parsing/timestamp.js';

/**
 * Joins time-log spans with memory-log spans by operation name.
 *
 * Every time-log span yields a record. Its memory figures come from the first
 * closed memory span carrying the same name, so repeated names (one per batch,
 * say) all share that first memory span; occurrences are not paired by index.
 * Without a memory counterpart the memory fields stay at zero.
 */
export const matchStreams = (
  timeSpans: ReadonlyArray<ClosedSpan<LogTimestamp>>,
  memorySpans: ReadonlyArray<ClosedSpan<MemorySnapshot>>,
): CombinedRecord[] => {
  const firstByName = new Map<string, ClosedSpan<MemorySnapshot>>();
  for (const span of memorySpans) {
    if (!firstByName.has(span.name)) {
      firstByName.set(span.name, span);
    }
  }

  return timeSpans.map((span) => {
    const memory = firstByName.get(span.name);
    return {
      name: span.name,
      category: span.category,
      durationSeconds: elapsedSeconds(span.start, span.end),
      ramDeltaKb: memory ? (memory.end.ramKb ?? 0) - (memory.start.ramKb ?? 0) : 0,
      swapDeltaKb: memory ? (memory.end.swapKb ?? 0) - (memory.start.swapKb ?? 0) : 0,
      ramPeakKb: memory?.end.ramPeakKb ?? 0,
      memoryMatched: memory !== undefined,
    };
  });
};
