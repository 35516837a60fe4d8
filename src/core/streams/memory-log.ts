/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventTag, MemorySnapshot } from '../types.js';
import { tokenizeLine } from '../parsing/tokenizer.js';
import { classifyPayload } from '../parsing/classifier.js';
import { SpanCorrelator, type SpanCorrelation } from '../correlation/span-correlator.js';

export interface MemoryLogData extends SpanCorrelation<MemorySnapshot> {
  /** Memory state reported right after the first `initialized` event. */
  initialization?: MemorySnapshot;
}

type OperationTag = Extract<EventTag, { type: 'operation' }>;

interface PendingEvent {
  initialized: boolean;
  operation?: OperationTag;
}

/**
 * Extracts memory snapshots per operation from the memory log. The logger
 * writes an event line followed by SWAP / RAM Peak / RAM reading lines; the
 * event is resolved when its RAM reading arrives, with whatever values were
 * read since the event line.
 */
export const parseMemoryLog = (lines: Iterable<string>): MemoryLogData => {
  const correlator = new SpanCorrelator<MemorySnapshot>();
  let initialization: MemorySnapshot | undefined;
  let pending: PendingEvent | undefined;
  let snapshot: MemorySnapshot = {};

  const resolve = (event: PendingEvent): void => {
    const captured = { ...snapshot };
    if (event.initialized) {
      if (!initialization) {
        initialization = captured;
      }
    } else if (event.operation?.phase === 'start') {
      correlator.start(event.operation.name, event.operation.category, captured);
    } else if (event.operation?.phase === 'end') {
      correlator.end(event.operation.name, captured);
    }
  };

  for (const raw of lines) {
    const line = tokenizeLine(raw);
    if (!line) {
      continue;
    }
    const tags = classifyPayload(line.payload);
    if (line.kind === 'event') {
      snapshot = {};
      pending = {
        initialized: tags.some((tag) => tag.type === 'initialized'),
        operation: tags.find((tag): tag is OperationTag => tag.type === 'operation'),
      };
    }
    for (const tag of tags) {
      switch (tag.type) {
        case 'swap':
          snapshot.swapKb = tag.kb;
          break;
        case 'ram-peak':
          snapshot.ramPeakKb = tag.kb;
          break;
        case 'ram':
          snapshot.ramKb = tag.kb;
          if (pending) {
            resolve(pending);
            pending = undefined;
          }
          break;
        default:
          break;
      }
    }
  }

  return { ...correlator.finish(), initialization };
};
