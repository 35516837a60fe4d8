/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogTimestamp } from '../types.js';
import { tokenizeLine } from '../parsing/tokenizer.js';
import { classifyPayload } from '../parsing/classifier.js';
import { SpanCorrelator, type SpanCorrelation } from '../correlation/span-correlator.js';

export interface TimeLogData extends SpanCorrelation<LogTimestamp> {
  /** First `initialized` event of the run. */
  initialization?: LogTimestamp;
}

/**
 * Extracts timed operation spans from the high-resolution time log.
 * Only `TIMESTAMP : TEXT` lines carry events here.
 */
export const parseTimeLog = (lines: Iterable<string>): TimeLogData => {
  const correlator = new SpanCorrelator<LogTimestamp>();
  let initialization: LogTimestamp | undefined;

  for (const raw of lines) {
    const line = tokenizeLine(raw);
    if (!line || line.kind !== 'event') {
      continue;
    }
    for (const tag of classifyPayload(line.payload)) {
      if (tag.type === 'initialized') {
        if (!initialization) {
          initialization = line.timestamp;
        }
      } else if (tag.type === 'operation') {
        if (tag.phase === 'start') {
          correlator.start(tag.name, tag.category, line.timestamp);
        } else {
          correlator.end(tag.name, line.timestamp);
        }
      }
    }
  }

  return { ...correlator.finish(), initialization };
};
