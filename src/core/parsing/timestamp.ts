/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogTimestamp } from '../types.js';

export const TIMESTAMP_SOURCE = String.raw`\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d+`;

const TIMESTAMP_PARTS = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d+)$/;

/**
 * Parses `YYYY-MM-DD HH:MM:SS.f+`. The clock is treated as zone-less; only
 * differences and ordering are meaningful.
 */
export const parseLogTimestamp = (text: string): LogTimestamp | undefined => {
  const match = TIMESTAMP_PARTS.exec(text);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second, fraction] = match;
  const millis = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  );
  const micros = Number(fraction.padEnd(6, '0').slice(0, 6));
  return { text, epochMicros: millis * 1000 + micros };
};

export const compareTimestamps = (a: LogTimestamp, b: LogTimestamp): number =>
  a.epochMicros - b.epochMicros;

export const elapsedSeconds = (from: LogTimestamp, to: LogTimestamp): number =>
  (to.epochMicros - from.epochMicros) / 1_000_000;
