/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TokenizedLine } from '../types.js';
import { TIMESTAMP_SOURCE, parseLogTimestamp } from './timestamp.js';

const LINE_PREFIX = new RegExp(`^(${TIMESTAMP_SOURCE})(.*)$`);
const EVENT_SEPARATOR = ' : ';

/**
 * Splits a raw line into its timestamp and payload. Returns `undefined` for
 * anything without the timestamp prefix (blank lines, banners).
 */
export const tokenizeLine = (rawLine: string): TokenizedLine | undefined => {
  const line = rawLine.trim();
  const match = LINE_PREFIX.exec(line);
  if (!match) {
    return undefined;
  }
  const timestamp = parseLogTimestamp(match[1]);
  if (!timestamp) {
    return undefined;
  }
  const rest = match[2];
  if (rest.startsWith(EVENT_SEPARATOR) && rest.length > EVENT_SEPARATOR.length) {
    return { timestamp, kind: 'event', payload: rest.slice(EVENT_SEPARATOR.length).trim() };
  }
  return { timestamp, kind: 'reading', payload: rest.trim() };
};
