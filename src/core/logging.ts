/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogField = [string, string | number | undefined | null];

const isDebugEnabled = (): boolean => {
  const flag = process.env['PERF_LOG_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0';
};

/**
 * Builds the multiline block printed by {@link logConsole}.
 * Empty fields are dropped; keys are padded to a common width.
 */
export const formatLogBlock = (label: string, fields: LogField[]): string => {
  const filtered = fields.flatMap(([key, value]): Array<[string, string | number]> =>
    value === undefined || value === null || value === '' ? [] : [[key, value]],
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[perf-log] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return lines.join('\n');
};

/**
 * Unified console logger with structured, multiline output.
 * `debug` blocks are printed only when PERF_LOG_DEBUG is set.
 */
export const logConsole = (level: LogLevel, label: string, fields: LogField[] = []): void => {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  const output = formatLogBlock(label, fields);
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};
