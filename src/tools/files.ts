/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { LogReadError } from '../core/errors.js';

/**
 * Reads a whole log file into trimmed, non-empty lines.
 *
 * @throws LogReadError when the file is missing or unreadable
 */
export const readLogLines = async (filePath: string): Promise<string[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new LogReadError(filePath, error);
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const writeTextFile = async (filePath: string, text: string): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, text, 'utf8');
};

export const writeJsonFile = async (filePath: string, data: unknown): Promise<void> => {
  await writeTextFile(filePath, JSON.stringify(data, null, 2));
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
