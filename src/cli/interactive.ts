/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import { parsePiType } from '../config/analyzer-config.js';
import type { RunnerOptions } from './args.js';

const readText = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const explicitPair = options.timeLogPath !== undefined;
  const responses = await prompts(
    [
      {
        type: explicitPair ? null : 'text',
        name: 'timeDir',
        message: 'Directory holding the time logs',
        initial: options.timeDir,
      },
      {
        type: explicitPair ? null : 'text',
        name: 'memoryDir',
        message: 'Directory holding the memory logs',
        initial: options.memoryDir,
      },
      {
        type: 'text',
        name: 'outputDir',
        message: 'Directory to store the report and chart series',
        initial: options.outputDir,
      },
      {
        type: 'select',
        name: 'piType',
        message: 'Device the runs were measured on',
        choices: [
          { title: 'Raspberry Pi 3B', value: '3b' },
          { title: 'Raspberry Pi Zero', value: 'zero' },
        ],
        initial: options.piType === 'zero' ? 1 : 0,
      },
      {
        type: 'toggle',
        name: 'includeUnlistedCategories',
        message: 'Report operations outside the standard categories?',
        initial: options.includeUnlistedCategories ?? false,
        active: 'yes',
        inactive: 'no',
      },
      {
        type: 'toggle',
        name: 'exportSeries',
        message: 'Export chart series as JSON?',
        initial: options.exportSeries,
        active: 'yes',
        inactive: 'no',
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  const timeDir = readText(responses.timeDir);
  if (timeDir) {
    options.timeDir = resolve(timeDir);
  }
  const memoryDir = readText(responses.memoryDir);
  if (memoryDir) {
    options.memoryDir = resolve(memoryDir);
  }
  const outputDir = readText(responses.outputDir);
  if (outputDir) {
    options.outputDir = resolve(outputDir);
  }
  const piType = parsePiType(responses.piType);
  if (piType) {
    options.piType = piType;
  }
  if (typeof responses.includeUnlistedCategories === 'boolean') {
    options.includeUnlistedCategories = responses.includeUnlistedCategories;
  }
  if (typeof responses.exportSeries === 'boolean') {
    options.exportSeries = responses.exportSeries;
  }
}
