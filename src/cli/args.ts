/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { parsePiType, type AnalyzerEnvConfig } from '../config/analyzer-config.js';
import type { PiType } from '../core/types.js';

export interface RunnerOptions {
  timeDir: string;
  memoryDir: string;
  outputDir: string;
  piType: PiType;
  timeLogPath?: string;
  memoryLogPath?: string;
  includeUnlistedCategories?: boolean;
  exportSeries: boolean;
  interactive?: boolean;
}

const requireValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

export const parseArgs = (argv: string[], defaults: AnalyzerEnvConfig): RunnerOptions => {
  const options: RunnerOptions = {
    timeDir: defaults.timeDir,
    memoryDir: defaults.memoryDir,
    outputDir: defaults.outputDir,
    piType: defaults.piType,
    exportSeries: true,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--time-dir':
        options.timeDir = resolve(requireValue(argv, ++i, arg));
        break;
      case '--memory-dir':
        options.memoryDir = resolve(requireValue(argv, ++i, arg));
        break;
      case '--output':
      case '-o':
        options.outputDir = resolve(requireValue(argv, ++i, arg));
        break;
      case '--pi-type': {
        const value = requireValue(argv, ++i, arg);
        const piType = parsePiType(value);
        if (!piType) {
          throw new Error(`Invalid value for --pi-type: ${value} (expected 3b or zero)`);
        }
        options.piType = piType;
        break;
      }
      case '--time-log':
        options.timeLogPath = resolve(requireValue(argv, ++i, arg));
        break;
      case '--memory-log':
        options.memoryLogPath = resolve(requireValue(argv, ++i, arg));
        break;
      case '--all-categories':
        options.includeUnlistedCategories = true;
        break;
      case '--no-series':
        options.exportSeries = false;
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if ((options.timeLogPath === undefined) !== (options.memoryLogPath === undefined)) {
    throw new Error('--time-log and --memory-log must be given together.');
  }

  return options;
};
