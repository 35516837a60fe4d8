#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { PerformanceAnalysisOptions } from '../runner/index.js';
import { resolveExplicitRun } from '../tools/index.js';
import { resolveAnalyzerConfigFromEnv } from '../config/analyzer-config.js';
import { AnalyzerApp } from '../ui/analyzer-app.js';
import { parseArgs } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv, resolveAnalyzerConfigFromEnv());

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  const analysisOptions: PerformanceAnalysisOptions = {
    timeDir: options.timeDir,
    memoryDir: options.memoryDir,
    outputDir: options.outputDir,
    piType: options.piType,
    runs:
      options.timeLogPath && options.memoryLogPath
        ? [resolveExplicitRun(options.timeLogPath, options.memoryLogPath)]
        : undefined,
    includeUnlistedCategories: options.includeUnlistedCategories,
    exportSeries: options.exportSeries,
  };

  const { waitUntilExit } = render(<AnalyzerApp options={analysisOptions} />);
  await waitUntilExit();
};

const isEntryPoint = (): boolean => {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Failed to run performance log analyzer:', error);
    process.exit(1);
  });
}
