/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RunComponent, RunMetadata, RunVariant } from './types.js';

const RUN_FILE_NAME =
  /(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})_(HHE|HE)_BatchNr:(\d+)_BatchSize:(\d+)_IntSize:(\d+)_(client|server|ttp)_(HHE|HE)/;

const isComponent = (value: string): value is RunComponent =>
  value === 'client' || value === 'server' || value === 'ttp';

const isVariant = (value: string): value is RunVariant => value === 'HE' || value === 'HHE';

/**
 * Reads run metadata from a log file name such as
 * `2025-03-01_10-00-00_HHE_BatchNr:4_BatchSize:8_IntSize:16_client_HHE.txt`.
 */
export const parseRunFileName = (fileName: string): RunMetadata | undefined => {
  const match = RUN_FILE_NAME.exec(fileName);
  if (!match) {
    return undefined;
  }
  const [, timestamp, variant, batchCount, batchSize, integerBits, component] = match;
  if (!isVariant(variant) || !isComponent(component)) {
    return undefined;
  }
  return {
    component,
    variant,
    timestamp,
    batchCount: Number.parseInt(batchCount, 10),
    batchSize: Number.parseInt(batchSize, 10),
    integerBits: Number.parseInt(integerBits, 10),
    fileName,
  };
};

export const runKey = (metadata: Pick<RunMetadata, 'component' | 'variant'>): string =>
  `${metadata.component}_${metadata.variant}`;

export const variantLabel = (variant: RunVariant): string =>
  variant === 'HHE' ? 'Hybrid' : 'Plain';
