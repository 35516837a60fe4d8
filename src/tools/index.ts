/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './files.js';
export * from './run-discovery.js';
export * from './report-writer.js';
export * from './series-export.js';
