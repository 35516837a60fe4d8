/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type AnalysisErrorCode = 'LOG_UNREADABLE' | 'NO_VALID_DATA' | 'INVALID_RUN_NAME';

export interface AnalysisErrorOptions {
  filePath?: string;
  cause?: unknown;
}

/**
 * Failure that ends the analysis of a single run. Sibling runs carry on.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly filePath?: string;

  constructor(message: string, code: AnalysisErrorCode, options: AnalysisErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AnalysisError';
    this.code = code;
    this.filePath = options.filePath;
  }
}

export class LogReadError extends AnalysisError {
  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read log file ${filePath}: ${reason}`, 'LOG_UNREADABLE', { filePath, cause });
    this.name = 'LogReadError';
  }
}

export class NoValidDataError extends AnalysisError {
  constructor(filePath: string) {
    super(`No valid data in ${filePath}`, 'NO_VALID_DATA', { filePath });
    this.name = 'NoValidDataError';
  }
}

export class InvalidRunNameError extends AnalysisError {
  constructor(filePath: string) {
    super(
      `File name does not follow <time>_<HE|HHE>_BatchNr:<n>_BatchSize:<n>_IntSize:<n>_<component>_<HE|HHE>: ${filePath}`,
      'INVALID_RUN_NAME',
      { filePath },
    );
    this.name = 'InvalidRunNameError';
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError =>
  error instanceof AnalysisError;
