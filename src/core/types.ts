/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Timestamp as written by the protocol's log writer (`YYYY-MM-DD HH:MM:SS.ffffff`).
 * `text` is kept verbatim; `epochMicros` is a zone-less microsecond count used
 * for ordering and durations.
 */
export interface LogTimestamp {
  readonly text: string;
  readonly epochMicros: number;
}

export type LineKind = 'event' | 'reading';

export interface TokenizedLine {
  timestamp: LogTimestamp;
  /** `event` lines are `TIMESTAMP : TEXT`; `reading` lines carry memory values after a bare space. */
  kind: LineKind;
  payload: string;
}

export type LifecycleKind = 'keys_params' | 'zeromq_start' | 'zeromq_end';

export type OperationPhase = 'start' | 'end';

export type EventTag =
  | { type: 'initialized' }
  | { type: 'lifecycle'; kind: LifecycleKind }
  | { type: 'batch'; active: boolean }
  | { type: 'ram'; kb: number }
  | { type: 'swap'; kb: number }
  | { type: 'ram-peak'; kb: number }
  | { type: 'operation'; phase: OperationPhase; name: string; category: string };

export interface MemorySnapshot {
  ramKb?: number;
  swapKb?: number;
  ramPeakKb?: number;
}

export interface Span<TMark> {
  name: string;
  category: string;
  start: TMark;
  end?: TMark;
}

export interface ClosedSpan<TMark> extends Span<TMark> {
  end: TMark;
}

export interface Sample {
  readonly timestamp: LogTimestamp;
  readonly ramKb: number;
  readonly swapKb: number;
  readonly ramPeakKb: number;
  readonly inBatch: boolean;
}

export interface LifecycleMarker {
  readonly kind: LifecycleKind;
  readonly timestamp: LogTimestamp;
  readonly ramMb: number;
  readonly swapKb: number;
}

export interface PeakRam {
  readonly ramKb: number;
  readonly timestamp: LogTimestamp;
}

export interface MeasurementSeries {
  samples: Sample[];
  markers: LifecycleMarker[];
  peak?: PeakRam;
  initTimestamp?: LogTimestamp;
}

export interface CombinedRecord {
  name: string;
  category: string;
  durationSeconds: number;
  ramDeltaKb: number;
  swapDeltaKb: number;
  ramPeakKb: number;
  /** False when no closed memory-log span carried the same name. */
  memoryMatched: boolean;
}

export interface CategoryStats {
  count: number;
  avgDurationSeconds: number;
  avgRamDeltaKb: number;
  avgSwapDeltaKb: number;
  maxRamPeakKb: number;
}

export interface CategoryReportEntry {
  category: string;
  stats: CategoryStats;
}

export type RunComponent = 'client' | 'server' | 'ttp';

/** `HE` is the plain variant, `HHE` the hybrid one. */
export type RunVariant = 'HE' | 'HHE';

export interface RunMetadata {
  readonly component: RunComponent;
  readonly variant: RunVariant;
  /** File timestamp, `YYYY-MM-DD_HH-MM-SS`. Sorts chronologically as a string. */
  readonly timestamp: string;
  readonly batchCount: number;
  readonly batchSize: number;
  readonly integerBits: number;
  readonly fileName: string;
}

/** Raspberry Pi model a run was measured on; it changes how charts scale their axes. */
export type PiType = '3b' | 'zero';
