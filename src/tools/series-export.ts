/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  LifecycleKind,
  LogTimestamp,
  MeasurementSeries,
  PiType,
  RunMetadata,
} from '../core/types.js';
import { elapsedSeconds } from '../core/parsing/timestamp.js';
import { variantLabel } from '../core/run-metadata.js';
import { writeJsonFile } from './files.js';

export interface SeriesPoint {
  timestamp: string;
  elapsedSeconds: number;
  /** Position on the chart's time axis, see {@link ChartHints.timeAxis}. */
  axisTime: number;
  ramMb: number;
  swapKb: number;
  /** SWAP in {@link ChartHints.swapUnit}. */
  swap: number;
  inBatch: boolean;
}

export type TimeAxis = 'hours' | 'seconds' | 'piecewise';
export type SwapUnit = 'kB' | 'bytes' | 'MB';

export interface ChartHints {
  title: string;
  /** Client/plain runs swap heavily and are drawn as stacked RAM + SWAP. */
  kind: 'stacked' | 'ram';
  piType: PiType;
  /**
   * Server runs last hours. On a Pi Zero the first 50 s take two axis units
   * and every further 5 s one unit.
   */
  timeAxis: TimeAxis;
  timeLabel: string;
  swapUnit: SwapUnit;
  swapLabel: string;
  showPeak: boolean;
}

export interface SeriesDocument {
  metadata: RunMetadata;
  initTimestamp?: string;
  peak?: { timestamp: string; elapsedSeconds: number; axisTime: number; ramMb: number };
  markers: Array<{ kind: LifecycleKind; timestamp: string; ramMb: number; swapKb: number }>;
  points: SeriesPoint[];
  chart: ChartHints;
}

const ZERO_STRETCH_SECONDS = 50;

const timeAxisFor = (metadata: RunMetadata, piType: PiType): TimeAxis => {
  if (metadata.component === 'server') {
    return 'hours';
  }
  return piType === 'zero' ? 'piecewise' : 'seconds';
};

const TIME_LABELS: Record<TimeAxis, string> = {
  hours: 'Time (Hours)',
  seconds: 'Time (Seconds)',
  piecewise: 'Time',
};

export const scaleTimeAxis = (seconds: number, axis: TimeAxis): number => {
  switch (axis) {
    case 'hours':
      return seconds / 3600;
    case 'piecewise':
      return seconds <= ZERO_STRETCH_SECONDS
        ? (seconds * 2) / ZERO_STRETCH_SECONDS
        : 2 + (seconds - ZERO_STRETCH_SECONDS) / 5;
    case 'seconds':
      return seconds;
  }
};

/** Plain client runs show SWAP in bytes on a 3B and in MB on a Zero. */
const swapUnitFor = (metadata: RunMetadata, piType: PiType): SwapUnit => {
  if (metadata.component !== 'client' || metadata.variant !== 'HE') {
    return 'kB';
  }
  return piType === 'zero' ? 'MB' : 'bytes';
};

export const convertSwap = (kb: number, unit: SwapUnit): number => {
  switch (unit) {
    case 'bytes':
      return kb * 1024;
    case 'MB':
      return kb / 1024;
    case 'kB':
      return kb;
  }
};

export const chartHintsFor = (
  metadata: RunMetadata,
  series: MeasurementSeries,
  piType: PiType = '3b',
): ChartHints => {
  const kind = metadata.component === 'client' && metadata.variant === 'HE' ? 'stacked' : 'ram';
  const subject = kind === 'stacked' ? 'Stacked RAM + SWAP Usage Over Time' : 'RAM Usage Over Time';
  const timeAxis = timeAxisFor(metadata, piType);
  const swapUnit = swapUnitFor(metadata, piType);
  return {
    title: `${metadata.component.toUpperCase()} ${variantLabel(metadata.variant)} - ${subject}`,
    kind,
    piType,
    timeAxis,
    timeLabel: TIME_LABELS[timeAxis],
    swapUnit,
    swapLabel: `SWAP Usage (${swapUnit === 'bytes' ? 'Bytes' : swapUnit})`,
    showPeak: series.peak !== undefined && metadata.component === 'ttp' && metadata.variant === 'HHE',
  };
};

/**
 * Converts a measurement series into the document handed to the plotter.
 * Elapsed times are relative to the first sample.
 */
export const toSeriesDocument = (
  metadata: RunMetadata,
  series: MeasurementSeries,
  piType: PiType = '3b',
): SeriesDocument => {
  const chart = chartHintsFor(metadata, series, piType);
  const origin = series.samples[0]?.timestamp;
  const since = (timestamp: LogTimestamp): number =>
    origin ? elapsedSeconds(origin, timestamp) : 0;

  return {
    metadata,
    initTimestamp: series.initTimestamp?.text,
    peak: series.peak
      ? {
          timestamp: series.peak.timestamp.text,
          elapsedSeconds: since(series.peak.timestamp),
          axisTime: scaleTimeAxis(since(series.peak.timestamp), chart.timeAxis),
          ramMb: series.peak.ramKb / 1024,
        }
      : undefined,
    markers: series.markers.map((marker) => ({
      kind: marker.kind,
      timestamp: marker.timestamp.text,
      ramMb: marker.ramMb,
      swapKb: marker.swapKb,
    })),
    points: series.samples.map((sample) => ({
      timestamp: sample.timestamp.text,
      elapsedSeconds: since(sample.timestamp),
      axisTime: scaleTimeAxis(since(sample.timestamp), chart.timeAxis),
      ramMb: sample.ramKb / 1024,
      swapKb: sample.swapKb,
      swap: convertSwap(sample.swapKb, chart.swapUnit),
      inBatch: sample.inBatch,
    })),
    chart,
  };
};

export const writeSeriesFile = async (
  filePath: string,
  metadata: RunMetadata,
  series: MeasurementSeries,
  piType: PiType = '3b',
): Promise<void> => {
  await writeJsonFile(filePath, toSeriesDocument(metadata, series, piType));
};
