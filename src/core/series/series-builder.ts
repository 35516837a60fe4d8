/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  LifecycleKind,
  LifecycleMarker,
  LogTimestamp,
  MeasurementSeries,
  PeakRam,
  Sample,
} from '../types.js';
import { tokenizeLine } from '../parsing/tokenizer.js';
import { classifyPayload } from '../parsing/classifier.js';

interface SampleDraft {
  timestamp: LogTimestamp;
  ramKb?: number;
  swapKb?: number;
  ramPeakKb?: number;
  inBatch: boolean;
}

/**
 * Scanning context for one memory log. Feed lines in file order with
 * {@link consume}, then call {@link build}.
 */
export class MeasurementSeriesBuilder {
  private readonly drafts = new Map<number, SampleDraft>();
  private readonly markers: LifecycleMarker[] = [];
  private inBatch = false;
  private pendingMarker?: LifecycleKind;
  private peak?: PeakRam;
  private initTimestamp?: LogTimestamp;

  consume(rawLine: string): void {
    const line = tokenizeLine(rawLine);
    if (!line) {
      return;
    }
    const tags = classifyPayload(line.payload);
    const draft = this.draftFor(line.timestamp);

    for (const tag of tags) {
      switch (tag.type) {
        case 'initialized':
          if (!this.initTimestamp) {
            this.initTimestamp = line.timestamp;
          }
          break;
        case 'lifecycle':
          this.pendingMarker = tag.kind;
          break;
        case 'batch':
          this.inBatch = tag.active;
          break;
        default:
          break;
      }
    }
    draft.inBatch = this.inBatch;

    for (const tag of tags) {
      switch (tag.type) {
        case 'ram':
          draft.ramKb = tag.kb;
          if (this.pendingMarker) {
            this.markers.push({
              kind: this.pendingMarker,
              timestamp: line.timestamp,
              ramMb: tag.kb / 1024,
              swapKb: draft.swapKb ?? 0,
            });
            this.pendingMarker = undefined;
          }
          break;
        case 'swap':
          draft.swapKb = tag.kb;
          break;
        case 'ram-peak':
          draft.ramPeakKb = Math.max(draft.ramPeakKb ?? 0, tag.kb);
          if (tag.kb > (this.peak?.ramKb ?? 0)) {
            this.peak = { ramKb: tag.kb, timestamp: line.timestamp };
          }
          break;
        default:
          break;
      }
    }
  }

  build(): MeasurementSeries {
    const initTimestamp = this.initTimestamp;
    const samples: Sample[] = [...this.drafts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, draft]) => draft)
      .filter((draft) => !initTimestamp || draft.timestamp.epochMicros >= initTimestamp.epochMicros)
      .flatMap((draft) =>
        draft.ramKb === undefined
          ? []
          : [
              {
                timestamp: draft.timestamp,
                ramKb: draft.ramKb,
                swapKb: draft.swapKb ?? 0,
                ramPeakKb: draft.ramPeakKb ?? 0,
                inBatch: draft.inBatch,
              },
            ],
      );

    return {
      samples,
      markers: [...this.markers],
      peak: this.peak,
      initTimestamp,
    };
  }

  private draftFor(timestamp: LogTimestamp): SampleDraft {
    const existing = this.drafts.get(timestamp.epochMicros);
    if (existing) {
      return existing;
    }
    const draft: SampleDraft = { timestamp, inBatch: this.inBatch };
    this.drafts.set(timestamp.epochMicros, draft);
    return draft;
  }
}

export const buildMeasurementSeries = (lines: Iterable<string>): MeasurementSeries => {
  const builder = new MeasurementSeriesBuilder();
  for (const line of lines) {
    builder.consume(line);
  }
  return builder.build();
};
