import { describe, expect, it } from 'vitest';
import { matchStreams } from '../src/core/correlation/cross-stream-matcher.js';
import type { ClosedSpan, LogTimestamp, MemorySnapshot } from '../src/core/types.js';
import { at } from './helpers/logs.js';

const timeSpan = (name: string, category: string, start: string, end: string): ClosedSpan<LogTimestamp> => ({
  name,
  category,
  start: at(start),
  end: at(end),
});

const memorySpan = (name: string, start: MemorySnapshot, end: MemorySnapshot): ClosedSpan<MemorySnapshot> => ({
  name,
  category: name,
  start,
  end,
});

describe('matchStreams', () => {
  it('combines duration from the time log with memory deltas from the memory log', () => {
    const records = matchStreams(
      [timeSpan('Client Batch', 'Batch', '2025-03-01 10:00:00.000000', '2025-03-01 10:00:02.500000')],
      [
        memorySpan(
          'Client Batch',
          { ramKb: 1000, swapKb: 10, ramPeakKb: 1100 },
          { ramKb: 3000, swapKb: 40, ramPeakKb: 3500 },
        ),
      ],
    );

    expect(records).toEqual([
      {
        name: 'Client Batch',
        category: 'Batch',
        durationSeconds: 2.5,
        ramDeltaKb: 2000,
        swapDeltaKb: 30,
        ramPeakKb: 3500,
        memoryMatched: true,
      },
    ]);
  });

  it('keeps the duration when the memory log has no matching span', () => {
    const records = matchStreams(
      [timeSpan('TTP Integer', 'Integer', '2025-03-01 10:00:00.000000', '2025-03-01 10:00:01.000000')],
      [memorySpan('TTP Batch', { ramKb: 1 }, { ramKb: 2 })],
    );

    expect(records).toEqual([
      {
        name: 'TTP Integer',
        category: 'Integer',
        durationSeconds: 1,
        ramDeltaKb: 0,
        swapDeltaKb: 0,
        ramPeakKb: 0,
        memoryMatched: false,
      },
    ]);
  });

  it('counts missing snapshot fields as zero', () => {
    const [record] = matchStreams(
      [timeSpan('Server Integer', 'Integer', '2025-03-01 10:00:00.000000', '2025-03-01 10:00:00.250000')],
      [memorySpan('Server Integer', {}, { ramKb: 50 })],
    );

    expect(record).toMatchObject({ ramDeltaKb: 50, swapDeltaKb: 0, ramPeakKb: 0, memoryMatched: true });
  });

  // Occurrences of a repeated name are not paired by index: every time-log
  // occurrence reads the first memory-log occurrence.
  it('matches every occurrence of a repeated name to the first memory span', () => {
    const records = matchStreams(
      [
        timeSpan('Server Batch', 'Batch', '2025-03-01 10:00:00.000000', '2025-03-01 10:00:01.000000'),
        timeSpan('Server Batch', 'Batch', '2025-03-01 10:00:02.000000', '2025-03-01 10:00:04.000000'),
      ],
      [
        memorySpan('Server Batch', { ramKb: 100 }, { ramKb: 200 }),
        memorySpan('Server Batch', { ramKb: 200 }, { ramKb: 1100 }),
      ],
    );

    expect(records.map((record) => [record.durationSeconds, record.ramDeltaKb])).toEqual([
      [1, 100],
      [2, 100],
    ]);
  });
});
