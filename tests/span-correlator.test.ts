import { describe, expect, it } from 'vitest';
import { SpanCorrelator } from '../src/core/correlation/span-correlator.js';

describe('SpanCorrelator', () => {
  it('closes the most recently opened span of a name first', () => {
    const correlator = new SpanCorrelator<string>();
    correlator.start('A', 'A', 't1');
    correlator.start('A', 'A', 't2');

    const closed = correlator.end('A', 't3');

    expect(closed).toEqual({ name: 'A', category: 'A', start: 't2', end: 't3' });
    expect(correlator.openCount('A')).toBe(1);

    const result = correlator.finish();
    expect(result.closed).toEqual([{ name: 'A', category: 'A', start: 't2', end: 't3' }]);
    expect(result.discardedOpen).toBe(1);
    expect(result.unmatchedEnds).toBe(0);
  });

  it('closes nested same-name spans inside out', () => {
    const correlator = new SpanCorrelator<number>();
    correlator.start('Batch', 'Batch', 1);
    correlator.start('Batch', 'Batch', 2);
    correlator.end('Batch', 3);
    correlator.end('Batch', 4);

    expect(correlator.finish().closed).toEqual([
      { name: 'Batch', category: 'Batch', start: 1, end: 4 },
      { name: 'Batch', category: 'Batch', start: 2, end: 3 },
    ]);
  });

  it('keeps different names independent and reports in opening order', () => {
    const correlator = new SpanCorrelator<number>();
    correlator.start('A', 'A', 1);
    correlator.start('B', 'B', 2);
    correlator.end('A', 3);
    correlator.end('B', 4);

    expect(correlator.finish().closed.map((span) => [span.name, span.start, span.end])).toEqual([
      ['A', 1, 3],
      ['B', 2, 4],
    ]);
  });

  it('discards an end without an open span', () => {
    const correlator = new SpanCorrelator<number>();
    correlator.start('A', 'A', 1);

    expect(correlator.end('B', 2)).toBeUndefined();
    expect(correlator.end('A', 3)).toEqual({ name: 'A', category: 'A', start: 1, end: 3 });
    expect(correlator.end('A', 4)).toBeUndefined();

    const result = correlator.finish();
    expect(result.closed).toHaveLength(1);
    expect(result.unmatchedEnds).toBe(2);
    expect(result.discardedOpen).toBe(0);
  });
});
