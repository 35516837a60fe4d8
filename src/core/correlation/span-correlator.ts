/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ClosedSpan, Span } from '../types.js';

export interface SpanCorrelation<TMark> {
  /** Closed spans in the order they were opened. */
  closed: ClosedSpan<TMark>[];
  /** Spans still open when the input ended. They are not reported. */
  discardedOpen: number;
  /** End events with no open span of the same name. */
  unmatchedEnds: number;
}

const isClosed = <TMark>(span: Span<TMark>): span is ClosedSpan<TMark> => span.end !== undefined;

/**
 * Pairs Start/End events by operation name. Open spans of one name form a
 * stack: an End closes the most recently opened span of that name.
 */
export class SpanCorrelator<TMark> {
  private readonly openByName = new Map<string, Span<TMark>[]>();
  private readonly opened: Span<TMark>[] = [];
  private unmatchedEnds = 0;

  start(name: string, category: string, mark: TMark): Span<TMark> {
    const span: Span<TMark> = { name, category, start: mark };
    const stack = this.openByName.get(name);
    if (stack) {
      stack.push(span);
    } else {
      this.openByName.set(name, [span]);
    }
    this.opened.push(span);
    return span;
  }

  end(name: string, mark: TMark): ClosedSpan<TMark> | undefined {
    const span = this.openByName.get(name)?.pop();
    if (!span) {
      this.unmatchedEnds += 1;
      return undefined;
    }
    const closed: ClosedSpan<TMark> = Object.assign(span, { end: mark });
    return closed;
  }

  openCount(name: string): number {
    return this.openByName.get(name)?.length ?? 0;
  }

  finish(): SpanCorrelation<TMark> {
    const closed = this.opened.filter(isClosed);
    return {
      closed,
      discardedOpen: this.opened.length - closed.length,
      unmatchedEnds: this.unmatchedEnds,
    };
  }
}
