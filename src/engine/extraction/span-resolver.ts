/**
 * Span Resolver - picks a non-overlapping set of candidate term spans
 *
 * Policy is leftmost-longest: candidates are ordered by start, then by
 * length (longest first), and accepted greedily. Spans that only share a
 * boundary do not overlap.
 */

import type { Span } from '../types/common.js';

export function spansOverlap(a: Pick<Span, 'start' | 'end'>, b: Pick<Span, 'start' | 'end'>): boolean {
  return a.start < b.end && b.start < a.end;
}

export function resolveSpans<T extends Span>(spans: readonly T[]): T[] {
  if (spans.length === 0) return [];

  // Array#sort is stable, so equal keys keep encounter order
  const ordered = [...spans].sort(
    (a, b) => a.start - b.start || (b.end - b.start) - (a.end - a.start)
  );

  const accepted: T[] = [];
  for (const span of ordered) {
    if (!accepted.some(kept => spansOverlap(kept, span))) {
      accepted.push(span);
    }
  }

  return accepted.sort((a, b) => a.start - b.start);
}
