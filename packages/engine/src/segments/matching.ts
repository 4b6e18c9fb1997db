// Segment name resolution inside per-period disclosures.
// The matching mode changes which revenues are valued, so it is always an explicit choice.

import type { SegmentDisclosure, SegmentMatching, SegmentRevenuePoint } from '../types.js';
import { SegmentNotFoundError } from '../errors.js';

function normalizeLabel(label: string, matching: SegmentMatching): string {
  switch (matching) {
    case 'exact':
      return label;
    case 'case-insensitive':
      return label.toLowerCase();
    case 'normalized':
      return label.toLowerCase().replace(/[\s\-_]+/g, '');
  }
}

export function segmentLabelsMatch(a: string, b: string, matching: SegmentMatching): boolean {
  return normalizeLabel(a, matching) === normalizeLabel(b, matching);
}

/** Distinct segment labels across all periods, in first-seen order. */
export function listSegmentLabels(disclosures: readonly SegmentDisclosure[]): string[] {
  const seen = new Set<string>();
  for (const period of disclosures) {
    for (const s of period.segments) seen.add(s.label);
  }
  return [...seen];
}

/**
 * Pull one segment's revenue out of every period that discloses it.
 * Periods keep the order of `disclosures`.
 * @throws SegmentNotFoundError when no period lists the segment
 */
export function findSegmentRevenues(
  disclosures: readonly SegmentDisclosure[],
  segmentName: string,
  matching: SegmentMatching,
): SegmentRevenuePoint[] {
  const points: SegmentRevenuePoint[] = [];
  for (const period of disclosures) {
    const hit = period.segments.find(s => segmentLabelsMatch(s.label, segmentName, matching));
    if (hit) points.push({ periodLabel: period.periodLabel, revenue: hit.revenue });
  }
  if (points.length === 0) {
    throw new SegmentNotFoundError(segmentName, listSegmentLabels(disclosures));
  }
  return points;
}
