// Segment Data Preparer
// Aligns a segment's disclosed revenue with company statements and allocates costs to it.

import type { SegmentRevenuePoint, SegmentSeries, StatementPeriod } from '../types.js';
import {
  InsufficientDataError,
  ParameterOutOfRangeError,
  SegmentNotFoundError,
} from '../errors.js';
import { proportionalAllocation, type AllocationStrategy } from './allocation.js';

export interface PrepareSegmentInput {
  segment: string;
  /** Newest-first, as returned by the data provider. */
  revenues: readonly SegmentRevenuePoint[];
  /** Newest-first, as returned by the data provider. */
  statements: readonly StatementPeriod[];
  periods: number;
  allocation?: AllocationStrategy;
}

/**
 * Build a chronological series of at most `periods` periods. Only periods present in
 * both the segment disclosure and the statements are kept.
 */
export function prepareSegmentSeries(input: PrepareSegmentInput): SegmentSeries {
  const { segment, revenues, statements, periods } = input;
  const allocation = input.allocation ?? proportionalAllocation;

  if (!Number.isInteger(periods) || periods < 1) {
    throw new ParameterOutOfRangeError('periods', periods, { min: 1 });
  }
  if (revenues.length === 0) throw new SegmentNotFoundError(segment, []);

  const byLabel = new Map(statements.map(s => [s.periodLabel, s] as const));
  const aligned: Array<{ point: SegmentRevenuePoint; company: StatementPeriod }> = [];
  for (const point of revenues) {
    const company = byLabel.get(point.periodLabel);
    if (company) aligned.push({ point, company });
    if (aligned.length === periods) break;
  }

  if (aligned.length === 0) {
    throw new InsufficientDataError(
      `Segment '${segment}' has no period that also appears in the company statements`,
      { segment, segmentPeriods: revenues.map(r => r.periodLabel) },
    );
  }

  aligned.reverse();

  const periodLabels: string[] = [];
  const segmentRevenues: number[] = [];
  const companyRevenues: number[] = [];
  const shares: number[] = [];
  const grossProfits: number[] = [];
  const researchAndDevelopment: number[] = [];
  const operatingIncomes: number[] = [];
  const operatingMargins: number[] = [];

  for (const { point, company } of aligned) {
    if (!Number.isFinite(point.revenue) || point.revenue < 0) {
      throw new ParameterOutOfRangeError(`${segment} revenue (${point.periodLabel})`, point.revenue, { min: 0 });
    }
    const allocated = allocation.allocate(point.revenue, company);
    periodLabels.push(point.periodLabel);
    segmentRevenues.push(point.revenue);
    companyRevenues.push(company.revenue);
    shares.push(allocated.share);
    grossProfits.push(allocated.grossProfit);
    researchAndDevelopment.push(allocated.researchAndDevelopment);
    operatingIncomes.push(allocated.operatingIncome);
    // A zero-revenue period carries the company margin so the mean stays defined
    operatingMargins.push(
      point.revenue > 0 ? allocated.operatingIncome / point.revenue : company.operatingIncome / company.revenue,
    );
  }

  return {
    segment,
    periodLabels,
    revenues: segmentRevenues,
    companyRevenues,
    shares,
    grossProfits,
    researchAndDevelopment,
    operatingIncomes,
    operatingMargins,
  };
}

/** Mean allocated operating margin over the series. */
export function averageOperatingMargin(series: SegmentSeries): number {
  const margins = series.operatingMargins;
  return margins.reduce((sum, m) => sum + m, 0) / margins.length;
}
