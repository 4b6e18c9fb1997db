// Segment allocation strategies
// Companies disclose segment revenue but rarely segment costs. A strategy turns one
// period's company totals into segment estimates; swap it when real disclosures exist.

import type { StatementPeriod } from '../types.js';
import { DivisionUndefinedError } from '../errors.js';

export interface SegmentAllocation {
  share: number;
  grossProfit: number;
  researchAndDevelopment: number;
  operatingIncome: number;
}

export interface AllocationStrategy {
  readonly name: string;
  allocate(segmentRevenue: number, company: StatementPeriod): SegmentAllocation;
}

/** Allocate company-wide figures by the segment's share of company revenue. */
export const proportionalAllocation: AllocationStrategy = {
  name: 'proportional-to-revenue',
  allocate(segmentRevenue, company) {
    if (company.revenue <= 0) {
      throw new DivisionUndefinedError(
        `Company revenue for ${company.periodLabel} is ${company.revenue}; segment share is undefined`,
        { periodLabel: company.periodLabel, revenue: company.revenue },
      );
    }
    const share = segmentRevenue / company.revenue;
    return {
      share,
      grossProfit: company.grossProfit * share,
      researchAndDevelopment: company.researchAndDevelopment * share,
      operatingIncome: company.operatingIncome * share,
    };
  },
};
