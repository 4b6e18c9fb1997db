// Multi-Period Excess Earnings Method (MPEEM)
// Operating income left after charging a required return on every contributory asset,
// of which a fixed fraction is attributed to the intangible.

import type { AssumptionSet, ValuationResult } from '../types.js';
import { discountProjection } from './discounting.js';
import { assertFraction, assertRevenueSeries, assertValidAssumptions } from './validation.js';

/**
 * Estimates the value of a contributory asset category for one period.
 * Segment balance sheets are not disclosed, so any implementation is a stand-in.
 */
export type ContributoryAssetProxy = (revenue: number, category: string) => number;

/** Asset value approximated as a fixed fraction of the period's revenue. */
export function revenueFractionProxy(fraction: number): ContributoryAssetProxy {
  assertFraction('proxyAssetFraction', fraction);
  return revenue => revenue * fraction;
}

export interface ExcessEarningsInput {
  operatingMargin: number;
  /** Category name to required return, e.g. { working_capital: 0.02 } */
  contributoryAssets: Readonly<Record<string, number>>;
  ipContributionFraction: number;
  proxy: ContributoryAssetProxy;
  /** Label reported in the result so the approximation stays visible. */
  proxyDescription?: string;
}

export function excessEarnings(
  revenues: readonly number[],
  assumptions: AssumptionSet,
  input: ExcessEarningsInput,
): ValuationResult {
  assertValidAssumptions(assumptions);
  assertRevenueSeries('excess-earnings', revenues);
  assertFraction('operatingMargin', input.operatingMargin);
  assertFraction('ipContributionFraction', input.ipContributionFraction);
  for (const [category, rate] of Object.entries(input.contributoryAssets)) {
    assertFraction(`contributoryAssets.${category}`, rate);
  }

  const afterTax = 1 - assumptions.taxRate;
  const categories = Object.entries(input.contributoryAssets);

  const projection = revenues.map(revenue => {
    const operatingIncome = revenue * input.operatingMargin;
    const charge = categories.reduce(
      (sum, [category, requiredReturn]) => sum + input.proxy(revenue, category) * requiredReturn,
      0,
    );
    const excess = operatingIncome - charge;
    return {
      revenue,
      cashFlow: excess * input.ipContributionFraction * afterTax,
      contributoryAssetCharge: charge,
    };
  });

  return discountProjection('excess-earnings', projection, assumptions, {
    operatingMargin: input.operatingMargin,
    contributoryAssets: { ...input.contributoryAssets },
    ipContributionFraction: input.ipContributionFraction,
    proxyApproximation: input.proxyDescription ?? 'custom contributory asset proxy',
  });
}
