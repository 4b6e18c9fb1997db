import type { AssumptionSet, ReliefFromRoyaltyParams, ValuationResult } from '../types.js';
import { discountProjection } from './discounting.js';
import { assertFraction, assertRevenueSeries, assertValidAssumptions } from './validation.js';

/**
 * Relief-from-Royalty: value is the after-tax royalty the owner avoids paying.
 * CF_t = revenue_t * royaltyRate * (1 - taxRate)
 */
export function reliefFromRoyalty(
  revenues: readonly number[],
  assumptions: AssumptionSet,
  params: Omit<ReliefFromRoyaltyParams, 'method'>,
): ValuationResult {
  assertValidAssumptions(assumptions);
  assertRevenueSeries('relief-from-royalty', revenues);
  assertFraction('royaltyRate', params.royaltyRate);

  const afterTax = 1 - assumptions.taxRate;
  const projection = revenues.map(revenue => ({
    revenue,
    cashFlow: revenue * params.royaltyRate * afterTax,
  }));

  return discountProjection('relief-from-royalty', projection, assumptions, {
    royaltyRate: params.royaltyRate,
  });
}
