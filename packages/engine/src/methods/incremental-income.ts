import type { AssumptionSet, ValuationResult } from '../types.js';
import { discountProjection } from './discounting.js';
import { assertFraction, assertRevenueSeries, assertValidAssumptions } from './validation.js';

export interface IncrementalIncomeInput {
  /** Share of segment revenue that would be lost without the asset. */
  erosionFraction: number;
  operatingMargin: number;
}

/**
 * "With and without" method: the after-tax operating income on the revenue the
 * segment would lose if it did not own the asset.
 */
export function incrementalIncome(
  revenues: readonly number[],
  assumptions: AssumptionSet,
  input: IncrementalIncomeInput,
): ValuationResult {
  assertValidAssumptions(assumptions);
  assertRevenueSeries('incremental-income', revenues);
  assertFraction('erosionFraction', input.erosionFraction);
  assertFraction('operatingMargin', input.operatingMargin);

  const afterTax = 1 - assumptions.taxRate;
  const projection = revenues.map(revenue => ({
    revenue,
    cashFlow: revenue * input.erosionFraction * input.operatingMargin * afterTax,
  }));

  return discountProjection('incremental-income', projection, assumptions, {
    erosionFraction: input.erosionFraction,
    operatingMargin: input.operatingMargin,
  });
}
