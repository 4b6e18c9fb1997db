// Technology Factor method
// A quality score lifts the base royalty rate; cash flows decay as the patent ages.

import type { AssumptionSet, TechnologyFactorParams, ValuationResult } from '../types.js';
import { ParameterOutOfRangeError } from '../errors.js';
import { discountProjection } from './discounting.js';
import { assertFraction, assertRevenueSeries, assertValidAssumptions } from './validation.js';

export const TECHNOLOGY_FACTOR_WEIGHTS = {
  innovation: 0.30,
  commercial: 0.35,
  legal: 0.25,
  remainingLife: 0.10,
} as const;

export const DECAY_FLOOR = 0.3;
export const DECAY_HORIZON_MULTIPLE = 1.5;

export type TechnologyFactorInput = Omit<TechnologyFactorParams, 'method' | 'totalLifeYears'> & {
  totalLifeYears: number;
};

function assertLife(remaining: number, total: number): void {
  if (!Number.isInteger(total) || total <= 0) {
    throw new ParameterOutOfRangeError('totalLifeYears', total, { min: 0, exclusiveMin: true },
      `totalLifeYears must be a positive integer, got ${total}`);
  }
  if (!Number.isInteger(remaining) || remaining <= 0 || remaining > total) {
    throw new ParameterOutOfRangeError('remainingLifeYears', remaining, { min: 0, max: total, exclusiveMin: true },
      `remainingLifeYears must be a positive integer no greater than totalLifeYears (${total}), got ${remaining}`);
  }
}

/** Weighted quality score in [0, 1]. */
export function technologyFactor(input: TechnologyFactorInput): number {
  assertFraction('innovationScore', input.innovationScore);
  assertFraction('commercialScore', input.commercialScore);
  assertFraction('legalStrengthScore', input.legalStrengthScore);
  assertLife(input.remainingLifeYears, input.totalLifeYears);

  const w = TECHNOLOGY_FACTOR_WEIGHTS;
  return (
    input.innovationScore * w.innovation +
    input.commercialScore * w.commercial +
    input.legalStrengthScore * w.legal +
    (input.remainingLifeYears / input.totalLifeYears) * w.remainingLife
  );
}

/** Linear decay toward the floor as period t approaches 1.5x the remaining life. */
export function decayFactor(period: number, remainingLifeYears: number): number {
  return Math.max(1 - period / (remainingLifeYears * DECAY_HORIZON_MULTIPLE), DECAY_FLOOR);
}

export function technologyFactorValuation(
  revenues: readonly number[],
  assumptions: AssumptionSet,
  input: TechnologyFactorInput,
): ValuationResult {
  assertValidAssumptions(assumptions);
  assertRevenueSeries('technology-factor', revenues);
  assertFraction('baseRoyaltyRate', input.baseRoyaltyRate);

  const factor = technologyFactor(input);
  const adjustedRoyaltyRate = input.baseRoyaltyRate * (1 + factor);
  const afterTax = 1 - assumptions.taxRate;

  // Projection never runs past the remaining legal life
  const horizon = Math.min(revenues.length, input.remainingLifeYears);
  const projection = revenues.slice(0, horizon).map((revenue, i) => {
    const decay = decayFactor(i + 1, input.remainingLifeYears);
    return {
      revenue,
      cashFlow: revenue * adjustedRoyaltyRate * afterTax * decay,
      decayFactor: decay,
    };
  });

  return discountProjection('technology-factor', projection, assumptions, {
    baseRoyaltyRate: input.baseRoyaltyRate,
    technologyFactor: factor,
    adjustedRoyaltyRate,
    innovationScore: input.innovationScore,
    commercialScore: input.commercialScore,
    legalStrengthScore: input.legalStrengthScore,
    remainingLifeYears: input.remainingLifeYears,
    totalLifeYears: input.totalLifeYears,
    projectedPeriods: horizon,
  });
}
