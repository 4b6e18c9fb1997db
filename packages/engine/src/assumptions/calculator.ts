import type { AssumptionSet, MarketSnapshot, StatementPeriod } from '../types.js';
import type { EngineConfig } from '../config.js';
import { InsufficientDataError } from '../errors.js';
import { assertValidAssumptions } from '../methods/validation.js';
import { calculateEffectiveTaxRate, type TaxRateEstimate } from './tax-rate.js';
import { calculateTerminalGrowth, type TerminalGrowthEstimate } from './terminal-growth.js';
import { calculateWacc, type WaccEstimate } from './wacc.js';

export interface DeriveAssumptionsOptions {
  /** Used only when no period in the lookback yields a usable tax rate. */
  fallbackTaxRate?: number;
  /** Used only when no revenue growth can be observed. */
  fallbackTerminalGrowth?: number;
}

export interface DerivedAssumptions {
  assumptions: AssumptionSet;
  wacc: WaccEstimate;
  tax: TaxRateEstimate;
  growth: TerminalGrowthEstimate;
}

/**
 * Derive WACC, tax rate and terminal growth from newest-first statements.
 * The components are returned alongside the set so every number can be audited.
 */
export function deriveAssumptionSet(
  statements: readonly StatementPeriod[],
  snapshot: MarketSnapshot,
  config: EngineConfig,
  options: DeriveAssumptionsOptions = {},
): DerivedAssumptions {
  if (statements.length === 0) {
    throw new InsufficientDataError('Deriving assumptions needs at least one statement period');
  }

  const tax = calculateEffectiveTaxRate(
    statements,
    config.taxRateLookback,
    options.fallbackTaxRate,
    config.maxEffectiveTaxRate,
  );
  const wacc = calculateWacc(statements, snapshot, {
    riskFreeRate: config.riskFreeRate,
    marketRiskPremium: config.marketRiskPremium,
    betaBands: config.betaBands,
    defaultBeta: config.defaultBeta,
    taxRate: tax.effectiveTaxRate,
  });
  const growth = calculateTerminalGrowth(
    statements,
    { floor: config.terminalGrowthFloor, ceiling: config.terminalGrowthCeiling },
    options.fallbackTerminalGrowth,
  );

  const assumptions: AssumptionSet = {
    wacc: wacc.wacc,
    taxRate: tax.effectiveTaxRate,
    terminalGrowth: growth.terminalGrowth,
  };
  assertValidAssumptions(assumptions);

  return { assumptions, wacc, tax, growth };
}
