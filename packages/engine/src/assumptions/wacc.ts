// Weighted average cost of capital
//
//   WACC = E/V * Re + D/V * Rd * (1 - T)
//   Re   = Rf + beta * MRP    (CAPM)
//   Rd   = interest expense / total debt (latest period)

import type { MarketSnapshot, StatementPeriod } from '../types.js';
import { DivisionUndefinedError, InsufficientDataError } from '../errors.js';

export interface BetaBand {
  minMarketCap: number;
  beta: number;
}

/**
 * Step-function beta from market capitalisation: larger companies are assumed less
 * volatile. An approximation used only when no beta is disclosed.
 */
export function estimateBeta(marketCap: number, bands: readonly BetaBand[], defaultBeta: number): number {
  const ordered = [...bands].sort((a, b) => b.minMarketCap - a.minMarketCap);
  const band = ordered.find(b => marketCap > b.minMarketCap);
  return band ? band.beta : defaultBeta;
}

export function costOfEquity(riskFreeRate: number, beta: number, marketRiskPremium: number): number {
  return riskFreeRate + beta * marketRiskPremium;
}

/** @throws DivisionUndefinedError when the company carries no debt */
export function costOfDebt(interestExpense: number, totalDebt: number): number {
  if (totalDebt <= 0) {
    throw new DivisionUndefinedError('Cost of debt is undefined for zero total debt', { totalDebt });
  }
  return interestExpense / totalDebt;
}

export interface WaccInputs {
  riskFreeRate: number;
  marketRiskPremium: number;
  betaBands: readonly BetaBand[];
  defaultBeta: number;
  taxRate: number;
}

export type EquityValueSource = 'market-cap' | 'shares-x-price' | 'book-equity';

export interface WaccEstimate {
  wacc: number;
  costOfEquity: number;
  costOfDebt: number;
  costOfDebtSource: 'interest-over-debt' | 'zero-debt';
  afterTaxCostOfDebt: number;
  equityWeight: number;
  debtWeight: number;
  beta: number;
  betaSource: 'disclosed' | 'market-cap-estimate';
  equityValue: number;
  equityValueSource: EquityValueSource;
  totalDebt: number;
  riskFreeRate: number;
  marketRiskPremium: number;
}

function equityValue(latest: StatementPeriod, snapshot: MarketSnapshot): [number, EquityValueSource] {
  if (snapshot.marketCap > 0) return [snapshot.marketCap, 'market-cap'];
  const implied = latest.sharesOutstanding * snapshot.price;
  if (implied > 0) return [implied, 'shares-x-price'];
  return [latest.totalEquity, 'book-equity'];
}

/**
 * WACC from the latest statement (statements newest-first) and a market snapshot.
 * With no debt the debt leg weighs nothing, so its undefined cost is taken as 0.
 */
export function calculateWacc(
  statements: readonly StatementPeriod[],
  snapshot: MarketSnapshot,
  inputs: WaccInputs,
): WaccEstimate {
  if (statements.length === 0) {
    throw new InsufficientDataError('WACC needs at least one statement period');
  }
  const latest = statements[0];
  const [equity, equityValueSource] = equityValue(latest, snapshot);
  const totalDebt = Math.max(latest.totalDebt, 0);
  // Negative book equity would push the equity weight below 0 and the debt weight above 1
  if (equity <= 0) {
    throw new DivisionUndefinedError(`Equity value (${equityValueSource}) is not positive`, {
      equity,
      equityValueSource,
      totalDebt,
    });
  }
  const capital = equity + totalDebt;

  const disclosed = snapshot.beta !== undefined;
  const beta = snapshot.beta ?? estimateBeta(equity, inputs.betaBands, inputs.defaultBeta);
  const re = costOfEquity(inputs.riskFreeRate, beta, inputs.marketRiskPremium);

  const debtFree = totalDebt === 0;
  const rd = debtFree ? 0 : costOfDebt(latest.interestExpense, totalDebt);
  const costOfDebtSource: WaccEstimate['costOfDebtSource'] = debtFree ? 'zero-debt' : 'interest-over-debt';

  const equityWeight = equity / capital;
  const debtWeight = 1 - equityWeight;
  const afterTaxCostOfDebt = rd * (1 - inputs.taxRate);

  return {
    wacc: equityWeight * re + debtWeight * afterTaxCostOfDebt,
    costOfEquity: re,
    costOfDebt: rd,
    costOfDebtSource,
    afterTaxCostOfDebt,
    equityWeight,
    debtWeight,
    beta,
    betaSource: disclosed ? 'disclosed' : 'market-cap-estimate',
    equityValue: equity,
    equityValueSource,
    totalDebt,
    riskFreeRate: inputs.riskFreeRate,
    marketRiskPremium: inputs.marketRiskPremium,
  };
}
