// Explicit-period / terminal-value decomposition shared by all four methods
//
//   PV_explicit   = sum_{t=1..n} CF_t / (1 + WACC)^t
//   CF_terminal   = CF_n * (1 + g)
//   TerminalValue = CF_terminal / (WACC - g)
//   PV_terminal   = TerminalValue / (1 + WACC)^n

import type { AssumptionSet, PeriodCashFlow, ValuationMethod, ValuationResult } from '../types.js';

export interface ProjectedPeriod {
  revenue: number;
  cashFlow: number;
  decayFactor?: number;
  contributoryAssetCharge?: number;
}

export function discountFactor(rate: number, period: number): number {
  return Math.pow(1 + rate, period);
}

/**
 * Discount projected cash flows and append a growing-perpetuity terminal value.
 * Callers validate assumptions first; `wacc > terminalGrowth` is assumed here.
 */
export function discountProjection(
  method: ValuationMethod,
  projection: readonly ProjectedPeriod[],
  assumptions: AssumptionSet,
  details: Record<string, unknown>,
): ValuationResult {
  const { wacc, terminalGrowth } = assumptions;

  let pvExplicit = 0;
  const periods: PeriodCashFlow[] = projection.map((p, i) => {
    const period = i + 1;
    const factor = discountFactor(wacc, period);
    const presentValue = p.cashFlow / factor;
    pvExplicit += presentValue;
    return {
      period,
      revenue: p.revenue,
      cashFlow: p.cashFlow,
      discountFactor: factor,
      presentValue,
      ...(p.decayFactor !== undefined ? { decayFactor: p.decayFactor } : {}),
      ...(p.contributoryAssetCharge !== undefined
        ? { contributoryAssetCharge: p.contributoryAssetCharge }
        : {}),
    };
  });

  const n = projection.length;
  const lastCashFlow = n > 0 ? projection[n - 1].cashFlow : 0;
  const terminalCashFlow = lastCashFlow * (1 + terminalGrowth);
  const terminalValue = terminalCashFlow / (wacc - terminalGrowth);
  const pvTerminal = terminalValue / discountFactor(wacc, n);

  return {
    method,
    pvExplicit,
    terminalCashFlow,
    terminalValue,
    pvTerminal,
    totalValue: pvExplicit + pvTerminal,
    periods,
    assumptions: { ...assumptions },
    details,
  };
}
