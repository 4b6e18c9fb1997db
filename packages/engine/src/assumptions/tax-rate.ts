import type { StatementPeriod } from '../types.js';
import { ParameterOutOfRangeError, TaxRateUndeterminedError } from '../errors.js';

export interface PeriodTaxRate {
  periodLabel: string;
  pretaxIncome: number;
  rate: number;
}

export interface TaxRateEstimate {
  effectiveTaxRate: number;
  source: 'calculated' | 'fallback';
  periodRates: PeriodTaxRate[];
  /** Periods whose rate was unusable and left out of the mean. */
  excludedPeriods: string[];
}

export const DEFAULT_MAX_TAX_RATE = 0.5;

/**
 * Mean effective tax rate over the latest `lookback` periods (statements newest-first).
 * Pre-tax income is net income plus tax expense. A period counts only when pre-tax
 * income is positive, tax expense is not negative and the rate is at most `maxRate`.
 *
 * @throws TaxRateUndeterminedError when no period qualifies and no fallback is given
 */
export function calculateEffectiveTaxRate(
  statements: readonly StatementPeriod[],
  lookback: number,
  fallbackTaxRate?: number,
  maxRate: number = DEFAULT_MAX_TAX_RATE,
): TaxRateEstimate {
  const window = statements.slice(0, lookback);
  const periodRates: PeriodTaxRate[] = [];
  const excludedPeriods: string[] = [];

  for (const s of window) {
    const pretaxIncome = s.netIncome + s.taxExpense;
    const rate = pretaxIncome > 0 ? s.taxExpense / pretaxIncome : Number.NaN;
    if (s.taxExpense >= 0 && rate >= 0 && rate <= maxRate) {
      periodRates.push({ periodLabel: s.periodLabel, pretaxIncome, rate });
    } else {
      excludedPeriods.push(s.periodLabel);
    }
  }

  if (periodRates.length > 0) {
    const mean = periodRates.reduce((sum, p) => sum + p.rate, 0) / periodRates.length;
    return { effectiveTaxRate: mean, source: 'calculated', periodRates, excludedPeriods };
  }

  if (fallbackTaxRate === undefined) {
    throw new TaxRateUndeterminedError(window.map(s => s.periodLabel));
  }
  if (!Number.isFinite(fallbackTaxRate) || fallbackTaxRate < 0 || fallbackTaxRate > 1) {
    throw new ParameterOutOfRangeError('fallbackTaxRate', fallbackTaxRate, { min: 0, max: 1 });
  }
  return { effectiveTaxRate: fallbackTaxRate, source: 'fallback', periodRates, excludedPeriods };
}
