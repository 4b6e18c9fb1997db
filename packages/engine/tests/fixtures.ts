import type { AssumptionSet, SegmentSeries, StatementPeriod } from '../src/types.js';

export const BASE_ASSUMPTIONS: AssumptionSet = { wacc: 0.095, taxRate: 0.21, terminalGrowth: 0.025 };

export function statement(overrides: Partial<StatementPeriod> = {}): StatementPeriod {
  return {
    periodLabel: 'FY2024',
    revenue: 1000,
    grossProfit: 600,
    operatingIncome: 250,
    netIncome: 160,
    researchAndDevelopment: 120,
    taxExpense: 40,
    interestExpense: 10,
    totalDebt: 200,
    totalAssets: 2000,
    totalEquity: 1000,
    cash: 150,
    sharesOutstanding: 100,
    ...overrides,
  };
}

/** Chronological series with a constant operating margin. */
export function seriesOf(segment: string, revenues: number[], operatingMargin = 0.25): SegmentSeries {
  return {
    segment,
    periodLabels: revenues.map((_, i) => `FY${2020 + i}`),
    revenues,
    companyRevenues: revenues.map(r => r * 2),
    shares: revenues.map(() => 0.5),
    grossProfits: revenues.map(r => r * 0.6),
    researchAndDevelopment: revenues.map(r => r * 0.1),
    operatingIncomes: revenues.map(r => r * operatingMargin),
    operatingMargins: revenues.map(() => operatingMargin),
  };
}
