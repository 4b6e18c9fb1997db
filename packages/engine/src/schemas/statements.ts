// Dataset file format: snake_case, newest-first, one entry per ticker.
// Parsed once and mapped onto the camelCase domain types.

import { z } from 'zod';
import type { MarketSnapshot, SegmentDisclosure, StatementPeriod } from '../types.js';
import { DataNotFoundError } from '../errors.js';
import { formatPath, primaryIssue } from './issues.js';

const Amount = z.number().finite();

export const StatementPeriodRecordSchema = z.object({
  period_label: z.string().min(1),
  revenue: Amount,
  gross_profit: Amount,
  operating_income: Amount,
  net_income: Amount,
  r_and_d_expense: Amount.default(0),
  tax_expense: Amount,
  interest_expense: Amount.default(0),
  total_debt: Amount.default(0),
  total_assets: Amount,
  total_equity: Amount,
  cash: Amount.default(0),
  shares_outstanding: Amount,
  current_assets: Amount.optional(),
  current_liabilities: Amount.optional(),
  receivables: Amount.optional(),
  total_liabilities: Amount.optional(),
  operating_cash_flow: Amount.optional(),
  capital_expenditure: Amount.optional(),
});

export const SegmentDisclosureRecordSchema = z.object({
  period_label: z.string().min(1),
  segments: z.array(z.object({ label: z.string().min(1), revenue: Amount })),
});

export const MarketSnapshotRecordSchema = z.object({
  price: Amount.nonnegative(),
  market_cap: Amount.nonnegative(),
  beta: z.number().positive().optional(),
});

export const CompanyRecordSchema = z.object({
  name: z.string().default(''),
  snapshot: MarketSnapshotRecordSchema,
  statements: z.array(StatementPeriodRecordSchema),
  segments: z.array(SegmentDisclosureRecordSchema).default([]),
});

export const DatasetSchema = z.object({
  companies: z.record(z.string().min(1), CompanyRecordSchema),
});

export type StatementPeriodRecord = z.infer<typeof StatementPeriodRecordSchema>;

export interface CompanyData {
  name: string;
  snapshot: MarketSnapshot;
  statements: StatementPeriod[];
  segments: SegmentDisclosure[];
}

export type Dataset = Map<string, CompanyData>;

export function toStatementPeriod(r: StatementPeriodRecord): StatementPeriod {
  return {
    periodLabel: r.period_label,
    revenue: r.revenue,
    grossProfit: r.gross_profit,
    operatingIncome: r.operating_income,
    netIncome: r.net_income,
    researchAndDevelopment: r.r_and_d_expense,
    taxExpense: r.tax_expense,
    interestExpense: r.interest_expense,
    totalDebt: r.total_debt,
    totalAssets: r.total_assets,
    totalEquity: r.total_equity,
    cash: r.cash,
    sharesOutstanding: r.shares_outstanding,
    currentAssets: r.current_assets,
    currentLiabilities: r.current_liabilities,
    receivables: r.receivables,
    totalLiabilities: r.total_liabilities,
    operatingCashFlow: r.operating_cash_flow,
    capitalExpenditure: r.capital_expenditure,
  };
}

/**
 * Parse a dataset document. Tickers are stored upper-case.
 * @throws DataNotFoundError when the document does not match the dataset format
 */
export function parseDataset(input: unknown): Dataset {
  const parsed = DatasetSchema.safeParse(input);
  if (!parsed.success) {
    const issue = primaryIssue(parsed.error);
    throw new DataNotFoundError(`Invalid dataset at ${formatPath(issue.path) || '(root)'}: ${issue.message}`);
  }

  const dataset: Dataset = new Map();
  for (const [ticker, company] of Object.entries(parsed.data.companies)) {
    dataset.set(ticker.toUpperCase(), {
      name: company.name,
      snapshot: {
        price: company.snapshot.price,
        marketCap: company.snapshot.market_cap,
        beta: company.snapshot.beta,
      },
      statements: company.statements.map(toStatementPeriod),
      segments: company.segments.map(s => ({ periodLabel: s.period_label, segments: s.segments })),
    });
  }
  return dataset;
}
