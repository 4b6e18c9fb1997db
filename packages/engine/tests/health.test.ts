import { describe, it, expect } from 'vitest';
import { analyzeStatements, ratio, revenueVolatility } from '../src/health/analyzer.js';
import { InsufficientDataError } from '../src/errors.js';
import { statement } from './fixtures.js';

describe('ratio', () => {
  it('returns null instead of a sentinel for a zero or missing denominator', () => {
    expect(ratio(5, 2)).toBe(2.5);
    expect(ratio(5, 0)).toBeNull();
    expect(ratio(5, undefined)).toBeNull();
    expect(ratio(undefined, 2)).toBeNull();
  });
});

describe('revenueVolatility', () => {
  it('averages absolute changes and skips non-positive bases', () => {
    expect(revenueVolatility([110, 100, 0])).toBeCloseTo(0.1, 10);
    expect(revenueVolatility([100])).toBeNull();
  });
});

describe('analyzeStatements', () => {
  const statements = [
    statement({
      periodLabel: 'FY2024',
      currentAssets: 600,
      currentLiabilities: 300,
      receivables: 150,
      totalLiabilities: 1000,
      operatingCashFlow: 300,
      capitalExpenditure: -100,
    }),
    statement({ periodLabel: 'FY2023', grossProfit: 550, researchAndDevelopment: 100 }),
    statement({ periodLabel: 'FY2022', revenue: 800, grossProfit: 400 }),
  ];
  const report = analyzeStatements(statements, { price: 40, marketCap: 5000 });

  it('scores liquidity, leverage and coverage', () => {
    expect(report.periodLabel).toBe('FY2024');
    expect(report.financialHealth).toEqual({
      currentRatio: 2,
      quickRatio: 1,
      debtToEquity: 0.2,
      interestCoverage: 25,
      freeCashFlow: 200,
      fcfMargin: 0.2,
      score: 9,
      assessment: { label: 'excellent', insight: 'Strong financial position supports IP development' },
    });
  });

  it('reports margins, returns and trends', () => {
    const p = report.profitability;
    expect(p.grossMargin).toBe(0.6);
    expect(p.operatingMargin).toBe(0.25);
    expect(p.returnOnEquity).toBe(0.16);
    expect(p.returnOnAssets).toBe(0.08);
    expect(p.grossMarginTrend).toBe('improving');
    expect(p.operatingMarginTrend).toBe('declining');
    expect(p.ipInsight).toBe('Healthy margins indicate IP contributing to competitive advantage');
  });

  it('labels R&D intensity', () => {
    const rd = report.researchAndDevelopment;
    expect(rd.averageIntensity).toBeCloseTo((0.12 + 0.1 + 0.15) / 3, 10);
    expect(rd.growth).toBeCloseTo(0.2, 10);
    expect(rd.latestSpend).toBe(120);
    expect(rd.history.map(h => h.spend)).toEqual([120, 100, 120]);
    expect(rd.pipeline.label).toBe('moderate');
  });

  it('describes capital structure and market position', () => {
    expect(report.capitalStructure).toMatchObject({
      debtToAssets: 0.1,
      equityToAssets: 0.5,
      marketToBook: 5,
      leverage: { label: 'conservative' },
    });
    expect(report.marketPosition).toMatchObject({
      enterpriseValue: 5050,
      priceToEarnings: expect.closeTo(25, 10),
      evToRevenue: 5.05,
      evToOperatingIncome: 20.2,
      insight: 'Above-average valuation indicates IP contributes to market value',
    });
  });

  it('assesses risk from liquidity and solvency', () => {
    expect(report.risk.cashToCurrentLiabilities).toBe(0.5);
    expect(report.risk.solvencyRatio).toBe(0.5);
    expect(report.risk.revenueVolatility).toBeCloseTo(0.125, 10);
    expect(report.risk.assessment.label).toBe('moderate');
  });

  it('reports null ratios when statements lack the inputs', () => {
    const sparse = analyzeStatements([statement({ interestExpense: 0, totalEquity: 0 })], { price: 40, marketCap: 5000 });
    expect(sparse.financialHealth).toMatchObject({
      currentRatio: null,
      quickRatio: null,
      debtToEquity: null,
      interestCoverage: null,
      freeCashFlow: null,
      score: 5,
      assessment: { label: 'moderate' },
    });
    expect(sparse.profitability.returnOnEquity).toBeNull();
    expect(sparse.profitability.grossMarginTrend).toBe('insufficient-data');
    expect(sparse.researchAndDevelopment.growth).toBeNull();
    expect(sparse.capitalStructure.leverage.label).toBe('high');
    expect(sparse.risk.revenueVolatility).toBeNull();
  });

  it('needs at least one statement', () => {
    expect(() => analyzeStatements([], { price: 1, marketCap: 1 })).toThrow(InsufficientDataError);
  });
});
