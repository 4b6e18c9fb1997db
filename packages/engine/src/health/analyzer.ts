// Financial Health Analyzer
// Ratios and advisory labels that annotate a valuation. Nothing here feeds the valuation math.

import type { MarketSnapshot, StatementPeriod } from '../types.js';
import { InsufficientDataError } from '../errors.js';

export type HealthLabel = 'excellent' | 'good' | 'moderate' | 'weak';
export type MarginTrend = 'improving' | 'declining' | 'insufficient-data';
export type PipelineLabel = 'excellent' | 'good' | 'moderate' | 'low';
export type LeverageLabel = 'conservative' | 'moderate' | 'elevated' | 'high';
export type RiskLabel = 'low' | 'moderate' | 'higher';

export interface Assessment<L extends string> {
  label: L;
  insight: string;
}

export interface FinancialHealthSection {
  currentRatio: number | null;
  quickRatio: number | null;
  debtToEquity: number | null;
  interestCoverage: number | null;
  freeCashFlow: number | null;
  fcfMargin: number | null;
  score: number;
  assessment: Assessment<HealthLabel>;
}

export interface ProfitabilitySection {
  grossMargin: number | null;
  operatingMargin: number | null;
  netMargin: number | null;
  returnOnEquity: number | null;
  returnOnAssets: number | null;
  grossMarginTrend: MarginTrend;
  operatingMarginTrend: MarginTrend;
  ipInsight: string;
}

export interface ResearchSection {
  averageIntensity: number | null;
  latestSpend: number;
  growth: number | null;
  history: Array<{ periodLabel: string; spend: number }>;
  pipeline: Assessment<PipelineLabel>;
}

export interface CapitalStructureSection {
  totalDebt: number;
  totalEquity: number;
  marketCap: number;
  debtToAssets: number | null;
  debtToEquity: number | null;
  equityToAssets: number | null;
  marketToBook: number | null;
  leverage: Assessment<LeverageLabel>;
}

export interface MarketPositionSection {
  marketCap: number;
  enterpriseValue: number;
  price: number;
  priceToEarnings: number | null;
  evToRevenue: number | null;
  evToOperatingIncome: number | null;
  insight: string;
}

export interface RiskSection {
  cashToCurrentLiabilities: number | null;
  solvencyRatio: number | null;
  revenueVolatility: number | null;
  assessment: Assessment<RiskLabel>;
}

export interface FinancialHealthReport {
  periodLabel: string;
  financialHealth: FinancialHealthSection;
  profitability: ProfitabilitySection;
  researchAndDevelopment: ResearchSection;
  capitalStructure: CapitalStructureSection;
  marketPosition: MarketPositionSection;
  risk: RiskSection;
}

/** `numerator / denominator`, or null when either is missing or the denominator is not positive. */
export function ratio(numerator: number | undefined, denominator: number | undefined): number | null {
  if (numerator === undefined || denominator === undefined || denominator <= 0) return null;
  return numerator / denominator;
}

function band(value: number | null, high: number, mid: number): number {
  if (value === null) return 1;
  if (value > high) return 3;
  if (value > mid) return 2;
  return 1;
}

function bandBelow(value: number | null, low: number, mid: number): number {
  if (value === null) return 1;
  if (value < low) return 3;
  if (value < mid) return 2;
  return 1;
}

function analyzeFinancialHealth(latest: StatementPeriod): FinancialHealthSection {
  const currentRatio = ratio(latest.currentAssets, latest.currentLiabilities);
  const quickRatio =
    latest.receivables === undefined ? null : ratio(latest.cash + latest.receivables, latest.currentLiabilities);
  const debtToEquity = ratio(latest.totalDebt, latest.totalEquity);
  const interestCoverage = ratio(latest.operatingIncome, latest.interestExpense);

  const freeCashFlow =
    latest.operatingCashFlow === undefined
      ? null
      : latest.operatingCashFlow + (latest.capitalExpenditure ?? 0); // capex is negative
  const fcfMargin = freeCashFlow === null ? null : ratio(freeCashFlow, latest.revenue);

  // No interest expense means no debt service to cover: top band
  const coverageScore = interestCoverage === null && latest.interestExpense === 0 ? 3 : band(interestCoverage, 10, 5);
  const score = band(currentRatio, 1.5, 1.0) + bandBelow(debtToEquity, 0.5, 1.0) + coverageScore;

  let assessment: Assessment<HealthLabel>;
  if (score >= 8) {
    assessment = { label: 'excellent', insight: 'Strong financial position supports IP development' };
  } else if (score >= 6) {
    assessment = { label: 'good', insight: 'Healthy balance sheet for IP investment' };
  } else if (score >= 4) {
    assessment = { label: 'moderate', insight: 'Some financial constraints on IP spending' };
  } else {
    assessment = { label: 'weak', insight: 'Financial stress may limit IP development' };
  }

  return { currentRatio, quickRatio, debtToEquity, interestCoverage, freeCashFlow, fcfMargin, score, assessment };
}

function marginTrend(margins: number[]): MarginTrend {
  if (margins.length < 2) return 'insufficient-data';
  return margins[0] > margins[1] ? 'improving' : 'declining';
}

function analyzeProfitability(statements: readonly StatementPeriod[]): ProfitabilitySection {
  const latest = statements[0];
  const grossMargin = ratio(latest.grossProfit, latest.revenue);

  const recent = statements.slice(0, 3).filter(s => s.revenue > 0);
  const grossMarginTrend = marginTrend(recent.map(s => s.grossProfit / s.revenue));
  const operatingMarginTrend = marginTrend(recent.map(s => s.operatingIncome / s.revenue));

  let ipInsight = 'Lower margins may indicate IP is less differentiated';
  if (grossMargin !== null && grossMargin > 0.6) {
    ipInsight = 'High gross margins suggest strong IP or brand pricing power';
  } else if (grossMargin !== null && grossMargin > 0.4) {
    ipInsight = 'Healthy margins indicate IP contributing to competitive advantage';
  }

  return {
    grossMargin,
    operatingMargin: ratio(latest.operatingIncome, latest.revenue),
    netMargin: ratio(latest.netIncome, latest.revenue),
    returnOnEquity: ratio(latest.netIncome, latest.totalEquity),
    returnOnAssets: ratio(latest.netIncome, latest.totalAssets),
    grossMarginTrend,
    operatingMarginTrend,
    ipInsight,
  };
}

function analyzeResearch(statements: readonly StatementPeriod[]): ResearchSection {
  const intensities = statements
    .filter(s => s.revenue > 0 && s.researchAndDevelopment > 0)
    .map(s => s.researchAndDevelopment / s.revenue);
  const averageIntensity =
    intensities.length > 0 ? intensities.reduce((sum, x) => sum + x, 0) / intensities.length : null;

  const latestSpend = statements[0].researchAndDevelopment;
  const growth =
    statements.length >= 2 ? ratio(latestSpend - statements[1].researchAndDevelopment, statements[1].researchAndDevelopment) : null;

  const intensity = averageIntensity ?? 0;
  let pipeline: Assessment<PipelineLabel>;
  if (intensity > 0.15 && growth !== null && growth > 0.1) {
    pipeline = { label: 'excellent', insight: 'Heavy R&D investment with growth suggests a strong IP pipeline' };
  } else if (intensity > 0.15) {
    pipeline = { label: 'good', insight: 'Significant R&D spend indicates active IP development' };
  } else if (intensity > 0.08) {
    pipeline = { label: 'moderate', insight: 'Average R&D investment for IP generation' };
  } else {
    pipeline = { label: 'low', insight: 'Limited R&D suggests a less IP-intensive business model' };
  }

  return {
    averageIntensity,
    latestSpend,
    growth,
    history: statements.slice(0, 5).map(s => ({ periodLabel: s.periodLabel, spend: s.researchAndDevelopment })),
    pipeline,
  };
}

function analyzeCapitalStructure(latest: StatementPeriod, snapshot: MarketSnapshot): CapitalStructureSection {
  const debtToEquity = ratio(latest.totalDebt, latest.totalEquity);

  let leverage: Assessment<LeverageLabel>;
  if (debtToEquity === null) {
    leverage = { label: 'high', insight: 'Equity is not positive; leverage cannot be bounded' };
  } else if (debtToEquity < 0.3) {
    leverage = { label: 'conservative', insight: 'Low debt supports IP investment flexibility' };
  } else if (debtToEquity < 0.7) {
    leverage = { label: 'moderate', insight: 'Balanced capital structure' };
  } else if (debtToEquity < 1.5) {
    leverage = { label: 'elevated', insight: 'Higher debt may constrain IP spending' };
  } else {
    leverage = { label: 'high', insight: 'Significant leverage limits financial flexibility' };
  }

  return {
    totalDebt: latest.totalDebt,
    totalEquity: latest.totalEquity,
    marketCap: snapshot.marketCap,
    debtToAssets: ratio(latest.totalDebt, latest.totalAssets),
    debtToEquity,
    equityToAssets: ratio(latest.totalEquity, latest.totalAssets),
    marketToBook: ratio(snapshot.marketCap, latest.totalEquity),
    leverage,
  };
}

function analyzeMarketPosition(latest: StatementPeriod, snapshot: MarketSnapshot): MarketPositionSection {
  const enterpriseValue = snapshot.marketCap + latest.totalDebt - latest.cash;
  const earningsPerShare = ratio(latest.netIncome, latest.sharesOutstanding);
  const evToRevenue = ratio(enterpriseValue, latest.revenue);

  let insight = 'Standard valuation multiples';
  if (evToRevenue !== null && evToRevenue > 10) {
    insight = 'Premium valuation suggests the market values intangibles highly';
  } else if (evToRevenue !== null && evToRevenue > 5) {
    insight = 'Above-average valuation indicates IP contributes to market value';
  }

  return {
    marketCap: snapshot.marketCap,
    enterpriseValue,
    price: snapshot.price,
    priceToEarnings: earningsPerShare === null ? null : ratio(snapshot.price, earningsPerShare),
    evToRevenue,
    evToOperatingIncome: ratio(enterpriseValue, latest.operatingIncome),
    insight,
  };
}

/** Mean absolute period-over-period change; pairs with a non-positive older value are skipped. */
export function revenueVolatility(revenues: readonly number[]): number | null {
  const changes: number[] = [];
  for (let i = 0; i < revenues.length - 1; i++) {
    const older = revenues[i + 1];
    if (older > 0) changes.push(Math.abs((revenues[i] - older) / older));
  }
  return changes.length > 0 ? changes.reduce((sum, c) => sum + c, 0) / changes.length : null;
}

function analyzeRisk(statements: readonly StatementPeriod[]): RiskSection {
  const latest = statements[0];
  const cashToCurrentLiabilities = ratio(latest.cash, latest.currentLiabilities);
  const solvencyRatio =
    latest.totalLiabilities === undefined ? null : ratio(latest.totalAssets - latest.totalLiabilities, latest.totalAssets);

  const liquidity = cashToCurrentLiabilities ?? 0;
  const solvency = solvencyRatio ?? 0;
  let assessment: Assessment<RiskLabel>;
  if (liquidity > 0.5 && solvency > 0.3) {
    assessment = { label: 'low', insight: 'Strong financial position supports IP value stability' };
  } else if (liquidity > 0.3 && solvency > 0.2) {
    assessment = { label: 'moderate', insight: 'Adequate financial cushion' };
  } else {
    assessment = { label: 'higher', insight: 'Financial constraints may affect IP development or value' };
  }

  return {
    cashToCurrentLiabilities,
    solvencyRatio,
    revenueVolatility: revenueVolatility(statements.slice(0, 3).map(s => s.revenue)),
    assessment,
  };
}

/**
 * Ratios over newest-first statements and the current market snapshot.
 * A ratio whose denominator is missing or not positive is reported as null.
 */
export function analyzeStatements(
  statements: readonly StatementPeriod[],
  snapshot: MarketSnapshot,
): FinancialHealthReport {
  if (statements.length === 0) {
    throw new InsufficientDataError('Financial health analysis needs at least one statement period');
  }
  const latest = statements[0];
  return {
    periodLabel: latest.periodLabel,
    financialHealth: analyzeFinancialHealth(latest),
    profitability: analyzeProfitability(statements),
    researchAndDevelopment: analyzeResearch(statements),
    capitalStructure: analyzeCapitalStructure(latest, snapshot),
    marketPosition: analyzeMarketPosition(latest, snapshot),
    risk: analyzeRisk(statements),
  };
}
