// Domain model for segment-level intangible asset valuation
// All structures are read-only value objects created fresh for each analysis run.

export interface StatementPeriod {
  readonly periodLabel: string;
  readonly revenue: number;
  readonly grossProfit: number;
  readonly operatingIncome: number;
  readonly netIncome: number;
  readonly researchAndDevelopment: number;
  readonly taxExpense: number;
  readonly interestExpense: number;
  readonly totalDebt: number;
  readonly totalAssets: number;
  readonly totalEquity: number;
  readonly cash: number;
  readonly sharesOutstanding: number;

  // Used by the health analyzer only
  readonly currentAssets?: number;
  readonly currentLiabilities?: number;
  readonly receivables?: number;
  readonly totalLiabilities?: number;
  readonly operatingCashFlow?: number;
  readonly capitalExpenditure?: number; // reported negative (cash outflow)
}

export interface MarketSnapshot {
  readonly price: number;
  readonly marketCap: number;
  readonly beta?: number;
}

export interface SegmentRevenuePoint {
  readonly periodLabel: string;
  readonly revenue: number;
}

/** One period's disclosed segment breakdown, as a data provider stores it. */
export interface SegmentDisclosure {
  readonly periodLabel: string;
  readonly segments: ReadonlyArray<{ readonly label: string; readonly revenue: number }>;
}

export type SegmentMatching = 'exact' | 'case-insensitive' | 'normalized';

/** Chronological (oldest-first) per-segment series ready for valuation math. */
export interface SegmentSeries {
  readonly segment: string;
  readonly periodLabels: readonly string[];
  readonly revenues: readonly number[];
  readonly companyRevenues: readonly number[];
  readonly shares: readonly number[];
  readonly grossProfits: readonly number[];
  readonly researchAndDevelopment: readonly number[];
  readonly operatingIncomes: readonly number[];
  readonly operatingMargins: readonly number[];
}

export interface AssumptionSet {
  readonly wacc: number;
  readonly taxRate: number;
  readonly terminalGrowth: number;
}

export type IPAssetKind = 'patent' | 'trademark' | 'trade-secret' | 'copyright' | 'other';

export type ValuationMethod =
  | 'relief-from-royalty'
  | 'excess-earnings'
  | 'technology-factor'
  | 'incremental-income';

export interface ReliefFromRoyaltyParams {
  readonly method: 'relief-from-royalty';
  readonly royaltyRate: number;
}

export interface ExcessEarningsParams {
  readonly method: 'excess-earnings';
  readonly operatingMargin?: number;
  readonly contributoryAssets?: Readonly<Record<string, number>>;
  readonly ipContributionFraction?: number;
  readonly proxyAssetFraction?: number;
}

export interface TechnologyFactorParams {
  readonly method: 'technology-factor';
  readonly baseRoyaltyRate: number;
  readonly innovationScore: number;
  readonly commercialScore: number;
  readonly legalStrengthScore: number;
  readonly remainingLifeYears: number;
  readonly totalLifeYears?: number;
}

export interface IncrementalIncomeParams {
  readonly method: 'incremental-income';
  readonly erosionFraction: number;
  readonly operatingMargin?: number;
}

export type MethodParams =
  | ReliefFromRoyaltyParams
  | ExcessEarningsParams
  | TechnologyFactorParams
  | IncrementalIncomeParams;

export interface SegmentAttribution {
  readonly segment: string;
  readonly attribution: number;
  /** Overrides the asset-level method for this segment only. */
  readonly valuation?: MethodParams;
}

export interface IPAsset {
  readonly id: string;
  readonly kind: IPAssetKind;
  readonly description: string;
  readonly segments: readonly SegmentAttribution[];
  readonly valuation: MethodParams;
}

export interface PeriodCashFlow {
  readonly period: number;
  readonly revenue: number;
  readonly cashFlow: number;
  readonly discountFactor: number;
  readonly presentValue: number;
  readonly decayFactor?: number;
  readonly contributoryAssetCharge?: number;
}

export interface ValuationResult {
  readonly method: ValuationMethod;
  readonly pvExplicit: number;
  readonly terminalCashFlow: number;
  readonly terminalValue: number;
  readonly pvTerminal: number;
  readonly totalValue: number;
  readonly periods: readonly PeriodCashFlow[];
  readonly assumptions: AssumptionSet;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface SegmentValuation {
  readonly segment: string;
  readonly attribution: number;
  readonly periodLabels: readonly string[];
  readonly result: ValuationResult;
}

export interface AssetValuation {
  readonly assetId: string;
  readonly kind: IPAssetKind;
  readonly description: string;
  readonly pvExplicit: number;
  readonly pvTerminal: number;
  readonly totalValue: number;
  readonly segments: readonly SegmentValuation[];
}

export type PortfolioMode = 'strict' | 'best-effort';

export interface AssetFailure {
  readonly assetId: string;
  readonly kind: string;
  readonly message: string;
}

export interface PortfolioValuation {
  readonly ticker: string;
  readonly mode: PortfolioMode;
  readonly assumptions: AssumptionSet;
  readonly totalValue: number;
  readonly assetCount: number;
  readonly assets: readonly AssetValuation[];
  readonly failures: readonly AssetFailure[];
}
