export * from './types.js';
export * from './errors.js';
export * from './config.js';

export { findSegmentRevenues, listSegmentLabels, segmentLabelsMatch } from './segments/matching.js';
export { proportionalAllocation, type AllocationStrategy, type SegmentAllocation } from './segments/allocation.js';
export { prepareSegmentSeries, averageOperatingMargin, type PrepareSegmentInput } from './segments/preparer.js';

export { calculateEffectiveTaxRate, DEFAULT_MAX_TAX_RATE, type TaxRateEstimate, type PeriodTaxRate } from './assumptions/tax-rate.js';
export {
  calculateTerminalGrowth,
  type TerminalGrowthEstimate,
  type GrowthBand,
  type GrowthObservation,
} from './assumptions/terminal-growth.js';
export {
  calculateWacc,
  costOfDebt,
  costOfEquity,
  estimateBeta,
  type BetaBand,
  type WaccEstimate,
  type WaccInputs,
} from './assumptions/wacc.js';
export {
  deriveAssumptionSet,
  type DeriveAssumptionsOptions,
  type DerivedAssumptions,
} from './assumptions/calculator.js';

export { discountFactor, discountProjection, type ProjectedPeriod } from './methods/discounting.js';
export { reliefFromRoyalty } from './methods/relief-from-royalty.js';
export {
  excessEarnings,
  revenueFractionProxy,
  type ContributoryAssetProxy,
  type ExcessEarningsInput,
} from './methods/excess-earnings.js';
export {
  technologyFactor,
  technologyFactorValuation,
  decayFactor,
  TECHNOLOGY_FACTOR_WEIGHTS,
  type TechnologyFactorInput,
} from './methods/technology-factor.js';
export { incrementalIncome, type IncrementalIncomeInput } from './methods/incremental-income.js';
export { runValuationMethod, type MethodContext } from './methods/registry.js';

export {
  attributeRevenues,
  valueAsset,
  valuePortfolio,
  type SeriesResolver,
  type AggregationOptions,
  type PortfolioOptions,
} from './portfolio/aggregator.js';

export * from './health/analyzer.js';

export {
  discoverAssets,
  discoverSegmentAssets,
  suggestSharedAssets,
  estimateAttribution,
  industryInsights,
  isHardwareSegment,
  type AssetDiscovery,
  type IndustryInsights,
} from './discovery/suggester.js';

export { parseIPAsset, parseIPAssets, IPAssetSchema, MethodParamsSchema } from './schemas/assets.js';
export { parseAssumptionSet, AssumptionSetSchema } from './schemas/assumptions.js';
export { parseDataset, type CompanyData, type Dataset } from './schemas/statements.js';

export type { FinancialDataProvider } from './data/provider.js';
export { DatasetProvider } from './data/dataset-provider.js';
export { ValuationEngine, type SeriesOptions, type PortfolioRunOptions } from './engine.js';
