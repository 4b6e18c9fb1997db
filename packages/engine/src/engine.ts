// Valuation Engine facade
// Fetches through the data contract, then hands plain values to the pure components.

import type {
  AssetValuation,
  AssumptionSet,
  IPAsset,
  PortfolioMode,
  PortfolioValuation,
  SegmentSeries,
} from './types.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import type { FinancialDataProvider } from './data/provider.js';
import { ParameterOutOfRangeError, SegmentNotFoundError } from './errors.js';
import { prepareSegmentSeries } from './segments/preparer.js';
import {
  deriveAssumptionSet,
  type DeriveAssumptionsOptions,
  type DerivedAssumptions,
} from './assumptions/calculator.js';
import { valueAsset, valuePortfolio, type SeriesResolver } from './portfolio/aggregator.js';
import { analyzeStatements, type FinancialHealthReport } from './health/analyzer.js';
import type { AllocationStrategy } from './segments/allocation.js';
import { discoverAssets as suggestAssets, type AssetDiscovery } from './discovery/suggester.js';

export interface SeriesOptions {
  /** Defaults to `config.defaultPeriods`. */
  periods?: number;
  allocation?: AllocationStrategy;
}

export interface PortfolioRunOptions extends SeriesOptions {
  /** Defaults to `config.portfolioMode`. */
  mode?: PortfolioMode;
}

type Prepared = { ok: true; series: SegmentSeries } | { ok: false; error: unknown };

export class ValuationEngine {
  constructor(
    private readonly provider: FinancialDataProvider,
    readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  ) {}

  async prepareSegment(ticker: string, segment: string, options: SeriesOptions = {}): Promise<SegmentSeries> {
    const periods = this.periodsFor(options);
    const [revenues, statements] = await Promise.all([
      this.provider.fetchSegmentSeries(ticker, segment, periods),
      this.provider.fetchStatementSeries(ticker, periods),
    ]);
    // A provider must not answer an unknown segment with an empty list; treat it as not found
    if (revenues.length === 0) throw new SegmentNotFoundError(segment, []);
    return prepareSegmentSeries({ segment, revenues, statements, periods, allocation: options.allocation });
  }

  async deriveAssumptions(ticker: string, options: DeriveAssumptionsOptions = {}): Promise<DerivedAssumptions> {
    const periods = Math.max(this.config.defaultPeriods, this.config.taxRateLookback);
    const [statements, snapshot] = await Promise.all([
      this.provider.fetchStatementSeries(ticker, periods),
      this.provider.fetchMarketSnapshot(ticker),
    ]);
    return deriveAssumptionSet(statements, snapshot, this.config, options);
  }

  async valueAsset(
    ticker: string,
    asset: IPAsset,
    assumptions: AssumptionSet,
    options: SeriesOptions = {},
  ): Promise<AssetValuation> {
    const resolve = await this.resolverFor(ticker, [asset], options);
    return valueAsset(asset, resolve, assumptions, { defaults: this.config });
  }

  async valuePortfolio(
    ticker: string,
    assets: readonly IPAsset[],
    assumptions: AssumptionSet,
    options: PortfolioRunOptions = {},
  ): Promise<PortfolioValuation> {
    const resolve = await this.resolverFor(ticker, assets, options);
    return valuePortfolio(ticker.trim().toUpperCase(), assets, resolve, assumptions, {
      mode: options.mode ?? this.config.portfolioMode,
      defaults: this.config,
    });
  }

  async analyzeFinancialHealth(ticker: string): Promise<FinancialHealthReport> {
    const [statements, snapshot] = await Promise.all([
      this.provider.fetchStatementSeries(ticker, this.config.defaultPeriods),
      this.provider.fetchMarketSnapshot(ticker),
    ]);
    return analyzeStatements(statements, snapshot);
  }

  /** Suggested assets for the company's disclosed segments, ready to value or edit. */
  async discoverAssets(ticker: string): Promise<AssetDiscovery & { ticker: string }> {
    const segments = await this.provider.fetchSegmentLabels(ticker);
    return { ticker: ticker.trim().toUpperCase(), ...suggestAssets(segments) };
  }

  /** Validated before any fetch. */
  private periodsFor(options: SeriesOptions): number {
    const periods = options.periods ?? this.config.defaultPeriods;
    if (!Number.isInteger(periods) || periods < 1) {
      throw new ParameterOutOfRangeError('periods', periods, { min: 1 }, `periods must be a positive integer, got ${periods}`);
    }
    return periods;
  }

  /**
   * Prepare each distinct segment once. A failed segment is remembered and rethrown
   * to every asset that asks for it, so the aggregator decides what a failure means.
   */
  private async resolverFor(
    ticker: string,
    assets: readonly IPAsset[],
    options: SeriesOptions,
  ): Promise<SeriesResolver> {
    // Fails the whole call, never a single segment
    this.periodsFor(options);
    const names = [...new Set(assets.flatMap(a => a.segments.map(s => s.segment)))];
    const settled = await Promise.allSettled(names.map(name => this.prepareSegment(ticker, name, options)));

    const prepared = new Map<string, Prepared>();
    settled.forEach((outcome, i) => {
      prepared.set(
        names[i],
        outcome.status === 'fulfilled' ? { ok: true, series: outcome.value } : { ok: false, error: outcome.reason },
      );
    });

    return segment => {
      const entry = prepared.get(segment);
      if (!entry) throw new SegmentNotFoundError(segment, names);
      if (!entry.ok) throw entry.error;
      return entry.series;
    };
  }
}
