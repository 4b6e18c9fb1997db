// Asset & Portfolio Aggregator
// An asset's value is the sum over its segments; a portfolio's is the sum over its assets.

import type {
  AssetFailure,
  AssetValuation,
  AssumptionSet,
  IPAsset,
  PortfolioMode,
  PortfolioValuation,
  SegmentSeries,
  SegmentValuation,
} from '../types.js';
import type { EngineConfig } from '../config.js';
import { ParameterOutOfRangeError, isValuationError } from '../errors.js';
import { averageOperatingMargin } from '../segments/preparer.js';
import { runValuationMethod } from '../methods/registry.js';

/** Returns the prepared series for a segment name, or throws. */
export type SeriesResolver = (segment: string) => SegmentSeries;

export interface AggregationOptions {
  defaults: Pick<EngineConfig, 'excessEarnings' | 'technologyFactor'>;
}

export interface PortfolioOptions extends AggregationOptions {
  mode: PortfolioMode;
}

/** Segment revenue scaled by attribution. Attribution is never re-normalized across segments. */
export function attributeRevenues(revenues: readonly number[], attribution: number): number[] {
  if (!Number.isFinite(attribution) || attribution <= 0 || attribution > 1) {
    throw new ParameterOutOfRangeError('attribution', attribution, { min: 0, max: 1, exclusiveMin: true });
  }
  return revenues.map(r => r * attribution);
}

export function valueAsset(
  asset: IPAsset,
  resolveSeries: SeriesResolver,
  assumptions: AssumptionSet,
  options: AggregationOptions,
): AssetValuation {
  const segments: SegmentValuation[] = asset.segments.map(link => {
    const series = resolveSeries(link.segment);
    const revenues = attributeRevenues(series.revenues, link.attribution);
    const result = runValuationMethod(revenues, assumptions, link.valuation ?? asset.valuation, {
      operatingMargin: averageOperatingMargin(series),
      defaults: options.defaults,
    });
    return {
      segment: link.segment,
      attribution: link.attribution,
      periodLabels: series.periodLabels,
      result,
    };
  });

  const pvExplicit = segments.reduce((sum, s) => sum + s.result.pvExplicit, 0);
  const pvTerminal = segments.reduce((sum, s) => sum + s.result.pvTerminal, 0);

  return {
    assetId: asset.id,
    kind: asset.kind,
    description: asset.description,
    pvExplicit,
    pvTerminal,
    totalValue: pvExplicit + pvTerminal,
    segments,
  };
}

/**
 * Value every asset in input order. In `strict` mode the first failure aborts the call;
 * in `best-effort` mode a failing asset is reported in `failures` and left out of the
 * total. Errors outside the valuation taxonomy always propagate.
 */
export function valuePortfolio(
  ticker: string,
  assets: readonly IPAsset[],
  resolveSeries: SeriesResolver,
  assumptions: AssumptionSet,
  options: PortfolioOptions,
): PortfolioValuation {
  const valued: AssetValuation[] = [];
  const failures: AssetFailure[] = [];

  for (const asset of assets) {
    try {
      valued.push(valueAsset(asset, resolveSeries, assumptions, options));
    } catch (err) {
      if (options.mode === 'strict' || !isValuationError(err)) throw err;
      failures.push({ assetId: asset.id, kind: err.kind, message: err.message });
    }
  }

  return {
    ticker,
    mode: options.mode,
    assumptions: { ...assumptions },
    totalValue: valued.reduce((sum, a) => sum + a.totalValue, 0),
    assetCount: valued.length,
    assets: valued,
    failures,
  };
}
