// Method dispatch
// Resolves optional parameters from segment data and configuration, then runs the method.

import type { AssumptionSet, MethodParams, ValuationResult } from '../types.js';
import type { EngineConfig } from '../config.js';
import { excessEarnings, revenueFractionProxy } from './excess-earnings.js';
import { incrementalIncome } from './incremental-income.js';
import { reliefFromRoyalty } from './relief-from-royalty.js';
import { technologyFactorValuation } from './technology-factor.js';
import { ParameterOutOfRangeError } from '../errors.js';

export interface MethodContext {
  /** Mean allocated operating margin of the segment being valued. */
  operatingMargin: number;
  defaults: Pick<EngineConfig, 'excessEarnings' | 'technologyFactor'>;
}

/**
 * An explicit margin is checked by the method itself. A margin taken from the segment
 * is checked here so the error names where it came from.
 */
function resolveMargin(explicit: number | undefined, context: MethodContext): number {
  if (explicit !== undefined) return explicit;
  const derived = context.operatingMargin;
  if (!Number.isFinite(derived) || derived < 0 || derived > 1) {
    throw new ParameterOutOfRangeError(
      'operatingMargin',
      derived,
      { min: 0, max: 1 },
      `operatingMargin was not supplied and the derived segment operating margin ${derived} lies outside [0, 1]; pass operatingMargin explicitly`,
    );
  }
  return derived;
}

export function runValuationMethod(
  revenues: readonly number[],
  assumptions: AssumptionSet,
  params: MethodParams,
  context: MethodContext,
): ValuationResult {
  switch (params.method) {
    case 'relief-from-royalty':
      return reliefFromRoyalty(revenues, assumptions, { royaltyRate: params.royaltyRate });

    case 'excess-earnings': {
      const defaults = context.defaults.excessEarnings;
      const proxyAssetFraction = params.proxyAssetFraction ?? defaults.proxyAssetFraction;
      return excessEarnings(revenues, assumptions, {
        operatingMargin: resolveMargin(params.operatingMargin, context),
        contributoryAssets: params.contributoryAssets ?? defaults.contributoryAssets,
        ipContributionFraction: params.ipContributionFraction ?? defaults.ipContributionFraction,
        proxy: revenueFractionProxy(proxyAssetFraction),
        proxyDescription: `asset value = ${proxyAssetFraction} x revenue (approximation, not a balance-sheet allocation)`,
      });
    }

    case 'technology-factor':
      return technologyFactorValuation(revenues, assumptions, {
        baseRoyaltyRate: params.baseRoyaltyRate,
        innovationScore: params.innovationScore,
        commercialScore: params.commercialScore,
        legalStrengthScore: params.legalStrengthScore,
        remainingLifeYears: params.remainingLifeYears,
        totalLifeYears: params.totalLifeYears ?? context.defaults.technologyFactor.totalLifeYears,
      });

    case 'incremental-income':
      return incrementalIncome(revenues, assumptions, {
        erosionFraction: params.erosionFraction,
        operatingMargin: resolveMargin(params.operatingMargin, context),
      });
  }
}
