// snake_case tool input <-> engine types. Engine parsers do the range checks.

import {
  parseAssumptionSet,
  parseIPAsset,
  type AssumptionSet,
  type IPAsset,
  type MethodParams,
} from "@ip-valuation/engine";
import type { AssumptionsInput } from "./schemas/common.js";
import type { AssetInput, MethodInput } from "./schemas/portfolio.js";

export function toAssumptionSet(input: AssumptionsInput): AssumptionSet {
  return parseAssumptionSet({
    wacc: input.wacc,
    taxRate: input.tax_rate,
    terminalGrowth: input.terminal_growth,
  });
}

function withoutUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

/** Unvalidated camelCase method parameters; `parseIPAsset` checks them per method. */
export function toMethodParamsInput(input: MethodInput): Record<string, unknown> {
  return withoutUndefined({
    method: input.method,
    royaltyRate: input.royalty_rate,
    operatingMargin: input.operating_margin,
    contributoryAssets: input.contributory_assets,
    ipContributionFraction: input.ip_contribution_fraction,
    proxyAssetFraction: input.proxy_asset_fraction,
    baseRoyaltyRate: input.base_royalty_rate,
    innovationScore: input.innovation_score,
    commercialScore: input.commercial_score,
    legalStrengthScore: input.legal_strength_score,
    remainingLifeYears: input.remaining_life_years,
    totalLifeYears: input.total_life_years,
    erosionFraction: input.erosion_fraction,
  });
}

export function toIPAsset(input: AssetInput): IPAsset {
  return parseIPAsset({
    id: input.id,
    kind: input.kind,
    description: input.description,
    segments: input.segments.map(link =>
      withoutUndefined({
        segment: link.segment,
        attribution: link.attribution,
        valuation: link.valuation ? toMethodParamsInput(link.valuation) : undefined,
      }),
    ),
    valuation: toMethodParamsInput(input.valuation),
  });
}

/** Engine method parameters back to the tool's snake_case shape. */
export function fromMethodParams(params: MethodParams): MethodInput {
  switch (params.method) {
    case "relief-from-royalty":
      return { method: params.method, royalty_rate: params.royaltyRate };
    case "excess-earnings":
      return {
        method: params.method,
        operating_margin: params.operatingMargin,
        contributory_assets: params.contributoryAssets ? { ...params.contributoryAssets } : undefined,
        ip_contribution_fraction: params.ipContributionFraction,
        proxy_asset_fraction: params.proxyAssetFraction,
      };
    case "technology-factor":
      return {
        method: params.method,
        base_royalty_rate: params.baseRoyaltyRate,
        innovation_score: params.innovationScore,
        commercial_score: params.commercialScore,
        legal_strength_score: params.legalStrengthScore,
        remaining_life_years: params.remainingLifeYears,
        total_life_years: params.totalLifeYears,
      };
    case "incremental-income":
      return {
        method: params.method,
        erosion_fraction: params.erosionFraction,
        operating_margin: params.operatingMargin,
      };
  }
}

/** An engine asset in the shape `ip_value_asset` and `ip_value_portfolio` accept. */
export function fromIPAsset(asset: IPAsset): AssetInput {
  return {
    id: asset.id,
    kind: asset.kind,
    description: asset.description,
    segments: asset.segments.map(link => ({
      segment: link.segment,
      attribution: link.attribution,
      valuation: link.valuation ? fromMethodParams(link.valuation) : undefined,
    })),
    valuation: fromMethodParams(asset.valuation),
  };
}
