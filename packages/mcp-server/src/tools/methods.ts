import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  incrementalIncome,
  reliefFromRoyalty,
  runValuationMethod,
  type ValuationResult,
} from "@ip-valuation/engine";
import {
  ExcessEarningsToolSchema,
  IncrementalIncomeToolSchema,
  ReliefFromRoyaltyToolSchema,
  TechnologyFactorToolSchema,
} from "../schemas/methods.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { toAssumptionSet } from "../mappers.js";
import type { ToolContext } from "../context.js";

export function reliefFromRoyaltyTool(params: unknown): ValuationResult {
  const input = ReliefFromRoyaltyToolSchema.parse(coerceNumbers(params));
  return reliefFromRoyalty(input.revenues, toAssumptionSet(input.assumptions), {
    royaltyRate: input.royalty_rate,
  });
}

export function excessEarningsTool(params: unknown, ctx: ToolContext): ValuationResult {
  const input = ExcessEarningsToolSchema.parse(coerceNumbers(params));
  return runValuationMethod(
    input.revenues,
    toAssumptionSet(input.assumptions),
    {
      method: "excess-earnings",
      operatingMargin: input.operating_margin,
      contributoryAssets: input.contributory_assets,
      ipContributionFraction: input.ip_contribution_fraction,
      proxyAssetFraction: input.proxy_asset_fraction,
    },
    { operatingMargin: 0, defaults: ctx.config },
  );
}

export function technologyFactorTool(params: unknown, ctx: ToolContext): ValuationResult {
  const input = TechnologyFactorToolSchema.parse(coerceNumbers(params));
  return runValuationMethod(
    input.revenues,
    toAssumptionSet(input.assumptions),
    {
      method: "technology-factor",
      baseRoyaltyRate: input.base_royalty_rate,
      innovationScore: input.innovation_score,
      commercialScore: input.commercial_score,
      legalStrengthScore: input.legal_strength_score,
      remainingLifeYears: input.remaining_life_years,
      totalLifeYears: input.total_life_years,
    },
    { operatingMargin: 0, defaults: ctx.config },
  );
}

export function incrementalIncomeTool(params: unknown): ValuationResult {
  const input = IncrementalIncomeToolSchema.parse(coerceNumbers(params));
  return incrementalIncome(input.revenues, toAssumptionSet(input.assumptions), {
    erosionFraction: input.erosion_fraction,
    operatingMargin: input.operating_margin,
  });
}

export function registerMethodTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "ip_relief_from_royalty",
    "Value an intangible by the after-tax royalty its owner avoids paying. Discounts revenue x royalty x (1 - tax) at WACC and adds a growing-perpetuity terminal value. Returns explicit, terminal and total present value with a per-period breakdown.",
    ReliefFromRoyaltyToolSchema.shape,
    async (params) => runTool("ip_relief_from_royalty", () => reliefFromRoyaltyTool(params)),
  );

  server.tool(
    "ip_excess_earnings",
    "Multi-period excess earnings: operating income less required returns on contributory assets (working capital, fixed assets, other intangibles), of which a fraction is attributed to the asset. Contributory asset values are approximated as a fraction of revenue and flagged as such in the result.",
    ExcessEarningsToolSchema.shape,
    async (params) => runTool("ip_excess_earnings", () => excessEarningsTool(params, ctx)),
  );

  server.tool(
    "ip_technology_factor",
    "Royalty valuation adjusted by a technology factor (innovation 30%, commercial success 35%, legal strength 25%, remaining life 10%). Cash flows decay toward 30% as the patent ages and the projection stops at the remaining life.",
    TechnologyFactorToolSchema.shape,
    async (params) => runTool("ip_technology_factor", () => technologyFactorTool(params, ctx)),
  );

  server.tool(
    "ip_incremental_income",
    "With-and-without valuation: after-tax operating income on the revenue the business would lose without the asset.",
    IncrementalIncomeToolSchema.shape,
    async (params) => runTool("ip_incremental_income", () => incrementalIncomeTool(params)),
  );
}
