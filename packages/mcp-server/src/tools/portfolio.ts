import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type {
  AssetValuation,
  AssumptionSet,
  DerivedAssumptions,
  PortfolioValuation,
} from "@ip-valuation/engine";
import { ValueAssetToolSchema, ValuePortfolioToolSchema } from "../schemas/portfolio.js";
import type { AssumptionsInput } from "../schemas/common.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { toAssumptionSet, toIPAsset } from "../mappers.js";
import type { ToolContext } from "../context.js";

export type AssumptionSource =
  | { source: "supplied"; assumptions: AssumptionSet }
  | { source: "derived"; assumptions: AssumptionSet; derivation: DerivedAssumptions };

interface AssumptionRequest {
  ticker: string;
  assumptions?: AssumptionsInput;
  fallback_tax_rate?: number;
  fallback_terminal_growth?: number;
}

async function resolveAssumptions(input: AssumptionRequest, ctx: ToolContext): Promise<AssumptionSource> {
  if (input.assumptions) {
    return { source: "supplied", assumptions: toAssumptionSet(input.assumptions) };
  }
  const derivation = await ctx.engine.deriveAssumptions(input.ticker, {
    fallbackTaxRate: input.fallback_tax_rate,
    fallbackTerminalGrowth: input.fallback_terminal_growth,
  });
  return { source: "derived", assumptions: derivation.assumptions, derivation };
}

export async function valueAssetTool(
  params: unknown,
  ctx: ToolContext,
): Promise<{ assumptions: AssumptionSource; valuation: AssetValuation }> {
  const input = ValueAssetToolSchema.parse(coerceNumbers(params));
  const asset = toIPAsset(input.asset);
  const assumptions = await resolveAssumptions(input, ctx);
  const valuation = await ctx.engine.valueAsset(input.ticker, asset, assumptions.assumptions, {
    periods: input.periods,
  });
  return { assumptions, valuation };
}

export async function valuePortfolioTool(
  params: unknown,
  ctx: ToolContext,
): Promise<{ assumptions: AssumptionSource; portfolio: PortfolioValuation }> {
  const input = ValuePortfolioToolSchema.parse(coerceNumbers(params));
  const assets = input.assets.map(toIPAsset);
  const assumptions = await resolveAssumptions(input, ctx);
  const portfolio = await ctx.engine.valuePortfolio(input.ticker, assets, assumptions.assumptions, {
    periods: input.periods,
    mode: input.mode,
  });
  return { assumptions, portfolio };
}

export function registerPortfolioTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "ip_value_asset",
    "Value one intangible asset across the segments it draws from. Each segment's revenue is scaled by its attribution and valued with the asset's method (or a per-segment override); segment values are summed. Assumptions are derived from the company's statements unless supplied.",
    ValueAssetToolSchema.shape,
    async (params) => runTool("ip_value_asset", () => valueAssetTool(params, ctx)),
  );

  server.tool(
    "ip_value_portfolio",
    "Value a list of intangible assets for one company and sum them, keeping input order. strict mode aborts on the first failing asset; best-effort mode lists failures and values the rest.",
    ValuePortfolioToolSchema.shape,
    async (params) => runTool("ip_value_portfolio", () => valuePortfolioTool(params, ctx)),
  );
}
