import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type {
  DerivedAssumptions,
  FinancialHealthReport,
  IndustryInsights,
  SegmentSeries,
} from "@ip-valuation/engine";
import {
  DeriveAssumptionsToolSchema,
  DiscoverAssetsToolSchema,
  FinancialHealthToolSchema,
  SegmentSeriesToolSchema,
} from "../schemas/company.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { fromIPAsset } from "../mappers.js";
import type { AssetInput } from "../schemas/portfolio.js";
import type { ToolContext } from "../context.js";

export interface CompanyListing {
  ticker: string;
  segments: string[];
}

export function listCompaniesTool(ctx: ToolContext): CompanyListing[] {
  return ctx.provider.tickers().map(ticker => ({ ticker, segments: ctx.provider.segments(ticker) }));
}

export async function segmentSeriesTool(params: unknown, ctx: ToolContext): Promise<SegmentSeries> {
  const input = SegmentSeriesToolSchema.parse(coerceNumbers(params));
  return ctx.engine.prepareSegment(input.ticker, input.segment, { periods: input.periods });
}

export async function deriveAssumptionsTool(params: unknown, ctx: ToolContext): Promise<DerivedAssumptions> {
  const input = DeriveAssumptionsToolSchema.parse(coerceNumbers(params));
  return ctx.engine.deriveAssumptions(input.ticker, {
    fallbackTaxRate: input.fallback_tax_rate,
    fallbackTerminalGrowth: input.fallback_terminal_growth,
  });
}

export async function financialHealthTool(params: unknown, ctx: ToolContext): Promise<FinancialHealthReport> {
  const input = FinancialHealthToolSchema.parse(coerceNumbers(params));
  return ctx.engine.analyzeFinancialHealth(input.ticker);
}

export interface DiscoveredAssets {
  ticker: string;
  segments: string[];
  insights: IndustryInsights;
  assets: AssetInput[];
}

export async function discoverAssetsTool(params: unknown, ctx: ToolContext): Promise<DiscoveredAssets> {
  const input = DiscoverAssetsToolSchema.parse(coerceNumbers(params));
  const discovery = await ctx.engine.discoverAssets(input.ticker);
  return {
    ticker: discovery.ticker,
    segments: discovery.segments,
    insights: discovery.insights,
    assets: discovery.assets.map(fromIPAsset),
  };
}

export function registerCompanyTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "ip_list_companies",
    "List the companies in the loaded dataset and the segments each one discloses.",
    async () => runTool("ip_list_companies", () => listCompaniesTool(ctx)),
  );

  server.tool(
    "ip_segment_series",
    "Build a segment's revenue series (oldest first) with gross profit, R&D and operating income allocated by the segment's share of company revenue.",
    SegmentSeriesToolSchema.shape,
    async (params) => runTool("ip_segment_series", () => segmentSeriesTool(params, ctx)),
  );

  server.tool(
    "ip_derive_assumptions",
    "Derive WACC (CAPM with a market-cap beta approximation when no beta is disclosed), effective tax rate (mean of recent profitable periods) and terminal growth (historical revenue growth clamped to a conservative band). Returns every component for audit.",
    DeriveAssumptionsToolSchema.shape,
    async (params) => runTool("ip_derive_assumptions", () => deriveAssumptionsTool(params, ctx)),
  );

  server.tool(
    "ip_discover_assets",
    "Suggest a starting IP portfolio from the company's segment names: brand, technology patent and software trade-secret candidates with keyword-based attribution estimates, shared platform assets across hardware segments, and an industry read-out. Suggestions are heuristics to review; the assets can be passed unchanged to ip_value_portfolio.",
    DiscoverAssetsToolSchema.shape,
    async (params) => runTool("ip_discover_assets", () => discoverAssetsTool(params, ctx)),
  );

  server.tool(
    "ip_financial_health",
    "Liquidity, profitability, R&D intensity, capital structure, market position and risk ratios with advisory labels. Informational only; never used in valuation.",
    FinancialHealthToolSchema.shape,
    async (params) => runTool("ip_financial_health", () => financialHealthTool(params, ctx)),
  );
}
