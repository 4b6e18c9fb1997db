import { z } from "zod";
import { ContributoryAssetsSchema } from "./methods.js";
import {
  AssumptionsInputSchema,
  FallbackRatesSchema,
  PeriodsSchema,
  TickerSchema,
} from "./common.js";

export const MethodInputSchema = z.object({
  method: z
    .enum(["relief-from-royalty", "excess-earnings", "technology-factor", "incremental-income"])
    .describe("Valuation method"),
  royalty_rate: z.number().optional().describe("relief-from-royalty: royalty rate"),
  operating_margin: z
    .number()
    .optional()
    .describe("excess-earnings / incremental-income: margin (defaults to the segment's mean margin)"),
  contributory_assets: ContributoryAssetsSchema.optional(),
  ip_contribution_fraction: z.number().optional().describe("excess-earnings: asset share of excess earnings"),
  proxy_asset_fraction: z.number().optional().describe("excess-earnings: contributory asset value / revenue"),
  base_royalty_rate: z.number().optional().describe("technology-factor: base royalty rate"),
  innovation_score: z.number().optional().describe("technology-factor: innovation score"),
  commercial_score: z.number().optional().describe("technology-factor: commercial success score"),
  legal_strength_score: z.number().optional().describe("technology-factor: legal strength score"),
  remaining_life_years: z.number().optional().describe("technology-factor: remaining life in years"),
  total_life_years: z.number().optional().describe("technology-factor: total statutory life in years"),
  erosion_fraction: z.number().optional().describe("incremental-income: revenue lost without the asset"),
});

export const SegmentLinkInputSchema = z.object({
  segment: z.string().min(1).describe("Segment name as disclosed by the company"),
  attribution: z.number().describe("Share of the segment's value ascribed to the asset, in (0, 1]"),
  valuation: MethodInputSchema.optional().describe("Overrides the asset's method for this segment"),
});

export const AssetInputSchema = z.object({
  id: z.string().min(1).describe("Asset identifier"),
  kind: z
    .enum(["patent", "trademark", "trade-secret", "copyright", "other"])
    .describe("Asset kind"),
  description: z.string().optional().describe("Human-readable description"),
  segments: z.array(SegmentLinkInputSchema).describe("Segments the asset draws value from"),
  valuation: MethodInputSchema,
});

export const ValueAssetToolSchema = z.object({
  ticker: TickerSchema,
  asset: AssetInputSchema,
  assumptions: AssumptionsInputSchema.optional().describe(
    "Explicit assumptions; derived from the company's statements when omitted",
  ),
  periods: PeriodsSchema,
  ...FallbackRatesSchema,
});

export const ValuePortfolioToolSchema = z.object({
  ticker: TickerSchema,
  assets: z.array(AssetInputSchema).describe("Assets to value, reported in this order"),
  assumptions: AssumptionsInputSchema.optional().describe(
    "Explicit assumptions; derived from the company's statements when omitted",
  ),
  periods: PeriodsSchema,
  mode: z
    .enum(["strict", "best-effort"])
    .optional()
    .describe("strict aborts on the first failing asset; best-effort reports failures and values the rest"),
  ...FallbackRatesSchema,
});

export type MethodInput = z.infer<typeof MethodInputSchema>;
export type AssetInput = z.infer<typeof AssetInputSchema>;
