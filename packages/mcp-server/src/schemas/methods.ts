import { z } from "zod";
import { AssumptionsInputSchema, RevenueSeriesSchema } from "./common.js";

export const ContributoryAssetsSchema = z
  .record(z.string(), z.number())
  .describe("Contributory asset category to required return, e.g. { \"working_capital\": 0.02 }");

export const ReliefFromRoyaltyToolSchema = z.object({
  revenues: RevenueSeriesSchema,
  royalty_rate: z.number().describe("Arm's-length royalty rate as a fraction of revenue"),
  assumptions: AssumptionsInputSchema,
});

export const ExcessEarningsToolSchema = z.object({
  revenues: RevenueSeriesSchema,
  operating_margin: z.number().describe("Operating margin applied to each period's revenue"),
  contributory_assets: ContributoryAssetsSchema.optional(),
  ip_contribution_fraction: z
    .number()
    .optional()
    .describe("Share of excess earnings attributed to the asset (default 0.5)"),
  proxy_asset_fraction: z
    .number()
    .optional()
    .describe("Contributory asset value as a fraction of revenue (default 0.5); an approximation"),
  assumptions: AssumptionsInputSchema,
});

export const TechnologyFactorToolSchema = z.object({
  revenues: RevenueSeriesSchema,
  base_royalty_rate: z.number().describe("Base royalty rate before quality adjustment"),
  innovation_score: z.number().describe("Innovation score in [0, 1] (weight 30%)"),
  commercial_score: z.number().describe("Commercial success score in [0, 1] (weight 35%)"),
  legal_strength_score: z.number().describe("Legal strength score in [0, 1] (weight 25%)"),
  remaining_life_years: z
    .number()
    .int()
    .describe("Remaining legal life in years; caps the projection length"),
  total_life_years: z
    .number()
    .int()
    .optional()
    .describe("Total statutory life in years (default 20)"),
  assumptions: AssumptionsInputSchema,
});

export const IncrementalIncomeToolSchema = z.object({
  revenues: RevenueSeriesSchema,
  erosion_fraction: z
    .number()
    .describe("Share of revenue the segment would lose without the asset"),
  operating_margin: z.number().describe("Operating margin on the eroded revenue"),
  assumptions: AssumptionsInputSchema,
});
