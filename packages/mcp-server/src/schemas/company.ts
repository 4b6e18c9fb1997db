import { z } from "zod";
import { FallbackRatesSchema, PeriodsSchema, TickerSchema } from "./common.js";

export const SegmentSeriesToolSchema = z.object({
  ticker: TickerSchema,
  segment: z.string().min(1).describe("Segment name as disclosed by the company"),
  periods: PeriodsSchema,
});

export const DeriveAssumptionsToolSchema = z.object({
  ticker: TickerSchema,
  ...FallbackRatesSchema,
});

export const FinancialHealthToolSchema = z.object({
  ticker: TickerSchema,
});

export const DiscoverAssetsToolSchema = z.object({
  ticker: TickerSchema,
});
