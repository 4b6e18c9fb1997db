import { z } from "zod";

// Ranges are checked by the engine so every failure carries its error kind

export const TickerSchema = z
  .string()
  .min(1)
  .describe("Company ticker as listed in the dataset (case-insensitive)");

export const PeriodsSchema = z
  .number()
  .int()
  .optional()
  .describe("Number of most recent periods to use (defaults to the server configuration)");

export const RevenueSeriesSchema = z
  .array(z.number())
  .describe("Attributed revenue per period, oldest first; the last period seeds the terminal value");

export const AssumptionsInputSchema = z.object({
  wacc: z.number().describe("Discount rate as a fraction (e.g. 0.095 = 9.5%)"),
  tax_rate: z.number().describe("Effective tax rate as a fraction (e.g. 0.21 = 21%)"),
  terminal_growth: z
    .number()
    .describe("Perpetual growth after the explicit period; must be below wacc"),
});

export const FallbackRatesSchema = {
  fallback_tax_rate: z
    .number()
    .optional()
    .describe("Tax rate to use only when no recent period yields a usable effective rate"),
  fallback_terminal_growth: z
    .number()
    .optional()
    .describe("Terminal growth to use only when revenue growth cannot be observed"),
};

export type AssumptionsInput = z.infer<typeof AssumptionsInputSchema>;
