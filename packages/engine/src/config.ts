// Engine configuration
// Every default rate lives here and is passed in explicitly; the engine reads no globals.

import { z } from 'zod';
import { toAssumptionsError } from './schemas/issues.js';

const Rate = z.number().finite().min(0).max(1);

export const BetaBandSchema = z.object({
  minMarketCap: z.number().nonnegative(),
  beta: z.number().positive(),
});

export const SegmentMatchingSchema = z.enum(['exact', 'case-insensitive', 'normalized']);
export const PortfolioModeSchema = z.enum(['strict', 'best-effort']);

export const EngineConfigSchema = z
  .object({
    riskFreeRate: Rate.default(0.045),
    marketRiskPremium: Rate.default(0.06),
    // Companies above `minMarketCap` get `beta`; checked largest band first
    betaBands: z.array(BetaBandSchema).default([
      { minMarketCap: 500e9, beta: 1.0 },
      { minMarketCap: 100e9, beta: 1.1 },
      { minMarketCap: 10e9, beta: 1.2 },
    ]),
    defaultBeta: z.number().positive().default(1.3),
    taxRateLookback: z.number().int().positive().default(3),
    // Periods with a higher effective rate are treated as distorted and skipped
    maxEffectiveTaxRate: Rate.default(0.5),
    terminalGrowthFloor: Rate.default(0.01),
    terminalGrowthCeiling: Rate.default(0.04),
    defaultPeriods: z.number().int().positive().default(5),
    segmentMatching: SegmentMatchingSchema.default('exact'),
    portfolioMode: PortfolioModeSchema.default('strict'),
    excessEarnings: z
      .object({
        contributoryAssets: z.record(z.string(), Rate).default({
          working_capital: 0.02,
          fixed_assets: 0.10,
          other_intangibles: 0.12,
        }),
        ipContributionFraction: Rate.default(0.5),
        proxyAssetFraction: Rate.default(0.5),
      })
      .default({}),
    technologyFactor: z
      .object({ totalLifeYears: z.number().int().positive().default(20) })
      .default({}),
  })
  .refine(c => c.terminalGrowthFloor <= c.terminalGrowthCeiling, {
    message: 'terminalGrowthFloor cannot exceed terminalGrowthCeiling',
    path: ['terminalGrowthFloor'],
  });

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) throw toAssumptionsError(parsed.error, input);
  return parsed.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig();

const NUMERIC_ENV: Array<[string, 'riskFreeRate' | 'marketRiskPremium' | 'terminalGrowthFloor'
  | 'terminalGrowthCeiling' | 'taxRateLookback' | 'maxEffectiveTaxRate' | 'defaultPeriods']> = [
  ['IPV_RISK_FREE_RATE', 'riskFreeRate'],
  ['IPV_MARKET_RISK_PREMIUM', 'marketRiskPremium'],
  ['IPV_TERMINAL_GROWTH_FLOOR', 'terminalGrowthFloor'],
  ['IPV_TERMINAL_GROWTH_CEILING', 'terminalGrowthCeiling'],
  ['IPV_TAX_LOOKBACK', 'taxRateLookback'],
  ['IPV_MAX_TAX_RATE', 'maxEffectiveTaxRate'],
  ['IPV_DEFAULT_PERIODS', 'defaultPeriods'],
];

const EnvEnumsSchema = z.object({
  IPV_SEGMENT_MATCHING: SegmentMatchingSchema.optional(),
  IPV_PORTFOLIO_MODE: PortfolioModeSchema.optional(),
});

/**
 * Build a config from an environment record (typically `process.env`).
 * Unset or empty variables keep their defaults.
 */
export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const input: EngineConfigInput = {};
  for (const [name, key] of NUMERIC_ENV) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') input[key] = Number(raw);
  }

  const present = (name: string) => (env[name]?.trim() ? env[name]?.trim() : undefined);
  const enums = EnvEnumsSchema.safeParse({
    IPV_SEGMENT_MATCHING: present('IPV_SEGMENT_MATCHING'),
    IPV_PORTFOLIO_MODE: present('IPV_PORTFOLIO_MODE'),
  });
  if (!enums.success) throw toAssumptionsError(enums.error, env);
  if (enums.data.IPV_SEGMENT_MATCHING) input.segmentMatching = enums.data.IPV_SEGMENT_MATCHING;
  if (enums.data.IPV_PORTFOLIO_MODE) input.portfolioMode = enums.data.IPV_PORTFOLIO_MODE;

  return parseEngineConfig(input);
}
