import { z } from 'zod';
import type { IPAsset, MethodParams } from '../types.js';
import { toParameterError } from './issues.js';

export const FractionSchema = z.number().finite().min(0).max(1);

export const IPAssetKindSchema = z.enum(['patent', 'trademark', 'trade-secret', 'copyright', 'other']);

export const ReliefFromRoyaltySchema = z.object({
  method: z.literal('relief-from-royalty'),
  royaltyRate: FractionSchema,
});

export const ExcessEarningsSchema = z.object({
  method: z.literal('excess-earnings'),
  operatingMargin: FractionSchema.optional(),
  contributoryAssets: z.record(z.string().min(1), FractionSchema).optional(),
  ipContributionFraction: FractionSchema.optional(),
  proxyAssetFraction: FractionSchema.optional(),
});

export const TechnologyFactorSchema = z
  .object({
    method: z.literal('technology-factor'),
    baseRoyaltyRate: FractionSchema,
    innovationScore: FractionSchema,
    commercialScore: FractionSchema,
    legalStrengthScore: FractionSchema,
    remainingLifeYears: z.number().int().positive(),
    totalLifeYears: z.number().int().positive().optional(),
  })
  .refine(p => p.totalLifeYears === undefined || p.remainingLifeYears <= p.totalLifeYears, {
    message: 'remainingLifeYears cannot exceed totalLifeYears',
    path: ['remainingLifeYears'],
  });

export const IncrementalIncomeSchema = z.object({
  method: z.literal('incremental-income'),
  erosionFraction: FractionSchema,
  operatingMargin: FractionSchema.optional(),
});

// z.discriminatedUnion does not accept refined members, hence a plain union keyed on `method`
export const MethodParamsSchema: z.ZodType<MethodParams> = z.union([
  ReliefFromRoyaltySchema,
  ExcessEarningsSchema,
  TechnologyFactorSchema,
  IncrementalIncomeSchema,
]);

export const SegmentAttributionSchema = z.object({
  segment: z.string().min(1),
  attribution: z.number().finite().gt(0).max(1),
  valuation: MethodParamsSchema.optional(),
});

export const IPAssetSchema = z.object({
  id: z.string().min(1),
  kind: IPAssetKindSchema,
  description: z.string().default(''),
  segments: z.array(SegmentAttributionSchema).min(1),
  valuation: MethodParamsSchema,
});

/**
 * Validate an asset definition at the boundary.
 * @throws ParameterOutOfRangeError naming the first offending field
 */
export function parseIPAsset(input: unknown): IPAsset {
  const parsed = IPAssetSchema.safeParse(input);
  if (!parsed.success) throw toParameterError(parsed.error, input);
  return parsed.data;
}

export function parseIPAssets(inputs: readonly unknown[]): IPAsset[] {
  return inputs.map(parseIPAsset);
}
