import { z } from 'zod';
import type { AssumptionSet } from '../types.js';
import { assertValidAssumptions } from '../methods/validation.js';
import { toAssumptionsError } from './issues.js';

export const AssumptionSetSchema = z.object({
  wacc: z.number().finite().min(0).max(1),
  taxRate: z.number().finite().min(0).max(1),
  terminalGrowth: z.number().finite().min(0).max(1),
});

/**
 * Validate a caller-supplied assumption set.
 * @throws InvalidAssumptionsError on a rate outside [0, 1] or WACC <= terminal growth
 */
export function parseAssumptionSet(input: unknown): AssumptionSet {
  const parsed = AssumptionSetSchema.safeParse(input);
  if (!parsed.success) throw toAssumptionsError(parsed.error, input);
  assertValidAssumptions(parsed.data);
  return parsed.data;
}
