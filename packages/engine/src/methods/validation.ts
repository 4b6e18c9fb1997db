// Input guards shared by every valuation method. Out-of-range input fails; nothing is clamped.

import type { AssumptionSet } from '../types.js';
import {
  EmptySeriesError,
  InvalidAssumptionsError,
  ParameterOutOfRangeError,
} from '../errors.js';

export function assertValidAssumptions(assumptions: AssumptionSet): void {
  const { wacc, taxRate, terminalGrowth } = assumptions;
  for (const [name, value] of [
    ['wacc', wacc],
    ['taxRate', taxRate],
    ['terminalGrowth', terminalGrowth],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new InvalidAssumptionsError(`${name} must lie in [0, 1], got ${String(value)}`, {
        [name]: value,
      });
    }
  }
  if (wacc <= terminalGrowth) {
    throw new InvalidAssumptionsError(
      `WACC (${wacc}) must exceed terminal growth (${terminalGrowth}); terminal value is undefined otherwise`,
      { wacc, terminalGrowth },
    );
  }
}

export function assertFraction(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ParameterOutOfRangeError(parameter, value, { min: 0, max: 1 });
  }
}

export function assertRevenueSeries(method: string, revenues: readonly number[]): void {
  if (revenues.length === 0) throw new EmptySeriesError(method);
  revenues.forEach((revenue, i) => {
    if (!Number.isFinite(revenue) || revenue < 0) {
      throw new ParameterOutOfRangeError(`revenues[${i}]`, revenue, { min: 0 });
    }
  });
}
