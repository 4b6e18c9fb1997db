// Valuation error taxonomy
// Every engine failure is one of five kinds; callers branch on `kind`, not on message text.

export type ValuationErrorKind =
  | 'DataNotFound'
  | 'InsufficientData'
  | 'InvalidAssumptions'
  | 'ParameterOutOfRange'
  | 'DivisionUndefined';

export class ValuationError extends Error {
  constructor(
    message: string,
    public readonly kind: ValuationErrorKind,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'ValuationError';
  }
}

export class DataNotFoundError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'DataNotFound', details);
    this.name = 'DataNotFoundError';
  }
}

export class SegmentNotFoundError extends DataNotFoundError {
  constructor(
    public readonly segment: string,
    public readonly available: string[],
  ) {
    super(
      `Segment '${segment}' not found. Available segments: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      { segment, available },
    );
    this.name = 'SegmentNotFoundError';
  }
}

export class InsufficientDataError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'InsufficientData', details);
    this.name = 'InsufficientDataError';
  }
}

export class EmptySeriesError extends InsufficientDataError {
  constructor(method: string) {
    super(`${method}: revenue series has no periods`, { method });
    this.name = 'EmptySeriesError';
  }
}

export class InvalidAssumptionsError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'InvalidAssumptions', details);
    this.name = 'InvalidAssumptionsError';
  }
}

export interface RangeBounds {
  min?: number;
  max?: number;
  /** When true the lower bound itself is rejected. */
  exclusiveMin?: boolean;
}

export class ParameterOutOfRangeError extends ValuationError {
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    public readonly bounds: RangeBounds = {},
    reason?: string,
  ) {
    super(
      reason ?? `${parameter} must lie in ${describeBounds(bounds)}, got ${String(value)}`,
      'ParameterOutOfRange',
      { parameter, value, ...bounds },
    );
    this.name = 'ParameterOutOfRangeError';
  }
}

function describeBounds({ min, max, exclusiveMin }: RangeBounds): string {
  const lower = min === undefined ? '(-inf' : `${exclusiveMin ? '(' : '['}${min}`;
  const upper = max === undefined ? 'inf)' : `${max}]`;
  return `${lower}, ${upper}`;
}

export class DivisionUndefinedError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'DivisionUndefined', details);
    this.name = 'DivisionUndefinedError';
  }
}

/**
 * No statement in the lookback window yielded a usable effective tax rate.
 * Callers that can tolerate this must supply their own fallback rate.
 */
export class TaxRateUndeterminedError extends DivisionUndefinedError {
  constructor(public readonly examinedPeriods: string[]) {
    super(
      `Effective tax rate undetermined: no period with a usable effective tax rate among ${examinedPeriods.length} examined`,
      { examinedPeriods },
    );
    this.name = 'TaxRateUndeterminedError';
  }
}

export function isValuationError(value: unknown): value is ValuationError {
  return value instanceof ValuationError;
}
