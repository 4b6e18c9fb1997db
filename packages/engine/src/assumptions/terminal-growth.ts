import type { StatementPeriod } from '../types.js';
import { InsufficientDataError, ParameterOutOfRangeError } from '../errors.js';

export interface GrowthObservation {
  from: string;
  to: string;
  growth: number;
}

export interface TerminalGrowthEstimate {
  terminalGrowth: number;
  source: 'calculated' | 'fallback';
  /** Unclamped mean of the observations. Absent for a fallback. */
  historicalAverage?: number;
  clamped: boolean;
  history: GrowthObservation[];
}

export interface GrowthBand {
  floor: number;
  ceiling: number;
}

/**
 * Average period-over-period revenue growth, clamped into `band`.
 * Statements are newest-first; a pair whose older revenue is not positive is skipped.
 * Short bursts of growth must not become a perpetuity rate, hence the ceiling.
 *
 * @throws InsufficientDataError when no pair is usable and no fallback is given
 */
export function calculateTerminalGrowth(
  statements: readonly StatementPeriod[],
  band: GrowthBand,
  fallbackTerminalGrowth?: number,
): TerminalGrowthEstimate {
  const history: GrowthObservation[] = [];
  for (let i = 0; i < statements.length - 1; i++) {
    const newer = statements[i];
    const older = statements[i + 1];
    if (older.revenue <= 0) continue;
    history.push({
      from: older.periodLabel,
      to: newer.periodLabel,
      growth: (newer.revenue - older.revenue) / older.revenue,
    });
  }

  if (history.length === 0) {
    if (fallbackTerminalGrowth === undefined) {
      throw new InsufficientDataError(
        `Terminal growth needs two consecutive periods with positive revenue, got ${statements.length} period(s)`,
        { periods: statements.length },
      );
    }
    if (!Number.isFinite(fallbackTerminalGrowth) || fallbackTerminalGrowth < 0 || fallbackTerminalGrowth > 1) {
      throw new ParameterOutOfRangeError('fallbackTerminalGrowth', fallbackTerminalGrowth, { min: 0, max: 1 });
    }
    return { terminalGrowth: fallbackTerminalGrowth, source: 'fallback', clamped: false, history };
  }

  const historicalAverage = history.reduce((sum, h) => sum + h.growth, 0) / history.length;
  const terminalGrowth = Math.min(Math.max(historicalAverage, band.floor), band.ceiling);

  return {
    terminalGrowth,
    source: 'calculated',
    historicalAverage,
    clamped: terminalGrowth !== historicalAverage,
    history,
  };
}
