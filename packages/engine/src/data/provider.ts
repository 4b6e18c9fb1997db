// Data-fetch contract
// The engine only ever sees these calls. Every period list is ordered newest-first.

import type { MarketSnapshot, SegmentRevenuePoint, StatementPeriod } from '../types.js';

export interface FinancialDataProvider {
  /** @throws DataNotFoundError for an unknown ticker or segment */
  fetchSegmentSeries(ticker: string, segment: string, periods: number): Promise<SegmentRevenuePoint[]>;
  fetchStatementSeries(ticker: string, periods: number): Promise<StatementPeriod[]>;
  fetchMarketSnapshot(ticker: string): Promise<MarketSnapshot>;
  /** Segment labels the company discloses, in first-seen order. */
  fetchSegmentLabels(ticker: string): Promise<string[]>;
}
