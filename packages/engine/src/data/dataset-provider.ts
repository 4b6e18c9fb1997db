// In-memory provider over a parsed dataset document

import type { MarketSnapshot, SegmentMatching, SegmentRevenuePoint, StatementPeriod } from '../types.js';
import type { CompanyData, Dataset } from '../schemas/statements.js';
import { DataNotFoundError } from '../errors.js';
import { findSegmentRevenues, listSegmentLabels } from '../segments/matching.js';
import type { FinancialDataProvider } from './provider.js';

export class DatasetProvider implements FinancialDataProvider {
  constructor(
    private readonly dataset: Dataset,
    private readonly matching: SegmentMatching = 'exact',
  ) {}

  tickers(): string[] {
    return [...this.dataset.keys()];
  }

  /** Segment labels disclosed by a company, in first-seen order. */
  segments(ticker: string): string[] {
    return listSegmentLabels(this.company(ticker).segments);
  }

  async fetchSegmentSeries(ticker: string, segment: string, periods: number): Promise<SegmentRevenuePoint[]> {
    const points = findSegmentRevenues(this.company(ticker).segments, segment, this.matching);
    return points.slice(0, periods);
  }

  async fetchStatementSeries(ticker: string, periods: number): Promise<StatementPeriod[]> {
    return this.company(ticker).statements.slice(0, periods);
  }

  async fetchMarketSnapshot(ticker: string): Promise<MarketSnapshot> {
    return this.company(ticker).snapshot;
  }

  async fetchSegmentLabels(ticker: string): Promise<string[]> {
    return this.segments(ticker);
  }

  private company(ticker: string): CompanyData {
    const key = ticker.trim().toUpperCase();
    const company = this.dataset.get(key);
    if (!company) {
      throw new DataNotFoundError(`Ticker '${key}' not found in dataset`, {
        ticker: key,
        available: this.tickers(),
      });
    }
    return company;
  }
}
