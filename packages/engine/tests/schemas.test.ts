import { describe, it, expect } from 'vitest';
import { parseIPAsset } from '../src/schemas/assets.js';
import { parseAssumptionSet } from '../src/schemas/assumptions.js';
import { parseDataset } from '../src/schemas/statements.js';
import {
  DataNotFoundError,
  InvalidAssumptionsError,
  ParameterOutOfRangeError,
} from '../src/errors.js';

const validAsset = {
  id: 'P-100',
  kind: 'patent',
  segments: [{ segment: 'Cloud', attribution: 0.6 }],
  valuation: { method: 'relief-from-royalty', royaltyRate: 0.05 },
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a throw');
}

describe('parseIPAsset', () => {
  it('accepts a valid asset and fills the description', () => {
    expect(parseIPAsset(validAsset)).toEqual({ ...validAsset, description: '' });
  });

  it('names the offending field inside the method union', () => {
    const err = captureError(() =>
      parseIPAsset({ ...validAsset, valuation: { method: 'relief-from-royalty', royaltyRate: 1.5 } }),
    );
    expect(err).toBeInstanceOf(ParameterOutOfRangeError);
    expect(err).toMatchObject({ kind: 'ParameterOutOfRange', parameter: 'valuation.royaltyRate', value: 1.5 });
  });

  it('rejects a zero attribution at the boundary', () => {
    const err = captureError(() => parseIPAsset({ ...validAsset, segments: [{ segment: 'Cloud', attribution: 0 }] }));
    expect(err).toMatchObject({
      parameter: 'segments[0].attribution',
      value: 0,
      bounds: { min: 0, exclusiveMin: true },
    });
  });

  it('rejects an unknown method', () => {
    const err = captureError(() => parseIPAsset({ ...validAsset, valuation: { method: 'market-approach' } }));
    expect(err).toMatchObject({ parameter: 'valuation' });
  });

  it('rejects a remaining life beyond the total life', () => {
    const err = captureError(() =>
      parseIPAsset({
        ...validAsset,
        valuation: {
          method: 'technology-factor',
          baseRoyaltyRate: 0.04,
          innovationScore: 0.5,
          commercialScore: 0.5,
          legalStrengthScore: 0.5,
          remainingLifeYears: 15,
          totalLifeYears: 10,
        },
      }),
    );
    expect(err).toMatchObject({ parameter: 'valuation.remainingLifeYears' });
  });

  it('requires at least one segment', () => {
    expect(() => parseIPAsset({ ...validAsset, segments: [] })).toThrow(ParameterOutOfRangeError);
  });
});

describe('parseAssumptionSet', () => {
  it('accepts a coherent set', () => {
    expect(parseAssumptionSet({ wacc: 0.09, taxRate: 0.21, terminalGrowth: 0.02 })).toEqual({
      wacc: 0.09,
      taxRate: 0.21,
      terminalGrowth: 0.02,
    });
  });

  it('rejects a rate outside [0, 1]', () => {
    expect(() => parseAssumptionSet({ wacc: 2, taxRate: 0.21, terminalGrowth: 0.02 }))
      .toThrow(InvalidAssumptionsError);
  });

  it('rejects growth at or above WACC', () => {
    expect(() => parseAssumptionSet({ wacc: 0.08, taxRate: 0.21, terminalGrowth: 0.09 }))
      .toThrow('WACC (0.08) must exceed terminal growth (0.09)');
  });
});

describe('parseDataset', () => {
  const record = {
    name: 'Example Corp',
    snapshot: { price: 12, market_cap: 1200 },
    statements: [
      {
        period_label: 'FY2024',
        revenue: 500,
        gross_profit: 250,
        operating_income: 100,
        net_income: 80,
        tax_expense: 20,
        total_assets: 900,
        total_equity: 600,
        shares_outstanding: 100,
      },
    ],
  };

  it('maps snake_case records onto the domain types', () => {
    const dataset = parseDataset({ companies: { exmp: record } });
    const company = dataset.get('EXMP');
    expect(company?.statements[0]).toMatchObject({
      periodLabel: 'FY2024',
      researchAndDevelopment: 0,
      totalDebt: 0,
      sharesOutstanding: 100,
    });
    expect(company?.snapshot).toEqual({ price: 12, marketCap: 1200, beta: undefined });
    expect(company?.segments).toEqual([]);
  });

  it('reports where the document is malformed', () => {
    const broken = { ...record, statements: [{ ...record.statements[0], revenue: 'lots' }] };
    expect(() => parseDataset({ companies: { EXMP: broken } })).toThrow(DataNotFoundError);
    expect(() => parseDataset({ companies: { EXMP: broken } })).toThrow(
      'Invalid dataset at companies.EXMP.statements[0].revenue: Expected number, received string',
    );
  });
});
