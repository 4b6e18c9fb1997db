import { describe, it, expect } from 'vitest';
import { findSegmentRevenues, listSegmentLabels, segmentLabelsMatch } from '../src/segments/matching.js';
import { proportionalAllocation } from '../src/segments/allocation.js';
import { averageOperatingMargin, prepareSegmentSeries } from '../src/segments/preparer.js';
import {
  DataNotFoundError,
  DivisionUndefinedError,
  InsufficientDataError,
  ParameterOutOfRangeError,
  SegmentNotFoundError,
} from '../src/errors.js';
import type { SegmentDisclosure } from '../src/types.js';
import { statement } from './fixtures.js';

const disclosures: SegmentDisclosure[] = [
  {
    periodLabel: 'FY2024',
    segments: [
      { label: 'Cloud Services', revenue: 400 },
      { label: 'Devices', revenue: 600 },
    ],
  },
  {
    periodLabel: 'FY2023',
    segments: [
      { label: 'Cloud Services', revenue: 300 },
      { label: 'Devices', revenue: 700 },
    ],
  },
];

describe('segment matching', () => {
  it('finds an exact label in every period', () => {
    expect(findSegmentRevenues(disclosures, 'Cloud Services', 'exact')).toEqual([
      { periodLabel: 'FY2024', revenue: 400 },
      { periodLabel: 'FY2023', revenue: 300 },
    ]);
  });

  it('is case-sensitive by default mode', () => {
    expect(() => findSegmentRevenues(disclosures, 'cloud services', 'exact')).toThrow(
      "Segment 'cloud services' not found. Available segments: Cloud Services, Devices",
    );
  });

  it('raises DataNotFound for an unknown segment', () => {
    try {
      findSegmentRevenues(disclosures, 'Wearables', 'normalized');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DataNotFoundError);
      expect(err).toBeInstanceOf(SegmentNotFoundError);
      expect(err).toMatchObject({ kind: 'DataNotFound', available: ['Cloud Services', 'Devices'] });
    }
  });

  it('supports case-insensitive and normalized modes', () => {
    expect(segmentLabelsMatch('Cloud Services', 'CLOUD SERVICES', 'case-insensitive')).toBe(true);
    expect(segmentLabelsMatch('Cloud Services', 'cloud-services', 'case-insensitive')).toBe(false);
    expect(segmentLabelsMatch('Cloud Services', 'cloud_services', 'normalized')).toBe(true);
    expect(findSegmentRevenues(disclosures, 'cloudservices', 'normalized')).toHaveLength(2);
  });

  it('lists labels in first-seen order', () => {
    expect(listSegmentLabels(disclosures)).toEqual(['Cloud Services', 'Devices']);
  });
});

describe('proportionalAllocation', () => {
  it('allocates company totals by revenue share', () => {
    const allocated = proportionalAllocation.allocate(250, statement());
    expect(allocated).toEqual({ share: 0.25, grossProfit: 150, researchAndDevelopment: 30, operatingIncome: 62.5 });
  });

  it('refuses a period without company revenue', () => {
    expect(() => proportionalAllocation.allocate(10, statement({ revenue: 0 }))).toThrow(DivisionUndefinedError);
  });
});

describe('prepareSegmentSeries', () => {
  const statements = [
    statement({ periodLabel: 'FY2024' }),
    statement({ periodLabel: 'FY2023' }),
    statement({ periodLabel: 'FY2021' }),
  ];
  const revenues = [
    { periodLabel: 'FY2024', revenue: 400 },
    { periodLabel: 'FY2023', revenue: 300 },
    { periodLabel: 'FY2022', revenue: 200 },
  ];

  it('keeps aligned periods and returns them oldest-first', () => {
    const series = prepareSegmentSeries({ segment: 'Cloud', revenues, statements, periods: 5 });
    expect(series.periodLabels).toEqual(['FY2023', 'FY2024']);
    expect(series.revenues).toEqual([300, 400]);
    expect(series.companyRevenues).toEqual([1000, 1000]);
    expect(series.shares[0]).toBeCloseTo(0.3, 10);
    expect(series.grossProfits[1]).toBeCloseTo(240, 10);
    expect(series.researchAndDevelopment[1]).toBeCloseTo(48, 10);
    expect(series.operatingIncomes[0]).toBeCloseTo(75, 10);
    expect(averageOperatingMargin(series)).toBeCloseTo(0.25, 10);
  });

  it('keeps the most recent periods when more are available', () => {
    const series = prepareSegmentSeries({ segment: 'Cloud', revenues, statements, periods: 1 });
    expect(series.periodLabels).toEqual(['FY2024']);
  });

  it('gives a zero-revenue period the company margin', () => {
    const series = prepareSegmentSeries({
      segment: 'Cloud',
      revenues: [{ periodLabel: 'FY2024', revenue: 0 }],
      statements,
      periods: 3,
    });
    expect(series.operatingMargins).toEqual([0.25]);
  });

  it('rejects an empty revenue list as a missing segment', () => {
    expect(() => prepareSegmentSeries({ segment: 'Cloud', revenues: [], statements, periods: 3 }))
      .toThrow(SegmentNotFoundError);
  });

  it('fails when no period aligns', () => {
    expect(() =>
      prepareSegmentSeries({
        segment: 'Cloud',
        revenues: [{ periodLabel: 'FY2019', revenue: 10 }],
        statements,
        periods: 3,
      }),
    ).toThrow(InsufficientDataError);
  });

  it('rejects a negative segment revenue', () => {
    expect(() =>
      prepareSegmentSeries({
        segment: 'Cloud',
        revenues: [{ periodLabel: 'FY2024', revenue: -1 }],
        statements,
        periods: 3,
      }),
    ).toThrow(ParameterOutOfRangeError);
  });

  it('rejects a non-positive period count', () => {
    expect(() => prepareSegmentSeries({ segment: 'Cloud', revenues, statements, periods: 0 }))
      .toThrow(ParameterOutOfRangeError);
  });

  it('does not mutate its inputs', () => {
    const before = JSON.stringify(revenues);
    prepareSegmentSeries({ segment: 'Cloud', revenues, statements, periods: 5 });
    expect(JSON.stringify(revenues)).toBe(before);
  });
});
