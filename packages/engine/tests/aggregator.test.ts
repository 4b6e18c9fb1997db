import { describe, it, expect } from 'vitest';
import {
  attributeRevenues,
  valueAsset,
  valuePortfolio,
  type SeriesResolver,
} from '../src/portfolio/aggregator.js';
import { reliefFromRoyalty } from '../src/methods/relief-from-royalty.js';
import { DEFAULT_ENGINE_CONFIG } from '../src/config.js';
import { ParameterOutOfRangeError, SegmentNotFoundError } from '../src/errors.js';
import type { IPAsset, MethodParams, SegmentSeries } from '../src/types.js';
import { BASE_ASSUMPTIONS, seriesOf } from './fixtures.js';

const options = { defaults: DEFAULT_ENGINE_CONFIG };

const library: Record<string, SegmentSeries> = {
  Cloud: seriesOf('Cloud', [400, 440, 480]),
  Devices: seriesOf('Devices', [600, 620, 650], 0.2),
};

const resolve: SeriesResolver = name => {
  const series = library[name];
  if (!series) throw new SegmentNotFoundError(name, Object.keys(library));
  return series;
};

function asset(id: string, segments: IPAsset['segments'], valuation: MethodParams): IPAsset {
  return { id, kind: 'patent', description: `${id} family`, segments, valuation };
}

const royalty: MethodParams = { method: 'relief-from-royalty', royaltyRate: 0.04 };

describe('attributeRevenues', () => {
  it('scales each period without re-normalizing', () => {
    expect(attributeRevenues([100, 200], 0.5)).toEqual([50, 100]);
  });

  it('accepts attribution in (0, 1] only', () => {
    expect(() => attributeRevenues([100], 0)).toThrow(ParameterOutOfRangeError);
    expect(() => attributeRevenues([100], 1.5)).toThrow(ParameterOutOfRangeError);
    expect(attributeRevenues([100], 1)).toEqual([100]);
  });
});

describe('valueAsset', () => {
  it('sums per-segment values into the asset total', () => {
    const a = asset('P-1', [
      { segment: 'Cloud', attribution: 0.5 },
      { segment: 'Devices', attribution: 0.25 },
    ], royalty);
    const valuation = valueAsset(a, resolve, BASE_ASSUMPTIONS, options);

    const cloud = reliefFromRoyalty([200, 220, 240], BASE_ASSUMPTIONS, { royaltyRate: 0.04 });
    const devices = reliefFromRoyalty([150, 155, 162.5], BASE_ASSUMPTIONS, { royaltyRate: 0.04 });

    expect(valuation.segments.map(s => s.segment)).toEqual(['Cloud', 'Devices']);
    expect(valuation.segments[0].result.totalValue).toBeCloseTo(cloud.totalValue, 10);
    expect(valuation.totalValue).toBeCloseTo(cloud.totalValue + devices.totalValue, 10);
    expect(valuation.pvExplicit + valuation.pvTerminal).toBeCloseTo(valuation.totalValue, 10);
    expect(valuation).toMatchObject({ assetId: 'P-1', kind: 'patent', description: 'P-1 family' });
  });

  it('lets a segment override the asset method', () => {
    const a = asset('P-2', [
      { segment: 'Cloud', attribution: 0.5 },
      { segment: 'Devices', attribution: 0.5, valuation: { method: 'incremental-income', erosionFraction: 0.1 } },
    ], royalty);
    const valuation = valueAsset(a, resolve, BASE_ASSUMPTIONS, options);
    expect(valuation.segments.map(s => s.result.method)).toEqual(['relief-from-royalty', 'incremental-income']);
    // Falls back to the Devices margin
    expect(valuation.segments[1].result.details.operatingMargin).toBe(0.2);
  });

  it.each<MethodParams>([
    royalty,
    { method: 'excess-earnings' },
    {
      method: 'technology-factor',
      baseRoyaltyRate: 0.03,
      innovationScore: 0.7,
      commercialScore: 0.6,
      legalStrengthScore: 0.8,
      remainingLifeYears: 8,
    },
    { method: 'incremental-income', erosionFraction: 0.15 },
  ])('$method value strictly increases with attribution', params => {
    const low = valueAsset(asset('A', [{ segment: 'Cloud', attribution: 0.4 }], params), resolve, BASE_ASSUMPTIONS, options);
    const high = valueAsset(asset('A', [{ segment: 'Cloud', attribution: 0.8 }], params), resolve, BASE_ASSUMPTIONS, options);
    expect(high.totalValue).toBeGreaterThan(low.totalValue);
    expect(low.totalValue).toBeGreaterThan(0);
  });

  it('propagates a missing segment', () => {
    const a = asset('P-3', [{ segment: 'Wearables', attribution: 0.5 }], royalty);
    expect(() => valueAsset(a, resolve, BASE_ASSUMPTIONS, options)).toThrow(SegmentNotFoundError);
  });
});

describe('valuePortfolio', () => {
  const assets = [
    asset('TM-1', [{ segment: 'Devices', attribution: 0.3 }], royalty),
    asset('P-1', [{ segment: 'Cloud', attribution: 0.8 }], { method: 'excess-earnings' }),
    // Overlaps TM-1 on Devices; attributions are independent
    asset('TS-1', [{ segment: 'Devices', attribution: 0.9 }], { method: 'incremental-income', erosionFraction: 0.2 }),
  ];

  it('equals the sum of independently valued assets, in input order', () => {
    const portfolio = valuePortfolio('DEMO', assets, resolve, BASE_ASSUMPTIONS, { ...options, mode: 'strict' });
    const independent = assets.map(a => valueAsset(a, resolve, BASE_ASSUMPTIONS, options).totalValue);

    expect(portfolio.assets.map(a => a.assetId)).toEqual(['TM-1', 'P-1', 'TS-1']);
    expect(portfolio.totalValue).toBeCloseTo(independent[0] + independent[1] + independent[2], 10);
    expect(portfolio.assetCount).toBe(3);
    expect(portfolio.failures).toEqual([]);
    expect(portfolio.assumptions).toEqual(BASE_ASSUMPTIONS);
  });

  it('aborts on the first failure in strict mode', () => {
    const broken = [...assets, asset('X-1', [{ segment: 'Wearables', attribution: 1 }], royalty)];
    expect(() => valuePortfolio('DEMO', broken, resolve, BASE_ASSUMPTIONS, { ...options, mode: 'strict' }))
      .toThrow("Segment 'Wearables' not found");
  });

  it('records failures and values the rest in best-effort mode', () => {
    const broken = [asset('X-1', [{ segment: 'Wearables', attribution: 1 }], royalty), ...assets];
    const portfolio = valuePortfolio('DEMO', broken, resolve, BASE_ASSUMPTIONS, { ...options, mode: 'best-effort' });
    const full = valuePortfolio('DEMO', assets, resolve, BASE_ASSUMPTIONS, { ...options, mode: 'strict' });

    expect(portfolio.assetCount).toBe(3);
    expect(portfolio.totalValue).toBeCloseTo(full.totalValue, 10);
    expect(portfolio.failures).toEqual([
      {
        assetId: 'X-1',
        kind: 'DataNotFound',
        message: "Segment 'Wearables' not found. Available segments: Cloud, Devices",
      },
    ]);
  });

  it('never swallows errors outside the valuation taxonomy', () => {
    const exploding: SeriesResolver = () => {
      throw new TypeError('provider bug');
    };
    expect(() => valuePortfolio('DEMO', assets, exploding, BASE_ASSUMPTIONS, { ...options, mode: 'best-effort' }))
      .toThrow(TypeError);
  });

  it('values an empty portfolio at zero', () => {
    const portfolio = valuePortfolio('DEMO', [], resolve, BASE_ASSUMPTIONS, { ...options, mode: 'strict' });
    expect(portfolio.totalValue).toBe(0);
    expect(portfolio.assets).toEqual([]);
  });
});
