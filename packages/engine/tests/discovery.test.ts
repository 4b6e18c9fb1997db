import { describe, it, expect } from 'vitest';
import {
  discoverAssets,
  discoverSegmentAssets,
  estimateAttribution,
  industryInsights,
  suggestSharedAssets,
} from '../src/discovery/suggester.js';
import { parseIPAsset } from '../src/schemas/assets.js';

describe('discoverSegmentAssets', () => {
  const assets = discoverSegmentAssets(['Cloud', 'Devices']);

  it('suggests brand, technology and software assets per segment', () => {
    expect(assets.map(a => a.id)).toEqual([
      'TM-CLOUD-001',
      'TS-CLOUD-001',
      'TM-DEVICES-001',
      'PAT-DEVICES-CORE-001',
      'PAT-DEVICES-DESIGN-001',
    ]);
    expect(assets.map(a => a.segments[0].attribution)).toEqual([0.12, 0.3, 0.2, 0.15, 0.08]);
  });

  it('picks a method per asset kind', () => {
    expect(assets[0].valuation).toEqual({ method: 'relief-from-royalty', royaltyRate: 0.06 });
    expect(assets[1].valuation).toEqual({ method: 'relief-from-royalty', royaltyRate: 0.08 });
    expect(assets[3].valuation).toMatchObject({ method: 'technology-factor', remainingLifeYears: 10 });
  });

  it('produces assets that pass validation unchanged', () => {
    for (const asset of assets) expect(parseIPAsset(asset)).toEqual(asset);
  });

  it('skips brands for licensing and corporate lines', () => {
    expect(discoverSegmentAssets(['Licensing', 'Corporate & Other'])).toEqual([]);
  });

  it('builds identifiers from the whole label', () => {
    expect(discoverSegmentAssets(['Personal Care'])[0].id).toBe('TM-PERSONAL-CARE-001');
  });
});

describe('suggestSharedAssets', () => {
  it('needs at least two hardware segments', () => {
    expect(suggestSharedAssets(['Devices', 'Cloud'])).toEqual([]);
  });

  it('links shared platform assets to every hardware segment', () => {
    const shared = suggestSharedAssets(['Smartphones', 'Services', 'Tablets']);
    expect(shared.map(a => a.id)).toEqual(['PAT-CHIP-SHARED-001', 'TS-OS-SHARED-001']);
    expect(shared[0].segments).toEqual([
      { segment: 'Smartphones', attribution: 0.12 },
      { segment: 'Tablets', attribution: 0.12 },
    ]);
    expect(shared[1].segments.map(s => s.attribution)).toEqual([0.1, 0.1]);
  });
});

describe('estimateAttribution', () => {
  it('weights brands by product type', () => {
    expect(estimateAttribution('Smartphones', 'trademark')).toBe(0.25);
    expect(estimateAttribution('Smartwatch', 'trademark')).toBe(0.15);
    expect(estimateAttribution('Home Devices', 'trademark')).toBe(0.2);
    expect(estimateAttribution('Beverages', 'trademark')).toBe(0.12);
  });

  it('weights technology and software by segment', () => {
    expect(estimateAttribution('Chips', 'patent')).toBe(0.15);
    expect(estimateAttribution('Retail', 'patent')).toBe(0.1);
    expect(estimateAttribution('Cloud Services', 'trade-secret')).toBe(0.3);
    expect(estimateAttribution('Retail', 'trade-secret')).toBe(0.15);
    expect(estimateAttribution('Retail', 'copyright')).toBe(0.2);
    expect(estimateAttribution('Retail', 'other')).toBe(0.1);
  });
});

describe('industryInsights', () => {
  it('recommends a hybrid approach for hardware with services', () => {
    expect(industryInsights(['Cloud', 'Devices'])).toEqual({
      primaryIpTypes: ['Patents', 'Design Rights', 'Trademarks', 'Trade Secrets', 'Copyrights'],
      keyFocusAreas: ['Hardware innovation and industrial design', 'Platform ecosystem and network effects'],
      competitiveConsiderations: [
        'Patent portfolio strength vs. competitors',
        'Customer lock-in and switching costs',
      ],
      valuationApproach: 'Hybrid: Technology Factor for patents, Relief from Royalty for brand/platform',
    });
  });

  it('lists each IP type once', () => {
    expect(industryInsights(['Cloud Software']).primaryIpTypes).toEqual(['Trade Secrets', 'Copyrights']);
  });

  it('falls back to relief from royalty without any signal', () => {
    expect(industryInsights(['Beverages'])).toEqual({
      primaryIpTypes: [],
      keyFocusAreas: [],
      competitiveConsiderations: [],
      valuationApproach: 'Standard Relief from Royalty method',
    });
  });
});

describe('discoverAssets', () => {
  it('appends shared suggestions after the per-segment ones', () => {
    const discovery = discoverAssets(['Smartphones', 'Tablets']);
    expect(discovery.segments).toEqual(['Smartphones', 'Tablets']);
    expect(discovery.assets.slice(-2).map(a => a.id)).toEqual(['PAT-CHIP-SHARED-001', 'TS-OS-SHARED-001']);
    expect(discovery.assets).toHaveLength(8);
    expect(discovery.insights.valuationApproach).toBe('Technology-focused: Emphasize patent quality and innovation');
  });
});
