// Heuristic IP asset suggestions from segment names
// Keyword rules only: the output is a starting portfolio to review, not evidence that an asset exists.

import type { IPAsset, IPAssetKind, SegmentAttribution } from '../types.js';

const HARDWARE = ['phone', 'tablet', 'pad', 'computer', 'watch', 'wearable', 'device', 'hardware', 'chip', 'processor', 'semiconductor'];
const SOFTWARE = ['service', 'software', 'cloud', 'platform', 'subscription'];
const SERVICES = ['service', 'cloud', 'subscription'];
const APPLICATIONS = ['software', 'platform', 'application'];
const NO_BRAND = ['service', 'other', 'corporate', 'licens', 'eliminat'];

const BRAND_ROYALTY = 0.06;
const SOFTWARE_ROYALTY = 0.08;

function compact(label: string): string {
  return label.toLowerCase().replace(/[\s\-_]+/g, '');
}

function mentions(label: string, keywords: readonly string[]): boolean {
  const text = compact(label);
  return keywords.some(k => text.includes(k));
}

function idPart(label: string): string {
  return label.toUpperCase().replace(/[^A-Z0-9]+/g, '-').replace(/^-|-$/g, '');
}

export function isHardwareSegment(label: string): boolean {
  return mentions(label, HARDWARE);
}

/**
 * Share of a segment's value a new asset of `kind` would typically carry.
 * Brand weight is highest for handheld consumer hardware; service segments lean on
 * their trade secrets.
 */
export function estimateAttribution(segment: string, kind: IPAssetKind): number {
  switch (kind) {
    case 'trademark':
      if (mentions(segment, ['phone'])) return 0.25;
      if (mentions(segment, ['watch', 'wearable'])) return 0.15;
      if (isHardwareSegment(segment)) return 0.2;
      return 0.12;
    case 'patent':
      return mentions(segment, ['chip', 'processor', 'semiconductor']) ? 0.15 : 0.1;
    case 'trade-secret':
      return mentions(segment, SERVICES) ? 0.3 : 0.15;
    case 'copyright':
      return 0.2;
    case 'other':
      return 0.1;
  }
}

function link(segment: string, attribution: number): SegmentAttribution[] {
  return [{ segment, attribution }];
}

function segmentAssets(segment: string): IPAsset[] {
  const id = idPart(segment);
  const assets: IPAsset[] = [];

  if (!mentions(segment, NO_BRAND)) {
    assets.push({
      id: `TM-${id}-001`,
      kind: 'trademark',
      description: `${segment} brand and trademarks`,
      segments: link(segment, estimateAttribution(segment, 'trademark')),
      valuation: { method: 'relief-from-royalty', royaltyRate: BRAND_ROYALTY },
    });
  }

  if (isHardwareSegment(segment)) {
    assets.push(
      {
        id: `PAT-${id}-CORE-001`,
        kind: 'patent',
        description: `${segment} core technology patents`,
        segments: link(segment, 0.15),
        valuation: {
          method: 'technology-factor',
          baseRoyaltyRate: 0.05,
          innovationScore: 0.8,
          commercialScore: 0.85,
          legalStrengthScore: 0.8,
          remainingLifeYears: 10,
        },
      },
      {
        id: `PAT-${id}-DESIGN-001`,
        kind: 'patent',
        description: `${segment} industrial design patents`,
        segments: link(segment, 0.08),
        valuation: {
          method: 'technology-factor',
          baseRoyaltyRate: 0.03,
          innovationScore: 0.85,
          commercialScore: 0.9,
          legalStrengthScore: 0.75,
          remainingLifeYears: 12,
        },
      },
    );
  }

  if (mentions(segment, SOFTWARE)) {
    assets.push({
      id: `TS-${id}-001`,
      kind: 'trade-secret',
      description: `${segment} proprietary algorithms and software`,
      segments: link(segment, estimateAttribution(segment, 'trade-secret')),
      valuation: { method: 'relief-from-royalty', royaltyRate: SOFTWARE_ROYALTY },
    });
  }

  return assets;
}

/** Per-segment suggestions, segments in the given order. */
export function discoverSegmentAssets(segments: readonly string[]): IPAsset[] {
  return segments.flatMap(segmentAssets);
}

/** Platform technology shared by two or more hardware segments. */
export function suggestSharedAssets(segments: readonly string[]): IPAsset[] {
  const hardware = segments.filter(isHardwareSegment);
  if (hardware.length < 2) return [];

  return [
    {
      id: 'PAT-CHIP-SHARED-001',
      kind: 'patent',
      description: 'Proprietary processor and chip architecture',
      segments: hardware.map(segment => ({ segment, attribution: 0.12 })),
      valuation: {
        method: 'technology-factor',
        baseRoyaltyRate: 0.05,
        innovationScore: 0.92,
        commercialScore: 0.88,
        legalStrengthScore: 0.9,
        remainingLifeYears: 12,
      },
    },
    {
      id: 'TS-OS-SHARED-001',
      kind: 'trade-secret',
      description: 'Operating system and software platform',
      segments: hardware.map(segment => ({ segment, attribution: 0.1 })),
      valuation: { method: 'relief-from-royalty', royaltyRate: SOFTWARE_ROYALTY },
    },
  ];
}

export interface IndustryInsights {
  primaryIpTypes: string[];
  keyFocusAreas: string[];
  competitiveConsiderations: string[];
  valuationApproach: string;
}

export function industryInsights(segments: readonly string[]): IndustryInsights {
  const hasHardware = segments.some(isHardwareSegment);
  const hasServices = segments.some(s => mentions(s, SERVICES));
  const hasSoftware = segments.some(s => mentions(s, APPLICATIONS));

  const types = new Set<string>();
  const keyFocusAreas: string[] = [];
  const competitiveConsiderations: string[] = [];

  if (hasHardware) {
    ['Patents', 'Design Rights', 'Trademarks'].forEach(t => types.add(t));
    keyFocusAreas.push('Hardware innovation and industrial design');
    competitiveConsiderations.push('Patent portfolio strength vs. competitors');
  }
  if (hasServices) {
    ['Trade Secrets', 'Copyrights'].forEach(t => types.add(t));
    keyFocusAreas.push('Platform ecosystem and network effects');
    competitiveConsiderations.push('Customer lock-in and switching costs');
  }
  if (hasSoftware) {
    ['Copyrights', 'Trade Secrets'].forEach(t => types.add(t));
    keyFocusAreas.push('Algorithm efficiency and user experience');
  }

  let valuationApproach = 'Standard Relief from Royalty method';
  if (hasHardware && hasServices) {
    valuationApproach = 'Hybrid: Technology Factor for patents, Relief from Royalty for brand/platform';
  } else if (hasHardware) {
    valuationApproach = 'Technology-focused: Emphasize patent quality and innovation';
  } else if (hasServices) {
    valuationApproach = 'Platform-focused: Value network effects and recurring revenue';
  }

  return { primaryIpTypes: [...types], keyFocusAreas, competitiveConsiderations, valuationApproach };
}

export interface AssetDiscovery {
  segments: string[];
  assets: IPAsset[];
  insights: IndustryInsights;
}

/** Segment suggestions followed by shared ones, plus the industry read-out. */
export function discoverAssets(segments: readonly string[]): AssetDiscovery {
  return {
    segments: [...segments],
    assets: [...discoverSegmentAssets(segments), ...suggestSharedAssets(segments)],
    insights: industryInsights(segments),
  };
}
