import { DestinationDetails, EnrichedPoi, HarvestMetadata, OverpassElement, Poi, SilverMetadata } from '../../src/types';

export function makePoi(overrides: Partial<Poi> = {}): Poi {
  return {
    osmId: 'node/1',
    name: 'Narikala Fortress',
    category: 'historic',
    coordinates: { lat: 41.6875, lon: 44.8085 },
    tags: {},
    contact: {},
    ...overrides,
  };
}

export function makeEnrichedPoi(overrides: Partial<EnrichedPoi> = {}): EnrichedPoi {
  return {
    ...makePoi(),
    description: 'An old fortress above the city.',
    durationMin: 90,
    bestTime: 'Morning',
    bestTimeReason: 'Fewer visitors',
    personas: { culture: 90, adventure: 40, food: 10, relax: 30 },
    priceLevel: 0,
    tips: ['Take the cable car up'],
    whatToExpect: 'Walls and views over the old town',
    isPopular: true,
    enrichmentSource: 'llm',
    enrichedAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeElement(
  id: number,
  tags: Record<string, string>,
  position: { lat: number; lon: number },
  type: OverpassElement['type'] = 'node'
): OverpassElement {
  if (type === 'node') return { type, id, lat: position.lat, lon: position.lon, tags };
  return { type, id, center: position, tags };
}

export function makeHarvestMetadata(overrides: Partial<HarvestMetadata> = {}): HarvestMetadata {
  return {
    city: 'tbilisi',
    harvestId: '20250101_000000',
    source: 'OpenStreetMap',
    bbox: { north: 41.8, south: 41.65, east: 44.9, west: 44.7 },
    tileDegrees: 1,
    tileCount: 1,
    tilesFetched: [0],
    tilesFailed: [],
    totalElements: 0,
    startedAt: '2025-01-01T00:00:00.000Z',
    completedAt: '2025-01-01T00:05:00.000Z',
    ...overrides,
  };
}

export function makeSilverMetadata(overrides: Partial<SilverMetadata> = {}): SilverMetadata {
  return {
    city: 'tbilisi',
    sourceHarvest: '20250101_000000',
    processedAt: '2025-01-01T01:00:00.000Z',
    rawCount: 1,
    convertedCount: 1,
    dedupedCount: 1,
    translatedCount: 1,
    validatedCount: 1,
    translationStats: { total: 1, alreadyEnglish: 1, osmEnglish: 0, transliterated: 0, failed: 0 },
    validationStats: { total: 1, valid: 1, rejected: 0, rejectionReasons: {} },
    ...overrides,
  };
}

export function makeDestination(overrides: Partial<DestinationDetails> = {}): DestinationDetails {
  return {
    slug: 'tbilisi',
    name: 'Tbilisi',
    countryCode: 'GE',
    coordinates: { lat: 41.725, lng: 44.8 },
    timezone: 'Asia/Tbilisi',
    summary: 'Capital on the Mtkvari river.',
    whyGo: ['Sulfur baths'],
    tags: ['culture'],
    bestMonths: [5, 6, 9],
    monthlyInsights: {},
    personalityFit: {},
    budget: { level: 'Mid-Range', dailyCost: { backpacker: 40, luxury: 200 } },
    safety: { score: 0.9, notes: 'Generally safe.' },
    connectivity: {},
    source: 'llm',
    generatedAt: '2025-01-01T02:00:00.000Z',
    ...overrides,
  };
}
