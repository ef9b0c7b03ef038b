export interface BoundingBox {
  north: number;
  south: number;
  east: number;
  west: number;
}

export interface LatLon {
  lat: number;
  lon: number;
}

export interface CityConfig {
  key: string;
  name: string;
  country: string;
  countryCode: string;
  timezone: string;
  bbox: BoundingBox | null;
}

// =============================================================================
// BRONZE
// =============================================================================

export type OsmElementType = 'node' | 'way' | 'relation';

export interface OverpassElement {
  type: OsmElementType;
  id: number;
  lat?: number;
  lon?: number;
  center?: LatLon;
  tags?: Record<string, string>;
}

export interface OverpassResponse {
  version?: number;
  generator?: string;
  elements: OverpassElement[];
  remark?: string;
}

export interface Tile {
  index: number;
  bbox: BoundingBox;
}

export interface TileFile {
  tile: Tile;
  fetchedAt: string;
  elements: OverpassElement[];
}

export interface HarvestMetadata {
  city: string;
  harvestId: string;
  source: 'OpenStreetMap';
  bbox: BoundingBox;
  tileDegrees: number;
  tileCount: number;
  tilesFetched: number[];
  tilesFailed: number[];
  totalElements: number;
  startedAt: string;
  completedAt?: string;
}

// =============================================================================
// SILVER
// =============================================================================

export interface PoiContact {
  phone?: string;
  website?: string;
  email?: string;
}

export type PriorityTier = 'high' | 'medium' | 'low';

export interface Poi {
  osmId: string;
  name: string;
  originalName?: string;
  category: string;
  coordinates: LatLon;
  tags: Record<string, string>;
  address?: string;
  openingHours?: string;
  contact: PoiContact;
  wikidata?: string;
  wikipedia?: string;
  description?: string;
  isManual?: boolean;
  priorityScore?: number;
  priorityTier?: PriorityTier;
}

export interface TranslationStats {
  total: number;
  alreadyEnglish: number;
  osmEnglish: number;
  transliterated: number;
  failed: number;
}

export interface ValidationStats {
  total: number;
  valid: number;
  rejected: number;
  rejectionReasons: Record<string, number>;
}

export interface SilverMetadata {
  city: string;
  sourceHarvest: string;
  processedAt: string;
  rawCount: number;
  convertedCount: number;
  dedupedCount: number;
  translatedCount: number;
  validatedCount: number;
  translationStats: TranslationStats;
  validationStats: ValidationStats;
}

// =============================================================================
// GOLD
// =============================================================================

export const CANONICAL_PERSONAS = ['culture', 'adventure', 'food', 'relax'] as const;
export type Persona = (typeof CANONICAL_PERSONAS)[number];
export type PersonaScores = Record<Persona, number>;

export const BEST_TIMES = ['Morning', 'Afternoon', 'Evening', 'Anytime'] as const;
export type BestTime = (typeof BEST_TIMES)[number];

export interface PoiEnrichment {
  description: string;
  durationMin: number;
  bestTime: BestTime;
  bestTimeReason: string;
  personas: PersonaScores;
  priceLevel: number;
  tips: string[];
  whatToExpect: string;
  isPopular: boolean;
  enrichmentSource: 'llm' | 'fallback';
  enrichedAt: string;
}

export type EnrichedPoi = Poi & PoiEnrichment;

export interface MonthlyInsight {
  verdict: string;
  temp?: { avg: number };
  crowdLevel?: string;
}

export interface DestinationBudget {
  level: string;
  dailyCost: {
    backpacker: number;
    midRange?: number;
    luxury: number;
  };
}

export interface DestinationDetails {
  slug: string;
  name: string;
  countryCode: string;
  coordinates: { lat: number; lng: number };
  timezone: string;
  summary: string;
  whyGo: string[];
  tags: string[];
  bestMonths: number[];
  monthlyInsights: Record<string, MonthlyInsight>;
  personalityFit: Record<string, number>;
  budget: DestinationBudget;
  safety: { score: number; notes: string };
  connectivity: Record<string, string>;
  wikidata?: WikidataCityDetails;
  source: 'llm' | 'fallback';
  generatedAt: string;
}

export interface WikidataCityDetails {
  wikidataId: string;
  name: string;
  country?: string;
  population?: number;
  image?: string;
  currency?: string;
  description?: string;
  coordinates?: { lat: number; lng: number };
}

// =============================================================================
// PIPELINE
// =============================================================================

export type StageName = 'harvest' | 'process' | 'enrich' | 'enrich-destination' | 'load';

export const STAGE_ORDER: StageName[] = ['harvest', 'process', 'enrich', 'enrich-destination', 'load'];

export type StageRunStatus = 'completed' | 'failed';

export type StageStats = Record<string, number | string | boolean>;

export interface StageRunResult {
  runId: string;
  stage: StageName;
  city: string;
  status: StageRunStatus;
  stats: StageStats;
  startedAt: string;
  completedAt: string;
  error?: string;
}
