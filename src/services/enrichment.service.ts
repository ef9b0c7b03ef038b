import {
  BEST_TIMES,
  BestTime,
  CANONICAL_PERSONAS,
  Persona,
  PersonaScores,
  Poi,
  PoiEnrichment,
} from '../types';
import { JsonObject, OllamaService, isJsonObject } from './ollama.service';
import { errorMessage } from '../utils/errors';
import logger from './logger.service';

export const DEFAULT_PERSONA_SCORE = 50;
export const DEFAULT_DURATION_MIN = 60;
export const MIN_DURATION_MIN = 15;
export const MAX_DURATION_MIN = 600;
const MAX_TIPS = 3;

const PRICE_BY_CATEGORY: Record<string, number> = {
  museum: 1,
  gallery: 1,
  attraction: 2,
  restaurant: 2,
  cafe: 1,
  bar: 2,
  hotel: 3,
  viewpoint: 0,
  park: 0,
  historic: 0,
  monument: 0,
  memorial: 0,
};

export interface PersonaDefinition {
  id: string;
  keywords?: string[];
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Numbers from model output arrive as numbers or numeric strings.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

const toText = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;

export function priceLevelForCategory(category: string): number {
  return PRICE_BY_CATEGORY[category] ?? 2;
}

export function buildPoiPrompt(poi: Poi, cityName: string): string {
  return `Analyze this tourism attraction in ${cityName}:
Name: ${poi.name}
Type: ${poi.category}
Tags: ${JSON.stringify(poi.tags)}
Opening Hours: ${poi.openingHours ?? 'Not specified'}
Address: ${poi.address ?? 'Not specified'}

Provide a JSON response with:
1. "description": A 2-3 sentence engaging description for travelers.
2. "duration_min": Recommended visit duration in minutes (integer).
3. "best_time": Best time of day to visit (Morning/Afternoon/Evening/Anytime).
4. "best_time_reason": One sentence explaining why.
5. "personas": Score 0-100 for ${CANONICAL_PERSONAS.join(', ')}.
6. "price_level": Cost level (0=Free, 1=Budget, 2=Mid-range, 3=Expensive).
7. "tips": Array of 2-3 practical visitor tips.
8. "what_to_expect": One sentence about the visitor experience.
9. "is_popular": Boolean, is this a must-see attraction?

Return ONLY valid JSON.`;
}

function normalizeBestTime(value: unknown): BestTime {
  if (typeof value !== 'string') return 'Anytime';
  const match = BEST_TIMES.find((t) => t.toLowerCase() === value.trim().toLowerCase());
  return match ?? 'Anytime';
}

export function normalizePersonaScores(raw: unknown): PersonaScores {
  const lowered = new Map<string, unknown>();
  if (isJsonObject(raw)) {
    for (const [key, value] of Object.entries(raw)) lowered.set(key.trim().toLowerCase(), value);
  }

  const score = (persona: Persona): number => {
    const value = toNumber(lowered.get(persona));
    return value === undefined ? DEFAULT_PERSONA_SCORE : Math.round(clamp(value, 0, 100));
  };
  return {
    culture: score('culture'),
    adventure: score('adventure'),
    food: score('food'),
    relax: score('relax'),
  };
}

function normalizeTips(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((tip): tip is string => typeof tip === 'string' && tip.trim() !== '')
    .map((tip) => tip.trim())
    .slice(0, MAX_TIPS);
}

function normalizeBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  return false;
}

/**
 * Coerce a model reply into a well-formed enrichment record. Anything the
 * model omitted or got out of range falls back to a default.
 */
export function normalizeEnrichment(raw: JsonObject, poi: Poi, cityName: string): PoiEnrichment {
  const duration = toNumber(raw.duration_min ?? raw.durationMin);
  const price = toNumber(raw.price_level ?? raw.priceLevel);

  return {
    description: toText(raw.description) ?? `A notable ${poi.category.replace(/_/g, ' ')} in ${cityName}.`,
    durationMin:
      duration === undefined
        ? DEFAULT_DURATION_MIN
        : Math.round(clamp(duration, MIN_DURATION_MIN, MAX_DURATION_MIN)),
    bestTime: normalizeBestTime(raw.best_time ?? raw.bestTime),
    bestTimeReason: toText(raw.best_time_reason ?? raw.bestTimeReason) ?? 'Good time to visit',
    personas: normalizePersonaScores(raw.personas),
    priceLevel: price === undefined ? priceLevelForCategory(poi.category) : Math.round(clamp(price, 0, 3)),
    tips: normalizeTips(raw.tips),
    whatToExpect: toText(raw.what_to_expect ?? raw.whatToExpect) ?? `A memorable visit to ${poi.name}`,
    isPopular: normalizeBoolean(raw.is_popular ?? raw.isPopular),
    enrichmentSource: 'llm',
    enrichedAt: new Date().toISOString(),
  };
}

export function fallbackEnrichment(poi: Poi, cityName: string): PoiEnrichment {
  const category = poi.category.replace(/_/g, ' ');
  const personas = normalizePersonaScores({});

  return {
    description: poi.description ?? `A ${category} in ${cityName}.`,
    durationMin: DEFAULT_DURATION_MIN,
    bestTime: 'Anytime',
    bestTimeReason: 'Good time to visit',
    personas,
    priceLevel: priceLevelForCategory(poi.category),
    tips: ['Check opening hours before visiting'],
    whatToExpect: `An interesting ${category} experience`,
    isPopular: false,
    enrichmentSource: 'fallback',
    enrichedAt: new Date().toISOString(),
  };
}

export function buildPersonaPrompt(poi: Poi, personas: PersonaDefinition[]): string {
  const lines = personas.map((p) => `- ${p.id}: ${(p.keywords ?? []).join(', ')}`).join('\n');
  return `You are a travel data analyst. Score this point of interest for each travel persona.

POI Information:
- Name: ${poi.name}
- Type: ${poi.category}
- Description: ${poi.description ?? 'No description'}

Travel Personas:
${lines}

Score each persona from 0-100 based on how well this POI matches their interests.
Return ONLY a JSON object mapping persona id to score.`;
}

/**
 * Score a POI against arbitrary persona definitions. A failed model call
 * scores every persona at the default.
 */
export async function scorePersonas(
  ollama: OllamaService,
  poi: Poi,
  personas: PersonaDefinition[]
): Promise<Record<string, number>> {
  let raw: JsonObject = {};
  try {
    raw = await ollama.generateJson(buildPersonaPrompt(poi, personas));
  } catch (error) {
    logger.warn('Persona scoring failed, using defaults', { poi: poi.name, error: errorMessage(error) });
  }

  const scores: Record<string, number> = {};
  for (const persona of personas) {
    const value = toNumber(raw[persona.id]);
    scores[persona.id] = value === undefined ? DEFAULT_PERSONA_SCORE : Math.round(clamp(value, 0, 100));
  }
  return scores;
}
