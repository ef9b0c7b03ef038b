import { DestinationBudget, MonthlyInsight } from '../types';
import { JsonObject, isJsonObject } from './ollama.service';
import { clamp, toNumber } from './enrichment.service';

export interface DestinationContent {
  summary: string;
  whyGo: string[];
  tags: string[];
  bestMonths: number[];
  monthlyInsights: Record<string, MonthlyInsight>;
  personalityFit: Record<string, number>;
  budget: DestinationBudget;
  safety: { score: number; notes: string };
  connectivity: Record<string, string>;
}

export function buildDestinationPrompt(city: string, country: string): string {
  return `You are a travel expert. Generate a JSON object for ${city}, ${country} with this structure:
{
  "summary": "Short catchy description",
  "why_go": ["Reason 1", "Reason 2", "Reason 3"],
  "tags": ["tag1", "tag2"],
  "best_months": [5, 6, 9, 10],
  "monthly_insights": {
    "1": { "verdict": "Cold", "temp": { "avg": 5 }, "crowdLevel": "Low" }
  },
  "personality_fit": { "HistoryBuff": 0.9, "Foodie": 0.8 },
  "budget": { "level": "Mid-Range", "daily_cost": { "backpacker": 50, "mid_range": 120, "luxury": 300 } },
  "safety": { "score": 0.85, "notes": "Safety notes" },
  "connectivity": { "wifi": "Good", "mobile": "Good" }
}
Return ONLY valid JSON. No markdown.`;
}

const stringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim())
    : [];

export function normalizeBestMonths(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  const months = new Set<number>();
  for (const entry of value) {
    const month = toNumber(entry);
    if (month !== undefined && Number.isInteger(month) && month >= 1 && month <= 12) months.add(month);
  }
  return [...months].sort((a, b) => a - b);
}

function normalizeMonthlyInsights(value: unknown): Record<string, MonthlyInsight> {
  const insights: Record<string, MonthlyInsight> = {};
  if (!isJsonObject(value)) return insights;

  for (const [key, raw] of Object.entries(value)) {
    const month = toNumber(key);
    if (month === undefined || !Number.isInteger(month) || month < 1 || month > 12) continue;
    if (!isJsonObject(raw) || typeof raw.verdict !== 'string') continue;

    const insight: MonthlyInsight = { verdict: raw.verdict };
    const avg = isJsonObject(raw.temp) ? toNumber(raw.temp.avg) : undefined;
    if (avg !== undefined) insight.temp = { avg };
    const crowd = raw.crowdLevel ?? raw.crowd_level;
    if (typeof crowd === 'string') insight.crowdLevel = crowd;
    insights[String(month)] = insight;
  }
  return insights;
}

function normalizeNumberMap(value: unknown, min: number, max: number): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, raw] of Object.entries(value)) {
    const n = toNumber(raw);
    if (n !== undefined) out[key] = clamp(n, min, max);
  }
  return out;
}

function normalizeStringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') out[key] = raw;
  }
  return out;
}

function normalizeBudget(value: unknown, fallback: DestinationBudget): DestinationBudget {
  if (!isJsonObject(value)) return fallback;
  const rawCosts = value.daily_cost ?? value.dailyCost;
  const costs: JsonObject = isJsonObject(rawCosts) ? rawCosts : {};
  const backpacker = toNumber(costs.backpacker);
  const luxury = toNumber(costs.luxury);
  const midRange = toNumber(costs.mid_range ?? costs.midRange);

  return {
    level: typeof value.level === 'string' ? value.level : fallback.level,
    dailyCost: {
      backpacker: backpacker ?? fallback.dailyCost.backpacker,
      ...(midRange !== undefined ? { midRange } : {}),
      luxury: luxury ?? fallback.dailyCost.luxury,
    },
  };
}

export function fallbackDestinationContent(city: string, country: string): DestinationContent {
  return {
    summary: `${city} is a destination in ${country} known for its history and culture.`,
    whyGo: ['Historic architecture', 'Local cuisine', 'Scenic views'],
    tags: ['heritage', 'culture', 'food'],
    bestMonths: [4, 5, 9, 10],
    monthlyInsights: {},
    personalityFit: {},
    budget: { level: 'Mid-Range', dailyCost: { backpacker: 40, luxury: 200 } },
    safety: { score: 0.8, notes: 'Generally safe.' },
    connectivity: {},
  };
}

/**
 * Coerce model output for a destination. Fields the model omitted keep the
 * fallback values for the city.
 */
export function normalizeDestinationContent(raw: JsonObject, city: string, country: string): DestinationContent {
  const fallback = fallbackDestinationContent(city, country);
  const safety: JsonObject = isJsonObject(raw.safety) ? raw.safety : {};
  const safetyScore = toNumber(safety.score);
  const whyGo = stringList(raw.why_go ?? raw.whyGo);
  const tags = stringList(raw.tags);
  const bestMonths = normalizeBestMonths(raw.best_months ?? raw.bestMonths);

  return {
    summary: typeof raw.summary === 'string' && raw.summary.trim() ? raw.summary.trim() : fallback.summary,
    whyGo: whyGo.length > 0 ? whyGo : fallback.whyGo,
    tags: tags.length > 0 ? tags : fallback.tags,
    bestMonths: bestMonths.length > 0 ? bestMonths : fallback.bestMonths,
    monthlyInsights: normalizeMonthlyInsights(raw.monthly_insights ?? raw.monthlyInsights),
    personalityFit: normalizeNumberMap(raw.personality_fit ?? raw.personalityFit, 0, 1),
    budget: normalizeBudget(raw.budget, fallback.budget),
    safety: {
      score: safetyScore === undefined ? fallback.safety.score : clamp(safetyScore, 0, 1),
      notes: typeof safety.notes === 'string' ? safety.notes : fallback.safety.notes,
    },
    connectivity: normalizeStringMap(raw.connectivity),
  };
}
