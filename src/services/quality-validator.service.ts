import { Poi, ValidationStats } from '../types';
import { isValidCoordinate } from '../utils/geo';
import { isLatinName } from './name-translator.service';
import logger from './logger.service';

const MIN_NAME_LENGTH = 2;
const MAX_NAME_LENGTH = 100;

const NON_LATIN_SCRIPTS: Array<[string, RegExp]> = [
  ['georgian', /[\u10A0-\u10FF]/],
  ['cyrillic', /[\u0400-\u04FF]/],
  ['arabic', /[\u0600-\u06FF]/],
  ['chinese', /[\u4E00-\u9FFF]/],
  ['japanese', /[\u3040-\u30FF]/],
  ['korean', /[\uAC00-\uD7AF]/],
  ['thai', /[\u0E00-\u0E7F]/],
  ['devanagari', /[\u0900-\u097F]/],
];

const SUSPICIOUS_PATTERNS = [/^\d+$/, /test/i, /unknown/i, /unnamed/i, /^[a-z]{1,2}$/i];

const GENERIC_WORDS = new Set([
  'restaurant', 'cafe', 'hotel', 'museum', 'park', 'church',
  'cathedral', 'mosque', 'temple', 'square', 'street', 'avenue',
  'market', 'shop', 'store', 'center', 'theatre', 'cinema',
  'bar', 'pub', 'club', 'gallery', 'library', 'station',
]);

const DUPLICATE_MARKERS = [/\(duplicate\)/i, /\(copy\)/i, /\(2\)/, /\(old\)/i];

export interface ValidationOutcome {
  valid: boolean;
  reason?: string;
}

export function detectScript(text: string): string {
  for (const [script, pattern] of NON_LATIN_SCRIPTS) {
    if (pattern.test(text)) return script;
  }
  return 'unknown';
}

function isSuspicious(name: string): boolean {
  // All-caps names are usually codes or abbreviations ("ATM", "WC 2")
  if (/[A-Z]/.test(name) && !/[a-z]/.test(name)) return true;
  return SUSPICIOUS_PATTERNS.some((p) => p.test(name));
}

/**
 * First failing rule wins; the reason string is used as the histogram key.
 */
export function validatePoi(poi: Poi): ValidationOutcome {
  const name = (poi.name ?? '').trim();

  if (!name) return { valid: false, reason: 'Missing name' };
  if (name.length < MIN_NAME_LENGTH) return { valid: false, reason: 'Name too short' };
  if (name.length > MAX_NAME_LENGTH) return { valid: false, reason: 'Name too long' };
  if (!isLatinName(name)) {
    return { valid: false, reason: `Non-English name (${detectScript(name)})` };
  }
  if (!poi.coordinates || !isValidCoordinate(poi.coordinates)) {
    return { valid: false, reason: 'Invalid or missing coordinates' };
  }
  if (!poi.category || !poi.category.trim()) {
    return { valid: false, reason: 'Missing category' };
  }
  if (isSuspicious(name)) return { valid: false, reason: 'Suspicious name pattern' };

  const words = name.toLowerCase().split(/\s+/);
  if (words.length === 1 && GENERIC_WORDS.has(words[0])) {
    return { valid: false, reason: 'Generic name' };
  }
  if (!isLatinName(poi.category.replace(/_/g, ' '))) {
    return { valid: false, reason: 'Invalid category' };
  }
  if (DUPLICATE_MARKERS.some((p) => p.test(name))) {
    return { valid: false, reason: 'Likely duplicate entry' };
  }

  return { valid: true };
}

export function validatePois(pois: Poi[]): { pois: Poi[]; stats: ValidationStats } {
  const stats: ValidationStats = { total: pois.length, valid: 0, rejected: 0, rejectionReasons: {} };
  const valid: Poi[] = [];

  for (const poi of pois) {
    const outcome = validatePoi(poi);
    if (outcome.valid) {
      valid.push(poi);
      stats.valid++;
      continue;
    }
    stats.rejected++;
    const reason = outcome.reason ?? 'Unknown';
    stats.rejectionReasons[reason] = (stats.rejectionReasons[reason] ?? 0) + 1;
    logger.debug('Rejected POI', { name: poi.name, osmId: poi.osmId, reason });
  }

  return { pois: valid, stats };
}

export function topRejectionReasons(stats: ValidationStats, limit: number = 3): Array<[string, number]> {
  return Object.entries(stats.rejectionReasons)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}
