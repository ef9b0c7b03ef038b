import transliteration from '../config/transliteration.json';
import { Poi, TranslationStats } from '../types';
import logger from './logger.service';

const LATIN_NAME = /^[A-Za-z0-9\s\-'.,&()]+$/;
const GEORGIAN = /[\u10A0-\u10FF]/;
const CYRILLIC = /[\u0400-\u04FF]/;

const ENGLISH_NAME_TAGS = ['name:en', 'int_name', 'name_en', 'official_name:en'];

const georgianMap: Record<string, string> = transliteration.georgian;
const cyrillicMap: Record<string, string> = transliteration.cyrillic;

export type TranslationMethod = 'already_english' | 'osm_english' | 'transliterated' | 'failed';

export interface TranslationResult {
  name: string | null;
  method: TranslationMethod;
}

export function isLatinName(name: string): boolean {
  return LATIN_NAME.test(name);
}

export function englishNameFromTags(tags: Record<string, string>): string | null {
  for (const tag of ENGLISH_NAME_TAGS) {
    const value = tags[tag]?.trim();
    if (value) return value;
  }
  return null;
}

const mapChars = (text: string, table: Record<string, string>) =>
  Array.from(text).map((ch) => table[ch] ?? ch).join('');

export function transliterate(text: string): string | null {
  if (GEORGIAN.test(text)) {
    // Georgian has no case; capitalise the first letter of the result
    const out = mapChars(text, georgianMap);
    return out.charAt(0).toUpperCase() + out.slice(1);
  }
  if (CYRILLIC.test(text)) {
    return mapChars(text, cyrillicMap);
  }
  return null;
}

/**
 * English form of a POI name: the OSM English tag, else the Latin name as-is,
 * else a Georgian/Cyrillic transliteration. `null` when none applies.
 */
export function translateName(poi: Pick<Poi, 'name' | 'tags'>): TranslationResult {
  const original = poi.name.trim();
  if (!original) return { name: null, method: 'failed' };

  const fromTag = englishNameFromTags(poi.tags);
  if (fromTag && fromTag !== original) {
    return { name: fromTag, method: 'osm_english' };
  }
  if (isLatinName(original)) {
    return { name: original, method: 'already_english' };
  }

  const transliterated = transliterate(original);
  if (transliterated && transliterated !== original) {
    return { name: transliterated, method: 'transliterated' };
  }
  return { name: null, method: 'failed' };
}

export function translatePoiNames(pois: Poi[]): { pois: Poi[]; stats: TranslationStats } {
  const stats: TranslationStats = {
    total: pois.length,
    alreadyEnglish: 0,
    osmEnglish: 0,
    transliterated: 0,
    failed: 0,
  };
  const translated: Poi[] = [];

  for (const poi of pois) {
    const result = translateName(poi);
    switch (result.method) {
      case 'already_english':
        stats.alreadyEnglish++;
        translated.push(poi);
        break;
      case 'osm_english':
        stats.osmEnglish++;
        translated.push({ ...poi, name: result.name ?? poi.name, originalName: poi.name });
        break;
      case 'transliterated':
        stats.transliterated++;
        translated.push({ ...poi, name: result.name ?? poi.name, originalName: poi.name });
        break;
      case 'failed':
        stats.failed++;
        logger.debug('Dropping POI with untranslatable name', { name: poi.name, osmId: poi.osmId });
        break;
    }
  }

  return { pois: translated, stats };
}
