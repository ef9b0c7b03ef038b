import { Poi, PriorityTier } from '../types';

const CATEGORY_SCORES: Array<[string[], number]> = [
  [['museum', 'attraction', 'viewpoint'], 50],
  [['historic', 'castle', 'ruins', 'monument', 'memorial', 'fort'], 40],
  [['gallery', 'zoo', 'theme_park', 'aquarium', 'place_of_worship'], 30],
  [['park', 'garden', 'nature_reserve', 'beach', 'waterfall', 'peak', 'marketplace'], 20],
  [['restaurant', 'cafe', 'bar', 'pub'], 10],
];

export const MANUAL_PRIORITY = 100;

export function priorityScore(poi: Poi): number {
  if (poi.isManual) return MANUAL_PRIORITY;

  let score = 0;
  for (const [categories, points] of CATEGORY_SCORES) {
    if (categories.includes(poi.category)) {
      score += points;
      break;
    }
  }

  const tags = poi.tags ?? {};
  if (tags.wikipedia || tags.wikidata) score += 20;
  if (tags.website || poi.contact?.website) score += 10;
  if (tags.opening_hours) score += 5;

  return Math.min(score, 100);
}

export function priorityTier(score: number): PriorityTier {
  if (score >= 60) return 'high';
  if (score >= 30) return 'medium';
  return 'low';
}

/**
 * Score every POI and order by score, highest first. Ties keep input order.
 */
export function prioritize(pois: Poi[]): Poi[] {
  return pois
    .map((poi, index) => {
      const score = priorityScore(poi);
      return { poi: { ...poi, priorityScore: score, priorityTier: priorityTier(score) }, index };
    })
    .sort((a, b) => (b.poi.priorityScore ?? 0) - (a.poi.priorityScore ?? 0) || a.index - b.index)
    .map(({ poi }) => poi);
}
