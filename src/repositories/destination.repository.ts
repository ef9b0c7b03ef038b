import { Pool, PoolClient } from 'pg';
import { DestinationDetails } from '../types';
import { DatabaseError, errorMessage } from '../utils/errors';
import logger from '../services/logger.service';

/**
 * One row of the activities table, mapped from a gold POI.
 */
export interface ActivityRow {
  sourceId: string;
  name: string;
  category: string;
  description: string;
  latitude: number;
  longitude: number;
  address: string | null;
  openingHours: string | null;
  website: string | null;
  phone: string | null;
  wikipedia: string | null;
  durationMin: number;
  bestTime: string;
  bestTimeReason: string;
  priceLevel: number;
  personas: Record<string, number>;
  tips: string[];
  whatToExpect: string;
  isPopular: boolean;
  priorityScore: number | null;
  enrichmentSource: string;
}

export interface DestinationRepository {
  /** Insert or update by slug; returns the destination id. */
  upsertDestination(destination: DestinationDetails): Promise<string>;
  upsertDestinationDetails(destinationId: string, destination: DestinationDetails): Promise<void>;
  /** Insert or update by (destination_id, source_id); returns rows written. */
  upsertActivities(destinationId: string, rows: ActivityRow[]): Promise<number>;
  /** Remove a destination and, by cascade, its details and activities. */
  deleteDestination(slug: string): Promise<boolean>;
}

const ACTIVITY_COLUMNS = [
  'destination_id', 'source_id', 'name', 'category', 'description',
  'latitude', 'longitude', 'address', 'opening_hours', 'website', 'phone',
  'wikipedia', 'duration_min', 'best_time', 'best_time_reason', 'price_level',
  'personas', 'tips', 'what_to_expect', 'is_popular', 'priority_score',
  'enrichment_source',
];

function activityValues(destinationId: string, row: ActivityRow): unknown[] {
  return [
    destinationId,
    row.sourceId,
    row.name,
    row.category,
    row.description,
    row.latitude,
    row.longitude,
    row.address,
    row.openingHours,
    row.website,
    row.phone,
    row.wikipedia,
    row.durationMin,
    row.bestTime,
    row.bestTimeReason,
    row.priceLevel,
    JSON.stringify(row.personas),
    JSON.stringify(row.tips),
    row.whatToExpect,
    row.isPopular,
    row.priorityScore,
    row.enrichmentSource,
  ];
}

export class PgDestinationRepository implements DestinationRepository {
  constructor(private db: Pool) {}

  private async withTransaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.db.connect();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async upsertDestination(destination: DestinationDetails): Promise<string> {
    try {
      const result = await this.db.query<{ id: string }>(
        `INSERT INTO destinations (slug, name, country_code, latitude, longitude, timezone, summary)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (slug) DO UPDATE SET
           name = EXCLUDED.name,
           country_code = EXCLUDED.country_code,
           latitude = EXCLUDED.latitude,
           longitude = EXCLUDED.longitude,
           timezone = EXCLUDED.timezone,
           summary = EXCLUDED.summary,
           updated_at = NOW()
         RETURNING id`,
        [
          destination.slug,
          destination.name,
          destination.countryCode,
          destination.coordinates.lat,
          destination.coordinates.lng,
          destination.timezone,
          destination.summary,
        ]
      );
      return result.rows[0].id;
    } catch (error) {
      logger.error(`Failed to upsert destination ${destination.slug}`, { error: errorMessage(error) });
      throw new DatabaseError(`Failed to upsert destination ${destination.slug}: ${errorMessage(error)}`);
    }
  }

  async upsertDestinationDetails(destinationId: string, destination: DestinationDetails): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO destination_details (
           destination_id, why_go, tags, best_months, monthly_insights, personality_fit,
           budget, safety_score, safety_notes, connectivity, wikidata, source, generated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         ON CONFLICT (destination_id) DO UPDATE SET
           why_go = EXCLUDED.why_go,
           tags = EXCLUDED.tags,
           best_months = EXCLUDED.best_months,
           monthly_insights = EXCLUDED.monthly_insights,
           personality_fit = EXCLUDED.personality_fit,
           budget = EXCLUDED.budget,
           safety_score = EXCLUDED.safety_score,
           safety_notes = EXCLUDED.safety_notes,
           connectivity = EXCLUDED.connectivity,
           wikidata = EXCLUDED.wikidata,
           source = EXCLUDED.source,
           generated_at = EXCLUDED.generated_at,
           updated_at = NOW()`,
        [
          destinationId,
          JSON.stringify(destination.whyGo),
          JSON.stringify(destination.tags),
          destination.bestMonths,
          JSON.stringify(destination.monthlyInsights),
          JSON.stringify(destination.personalityFit),
          JSON.stringify(destination.budget),
          destination.safety.score,
          destination.safety.notes,
          JSON.stringify(destination.connectivity),
          destination.wikidata ? JSON.stringify(destination.wikidata) : null,
          destination.source,
          destination.generatedAt,
        ]
      );
    } catch (error) {
      throw new DatabaseError(`Failed to upsert details for ${destination.slug}: ${errorMessage(error)}`);
    }
  }

  async upsertActivities(destinationId: string, rows: ActivityRow[]): Promise<number> {
    if (rows.length === 0) return 0;

    const width = ACTIVITY_COLUMNS.length;
    const params: unknown[] = [];
    const tuples = rows.map((row, i) => {
      params.push(...activityValues(destinationId, row));
      const placeholders = Array.from({ length: width }, (_, j) => `$${i * width + j + 1}`);
      return `(${placeholders.join(', ')})`;
    });

    const updates = ACTIVITY_COLUMNS.filter((c) => c !== 'destination_id' && c !== 'source_id')
      .map((c) => `${c} = EXCLUDED.${c}`)
      .join(',\n           ');

    try {
      return await this.withTransaction(async (client) => {
        const result = await client.query(
          `INSERT INTO activities (${ACTIVITY_COLUMNS.join(', ')})
           VALUES ${tuples.join(',\n           ')}
           ON CONFLICT (destination_id, source_id) DO UPDATE SET
           ${updates},
           updated_at = NOW()`,
          params
        );
        return result.rowCount ?? rows.length;
      });
    } catch (error) {
      throw new DatabaseError(`Failed to upsert ${rows.length} activities: ${errorMessage(error)}`);
    }
  }

  async deleteDestination(slug: string): Promise<boolean> {
    try {
      const result = await this.db.query('DELETE FROM destinations WHERE slug = $1', [slug]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw new DatabaseError(`Failed to delete destination ${slug}: ${errorMessage(error)}`);
    }
  }
}
