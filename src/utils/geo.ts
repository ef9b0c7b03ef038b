import { BoundingBox, LatLon, Tile } from '../types';

const EARTH_RADIUS_KM = 6371;

export function isValidBbox(bbox: BoundingBox): boolean {
  return (
    bbox.south >= -90 && bbox.north <= 90 &&
    bbox.west >= -180 && bbox.east <= 180 &&
    bbox.north > bbox.south && bbox.east > bbox.west
  );
}

export function bboxCenter(bbox: BoundingBox): LatLon {
  return {
    lat: (bbox.north + bbox.south) / 2,
    lon: (bbox.east + bbox.west) / 2,
  };
}

/**
 * Split a bounding box into a row-major grid of tiles no larger than
 * `maxTileDegrees` on either side. Edges of the last row/column are pinned to
 * the original box so floating point drift never leaves a gap.
 */
export function splitBoundingBox(bbox: BoundingBox, maxTileDegrees: number): Tile[] {
  const latSpan = bbox.north - bbox.south;
  const lonSpan = bbox.east - bbox.west;
  const rows = Math.max(1, Math.ceil(latSpan / maxTileDegrees - 1e-9));
  const cols = Math.max(1, Math.ceil(lonSpan / maxTileDegrees - 1e-9));
  const latStep = latSpan / rows;
  const lonStep = lonSpan / cols;

  const tiles: Tile[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      tiles.push({
        index: r * cols + c,
        bbox: {
          south: bbox.south + r * latStep,
          north: r === rows - 1 ? bbox.north : bbox.south + (r + 1) * latStep,
          west: bbox.west + c * lonStep,
          east: c === cols - 1 ? bbox.east : bbox.west + (c + 1) * lonStep,
        },
      });
    }
  }
  return tiles;
}

export function haversineKm(a: LatLon, b: LatLon): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

export function isValidCoordinate(point: LatLon): boolean {
  const { lat, lon } = point;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return false;
  if (lat < -90 || lat > 90 || lon < -180 || lon > 180) return false;
  return !(lat === 0 && lon === 0);
}
