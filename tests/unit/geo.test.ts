import { bboxCenter, haversineKm, isValidBbox, isValidCoordinate, splitBoundingBox } from '../../src/utils/geo';

describe('geo utils', () => {
  describe('isValidBbox', () => {
    it('accepts a well-formed box', () => {
      expect(isValidBbox({ north: 41.8, south: 41.65, east: 44.9, west: 44.7 })).toBe(true);
    });

    it('rejects inverted or out-of-range boxes', () => {
      expect(isValidBbox({ north: 41.6, south: 41.65, east: 44.9, west: 44.7 })).toBe(false);
      expect(isValidBbox({ north: 41.8, south: 41.65, east: 44.7, west: 44.9 })).toBe(false);
      expect(isValidBbox({ north: 95, south: 41.65, east: 44.9, west: 44.7 })).toBe(false);
    });
  });

  describe('splitBoundingBox', () => {
    it('splits into a row-major grid', () => {
      const tiles = splitBoundingBox({ north: 2, south: 0, east: 3, west: 0 }, 1);

      expect(tiles).toHaveLength(6);
      expect(tiles.map((t) => t.index)).toEqual([0, 1, 2, 3, 4, 5]);
      expect(tiles[0].bbox).toEqual({ south: 0, north: 1, west: 0, east: 1 });
      expect(tiles[2].bbox).toEqual({ south: 0, north: 1, west: 2, east: 3 });
      expect(tiles[5].bbox).toEqual({ south: 1, north: 2, west: 2, east: 3 });
    });

    it('returns the box itself when it is smaller than one tile', () => {
      const bbox = { north: 41.85, south: 41.8, east: 44.75, west: 44.7 };
      expect(splitBoundingBox(bbox, 0.1)).toEqual([{ index: 0, bbox }]);
    });

    it('does not add a sliver tile when the span is an exact multiple', () => {
      expect(splitBoundingBox({ north: 1, south: 0, east: 1, west: 0 }, 0.5)).toHaveLength(4);
    });

    it('pins the outer edges to the original box', () => {
      const bbox = { north: 41.85, south: 41.8, east: 44.75, west: 44.7 };
      const tiles = splitBoundingBox(bbox, 0.03);

      expect(tiles).toHaveLength(4);
      expect(tiles[0].bbox.south).toBe(41.8);
      expect(tiles[0].bbox.west).toBe(44.7);
      expect(tiles[3].bbox.north).toBe(41.85);
      expect(tiles[3].bbox.east).toBe(44.75);
    });
  });

  it('bboxCenter is the midpoint', () => {
    expect(bboxCenter({ north: 2, south: 0, east: 10, west: 4 })).toEqual({ lat: 1, lon: 7 });
  });

  describe('haversineKm', () => {
    it('is zero for the same point', () => {
      expect(haversineKm({ lat: 41.7, lon: 44.8 }, { lat: 41.7, lon: 44.8 })).toBe(0);
    });

    it('measures one degree of longitude on the equator', () => {
      expect(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(111.19, 1);
    });
  });

  describe('isValidCoordinate', () => {
    it('accepts a real position', () => {
      expect(isValidCoordinate({ lat: 41.7, lon: 44.8 })).toBe(true);
    });

    it('rejects null island, out-of-range and non-finite values', () => {
      expect(isValidCoordinate({ lat: 0, lon: 0 })).toBe(false);
      expect(isValidCoordinate({ lat: 91, lon: 10 })).toBe(false);
      expect(isValidCoordinate({ lat: 10, lon: -181 })).toBe(false);
      expect(isValidCoordinate({ lat: NaN, lon: 10 })).toBe(false);
    });
  });
});
