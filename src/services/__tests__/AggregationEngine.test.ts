import { describe, it, expect } from 'vitest';
import {
  aggregate,
  createBuckets,
  popularityDistribution,
  rankArtists,
  summarizePopularity,
  topArtists
} from '../AggregationEngine.js';
import { TrackRecord } from '../../models/Track.js';

function track(position: number, artists: string[], popularity: number = 50): TrackRecord {
  return {
    id: `t${position}`,
    name: `Track ${position}`,
    artists,
    album: 'Album',
    popularity,
    durationMs: 1000,
    position
  };
}

describe('createBuckets', () => {
  it('creates 10 buckets of width 10 by default', () => {
    const buckets = createBuckets();

    expect(buckets).toHaveLength(10);
    expect(buckets[0]).toEqual({ min: 0, max: 10, inclusiveMax: false, count: 0 });
    expect(buckets[9]).toEqual({ min: 90, max: 100, inclusiveMax: true, count: 0 });
  });

  it('partitions 0..100 without gaps or overlaps for every width', () => {
    for (let width = 1; width <= 100; width++) {
      const buckets = createBuckets(width);

      expect(buckets).toHaveLength(Math.ceil(100 / width));
      expect(buckets[0].min).toBe(0);
      expect(buckets[buckets.length - 1].max).toBe(100);
      buckets.forEach((bucket, i) => {
        expect(bucket.inclusiveMax).toBe(i === buckets.length - 1);
        expect(bucket.max).toBeGreaterThan(bucket.min);
        if (i > 0) {
          expect(bucket.min).toBe(buckets[i - 1].max);
        }
      });
    }
  });

  it('shortens the last bucket when the width does not divide 100', () => {
    expect(createBuckets(30).map(b => [b.min, b.max])).toEqual([[0, 30], [30, 60], [60, 90], [90, 100]]);
  });

  it('rejects invalid widths', () => {
    expect(() => createBuckets(0)).toThrow(RangeError);
    expect(() => createBuckets(101)).toThrow(RangeError);
    expect(() => createBuckets(2.5)).toThrow(RangeError);
  });
});

describe('popularityDistribution', () => {
  it('places boundary values in the right bucket', () => {
    const tracks = [track(0, ['A'], 0), track(1, ['A'], 9), track(2, ['A'], 10), track(3, ['A'], 99), track(4, ['A'], 100)];

    const counts = popularityDistribution(tracks).map(b => b.count);

    expect(counts).toEqual([2, 1, 0, 0, 0, 0, 0, 0, 0, 2]);
  });

  it('counts every track exactly once', () => {
    const tracks = Array.from({ length: 101 }, (_, i) => track(i, ['A'], i));

    for (const width of [1, 7, 10, 25, 33, 100]) {
      const total = popularityDistribution(tracks, width).reduce((acc, b) => acc + b.count, 0);
      expect(total).toBe(101);
    }
  });

  it('uses the last bucket for 95 with width 30', () => {
    expect(popularityDistribution([track(0, ['A'], 95)], 30).map(b => b.count)).toEqual([0, 0, 0, 1]);
  });
});

describe('rankArtists', () => {
  it('ranks X:3 and Y:1 for solo and co-credited tracks', () => {
    const tracks = [track(0, ['X']), track(1, ['X']), track(2, ['X', 'Y'])];

    expect(rankArtists(tracks)).toEqual([
      { name: 'X', count: 3 },
      { name: 'Y', count: 1 }
    ]);
  });

  it('counts a repeated artist once within the same track', () => {
    expect(rankArtists([track(0, ['A', 'A'])])).toEqual([{ name: 'A', count: 1 }]);
  });

  it('breaks ties by ascending name regardless of encounter order', () => {
    const tracks = [track(0, ['Charlie']), track(1, ['alpha']), track(2, ['Bravo']), track(3, ['Bravo'])];
    const invertidas = [...tracks].reverse();

    const esperado = [
      { name: 'Bravo', count: 2 },
      { name: 'Charlie', count: 1 },
      { name: 'alpha', count: 1 }
    ];
    expect(rankArtists(tracks)).toEqual(esperado);
    expect(rankArtists(invertidas)).toEqual(esperado);
  });

  it('leaves unnamed artists out of the ranking', () => {
    expect(rankArtists([track(0, ['']), track(1, ['A', ''])])).toEqual([{ name: 'A', count: 1 }]);
  });

  it('returns an empty ranking for no tracks', () => {
    expect(rankArtists([])).toEqual([]);
  });
});

describe('topArtists', () => {
  const ranking = [
    { name: 'A', count: 3 },
    { name: 'B', count: 2 },
    { name: 'C', count: 1 }
  ];

  it('truncates the full ranking', () => {
    expect(topArtists(ranking, 2)).toEqual([{ name: 'A', count: 3 }, { name: 'B', count: 2 }]);
  });

  it('returns everything without a limit', () => {
    expect(topArtists(ranking)).toEqual(ranking);
    expect(topArtists(ranking, 10)).toEqual(ranking);
  });
});

describe('summarizePopularity', () => {
  it('computes mean, median, min and max', () => {
    const tracks = [track(0, ['A'], 40), track(1, ['A'], 10), track(2, ['A'], 30), track(3, ['A'], 20)];
    expect(summarizePopularity(tracks)).toEqual({ mean: 25, median: 25, min: 10, max: 40 });
  });

  it('uses the middle value for odd counts', () => {
    const tracks = [track(0, ['A'], 5), track(1, ['A'], 1), track(2, ['A'], 9)];
    expect(summarizePopularity(tracks)).toEqual({ mean: 5, median: 5, min: 1, max: 9 });
  });

  it('returns null without tracks', () => {
    expect(summarizePopularity([])).toBeNull();
  });
});

describe('aggregate', () => {
  it('yields all-zero buckets and an empty ranking for an empty playlist', () => {
    const resultado = aggregate([]);

    expect(resultado.buckets).toHaveLength(10);
    expect(resultado.buckets.every(b => b.count === 0)).toBe(true);
    expect(resultado.artists).toEqual([]);
    expect(resultado.popularity).toBeNull();
  });

  it('honours the bucket width option', () => {
    expect(aggregate([track(0, ['A'], 50)], { bucketWidth: 50 }).buckets).toEqual([
      { min: 0, max: 50, inclusiveMax: false, count: 0 },
      { min: 50, max: 100, inclusiveMax: true, count: 1 }
    ]);
  });
});
