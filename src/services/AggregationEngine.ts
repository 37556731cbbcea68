import { ArtistAggregate, PopularityBucket, PopularitySummary } from '../models/Analysis.js';
import { TrackRecord } from '../models/Track.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

const POPULARIDAD_MAXIMA = 100;

export interface AggregationOptions {
  bucketWidth?: number;
}

export interface Aggregation {
  buckets: PopularityBucket[];
  artists: ArtistAggregate[];
  popularity: PopularitySummary | null;
}

/**
 * Particiones [0, ancho), [ancho, 2·ancho), ... con el último bucket cerrado en 100
 */
export function createBuckets(bucketWidth: number = DEFAULT_CONFIG.BUCKET_WIDTH): PopularityBucket[] {
  if (!Number.isInteger(bucketWidth) || bucketWidth < 1 || bucketWidth > POPULARIDAD_MAXIMA) {
    throw new RangeError(`El ancho de bucket debe ser un entero entre 1 y ${POPULARIDAD_MAXIMA}: ${bucketWidth}`);
  }

  const cantidad = Math.ceil(POPULARIDAD_MAXIMA / bucketWidth);
  const buckets: PopularityBucket[] = [];

  for (let i = 0; i < cantidad; i++) {
    const ultimo = i === cantidad - 1;
    buckets.push({
      min: i * bucketWidth,
      max: ultimo ? POPULARIDAD_MAXIMA : (i + 1) * bucketWidth,
      inclusiveMax: ultimo,
      count: 0
    });
  }

  return buckets;
}

export function bucketIndex(popularity: number, bucketWidth: number, bucketCount: number): number {
  return Math.min(Math.floor(popularity / bucketWidth), bucketCount - 1);
}

export function popularityDistribution(
  tracks: readonly TrackRecord[],
  bucketWidth: number = DEFAULT_CONFIG.BUCKET_WIDTH
): PopularityBucket[] {
  const buckets = createBuckets(bucketWidth);

  for (const track of tracks) {
    buckets[bucketIndex(track.popularity, bucketWidth, buckets.length)].count++;
  }

  return buckets;
}

/**
 * Ranking completo de artistas: una aparición por canción y artista distinto (sin nombres vacíos),
 * orden por cantidad descendente y nombre ascendente en empates
 */
export function rankArtists(tracks: readonly TrackRecord[]): ArtistAggregate[] {
  const conteos = new Map<string, number>();

  for (const track of tracks) {
    for (const nombre of new Set(track.artists)) {
      if (nombre === '') {
        continue;
      }
      conteos.set(nombre, (conteos.get(nombre) ?? 0) + 1);
    }
  }

  return Array.from(conteos, ([name, count]) => ({ name, count })).sort((a, b) => {
    if (a.count !== b.count) {
      return b.count - a.count;
    }
    // Comparación por código, no por locale, para que el orden no dependa del entorno
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
}

/**
 * Recorte de presentación sobre el ranking completo
 */
export function topArtists(ranking: readonly ArtistAggregate[], limit?: number): ArtistAggregate[] {
  if (limit === undefined) {
    return [...ranking];
  }
  return ranking.slice(0, Math.max(0, limit));
}

export function summarizePopularity(tracks: readonly TrackRecord[]): PopularitySummary | null {
  if (tracks.length === 0) {
    return null;
  }

  const valores = tracks.map(t => t.popularity).sort((a, b) => a - b);
  const suma = valores.reduce((acc, v) => acc + v, 0);
  const mitad = Math.floor(valores.length / 2);
  const median = valores.length % 2 === 0
    ? (valores[mitad - 1] + valores[mitad]) / 2
    : valores[mitad];

  return {
    mean: suma / valores.length,
    median,
    min: valores[0],
    max: valores[valores.length - 1]
  };
}

export function aggregate(tracks: readonly TrackRecord[], options: AggregationOptions = {}): Aggregation {
  return {
    buckets: popularityDistribution(tracks, options.bucketWidth),
    artists: rankArtists(tracks),
    popularity: summarizePopularity(tracks)
  };
}
