import { PlaylistMetadata } from './Playlist.js';
import { SkippedRecord, TrackRecord } from './Track.js';

/**
 * Rango [min, max) de popularidad; el último bucket incluye el 100
 */
export interface PopularityBucket {
  min: number;
  max: number;
  inclusiveMax: boolean;
  count: number;
}

export interface ArtistAggregate {
  name: string;
  count: number;
}

export interface PopularitySummary {
  mean: number;
  median: number;
  min: number;
  max: number;
}

export interface AnalysisResult {
  metadata: PlaylistMetadata;
  tracks: TrackRecord[];
  buckets: PopularityBucket[];
  artists: ArtistAggregate[]; // ranking completo, sin truncar
  popularity: PopularitySummary | null;
  skipped: SkippedRecord[];
}
