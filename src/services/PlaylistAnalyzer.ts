import { AnalysisResult } from '../models/Analysis.js';
import { NotFoundError } from '../utils/ErrorHandler.js';
import { extraerIdPlaylist } from '../utils/PlaylistUrl.js';
import { aggregate, createBuckets } from './AggregationEngine.js';
import { FetchOptions, PlaylistFetcher } from './PlaylistFetcher.js';
import { normalizeEntries } from './RecordNormalizer.js';

export interface AnalyzeOptions extends FetchOptions {
  bucketWidth?: number;
}

/**
 * Pipeline completo: ID o URL → páginas crudas → filas normalizadas → agregados.
 * Cada llamada construye su propio resultado; no hay estado compartido entre análisis.
 */
export class PlaylistAnalyzer {
  constructor(private fetcher: PlaylistFetcher) {}

  async analizar(entrada: string, opciones: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const playlistId = extraerIdPlaylist(entrada);
    if (playlistId === null) {
      throw new NotFoundError(`Identificador de playlist inválido: "${entrada}"`, { playlistId: entrada });
    }

    // Validar el ancho antes de ir a la red
    createBuckets(opciones.bucketWidth);

    const { metadata, entries } = await this.fetcher.fetch(playlistId, opciones);
    const { tracks, skipped } = normalizeEntries(entries);
    const { buckets, artists, popularity } = aggregate(tracks, { bucketWidth: opciones.bucketWidth });

    return {
      metadata,
      tracks,
      buckets,
      artists,
      popularity,
      skipped
    };
  }
}
