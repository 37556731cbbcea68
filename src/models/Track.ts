/**
 * Fila normalizada de una canción de la playlist, lista para analizar
 */
export interface TrackRecord {
  id: string | null; // null para archivos locales subidos por el usuario
  name: string;
  artists: string[]; // en el orden de créditos del catálogo
  album: string;
  popularity: number; // entero 0-100
  durationMs: number;
  position: number; // índice 0-based dentro de la playlist original
}

export type SkipReason = 'unavailable' | 'malformed';

/**
 * Marcador para entradas que no producen un TrackRecord (canciones eliminadas o no disponibles)
 */
export interface SkippedRecord {
  skipped: true;
  position: number;
  reason: SkipReason;
}

export type NormalizedEntry = TrackRecord | SkippedRecord;

export function isSkipped(entry: NormalizedEntry): entry is SkippedRecord {
  return 'skipped' in entry;
}
