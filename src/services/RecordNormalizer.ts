import { NormalizedEntry, SkippedRecord, TrackRecord, isSkipped } from '../models/Track.js';
import { PlaylistMetadata } from '../models/Playlist.js';
import { RawTrackPage } from '../models/SpotifyTypes.js';

type Objeto = Record<string, unknown>;

function esObjeto(valor: unknown): valor is Objeto {
  return typeof valor === 'object' && valor !== null && !Array.isArray(valor);
}

function textoOpcional(valor: unknown): string | undefined {
  return typeof valor === 'string' && valor.length > 0 ? valor : undefined;
}

function enteroNoNegativo(valor: unknown): number | undefined {
  return typeof valor === 'number' && Number.isFinite(valor) && valor >= 0 ? Math.round(valor) : undefined;
}

/**
 * Popularidad ausente (archivos locales, algunos tipos de contenido) cuenta como 0.
 * Valores fuera de rango se recortan a [0, 100].
 */
export function normalizarPopularidad(valor: unknown): number {
  if (typeof valor !== 'number' || !Number.isFinite(valor)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(valor)));
}

/**
 * Nombres de artistas en el orden de créditos, tal como vienen (un archivo local sin etiqueta trae '').
 * Sin arreglo de artistas, o con el arreglo vacío, devuelve undefined.
 */
function normalizarArtistas(valor: unknown): string[] | undefined {
  if (!Array.isArray(valor) || valor.length === 0) {
    return undefined;
  }

  return valor.map(artista => (esObjeto(artista) && typeof artista.name === 'string' ? artista.name : ''));
}

function omitida(position: number, reason: SkippedRecord['reason']): SkippedRecord {
  return { skipped: true, position, reason };
}

/**
 * Convertir una entrada cruda de la playlist en un TrackRecord.
 * Una canción eliminada o no disponible (track null o vacío) produce un SkippedRecord, no un error.
 * Nombre o artistas vacíos no la descartan.
 */
export function normalizeEntry(entrada: unknown, position: number): NormalizedEntry {
  if (!esObjeto(entrada)) {
    return omitida(position, 'malformed');
  }

  const track = entrada.track;
  if (track === null || track === undefined) {
    return omitida(position, 'unavailable');
  }
  if (!esObjeto(track)) {
    return omitida(position, 'malformed');
  }
  if (Object.keys(track).length === 0) {
    return omitida(position, 'unavailable');
  }

  const artists = normalizarArtistas(track.artists);
  if (artists === undefined) {
    return omitida(position, 'malformed');
  }

  const name = typeof track.name === 'string' ? track.name : '';

  const album = esObjeto(track.album) ? textoOpcional(track.album.name) ?? '' : '';

  const record: TrackRecord = {
    id: textoOpcional(track.id) ?? null,
    name,
    artists,
    album,
    popularity: normalizarPopularidad(track.popularity),
    durationMs: enteroNoNegativo(track.duration_ms) ?? 0,
    position
  };

  return record;
}

/**
 * Normalizar la secuencia completa; la posición es el índice en la secuencia cruda
 */
export function normalizeEntries(entradas: readonly unknown[]): { tracks: TrackRecord[]; skipped: SkippedRecord[] } {
  const tracks: TrackRecord[] = [];
  const skipped: SkippedRecord[] = [];

  entradas.forEach((entrada, indice) => {
    const normalizada = normalizeEntry(entrada, indice);
    if (isSkipped(normalizada)) {
      skipped.push(normalizada);
    } else {
      tracks.push(normalizada);
    }
  });

  return { tracks, skipped };
}

/**
 * Validar la respuesta de /playlists/{id}. Devuelve undefined si faltan campos obligatorios.
 */
export function normalizeMetadata(datos: unknown): PlaylistMetadata | undefined {
  if (!esObjeto(datos) || !esObjeto(datos.owner) || !esObjeto(datos.tracks)) {
    return undefined;
  }

  const id = textoOpcional(datos.id);
  const ownerId = textoOpcional(datos.owner.id);
  const trackCount = enteroNoNegativo(datos.tracks.total);
  if (id === undefined || ownerId === undefined || trackCount === undefined) {
    return undefined;
  }

  const primeraImagen = Array.isArray(datos.images) ? datos.images[0] : undefined;

  return {
    id,
    name: typeof datos.name === 'string' ? datos.name : '',
    ownerId,
    ownerName: textoOpcional(datos.owner.display_name) ?? ownerId,
    trackCount,
    description: textoOpcional(datos.description),
    imageUrl: esObjeto(primeraImagen) ? textoOpcional(primeraImagen.url) : undefined
  };
}

/**
 * Validar una página de /playlists/{id}/tracks. Devuelve undefined si no tiene la forma esperada.
 */
export function normalizePage(datos: unknown): RawTrackPage | undefined {
  if (!esObjeto(datos) || !Array.isArray(datos.items)) {
    return undefined;
  }

  const total = enteroNoNegativo(datos.total);
  if (total === undefined) {
    return undefined;
  }

  return {
    items: datos.items,
    offset: enteroNoNegativo(datos.offset) ?? 0,
    limit: enteroNoNegativo(datos.limit) ?? datos.items.length,
    total,
    next: typeof datos.next === 'string' ? datos.next : null
  };
}
