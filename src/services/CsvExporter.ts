import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { TrackRecord } from '../models/Track.js';
import { AnalysisResult } from '../models/Analysis.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export const CSV_HEADERS = ['position', 'name', 'artists', 'album', 'popularity', 'duration_ms'] as const;

export interface CsvOptions {
  includeHeaders?: boolean;
  artistDelimiter?: string;
}

/**
 * Escapar un valor según RFC 4180: comillas si contiene coma, comilla o salto de línea
 */
export function escapeCsvValue(valor: string): string {
  if (/[",\r\n]/.test(valor)) {
    return `"${valor.replace(/"/g, '""')}"`;
  }
  return valor;
}

export function formatCsvRow(valores: readonly string[]): string {
  return valores.map(escapeCsvValue).join(',');
}

/**
 * Unir artistas en el orden de créditos. Un nombre que contiene el delimitador
 * lo lleva precedido de '\\' (y '\\' se duplica), así splitArtists lo recupera.
 */
export function joinArtists(artists: readonly string[], delimiter: string = DEFAULT_CONFIG.CSV_ARTIST_DELIMITER): string {
  return artists
    .map(nombre => nombre.replace(/\\/g, '\\\\').split(delimiter).join(`\\${delimiter}`))
    .join(delimiter);
}

/**
 * Inversa de joinArtists. Un campo vacío es un único artista sin nombre.
 */
export function splitArtists(campo: string, delimiter: string = DEFAULT_CONFIG.CSV_ARTIST_DELIMITER): string[] {
  const nombres: string[] = [];
  let actual = '';
  let i = 0;

  while (i < campo.length) {
    if (campo[i] === '\\' && campo.startsWith(delimiter, i + 1)) {
      actual += delimiter;
      i += 1 + delimiter.length;
    } else if (campo[i] === '\\' && i + 1 < campo.length) {
      actual += campo[i + 1];
      i += 2;
    } else if (campo.startsWith(delimiter, i)) {
      nombres.push(actual);
      actual = '';
      i += delimiter.length;
    } else {
      actual += campo[i];
      i++;
    }
  }

  nombres.push(actual);
  return nombres;
}

export function trackToRow(track: TrackRecord, artistDelimiter: string = DEFAULT_CONFIG.CSV_ARTIST_DELIMITER): string[] {
  return [
    String(track.position),
    track.name,
    joinArtists(track.artists, artistDelimiter),
    track.album,
    String(track.popularity),
    String(track.durationMs)
  ];
}

/**
 * Serializar las canciones a CSV. La misma entrada produce siempre los mismos bytes.
 */
export function exportCsv(tracks: readonly TrackRecord[], options: CsvOptions = {}): string {
  const { includeHeaders = true, artistDelimiter = DEFAULT_CONFIG.CSV_ARTIST_DELIMITER } = options;
  const lineas: string[] = [];

  if (includeHeaders) {
    lineas.push(formatCsvRow(CSV_HEADERS));
  }

  for (const track of tracks) {
    lineas.push(formatCsvRow(trackToRow(track, artistDelimiter)));
  }

  return lineas.map(linea => `${linea}\r\n`).join('');
}

/**
 * Escribir el CSV de un análisis a disco, creando el directorio si hace falta
 */
export async function exportCsvFile(
  resultado: AnalysisResult,
  rutaSalida: string,
  options: CsvOptions = {}
): Promise<string> {
  await mkdir(path.dirname(rutaSalida), { recursive: true });
  await writeFile(rutaSalida, exportCsv(resultado.tracks, options), 'utf-8');
  return rutaSalida;
}
