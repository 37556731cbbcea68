import { CatalogClient } from '../CatalogClient.js';
import { PlaylistMetadata } from '../../models/Playlist.js';
import { RawTrackPage, SpotifyPlaylistTrackItem } from '../../models/SpotifyTypes.js';
import { ErrorAnalizador, ResultadoCatalogo, exito, fallo } from '../../utils/ErrorHandler.js';

export function crearEntrada(
  indice: number,
  overrides: { artists?: string[]; popularity?: number; name?: string } = {}
): SpotifyPlaylistTrackItem {
  return {
    added_at: '2024-01-01T00:00:00Z',
    track: {
      id: `track${indice}`,
      name: overrides.name ?? `Track ${indice}`,
      artists: (overrides.artists ?? ['Artist']).map(name => ({ id: null, name })),
      album: { id: null, name: 'Album' },
      popularity: overrides.popularity ?? indice % 101,
      duration_ms: 200000
    }
  };
}

export function crearMetadata(trackCount: number, id: string = 'playlist1'): PlaylistMetadata {
  return {
    id,
    name: 'Test Playlist',
    ownerId: 'owner1',
    ownerName: 'Owner',
    trackCount
  };
}

/**
 * Catálogo en memoria; los fallos encolados se devuelven antes de servir la página real
 */
export class FakeCatalogClient implements CatalogClient {
  llamadasPagina: Array<{ playlistId: string; offset: number; limit: number }> = [];
  llamadasMetadata: string[] = [];
  fallosPagina: ErrorAnalizador[] = [];
  falloMetadata?: ErrorAnalizador;

  constructor(private entradas: unknown[], private metadata: PlaylistMetadata = crearMetadata(entradas.length)) {}

  async fetchPlaylistMetadata(playlistId: string): Promise<ResultadoCatalogo<PlaylistMetadata>> {
    this.llamadasMetadata.push(playlistId);
    if (this.falloMetadata) {
      return fallo(this.falloMetadata);
    }
    return exito(this.metadata);
  }

  async fetchPlaylistPage(playlistId: string, offset: number, limit: number): Promise<ResultadoCatalogo<RawTrackPage>> {
    this.llamadasPagina.push({ playlistId, offset, limit });

    const error = this.fallosPagina.shift();
    if (error) {
      return fallo(error);
    }

    return exito({
      items: this.entradas.slice(offset, offset + limit),
      offset,
      limit,
      total: this.entradas.length,
      next: null
    });
  }
}
