import { FetchedPlaylist } from '../models/Playlist.js';
import { TokenProvider } from '../models/Auth.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  AbortedError,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  ConfiguracionReintento,
  FuncionDormir,
  ManejadorErrores,
  dormir
} from '../utils/ErrorHandler.js';
import { CatalogClient, CatalogClientOptions, SpotifyCatalogClient } from './CatalogClient.js';

export interface PlaylistFetcherOptions {
  pageSize?: number;
  reintento?: Partial<ConfiguracionReintento>;
  dormir?: FuncionDormir;
}

export interface FetchOptions {
  signal?: AbortSignal;
  alAvanzar?: (obtenidas: number, total: number) => void;
}

/**
 * Recorre todas las páginas de una playlist en orden, sin reordenar ni deduplicar
 */
export class PlaylistFetcher {
  private readonly pageSize: number;
  private readonly manejadorErrores: ManejadorErrores;

  constructor(private client: CatalogClient, options: PlaylistFetcherOptions = {}) {
    const pageSize = options.pageSize ?? DEFAULT_CONFIG.PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > DEFAULT_CONFIG.PAGE_SIZE) {
      throw new RangeError(`El tamaño de página debe estar entre 1 y ${DEFAULT_CONFIG.PAGE_SIZE}: ${pageSize}`);
    }

    this.pageSize = pageSize;
    this.manejadorErrores = new ManejadorErrores(
      { ...CONFIGURACION_REINTENTO_PREDETERMINADA, ...options.reintento },
      options.dormir ?? dormir
    );
  }

  static fromTokenProvider(
    tokenProvider: TokenProvider,
    options: PlaylistFetcherOptions & CatalogClientOptions = {}
  ): PlaylistFetcher {
    return new PlaylistFetcher(new SpotifyCatalogClient(tokenProvider, options), options);
  }

  /**
   * Obtener metadata y todas las entradas crudas. Un fetch cancelado siempre termina en AbortedError.
   */
  async fetch(playlistId: string, opciones: FetchOptions = {}): Promise<FetchedPlaylist> {
    const { signal, alAvanzar } = opciones;

    const metadata = await this.manejadorErrores.ejecutarConReintento(
      () => this.client.fetchPlaylistMetadata(playlistId, signal),
      { playlistId },
      signal
    );

    const entries: unknown[] = [];
    let offset = 0;

    for (;;) {
      const paginaOffset = offset;
      const pagina = await this.manejadorErrores.ejecutarConReintento(
        () => this.client.fetchPlaylistPage(playlistId, paginaOffset, this.pageSize, signal),
        { playlistId, offset: paginaOffset },
        signal
      );

      entries.push(...pagina.items);
      offset += this.pageSize;
      alAvanzar?.(entries.length, pagina.total);

      if (pagina.items.length < this.pageSize || offset >= pagina.total) {
        break;
      }
    }

    if (signal?.aborted) {
      throw new AbortedError('Análisis cancelado', { playlistId, offset });
    }

    return { metadata, entries };
  }
}
