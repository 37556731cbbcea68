import axios, { AxiosInstance } from 'axios';
import { PlaylistMetadata } from '../models/Playlist.js';
import { RawTrackPage } from '../models/SpotifyTypes.js';
import { TokenProvider } from '../models/Auth.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  DetalleError,
  ManejadorErrores,
  ResultadoCatalogo,
  UpstreamError,
  exito,
  fallo
} from '../utils/ErrorHandler.js';
import { normalizeMetadata, normalizePage } from './RecordNormalizer.js';

const CAMPOS_METADATA = 'id,name,description,images(url),owner(id,display_name),tracks(total)';
const CAMPOS_PAGINA = 'items(track(id,name,popularity,duration_ms,is_local,artists(name),album(name))),total,limit,offset,next';

/**
 * Lecturas del catálogo. Los resultados HTTP nunca se lanzan: vuelven como ResultadoCatalogo.
 */
export interface CatalogClient {
  fetchPlaylistMetadata(playlistId: string, signal?: AbortSignal): Promise<ResultadoCatalogo<PlaylistMetadata>>;
  fetchPlaylistPage(
    playlistId: string,
    offset: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<ResultadoCatalogo<RawTrackPage>>;
}

export interface CatalogClientOptions {
  baseURL?: string;
  timeout?: number;
  http?: AxiosInstance;
}

/**
 * Cliente de la Web API de Spotify para leer playlists
 */
export class SpotifyCatalogClient implements CatalogClient {
  private client: AxiosInstance;
  private manejadorErrores: ManejadorErrores;

  constructor(private tokenProvider: TokenProvider, options: CatalogClientOptions = {}) {
    this.manejadorErrores = new ManejadorErrores();
    this.client = options.http ?? axios.create({
      baseURL: options.baseURL ?? DEFAULT_CONFIG.API_BASE_URL,
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: options.timeout ?? DEFAULT_CONFIG.REQUEST_TIMEOUT,
    });
  }

  async fetchPlaylistMetadata(playlistId: string, signal?: AbortSignal): Promise<ResultadoCatalogo<PlaylistMetadata>> {
    const detalle: DetalleError = { playlistId };
    const respuesta = await this.solicitar(
      `/playlists/${encodeURIComponent(playlistId)}`,
      { fields: CAMPOS_METADATA },
      detalle,
      signal
    );
    if (!respuesta.ok) {
      return respuesta;
    }

    const metadata = normalizeMetadata(respuesta.valor);
    return metadata
      ? exito(metadata)
      : fallo(new UpstreamError('Respuesta de playlist con formato inesperado', detalle));
  }

  async fetchPlaylistPage(
    playlistId: string,
    offset: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<ResultadoCatalogo<RawTrackPage>> {
    const detalle: DetalleError = { playlistId, offset };
    const respuesta = await this.solicitar(
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      { offset, limit, fields: CAMPOS_PAGINA },
      detalle,
      signal
    );
    if (!respuesta.ok) {
      return respuesta;
    }

    const pagina = normalizePage(respuesta.valor);
    return pagina
      ? exito(pagina)
      : fallo(new UpstreamError('Página de canciones con formato inesperado', detalle));
  }

  /**
   * GET autenticado. Si el token es rechazado se refresca una sola vez y se repite la solicitud.
   */
  private async solicitar(
    ruta: string,
    params: Record<string, string | number>,
    detalle: DetalleError,
    signal?: AbortSignal
  ): Promise<ResultadoCatalogo<unknown>> {
    let token: string;
    try {
      token = await this.tokenProvider.getToken();
    } catch (error) {
      return fallo(this.manejadorErrores.clasificarError(error, detalle));
    }

    const primero = await this.get(ruta, params, token, detalle, signal);
    if (primero.ok || primero.error.kind !== 'AuthError') {
      return primero;
    }

    try {
      token = await this.tokenProvider.refresh();
    } catch (error) {
      return fallo(this.manejadorErrores.clasificarError(error, detalle));
    }

    return this.get(ruta, params, token, detalle, signal);
  }

  private async get(
    ruta: string,
    params: Record<string, string | number>,
    token: string,
    detalle: DetalleError,
    signal?: AbortSignal
  ): Promise<ResultadoCatalogo<unknown>> {
    try {
      const response = await this.client.get<unknown>(ruta, {
        params,
        headers: { 'Authorization': `Bearer ${token}` },
        signal,
      });
      return exito(response.data);
    } catch (error) {
      return fallo(this.manejadorErrores.clasificarError(error, detalle));
    }
  }
}
