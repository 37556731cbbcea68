import axios, { AxiosError } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export type TipoError = 'AuthError' | 'NotFoundError' | 'UpstreamError' | 'RateLimited' | 'Aborted';

/**
 * Contexto estructurado que acompaña a cada error para que la capa de UI arme su mensaje
 */
export interface DetalleError {
  playlistId?: string;
  offset?: number;
  status?: number;
  intentos?: number;
}

export class ErrorAnalizador extends Error {
  constructor(
    mensaje: string,
    public readonly kind: TipoError,
    public readonly detalle: DetalleError = {},
    public readonly errorOriginal?: Error
  ) {
    super(mensaje);
    this.name = 'ErrorAnalizador';
  }

  get reintentar(): boolean {
    return this.kind === 'UpstreamError' || this.kind === 'RateLimited';
  }
}

export class AuthError extends ErrorAnalizador {
  constructor(mensaje: string, detalle: DetalleError = {}, errorOriginal?: Error) {
    super(mensaje, 'AuthError', detalle, errorOriginal);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends ErrorAnalizador {
  constructor(mensaje: string, detalle: DetalleError = {}, errorOriginal?: Error) {
    super(mensaje, 'NotFoundError', detalle, errorOriginal);
    this.name = 'NotFoundError';
  }
}

export class UpstreamError extends ErrorAnalizador {
  constructor(mensaje: string, detalle: DetalleError = {}, errorOriginal?: Error) {
    super(mensaje, 'UpstreamError', detalle, errorOriginal);
    this.name = 'UpstreamError';
  }
}

export class RateLimitedError extends ErrorAnalizador {
  constructor(
    mensaje: string,
    public readonly retryAfterSeconds: number | undefined,
    detalle: DetalleError = {},
    errorOriginal?: Error
  ) {
    super(mensaje, 'RateLimited', detalle, errorOriginal);
    this.name = 'RateLimitedError';
  }
}

export class AbortedError extends ErrorAnalizador {
  constructor(mensaje: string = 'Operación cancelada', detalle: DetalleError = {}) {
    super(mensaje, 'Aborted', detalle);
    this.name = 'AbortedError';
  }
}

export type ResultadoCatalogo<T> =
  | { ok: true; valor: T }
  | { ok: false; error: ErrorAnalizador };

export function exito<T>(valor: T): ResultadoCatalogo<T> {
  return { ok: true, valor };
}

export function fallo<T>(error: ErrorAnalizador): ResultadoCatalogo<T> {
  return { ok: false, error };
}

export interface ConfiguracionReintento {
  maxIntentos: number;
  retrasoBase: number;
  retrasoMaximo: number;
  multiplicadorRetroceso: number;
  maxEsperasLimite: number;
  variacion: boolean;
}

export const CONFIGURACION_REINTENTO_PREDETERMINADA: ConfiguracionReintento = {
  maxIntentos: DEFAULT_CONFIG.MAX_RETRIES,
  retrasoBase: DEFAULT_CONFIG.RETRY_DELAY,
  retrasoMaximo: DEFAULT_CONFIG.MAX_RETRY_DELAY,
  multiplicadorRetroceso: 2,
  maxEsperasLimite: DEFAULT_CONFIG.MAX_RATE_LIMIT_WAITS,
  variacion: true
};

export type FuncionDormir = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Dormir por los milisegundos especificados; se corta si la señal se aborta
 */
export function dormir(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const alAbortar = () => {
      clearTimeout(temporizador);
      reject(new AbortedError());
    };

    const temporizador = setTimeout(() => {
      signal?.removeEventListener('abort', alAbortar);
      resolve();
    }, ms);

    signal?.addEventListener('abort', alAbortar, { once: true });
  });
}

const CODIGOS_ERROR_RED = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
];

export class ManejadorErrores {
  constructor(
    private configuracion: ConfiguracionReintento = CONFIGURACION_REINTENTO_PREDETERMINADA,
    private dormirFn: FuncionDormir = dormir
  ) {}

  clasificarError(error: unknown, detalle: DetalleError = {}): ErrorAnalizador {
    if (error instanceof ErrorAnalizador) {
      return error;
    }

    if (axios.isCancel(error)) {
      return new AbortedError('Solicitud cancelada', detalle);
    }

    if (axios.isAxiosError(error)) {
      return this.clasificarErrorAxios(error, detalle);
    }

    if (error instanceof Error) {
      if (this.esErrorRed(error)) {
        return new UpstreamError(`Error de red: ${error.message}`, detalle, error);
      }
      return new UpstreamError(error.message, detalle, error);
    }

    return new UpstreamError('Ocurrió un error desconocido', detalle);
  }

  private clasificarErrorAxios(error: AxiosError, detalle: DetalleError): ErrorAnalizador {
    // Sin respuesta - error de red o timeout
    if (!error.response) {
      return new UpstreamError(`Error de red: ${error.message}`, detalle, error);
    }

    const estado = error.response.status;
    const conEstado: DetalleError = { ...detalle, status: estado };
    const mensajeApi = this.extraerMensajeApi(error.response.data);

    if (estado === 429) {
      const reintentarDespues = this.obtenerRetryAfter(error);
      return new RateLimitedError(
        `Límite de velocidad alcanzado en Spotify${reintentarDespues !== undefined ? `. Reintentar después de ${reintentarDespues}s` : ''}`,
        reintentarDespues,
        conEstado,
        error
      );
    }

    if (estado === 401) {
      return new AuthError(
        mensajeApi || 'Autenticación fallida - credenciales inválidas o expiradas',
        conEstado,
        error
      );
    }

    // Spotify responde 400 para IDs mal formados y 403 para playlists privadas ajenas
    if (estado === 404 || estado === 400 || estado === 403) {
      return new NotFoundError(
        mensajeApi || `Playlist no encontrada o inaccesible (${estado})`,
        conEstado,
        error
      );
    }

    if (estado >= 500) {
      return new UpstreamError(
        `Servicio de Spotify no disponible (${estado}): ${error.response.statusText || mensajeApi}`,
        conEstado,
        error
      );
    }

    return new UpstreamError(
      mensajeApi || `Error HTTP (${estado}): ${error.response.statusText}`,
      conEstado,
      error
    );
  }

  /**
   * Ejecutar una operación del catálogo con reintentos acotados.
   * Los fallos transitorios consumen el presupuesto de intentos; las esperas por límite de velocidad usan el suyo.
   */
  async ejecutarConReintento<T>(
    operacion: () => Promise<ResultadoCatalogo<T>>,
    detalle: DetalleError,
    signal?: AbortSignal
  ): Promise<T> {
    let fallosTransitorios = 0;
    let esperasLimite = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new AbortedError('Análisis cancelado', detalle);
      }

      const resultado = await operacion();
      if (resultado.ok) {
        return resultado.valor;
      }

      const error = resultado.error;

      if (error instanceof RateLimitedError) {
        esperasLimite++;
        if (esperasLimite > this.configuracion.maxEsperasLimite) {
          throw new UpstreamError(
            `Límite de velocidad persistente después de ${this.configuracion.maxEsperasLimite} esperas`,
            { ...error.detalle, status: 429, intentos: esperasLimite },
            error
          );
        }

        const retraso = error.retryAfterSeconds !== undefined
          ? error.retryAfterSeconds * 1000
          : this.calcularRetrasoRetroceso(esperasLimite);

        console.warn(`${error.name}. Esperando ${retraso}ms antes de repetir la solicitud (offset ${error.detalle.offset ?? '-'})`);
        await this.dormirFn(retraso, signal);
        continue;
      }

      if (!(error instanceof UpstreamError)) {
        throw error;
      }

      fallosTransitorios++;
      if (fallosTransitorios >= this.configuracion.maxIntentos) {
        throw new UpstreamError(
          `Falló después de ${this.configuracion.maxIntentos} intentos. Último error: ${error.message}`,
          { ...error.detalle, intentos: fallosTransitorios },
          error
        );
      }

      const retraso = this.calcularRetrasoRetroceso(fallosTransitorios);
      console.warn(
        `${error.name}. Reintentando en ${retraso}ms (intento ${fallosTransitorios}/${this.configuracion.maxIntentos}): ${error.message}`
      );
      await this.dormirFn(retraso, signal);
    }
  }

  /**
   * Calcular retraso de retroceso exponencial con variación opcional
   */
  calcularRetrasoRetroceso(intento: number): number {
    let retraso = this.configuracion.retrasoBase * Math.pow(this.configuracion.multiplicadorRetroceso, intento - 1);

    retraso = Math.min(retraso, this.configuracion.retrasoMaximo);

    // Variación para que clientes concurrentes no reintenten al mismo tiempo
    if (this.configuracion.variacion) {
      retraso = retraso * (0.5 + Math.random() * 0.5);
    }

    return Math.floor(retraso);
  }

  /**
   * Segundos del header Retry-After, si viene y es numérico
   */
  private obtenerRetryAfter(error: AxiosError): number | undefined {
    const valor: unknown = error.response?.headers['retry-after'];

    if (typeof valor === 'string' || typeof valor === 'number') {
      const segundos = Number(valor);
      if (Number.isFinite(segundos) && segundos >= 0) {
        return segundos;
      }
    }

    return undefined;
  }

  private extraerMensajeApi(datos: unknown): string | undefined {
    if (typeof datos !== 'object' || datos === null || !('error' in datos)) {
      return undefined;
    }

    const cuerpo = datos.error;
    if (typeof cuerpo === 'string') {
      return cuerpo;
    }
    if (typeof cuerpo === 'object' && cuerpo !== null && 'message' in cuerpo && typeof cuerpo.message === 'string') {
      return cuerpo.message;
    }

    return undefined;
  }

  private esErrorRed(error: Error): boolean {
    const codigo = 'code' in error ? error.code : undefined;
    return CODIGOS_ERROR_RED.some(c => error.message.includes(c) || codigo === c);
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  obtenerMensajeAmigable(error: ErrorAnalizador): string {
    switch (error.kind) {
      case 'AuthError':
        return 'La autenticación de Spotify falló. Por favor verificá tu Client ID y Client Secret en credentials.txt';

      case 'NotFoundError':
        return `No se encontró la playlist${error.detalle.playlistId ? ` "${error.detalle.playlistId}"` : ''} o no es accesible con estas credenciales.`;

      case 'RateLimited':
        return 'Spotify está limitando las solicitudes. Intentá de nuevo en unos minutos.';

      case 'UpstreamError':
        return `El servicio de Spotify no respondió correctamente${error.detalle.status ? ` (HTTP ${error.detalle.status})` : ''}. Por favor intentá más tarde.`;

      case 'Aborted':
        return 'El análisis fue cancelado antes de completarse.';
    }
  }
}
