import axios, { AxiosInstance } from 'axios';
import { ConfigManager } from '../config/ConfigManager.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { AuthTokens, Credentials, TokenProvider } from '../models/Auth.js';
import { AuthError, ErrorAnalizador, UpstreamError } from '../utils/ErrorHandler.js';

export interface AuthManagerOptions {
  tokenUrl?: string;
  expiryBuffer?: number;
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * Proveedor de tokens con el flujo client credentials de OAuth2 (acceso de solo lectura al catálogo).
 * Un solo refresco en curso a la vez; quienes piden el token mientras tanto esperan ese mismo refresco.
 */
export class AuthManager implements TokenProvider {
  private tokens?: AuthTokens;
  private refrescoEnCurso?: Promise<string>;
  private readonly tokenUrl: string;
  private readonly expiryBuffer: number;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(private credentials: Credentials, options: AuthManagerOptions = {}) {
    this.tokenUrl = options.tokenUrl ?? DEFAULT_CONFIG.TOKEN_URL;
    this.expiryBuffer = options.expiryBuffer ?? DEFAULT_CONFIG.TOKEN_EXPIRY_BUFFER;
    this.http = options.http ?? axios.create({ timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT });
    this.now = options.now ?? Date.now;
  }

  /**
   * Carga las credenciales desde la ruta de archivo especificada usando ConfigManager
   */
  static async fromCredentialsFile(filePath: string, options: AuthManagerOptions = {}): Promise<AuthManager> {
    const configManager = new ConfigManager();
    const validation = await configManager.validateCredentialsFile(filePath);
    if (!validation.isValid) {
      throw new AuthError(`Credenciales inválidas: ${validation.errors.join(', ')}`);
    }

    return new AuthManager(await configManager.parseCredentials(filePath), options);
  }

  async getToken(): Promise<string> {
    if (this.isTokenValid() && this.tokens) {
      return this.tokens.accessToken;
    }
    return this.refresh();
  }

  refresh(): Promise<string> {
    if (!this.refrescoEnCurso) {
      this.refrescoEnCurso = this.solicitarToken().finally(() => {
        this.refrescoEnCurso = undefined;
      });
    }
    return this.refrescoEnCurso;
  }

  /**
   * Verificar si el token vigente sigue siendo válido con margen de seguridad
   */
  isTokenValid(): boolean {
    if (!this.tokens) {
      return false;
    }
    return this.tokens.expiresAt.getTime() - this.now() > this.expiryBuffer;
  }

  private async solicitarToken(): Promise<string> {
    const basic = Buffer.from(`${this.credentials.spotifyClientId}:${this.credentials.spotifyClientSecret}`).toString('base64');

    let datos: unknown;
    try {
      const response = await this.http.post<unknown>(
        this.tokenUrl,
        'grant_type=client_credentials',
        {
          headers: {
            'Authorization': `Basic ${basic}`,
            'Content-Type': 'application/x-www-form-urlencoded'
          }
        }
      );
      datos = response.data;
    } catch (error) {
      throw this.clasificarErrorToken(error);
    }

    if (
      typeof datos !== 'object' || datos === null ||
      !('access_token' in datos) || typeof datos.access_token !== 'string' ||
      !('expires_in' in datos) || typeof datos.expires_in !== 'number'
    ) {
      throw new AuthError('Respuesta de token inválida de Spotify');
    }

    // El par token/expiración se reemplaza entero
    this.tokens = {
      accessToken: datos.access_token,
      expiresAt: new Date(this.now() + datos.expires_in * 1000)
    };

    return datos.access_token;
  }

  private clasificarErrorToken(error: unknown): ErrorAnalizador {
    if (axios.isAxiosError(error) && error.response) {
      const status = error.response.status;
      if (status >= 400 && status < 500) {
        return new AuthError(`Spotify rechazó las credenciales de cliente (${status})`, {}, error);
      }
      return new UpstreamError(`El servicio de autenticación de Spotify no está disponible (${status})`, { status }, error);
    }

    const causa = error instanceof Error ? error : undefined;
    return new UpstreamError(`No se pudo contactar el servicio de autenticación: ${causa?.message ?? 'Error desconocido'}`, {}, causa);
  }
}
