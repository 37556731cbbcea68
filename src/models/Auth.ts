export interface Credentials {
  spotifyClientId: string;
  spotifyClientSecret: string;
}

export interface AuthTokens {
  accessToken: string;
  expiresAt: Date;
}

/**
 * Capacidad de credenciales que se inyecta en el cliente del catálogo
 */
export interface TokenProvider {
  getToken(): Promise<string>;
  refresh(): Promise<string>;
}
