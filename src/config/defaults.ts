/**
 * Configuración por defecto para el CLI
 */
export const DEFAULT_CONFIG = {
  // Archivo de credenciales por defecto
  CREDENTIALS_FILE: 'credentials.txt',

  // Web API de Spotify
  API_BASE_URL: 'https://api.spotify.com/v1',
  TOKEN_URL: 'https://accounts.spotify.com/api/token',

  // Paginación (100 es el máximo que acepta /playlists/{id}/tracks)
  PAGE_SIZE: 100,

  // Configuración de reintentos
  MAX_RETRIES: 3,
  RETRY_DELAY: 1000,
  MAX_RETRY_DELAY: 30000,
  MAX_RATE_LIMIT_WAITS: 10,

  // Timeouts
  REQUEST_TIMEOUT: 10000,

  // Margen antes de que venza el token
  TOKEN_EXPIRY_BUFFER: 60000,

  // Análisis
  BUCKET_WIDTH: 10,
  TOP_ARTISTS: 10,

  // Exportación
  CSV_ARTIST_DELIMITER: '; ',

  // Archivos de log
  ERROR_LOG_FILE: 'analysis-errors.json',
  SKIPPED_LOG_FILE: 'skipped-tracks.json'
} as const;

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  WELCOME: '🎵 Analizador de Playlists de Spotify',
  DESCRIPTION: 'Popularidad, artistas más frecuentes y exportación a CSV de cualquier playlist'
} as const;
