// Forma documentada de las respuestas de la Web API de Spotify.
// Las respuestas se validan campo por campo en RecordNormalizer; estos tipos son de referencia.

export interface SpotifyImage {
  url: string;
  height: number | null;
  width: number | null;
}

export interface SpotifyPlaylistResponse {
  id: string;
  name: string;
  description: string | null;
  images: SpotifyImage[] | null;
  owner: { id: string; display_name: string | null };
  tracks: { total: number };
}

export interface SpotifyArtist {
  id: string | null;
  name: string;
}

export interface SpotifyAlbum {
  id: string | null;
  name: string;
}

export interface SpotifyTrack {
  id: string | null;
  name: string;
  artists: SpotifyArtist[];
  album: SpotifyAlbum;
  duration_ms: number;
  popularity?: number;
  is_local?: boolean;
  type?: 'track' | 'episode';
}

export interface SpotifyPlaylistTrackItem {
  added_at: string | null;
  is_local?: boolean;
  track: SpotifyTrack | null;
}

export interface SpotifyPlaylistTracksResponse {
  items: SpotifyPlaylistTrackItem[];
  total: number;
  limit: number;
  offset: number;
  next: string | null;
}

/**
 * Página cruda de canciones, descartada después de normalizar
 */
export interface RawTrackPage {
  items: unknown[];
  offset: number;
  limit: number;
  total: number;
  next: string | null;
}
