export interface PlaylistMetadata {
  readonly id: string;
  readonly name: string;
  readonly ownerId: string;
  readonly ownerName: string;
  readonly trackCount: number;
  readonly description?: string;
  readonly imageUrl?: string;
}

/**
 * Resultado crudo de recorrer todas las páginas de una playlist
 */
export interface FetchedPlaylist {
  metadata: PlaylistMetadata;
  entries: unknown[];
}
