import { describe, it, expect } from 'vitest';
import { extraerIdPlaylist } from '../PlaylistUrl.js';

const ID = '37i9dQZF1DXcBWIGoYBM5M';

describe('extraerIdPlaylist', () => {
  it('accepts a bare id, trimming whitespace', () => {
    expect(extraerIdPlaylist(ID)).toBe(ID);
    expect(extraerIdPlaylist(`  ${ID}\n`)).toBe(ID);
  });

  it('extracts the id from web URLs', () => {
    expect(extraerIdPlaylist(`https://open.spotify.com/playlist/${ID}`)).toBe(ID);
    expect(extraerIdPlaylist(`https://open.spotify.com/playlist/${ID}?si=abc123`)).toBe(ID);
    expect(extraerIdPlaylist(`https://open.spotify.com/intl-es/playlist/${ID}#top`)).toBe(ID);
    expect(extraerIdPlaylist(`https://open.spotify.com/playlist/${ID}/`)).toBe(ID);
  });

  it('extracts the id from spotify URIs', () => {
    expect(extraerIdPlaylist(`spotify:playlist:${ID}`)).toBe(ID);
    expect(extraerIdPlaylist(`spotify:user:someone:playlist:${ID}`)).toBe(ID);
  });

  it('returns null for anything else', () => {
    expect(extraerIdPlaylist('')).toBeNull();
    expect(extraerIdPlaylist('   ')).toBeNull();
    expect(extraerIdPlaylist(`https://open.spotify.com/album/${ID}`)).toBeNull();
    expect(extraerIdPlaylist('spotify:playlist:')).toBeNull();
    expect(extraerIdPlaylist('abc-123')).toBeNull();
    expect(extraerIdPlaylist('https://open.spotify.com/playlist/?si=abc')).toBeNull();
  });
});
