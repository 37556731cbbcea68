import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PlaylistAnalyzerApp } from '../PlaylistAnalyzerApp.js';
import { PlaylistAnalyzer } from '../services/PlaylistAnalyzer.js';
import { PlaylistFetcher } from '../services/PlaylistFetcher.js';
import { ErrorLogger } from '../utils/ErrorLogger.js';
import { NotFoundError } from '../utils/ErrorHandler.js';
import { FakeCatalogClient, crearEntrada } from '../services/__tests__/fakes.js';

function crearApp(bucketWidth: number): { app: PlaylistAnalyzerApp; client: FakeCatalogClient } {
  const client = new FakeCatalogClient([crearEntrada(0)]);
  const analyzer = new PlaylistAnalyzer(new PlaylistFetcher(client, { dormir: async () => {} }));
  return { app: new PlaylistAnalyzerApp({ bucketWidth }, analyzer), client };
}

describe('PlaylistAnalyzerApp.analizarPlaylist', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'analyzer-app-'));
    ErrorLogger.setLogDir(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('rethrows an invalid bucket width unchanged and does not log it', async () => {
    const { app, client } = crearApp(0);

    const error = await app.analizarPlaylist('playlist1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RangeError);
    expect(app.describirError(error)).toBe('Parámetro inválido: El ancho de bucket debe ser un entero entre 1 y 100: 0');
    expect(client.llamadasMetadata).toEqual([]);
    expect(await ErrorLogger.getRecentLogs()).toEqual([]);
  });

  it('classifies and logs catalog failures', async () => {
    const { app } = crearApp(10);

    await expect(app.analizarPlaylist('not a playlist!')).rejects.toBeInstanceOf(NotFoundError);

    const logs = await ErrorLogger.getRecentLogs();
    expect(logs.map(l => [l.kind, l.playlistId])).toEqual([['NotFoundError', 'not a playlist!']]);
  });
});
