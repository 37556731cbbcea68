import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ErrorLogger } from '../ErrorLogger.js';
import { NotFoundError, UpstreamError } from '../ErrorHandler.js';

describe('ErrorLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'error-logger-'));
    ErrorLogger.setLogDir(path.join(dir, 'logs'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns no entries before anything is logged', async () => {
    expect(await ErrorLogger.getRecentLogs()).toEqual([]);
    expect(await ErrorLogger.getSkippedLogs()).toEqual([]);
  });

  it('records the structured context of a failed analysis', async () => {
    await ErrorLogger.logAnalysisError(new UpstreamError('down', { playlistId: 'p1', offset: 200, status: 503, intentos: 3 }));

    const [entrada] = await ErrorLogger.getRecentLogs();

    expect(entrada).toMatchObject({
      kind: 'UpstreamError',
      playlistId: 'p1',
      offset: 200,
      statusCode: 503,
      attempts: 3,
      errorMessage: 'down'
    });
    expect(typeof entrada.timestamp).toBe('string');
  });

  it('returns the most recent errors first', async () => {
    await ErrorLogger.logAnalysisError(new NotFoundError('first'));
    await ErrorLogger.logAnalysisError(new NotFoundError('second'));

    const logs = await ErrorLogger.getRecentLogs();

    expect(logs.map(l => l.errorMessage)).toEqual(['second', 'first']);
  });

  it('keeps only the last 100 errors', async () => {
    for (let i = 0; i < 105; i++) {
      await ErrorLogger.logAnalysisError(new NotFoundError(`error ${i}`));
    }

    const logs = await ErrorLogger.getRecentLogs(200);

    expect(logs).toHaveLength(100);
    expect(logs[0].errorMessage).toBe('error 104');
    expect(logs[99].errorMessage).toBe('error 5');
  });

  it('records skipped tracks by playlist and position', async () => {
    await ErrorLogger.logSkippedRecords('p1', [
      { skipped: true, position: 1, reason: 'unavailable' },
      { skipped: true, position: 4, reason: 'malformed' }
    ]);

    const logs = await ErrorLogger.getSkippedLogs();

    expect(logs.map(l => [l.playlistId, l.position, l.reason])).toEqual([
      ['p1', 4, 'malformed'],
      ['p1', 1, 'unavailable']
    ]);
  });

  it('clears both logs', async () => {
    await ErrorLogger.logAnalysisError(new NotFoundError('x'));
    await ErrorLogger.logSkippedRecords('p1', [{ skipped: true, position: 0, reason: 'unavailable' }]);

    await ErrorLogger.clearLogs();

    expect(await ErrorLogger.getRecentLogs()).toEqual([]);
    expect(await ErrorLogger.getSkippedLogs()).toEqual([]);
  });
});
