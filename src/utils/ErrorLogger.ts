import { promises as fs } from 'fs';
import path from 'path';
import { SkippedRecord } from '../models/Track.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ConfigPaths } from './ConfigPaths.js';
import { ErrorAnalizador, TipoError } from './ErrorHandler.js';

export interface ErrorLogEntry {
  timestamp: string;
  kind: TipoError;
  playlistId?: string;
  offset?: number;
  statusCode?: number;
  attempts?: number;
  errorMessage: string;
}

export interface SkippedTrackLogEntry {
  timestamp: string;
  playlistId: string;
  position: number;
  reason: SkippedRecord['reason'];
}

const MAX_ERROR_ENTRIES = 100;
const MAX_SKIPPED_ENTRIES = 500;

export class ErrorLogger {
  private static logDir = ConfigPaths.getLogsDir();
  private static logFile: string = DEFAULT_CONFIG.ERROR_LOG_FILE;
  private static skippedLogFile: string = DEFAULT_CONFIG.SKIPPED_LOG_FILE;

  static setLogDir(dir: string): void {
    this.logDir = dir;
  }

  static getLogPath(): string {
    return path.join(this.logDir, this.logFile);
  }

  /**
   * Registrar un análisis fallido con su contexto estructurado
   */
  static async logAnalysisError(error: ErrorAnalizador): Promise<void> {
    const logEntry: ErrorLogEntry = {
      timestamp: new Date().toISOString(),
      kind: error.kind,
      playlistId: error.detalle.playlistId,
      offset: error.detalle.offset,
      statusCode: error.detalle.status,
      attempts: error.detalle.intentos,
      errorMessage: error.message
    };

    try {
      await this.appendEntries(this.logFile, [logEntry], MAX_ERROR_ENTRIES);
    } catch (logError) {
      console.warn('⚠️ Error al registrar el error:', logError instanceof Error ? logError.message : logError);
    }
  }

  /**
   * Registrar las canciones omitidas (eliminadas o no disponibles) de un análisis
   */
  static async logSkippedRecords(playlistId: string, skipped: readonly SkippedRecord[]): Promise<void> {
    if (skipped.length === 0) {
      return;
    }

    const timestamp = new Date().toISOString();
    const entries: SkippedTrackLogEntry[] = skipped.map(record => ({
      timestamp,
      playlistId,
      position: record.position,
      reason: record.reason
    }));

    try {
      await this.appendEntries(this.skippedLogFile, entries, MAX_SKIPPED_ENTRIES);
    } catch (logError) {
      console.warn('⚠️ Error al registrar canciones omitidas:', logError instanceof Error ? logError.message : logError);
    }
  }

  /**
   * Obtener logs de errores recientes, más recientes primero
   */
  static async getRecentLogs(limit: number = 10): Promise<ErrorLogEntry[]> {
    const logs = await this.readEntries<ErrorLogEntry>(this.logFile);
    return logs.slice(-limit).reverse();
  }

  static async getSkippedLogs(limit: number = 20): Promise<SkippedTrackLogEntry[]> {
    const logs = await this.readEntries<SkippedTrackLogEntry>(this.skippedLogFile);
    return logs.slice(-limit).reverse();
  }

  /**
   * Limpiar todos los logs
   */
  static async clearLogs(): Promise<void> {
    await this.ensureLogDirectory();
    await fs.writeFile(path.join(this.logDir, this.logFile), '[]', 'utf-8');
    await fs.writeFile(path.join(this.logDir, this.skippedLogFile), '[]', 'utf-8');
  }

  private static async ensureLogDirectory(): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
  }

  private static async readEntries<T>(file: string): Promise<T[]> {
    try {
      const data = await fs.readFile(path.join(this.logDir, file), 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return Array.isArray(parsed) ? parsed : [];
    } catch {
      // El archivo no existe o es inválido
      return [];
    }
  }

  /**
   * Agregar entradas conservando solo las últimas `max`
   */
  private static async appendEntries<T>(file: string, entries: readonly T[], max: number): Promise<void> {
    await this.ensureLogDirectory();

    const existing = await this.readEntries<T>(file);
    const combined = [...existing, ...entries].slice(-max);

    await fs.writeFile(path.join(this.logDir, file), JSON.stringify(combined, null, 2), 'utf-8');
  }
}
