import path from 'path';
import chalk from 'chalk';
import { AuthManager } from './auth/AuthManager.js';
import { DEFAULT_CONFIG } from './config/defaults.js';
import { AnalysisResult } from './models/Analysis.js';
import { PlaylistAnalyzer } from './services/PlaylistAnalyzer.js';
import { PlaylistFetcher } from './services/PlaylistFetcher.js';
import { exportCsvFile } from './services/CsvExporter.js';
import { InteractiveMenu } from './cli/InteractiveMenu.js';
import { ConfigPaths } from './utils/ConfigPaths.js';
import { ErrorAnalizador, ManejadorErrores } from './utils/ErrorHandler.js';
import { ErrorLogger } from './utils/ErrorLogger.js';
import { ProgressReporter } from './utils/ProgressReporter.js';

export interface AppConfig {
  credentialsPath: string;
  playlist?: string; // con playlist se corre en modo automático
  exportPath?: string;
  topArtists: number;
  bucketWidth: number;
  maxRetries: number;
}

export class PlaylistAnalyzerApp {
  private config: AppConfig;
  private progressReporter: ProgressReporter;
  private manejadorErrores: ManejadorErrores;
  private analyzer?: PlaylistAnalyzer;
  private controladorActual?: AbortController;

  constructor(config: Partial<AppConfig> = {}, analyzer?: PlaylistAnalyzer) {
    this.config = {
      credentialsPath: ConfigPaths.getCredentialsPath(),
      topArtists: DEFAULT_CONFIG.TOP_ARTISTS,
      bucketWidth: DEFAULT_CONFIG.BUCKET_WIDTH,
      maxRetries: DEFAULT_CONFIG.MAX_RETRIES,
      ...config
    };

    this.progressReporter = new ProgressReporter();
    this.manejadorErrores = new ManejadorErrores();
    this.analyzer = analyzer;

    this.setupShutdownHandlers();
  }

  /**
   * Punto de entrada principal: modo automático si se pasó una playlist, menú interactivo si no
   */
  async run(): Promise<void> {
    try {
      this.analyzer = this.analyzer ?? await this.createAnalyzer();

      if (this.config.playlist) {
        const resultado = await this.analizarPlaylist(this.config.playlist);
        if (this.config.exportPath) {
          await this.exportarResultado(resultado, this.config.exportPath);
        }
        console.log(chalk.green('\n✅ Análisis completado exitosamente!'));
      } else {
        const menu = new InteractiveMenu({ app: this });
        await menu.showMainMenu();
      }
    } catch (error) {
      this.handleCriticalError(error);
    }
  }

  private async createAnalyzer(): Promise<PlaylistAnalyzer> {
    console.log('🔐 Autenticando con Spotify...');
    const authManager = await AuthManager.fromCredentialsFile(this.config.credentialsPath);
    // Pedir el token de entrada para fallar temprano con credenciales inválidas
    await authManager.getToken();
    console.log(chalk.green('✅ Spotify autenticado exitosamente!'));

    const fetcher = PlaylistFetcher.fromTokenProvider(authManager, {
      reintento: { maxIntentos: this.config.maxRetries }
    });
    return new PlaylistAnalyzer(fetcher);
  }

  /**
   * Analizar una playlist mostrando el progreso. Los errores se registran y se relanzan clasificados.
   */
  async analizarPlaylist(entrada: string): Promise<AnalysisResult> {
    if (!this.analyzer) {
      throw new Error('PlaylistAnalyzer no inicializado');
    }

    const controlador = new AbortController();
    this.controladorActual = controlador;
    this.progressReporter.startProgress();

    try {
      const resultado = await this.analyzer.analizar(entrada, {
        signal: controlador.signal,
        bucketWidth: this.config.bucketWidth,
        alAvanzar: (obtenidas, total) => this.progressReporter.updateProgress(obtenidas, total)
      });

      this.progressReporter.finishProgress(resultado);
      await ErrorLogger.logSkippedRecords(resultado.metadata.id, resultado.skipped);
      this.progressReporter.displayAnalysis(resultado, this.config.topArtists);

      return resultado;
    } catch (error) {
      // Parámetro inválido: no se registra como error del catálogo
      if (error instanceof RangeError) {
        this.progressReporter.failProgress(error.message);
        throw error;
      }

      const clasificado = this.manejadorErrores.clasificarError(error, { playlistId: entrada });
      this.progressReporter.failProgress(this.manejadorErrores.obtenerMensajeAmigable(clasificado));
      await ErrorLogger.logAnalysisError(clasificado);
      throw clasificado;
    } finally {
      this.controladorActual = undefined;
    }
  }

  async exportarResultado(resultado: AnalysisResult, ruta?: string): Promise<string> {
    const destino = ruta ?? path.join(ConfigPaths.getExportsDir(), `${resultado.metadata.id}.csv`);
    const escrito = await exportCsvFile(resultado, destino);
    console.log(`\n📄 CSV exportado: ${chalk.cyan(escrito)}`);
    return escrito;
  }

  describirError(error: unknown): string {
    if (error instanceof RangeError) {
      return `Parámetro inválido: ${error.message}`;
    }
    return this.manejadorErrores.obtenerMensajeAmigable(this.manejadorErrores.clasificarError(error));
  }

  private handleCriticalError(error: unknown): never {
    console.error(chalk.red('\n❌ Error crítico:'), error instanceof Error ? error.message : 'Error desconocido');

    if (error instanceof ErrorAnalizador) {
      console.log(chalk.yellow(`\n💡 ${this.manejadorErrores.obtenerMensajeAmigable(error)}`));
      if (error.kind === 'AuthError') {
        console.log(`   Archivo de credenciales: ${chalk.cyan(this.config.credentialsPath)}`);
      }
    }

    this.progressReporter.stop();
    process.exit(1);
  }

  private setupShutdownHandlers(): void {
    const gracefulShutdown = (signal: string) => {
      if (this.controladorActual && !this.controladorActual.signal.aborted) {
        console.log(`\n⚠️ Recibida señal ${signal}. Cancelando el análisis en curso...`);
        this.controladorActual.abort();
        return;
      }

      console.log(`\n⚠️ Recibida señal ${signal}. Cerrando aplicación...`);
      this.progressReporter.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  }
}
