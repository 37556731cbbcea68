import chalk from 'chalk';
import inquirer from 'inquirer';
import type { PlaylistAnalyzerApp } from '../PlaylistAnalyzerApp.js';
import { AnalysisResult } from '../models/Analysis.js';
import { HELP_MESSAGES } from '../config/defaults.js';
import { ErrorLogger } from '../utils/ErrorLogger.js';
import { extraerIdPlaylist } from '../utils/PlaylistUrl.js';

export interface MenuOptions {
    app: PlaylistAnalyzerApp;
}

type MenuAction = 'analyze' | 'export' | 'view-logs' | 'view-skipped' | 'exit';

export class InteractiveMenu {
    private app: PlaylistAnalyzerApp;
    private ultimoResultado?: AnalysisResult;

    constructor(options: MenuOptions) {
        this.app = options.app;
    }

    async showMainMenu(): Promise<void> {
        this.showWelcome();

        while (true) {
            const { action } = await inquirer.prompt<{ action: MenuAction }>([
                {
                    type: 'list',
                    name: 'action',
                    message: '¿Qué quieres hacer?',
                    choices: [
                        { name: '🔍 Analizar playlist', value: 'analyze' },
                        {
                            name: this.ultimoResultado
                                ? `📄 Exportar "${this.ultimoResultado.metadata.name}" a CSV`
                                : '📄 Exportar último análisis a CSV',
                            value: 'export'
                        },
                        { name: '📝 Ver logs de errores', value: 'view-logs' },
                        { name: '🎵 Ver canciones omitidas', value: 'view-skipped' },
                        { name: '❌ Salir', value: 'exit' }
                    ]
                }
            ]);

            switch (action) {
                case 'analyze':
                    await this.handleAnalyze();
                    break;
                case 'export':
                    await this.handleExport();
                    break;
                case 'view-logs':
                    await this.showErrorLogs();
                    break;
                case 'view-skipped':
                    await this.showSkippedTracks();
                    break;
                case 'exit':
                    console.log(chalk.yellow('\n👋 ¡Hasta luego!'));
                    return;
            }

            await this.pressEnterToContinue();
            this.clearTerminal();
        }
    }

    private async handleAnalyze(): Promise<void> {
        const { entrada } = await inquirer.prompt<{ entrada: string }>([
            {
                type: 'input',
                name: 'entrada',
                message: 'ID o URL de la playlist de Spotify:',
                validate: (valor: string) => extraerIdPlaylist(valor) !== null || 'No se reconoce un ID de playlist en ese texto'
            }
        ]);

        try {
            this.ultimoResultado = await this.app.analizarPlaylist(entrada);
        } catch (error) {
            console.error(chalk.red(`\n❌ ${this.app.describirError(error)}`));
        }
    }

    private async handleExport(): Promise<void> {
        if (!this.ultimoResultado) {
            console.log(chalk.yellow('\n⚠️ Primero analizá una playlist.'));
            return;
        }

        const { ruta } = await inquirer.prompt<{ ruta: string }>([
            {
                type: 'input',
                name: 'ruta',
                message: 'Ruta del archivo CSV (Enter para la ubicación por defecto):',
                default: ''
            }
        ]);

        try {
            await this.app.exportarResultado(this.ultimoResultado, ruta.trim() || undefined);
        } catch (error) {
            console.error(chalk.red('❌ Error al exportar:'), error instanceof Error ? error.message : 'Error desconocido');
        }
    }

    /**
     * Mostrar los errores registrados más recientes
     */
    private async showErrorLogs(): Promise<void> {
        console.log(chalk.bold.red('\n📝 Logs de Errores Recientes'));
        console.log(chalk.gray('─'.repeat(30)));

        const logs = await ErrorLogger.getRecentLogs(10);

        if (logs.length === 0) {
            console.log(chalk.green('✅ No hay errores recientes registrados.'));
            return;
        }

        console.log(`\n📊 Mostrando ${logs.length} errores más recientes:\n`);

        logs.forEach((log, index) => {
            const estado = log.statusCode !== undefined ? ` (HTTP ${log.statusCode})` : '';
            console.log(chalk.red(`${index + 1}. ${log.kind}${estado}`));
            console.log(chalk.gray(`   Timestamp: ${new Date(log.timestamp).toLocaleString()}`));
            if (log.playlistId) {
                console.log(chalk.gray(`   Playlist: ${log.playlistId}${log.offset !== undefined ? ` (offset ${log.offset})` : ''}`));
            }
            console.log(chalk.gray(`   Message: ${log.errorMessage}`));
            console.log('');
        });

        console.log(chalk.gray(`📁 Archivo: ${ErrorLogger.getLogPath()}`));

        const { clearLogs } = await inquirer.prompt<{ clearLogs: boolean }>([
            {
                type: 'confirm',
                name: 'clearLogs',
                message: '¿Quieres limpiar los logs?',
                default: false
            }
        ]);

        if (clearLogs) {
            await ErrorLogger.clearLogs();
            console.log(chalk.green('✅ Logs limpiados.'));
        }
    }

    private async showSkippedTracks(): Promise<void> {
        console.log(chalk.bold.yellow('\n🎵 Canciones Omitidas'));
        console.log(chalk.gray('─'.repeat(35)));

        const logs = await ErrorLogger.getSkippedLogs(20);

        if (logs.length === 0) {
            console.log(chalk.green('✅ No hay canciones omitidas registradas.'));
            return;
        }

        logs.forEach((log, index) => {
            const razon = log.reason === 'unavailable' ? 'no disponible' : 'formato inválido';
            console.log(chalk.yellow(`${index + 1}. Playlist ${log.playlistId}, posición ${log.position}: ${razon}`));
        });
    }

    /**
     * Limpiar la terminal y volver a mostrar el encabezado
     */
    private clearTerminal(): void {
        console.clear();
        this.showWelcome();
    }

    private showWelcome(): void {
        console.log(chalk.bold.green(`\n${HELP_MESSAGES.WELCOME}`));
        console.log(chalk.gray('═'.repeat(40)));
    }

    private async pressEnterToContinue(): Promise<void> {
        await inquirer.prompt([
            {
                type: 'input',
                name: 'continue',
                message: 'Presiona Enter para continuar...',
                default: ''
            }
        ]);
    }
}
