#!/usr/bin/env node

import chalk from 'chalk';
import gradient from 'gradient-string';
import chalkAnimation from 'chalk-animation';
import figlet from 'figlet';
import { PlaylistAnalyzerApp, AppConfig } from '../PlaylistAnalyzerApp.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import { CLIOptions, parseArguments } from './parseArguments.js';

export class PlaylistAnalyzerCLI {
    private options: CLIOptions;

    constructor(options: CLIOptions = {}) {
        this.options = {
            credentialsPath: ConfigPaths.getCredentialsPath(),
            ...options
        };
    }

    async main(): Promise<void> {
        const credentialsPath = this.options.credentialsPath ?? ConfigPaths.getCredentialsPath();

        await this.showWelcome();
        ConfigPaths.ensureConfigDirs();
        await this.checkAndSetupCredentials(credentialsPath);

        const appConfig: Partial<AppConfig> = {
            credentialsPath,
            playlist: this.options.playlist,
            exportPath: this.options.exportPath,
            topArtists: this.options.topArtists ?? DEFAULT_CONFIG.TOP_ARTISTS,
            bucketWidth: this.options.bucketWidth ?? DEFAULT_CONFIG.BUCKET_WIDTH,
            maxRetries: this.options.maxRetries ?? DEFAULT_CONFIG.MAX_RETRIES
        };

        const app = new PlaylistAnalyzerApp(appConfig);
        await app.run();
    }

    async showWelcome(): Promise<void> {
        console.clear();

        const title = figlet.textSync('Playlist Stats', {
            font: 'Big',
            horizontalLayout: 'default',
            verticalLayout: 'default'
        });

        const rainbowTitle = chalkAnimation.rainbow(title);
        await this.sleep(1500);
        rainbowTitle.stop();

        console.log('\n' + gradient.pastel.multiline([
            '🎵 Analizá cualquier playlist de Spotify',
            '📊 Distribución de popularidad y artistas más frecuentes',
            '📄 Exportación a CSV'
        ].join('\n')));

        console.log('\n' + chalk.gray('─'.repeat(60)));
    }

    /**
     * Verifica y configura las credenciales; sin credenciales válidas la aplicación termina
     */
    async checkAndSetupCredentials(credentialsPath: string): Promise<void> {
        const configManager = new ConfigManager();

        if (!(await configManager.checkCredentialsExistAsync(credentialsPath))) {
            console.log(chalk.yellow('\n⚠️  Archivo de credenciales no encontrado'));
            console.log(chalk.cyan('📁 Creando archivo de configuración...'));

            const createdPath = await configManager.createCredentialsTemplate(credentialsPath);

            console.log(chalk.green('\n✅ Archivo de credenciales creado exitosamente!'));
            console.log(chalk.white('\n📍 Ubicación: ') + chalk.cyan(createdPath));
            console.log(chalk.white('\n🎵 Spotify API:'));
            console.log(chalk.gray('   • Visitá: ') + chalk.blue('https://developer.spotify.com/dashboard'));
            console.log(chalk.gray('   • Creá una nueva aplicación'));
            console.log(chalk.gray('   • Copiá el Client ID y Client Secret en el archivo'));
            console.log(chalk.white('\nUna vez que completes el archivo, ejecutá el comando nuevamente.\n'));

            process.exit(0);
        }

        const validation = await configManager.validateCredentialsFile(credentialsPath);

        if (!validation.isValid) {
            console.log(chalk.yellow('\n⚠️  Credenciales incompletas o inválidas'));
            console.log(chalk.white('📍 Archivo: ') + chalk.cyan(credentialsPath));

            if (validation.missingFields.length > 0) {
                console.log(chalk.red('\n❌ Campos faltantes o vacíos:'));
                validation.missingFields.forEach(field => {
                    console.log(chalk.red(`   • ${field}`));
                });
            }

            console.log(chalk.white('\n🔧 Por favor completá todas las credenciales requeridas y ejecutá el comando nuevamente.\n'));
            process.exit(1);
        }

        console.log(chalk.green('✅ Credenciales validadas correctamente'));
    }

    static showHelp(): void {
        const defaultCredentialsPath = ConfigPaths.getCredentialsPath();

        console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}`));
        console.log(chalk.gray(`${HELP_MESSAGES.DESCRIPTION}\n`));
        console.log('Uso: spotify-playlist-analyzer [opciones]\n');
        console.log('Opciones:');
        console.log('  -p, --playlist <id|url>     Playlist a analizar (sin esta opción se abre el menú interactivo)');
        console.log('  -e, --export <ruta>         Exportar las canciones a CSV');
        console.log(`  -t, --top <num>             Cantidad de artistas a mostrar (por defecto: ${DEFAULT_CONFIG.TOP_ARTISTS})`);
        console.log(`  -w, --bucket-width <num>    Ancho de los rangos de popularidad, 1-100 (por defecto: ${DEFAULT_CONFIG.BUCKET_WIDTH})`);
        console.log(`  -c, --credentials <ruta>    Ruta al archivo de credenciales`);
        console.log(`                              (por defecto: ${defaultCredentialsPath})`);
        console.log(`  -r, --max-retries <num>     Intentos por solicitud ante fallos transitorios (por defecto: ${DEFAULT_CONFIG.MAX_RETRIES})`);
        console.log('  -h, --help                  Mostrar este mensaje de ayuda\n');
        console.log('Ejemplos:');
        console.log('  spotify-playlist-analyzer');
        console.log('  spotify-playlist-analyzer --playlist https://open.spotify.com/playlist/<id>');
        console.log('  spotify-playlist-analyzer -p <id> --export ./playlist.csv --top 20\n');
    }

    private sleep(ms: number = 2000): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

async function main(): Promise<void> {
    const options = parseArguments(process.argv.slice(2));

    if (options.help) {
        PlaylistAnalyzerCLI.showHelp();
        return;
    }

    const cli = new PlaylistAnalyzerCLI(options);
    await cli.main();
}

main().catch((error) => {
    console.error(chalk.red('Error fatal:'), error instanceof Error ? error.message : error);
    process.exit(1);
});
