import os from 'os';
import path from 'path';
import fs from 'fs';
import { DEFAULT_CONFIG } from '../config/defaults.js';

const CREDENTIALS_TEMPLATE = `# Credenciales de la Web API de Spotify para Spotify Playlist Analyzer
# Creá una aplicación en https://developer.spotify.com/dashboard y copiá sus valores.
# Solo se usa el flujo client credentials: no hace falta URI de redirección.

SPOTIFY_CLIENT_ID=tu_spotify_client_id_aqui
SPOTIFY_CLIENT_SECRET=tu_spotify_client_secret_aqui
`;

/**
 * Directorio base de configuración según la plataforma. Respeta APPDATA y XDG_CONFIG_HOME.
 */
export function resolveConfigBase(
    platform: NodeJS.Platform,
    env: NodeJS.ProcessEnv,
    homeDir: string
): string {
    if (platform === 'win32') {
        return env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    }
    if (platform === 'darwin') {
        return path.join(homeDir, 'Library', 'Application Support');
    }
    return env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
}

export class ConfigPaths {
    private static readonly APP_NAME = 'spotify-playlist-analyzer';

    static getConfigDir(): string {
        return path.join(resolveConfigBase(os.platform(), process.env, os.homedir()), this.APP_NAME);
    }

    static getCredentialsPath(): string {
        return path.join(this.getConfigDir(), DEFAULT_CONFIG.CREDENTIALS_FILE);
    }

    static getLogsDir(): string {
        return path.join(this.getConfigDir(), 'logs');
    }

    static getExportsDir(): string {
        return path.join(this.getConfigDir(), 'exports');
    }

    static ensureConfigDirs(): void {
        for (const dir of [this.getLogsDir(), this.getExportsDir()]) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    /**
     * Escribe el template de credenciales si el archivo no existe; nunca pisa uno existente
     */
    static createCredentialsTemplate(credentialsPath: string = this.getCredentialsPath()): string {
        if (!fs.existsSync(credentialsPath)) {
            fs.mkdirSync(path.dirname(credentialsPath), { recursive: true });
            fs.writeFileSync(credentialsPath, CREDENTIALS_TEMPLATE, 'utf8');
        }

        return credentialsPath;
    }
}
