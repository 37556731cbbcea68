export interface CLIOptions {
    playlist?: string;
    exportPath?: string;
    credentialsPath?: string;
    topArtists?: number;
    bucketWidth?: number;
    maxRetries?: number;
    help?: boolean;
}

function parsePositiveInt(valor: string | undefined, max: number = Number.MAX_SAFE_INTEGER): number | undefined {
    if (valor === undefined || !/^\d+$/.test(valor)) {
        return undefined;
    }
    const numero = parseInt(valor, 10);
    return numero > 0 && numero <= max ? numero : undefined;
}

/**
 * Parse command line arguments (sin node ni la ruta del script).
 * Un valor numérico inválido se ignora y queda el valor por defecto.
 */
export function parseArguments(args: string[]): CLIOptions {
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const siguiente = args[i + 1];

        switch (arg) {
            case '--playlist':
            case '-p':
                if (siguiente !== undefined) {
                    options.playlist = siguiente;
                    i++;
                }
                break;

            case '--export':
            case '-e':
                if (siguiente !== undefined) {
                    options.exportPath = siguiente;
                    i++;
                }
                break;

            case '--credentials':
            case '-c':
                if (siguiente !== undefined) {
                    options.credentialsPath = siguiente;
                    i++;
                }
                break;

            case '--top':
            case '-t': {
                const top = parsePositiveInt(siguiente);
                if (top !== undefined) {
                    options.topArtists = top;
                    i++;
                }
                break;
            }

            case '--bucket-width':
            case '-w': {
                const ancho = parsePositiveInt(siguiente, 100);
                if (ancho !== undefined) {
                    options.bucketWidth = ancho;
                    i++;
                }
                break;
            }

            case '--max-retries':
            case '-r': {
                const retries = parsePositiveInt(siguiente);
                if (retries !== undefined) {
                    options.maxRetries = retries;
                    i++;
                }
                break;
            }

            case '--help':
            case '-h':
                options.help = true;
                break;
        }
    }

    return options;
}
