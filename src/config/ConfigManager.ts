import { promises as fs, constants } from 'fs';
import { Credentials } from '../models/Auth.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';

export interface ValidationResult {
  isValid: boolean;
  missingFields: string[];
  errors: string[];
}

const REQUIRED_FIELDS = ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'] as const;

type CredentialField = typeof REQUIRED_FIELDS[number];

export class ConfigManager {
  /**
   * Obtiene la ruta por defecto del archivo de credenciales
   */
  getDefaultCredentialsPath(): string {
    return ConfigPaths.getCredentialsPath();
  }

  /**
   * Crea el archivo de credenciales template
   */
  async createCredentialsTemplate(filePath?: string): Promise<string> {
    try {
      return ConfigPaths.createCredentialsTemplate(filePath || this.getDefaultCredentialsPath());
    } catch (error) {
      throw new Error(`Error al crear el template de credenciales: ${error instanceof Error ? error.message : 'Error desconocido'}`);
    }
  }

  async checkCredentialsExistAsync(filePath?: string): Promise<boolean> {
    const credentialsPath = filePath || this.getDefaultCredentialsPath();
    try {
      await fs.access(credentialsPath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async validateCredentialsFile(filePath: string): Promise<ValidationResult> {
    const result: ValidationResult = {
      isValid: true,
      missingFields: [],
      errors: []
    };

    if (!(await this.checkCredentialsExistAsync(filePath))) {
      result.isValid = false;
      result.errors.push('El archivo de credenciales no existe');
      return result;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      result.isValid = false;
      result.errors.push(`No se pudo leer el archivo de credenciales: ${error instanceof Error ? error.message : 'Error desconocido'}`);
      return result;
    }

    for (const field of REQUIRED_FIELDS) {
      const value = this.extractValue(content, field);
      const isPlaceholder = value === undefined || value === '' || value.includes('your_') || value.includes('tu_') || value.includes('_aqui') || value.includes('_here');

      if (isPlaceholder) {
        result.missingFields.push(field);
        result.isValid = false;
      }
    }

    if (result.missingFields.length > 0) {
      result.errors.push(`Credenciales faltantes o vacías: ${result.missingFields.join(', ')}`);
    }

    return result;
  }

  /**
   * Parsea las credenciales del archivo y devuelve un objeto Credentials
   */
  async parseCredentials(filePath: string): Promise<Credentials> {
    const validation = await this.validateCredentialsFile(filePath);
    if (!validation.isValid) {
      throw new Error(`Archivo de credenciales inválido: ${validation.errors.join(', ')}`);
    }

    const content = await fs.readFile(filePath, 'utf8');

    return {
      spotifyClientId: this.extractValue(content, 'SPOTIFY_CLIENT_ID') ?? '',
      spotifyClientSecret: this.extractValue(content, 'SPOTIFY_CLIENT_SECRET') ?? ''
    };
  }

  /**
   * Valor de una línea KEY = VALUE; ignora comentarios y mayúsculas en la clave
   */
  private extractValue(content: string, field: CredentialField): string | undefined {
    const regex = new RegExp(`^\\s*${field}\\s*=\\s*(.*)$`, 'i');

    for (const line of content.split(/\r?\n/)) {
      if (line.trim().startsWith('#')) {
        continue;
      }
      const match = regex.exec(line);
      if (match) {
        return match[1] ? match[1].trim() : '';
      }
    }

    return undefined;
  }
}
