import { createSpinner } from 'nanospinner';
import chalk from 'chalk';
import { AnalysisResult, PopularityBucket } from '../models/Analysis.js';
import { topArtists } from '../services/AggregationEngine.js';

type Spinner = ReturnType<typeof createSpinner>;

const ANCHO_BARRA = 30;

export function formatBucketLabel(bucket: PopularityBucket): string {
  return `${bucket.min}-${bucket.max}${bucket.inclusiveMax ? ']' : ')'}`;
}

/**
 * Barra proporcional al bucket con más canciones
 */
export function renderBar(count: number, maxCount: number, width: number = ANCHO_BARRA): string {
  if (maxCount === 0 || count === 0) {
    return '';
  }
  return '█'.repeat(Math.max(1, Math.round((count / maxCount) * width)));
}

export function formatDuration(durationMs: number): string {
  const totalSegundos = Math.round(durationMs / 1000);
  const horas = Math.floor(totalSegundos / 3600);
  const minutos = Math.floor((totalSegundos % 3600) / 60);
  const segundos = totalSegundos % 60;
  const mmss = `${String(minutos).padStart(horas > 0 ? 2 : 1, '0')}:${String(segundos).padStart(2, '0')}`;
  return horas > 0 ? `${horas}:${mmss}` : mmss;
}

export class ProgressReporter {
  private spinner?: Spinner;
  private startTime: Date;
  private isActive: boolean = false;

  constructor() {
    this.startTime = new Date();
  }

  startProgress(operation: string = 'Obteniendo playlist'): void {
    this.startTime = new Date();
    this.isActive = true;

    this.spinner = createSpinner(`${operation}...`);
    this.spinner.start();
  }

  /**
   * Actualizar el spinner con las canciones obtenidas hasta ahora
   */
  updateProgress(obtenidas: number, total: number): void {
    if (!this.isActive || !this.spinner) {
      return;
    }

    const percentage = total > 0 ? Math.round((obtenidas / total) * 100) : 100;
    this.spinner.update({ text: `Obteniendo ${obtenidas}/${total} canciones (${percentage}%)...` });
  }

  finishProgress(resultado: AnalysisResult): void {
    if (!this.isActive || !this.spinner) {
      return;
    }

    this.isActive = false;
    const segundos = Math.round(this.getElapsedTime() / 1000);
    this.spinner.success({
      text: `✅ ${resultado.tracks.length} canciones analizadas en ${segundos}s`
    });
  }

  failProgress(mensaje: string): void {
    if (!this.isActive || !this.spinner) {
      return;
    }

    this.isActive = false;
    this.spinner.error({ text: `❌ ${mensaje}` });
  }

  /**
   * Mostrar el resumen del análisis: metadata, estadísticas, histograma y ranking de artistas
   */
  displayAnalysis(resultado: AnalysisResult, topN: number): void {
    const { metadata, popularity } = resultado;

    console.log('\n' + chalk.bold.green(`🎵 ${metadata.name}`));
    console.log('═'.repeat(50));
    console.log(`   Dueño: ${chalk.cyan(metadata.ownerName)}`);
    console.log(`   Canciones declaradas: ${chalk.cyan(metadata.trackCount)}`);
    console.log(`   Canciones analizadas: ${chalk.green(resultado.tracks.length)}`);
    if (resultado.skipped.length > 0) {
      console.log(`   Omitidas (no disponibles): ${chalk.yellow(resultado.skipped.length)}`);
    }
    if (metadata.description) {
      const descripcion = metadata.description.length > 50
        ? metadata.description.slice(0, 50) + '...'
        : metadata.description;
      console.log(`   Descripción: ${chalk.gray(descripcion)}`);
    }

    console.log(chalk.bold('\n📊 Popularidad:'));
    if (popularity) {
      console.log(`   Promedio: ${chalk.cyan(popularity.mean.toFixed(2))}   Mediana: ${chalk.cyan(popularity.median.toFixed(2))}`);
      console.log(`   Mínima: ${chalk.cyan(popularity.min)}   Máxima: ${chalk.cyan(popularity.max)}`);
    } else {
      console.log(chalk.gray('   La playlist no tiene canciones'));
    }

    const maxCount = Math.max(0, ...resultado.buckets.map(b => b.count));
    console.log(chalk.bold('\n📈 Distribución:'));
    for (const bucket of resultado.buckets) {
      const etiqueta = formatBucketLabel(bucket).padStart(8);
      console.log(`   ${etiqueta} ${chalk.green(renderBar(bucket.count, maxCount))} ${bucket.count}`);
    }

    const ranking = topArtists(resultado.artists, topN);
    console.log(chalk.bold(`\n🎤 Top ${ranking.length} artistas:`));
    if (ranking.length === 0) {
      console.log(chalk.gray('   Sin artistas'));
    }
    ranking.forEach((artista, index) => {
      console.log(`   ${String(index + 1).padStart(2)}. ${artista.name} ${chalk.gray(`(${artista.count})`)}`);
    });

    const duracionTotal = resultado.tracks.reduce((acc, t) => acc + t.durationMs, 0);
    console.log(chalk.bold('\n⏱️ Duración total: ') + chalk.yellow(formatDuration(duracionTotal)));
    console.log('\n' + '═'.repeat(50));
  }

  stop(): void {
    if (this.isActive && this.spinner) {
      this.spinner.stop();
      this.isActive = false;
    }
  }

  getElapsedTime(): number {
    return Date.now() - this.startTime.getTime();
  }
}
