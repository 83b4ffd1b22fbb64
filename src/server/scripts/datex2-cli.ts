#!/usr/bin/env node
/**
 * DATEX2 Situations CLI
 *
 * Downloads (or reads) the DGT DATEX2 situation feed, prints incident
 * statistics and writes an interactive map.
 *
 * Usage:
 *   tsx src/server/scripts/datex2-cli.ts [options]
 *
 * Options:
 *   --local[=<path>]        Read a local XML file instead of downloading
 *   --no-stats              Do not print statistics
 *   --stats-html[=<path>]   Also write an HTML statistics report
 *   --output=<path>         Map output file
 *   --geojson=<path>        Also write the situations as GeoJSON
 *   --no-cluster            Disable marker clustering on the map
 *   --help                  Show this help
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { Datex2Parser } from '../adapters/datex2/index.js';
import { getEnv } from '../config/env.js';
import { SituationMapBuilder } from '../services/map/SituationMapBuilder.js';
import { writeGeoJson } from '../services/map/situationGeoJson.js';
import { renderConsoleReport } from '../services/reporting/ConsoleReport.js';
import { writeStatisticsHtml } from '../services/reporting/StatisticsHtmlReport.js';
import { SituationStatistics } from '../services/statistics/SituationStatistics.js';
import { logger } from '../utils/logger.js';

export const USAGE = `Usage: datex2-situations [options]

Options:
  --local[=<path>]        Read a local XML file instead of downloading
  --no-stats              Do not print statistics
  --stats-html[=<path>]   Also write an HTML statistics report
  --output=<path>         Map output file
  --geojson=<path>        Also write the situations as GeoJSON
  --no-cluster            Disable marker clustering on the map
  --help                  Show this help`;

export interface CliOptions {
  /** Local file to read; undefined means download the feed */
  localFile?: string;
  stats: boolean;
  /** HTML statistics report path; undefined means no report */
  statsHtml?: string;
  output: string;
  geojson?: string;
  clustering: boolean;
  help: boolean;
}

export interface CliDefaults {
  localFile: string;
  output: string;
  statsHtml: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function splitFlag(arg: string): { flag: string; value?: string } {
  const index = arg.indexOf('=');
  if (index === -1) {
    return { flag: arg };
  }
  return { flag: arg.slice(0, index), value: arg.slice(index + 1) };
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) {
    throw new CliUsageError(`${flag} requires a value (${flag}=<path>)`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws CliUsageError on unknown flags or missing values
 */
export function parseCliArgs(args: string[], defaults: CliDefaults): CliOptions {
  const options: CliOptions = {
    stats: true,
    output: defaults.output,
    clustering: true,
    help: false,
  };

  for (const arg of args) {
    const { flag, value } = splitFlag(arg);

    switch (flag) {
      case '--local':
        options.localFile = value || defaults.localFile;
        break;
      case '--no-stats':
        options.stats = false;
        break;
      case '--stats-html':
        options.statsHtml = value || defaults.statsHtml;
        break;
      case '--output':
        options.output = requireValue(flag, value);
        break;
      case '--geojson':
        options.geojson = requireValue(flag, value);
        break;
      case '--no-cluster':
        options.clustering = false;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Run the pipeline end to end
 *
 * @returns Process exit code
 */
export async function runCli(args: string[], parser: Datex2Parser = new Datex2Parser()): Promise<number> {
  const env = getEnv();

  let options: CliOptions;
  try {
    options = parseCliArgs(args, {
      localFile: env.DATEX2_LOCAL_FILE,
      output: env.MAP_OUTPUT_FILE,
      statsHtml: env.STATS_HTML_OUTPUT_FILE,
    });
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  console.log('🚀 Iniciando sistema de visualización V16...');

  // 1. Load data
  try {
    if (options.localFile) {
      console.log(`📂 Cargando datos desde archivo local ${options.localFile}...`);
      await parser.loadFromFile(options.localFile);
    } else {
      console.log('🌐 Descargando datos de la DGT...');
      await parser.fetchData();
    }
  } catch (error) {
    console.error(`❌ Error al cargar datos: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  // 2. Parse XML
  console.log('📄 Parseando XML DATEX2...');
  await parser.parseXml();
  const situations = parser.getSituations();
  console.log(`✅ Se encontraron ${situations.length} situaciones`);

  if (situations.length === 0) {
    console.log('⚠️ No se encontraron situaciones. Saliendo...');
    return 0;
  }

  // 3. Statistics
  if (options.stats) {
    const stats = new SituationStatistics(situations);
    console.log(renderConsoleReport(stats));

    if (options.statsHtml) {
      const statsFile = await writeStatisticsHtml(stats, options.statsHtml);
      console.log(`\n📊 Reporte HTML guardado en: ${statsFile}`);
    }
  }

  if (options.geojson) {
    const geojsonFile = await writeGeoJson(situations, options.geojson);
    console.log(`🧭 GeoJSON guardado en: ${geojsonFile}`);
  }

  // 4. Map
  console.log('\n🗺️ Generando mapa interactivo...');
  const builder = new SituationMapBuilder(situations);
  builder.build({ clustering: options.clustering });
  const mapFile = await builder.save(options.output);
  console.log(`✅ Mapa guardado en: ${mapFile}`);

  console.log('\n🎉 ¡Proceso completado!');
  console.log(`   Abre ${mapFile} en tu navegador para ver el mapa.`);

  return 0;
}

// Run if called directly, through tsx or the installed bin link
const invokedAs = path.basename(process.argv[1] ?? '');
if (
  process.argv[1] === fileURLToPath(import.meta.url) ||
  invokedAs.startsWith('datex2-cli') ||
  invokedAs === 'datex2-situations'
) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'DATEX2 CLI failed');
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}
