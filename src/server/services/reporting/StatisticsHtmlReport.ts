/**
 * Standalone HTML page with the incident statistics
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { SEVERITY_LABELS, UNSPECIFIED_LABEL, labelFor } from '../../../shared/constants.js';
import { escapeHtml } from '../../utils/html.js';
import { logger } from '../../utils/logger.js';
import { formatPercentage } from '../statistics/SituationStatistics.js';
import type { SituationStatistics } from '../statistics/SituationStatistics.js';

const TOP_PROVINCES = 15;

const STYLES = `
        body {
            font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif;
            margin: 0;
            padding: 20px;
            background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%);
            min-height: 100vh;
            color: #fff;
        }
        .container { max-width: 1200px; margin: 0 auto; }
        h1 {
            text-align: center;
            color: #00d4ff;
            margin-bottom: 30px;
        }
        .summary-grid {
            display: grid;
            grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
            gap: 20px;
            margin-bottom: 40px;
        }
        .summary-card {
            background: rgba(255, 255, 255, 0.1);
            border-radius: 15px;
            padding: 25px;
            text-align: center;
            border: 1px solid rgba(255, 255, 255, 0.2);
        }
        .summary-card .number { font-size: 3em; font-weight: bold; color: #00d4ff; margin-bottom: 10px; }
        .summary-card .label { color: #aaa; font-size: 0.9em; text-transform: uppercase; }
        .section {
            background: rgba(255, 255, 255, 0.05);
            border-radius: 15px;
            padding: 25px;
            margin-bottom: 25px;
            border: 1px solid rgba(255, 255, 255, 0.1);
        }
        .section h2 { color: #00d4ff; margin-top: 0; padding-bottom: 10px; }
        table { width: 100%; border-collapse: collapse; }
        th, td { padding: 12px 15px; text-align: left; border-bottom: 1px solid rgba(255, 255, 255, 0.1); }
        th { background: rgba(0, 212, 255, 0.2); color: #00d4ff; font-weight: 600; }
        .severity-low { color: #28a745; }
        .severity-medium { color: #ffc107; }
        .severity-high { color: #fd7e14; }
        .severity-highest { color: #dc3545; }`;

function cell(value: string | number): string {
  return `<td>${escapeHtml(String(value))}</td>`;
}

function summaryCard(value: number, label: string): string {
  return `<div class="summary-card"><div class="number">${value}</div><div class="label">${escapeHtml(label)}</div></div>`;
}

function table(headers: string[], rows: string[]): string {
  const head = headers.map(header => `<th>${escapeHtml(header)}</th>`).join('');
  return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${rows.join('\n')}\n</tbody>\n</table>`;
}

export function renderStatisticsHtml(stats: SituationStatistics): string {
  const summary = stats.summary();

  const provinceRows = stats
    .byProvince()
    .slice(0, TOP_PROVINCES)
    .map((row, index) => `<tr>${cell(index + 1)}${cell(row.province)}${cell(row.totalIncidents)}${cell(row.affectedMunicipalities)}</tr>`);

  const severityRows = stats.bySeverity().map(row => {
    const name = labelFor(SEVERITY_LABELS, row.severity, UNSPECIFIED_LABEL);
    const cssClass = `severity-${row.severity.replace(/[^A-Za-z0-9_-]/g, '-')}`;
    return `<tr><td class="${escapeHtml(cssClass)}">${escapeHtml(name)}</td>${cell(row.total)}${cell(formatPercentage(row.percentage))}</tr>`;
  });

  const communityRows = stats
    .byAutonomousCommunity()
    .map(row => `<tr>${cell(row.autonomousCommunity)}${cell(row.totalIncidents)}${cell(row.affectedProvinces)}</tr>`);

  return `<!DOCTYPE html>
<html lang="es">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Estadísticas Balizas V16</title>
    <style>${STYLES}
    </style>
</head>
<body>
    <div class="container">
        <h1>📊 Estadísticas de Incidencias - Balizas V16</h1>
        <div class="summary-grid">
${[
    summaryCard(summary.totalIncidents, 'Total Incidencias'),
    summaryCard(summary.affectedProvinces, 'Provincias Afectadas'),
    summaryCard(summary.affectedCommunities, 'CCAA Afectadas'),
    summaryCard(summary.affectedMunicipalities, 'Municipios Afectados'),
  ].join('\n')}
        </div>
        <div class="section">
            <h2>🏛️ Incidencias por Provincia</h2>
${table(['#', 'Provincia', 'Total Incidencias', 'Municipios Afectados'], provinceRows)}
        </div>
        <div class="section">
            <h2>⚠️ Distribución por Severidad</h2>
${table(['Severidad', 'Total', 'Porcentaje'], severityRows)}
        </div>
        <div class="section">
            <h2>🗺️ Incidencias por Comunidad Autónoma</h2>
${table(['Comunidad Autónoma', 'Total Incidencias', 'Provincias Afectadas'], communityRows)}
        </div>
    </div>
</body>
</html>
`;
}

/**
 * Render the report and write it to disk
 *
 * @returns Absolute path of the written file
 */
export async function writeStatisticsHtml(stats: SituationStatistics, filePath: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  await writeFile(resolvedPath, renderStatisticsHtml(stats), 'utf-8');
  logger.info({ path: resolvedPath, situations: stats.size }, 'Wrote statistics HTML report');
  return resolvedPath;
}
