/**
 * Plain-text incident report for terminal output
 */

import { SEVERITY_LABELS, UNSPECIFIED_LABEL, labelFor } from '../../../shared/constants.js';
import { formatPercentage } from '../statistics/SituationStatistics.js';
import type { SituationStatistics } from '../statistics/SituationStatistics.js';

const RULE = '='.repeat(60);
const TOP_PROVINCES = 10;

export function renderConsoleReport(stats: SituationStatistics): string {
  const lines: string[] = [];
  const summary = stats.summary();

  lines.push('', RULE, '📊 REPORTE DE INCIDENCIAS DE TRÁFICO - BALIZAS V16', RULE);

  lines.push('', '📈 RESUMEN GENERAL');
  lines.push(`   • Total de incidencias: ${summary.totalIncidents}`);
  lines.push(`   • Provincias afectadas: ${summary.affectedProvinces}`);
  lines.push(`   • CCAA afectadas: ${summary.affectedCommunities}`);
  lines.push(`   • Municipios afectados: ${summary.affectedMunicipalities}`);

  lines.push('', '⚠️ DISTRIBUCIÓN POR SEVERIDAD');
  for (const row of stats.bySeverity()) {
    const name = labelFor(SEVERITY_LABELS, row.severity, UNSPECIFIED_LABEL);
    lines.push(`   • ${name}: ${row.total} (${formatPercentage(row.percentage)})`);
  }

  lines.push('', `🏛️ TOP ${TOP_PROVINCES} PROVINCIAS CON MÁS INCIDENCIAS`);
  stats.byProvince().slice(0, TOP_PROVINCES).forEach((row, index) => {
    const position = String(index + 1).padStart(2, ' ');
    lines.push(`   ${position}. ${row.province}: ${row.totalIncidents} incidencias (${row.affectedMunicipalities} municipios)`);
  });

  lines.push('', '🔧 TIPO DE INCIDENCIA');
  for (const row of stats.byManagementType()) {
    lines.push(`   • ${row.label}: ${row.total} (${formatPercentage(row.percentage)})`);
  }

  lines.push('', RULE);

  return lines.join('\n');
}
