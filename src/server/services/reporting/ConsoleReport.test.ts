import { describe, it, expect } from 'vitest';
import type { Situation } from '../../adapters/datex2/types.js';
import { SituationStatistics } from '../statistics/SituationStatistics.js';
import { renderConsoleReport } from './ConsoleReport.js';

const RULE = '='.repeat(60);

function situation(id: string, fields: Partial<Situation> = {}): Situation {
  return { id, latitude: 40, longitude: -3, ...fields };
}

describe('renderConsoleReport', () => {
  it('prints the summary and every breakdown', () => {
    const stats = new SituationStatistics([
      situation('1', { province: 'Madrid', municipality: 'Alcobendas', autonomousCommunity: 'Comunidad de Madrid', severity: 'high', managementType: 'laneClosures' }),
      situation('2', { province: 'Madrid', municipality: 'Getafe', autonomousCommunity: 'Comunidad de Madrid', severity: 'high', managementType: 'roadClosed' }),
      situation('3', { province: 'Madrid', municipality: 'Alcobendas', autonomousCommunity: 'Comunidad de Madrid', severity: 'medium', managementType: 'laneClosures' }),
      situation('4', { province: 'Barcelona', municipality: 'Barcelona', autonomousCommunity: 'Cataluña', severity: 'low', managementType: 'laneClosures' }),
      situation('5'),
    ]);

    expect(renderConsoleReport(stats).split('\n')).toEqual([
      '',
      RULE,
      '📊 REPORTE DE INCIDENCIAS DE TRÁFICO - BALIZAS V16',
      RULE,
      '',
      '📈 RESUMEN GENERAL',
      '   • Total de incidencias: 5',
      '   • Provincias afectadas: 3',
      '   • CCAA afectadas: 3',
      '   • Municipios afectados: 4',
      '',
      '⚠️ DISTRIBUCIÓN POR SEVERIDAD',
      '   • Alta: 2 (40.0%)',
      '   • Sin especificar: 1 (20.0%)',
      '   • Baja: 1 (20.0%)',
      '   • Media: 1 (20.0%)',
      '',
      '🏛️ TOP 10 PROVINCIAS CON MÁS INCIDENCIAS',
      '    1. Madrid: 3 incidencias (2 municipios)',
      '    2. Barcelona: 1 incidencias (1 municipios)',
      '    3. Sin especificar: 1 incidencias (1 municipios)',
      '',
      '🔧 TIPO DE INCIDENCIA',
      '   • Cierre de carril: 3 (60.0%)',
      '   • Sin especificar: 1 (20.0%)',
      '   • Carretera cerrada: 1 (20.0%)',
      '',
      RULE,
    ]);
  });

  it('lists at most ten provinces', () => {
    const situations = Array.from({ length: 12 }, (_, index) => {
      const province = `P${String(index + 1).padStart(2, '0')}`;
      return situation(province, { province });
    });

    const lines = renderConsoleReport(new SituationStatistics(situations)).split('\n');
    const provinceLines = lines.filter(line => line.includes(' incidencias ('));

    expect(provinceLines).toHaveLength(10);
    expect(provinceLines[0]).toBe('    1. P01: 1 incidencias (1 municipios)');
    expect(provinceLines[9]).toBe('   10. P10: 1 incidencias (1 municipios)');
  });
});
