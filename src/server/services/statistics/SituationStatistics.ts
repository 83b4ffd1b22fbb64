/**
 * SituationStatistics - Aggregate extracted situations for reporting
 *
 * Missing values are grouped under {@link UNSPECIFIED_LABEL}, so they count
 * as a group of their own (and as one distinct value in summaries).
 */

import type { Situation } from '../../adapters/datex2/types.js';
import { MANAGEMENT_TYPE_LABELS, UNSPECIFIED_LABEL, labelFor } from '../../../shared/constants.js';

export interface StatisticsSummary {
  totalIncidents: number;
  affectedProvinces: number;
  affectedCommunities: number;
  affectedMunicipalities: number;
}

export interface ProvinceStatistics {
  province: string;
  totalIncidents: number;
  affectedMunicipalities: number;
}

export interface SeverityStatistics {
  severity: string;
  total: number;
  percentage: number;
}

export interface AutonomousCommunityStatistics {
  autonomousCommunity: string;
  totalIncidents: number;
  affectedProvinces: number;
}

export interface ManagementTypeStatistics {
  managementType: string;
  label: string;
  total: number;
  percentage: number;
}

/**
 * A situation with every grouped field filled in
 */
interface SituationRow {
  severity: string;
  province: string;
  municipality: string;
  autonomousCommunity: string;
  managementType: string;
}

type GroupField = keyof SituationRow;

interface Group {
  key: string;
  rows: SituationRow[];
}

function toRow(situation: Situation): SituationRow {
  return {
    severity: situation.severity ?? UNSPECIFIED_LABEL,
    province: situation.province ?? UNSPECIFIED_LABEL,
    municipality: situation.municipality ?? UNSPECIFIED_LABEL,
    autonomousCommunity: situation.autonomousCommunity ?? UNSPECIFIED_LABEL,
    managementType: situation.managementType ?? UNSPECIFIED_LABEL,
  };
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function distinctCount(rows: readonly SituationRow[], field: GroupField): number {
  return new Set(rows.map(row => row[field])).size;
}

/**
 * Round a share of the total to one decimal place
 */
export function percentageOf(count: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((count / total) * 1000) / 10;
}

/**
 * Render a percentage with exactly one decimal, e.g. `50.0%`
 */
export function formatPercentage(percentage: number): string {
  return `${percentage.toFixed(1)}%`;
}

export class SituationStatistics {
  private readonly rows: readonly SituationRow[];

  constructor(situations: readonly Situation[]) {
    this.rows = situations.map(toRow);
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * Groups ordered by size (largest first), ties broken by key
   */
  private groupBy(field: GroupField): Group[] {
    const groups = new Map<string, SituationRow[]>();
    for (const row of this.rows) {
      const key = row[field];
      const members = groups.get(key);
      if (members) {
        members.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    return Array.from(groups, ([key, rows]) => ({ key, rows })).sort(
      (a, b) => b.rows.length - a.rows.length || compareKeys(a.key, b.key)
    );
  }

  summary(): StatisticsSummary {
    return {
      totalIncidents: this.rows.length,
      affectedProvinces: distinctCount(this.rows, 'province'),
      affectedCommunities: distinctCount(this.rows, 'autonomousCommunity'),
      affectedMunicipalities: distinctCount(this.rows, 'municipality'),
    };
  }

  byProvince(): ProvinceStatistics[] {
    return this.groupBy('province').map(group => ({
      province: group.key,
      totalIncidents: group.rows.length,
      affectedMunicipalities: distinctCount(group.rows, 'municipality'),
    }));
  }

  bySeverity(): SeverityStatistics[] {
    return this.groupBy('severity').map(group => ({
      severity: group.key,
      total: group.rows.length,
      percentage: percentageOf(group.rows.length, this.rows.length),
    }));
  }

  byAutonomousCommunity(): AutonomousCommunityStatistics[] {
    return this.groupBy('autonomousCommunity').map(group => ({
      autonomousCommunity: group.key,
      totalIncidents: group.rows.length,
      affectedProvinces: distinctCount(group.rows, 'province'),
    }));
  }

  byManagementType(): ManagementTypeStatistics[] {
    return this.groupBy('managementType').map(group => ({
      managementType: group.key,
      label: labelFor(MANAGEMENT_TYPE_LABELS, group.key, UNSPECIFIED_LABEL),
      total: group.rows.length,
      percentage: percentageOf(group.rows.length, this.rows.length),
    }));
  }
}
