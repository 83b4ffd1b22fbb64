/**
 * Shared display constants for DATEX2 situation reports and maps
 *
 * Raw DATEX2 codes are kept in the data; these tables only translate them
 * for people reading the Spanish-language output.
 */

/**
 * Placeholder used when a grouped field has no value
 */
export const UNSPECIFIED_LABEL = 'Sin especificar';

/**
 * overallSeverity codes
 */
export const SEVERITY_LABELS: Readonly<Record<string, string>> = {
  low: 'Baja',
  medium: 'Media',
  high: 'Alta',
  highest: 'Muy Alta',
};

/**
 * roadOrCarriagewayOrLaneManagementType codes
 */
export const MANAGEMENT_TYPE_LABELS: Readonly<Record<string, string>> = {
  laneClosures: 'Cierre de carril',
  roadClosed: 'Carretera cerrada',
  singleAlternateLineTraffic: 'Tráfico alterno',
  other: 'Otro',
};

/**
 * causeType codes
 */
export const CAUSE_TYPE_LABELS: Readonly<Record<string, string>> = {
  roadMaintenance: 'Mantenimiento de vía',
  roadOrCarriagewayOrLaneManagement: 'Gestión de tráfico',
};

/**
 * Marker colours by severity (Leaflet/CSS colour names)
 */
export const SEVERITY_COLORS: Readonly<Record<string, string>> = {
  low: 'green',
  medium: 'orange',
  high: 'red',
  highest: 'darkred',
};

export const DEFAULT_SEVERITY_COLOR = 'blue';

/**
 * Map defaults: centre of mainland Spain
 */
export const MAP_DEFAULTS = {
  CENTER: [40.4168, -3.7038],
  ZOOM: 6,
} as const;

/**
 * Translate a code with a label table, falling back on the raw code
 */
export function labelFor(
  labels: Readonly<Record<string, string>>,
  code: string | undefined,
  fallback: string
): string {
  if (code === undefined) {
    return fallback;
  }
  return Object.prototype.hasOwnProperty.call(labels, code) ? labels[code] : code;
}
