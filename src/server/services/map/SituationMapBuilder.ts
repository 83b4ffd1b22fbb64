/**
 * SituationMapBuilder - Interactive Leaflet map of traffic situations
 *
 * Produces a single self-contained HTML page; Leaflet and the marker
 * cluster plugin are loaded from a CDN when the page is opened.
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import type { Situation, SituationSeverity } from '../../adapters/datex2/types.js';
import {
  CAUSE_TYPE_LABELS,
  DEFAULT_SEVERITY_COLOR,
  MANAGEMENT_TYPE_LABELS,
  MAP_DEFAULTS,
  SEVERITY_COLORS,
  SEVERITY_LABELS,
  labelFor,
} from '../../../shared/constants.js';
import { escapeHtml, toScriptJson } from '../../utils/html.js';
import { logger } from '../../utils/logger.js';

const LEAFLET_VERSION = '1.9.4';
const MARKERCLUSTER_VERSION = '1.5.3';

const LEGEND_ORDER: readonly SituationSeverity[] = ['low', 'medium', 'high', 'highest'];

export interface MapOptions {
  /** Group nearby markers into clusters (default: true) */
  clustering?: boolean;
  title?: string;
}

/**
 * Marker data embedded in the page
 */
export interface MapMarker {
  lat: number;
  lng: number;
  color: string;
  tooltip: string;
  popup: string;
}

export function severityColor(severity: string | undefined): string {
  if (severity !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY_COLORS, severity)) {
    return SEVERITY_COLORS[severity];
  }
  return DEFAULT_SEVERITY_COLOR;
}

function popupRow(label: string, value: string): string {
  return `<tr><td style="padding: 3px 0;"><strong>${label}</strong></td><td>${value}</td></tr>`;
}

/**
 * Popup body for one situation; every value is HTML escaped
 */
export function renderPopupHtml(situation: Situation): string {
  const text = (value: string | undefined, fallback: string = 'N/A'): string => escapeHtml(value ?? fallback);

  const severity = escapeHtml(labelFor(SEVERITY_LABELS, situation.severity, 'No especificada'));
  const managementType = escapeHtml(labelFor(MANAGEMENT_TYPE_LABELS, situation.managementType, 'No especificado'));
  const causeType = escapeHtml(labelFor(CAUSE_TYPE_LABELS, situation.causeType, 'No especificada'));
  const kmPoint = situation.kmPoint !== undefined ? String(situation.kmPoint) : 'N/A';

  return [
    '<div style="font-family: Arial, sans-serif; min-width: 250px;">',
    `<h4 style="margin: 0 0 10px 0; color: #333; border-bottom: 2px solid #007bff; padding-bottom: 5px;">🚧 ${text(situation.roadName, 'Carretera sin nombre')}</h4>`,
    '<table style="width: 100%; font-size: 13px;">',
    popupRow('📍 Ubicación:', `${text(situation.municipality)}, ${text(situation.province)}`),
    popupRow('🏛️ CCAA:', text(situation.autonomousCommunity)),
    popupRow(
      '⚠️ Severidad:',
      `<span style="color: ${severityColor(situation.severity)}; font-weight: bold;">${severity}</span>`
    ),
    popupRow('🔧 Tipo:', managementType),
    popupRow('📋 Causa:', causeType),
    popupRow('📏 PK:', kmPoint),
    '</table>',
    `<div style="margin-top: 8px; font-size: 11px; color: #666;">ID: ${escapeHtml(situation.id)}</div>`,
    '</div>',
  ].join('');
}

export function toMapMarker(situation: Situation): MapMarker {
  return {
    lat: situation.latitude,
    lng: situation.longitude,
    color: severityColor(situation.severity),
    // Leaflet renders tooltip strings as HTML
    tooltip: escapeHtml(`${situation.roadName ?? 'Sin nombre'} - ${situation.severity ?? 'Sin severidad'}`),
    popup: renderPopupHtml(situation),
  };
}

function legendEntry(color: string, label: string): string {
  return `<div style="margin: 5px 0;"><span style="background-color: ${color}; width: 15px; height: 15px; display: inline-block; border-radius: 50%; margin-right: 8px;"></span>${label}</div>`;
}

function renderLegend(): string {
  const entries = LEGEND_ORDER.map(severity =>
    legendEntry(SEVERITY_COLORS[severity], SEVERITY_LABELS[severity])
  );

  return [
    '<div class="legend" style="position: fixed; bottom: 50px; left: 50px; z-index: 1000; background-color: white; padding: 15px; border-radius: 8px; box-shadow: 0 2px 10px rgba(0,0,0,0.2); font-family: Arial, sans-serif; font-size: 13px;">',
    '<h4 style="margin: 0 0 10px 0; font-size: 14px;">🚦 Severidad</h4>',
    ...entries,
    '</div>',
  ].join('\n');
}

export class SituationMapBuilder {
  private html: string | null = null;

  constructor(private readonly situations: readonly Situation[]) {}

  /**
   * Render the map page
   */
  build(options: MapOptions = {}): string {
    const clustering = options.clustering ?? true;
    const title = options.title ?? 'Mapa de incidencias - Balizas V16';
    const markers = this.situations.map(toMapMarker);
    const [centerLat, centerLng] = MAP_DEFAULTS.CENTER;

    const clusterAssets = clustering
      ? `
    <link rel="stylesheet" href="https://unpkg.com/leaflet.markercluster@${MARKERCLUSTER_VERSION}/dist/MarkerCluster.css">
    <link rel="stylesheet" href="https://unpkg.com/leaflet.markercluster@${MARKERCLUSTER_VERSION}/dist/MarkerCluster.Default.css">
    <script src="https://unpkg.com/leaflet.markercluster@${MARKERCLUSTER_VERSION}/dist/leaflet.markercluster.js"></script>`
      : '';

    this.html = `<!DOCTYPE html>
<html lang="es">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
    <link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css">
    <script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>${clusterAssets}
    <style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
    <div id="map"></div>
${renderLegend()}
    <script>
        const markers = ${toScriptJson(markers)};
        const clustering = ${clustering ? 'true' : 'false'};

        const osm = L.tileLayer('https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png', {
            maxZoom: 19,
            attribution: '&copy; OpenStreetMap contributors'
        });
        const positron = L.tileLayer('https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}{r}.png', {
            maxZoom: 20,
            attribution: '&copy; OpenStreetMap contributors &copy; CARTO'
        });

        const map = L.map('map', { center: [${centerLat}, ${centerLng}], zoom: ${MAP_DEFAULTS.ZOOM}, layers: [osm] });
        const incidents = clustering ? L.markerClusterGroup() : L.layerGroup();

        for (const marker of markers) {
            L.circleMarker([marker.lat, marker.lng], {
                radius: 8,
                color: marker.color,
                fillColor: marker.color,
                fillOpacity: 0.8,
                weight: 1
            })
                .bindTooltip(marker.tooltip)
                .bindPopup(marker.popup, { maxWidth: 350 })
                .addTo(incidents);
        }

        incidents.addTo(map);
        L.control.layers(
            { 'OpenStreetMap': osm, 'CartoDB Positron': positron },
            { 'Incidencias': incidents }
        ).addTo(map);
    </script>
</body>
</html>
`;

    logger.debug({ markers: markers.length, clustering }, 'Built situation map');
    return this.html;
  }

  /**
   * Write the map to disk, building it with default options if needed
   *
   * @returns Absolute path of the written file
   */
  async save(filePath: string): Promise<string> {
    const html = this.html ?? this.build();
    const resolvedPath = path.resolve(filePath);
    await writeFile(resolvedPath, html, 'utf-8');
    logger.info({ path: resolvedPath, situations: this.situations.length }, 'Saved situation map');
    return resolvedPath;
  }
}
