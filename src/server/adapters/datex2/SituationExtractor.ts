/**
 * SituationExtractor - Turn a parsed DATEX2 SituationPublication into a flat
 * list of geolocated situations.
 *
 * One {@link Situation} is produced per situation record that can be placed
 * on a map. Records are dropped without error when they have no location
 * reference, no usable point, or no complete coordinate pair. Every other
 * missing field simply stays undefined.
 */

import { createChildLogger } from '../../utils/logger.js';
import type { Datex2Document } from './Datex2DocumentLoader.js';
import { DATEX2_ELEMENTS } from './namespaces.js';
import type { QualifiedName } from './namespaces.js';
import type { PointInfo, Situation } from './types.js';
import { findAllDescendants, findChild, findDescendant, getAttribute } from './XmlTree.js';
import type { XmlElement } from './XmlTree.js';

const logger = createChildLogger({ component: 'SituationExtractor' });

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a decimal number, returning undefined for empty or non-numeric text
 */
export function parseDecimal(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function childText(element: XmlElement, name: QualifiedName): string | undefined {
  return findChild(element, name)?.text;
}

function descendantText(element: XmlElement, name: QualifiedName): string | undefined {
  return findDescendant(element, name)?.text;
}

/**
 * Read coordinates and Spanish administrative data from a location point.
 * The coordinate block and the extension block are looked up independently.
 */
export function extractPointInfo(point: XmlElement): PointInfo {
  const info: PointInfo = {};

  const coordinates = findDescendant(point, DATEX2_ELEMENTS.pointCoordinates);
  if (coordinates) {
    info.latitude = parseDecimal(childText(coordinates, DATEX2_ELEMENTS.latitude));
    info.longitude = parseDecimal(childText(coordinates, DATEX2_ELEMENTS.longitude));
  }

  const extension = findDescendant(point, DATEX2_ELEMENTS.extendedTpegNonJunctionPoint);
  if (extension) {
    info.province = childText(extension, DATEX2_ELEMENTS.province);
    info.municipality = childText(extension, DATEX2_ELEMENTS.municipality);
    info.autonomousCommunity = childText(extension, DATEX2_ELEMENTS.autonomousCommunity);
    info.kmPoint = parseDecimal(childText(extension, DATEX2_ELEMENTS.kilometerPoint));
  }

  return info;
}

/**
 * Pick the point a record is plotted at: `from`, else `to`, else `point`
 */
export function selectLocationPoint(locationReference: XmlElement): XmlElement | undefined {
  return (
    findDescendant(locationReference, DATEX2_ELEMENTS.from) ??
    findDescendant(locationReference, DATEX2_ELEMENTS.to) ??
    findDescendant(locationReference, DATEX2_ELEMENTS.point)
  );
}

interface SituationContext {
  id: string;
  severity?: string;
}

type DropReason = 'noLocationReference' | 'noPoint' | 'noCoordinates';

type RecordOutcome =
  | { kind: 'emitted'; situation: Situation }
  | { kind: 'dropped'; reason: DropReason };

export class SituationExtractor {
  /**
   * Extract every geolocated situation record, in document order
   */
  extract(document: Datex2Document): Situation[] {
    const situations: Situation[] = [];
    const dropped: Record<DropReason, number> = { noLocationReference: 0, noPoint: 0, noCoordinates: 0 };
    let recordCount = 0;

    const situationElements = findAllDescendants(document.root, DATEX2_ELEMENTS.situation);

    for (const situationElement of situationElements) {
      const context = this.readSituationContext(situationElement);

      for (const record of findAllDescendants(situationElement, DATEX2_ELEMENTS.situationRecord)) {
        recordCount++;
        const outcome = this.extractRecord(record, context);
        if (outcome.kind === 'emitted') {
          situations.push(outcome.situation);
        } else {
          dropped[outcome.reason]++;
        }
      }
    }

    logger.debug(
      {
        situationElements: situationElements.length,
        records: recordCount,
        emitted: situations.length,
        dropped,
      },
      'Extracted situations from DATEX2 document'
    );

    return situations;
  }

  private readSituationContext(situationElement: XmlElement): SituationContext {
    const severityElement =
      findChild(situationElement, DATEX2_ELEMENTS.overallSeverity) ??
      findDescendant(situationElement, DATEX2_ELEMENTS.overallSeverity);

    return {
      id: getAttribute(situationElement, 'id') ?? '',
      severity: severityElement?.text,
    };
  }

  private extractRecord(record: XmlElement, context: SituationContext): RecordOutcome {
    const roadName = descendantText(record, DATEX2_ELEMENTS.roadName);
    const managementType = descendantText(record, DATEX2_ELEMENTS.managementType);
    const causeType = descendantText(record, DATEX2_ELEMENTS.causeType);

    const locationReference = findChild(record, DATEX2_ELEMENTS.locationReference);
    if (!locationReference) {
      return { kind: 'dropped', reason: 'noLocationReference' };
    }

    const point = selectLocationPoint(locationReference);
    if (!point) {
      return { kind: 'dropped', reason: 'noPoint' };
    }

    const { latitude, longitude, ...pointDetails } = extractPointInfo(point);
    if (latitude === undefined || longitude === undefined) {
      return { kind: 'dropped', reason: 'noCoordinates' };
    }

    const situation: Situation = Object.freeze({
      id: context.id,
      severity: context.severity,
      latitude,
      longitude,
      province: pointDetails.province,
      municipality: pointDetails.municipality,
      autonomousCommunity: pointDetails.autonomousCommunity,
      roadName,
      managementType,
      causeType,
      kmPoint: pointDetails.kmPoint,
    });

    return { kind: 'emitted', situation };
  }
}
