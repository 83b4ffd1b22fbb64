/**
 * DATEX2 v3 namespace URIs used by the DGT SituationPublication feed.
 *
 * Elements are matched by URI, never by prefix: publishers are free to
 * bind these namespaces to any prefix.
 */
export const DATEX2_NAMESPACES = {
  payload: 'http://levelC/schema/3/d2Payload',
  situation: 'http://levelC/schema/3/situation',
  locationReferencing: 'http://levelC/schema/3/locationReferencing',
  common: 'http://levelC/schema/3/common',
  spanishLocationExtension: 'http://levelC/schema/3/locationReferencingSpanishExtension',
} as const;

export type Datex2Namespace = (typeof DATEX2_NAMESPACES)[keyof typeof DATEX2_NAMESPACES];

/**
 * A namespace-qualified element name
 */
export interface QualifiedName {
  readonly namespaceUri: string;
  readonly localName: string;
}

function qname(namespaceUri: Datex2Namespace, localName: string): QualifiedName {
  return { namespaceUri, localName };
}

const SIT = DATEX2_NAMESPACES.situation;
const LOC = DATEX2_NAMESPACES.locationReferencing;
const LSE = DATEX2_NAMESPACES.spanishLocationExtension;

/**
 * Element names read by the situation extractor
 */
export const DATEX2_ELEMENTS = {
  situation: qname(SIT, 'situation'),
  overallSeverity: qname(SIT, 'overallSeverity'),
  situationRecord: qname(SIT, 'situationRecord'),
  managementType: qname(SIT, 'roadOrCarriagewayOrLaneManagementType'),
  causeType: qname(SIT, 'causeType'),
  locationReference: qname(SIT, 'locationReference'),

  roadName: qname(LOC, 'roadName'),
  from: qname(LOC, 'from'),
  to: qname(LOC, 'to'),
  point: qname(LOC, 'point'),
  pointCoordinates: qname(LOC, 'pointCoordinates'),
  latitude: qname(LOC, 'latitude'),
  longitude: qname(LOC, 'longitude'),
  extendedTpegNonJunctionPoint: qname(LOC, 'extendedTpegNonJunctionPoint'),

  province: qname(LSE, 'province'),
  municipality: qname(LSE, 'municipality'),
  autonomousCommunity: qname(LSE, 'autonomousCommunity'),
  kilometerPoint: qname(LSE, 'kilometerPoint'),
} as const satisfies Record<string, QualifiedName>;
