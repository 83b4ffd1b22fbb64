/**
 * A geolocated traffic situation record extracted from a DATEX2 feed.
 *
 * `id` and `severity` come from the enclosing situation and are shared by all
 * of its records; every other field belongs to the record or its point.
 * Optional fields are `undefined` when the feed does not carry them.
 */
export interface Situation {
  readonly id: string;
  /** Raw `overallSeverity` value: low, medium, high or highest */
  readonly severity?: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly province?: string;
  readonly municipality?: string;
  readonly autonomousCommunity?: string;
  readonly roadName?: string;
  /** Raw `roadOrCarriagewayOrLaneManagementType` value, e.g. laneClosures */
  readonly managementType?: string;
  /** Raw `causeType` value, e.g. roadMaintenance */
  readonly causeType?: string;
  /** Kilometre marker along the road */
  readonly kmPoint?: number;
}

/**
 * Information read from a single location point.
 * Coordinates are independently optional at this stage.
 */
export interface PointInfo {
  latitude?: number;
  longitude?: number;
  province?: string;
  municipality?: string;
  autonomousCommunity?: string;
  kmPoint?: number;
}

export type SituationSeverity = 'low' | 'medium' | 'high' | 'highest';
