// REST & WebSocket payloads

import type { LatLon, LocationSettings, Position } from './location.js';
import type { CatalogWarning, DistanceUnit, RankedSite, Site } from './sites.js';
import type { GridRepresentation } from './grid.js';

export interface HealthResponse {
  name: string;
  version: string;
  uptime: number;
  status: 'operational';
  sites: number;
  source: LocationSettings['source'];
}

export interface ApiError {
  error: string;
  code?: string;
}

export interface SitesResponse {
  count: number;
  sites: Site[];
  warnings: CatalogWarning[];
}

export interface RankingResponse {
  /** Query point, or the last fix when none was given */
  position: LatLon;
  unit: DistanceUnit;
  results: RankedSite[];
}

/** Sent to every WS client on each fix */
export interface LocationMessage {
  type: 'location';
  position: Position;
  grid: GridRepresentation;
  nearest: RankedSite[];
}

export interface AcquisitionErrorMessage {
  type: 'acquisition_error';
  code: string;
  error: string;
}

export type ServerMessage = LocationMessage | AcquisitionErrorMessage;
