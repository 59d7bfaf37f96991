// Transmission Site & Ranking Types

export type DistanceUnit = 'km' | 'mi' | 'nm';

export interface SiteFrequency {
  value: string;        // MHz, control marker stripped, e.g. '852.975000'
  isControl: boolean;
}

export interface Site {
  readonly description: string;
  readonly county: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly frequencies: readonly SiteFrequency[];
  readonly controlFrequencies: readonly string[];
  /** Catalog-specific fields: rfss, siteDec, siteHex, nac, range */
  readonly attributes: Readonly<Record<string, string>>;
}

export interface RankedSite {
  site: Site;
  distance: number;     // in `unit`
  bearing: number;      // degrees true, [0, 360)
  unit: DistanceUnit;
}

export type CatalogFormat = 'json' | 'csv';

export interface CatalogWarning {
  code: 'CatalogRecordSkipped';
  index: number;        // 0-based data record index
  reason: string;
  description?: string;
}

/** Multiply a kilometer value by this to get the unit */
export const KM_TO_UNIT: Record<DistanceUnit, number> = {
  km: 1.0,
  mi: 0.621371,
  nm: 0.539957,
};

export const UNIT_TO_KM: Record<DistanceUnit, number> = {
  km: 1.0,
  mi: 1.60934,
  nm: 1.852,
};

export const UNIT_LABELS: Record<DistanceUnit, string> = {
  km: 'kilometers',
  mi: 'miles',
  nm: 'nautical miles',
};

export const DISTANCE_UNITS: readonly DistanceUnit[] = ['km', 'mi', 'nm'];
