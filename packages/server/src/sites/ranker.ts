import type { DistanceUnit, LatLon, RankedSite, Site } from '@sitescope/shared';
import { bearing, distance } from '../geo/math.js';
import { SiteCatalog } from './catalog.js';

export interface NearestOptions {
  /** Only sites that list at least one control channel. */
  controlOnly?: boolean;
}

type SiteSource = SiteCatalog | readonly Site[];

const sitesOf = (catalog: SiteSource): readonly Site[] =>
  catalog instanceof SiteCatalog ? catalog.sites : catalog;

/**
 * Distance and bearing to every site, ascending by distance. Equal distances
 * keep catalog order.
 */
export function rankSites(position: LatLon, catalog: SiteSource, unit: DistanceUnit = 'mi'): RankedSite[] {
  return sitesOf(catalog)
    .map((site, index) => ({
      index,
      ranked: {
        site,
        distance: distance(position, site, unit),
        bearing: bearing(position, site),
        unit,
      },
    }))
    .sort((a, b) => a.ranked.distance - b.ranked.distance || a.index - b.index)
    .map(entry => entry.ranked);
}

export function nearest(
  position: LatLon,
  catalog: SiteSource,
  unit: DistanceUnit,
  limit: number,
  options: NearestOptions = {},
): RankedSite[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }
  const sites = options.controlOnly
    ? sitesOf(catalog).filter(site => site.controlFrequencies.length > 0)
    : sitesOf(catalog);
  return rankSites(position, sites, unit).slice(0, limit);
}

export function nearestOne(position: LatLon, catalog: SiteSource, unit: DistanceUnit = 'mi'): RankedSite | null {
  return nearest(position, catalog, unit, 1)[0] ?? null;
}

export function withinRange(position: LatLon, catalog: SiteSource, unit: DistanceUnit, range: number): RankedSite[] {
  if (!Number.isFinite(range) || range < 0) {
    throw new RangeError(`range must be a non-negative number, got ${range}`);
  }
  return rankSites(position, catalog, unit).filter(r => r.distance <= range);
}
