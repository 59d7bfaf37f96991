import { describe, it, expect } from 'vitest';
import { loadJsonRecords, SiteCatalog } from './catalog.js';
import { nearest, nearestOne, rankSites, withinRange } from './ranker.js';
import { distance, bearing } from '../geo/math.js';

const HERE = { latitude: 44.9778, longitude: -93.265 };

const RECORDS = [
  { description: 'Duluth', county: 'St. Louis', latitude: 46.7867, longitude: -92.1005, control_frequencies: ['853.1000c'] },
  { description: 'Eastside', county: 'Ramsey', latitude: 44.95, longitude: -93.10, control_frequencies: ['852.3000c'] },
  { description: 'Downtown', county: 'Hennepin', latitude: 44.9799654, longitude: -93.2638361, control_frequencies: ['851.0125c'] },
  { description: 'Southdale', county: 'Hennepin', latitude: 44.88, longitude: -93.32 },
  { description: 'Rochester', county: 'Olmsted', latitude: 44.0121, longitude: -92.4802 },
  { description: 'North Loop', county: 'Hennepin', latitude: 45.05, longitude: -93.30 },
];

const catalog = new SiteCatalog(loadJsonRecords(RECORDS).sites);
const names = (ranked: { site: { description: string } }[]) => ranked.map(r => r.site.description);

describe('rankSites', () => {
  it('orders every site by ascending distance', () => {
    expect(names(rankSites(HERE, catalog))).toEqual(['Downtown', 'North Loop', 'Southdale', 'Eastside', 'Rochester', 'Duluth']);
  });

  it('reports distance and bearing from the same GeoMath calls', () => {
    const [first] = rankSites(HERE, catalog, 'km');
    expect(first.unit).toBe('km');
    expect(first.distance).toBe(distance(HERE, first.site, 'km'));
    expect(first.bearing).toBe(bearing(HERE, first.site));
    expect(first.distance).toBeCloseTo(0.2576, 4);
    expect(first.bearing).toBeCloseTo(20.8168, 3);
  });

  it('keeps catalog order for equal distances', () => {
    const twins = loadJsonRecords([
      { description: 'Second listed', county: '', latitude: 45, longitude: -93 },
      { description: 'First listed', county: '', latitude: 45, longitude: -93 },
      { description: 'Closer', county: '', latitude: 44.98, longitude: -93.265 },
    ]).sites;
    expect(names(rankSites(HERE, twins))).toEqual(['Closer', 'Second listed', 'First listed']);
    expect(names(rankSites(HERE, [twins[1], twins[0]]))).toEqual(['First listed', 'Second listed']);
  });

  it('does not modify the catalog', () => {
    const before = catalog.sites.map(s => s.description);
    rankSites(HERE, catalog);
    expect(catalog.sites.map(s => s.description)).toEqual(before);
  });

  it('returns nothing for an empty catalog', () => {
    expect(rankSites(HERE, SiteCatalog.empty())).toEqual([]);
  });
});

describe('nearest', () => {
  it('returns the first N ranked sites', () => {
    expect(names(nearest(HERE, catalog, 'mi', 3))).toEqual(['Downtown', 'North Loop', 'Southdale']);
  });

  it('returns at most the catalog size', () => {
    expect(nearest(HERE, catalog, 'mi', 50)).toHaveLength(6);
    expect(nearest(HERE, catalog, 'mi', 0)).toEqual([]);
  });

  it('returns exactly five of ten sites', () => {
    const ten = loadJsonRecords(Array.from({ length: 10 }, (_, i) => ({
      description: `Site ${i}`, county: '', latitude: 45 + (9 - i) * 0.1, longitude: -93.265,
    }))).sites;
    expect(names(nearest(HERE, ten, 'km', 5))).toEqual(['Site 9', 'Site 8', 'Site 7', 'Site 6', 'Site 5']);
  });

  it('can restrict to sites with control channels', () => {
    expect(names(nearest(HERE, catalog, 'mi', 5, { controlOnly: true }))).toEqual(['Downtown', 'Eastside', 'Duluth']);
  });

  it('rejects a negative or fractional limit', () => {
    expect(() => nearest(HERE, catalog, 'mi', -1)).toThrow(RangeError);
    expect(() => nearest(HERE, catalog, 'mi', 1.5)).toThrow(RangeError);
  });

  it('finds the single nearest site', () => {
    expect(nearestOne(HERE, catalog)?.site.description).toBe('Downtown');
    expect(nearestOne(HERE, [])).toBeNull();
  });
});

describe('withinRange', () => {
  it('keeps sites up to and including the range', () => {
    expect(names(withinRange(HERE, catalog, 'mi', 8))).toEqual(['Downtown', 'North Loop', 'Southdale']);
    expect(names(withinRange(HERE, catalog, 'km', 12))).toEqual(['Downtown', 'North Loop', 'Southdale']);
    expect(names(withinRange(HERE, catalog, 'nm', 100))).toHaveLength(5);
  });

  it('includes a site at exactly the range', () => {
    const here = loadJsonRecords([{ description: 'Here', county: '', latitude: HERE.latitude, longitude: HERE.longitude }]).sites;
    expect(names(withinRange(HERE, here, 'mi', 0))).toEqual(['Here']);
  });

  it('rejects a negative range', () => {
    expect(() => withinRange(HERE, catalog, 'mi', -1)).toThrow(RangeError);
    expect(() => withinRange(HERE, catalog, 'mi', Number.NaN)).toThrow(RangeError);
  });
});
