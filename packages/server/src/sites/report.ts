import type { RankedSite } from '@sitescope/shared';
import { cardinal, convertDistance } from '../geo/math.js';

export interface SiteReportOptions {
  /** Append the distance in km, mi and nm. */
  allUnits?: boolean;
}

/** Multi-line description of one ranked site, ending with a newline. */
export function formatSiteReport(ranked: RankedSite, options: SiteReportOptions = {}): string {
  const { site, unit } = ranked;
  const attr = site.attributes;
  const lines = [
    `Tower: ${site.description}`,
    `County: ${site.county}`,
    `Location: ${site.latitude}, ${site.longitude}`,
  ];
  if (attr.rfss || attr.siteDec) {
    lines.push(`RFSS: ${attr.rfss ?? ''}, Site: ${attr.siteDec ?? ''}${attr.siteHex ? ` (0x${attr.siteHex})` : ''}`);
  }
  if (attr.nac) lines.push(`NAC: ${attr.nac}`);
  // tabular catalogs give range in miles
  if (attr.range) lines.push(`Tower Range: ${attr.range} miles`);

  let distanceLine = `Distance from you: ${ranked.distance.toFixed(2)} ${unit}`;
  if (options.allUnits) {
    const km = convertDistance(ranked.distance, unit, 'km');
    const mi = convertDistance(ranked.distance, unit, 'mi');
    const nm = convertDistance(ranked.distance, unit, 'nm');
    distanceLine += ` (${km.toFixed(2)} km, ${mi.toFixed(2)} mi, ${nm.toFixed(2)} nm)`;
  }
  lines.push(distanceLine);
  lines.push(`Bearing: ${ranked.bearing.toFixed(0)}° (${cardinal(ranked.bearing)})`);

  if (site.controlFrequencies.length) {
    lines.push(`Control Channels: ${site.controlFrequencies.join(' MHz, ')} MHz (${site.controlFrequencies.length} total)`);
  }
  if (site.frequencies.length) lines.push(`Total Frequencies: ${site.frequencies.length}`);
  return lines.join('\n') + '\n';
}

/** One line of the nearest-sites table, e.g. ` 1.   0.16 mi - Name (County)`. */
export function formatRankedLine(position: number, ranked: RankedSite): string {
  const rank = String(position).padStart(2);
  const dist = ranked.distance.toFixed(2).padStart(6);
  return `${rank}. ${dist} ${ranked.unit} - ${ranked.site.description.padEnd(40)} (${ranked.site.county})`;
}
