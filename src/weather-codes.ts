/**
 * Weather Codes - Plain-language labels for present-weather groups
 */

import type { WeatherIntensity } from './types';

const DESCRIPTOR_LABELS: Record<string, string> = {
  MI: 'Shallow',
  BC: 'Patches',
  PR: 'Partial',
  DR: 'Low Drifting',
  BL: 'Blowing',
  SH: 'Showers',
  TS: 'Thunderstorm',
  FZ: 'Freezing'
};

const PHENOMENON_LABELS: Record<string, string> = {
  DZ: 'Drizzle',
  RA: 'Rain',
  SN: 'Snow',
  SG: 'Snow Grains',
  IC: 'Ice Crystals',
  PL: 'Ice Pellets',
  GR: 'Hail',
  GS: 'Small Hail or Snow Pellets',
  UP: 'Unknown Precipitation',
  BR: 'Mist',
  FG: 'Fog',
  FU: 'Smoke',
  VA: 'Volcanic Ash',
  DU: 'Widespread Dust',
  SA: 'Sand',
  HZ: 'Haze',
  PY: 'Spray',
  PO: 'Dust/Sand Whirls',
  SQ: 'Squalls',
  FC: 'Funnel Cloud',
  SS: 'Sandstorm',
  DS: 'Duststorm'
};

/**
 * Split a run of two-letter phenomenon codes ("RASN" -> ["RA", "SN"])
 */
export function splitCodes(codes: string): string[] {
  const result: string[] = [];
  for (let i = 0; i + 2 <= codes.length; i += 2) {
    result.push(codes.slice(i, i + 2));
  }
  return result;
}

/**
 * Build a description such as "Light Showers of Rain" or "Recent Thunderstorm".
 */
export function describeWeather(
  intensity: WeatherIntensity,
  descriptor: string | null,
  phenomena: string[],
  proximity: 'vicinity' | null,
  recent: boolean
): string {
  const parts: string[] = [];

  if (intensity === 'light') parts.push('Light');
  if (intensity === 'heavy') parts.push('Heavy');
  if (recent) parts.push('Recent');

  if (descriptor) {
    const label = DESCRIPTOR_LABELS[descriptor] ?? descriptor;
    // "Showers of Rain", but a bare "Showers"
    parts.push(descriptor === 'SH' && phenomena.length > 0 ? `${label} of` : label);
  }

  for (const code of phenomena) {
    parts.push(PHENOMENON_LABELS[code] ?? code);
  }

  if (proximity === 'vicinity') parts.push('in the Vicinity');

  return parts.join(' ');
}
