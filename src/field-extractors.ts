/**
 * Field Extractors - One recognizer per report field
 *
 * Each extractor inspects the group at a position (and, for multi-group
 * fields, the groups right after it) and either claims those groups or
 * declines without consuming anything.
 */

import type {
  CloudCoverage,
  CompassPoint,
  ConvectiveType,
  Extraction,
  FieldExtractor,
  RangeModifier,
  Token,
  VisualRangeValue,
  WeatherIntensity,
  WindUnit
} from './types';
import {
  CLEAR_CLOUD_PATTERN,
  CLOUD_PATTERN,
  FRACTION_VISIBILITY_PATTERN,
  METRIC_VISIBILITY_PATTERN,
  MILES_VISIBILITY_PATTERN,
  QNH_PATTERN,
  RUNWAY_PATTERN,
  RVR_PATTERN,
  TEMPERATURE_PATTERN,
  TIME_PATTERN,
  VALIDITY_PATTERN,
  WEATHER_PATTERN,
  WHOLE_MILES_PATTERN,
  WIND_PATTERN,
  WIND_VARIATION_PATTERN,
  isWeatherGroup
} from './group-patterns';
import { describeWeather, splitCodes } from './weather-codes';

const MAX_DIRECTION = 360;

const WIND_UNITS: Record<string, WindUnit> = {
  KT: 'kt',
  MPS: 'm/s',
  KMH: 'km/h'
};

const COMPASS_POINTS: readonly CompassPoint[] = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];
const COVERAGES: readonly CloudCoverage[] = ['FEW', 'SCT', 'BKN', 'OVC', 'NSC', 'NCD', 'SKC', 'CLR', 'VV'];

function groupAt(tokens: readonly Token[], position: number): string | null {
  return position >= 0 && position < tokens.length ? tokens[position].value : null;
}

function toInt(digits: string): number {
  return parseInt(digits, 10);
}

function toRangeModifier(prefix: string | undefined): RangeModifier | null {
  if (prefix === 'P') return 'above';
  if (prefix === 'M') return 'below';
  return null;
}

/**
 * Signed Celsius value; "M00" is plain zero
 */
function toCelsius(minus: string | undefined, digits: string): number {
  const value = toInt(digits);
  return minus && value !== 0 ? -value : value;
}

export const timeExtractor: FieldExtractor = {
  name: 'time',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(TIME_PATTERN);
    if (!match) {
      return null;
    }
    return {
      field: {
        name: 'time',
        value: { day: toInt(match[1]), hour: toInt(match[2]), minute: toInt(match[3]) }
      },
      consumed: 1
    };
  }
};

export const validityExtractor: FieldExtractor = {
  name: 'validity',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(VALIDITY_PATTERN);
    if (!match) {
      return null;
    }
    return {
      field: {
        name: 'validity',
        value: {
          from: { day: toInt(match[1]), hour: toInt(match[2]) },
          to: { day: toInt(match[3]), hour: toInt(match[4]) }
        }
      },
      consumed: 1
    };
  }
};

export const windExtractor: FieldExtractor = {
  name: 'wind',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(WIND_PATTERN);
    if (!match) {
      return null;
    }

    const [, rawDirection, rawSpeed, rawGust, rawUnit] = match;
    // "/////KT": wind not reported
    if (rawDirection.startsWith('/') || rawSpeed.startsWith('/')) {
      return null;
    }

    const direction = rawDirection === 'VRB' ? 'variable' : toInt(rawDirection);
    if (direction !== 'variable' && direction > MAX_DIRECTION) {
      return null;
    }

    const unit = WIND_UNITS[rawUnit];
    if (!unit) {
      return null;
    }

    // Variable direction range only when it immediately follows
    let directionRange: readonly [number, number] | null = null;
    const variation = groupAt(tokens, position + 1)?.match(WIND_VARIATION_PATTERN);
    if (variation) {
      const from = toInt(variation[1]);
      const to = toInt(variation[2]);
      if (from <= MAX_DIRECTION && to <= MAX_DIRECTION) {
        directionRange = [from, to];
      }
    }

    return {
      field: {
        name: 'wind',
        value: {
          direction,
          speed: toInt(rawSpeed),
          gust: rawGust !== undefined ? toInt(rawGust) : null,
          unit,
          directionRange
        }
      },
      consumed: directionRange ? 2 : 1
    };
  }
};

export const cavokExtractor: FieldExtractor = {
  name: 'cavok',
  extract(tokens, position) {
    return groupAt(tokens, position) === 'CAVOK'
      ? { field: { name: 'cavok' }, consumed: 1 }
      : null;
  }
};

export const visibilityExtractor: FieldExtractor = {
  name: 'visibility',
  extract(tokens, position): Extraction | null {
    const group = groupAt(tokens, position);
    if (group === null) {
      return null;
    }

    const metric = group.match(METRIC_VISIBILITY_PATTERN);
    if (metric) {
      const value = toInt(metric[1]);
      let modifier: RangeModifier | null = null;
      if (value === 9999) modifier = 'above';
      if (value === 0) modifier = 'below';
      return {
        field: {
          name: 'visibility',
          value: {
            value,
            unit: 'm',
            modifier,
            direction: COMPASS_POINTS.find(p => p === metric[2]) ?? null
          }
        },
        consumed: 1
      };
    }

    // "1 1/2SM" spans two groups
    if (WHOLE_MILES_PATTERN.test(group)) {
      const fraction = groupAt(tokens, position + 1)?.match(FRACTION_VISIBILITY_PATTERN);
      if (!fraction || fraction[1] !== undefined || toInt(fraction[3]) === 0) {
        return null;
      }
      return {
        field: {
          name: 'visibility',
          value: {
            value: toInt(group) + toInt(fraction[2]) / toInt(fraction[3]),
            unit: 'SM',
            modifier: null,
            direction: null
          }
        },
        consumed: 2
      };
    }

    const miles = group.match(MILES_VISIBILITY_PATTERN);
    if (miles) {
      return {
        field: {
          name: 'visibility',
          value: { value: toInt(miles[2]), unit: 'SM', modifier: toRangeModifier(miles[1]), direction: null }
        },
        consumed: 1
      };
    }

    const fraction = group.match(FRACTION_VISIBILITY_PATTERN);
    if (fraction && toInt(fraction[3]) !== 0) {
      return {
        field: {
          name: 'visibility',
          value: {
            value: toInt(fraction[2]) / toInt(fraction[3]),
            unit: 'SM',
            modifier: toRangeModifier(fraction[1]),
            direction: null
          }
        },
        consumed: 1
      };
    }

    return null;
  }
};

export const runwayVisualRangeExtractor: FieldExtractor = {
  name: 'runwayVisualRange',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(RVR_PATTERN);
    if (!match) {
      return null;
    }

    const [, runway, minimumPrefix, minimumValue, prefix, value, feet, tendency] = match;
    const minimum: VisualRangeValue | null = minimumValue !== undefined
      ? { value: toInt(minimumValue), modifier: toRangeModifier(minimumPrefix) }
      : null;

    return {
      field: {
        name: 'runwayVisualRange',
        value: {
          runway,
          value: { value: toInt(value), modifier: toRangeModifier(prefix) },
          minimum,
          unit: feet ? 'ft' : 'm',
          tendency: tendency === 'U' ? 'up' : tendency === 'D' ? 'down' : tendency === 'N' ? 'no-change' : null
        }
      },
      consumed: 1
    };
  }
};

export const weatherExtractor: FieldExtractor = {
  name: 'weather',
  extract(tokens, position) {
    const group = groupAt(tokens, position);
    if (group === null || !isWeatherGroup(group)) {
      return null;
    }
    const match = group.match(WEATHER_PATTERN);
    if (!match) {
      return null;
    }

    const [, sign, qualifier, descriptor, codes] = match;
    let intensity: WeatherIntensity = 'moderate';
    if (sign === '-') intensity = 'light';
    if (sign === '+') intensity = 'heavy';

    const proximity = qualifier === 'VC' ? 'vicinity' : null;
    const recent = qualifier === 'RE';
    const phenomena = splitCodes(codes);

    return {
      field: {
        name: 'weather',
        value: {
          raw: group,
          intensity,
          proximity,
          recent,
          descriptor: descriptor ?? null,
          phenomena,
          description: describeWeather(intensity, descriptor ?? null, phenomena, proximity, recent)
        }
      },
      consumed: 1
    };
  }
};

export const cloudExtractor: FieldExtractor = {
  name: 'cloud',
  extract(tokens, position) {
    const group = groupAt(tokens, position);
    if (group === null) {
      return null;
    }

    const clear = group.match(CLEAR_CLOUD_PATTERN);
    if (clear) {
      const coverage = COVERAGES.find(c => c === clear[1]);
      return coverage
        ? { field: { name: 'cloud', value: { coverage, height: null, convective: null } }, consumed: 1 }
        : null;
    }

    const match = group.match(CLOUD_PATTERN);
    if (!match) {
      return null;
    }
    let coverage: CloudCoverage | null = null;
    if (!match[1].startsWith('/')) {
      const code = COVERAGES.find(c => c === match[1]);
      if (!code) {
        return null;
      }
      coverage = code;
    }

    let convective: ConvectiveType | null = null;
    if (match[3] === 'CB') convective = 'cumulonimbus';
    if (match[3] === 'TCU') convective = 'towering-cumulus';

    return {
      field: {
        name: 'cloud',
        value: {
          coverage,
          height: match[2].startsWith('/') ? null : toInt(match[2]),
          convective
        }
      },
      consumed: 1
    };
  }
};

export const temperatureExtractor: FieldExtractor = {
  name: 'temperature',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(TEMPERATURE_PATTERN);
    if (!match) {
      return null;
    }
    return {
      field: {
        name: 'temperature',
        value: {
          temperature: toCelsius(match[1], match[2]),
          dewTemperature: toCelsius(match[3], match[4])
        }
      },
      consumed: 1
    };
  }
};

export const qnhExtractor: FieldExtractor = {
  name: 'qnh',
  extract(tokens, position) {
    const match = groupAt(tokens, position)?.match(QNH_PATTERN);
    if (!match) {
      return null;
    }
    const raw = toInt(match[2]);
    return {
      field: {
        name: 'qnh',
        value: match[1] === 'Q'
          ? { value: raw, unit: 'hPa' }
          : { value: raw / 100, unit: 'inHg' }
      },
      consumed: 1
    };
  }
};

/**
 * WS RWY25 / WS ALL RWY / WS LDG RWY07L
 */
export const windShearExtractor: FieldExtractor = {
  name: 'windShear',
  extract(tokens, position) {
    if (groupAt(tokens, position) !== 'WS') {
      return null;
    }

    const next = groupAt(tokens, position + 1);
    if (next === 'ALL' && groupAt(tokens, position + 2) === 'RWY') {
      return { field: { name: 'windShear', value: 'ALL' }, consumed: 3 };
    }

    const runway = next?.match(RUNWAY_PATTERN);
    if (runway) {
      return { field: { name: 'windShear', value: runway[1] }, consumed: 2 };
    }

    if (next === 'LDG' || next === 'TKOF') {
      const phaseRunway = groupAt(tokens, position + 2)?.match(RUNWAY_PATTERN);
      if (phaseRunway) {
        return { field: { name: 'windShear', value: phaseRunway[1] }, consumed: 3 };
      }
    }

    return null;
  }
};

export const autoExtractor: FieldExtractor = {
  name: 'auto',
  extract(tokens, position) {
    return groupAt(tokens, position) === 'AUTO'
      ? { field: { name: 'auto' }, consumed: 1 }
      : null;
  }
};

/** Priority order tried at every position */
export const EXTRACTION_ORDER: readonly FieldExtractor[] = [
  timeExtractor,
  validityExtractor,
  windExtractor,
  cavokExtractor,
  visibilityExtractor,
  runwayVisualRangeExtractor,
  weatherExtractor,
  cloudExtractor,
  temperatureExtractor,
  qnhExtractor,
  windShearExtractor,
  autoExtractor
];
