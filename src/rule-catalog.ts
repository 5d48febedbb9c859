/**
 * Rule Catalog - Ordered format checks for raw report text
 *
 * Rules are grouped by concern and ordered so that structural and header
 * problems surface before deep semantic ones. Every rule is a pure check
 * over the tokenized report; the engine reports the first failure.
 */

import { ReportKind } from './types';
import type { Token, TokenizedReport, ValidationRule } from './types';
import {
  CHANGE_TIME_PATTERN,
  CLOUD_PATTERN,
  FRACTION_VISIBILITY_PATTERN,
  ICAO_PATTERN,
  MISSING_QNH_PATTERN,
  QNH_PATTERN,
  RVR_PATTERN,
  TEMPERATURE_PATTERN,
  TIME_PATTERN,
  VALIDITY_PATTERN,
  WHOLE_MILES_PATTERN,
  WIND_PATTERN,
  WIND_VARIATION_PATTERN,
  classifyGroup,
  isReportKind,
  isVisibilityGroup
} from './group-patterns';
import type { GroupClass } from './group-patterns';
import { KEYWORD_LEXICON } from './keyword-lexicon';

const MINIMUM_GROUPS = 3;
const MAX_DIRECTION = 360;

const BODY_CHARACTERS = /[^A-Z0-9/+-]/g;
const REMARKS_CHARACTERS = /[^A-Z0-9/+.-]/g;

const KIND_PREFIX = /^(METAR|SPECI|TAF)./;
// Wind-shaped group with any letter suffix; the unit is checked separately
const WIND_STRUCTURE = /^(\d{3}|VRB|\/{3})(\d{2,3}|\/\/)(G\d{2,3})?([A-Z]*)$/;
const WIND_UNITS = ['KT', 'MPS', 'KMH'];
const QNH_PREFIX = /^[QA]\d/;
const RVR_PREFIX = /^R\d{2}/;
const COVERAGE_PREFIX = /^(FEW|SCT|BKN|OVC|VV)/;
const CLOUD_LIKE = /^([A-Z]{2,4})(\d{3})(CB|TCU)?$/;
const COVERAGE_CODES = ['FEW', 'SCT', 'BKN', 'OVC', 'VV'];
const TEMPERATURE_LIKE = /^[+M]?\d{1,3}\/[+M]?\d{1,3}$/;
const ISOLATED_NUMBER = /^\d{1,3}$/;
const SKIPPED_BEFORE_WIND = ['AUTO', 'COR', 'AMD'];
const MERGEABLE_KEYWORDS = ['NOSIG', 'BECMG', 'TEMPO'];
const TREND_IN_REMARKS = ['BECMG', 'TEMPO'];

// Groups CAVOK stands in for, by the name used in the message
const CAVOK_REPLACES: Partial<Record<GroupClass, string>> = {
  'visibility': 'visibility',
  'runway-visual-range': 'visibility',
  'weather': 'weather',
  'cloud': 'cloud'
};
// Still permitted next to CAVOK
const CAVOK_COMPATIBLE = /^(NSC|NCD|RE[A-Z]+)$/;

const TREND_CLASSES: readonly GroupClass[] = [
  'change',
  'change-time',
  'wind',
  'cavok',
  'visibility',
  'weather',
  'cloud',
  'validity',
  'forecast-temperature',
  'missing'
];

// ============================================================================
// Helpers
// ============================================================================

function inSections(report: TokenizedReport, ...sections: Token['section'][]): Token[] {
  return report.groups.filter(g => sections.includes(g.section));
}

/** Body and trend groups: everything after the header, before RMK */
function observedGroups(report: TokenizedReport): Token[] {
  return inSections(report, 'body', 'trend');
}

function valueAt(report: TokenizedReport, index: number): string | null {
  return index >= 0 && index < report.groups.length ? report.groups[index].value : null;
}

/**
 * "1 1/2SM": a lone digit is part of the visibility when a fraction follows
 */
function isWholeMiles(report: TokenizedReport, token: Token): boolean {
  const next = valueAt(report, token.index + 1);
  return WHOLE_MILES_PATTERN.test(token.value) && next !== null && FRACTION_VISIBILITY_PATTERN.test(next);
}

function hasObservation(report: TokenizedReport): boolean {
  return report.timeGroup !== null && !report.nil && !report.cancelled;
}

/**
 * Index of the group expected to carry the wind: the first body group after
 * the time group, stepping over AUTO / COR and a TAF validity period.
 */
function windIndex(report: TokenizedReport): number | null {
  if (!report.timeGroup || report.nil || report.cancelled) {
    return null;
  }
  let index = report.timeGroup.index + 1;
  while (index < report.groups.length) {
    const value = report.groups[index].value;
    if (!SKIPPED_BEFORE_WIND.includes(value) && !VALIDITY_PATTERN.test(value)) {
      break;
    }
    index++;
  }
  if (index >= report.groups.length || report.groups[index].section !== 'body') {
    return null;
  }
  return index;
}

/** Group expected to carry the prevailing visibility */
function visibilityIndex(report: TokenizedReport): number | null {
  const wind = windIndex(report);
  if (wind === null) {
    return null;
  }
  let index = wind + 1;
  const next = valueAt(report, index);
  if (next !== null && WIND_VARIATION_PATTERN.test(next)) {
    index++;
  }
  if (index >= report.groups.length || report.groups[index].section !== 'body') {
    return null;
  }
  return index;
}

function firstMatch(groups: Token[], predicate: (token: Token) => boolean): string | null {
  const found = groups.find(predicate);
  return found ? found.value : null;
}

// ============================================================================
// Structure
// ============================================================================

const structureRules: ValidationRule[] = [
  {
    id: 'empty-report',
    concern: 'structure',
    description: 'Report text must not be empty',
    check: ({ report }) => report.normalized.length === 0 ? 'Empty report' : null
  },
  {
    id: 'line-breaks',
    concern: 'structure',
    description: 'Report must be a single line',
    check: ({ report }) => /[\r\n]/.test(report.normalized) ? 'Report contains line breaks' : null
  },
  {
    id: 'max-length',
    concern: 'structure',
    description: 'Report must not exceed the configured maximum length',
    check: ({ report, config }) => report.normalized.length > config.maxLength
      ? `Report exceeds maximum length of ${config.maxLength} characters`
      : null
  },
  {
    id: 'invalid-characters',
    concern: 'structure',
    description: 'Only A-Z, 0-9, "/", "+" and "-" are permitted (remarks also allow ".")',
    check: ({ report }) => {
      const invalid = new Set<string>();
      for (const group of report.groups) {
        const pattern = group.section === 'remarks' ? REMARKS_CHARACTERS : BODY_CHARACTERS;
        for (const char of group.value.match(pattern) ?? []) {
          invalid.add(char);
        }
      }
      return invalid.size > 0
        ? `Report contains invalid characters: ${[...invalid].join(' ')}`
        : null;
    }
  },
  {
    id: 'minimum-groups',
    concern: 'structure',
    description: `Report must contain at least ${MINIMUM_GROUPS} groups`,
    check: ({ report }) => report.groups.length < MINIMUM_GROUPS
      ? `Report too short: ${report.normalized}`
      : null
  }
];

// ============================================================================
// Header
// ============================================================================

const headerRules: ValidationRule[] = [
  {
    id: 'kind-keyword',
    concern: 'header',
    description: 'Report type keyword must stand alone',
    check: ({ report }) => {
      const first = valueAt(report, 0);
      if (first === null || !KIND_PREFIX.test(first) || ICAO_PATTERN.test(first)) {
        return null;
      }
      return `Malformed report type keyword: ${first}`;
    }
  },
  {
    id: 'duplicate-header',
    concern: 'header',
    description: 'Report type keyword must appear once',
    check: ({ report }) => {
      const count = inSections(report, 'header', 'body')
        .filter(g => isReportKind(g.value))
        .length;
      return count > 1 ? 'Duplicate report header' : null;
    }
  },
  {
    id: 'header-required',
    concern: 'header',
    description: 'Report must start with METAR, SPECI or TAF when a header is required',
    check: ({ report, config }) => config.requireHeader && report.kind === null
      ? 'Missing report type header (METAR/SPECI/TAF)'
      : null
  },
  {
    id: 'icao',
    concern: 'header',
    description: 'Station identifier is four uppercase letters or digits',
    check: ({ report }) => report.icao === null
      ? `Invalid or missing ICAO code: ${valueAt(report, report.bodyStart) ?? '(none)'}`
      : null
  },
  {
    id: 'time-format',
    concern: 'header',
    description: 'Time group follows the station identifier as DDHHMMZ',
    check: ({ report }) => report.timeGroup === null
      ? `Invalid or missing time group: ${valueAt(report, report.bodyStart) ?? '(none)'}`
      : null
  },
  {
    id: 'time-range',
    concern: 'header',
    description: 'Day 01-31, hour 00-23, minute 00-59',
    check: ({ report }) => {
      const match = report.timeGroup?.value.match(TIME_PATTERN);
      if (!match) {
        return null;
      }
      const day = parseInt(match[1], 10);
      const hour = parseInt(match[2], 10);
      const minute = parseInt(match[3], 10);
      if (day < 1 || day > 31 || hour > 23 || minute > 59) {
        return `Time group out of range: ${match[0]}`;
      }
      return null;
    }
  },
  {
    id: 'single-report',
    concern: 'header',
    description: 'One report per message',
    check: ({ report }) => {
      const times = inSections(report, 'header', 'body', 'trend').filter(g => TIME_PATTERN.test(g.value));
      return times.length > 1 ? `Multiple reports in one message: ${times[1].value}` : null;
    }
  }
];

// ============================================================================
// Wind
// ============================================================================

const windRules: ValidationRule[] = [
  {
    id: 'wind-separators',
    concern: 'wind',
    description: 'Wind group must not be split by spaces',
    check: ({ report }) => {
      const index = windIndex(report);
      if (index === null || WIND_PATTERN.test(report.groups[index].value)) {
        return null;
      }
      let joined = report.groups[index].value;
      for (let offset = 1; offset <= 3; offset++) {
        const next = report.groups[index + offset];
        if (!next || next.section !== 'body') {
          break;
        }
        joined += next.value;
        if (WIND_PATTERN.test(joined)) {
          const parts = report.groups.slice(index, index + offset + 1).map(g => g.value);
          return `Invalid wind format: ${parts.join(' ')}`;
        }
      }
      return null;
    }
  },
  {
    id: 'wind-unit',
    concern: 'wind',
    description: 'Wind unit is KT, MPS or KMH',
    check: ({ report }) => {
      const index = windIndex(report);
      if (index === null) {
        return null;
      }
      const value = report.groups[index].value;
      const match = value.match(WIND_STRUCTURE);
      if (!match || WIND_UNITS.includes(match[4])) {
        return null;
      }
      return `Invalid wind format: ${value} (unit must be KT, MPS or KMH)`;
    }
  },
  {
    id: 'wind-width',
    concern: 'wind',
    description: 'Wind group is dddss[Ggg]UU with fixed field widths',
    check: ({ report }) => {
      const index = windIndex(report);
      if (index === null) {
        return null;
      }
      const value = report.groups[index].value;
      return WIND_PATTERN.test(value) ? null : `Invalid wind format: ${value}`;
    }
  },
  {
    id: 'wind-gust',
    concern: 'wind',
    description: 'Gust must exceed the sustained speed',
    check: ({ report }) => {
      const index = windIndex(report);
      const match = index !== null ? report.groups[index].value.match(WIND_PATTERN) : null;
      if (!match || match[3] === undefined || match[2].startsWith('/')) {
        return null;
      }
      return parseInt(match[3], 10) <= parseInt(match[2], 10)
        ? `Invalid wind format: ${match[0]} (gust must exceed speed)`
        : null;
    }
  },
  {
    id: 'wind-direction',
    concern: 'wind',
    description: 'Wind direction and variable range bounds are at most 360 degrees',
    check: ({ report }) => {
      const index = windIndex(report);
      const match = index !== null ? report.groups[index].value.match(WIND_PATTERN) : null;
      if (index === null || !match) {
        return null;
      }
      if (/^\d{3}$/.test(match[1]) && parseInt(match[1], 10) > MAX_DIRECTION) {
        return `Invalid wind format: ${match[0]} (direction out of range)`;
      }
      const variation = valueAt(report, index + 1)?.match(WIND_VARIATION_PATTERN);
      if (variation && (parseInt(variation[1], 10) > MAX_DIRECTION || parseInt(variation[2], 10) > MAX_DIRECTION)) {
        return `Invalid wind format: ${variation[0]} (direction range out of range)`;
      }
      return null;
    }
  },
  {
    id: 'observation-present',
    concern: 'wind',
    description: 'Observation data follows the wind group',
    check: ({ report }) => {
      if (!hasObservation(report) || report.timeGroup === null) {
        return null;
      }
      const after = observedGroups(report).filter(g => g.index > (report.timeGroup?.index ?? 0));
      return after.length < 2 ? 'Missing observation data' : null;
    }
  }
];

// ============================================================================
// Visibility / QNH
// ============================================================================

const visibilityQnhRules: ValidationRule[] = [
  {
    id: 'qnh-format',
    concern: 'visibility-qnh',
    description: 'QNH is Q or A followed by exactly four digits',
    check: ({ report }) => {
      const bad = firstMatch(observedGroups(report), g => QNH_PREFIX.test(g.value) && !QNH_PATTERN.test(g.value));
      return bad !== null ? `Invalid QNH format: ${bad}` : null;
    }
  },
  {
    id: 'qnh-present',
    concern: 'visibility-qnh',
    description: 'METAR and SPECI observations carry a QNH group',
    check: ({ report }) => {
      if (report.kind === ReportKind.TAF || !hasObservation(report)) {
        return null;
      }
      const present = inSections(report, 'body')
        .some(g => QNH_PATTERN.test(g.value) || MISSING_QNH_PATTERN.test(g.value));
      return present ? null : 'Missing QNH group';
    }
  },
  {
    id: 'visibility-format',
    concern: 'visibility-qnh',
    description: 'Prevailing visibility is metres (nnnn[dir]) or statute miles',
    check: ({ report }) => {
      const index = visibilityIndex(report);
      if (index === null) {
        return null;
      }
      const token = report.groups[index];
      if (!/^\d/.test(token.value) || isVisibilityGroup(token.value) || isWholeMiles(report, token)) {
        return null;
      }
      return `Invalid visibility format: ${token.value}`;
    }
  },
  {
    id: 'rvr-format',
    concern: 'visibility-qnh',
    description: 'Runway visual range is Rnn[LRC]/[PM]nnnn[V[PM]nnnn][FT][UDN]',
    check: ({ report }) => {
      const bad = firstMatch(
        inSections(report, 'body'),
        g => RVR_PREFIX.test(g.value) && g.value.includes('/') && !RVR_PATTERN.test(g.value)
      );
      return bad !== null ? `Invalid RVR format: ${bad}` : null;
    }
  },
  {
    id: 'cavok-exclusive',
    concern: 'visibility-qnh',
    description: 'CAVOK replaces visibility, RVR, present weather and cloud groups',
    check: ({ report }) => {
      const body = inSections(report, 'body');
      if (!body.some(g => g.value === 'CAVOK')) {
        return null;
      }
      for (const group of body) {
        const kind = classifyGroup(group.value);
        const replaced = kind !== null ? CAVOK_REPLACES[kind] : undefined;
        if (replaced !== undefined && !CAVOK_COMPATIBLE.test(group.value)) {
          return `CAVOK reported with ${replaced} group: ${group.value}`;
        }
      }
      return null;
    }
  }
];

// ============================================================================
// Cloud / temperature
// ============================================================================

const cloudTemperatureRules: ValidationRule[] = [
  {
    id: 'cloud-format',
    concern: 'cloud-temperature',
    description: 'Cloud group is coverage + three-digit height + optional CB/TCU',
    check: ({ report }) => {
      const bad = firstMatch(
        observedGroups(report),
        g => COVERAGE_PREFIX.test(g.value) && !CLOUD_PATTERN.test(g.value)
      );
      return bad !== null ? `Invalid cloud group: ${bad}` : null;
    }
  },
  {
    id: 'cloud-spelling',
    concern: 'cloud-temperature',
    description: 'Cloud coverage is FEW, SCT, BKN, OVC or VV',
    check: ({ report }) => {
      const bad = firstMatch(observedGroups(report), g => {
        const match = g.value.match(CLOUD_LIKE);
        return match !== null && !COVERAGE_CODES.includes(match[1]);
      });
      return bad !== null ? `Misspelled cloud coverage: ${bad}` : null;
    }
  },
  {
    id: 'temperature-format',
    concern: 'cloud-temperature',
    description: 'Temperature group is M?TT/M?DD',
    check: ({ report }) => {
      const bad = firstMatch(
        observedGroups(report),
        g => TEMPERATURE_LIKE.test(g.value) && !TEMPERATURE_PATTERN.test(g.value)
      );
      return bad !== null ? `Invalid temperature format: ${bad}` : null;
    }
  }
];

// ============================================================================
// Spelling
// ============================================================================

const spellingRules: ValidationRule[] = [
  {
    id: 'misspelled-keyword',
    concern: 'spelling',
    description: 'Known misspellings of change-group keywords',
    check: ({ report }) => {
      const bad = firstMatch(observedGroups(report), g => KEYWORD_LEXICON.misspellings.has(g.value));
      if (bad === null) {
        return null;
      }
      return `Spelling error: ${bad} (expected ${KEYWORD_LEXICON.misspellings.get(bad) ?? bad})`;
    }
  },
  {
    id: 'split-keyword',
    concern: 'spelling',
    description: 'Keyword broken by a space (NOS IG)',
    check: ({ report }) => {
      const groups = observedGroups(report);
      for (let i = 0; i + 1 < groups.length; i++) {
        const joined = groups[i].value + groups[i + 1].value;
        if (KEYWORD_LEXICON.keywords.includes(joined)) {
          return `Spelling error: ${groups[i].value} ${groups[i + 1].value} (expected ${joined})`;
        }
      }
      return null;
    }
  },
  {
    id: 'merged-keyword',
    concern: 'spelling',
    description: 'Keyword glued to the following group (BECMGTL0130)',
    check: ({ report }) => {
      for (const group of observedGroups(report)) {
        const keyword = MERGEABLE_KEYWORDS.find(k => group.value.startsWith(k) && group.value.length > k.length);
        if (keyword) {
          return `Spelling error: ${group.value} (${keyword} merged with following group)`;
        }
      }
      return null;
    }
  },
  {
    id: 'forbidden-marker',
    concern: 'spelling',
    description: 'Transmission markers that are not report content',
    check: ({ report }) => {
      const bad = firstMatch(observedGroups(report), g => KEYWORD_LEXICON.forbiddenMarkers.includes(g.value));
      return bad !== null ? `Invalid field: ${bad}` : null;
    }
  }
];

// ============================================================================
// Isolated values
// ============================================================================

const isolatedRules: ValidationRule[] = [
  {
    id: 'isolated-digit-ending',
    concern: 'isolated',
    description: 'Report must not end with a lone digit',
    check: ({ report }) => {
      const groups = observedGroups(report);
      const last = groups[groups.length - 1];
      return last && /^\d$/.test(last.value) ? `Isolated digit at ending: ${last.value}` : null;
    }
  },
  {
    id: 'isolated-number',
    concern: 'isolated',
    description: 'Short numbers must belong to a group',
    check: ({ report }) => {
      const bad = firstMatch(
        observedGroups(report),
        g => ISOLATED_NUMBER.test(g.value) && !isWholeMiles(report, g)
      );
      return bad !== null ? `Isolated numeric value: ${bad}` : null;
    }
  }
];

// ============================================================================
// Trend and body content
// ============================================================================

const trendRules: ValidationRule[] = [
  {
    id: 'change-time-without-trend',
    concern: 'trend',
    description: 'FM/TL/AT times in a METAR belong to a BECMG or TEMPO group',
    check: ({ report }) => {
      if (report.kind === ReportKind.TAF) {
        return null;
      }
      const bad = firstMatch(inSections(report, 'body'), g => CHANGE_TIME_PATTERN.test(g.value));
      return bad !== null ? `Change time ${bad} without BECMG/TEMPO` : null;
    }
  },
  {
    id: 'trend-forbidden-groups',
    concern: 'trend',
    description: 'RVR and QNH are not forecast in a trend',
    check: ({ report }) => {
      for (const group of inSections(report, 'trend')) {
        if (RVR_PREFIX.test(group.value)) {
          return `RVR not allowed in TREND: ${group.value}`;
        }
        if (QNH_PATTERN.test(group.value)) {
          return `QNH not allowed in TREND: ${group.value}`;
        }
      }
      return null;
    }
  },
  {
    id: 'trend-content',
    concern: 'trend',
    description: 'Trend groups are change indicators or forecast conditions',
    check: ({ report }) => {
      const bad = firstMatch(inSections(report, 'trend'), g => {
        const kind = classifyGroup(g.value);
        return !(kind !== null && TREND_CLASSES.includes(kind)) && !isWholeMiles(report, g);
      });
      return bad !== null ? `Suspicious field in TREND: ${bad}` : null;
    }
  },
  {
    id: 'suspicious-field',
    concern: 'trend',
    description: 'Every body group must have a recognizable shape',
    check: ({ report }) => {
      const bad = firstMatch(
        inSections(report, 'body'),
        g => classifyGroup(g.value) === null && !isWholeMiles(report, g)
      );
      return bad !== null ? `Suspicious field: ${bad}` : null;
    }
  }
];

// ============================================================================
// Remarks
// ============================================================================

const remarksRules: ValidationRule[] = [
  {
    id: 'strict-remarks',
    concern: 'remarks',
    description: 'Strict mode forbids a remarks section',
    check: ({ report, config }) => config.strictMode && report.remarksIndex !== null
      ? 'RMK section not allowed in strict mode'
      : null
  },
  {
    id: 'empty-remarks',
    concern: 'remarks',
    description: 'RMK must be followed by remark text',
    check: ({ report }) => report.remarksIndex !== null && report.remarksIndex === report.groups.length - 1
      ? 'Empty RMK section'
      : null
  },
  {
    id: 'duplicate-remarks',
    concern: 'remarks',
    description: 'RMK appears at most once',
    check: ({ report }) => report.groups.filter(g => g.value === 'RMK').length > 1
      ? 'Duplicate RMK section'
      : null
  },
  {
    id: 'trend-in-remarks',
    concern: 'remarks',
    description: 'Trend keywords belong before RMK',
    check: ({ report }) => {
      const bad = firstMatch(inSections(report, 'remarks'), g => TREND_IN_REMARKS.includes(g.value));
      return bad !== null ? `TREND keyword ${bad} found in RMK section` : null;
    }
  }
];

/**
 * The full catalog in evaluation order
 */
export const RULE_CATALOG: readonly ValidationRule[] = Object.freeze([
  ...structureRules,
  ...headerRules,
  ...windRules,
  ...visibilityQnhRules,
  ...cloudTemperatureRules,
  ...spellingRules,
  ...isolatedRules,
  ...trendRules,
  ...remarksRules
]);

export function findRule(id: string): ValidationRule | undefined {
  return RULE_CATALOG.find(rule => rule.id === id);
}
