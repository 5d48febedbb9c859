/**
 * Group Patterns - Canonical shapes of the coded groups in a report
 *
 * Shared by the extractors (to decode), and by the rule catalog (to decide
 * whether a group is recognizable at all).
 */

export const REPORT_KINDS = ['METAR', 'SPECI', 'TAF'] as const;
export const HEADER_MODIFIERS = ['COR', 'AMD'] as const;

export const ICAO_PATTERN = /^[A-Z][A-Z0-9]{3}$/;
export const TIME_PATTERN = /^(\d{2})(\d{2})(\d{2})Z$/;
export const VALIDITY_PATTERN = /^(\d{2})(\d{2})\/(\d{2})(\d{2})$/;

// Capture groups: [1] direction or VRB [2] speed [3] gust [4] unit
export const WIND_PATTERN = /^(\d{3}|VRB|\/{3})(\d{2}|[1-9]\d{2}|\/{2})(?:G(\d{2}|[1-9]\d{2}))?(KT|MPS|KMH)$/;
export const WIND_VARIATION_PATTERN = /^(\d{3})V(\d{3})$/;

// Capture groups: [1] metres [2] direction suffix
export const METRIC_VISIBILITY_PATTERN = /^(\d{4})(NDV|NE|NW|SE|SW|N|E|S|W)?$/;
// Capture groups: [1] P|M [2] whole miles
export const MILES_VISIBILITY_PATTERN = /^([PM])?(\d{1,2})SM$/;
// Capture groups: [1] P|M [2] numerator [3] denominator
export const FRACTION_VISIBILITY_PATTERN = /^([PM])?(\d)\/(\d{1,2})SM$/;
export const WHOLE_MILES_PATTERN = /^\d$/;

// Capture groups: [1] runway [2] P|M [3] lower bound [4] P|M [5] value [6] FT [7] tendency
export const RVR_PATTERN = /^R(\d{2}[LRC]?)\/(?:([PM])?(\d{4})V)?([PM])?(\d{4})(FT)?([UDN])?$/;

// Capture groups: [1] intensity [2] VC|RE [3] descriptor [4] phenomenon codes
export const WEATHER_PATTERN =
  /^([+-])?(VC|RE)?(MI|BC|PR|DR|BL|SH|TS|FZ)?((?:DZ|RA|SN|SG|IC|PL|GR|GS|UP|BR|FG|FU|VA|DU|SA|HZ|PY|PO|SQ|FC|SS|DS)*)$/;

// Capture groups: [1] coverage [2] height [3] convective type
// Automated stations send "///" coverage, accepted only ahead of CB or TCU
export const CLOUD_PATTERN =
  /^(FEW|SCT|BKN|OVC|VV|\/{3}(?=(?:\d{3}|\/{3})(?:CB|TCU)$))(\d{3}|\/{3})(CB|TCU|\/{3})?$/;
export const CLEAR_CLOUD_PATTERN = /^(NSC|NCD|SKC|CLR)$/;

// Capture groups: [1] M [2] temperature [3] M [4] dew point
export const TEMPERATURE_PATTERN = /^(M)?(\d{2})\/(M)?(\d{2})$/;

// Capture groups: [1] Q|A [2] value
export const QNH_PATTERN = /^([QA])(\d{4})$/;
export const MISSING_QNH_PATTERN = /^[QA]\/{4}$/;

export const MISSING_DATA_PATTERN = /^\/+$/;
export const RUNWAY_PATTERN = /^RWY(\d{2}[LRC]?)$/;
export const CHANGE_TIME_PATTERN = /^(FM|TL|AT)\d{4}$/;
export const TAF_CHANGE_PATTERN = /^FM\d{6}$/;
export const PROBABILITY_PATTERN = /^PROB\d{2}$/;
export const TAF_TEMPERATURE_PATTERN = /^T[XN]M?\d{2}\/\d{4}Z$/;

export type GroupClass =
  | 'kind'
  | 'modifier'
  | 'time'
  | 'validity'
  | 'marker'
  | 'wind'
  | 'wind-variation'
  | 'cavok'
  | 'visibility'
  | 'runway-visual-range'
  | 'weather'
  | 'cloud'
  | 'temperature'
  | 'qnh'
  | 'wind-shear'
  | 'change'
  | 'change-time'
  | 'forecast-temperature'
  | 'missing';

const MARKERS = ['AUTO', 'NIL', 'CNL'];
const WIND_SHEAR_WORDS = ['WS', 'ALL', 'RWY', 'LDG', 'TKOF'];
const CHANGE_WORDS = ['NOSIG', 'BECMG', 'TEMPO', 'NSW'];

export function isReportKind(group: string): boolean {
  return REPORT_KINDS.some(kind => kind === group);
}

/**
 * Test whether a weather group carries at least one code
 */
export function isWeatherGroup(group: string): boolean {
  const match = group.match(WEATHER_PATTERN);
  if (!match) {
    return false;
  }
  return match[3] !== undefined || match[4].length > 0;
}

export function isVisibilityGroup(group: string): boolean {
  return METRIC_VISIBILITY_PATTERN.test(group) ||
    MILES_VISIBILITY_PATTERN.test(group) ||
    FRACTION_VISIBILITY_PATTERN.test(group);
}

export function isCloudGroup(group: string): boolean {
  return CLOUD_PATTERN.test(group) || CLEAR_CLOUD_PATTERN.test(group);
}

/**
 * Classify a single group by shape alone.
 * Returns null for groups no known pattern accepts.
 */
export function classifyGroup(group: string): GroupClass | null {
  if (isReportKind(group)) return 'kind';
  if (HEADER_MODIFIERS.some(modifier => modifier === group)) return 'modifier';
  if (MARKERS.includes(group)) return 'marker';
  if (group === 'CAVOK') return 'cavok';
  if (CHANGE_WORDS.includes(group) || PROBABILITY_PATTERN.test(group) || TAF_CHANGE_PATTERN.test(group)) {
    return 'change';
  }
  if (TIME_PATTERN.test(group)) return 'time';
  if (VALIDITY_PATTERN.test(group)) return 'validity';
  if (WIND_PATTERN.test(group)) return 'wind';
  if (WIND_VARIATION_PATTERN.test(group)) return 'wind-variation';
  if (isVisibilityGroup(group)) return 'visibility';
  if (RVR_PATTERN.test(group)) return 'runway-visual-range';
  if (isCloudGroup(group)) return 'cloud';
  if (TEMPERATURE_PATTERN.test(group)) return 'temperature';
  if (QNH_PATTERN.test(group) || MISSING_QNH_PATTERN.test(group)) return 'qnh';
  if (WIND_SHEAR_WORDS.includes(group) || RUNWAY_PATTERN.test(group)) return 'wind-shear';
  if (CHANGE_TIME_PATTERN.test(group)) return 'change-time';
  if (TAF_TEMPERATURE_PATTERN.test(group)) return 'forecast-temperature';
  if (MISSING_DATA_PATTERN.test(group)) return 'missing';
  // Weather last: its pattern is the loosest
  if (isWeatherGroup(group)) return 'weather';
  return null;
}
