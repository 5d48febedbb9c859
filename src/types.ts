/**
 * Core type definitions for metar-inspect
 */

// ============================================================================
// Report Header Types
// ============================================================================

export enum ReportKind {
  METAR = 'METAR',
  SPECI = 'SPECI',
  TAF = 'TAF'
}

/** Modifiers that may directly follow the report type keyword */
export type ReportModifier = 'COR' | 'AMD';

export interface ReportTime {
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
}

// ============================================================================
// Tokenizer Types
// ============================================================================

export type ReportSection = 'header' | 'body' | 'trend' | 'remarks';

export interface Token {
  value: string;
  index: number;
  section: ReportSection;
}

export interface TokenizedReport {
  /** Trimmed text with the end-of-message `=` removed */
  normalized: string;
  groups: readonly Token[];
  /** Report type keyword, when one leads the text */
  kind: ReportKind | null;
  modifiers: ReportModifier[];
  icao: string | null;
  /** Time group found directly after the station identifier */
  timeGroup: Token | null;
  /** Index of the first group after kind, modifiers and station */
  bodyStart: number;
  trendIndex: number | null;
  remarksIndex: number | null;
  nil: boolean;
  cancelled: boolean;
}

// ============================================================================
// Decoded Field Types
// ============================================================================

export type WindUnit = 'kt' | 'm/s' | 'km/h';

export interface Wind {
  /** Degrees true, or 'variable' for VRB */
  readonly direction: number | 'variable';
  readonly speed: number;
  readonly gust: number | null;
  readonly unit: WindUnit;
  readonly directionRange: readonly [number, number] | null;
}

export type CompassPoint = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';

/** 'above' for P-prefixed or 9999 values, 'below' for M-prefixed or 0000 */
export type RangeModifier = 'above' | 'below';

export interface Visibility {
  readonly value: number;
  readonly unit: 'm' | 'SM';
  readonly modifier: RangeModifier | null;
  readonly direction: CompassPoint | null;
}

export interface VisualRangeValue {
  readonly value: number;
  readonly modifier: RangeModifier | null;
}

export interface RunwayVisualRange {
  readonly runway: string;
  readonly value: VisualRangeValue;
  /** Lower bound when the range varies (Rrr/nnnnVnnnn) */
  readonly minimum: VisualRangeValue | null;
  readonly unit: 'm' | 'ft';
  readonly tendency: 'up' | 'down' | 'no-change' | null;
}

export type WeatherIntensity = 'light' | 'moderate' | 'heavy';

export interface WeatherPhenomenon {
  readonly raw: string;
  readonly intensity: WeatherIntensity;
  readonly proximity: 'vicinity' | null;
  readonly recent: boolean;
  readonly descriptor: string | null;
  readonly phenomena: readonly string[];
  readonly description: string;
}

export const CLEAR_SKY = 'clear-sky';

export type CloudCoverage = 'FEW' | 'SCT' | 'BKN' | 'OVC' | 'NSC' | 'NCD' | 'SKC' | 'CLR' | 'VV';

export type ConvectiveType = 'cumulonimbus' | 'towering-cumulus';

export interface CloudLayer {
  /** null when an automated station cannot observe the amount (///CB) */
  readonly coverage: CloudCoverage | null;
  /** Hundreds of feet */
  readonly height: number | null;
  readonly convective: ConvectiveType | null;
}

export type SkyCondition = 'clear' | 'cloudy' | 'overcast' | 'obscured';

export interface Pressure {
  readonly value: number;
  readonly unit: 'hPa' | 'inHg';
}

export interface TemperaturePair {
  readonly temperature: number;
  readonly dewTemperature: number;
}

export interface ValidityPeriod {
  readonly from: Readonly<{ day: number; hour: number }>;
  readonly to: Readonly<{ day: number; hour: number }>;
}

// ============================================================================
// Report
// ============================================================================

export interface Report {
  readonly kind: ReportKind;
  readonly modifiers: readonly ReportModifier[];
  readonly icao: string | null;
  readonly time: Readonly<ReportTime>;
  /** ISO 8601, UTC */
  readonly datetime: string;
  readonly nil: boolean;
  readonly cancelled: boolean;
  readonly auto: boolean;
  readonly wind: Readonly<Wind> | null;
  readonly cavok: boolean;
  readonly visibility: Readonly<Visibility> | null;
  readonly minimumVisibility: Readonly<Visibility> | null;
  readonly runwayVisualRange: readonly RunwayVisualRange[];
  readonly weather: readonly WeatherPhenomenon[] | typeof CLEAR_SKY | null;
  readonly cloud: readonly CloudLayer[];
  readonly sky: SkyCondition;
  /** Feet above ground of the lowest BKN/OVC/VV layer */
  readonly ceiling: number | null;
  readonly temperature: number | null;
  readonly dewTemperature: number | null;
  readonly qnh: Readonly<Pressure> | null;
  readonly windShear: readonly string[];
  readonly validity: Readonly<ValidityPeriod> | null;
  readonly trend: string | null;
  readonly remarks: string | null;
}

// ============================================================================
// Extraction Types
// ============================================================================

export type ExtractedField =
  | { name: 'time'; value: ReportTime }
  | { name: 'validity'; value: ValidityPeriod }
  | { name: 'wind'; value: Wind }
  | { name: 'cavok' }
  | { name: 'visibility'; value: Visibility }
  | { name: 'runwayVisualRange'; value: RunwayVisualRange }
  | { name: 'weather'; value: WeatherPhenomenon }
  | { name: 'cloud'; value: CloudLayer }
  | { name: 'temperature'; value: TemperaturePair }
  | { name: 'qnh'; value: Pressure }
  | { name: 'windShear'; value: string }
  | { name: 'auto' };

export type FieldName = ExtractedField['name'];

export interface Extraction {
  field: ExtractedField;
  /** Number of groups claimed, always at least 1 */
  consumed: number;
}

export interface FieldExtractor {
  readonly name: FieldName;
  extract(tokens: readonly Token[], position: number): Extraction | null;
}

// ============================================================================
// Validation Types
// ============================================================================

export interface ValidatorConfig {
  /** Forbid a remarks (RMK) section */
  strictMode: boolean;
  /** Require a METAR/SPECI/TAF keyword at the start */
  requireHeader: boolean;
  maxLength: number;
}

export type RuleConcern =
  | 'structure'
  | 'header'
  | 'wind'
  | 'visibility-qnh'
  | 'cloud-temperature'
  | 'spelling'
  | 'isolated'
  | 'trend'
  | 'remarks';

export interface RuleContext {
  report: TokenizedReport;
  config: ValidatorConfig;
}

export interface ValidationRule {
  id: string;
  concern: RuleConcern;
  description: string;
  /** Returns a diagnostic message, or null when the rule finds no issue */
  check(context: RuleContext): string | null;
}

export interface ValidationResult {
  valid: boolean;
  error: string | null;
  /** Identifier of the rule that failed */
  rule: string | null;
}

// ============================================================================
// Configuration File Types
// ============================================================================

export enum ConfigSource {
  USER = 'user',        // ~/.config/metar-inspect/config.json
  PROJECT = 'project'   // ./.metar-inspect.json
}

export interface ConfigError {
  key: string | null;
  message: string;
  source: ConfigSource;
}

export interface ConfigParseResult {
  config: Partial<ValidatorConfig>;
  errors: ConfigError[];
}

// ============================================================================
// Audit Logging Types
// ============================================================================

export interface LogEntry {
  timestamp: string;      // ISO 8601
  report: string;
  valid: boolean;
  rule: string | null;
  error: string | null;
}

export interface LogReadOptions {
  limit?: number;         // Default: 50
  valid?: boolean;
  since?: Date;
}
