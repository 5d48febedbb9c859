/**
 * Report Assembler - Folds extracted fields into an immutable Report
 */

import { CLEAR_SKY, ReportKind } from './types';
import type {
  CloudLayer,
  ExtractedField,
  FieldExtractor,
  Pressure,
  Report,
  ReportTime,
  RunwayVisualRange,
  SkyCondition,
  TemperaturePair,
  Token,
  ValidityPeriod,
  Visibility,
  WeatherPhenomenon,
  Wind
} from './types';
import { DateCompositionError, MissingTimeGroupError } from './errors';
import { ReportTokenizer } from './report-tokenizer';
import { EXTRACTION_ORDER } from './field-extractors';

/** Mutable accumulator used while walking the body */
interface Draft {
  time: ReportTime | null;
  validity: ValidityPeriod | null;
  wind: Wind | null;
  cavok: boolean;
  visibility: Visibility | null;
  minimumVisibility: Visibility | null;
  runwayVisualRange: RunwayVisualRange[];
  weather: WeatherPhenomenon[];
  cloud: CloudLayer[];
  temperature: TemperaturePair | null;
  qnh: Pressure | null;
  windShear: string[];
  auto: boolean;
}

export class ReportAssembler {
  private tokenizer: ReportTokenizer;
  private extractors: readonly FieldExtractor[];

  private readonly CEILING_COVERAGES = ['BKN', 'OVC', 'VV'];

  constructor(extractors: readonly FieldExtractor[] = EXTRACTION_ORDER) {
    this.tokenizer = new ReportTokenizer();
    this.extractors = extractors;
  }

  /**
   * Decode report text against a caller-supplied year and month.
   * Throws MissingTimeGroupError or DateCompositionError; anything else
   * unrecognized is skipped.
   */
  assemble(text: string, year: number, month: number): Report {
    const tokenized = this.tokenizer.tokenize(text);

    // Step 1: Restrict extraction to the observation body
    const end = tokenized.trendIndex ?? tokenized.remarksIndex ?? tokenized.groups.length;
    const body = tokenized.groups.slice(0, end);

    // Step 2: Walk the body, first matching extractor claims the groups
    const draft = this.walk(body, tokenized.bodyStart);

    if (!draft.time) {
      throw new MissingTimeGroupError(text);
    }

    // Step 3: Compose the timestamp
    const datetime = this.composeDatetime(draft.time, year, month);

    // Step 4: Derive summary fields
    const cloud = Object.freeze([...draft.cloud]);
    let weather: Report['weather'] = null;
    if (draft.weather.length > 0) {
      weather = Object.freeze([...draft.weather]);
    } else if (cloud.length === 0 && !tokenized.nil) {
      weather = CLEAR_SKY;
    }

    const report: Report = {
      kind: tokenized.kind ?? ReportKind.METAR,
      modifiers: Object.freeze([...tokenized.modifiers]),
      icao: tokenized.icao,
      time: Object.freeze({ ...draft.time }),
      datetime,
      nil: tokenized.nil,
      cancelled: tokenized.cancelled,
      auto: draft.auto,
      wind: draft.wind ? this.freezeWind(draft.wind) : null,
      cavok: draft.cavok,
      visibility: draft.cavok || !draft.visibility ? null : Object.freeze({ ...draft.visibility }),
      minimumVisibility: draft.minimumVisibility ? Object.freeze({ ...draft.minimumVisibility }) : null,
      runwayVisualRange: Object.freeze([...draft.runwayVisualRange]),
      weather,
      cloud,
      sky: this.deriveSky(cloud),
      ceiling: this.deriveCeiling(cloud),
      temperature: draft.temperature ? draft.temperature.temperature : null,
      dewTemperature: draft.temperature ? draft.temperature.dewTemperature : null,
      qnh: draft.qnh ? Object.freeze({ ...draft.qnh }) : null,
      windShear: Object.freeze([...draft.windShear]),
      validity: draft.validity
        ? Object.freeze({ from: Object.freeze({ ...draft.validity.from }), to: Object.freeze({ ...draft.validity.to }) })
        : null,
      trend: this.joinSection(tokenized.groups, tokenized.trendIndex, tokenized.remarksIndex ?? tokenized.groups.length),
      remarks: tokenized.remarksIndex !== null
        ? this.joinSection(tokenized.groups, tokenized.remarksIndex + 1, tokenized.groups.length)
        : null
    };

    return Object.freeze(report);
  }

  private freezeWind(wind: Wind): Readonly<Wind> {
    const range = wind.directionRange;
    return Object.freeze({
      ...wind,
      directionRange: range ? Object.freeze([range[0], range[1]] as const) : null
    });
  }

  private walk(body: readonly Token[], start: number): Draft {
    const draft: Draft = {
      time: null,
      validity: null,
      wind: null,
      cavok: false,
      visibility: null,
      minimumVisibility: null,
      runwayVisualRange: [],
      weather: [],
      cloud: [],
      temperature: null,
      qnh: null,
      windShear: [],
      auto: false
    };

    let position = start;
    while (position < body.length) {
      let consumed = 0;

      for (const extractor of this.extractors) {
        const extraction = extractor.extract(body, position);
        if (!extraction) {
          continue;
        }
        this.fold(draft, extraction.field);
        consumed = extraction.consumed;
        break;
      }

      // Unrecognized group: skip it
      position += Math.max(consumed, 1);
    }

    return draft;
  }

  /**
   * Singular fields keep their first value; lists accumulate in report order
   */
  private fold(draft: Draft, field: ExtractedField): void {
    switch (field.name) {
      case 'time':
        draft.time = draft.time ?? field.value;
        break;
      case 'validity':
        draft.validity = draft.validity ?? field.value;
        break;
      case 'wind':
        draft.wind = draft.wind ?? field.value;
        break;
      case 'cavok':
        draft.cavok = true;
        break;
      case 'visibility':
        if (!draft.visibility) {
          draft.visibility = field.value;
        } else if (!draft.minimumVisibility && field.value.direction !== null) {
          draft.minimumVisibility = field.value;
        }
        break;
      case 'runwayVisualRange':
        draft.runwayVisualRange.push(Object.freeze({
          ...field.value,
          value: Object.freeze({ ...field.value.value }),
          minimum: field.value.minimum ? Object.freeze({ ...field.value.minimum }) : null
        }));
        break;
      case 'weather':
        draft.weather.push(Object.freeze({ ...field.value, phenomena: Object.freeze([...field.value.phenomena]) }));
        break;
      case 'cloud':
        draft.cloud.push(Object.freeze({ ...field.value }));
        break;
      case 'temperature':
        draft.temperature = draft.temperature ?? field.value;
        break;
      case 'qnh':
        draft.qnh = draft.qnh ?? field.value;
        break;
      case 'windShear':
        draft.windShear.push(field.value);
        break;
      case 'auto':
        draft.auto = true;
        break;
    }
  }

  /**
   * Reports carry only day/hour/minute; the caller supplies year and month.
   */
  private composeDatetime(time: ReportTime, year: number, month: number): string {
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new DateCompositionError(`Month out of range: ${year}-${month}`);
    }
    if (time.day < 1 || time.day > 31) {
      throw new DateCompositionError(`Day out of range: ${time.day}`);
    }
    if (time.hour > 23) {
      throw new DateCompositionError(`Hour out of range: ${time.hour}`);
    }
    if (time.minute > 59) {
      throw new DateCompositionError(`Minute out of range: ${time.minute}`);
    }

    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, time.day);
    date.setUTCHours(time.hour, time.minute, 0, 0);

    // Date rolls 31 April over into 1 May
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== time.day) {
      throw new DateCompositionError(`Day ${time.day} does not exist in ${year}-${String(month).padStart(2, '0')}`);
    }

    // Second precision: reports never carry seconds
    return date.toISOString().replace('.000Z', 'Z');
  }

  private deriveSky(cloud: readonly CloudLayer[]): SkyCondition {
    if (cloud.some(layer => layer.coverage === 'VV')) return 'obscured';
    if (cloud.some(layer => layer.coverage === 'OVC')) return 'overcast';
    if (cloud.some(layer => layer.coverage === null || ['FEW', 'SCT', 'BKN'].includes(layer.coverage))) return 'cloudy';
    return 'clear';
  }

  private deriveCeiling(cloud: readonly CloudLayer[]): number | null {
    const heights = cloud
      .filter(layer => layer.coverage !== null && this.CEILING_COVERAGES.includes(layer.coverage))
      .map(layer => layer.height)
      .filter((height): height is number => height !== null);
    return heights.length > 0 ? Math.min(...heights) * 100 : null;
  }

  private joinSection(groups: readonly Token[], from: number | null, to: number): string | null {
    if (from === null || from >= to) {
      return null;
    }
    return groups.slice(from, to).map(g => g.value).join(' ');
  }
}
