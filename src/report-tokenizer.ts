/**
 * Report Tokenizer - Splits raw report text into positioned groups
 */

import { ReportKind } from './types';
import type { ReportModifier, ReportSection, Token, TokenizedReport } from './types';
import {
  HEADER_MODIFIERS,
  ICAO_PATTERN,
  PROBABILITY_PATTERN,
  TAF_CHANGE_PATTERN,
  TIME_PATTERN
} from './group-patterns';

export class ReportTokenizer {
  private readonly END_OF_MESSAGE = '=';
  private readonly REMARKS_MARKER = 'RMK';
  private readonly TREND_KEYWORDS = ['NOSIG', 'BECMG', 'TEMPO'];

  tokenize(text: string): TokenizedReport {
    // Step 1: Strip surrounding whitespace and the end-of-message sentinel
    const normalized = this.normalize(text);

    // Step 2: Split on whitespace
    const values = normalized.length > 0 ? normalized.split(/\s+/) : [];

    // Step 3: Read the header (kind, modifiers, station, time)
    let position = 0;
    let kind: ReportKind | null = null;
    const modifiers: ReportModifier[] = [];

    const keyword = this.toKind(values[0]);
    if (keyword) {
      kind = keyword;
      position++;
      let modifier = this.toModifier(values[position]);
      while (modifier) {
        modifiers.push(modifier);
        position++;
        modifier = this.toModifier(values[position]);
      }
    }

    let icao: string | null = null;
    if (position < values.length && ICAO_PATTERN.test(values[position])) {
      icao = values[position];
      position++;
    }
    const bodyStart = position;

    // Step 4: Locate the remarks and trend boundaries
    const remarksAt = values.indexOf(this.REMARKS_MARKER);
    const remarksIndex = remarksAt >= 0 ? remarksAt : null;
    const trendIndex = this.findTrend(values, bodyStart, remarksIndex ?? values.length, kind);

    // Step 5: Build positioned tokens tagged with their section
    const groups: Token[] = values.map((value, index) => ({
      value,
      index,
      section: this.sectionOf(index, bodyStart, trendIndex, remarksIndex)
    }));

    const timeGroup = bodyStart < groups.length && TIME_PATTERN.test(groups[bodyStart].value)
      ? groups[bodyStart]
      : null;

    const observed = groups.filter(g => g.section === 'header' || g.section === 'body');

    return {
      normalized,
      groups,
      kind,
      modifiers,
      icao,
      timeGroup,
      bodyStart,
      trendIndex,
      remarksIndex,
      nil: observed.some(g => g.value === 'NIL'),
      cancelled: observed.some(g => g.value === 'CNL')
    };
  }

  private normalize(text: string): string {
    let normalized = text.trim();
    if (normalized.endsWith(this.END_OF_MESSAGE)) {
      normalized = normalized.slice(0, -1).trimEnd();
    }
    return normalized;
  }

  private toKind(value: string | undefined): ReportKind | null {
    switch (value) {
      case 'METAR':
        return ReportKind.METAR;
      case 'SPECI':
        return ReportKind.SPECI;
      case 'TAF':
        return ReportKind.TAF;
      default:
        return null;
    }
  }

  private toModifier(value: string | undefined): ReportModifier | null {
    return HEADER_MODIFIERS.find(m => m === value) ?? null;
  }

  /**
   * First change-group keyword between the body start and the remarks
   */
  private findTrend(values: string[], from: number, to: number, kind: ReportKind | null): number | null {
    for (let i = from; i < to; i++) {
      const value = values[i];
      if (this.TREND_KEYWORDS.includes(value) || PROBABILITY_PATTERN.test(value)) {
        return i;
      }
      if (kind === ReportKind.TAF && TAF_CHANGE_PATTERN.test(value)) {
        return i;
      }
    }
    return null;
  }

  private sectionOf(
    index: number,
    bodyStart: number,
    trendIndex: number | null,
    remarksIndex: number | null
  ): ReportSection {
    if (remarksIndex !== null && index >= remarksIndex) {
      return 'remarks';
    }
    if (index < bodyStart) {
      return 'header';
    }
    if (trendIndex !== null && index >= trendIndex) {
      return 'trend';
    }
    return 'body';
  }
}
