/**
 * Unit tests for the rule catalog
 */

import { describe, it, expect } from 'vitest';
import { RULE_CATALOG, findRule } from '../../src/rule-catalog';
import { RuleEngine } from '../../src/rule-engine';
import { ReportTokenizer } from '../../src/report-tokenizer';
import { resolveConfig } from '../../src/config-loader';
import type { ValidationResult, ValidatorConfig } from '../../src/types';

describe('RULE_CATALOG', () => {
  const engine = new RuleEngine();
  const tokenizer = new ReportTokenizer();

  const check = (text: string, config?: Partial<ValidatorConfig>): ValidationResult =>
    engine.evaluate({ report: tokenizer.tokenize(text), config: resolveConfig(config) }, RULE_CATALOG);

  const expectFailure = (text: string, rule: string, error: string, config?: Partial<ValidatorConfig>): void => {
    expect(check(text, config)).toEqual({ valid: false, rule, error });
  };

  describe('catalog', () => {
    it('should have unique rule ids', () => {
      const ids = RULE_CATALOG.map(rule => rule.id);
      expect(new Set(ids).size).toBe(ids.length);
    });

    it('should order concerns from structure to remarks', () => {
      const concerns = RULE_CATALOG.map(rule => rule.concern).filter((c, i, all) => all.indexOf(c) === i);

      expect(concerns).toEqual([
        'structure',
        'header',
        'wind',
        'visibility-qnh',
        'cloud-temperature',
        'spelling',
        'isolated',
        'trend',
        'remarks'
      ]);
    });

    it('should find rules by id', () => {
      expect(findRule('qnh-present')?.concern).toBe('visibility-qnh');
      expect(findRule('no-such-rule')).toBeUndefined();
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(RULE_CATALOG)).toBe(true);
    });
  });

  describe('structure', () => {
    it('should reject empty text', () => {
      expectFailure('  ', 'empty-report', 'Empty report');
    });

    it('should reject line breaks', () => {
      expectFailure('METAR ZBAA\n250500Z 21009MPS 9999 Q1018', 'line-breaks', 'Report contains line breaks');
    });

    it('should reject reports over the configured length', () => {
      expectFailure(
        'METAR ZYAS 250500Z 21009MPS 6000 Q1018',
        'max-length',
        'Report exceeds maximum length of 20 characters',
        { maxLength: 20 }
      );
    });

    it('should list each invalid character once', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 Q1018 ?: ?',
        'invalid-characters',
        'Report contains invalid characters: ? :'
      );
    });

    it('should reject a decimal point outside remarks', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 99.9 Q1018', 'invalid-characters', 'Report contains invalid characters: .');
    });

    it('should allow a decimal point in remarks', () => {
      expect(check('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 RMK QFE 1013.2').valid).toBe(true);
    });

    it('should reject reports with fewer than three groups', () => {
      expectFailure('METAR ZBAA', 'minimum-groups', 'Report too short: METAR ZBAA');
    });
  });

  describe('header', () => {
    it('should reject a report type keyword glued to the station', () => {
      expectFailure('SPECIZBAA 250500Z 21009MPS', 'kind-keyword', 'Malformed report type keyword: SPECIZBAA');
    });

    it('should reject a repeated report type keyword', () => {
      expectFailure('METAR METAR ZBAA 250500Z 21009MPS 9999 Q1018', 'duplicate-header', 'Duplicate report header');
    });

    it('should accept a missing keyword unless a header is required', () => {
      const text = 'ZBAA 250500Z 21009MPS 9999 Q1018';

      expect(check(text).valid).toBe(true);
      expectFailure(text, 'header-required', 'Missing report type header (METAR/SPECI/TAF)', { requireHeader: true });
    });

    it('should reject a malformed station identifier', () => {
      expectFailure('METAR ZB1 250500Z 21009MPS 9999 Q1018', 'icao', 'Invalid or missing ICAO code: ZB1');
    });

    it('should reject a malformed time group', () => {
      expectFailure('METAR ZSSS 022000 14003MPS 9999 Q1015', 'time-format', 'Invalid or missing time group: 022000');
    });

    it('should reject a missing time group', () => {
      expectFailure('METAR COR ZSSS', 'time-format', 'Invalid or missing time group: (none)');
    });

    it('should reject out-of-range time values', () => {
      expectFailure('METAR ZBAA 322400Z 21009MPS 9999 Q1018', 'time-range', 'Time group out of range: 322400Z');
    });

    it('should reject two reports in one message', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 Q1018 250530Z 22009MPS',
        'single-report',
        'Multiple reports in one message: 250530Z'
      );
    });
  });

  describe('wind', () => {
    it('should reject a wind group split by spaces', () => {
      expectFailure('METAR ZBAA 250500Z 21003M PS 9999 Q1018', 'wind-separators', 'Invalid wind format: 21003M PS');
    });

    it('should reject an unknown wind unit', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009KN 9999 Q1018',
        'wind-unit',
        'Invalid wind format: 21009KN (unit must be KT, MPS or KMH)'
      );
    });

    it('should reject wrong field widths', () => {
      expectFailure('METAR ZBAA 250500Z 2109MPS 9999 Q1018', 'wind-width', 'Invalid wind format: 2109MPS');
    });

    it('should reject a gust that does not exceed the speed', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009G09MPS 9999 Q1018',
        'wind-gust',
        'Invalid wind format: 21009G09MPS (gust must exceed speed)'
      );
    });

    it('should reject a direction above 360', () => {
      expectFailure(
        'METAR ZBAA 250500Z 37009MPS 9999 Q1018',
        'wind-direction',
        'Invalid wind format: 37009MPS (direction out of range)'
      );
    });

    it('should reject a variable range bound above 360', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 180V370 9999 Q1018',
        'wind-direction',
        'Invalid wind format: 180V370 (direction range out of range)'
      );
    });

    it('should reject a report that stops after the wind', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS', 'observation-present', 'Missing observation data');
    });

    it('should accept a NIL report', () => {
      expect(check('METAR RCQC 301730Z NIL=').valid).toBe(true);
    });
  });

  describe('visibility and QNH', () => {
    it('should reject a malformed QNH', () => {
      expectFailure(
        'METAR ZBTJ 290200Z 35009MPS CAVOK M04/M27 Q102NOSIG=',
        'qnh-format',
        'Invalid QNH format: Q102NOSIG'
      );
    });

    it('should require a QNH group in a METAR', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08', 'qnh-present', 'Missing QNH group');
    });

    it('should accept a missing-data QNH', () => {
      expect(check('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q////').valid).toBe(true);
    });

    it('should not require QNH in a TAF', () => {
      expect(check('TAF ZBAA 250500Z 2506/2612 21009MPS 6000 NSC').valid).toBe(true);
    });

    it('should reject a malformed prevailing visibility', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 999 NSC Q1018', 'visibility-format', 'Invalid visibility format: 999');
    });

    it('should reject a malformed runway visual range', () => {
      expectFailure(
        'METAR ZSNJ 131400Z 00000MPS 2000 R06/090 BR NSC 01/M01 Q1027',
        'rvr-format',
        'Invalid RVR format: R06/090'
      );
    });

    it('should reject visibility reported next to CAVOK', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS CAVOK 9999 18/08 Q1018 NOSIG',
        'cavok-exclusive',
        'CAVOK reported with visibility group: 9999'
      );
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 CAVOK 18/08 Q1018',
        'cavok-exclusive',
        'CAVOK reported with visibility group: 9999'
      );
    });

    it('should reject runway visual range, weather and cloud next to CAVOK', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS CAVOK R36/1200 18/08 Q1018',
        'cavok-exclusive',
        'CAVOK reported with visibility group: R36/1200'
      );
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS CAVOK -RA 18/08 Q1018',
        'cavok-exclusive',
        'CAVOK reported with weather group: -RA'
      );
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS CAVOK FEW020 18/08 Q1018',
        'cavok-exclusive',
        'CAVOK reported with cloud group: FEW020'
      );
    });

    it('should allow NSC and recent weather next to CAVOK', () => {
      expect(check('METAR ZBAA 250500Z 21009MPS CAVOK NSC 18/08 Q1018 RESHRA NOSIG').valid).toBe(true);
    });

    it('should allow CAVOK forecast in a trend after reported visibility', () => {
      expect(check('METAR ZBAA 250500Z 21009MPS 8000 -SHRA NSC 18/08 Q1018 BECMG TL0630 CAVOK').valid).toBe(true);
    });
  });

  describe('cloud and temperature', () => {
    it('should accept convective cloud of unknown amount from an automated station', () => {
      expect(check('METAR EGLL 250550Z AUTO 24012KT 9999 //////CB 12/08 Q1018').valid).toBe(true);
    });

    it('should reject a cloud height with the wrong width', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 BKN23 Q1018', 'cloud-format', 'Invalid cloud group: BKN23');
    });

    it('should reject a misspelled coverage code', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 BKM023 Q1018', 'cloud-spelling', 'Misspelled cloud coverage: BKM023');
    });

    it('should reject a malformed temperature group', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC 18/8 Q1018',
        'temperature-format',
        'Invalid temperature format: 18/8'
      );
    });
  });

  describe('spelling', () => {
    it('should name the expected keyword for a known misspelling', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 NOSZ',
        'misspelled-keyword',
        'Spelling error: NOSZ (expected NOSIG)'
      );
    });

    it('should reject a keyword split by a space', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 NOS IG',
        'split-keyword',
        'Spelling error: NOS IG (expected NOSIG)'
      );
    });

    it('should reject a keyword merged with the next group', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 BECMGTL0130',
        'merged-keyword',
        'Spelling error: BECMGTL0130 (BECMG merged with following group)'
      );
    });

    it('should reject transmission markers', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 DUPE', 'forbidden-marker', 'Invalid field: DUPE');
    });
  });

  describe('isolated values', () => {
    it('should reject a trailing lone digit', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 NSC 18/08 Q1018 9', 'isolated-digit-ending', 'Isolated digit at ending: 9');
    });

    it('should reject a short number that belongs to no group', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 003 NSC Q1018', 'isolated-number', 'Isolated numeric value: 003');
    });

    it('should accept whole miles followed by a fraction', () => {
      expect(check('METAR KJFK 121751Z 28016G25KT 1 1/2SM BR OVC008 M01/M03 A2992').valid).toBe(true);
    });
  });

  describe('trend', () => {
    it('should reject a change time outside a trend', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC Q1018 FM0430 3000',
        'change-time-without-trend',
        'Change time FM0430 without BECMG/TEMPO'
      );
    });

    it('should reject QNH in a trend', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC Q1018 TEMPO Q1015',
        'trend-forbidden-groups',
        'QNH not allowed in TREND: Q1015'
      );
    });

    it('should reject RVR in a trend', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC Q1018 TEMPO R06/0900',
        'trend-forbidden-groups',
        'RVR not allowed in TREND: R06/0900'
      );
    });

    it('should reject observation-only groups in a trend', () => {
      expectFailure(
        'METAR ZBAA 250500Z 21009MPS 9999 NSC Q1018 TEMPO 18/08',
        'trend-content',
        'Suspicious field in TREND: 18/08'
      );
    });

    it('should accept forecast conditions in a trend', () => {
      expect(check('METAR ZBAA 250500Z 21009MPS 9999 NSC Q1018 BECMG TL0630 3000 -SHRA BKN030').valid).toBe(true);
    });

    it('should reject unrecognizable body groups', () => {
      expectFailure('METAR ZBAA 250500Z 21009MPS 9999 OCCGCRY NSC Q1018', 'suspicious-field', 'Suspicious field: OCCGCRY');
    });
  });

  describe('remarks', () => {
    const base = 'METAR RCMQ 230900Z 25008KT 9999 FEW010 22/18 Q1009';

    it('should accept remarks outside strict mode', () => {
      expect(check(`${base} NOSIG RMK A2982`).valid).toBe(true);
    });

    it('should reject remarks in strict mode', () => {
      expectFailure(
        `${base} NOSIG RMK A2982`,
        'strict-remarks',
        'RMK section not allowed in strict mode',
        { strictMode: true }
      );
    });

    it('should reject an empty remarks section', () => {
      expectFailure(`${base} RMK`, 'empty-remarks', 'Empty RMK section');
    });

    it('should reject a second RMK', () => {
      expectFailure(`${base} RMK AO2 RMK SLP`, 'duplicate-remarks', 'Duplicate RMK section');
    });

    it('should reject trend keywords in remarks', () => {
      expectFailure(`${base} RMK BECMG`, 'trend-in-remarks', 'TREND keyword BECMG found in RMK section');
    });
  });
});
