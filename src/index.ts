/**
 * metar-inspect - Main entry point
 */

import type { Report, ValidationResult, ValidatorConfig } from './types';
import { ReportAssembler } from './report-assembler';
import { Validator } from './validator';

const assembler = new ReportAssembler();
const validator = new Validator();

/**
 * Decode a METAR, SPECI or TAF report.
 * Year and month are supplied by the caller; the report carries day and time only.
 */
export function decode(text: string, year: number, month: number): Report {
  return assembler.assemble(text, year, month);
}

/**
 * Check a report against the format rules; returns the first failure found.
 */
export function validate(text: string, config?: Partial<ValidatorConfig>): ValidationResult {
  return validator.validate(text, config);
}

export * from './types';
export * from './errors';
export { ReportTokenizer } from './report-tokenizer';
export { ReportAssembler } from './report-assembler';
export { EXTRACTION_ORDER } from './field-extractors';
export { RULE_CATALOG, findRule } from './rule-catalog';
export { RuleEngine } from './rule-engine';
export { Validator } from './validator';
export type { ValidatorOptions } from './validator';
export { ConfigLoader, DEFAULT_VALIDATOR_CONFIG, resolveConfig } from './config-loader';
export type { ConfigPaths } from './config-loader';
export { AuditLogger } from './audit-logger';
export { KEYWORD_LEXICON, loadLexicon, parseLexicon } from './keyword-lexicon';
export type { KeywordLexicon } from './keyword-lexicon';
