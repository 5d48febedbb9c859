/**
 * Validator - Main validation orchestrator
 */

import type { ValidationResult, ValidationRule, ValidatorConfig } from './types';
import { ReportTokenizer } from './report-tokenizer';
import { RuleEngine } from './rule-engine';
import { RULE_CATALOG } from './rule-catalog';
import { ConfigLoader, resolveConfig } from './config-loader';
import { AuditLogger } from './audit-logger';

export interface ValidatorOptions {
  /** Record every verdict; off unless given */
  auditLogger?: AuditLogger;
  /** Read defaults from the user and project config files once, at construction */
  configLoader?: ConfigLoader;
  rules?: readonly ValidationRule[];
}

export class Validator {
  private tokenizer: ReportTokenizer;
  private engine: RuleEngine;
  private rules: readonly ValidationRule[];
  private baseConfig: Partial<ValidatorConfig>;
  private auditLogger?: AuditLogger;

  constructor(options: ValidatorOptions = {}) {
    this.tokenizer = new ReportTokenizer();
    this.engine = new RuleEngine();
    this.rules = options.rules ?? RULE_CATALOG;
    this.baseConfig = options.configLoader ? options.configLoader.loadAll() : {};
    this.auditLogger = options.auditLogger;
  }

  /**
   * Check raw report text against the rule catalog.
   * Malformed reports produce an invalid result; only a non-string input throws.
   */
  validate(text: string, config?: Partial<ValidatorConfig>): ValidationResult {
    if (typeof text !== 'string') {
      throw new TypeError('Report text must be a string');
    }

    // Orchestrate validation pipeline
    const resolved = resolveConfig({ ...this.baseConfig, ...config });
    const report = this.tokenizer.tokenize(text);
    const result = this.engine.evaluate({ report, config: resolved }, this.rules);

    if (this.auditLogger) {
      this.auditLogger.log({
        timestamp: new Date().toISOString(),
        report: report.normalized,
        valid: result.valid,
        rule: result.rule,
        error: result.error
      });
    }

    return result;
  }
}
