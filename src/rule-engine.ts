/**
 * Rule Engine - Applies catalog rules and determines the verdict
 */

import type { RuleContext, ValidationResult, ValidationRule } from './types';

export class RuleEngine {
  /**
   * Evaluate rules in order.
   * The first rule that reports an issue decides the result; later rules
   * are not run. No issue from any rule means the report is valid.
   */
  evaluate(context: RuleContext, rules: readonly ValidationRule[]): ValidationResult {
    for (const rule of rules) {
      const error = rule.check(context);
      if (error !== null) {
        return {
          valid: false,
          error,
          rule: rule.id
        };
      }
    }

    return {
      valid: true,
      error: null,
      rule: null
    };
  }
}
