/**
 * Result Validator - rule checks on a result bundle before any model sees it
 */

import type { ResultBundle } from '../types';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ValidationRule {
  name: string;
  validate: (output: string, bundle: ResultBundle) => { pass: boolean; message?: string };
}

const ERROR_MARKERS = ['ERROR:', 'FAILED:', 'Exception:', 'Traceback'];

export class ResultValidator {
  private rules: ValidationRule[];

  constructor(maxOutputLength = 100000) {
    this.rules = [
      {
        name: 'non-empty',
        validate: (output: string) => ({
          pass: output.trim().length > 0,
          message: 'Output cannot be empty',
        }),
      },
      {
        name: 'no-error-markers',
        validate: (output: string) => {
          const marker = ERROR_MARKERS.find((m) => output.includes(m));
          return {
            pass: marker === undefined,
            message: marker ? `Output contains error marker "${marker}"` : undefined,
          };
        },
      },
      {
        name: 'reasonable-length',
        validate: (output: string) => ({
          pass: output.length < maxOutputLength,
          message: 'Output exceeds reasonable length limit',
        }),
      },
    ];
  }

  addRule(rule: ValidationRule): void {
    this.rules.push(rule);
  }

  validate(bundle: ResultBundle): ValidationResult {
    const errors: string[] = [];

    for (const rule of this.rules) {
      const result = rule.validate(bundle.output, bundle);
      if (!result.pass && result.message) {
        errors.push(`[${rule.name}] ${result.message}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
