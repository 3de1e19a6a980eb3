import { isThresholdKey } from './types';
import type { ThresholdOverrides, ValidationResult } from './types';

export interface ThresholdValidationResult extends ValidationResult {
  thresholds: ThresholdOverrides;
}

/**
 * Checks a raw thresholds object (parsed YAML/JSON or CLI flags) and
 * normalizes numeric strings to numbers.
 */
export class ThresholdValidator {
  validate(raw: Record<string, unknown>, source = 'configuration'): ThresholdValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const thresholds: ThresholdOverrides = {};

    for (const [key, value] of Object.entries(raw)) {
      if (value === undefined) continue;

      if (!isThresholdKey(key)) {
        warnings.push(`Unknown threshold '${key}' in ${source} will be ignored`);
        continue;
      }

      const parsed = this.toNumber(value);
      if (parsed === null) {
        errors.push(`${key} in ${source} must be a number, got ${JSON.stringify(value)}`);
      } else if (parsed < 0) {
        errors.push(`${key} in ${source} must not be negative, got ${parsed}`);
      } else {
        thresholds[key] = parsed;
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      thresholds
    };
  }

  private toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
      return parseFloat(value);
    }
    return null;
  }
}
