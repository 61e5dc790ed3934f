/**
 * Validation utilities for the Potato Chamber Twin
 * Checks parameter records arriving over the API before they reach the engine
 */

import type { ValidationResult, NumericRange } from '../../types/core';
import type {
  ScenarioInput,
  GrowthParameters,
  ChamberParameters
} from '../../types/potato-twin';
import {
  CALIBRATED_SCENARIO_RANGES,
  CALIBRATED_CHAMBER_RANGES
} from '../config/constants';

/**
 * Custom validation error class
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const SCENARIO_FIELDS = [
  'days',
  'ppfdUmolM2S',
  'photoperiodH',
  'co2Ppm',
  'targetChamberTempC',
  'initialLeafDryG',
  'groundAreaM2'
] as const satisfies readonly (keyof ScenarioInput)[];

export const GROWTH_FIELDS = [
  'lueDryGPerMJ',
  'fracPar',
  'slaM2PerGDry',
  'kExtinction',
  'dryToFreshRatio',
  'baseTempC',
  'optTempC',
  'maxTempC',
  'co2RefPpm',
  'co2SatPpm',
  'ttEmergence',
  'ttTuberInit',
  'ttMaturity',
  'maintFracPerDay'
] as const satisfies readonly (keyof GrowthParameters)[];

export const CHAMBER_FIELDS = [
  'heatCapacityKJPerK',
  'uKJPerDayPerK',
  'ledPowerW',
  'otherPowerW',
  'coolingCapacityKJPerDay',
  'ambientTempC'
] as const satisfies readonly (keyof ChamberParameters)[];

export interface ParsedRecord<K extends string> {
  values: Partial<Record<K, number>>;
  result: ValidationResult;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toResult(errors: string[], warnings: string[] = []): ValidationResult {
  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Pick the known numeric fields out of an untyped request object
   */
  static parseNumericRecord<K extends string>(
    raw: unknown,
    recordName: string,
    fields: readonly K[]
  ): ParsedRecord<K> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const values: Partial<Record<K, number>> = {};

    if (raw === undefined || raw === null) {
      return { values, result: toResult(errors, warnings) };
    }
    if (!isPlainObject(raw)) {
      errors.push(`${recordName} must be an object`);
      return { values, result: toResult(errors, warnings) };
    }

    for (const field of fields) {
      const value = raw[field];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        errors.push(`${recordName}.${field} must be a finite number`);
      } else {
        values[field] = value;
      }
    }

    const known: readonly string[] = fields;
    for (const key of Object.keys(raw)) {
      if (!known.includes(key)) {
        warnings.push(`${recordName}.${key} is not a recognised field and was ignored`);
      }
    }

    return { values, result: toResult(errors, warnings) };
  }

  /**
   * Validate a complete scenario record
   */
  static validateScenario(scenario: ScenarioInput, maxDays: number): ValidationResult {
    const errors: string[] = [];

    if (!Number.isInteger(scenario.days) || scenario.days < 1) {
      errors.push('scenario.days must be a positive integer');
    } else if (scenario.days > maxDays) {
      errors.push(`scenario.days must not exceed ${maxDays}`);
    }

    if (scenario.ppfdUmolM2S < 0) {
      errors.push('scenario.ppfdUmolM2S must not be negative');
    }
    if (scenario.photoperiodH < 0 || scenario.photoperiodH > 24) {
      errors.push('scenario.photoperiodH must be between 0 and 24');
    }
    if (scenario.co2Ppm < 0) {
      errors.push('scenario.co2Ppm must not be negative');
    }
    if (scenario.initialLeafDryG < 0) {
      errors.push('scenario.initialLeafDryG must not be negative');
    }
    if (scenario.groundAreaM2 <= 0) {
      errors.push('scenario.groundAreaM2 must be positive');
    }

    return toResult(errors, Validator.rangeWarnings('scenario', scenario, CALIBRATED_SCENARIO_RANGES, SCENARIO_FIELDS));
  }

  /**
   * Validate biological parameters, including the orderings the response
   * functions rely on
   */
  static validateGrowthParameters(growth: GrowthParameters): ValidationResult {
    const errors: string[] = [];

    for (const field of ['lueDryGPerMJ', 'slaM2PerGDry', 'kExtinction'] as const) {
      if (growth[field] < 0) {
        errors.push(`growthParameters.${field} must not be negative`);
      }
    }
    for (const field of ['fracPar', 'dryToFreshRatio'] as const) {
      if (growth[field] <= 0 || growth[field] > 1) {
        errors.push(`growthParameters.${field} must be greater than 0 and at most 1`);
      }
    }
    if (growth.maintFracPerDay < 0 || growth.maintFracPerDay > 1) {
      errors.push('growthParameters.maintFracPerDay must be between 0 and 1');
    }

    if (!(growth.baseTempC < growth.optTempC && growth.optTempC < growth.maxTempC)) {
      errors.push('growthParameters cardinal temperatures must satisfy baseTempC < optTempC < maxTempC');
    }
    if (!(growth.co2RefPpm < growth.co2SatPpm)) {
      errors.push('growthParameters.co2RefPpm must be below co2SatPpm');
    }
    if (!(growth.ttEmergence < growth.ttTuberInit && growth.ttTuberInit < growth.ttMaturity)) {
      errors.push('growthParameters thermal time thresholds must satisfy ttEmergence < ttTuberInit < ttMaturity');
    }

    return toResult(errors);
  }

  /**
   * Validate chamber hardware parameters
   */
  static validateChamberParameters(chamber: ChamberParameters): ValidationResult {
    const errors: string[] = [];

    if (chamber.heatCapacityKJPerK <= 0) {
      errors.push('chamberParameters.heatCapacityKJPerK must be positive');
    }
    for (const field of ['uKJPerDayPerK', 'ledPowerW', 'otherPowerW', 'coolingCapacityKJPerDay'] as const) {
      if (chamber[field] < 0) {
        errors.push(`chamberParameters.${field} must not be negative`);
      }
    }

    return toResult(errors, Validator.rangeWarnings('chamberParameters', chamber, CALIBRATED_CHAMBER_RANGES, CHAMBER_FIELDS));
  }

  /**
   * Warn about values outside the ranges the model has been exercised over
   */
  static rangeWarnings<K extends string>(
    recordName: string,
    record: Record<K, number>,
    ranges: Partial<Record<K, NumericRange>>,
    fields: readonly K[]
  ): string[] {
    const warnings: string[] = [];

    for (const field of fields) {
      const range = ranges[field];
      const value = record[field];
      if (range && (value < range.min || value > range.max)) {
        warnings.push(
          `${recordName}.${field} = ${value} is outside the calibrated range ${range.min}-${range.max}`
        );
      }
    }

    return warnings;
  }

  /**
   * Combine multiple validation results
   */
  static combineValidationResults(results: ValidationResult[]): ValidationResult {
    const allErrors: string[] = [];
    const allWarnings: string[] = [];

    for (const result of results) {
      allErrors.push(...result.errors);
      allWarnings.push(...result.warnings);
    }

    return toResult(allErrors, allWarnings);
  }

  /**
   * Throw error if validation fails
   */
  static throwIfInvalid(result: ValidationResult): void {
    if (!result.isValid) {
      throw new ValidationError(result.errors.join('; '));
    }
  }
}
