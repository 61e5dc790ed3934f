/**
 * Simulation Lambda Functions
 * API surface of the twin: run one scenario, compare variants, read defaults
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import type { ValidationResult } from '../types/core';
import type {
  ScenarioInput,
  GrowthParameters,
  ChamberParameters,
  ScenarioVariant
} from '../types/potato-twin';
import {
  DEFAULT_SCENARIO,
  DEFAULT_GROWTH_PARAMETERS,
  DEFAULT_CHAMBER_PARAMETERS,
  CALIBRATED_SCENARIO_RANGES,
  CALIBRATED_CHAMBER_RANGES
} from '../shared/config/constants';
import { getEnvironment } from '../shared/config/environment';
import { createLambdaLogger } from '../shared/utils/logger';
import {
  Validator,
  ValidationError,
  isPlainObject,
  SCENARIO_FIELDS,
  GROWTH_FIELDS,
  CHAMBER_FIELDS
} from '../shared/utils/validation';
import { LambdaResponse, handleLambdaError } from '../shared/utils/lambda-response';
import { PotatoGrowthSimulationEngine } from './potato-growth-simulation';
import {
  ScenarioComparisonManager,
  withScenarioDefaults,
  withGrowthDefaults,
  withChamberDefaults
} from './scenario-comparison';

// Input interfaces for Lambda functions
export interface RunSimulationRequest {
  scenario?: Partial<ScenarioInput>;
  growthParameters?: Partial<GrowthParameters>;
  chamberParameters?: Partial<ChamberParameters>;
  includeSeries?: boolean;
}

export interface CompareSimulationsRequest {
  variants: Array<Omit<RunSimulationRequest, 'includeSeries'> & { label: string }>;
}

export type HandlerEvent = Pick<APIGatewayProxyEvent, 'body'>;
export type HandlerContext = Pick<Context, 'awsRequestId'>;

interface ResolvedInputs {
  scenario: ScenarioInput;
  growthParameters: GrowthParameters;
  chamberParameters: ChamberParameters;
}

/**
 * Parse the request body, which must be a JSON object when present
 */
function parseRequestBody(event: HandlerEvent): Record<string, unknown> {
  const parsed: unknown = JSON.parse(event.body || '{}');
  if (!isPlainObject(parsed)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return parsed;
}

/**
 * Merge the partial records of a request over the model defaults and validate them
 */
function resolveInputs(
  request: Record<string, unknown>,
  maxDays: number,
  prefix: string = ''
): { inputs: ResolvedInputs; result: ValidationResult } {
  const scenarioPart = Validator.parseNumericRecord(request.scenario, 'scenario', SCENARIO_FIELDS);
  const growthPart = Validator.parseNumericRecord(request.growthParameters, 'growthParameters', GROWTH_FIELDS);
  const chamberPart = Validator.parseNumericRecord(request.chamberParameters, 'chamberParameters', CHAMBER_FIELDS);

  const inputs: ResolvedInputs = {
    scenario: withScenarioDefaults(scenarioPart.values),
    growthParameters: withGrowthDefaults(growthPart.values),
    chamberParameters: withChamberDefaults(chamberPart.values)
  };

  const parsing = Validator.combineValidationResults([
    scenarioPart.result,
    growthPart.result,
    chamberPart.result
  ]);

  // Range checks are meaningless on fields that failed to parse
  const result = parsing.isValid
    ? Validator.combineValidationResults([
      parsing,
      Validator.validateScenario(inputs.scenario, maxDays),
      Validator.validateGrowthParameters(inputs.growthParameters),
      Validator.validateChamberParameters(inputs.chamberParameters)
    ])
    : parsing;

  return {
    inputs,
    result: {
      isValid: result.isValid,
      errors: result.errors.map(message => `${prefix}${message}`),
      warnings: result.warnings.map(message => `${prefix}${message}`)
    }
  };
}

/**
 * Run a single simulation
 */
export const runSimulation = async (
  event: HandlerEvent,
  context?: HandlerContext
): Promise<APIGatewayProxyResult> => {
  const runId = `sim_${uuidv4()}`;
  const logger = createLambdaLogger('runSimulation', context?.awsRequestId).child({ runId });

  try {
    const request = parseRequestBody(event);
    const { maxSimulationDays } = getEnvironment();
    const { inputs, result: validation } = resolveInputs(request, maxSimulationDays);

    if (!validation.isValid) {
      logger.warn('Rejected simulation request', { errors: validation.errors });
      return LambdaResponse.validationError(validation.errors, validation.warnings);
    }

    const engine = new PotatoGrowthSimulationEngine(logger);
    const { result, summary } = engine.run(
      inputs.scenario,
      inputs.growthParameters,
      inputs.chamberParameters
    );

    logger.info('Simulation completed', {
      days: inputs.scenario.days,
      finalTuberFreshG: summary.finalTuberFreshG
    });

    return LambdaResponse.success({
      runId,
      inputs,
      summary,
      warnings: validation.warnings,
      ...(request.includeSeries === false ? {} : { series: result })
    });

  } catch (error) {
    return handleLambdaError(error, logger);
  }
};

/**
 * Run several labelled variants and rank them
 */
export const compareSimulations = async (
  event: HandlerEvent,
  context?: HandlerContext
): Promise<APIGatewayProxyResult> => {
  const comparisonId = `cmp_${uuidv4()}`;
  const logger = createLambdaLogger('compareSimulations', context?.awsRequestId).child({ comparisonId });

  try {
    const request = parseRequestBody(event);
    const { maxSimulationDays, maxScenariosPerRequest } = getEnvironment();
    const rawVariants = request.variants;

    if (!Array.isArray(rawVariants) || rawVariants.length === 0) {
      return LambdaResponse.validationError(['variants must be a non-empty array']);
    }
    if (rawVariants.length > maxScenariosPerRequest) {
      return LambdaResponse.validationError([
        `variants must not contain more than ${maxScenariosPerRequest} entries`
      ]);
    }

    const variants: ScenarioVariant[] = [];
    const results: ValidationResult[] = [];
    const seenLabels = new Set<string>();

    rawVariants.forEach((raw: unknown, index: number) => {
      const prefix = `variants[${index}].`;
      if (!isPlainObject(raw)) {
        results.push({ isValid: false, errors: [`variants[${index}] must be an object`], warnings: [] });
        return;
      }

      const label = raw.label;
      if (typeof label !== 'string' || label.trim().length === 0) {
        results.push({ isValid: false, errors: [`${prefix}label is required and must be a non-empty string`], warnings: [] });
        return;
      }
      if (seenLabels.has(label)) {
        results.push({ isValid: false, errors: [`${prefix}label "${label}" is used more than once`], warnings: [] });
        return;
      }
      seenLabels.add(label);

      const { inputs, result } = resolveInputs(raw, maxSimulationDays, prefix);
      results.push(result);
      variants.push({
        label,
        scenario: inputs.scenario,
        growthParameters: inputs.growthParameters,
        chamberParameters: inputs.chamberParameters
      });
    });

    const validation = Validator.combineValidationResults(results);
    if (!validation.isValid) {
      logger.warn('Rejected comparison request', { errors: validation.errors });
      return LambdaResponse.validationError(validation.errors, validation.warnings);
    }

    const comparison = new ScenarioComparisonManager(logger).compare(variants);

    return LambdaResponse.success({
      comparisonId,
      ...comparison,
      warnings: validation.warnings
    });

  } catch (error) {
    return handleLambdaError(error, logger);
  }
};

/**
 * Default parameter records and the ranges the dashboard offers
 */
export const getDefaultParameters = async (
  _event?: HandlerEvent,
  context?: HandlerContext
): Promise<APIGatewayProxyResult> => {
  const logger = createLambdaLogger('getDefaultParameters', context?.awsRequestId);

  try {
    const { maxSimulationDays, maxScenariosPerRequest } = getEnvironment();

    return LambdaResponse.success({
      scenario: DEFAULT_SCENARIO,
      growthParameters: DEFAULT_GROWTH_PARAMETERS,
      chamberParameters: DEFAULT_CHAMBER_PARAMETERS,
      calibratedRanges: {
        scenario: CALIBRATED_SCENARIO_RANGES,
        chamberParameters: CALIBRATED_CHAMBER_RANGES
      },
      limits: {
        maxSimulationDays,
        maxScenariosPerRequest
      }
    });

  } catch (error) {
    return handleLambdaError(error, logger);
  }
};
