/**
 * Lambda response utilities for consistent API responses
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { DEFAULT_VALUES } from '../config/constants';
import { Logger } from './logger';

export class LambdaResponse {
  private static defaultHeaders = {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  };

  /**
   * Create a successful response
   */
  static success(data: unknown, statusCode: number = 200): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create an error response
   */
  static error(message: string, statusCode: number = 500, details?: unknown): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: false,
        error: {
          message,
          details,
        },
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create a validation error response
   */
  static validationError(errors: string[], warnings: string[] = []): APIGatewayProxyResult {
    return this.error('Validation failed', 400, {
      validationErrors: errors,
      ...(warnings.length > 0 ? { warnings } : {}),
    });
  }
}

/**
 * Error handler wrapper for Lambda functions
 */
export function handleLambdaError(error: unknown, logger: Logger = new Logger()): APIGatewayProxyResult {
  logger.error('Lambda function error', error);

  if (error instanceof Error && error.name === 'ValidationError') {
    return LambdaResponse.validationError([error.message]);
  }

  if (error instanceof SyntaxError) {
    return LambdaResponse.validationError([`Request body is not valid JSON: ${error.message}`]);
  }

  // Loading the environment may itself be what failed
  const isDevelopment = (process.env.STAGE || DEFAULT_VALUES.STAGE) === 'development';

  // Default to internal server error
  return LambdaResponse.error(
    'Internal server error',
    500,
    isDevelopment && error instanceof Error ? error.stack : undefined
  );
}
