/**
 * Environment configuration for the simulation Lambda functions
 * Centralizes environment variable management and validation
 */

import { DEFAULT_VALUES } from './constants';

export type Stage = 'development' | 'staging' | 'production';

export interface EnvironmentConfig {
  stage: Stage;

  // Application Settings
  logLevel: string;

  // Request limits
  maxSimulationDays: number;
  maxScenariosPerRequest: number;
}

const VALID_STAGES: readonly Stage[] = ['development', 'staging', 'production'];

function isStage(value: string): value is Stage {
  return VALID_STAGES.some(stage => stage === value);
}

class EnvironmentManager {
  private config: EnvironmentConfig;

  constructor() {
    this.config = this.loadConfiguration();
  }

  private loadConfiguration(): EnvironmentConfig {
    const errors: string[] = [];

    const stage = process.env.STAGE || DEFAULT_VALUES.STAGE;
    if (!isStage(stage)) {
      errors.push(`STAGE must be one of: ${VALID_STAGES.join(', ')}`);
    }

    const logLevel = process.env.LOG_LEVEL || DEFAULT_VALUES.LOG_LEVEL;
    const validLogLevels = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
    if (!validLogLevels.includes(logLevel.toUpperCase())) {
      errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}`);
    }

    const maxSimulationDays = parseInt(
      process.env.MAX_SIMULATION_DAYS || String(DEFAULT_VALUES.MAX_SIMULATION_DAYS),
      10
    );
    if (!(maxSimulationDays >= 1 && maxSimulationDays <= 3650)) {
      errors.push('MAX_SIMULATION_DAYS must be between 1 and 3650');
    }

    const maxScenariosPerRequest = parseInt(
      process.env.MAX_SCENARIOS_PER_REQUEST || String(DEFAULT_VALUES.MAX_SCENARIOS_PER_REQUEST),
      10
    );
    if (!(maxScenariosPerRequest >= 1 && maxScenariosPerRequest <= 50)) {
      errors.push('MAX_SCENARIOS_PER_REQUEST must be between 1 and 50');
    }

    if (errors.length > 0 || !isStage(stage)) {
      throw new Error(`Environment configuration errors:\n${errors.join('\n')}`);
    }

    return {
      stage,
      logLevel,
      maxSimulationDays,
      maxScenariosPerRequest
    };
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }
}

// Singleton instance
let environmentManager: EnvironmentManager | undefined;

function getManager(): EnvironmentManager {
  if (!environmentManager) {
    environmentManager = new EnvironmentManager();
  }
  return environmentManager;
}

export function getEnvironment(): EnvironmentConfig {
  return getManager().getConfig();
}

/**
 * Drop the cached configuration so the next read sees the current process.env
 */
export function resetEnvironment(): void {
  environmentManager = undefined;
}
