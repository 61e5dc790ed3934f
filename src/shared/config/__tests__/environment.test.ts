import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getEnvironment, resetEnvironment } from '../environment';

beforeEach(() => {
  vi.stubEnv('STAGE', '');
  vi.stubEnv('LOG_LEVEL', '');
  vi.stubEnv('MAX_SIMULATION_DAYS', '');
  vi.stubEnv('MAX_SCENARIOS_PER_REQUEST', '');
  resetEnvironment();
});

afterEach(() => {
  vi.unstubAllEnvs();
  resetEnvironment();
});

describe('getEnvironment', () => {
  it('uses defaults when nothing is set', () => {
    expect(getEnvironment()).toEqual({
      stage: 'development',
      logLevel: 'INFO',
      maxSimulationDays: 365,
      maxScenariosPerRequest: 10
    });
  });

  it('reads values from the process environment', () => {
    vi.stubEnv('STAGE', 'production');
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.stubEnv('MAX_SIMULATION_DAYS', '200');
    vi.stubEnv('MAX_SCENARIOS_PER_REQUEST', '4');

    expect(getEnvironment()).toEqual({
      stage: 'production',
      logLevel: 'warn',
      maxSimulationDays: 200,
      maxScenariosPerRequest: 4
    });
  });

  it('reports every invalid setting at once', () => {
    vi.stubEnv('STAGE', 'qa');
    vi.stubEnv('MAX_SIMULATION_DAYS', 'forever');
    vi.stubEnv('MAX_SCENARIOS_PER_REQUEST', '51');

    expect(() => getEnvironment()).toThrow(
      'Environment configuration errors:\n' +
      'STAGE must be one of: development, staging, production\n' +
      'MAX_SIMULATION_DAYS must be between 1 and 3650\n' +
      'MAX_SCENARIOS_PER_REQUEST must be between 1 and 50'
    );
  });

  it('rejects an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'TRACE');
    expect(() => getEnvironment()).toThrow('LOG_LEVEL must be one of: DEBUG, INFO, WARN, ERROR');
  });

  it('caches the configuration until reset', () => {
    expect(getEnvironment().maxSimulationDays).toBe(365);

    vi.stubEnv('MAX_SIMULATION_DAYS', '30');
    expect(getEnvironment().maxSimulationDays).toBe(365);

    resetEnvironment();
    expect(getEnvironment().maxSimulationDays).toBe(30);
  });

  it('returns a copy of the cached configuration', () => {
    const config = getEnvironment();
    config.maxSimulationDays = 1;
    expect(getEnvironment().maxSimulationDays).toBe(365);
  });
});
