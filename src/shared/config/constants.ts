/**
 * Model defaults and application constants
 */

import type {
  ScenarioInput,
  GrowthParameters,
  ChamberParameters,
  InputRanges
} from '../../types/potato-twin';

// Default values
export const DEFAULT_VALUES = {
  LOG_LEVEL: 'INFO',
  STAGE: 'development',
  MAX_SIMULATION_DAYS: 365,
  MAX_SCENARIOS_PER_REQUEST: 10
} as const;

// Fixed model constants
export const MODEL_CONSTANTS = {
  SECONDS_PER_HOUR: 3600,
  SECONDS_PER_DAY: 86400,
  HOURS_PER_DAY: 24,
  UMOL_PER_MOL: 1e6,
  MJ_PER_MOL_PAR: 0.219,
  EPSILON: 1e-9,
  TUBER_DRY_TO_FRESH_RATIO: 0.22,
  TUBER_PARTITION_BEFORE_INIT: 0.05,
  TUBER_PARTITION_AFTER_INIT: 0.4,
  TUBER_PARTITION_MIN: 0.05,
  TUBER_PARTITION_MAX: 0.9,
  PHOTOPERIOD_NEUTRAL_H: 16,
  PHOTOPERIOD_RESPONSE_BAND_H: 6,
  PHOTOPERIOD_MAX_BONUS: 0.5,
  LEAF_BIAS_BEFORE_INIT: 0.7,
  LEAF_BIAS_AFTER_INIT: 0.5
} as const;

export const DEFAULT_SCENARIO: Readonly<ScenarioInput> = Object.freeze({
  days: 90,
  ppfdUmolM2S: 350,
  photoperiodH: 12,
  co2Ppm: 800,
  targetChamberTempC: 18,
  initialLeafDryG: 1,
  groundAreaM2: 1
});

export const DEFAULT_GROWTH_PARAMETERS: Readonly<GrowthParameters> = Object.freeze({
  lueDryGPerMJ: 1.3,
  fracPar: 0.48,
  slaM2PerGDry: 0.02,
  kExtinction: 0.65,
  dryToFreshRatio: 0.2,
  baseTempC: 7,
  optTempC: 18,
  maxTempC: 30,
  co2RefPpm: 400,
  co2SatPpm: 1200,
  ttEmergence: 120,
  ttTuberInit: 350,
  ttMaturity: 1500,
  maintFracPerDay: 0.003
});

export const DEFAULT_CHAMBER_PARAMETERS: Readonly<ChamberParameters> = Object.freeze({
  heatCapacityKJPerK: 1200,
  uKJPerDayPerK: 650,
  ledPowerW: 400,
  otherPowerW: 80,
  coolingCapacityKJPerDay: 25000,
  ambientTempC: 20
});

// Ranges the model has been exercised over from the dashboard
export const CALIBRATED_SCENARIO_RANGES: InputRanges<ScenarioInput> = {
  days: { min: 30, max: 180 },
  ppfdUmolM2S: { min: 150, max: 800 },
  photoperiodH: { min: 10, max: 20 },
  co2Ppm: { min: 400, max: 2000 },
  targetChamberTempC: { min: 12, max: 26 },
  initialLeafDryG: { min: 0.5, max: 10 },
  groundAreaM2: { min: 0.2, max: 2 }
};

export const CALIBRATED_CHAMBER_RANGES: Partial<InputRanges<ChamberParameters>> = {
  ledPowerW: { min: 50, max: 1500 },
  otherPowerW: { min: 0, max: 300 },
  coolingCapacityKJPerDay: { min: 0, max: 60000 },
  ambientTempC: { min: 10, max: 35 }
};
