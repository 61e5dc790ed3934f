/**
 * Potato twin data models
 * Parameter records consumed by the simulation engine and the series it returns
 */

import type { NumericRange, PhenologyStage } from './core';

// Initial and environmental conditions of one simulation run
export interface ScenarioInput {
  days: number;
  ppfdUmolM2S: number; // μmol photons per m² per second
  photoperiodH: number; // hours of light per day
  co2Ppm: number;
  targetChamberTempC: number; // cooling setpoint
  initialLeafDryG: number;
  groundAreaM2: number; // surface area per plant, for LAI
}

// Biological constants controlling crop growth
export interface GrowthParameters {
  lueDryGPerMJ: number; // dry g biomass per MJ absorbed PAR
  fracPar: number; // fraction of incoming radiation that is PAR
  slaM2PerGDry: number; // specific leaf area
  kExtinction: number; // Beer–Lambert canopy extinction coefficient
  dryToFreshRatio: number;

  // Cardinal temperatures (°C), strictly increasing
  baseTempC: number;
  optTempC: number;
  maxTempC: number;

  // CO₂ response, ref < sat
  co2RefPpm: number;
  co2SatPpm: number;

  // Thermal time thresholds (°C·day), strictly increasing
  ttEmergence: number;
  ttTuberInit: number;
  ttMaturity: number;

  maintFracPerDay: number; // fraction of total biomass respired daily
}

// Physical constants of the growth chamber
export interface ChamberParameters {
  heatCapacityKJPerK: number;
  uKJPerDayPerK: number; // heat loss to ambient per K difference
  ledPowerW: number;
  otherPowerW: number; // fans, pumps and other continuous loads
  coolingCapacityKJPerDay: number;
  ambientTempC: number;
}

// Values of every state variable on a single day
export interface DaySnapshot {
  readonly leafDryG: number;
  readonly stemDryG: number;
  readonly tuberDryG: number;
  readonly chamberTempC: number;
  readonly thermalTime: number;
  readonly cumEnergyKWh: number;
}

// Full daily time series of one run, index = day after planting
export interface SimulationResult {
  readonly days: readonly number[];
  readonly thermalTime: readonly number[];
  readonly leafDryG: readonly number[];
  readonly stemDryG: readonly number[];
  readonly tuberDryG: readonly number[];
  readonly totalDryG: readonly number[];
  readonly freshTotalG: readonly number[];
  readonly tuberFreshG: readonly number[];
  readonly chamberTempC: readonly number[];
  readonly cumEnergyKWh: readonly number[];
  readonly dliMolM2D: number;
}

// First day each phenology threshold is reached, null if never within the run
export interface PhenologyMilestones {
  emergence: number | null;
  tuberInitiation: number | null;
  maturity: number | null;
}

export interface SimulationSummary {
  finalTuberFreshG: number;
  finalTotalFreshG: number;
  totalEnergyKWh: number;
  dliMolM2D: number;
  parMJPerM2Day: number;
  incidentRadiationMJPerM2Day: number;
  harvestIndex: number;
  tuberFreshGPerKWh: number;
  peakChamberTempC: number;
  meanChamberTempC: number;
  finalThermalTime: number;
  finalStage: PhenologyStage;
  milestones: PhenologyMilestones;
}

// A labelled what-if run for side-by-side comparison
export interface ScenarioVariant {
  label: string;
  scenario: ScenarioInput;
  growthParameters?: Partial<GrowthParameters>;
  chamberParameters?: Partial<ChamberParameters>;
}

export interface VariantOutcome {
  label: string;
  rank: number;
  summary: SimulationSummary;
}

export interface ScenarioComparison {
  outcomes: VariantOutcome[];
  highestYieldLabel: string;
  mostEfficientLabel: string;
}

export type InputRanges<T> = { [K in keyof T]: NumericRange };
