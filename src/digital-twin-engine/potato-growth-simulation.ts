/**
 * Potato Growth Simulation Engine
 * Day-stepped crop and chamber model: leaf, stem and tuber dry mass,
 * thermal time, chamber temperature and energy use.
 */

import type {
  ScenarioInput,
  GrowthParameters,
  ChamberParameters,
  DaySnapshot,
  SimulationResult,
  SimulationSummary,
  PhenologyMilestones
} from '../types/potato-twin';
import {
  DEFAULT_GROWTH_PARAMETERS,
  DEFAULT_CHAMBER_PARAMETERS,
  MODEL_CONSTANTS
} from '../shared/config/constants';
import { Logger, createLambdaLogger } from '../shared/utils/logger';
import {
  dliFromPpfd,
  molParToMJ,
  temperatureModifier,
  co2Modifier,
  canopyInterceptionFraction,
  tuberPartitionFraction,
  leafBiasFraction,
  phenologyStage
} from './response-functions';
import { chamberTempStep } from './chamber-thermal';

/* ============================================================
   DAILY UPDATE
============================================================ */

// Quantities fixed for the whole run
export interface RunConstants {
  scenario: ScenarioInput;
  growth: GrowthParameters;
  chamber: ChamberParameters;
  dliMolM2D: number;
  parMJ: number;
  co2Factor: number;
  ledKWhPerDay: number;
  otherKWhPerDay: number;
}

export function createRunConstants(
  scenario: ScenarioInput,
  growth: GrowthParameters,
  chamber: ChamberParameters
): RunConstants {
  const dli = dliFromPpfd(scenario.ppfdUmolM2S, scenario.photoperiodH);
  return {
    scenario,
    growth,
    chamber,
    dliMolM2D: dli,
    parMJ: molParToMJ(dli),
    co2Factor: co2Modifier(scenario.co2Ppm, growth.co2RefPpm, growth.co2SatPpm),
    // LEDs only draw during the photoperiod, other loads run all day
    ledKWhPerDay: (chamber.ledPowerW * scenario.photoperiodH) / 1000,
    otherKWhPerDay: (chamber.otherPowerW * MODEL_CONSTANTS.HOURS_PER_DAY) / 1000
  };
}

/**
 * Advance the crop and chamber by one day.
 * Every rate is evaluated from `today`; the returned snapshot is the next day.
 */
export function advanceDay(today: DaySnapshot, run: RunConstants): DaySnapshot {
  const { scenario, growth, chamber } = run;

  const fT = temperatureModifier(today.chamberTempC, growth.baseTempC, growth.optTempC, growth.maxTempC);
  const dTT = Math.max(0, today.chamberTempC - growth.baseTempC);
  const fI = canopyInterceptionFraction(today.leafDryG, growth, scenario.groundAreaM2);

  const grossDryG = growth.lueDryGPerMJ * (run.parMJ * fI) * fT * run.co2Factor;
  const maintenanceG = growth.maintFracPerDay * (today.leafDryG + today.stemDryG + today.tuberDryG);
  const netDryG = Math.max(grossDryG - maintenanceG, 0);

  const fracTuber = tuberPartitionFraction(today.thermalTime, scenario.photoperiodH, growth);
  const leafBias = leafBiasFraction(today.thermalTime, growth);

  const toTuber = netDryG * fracTuber;
  const toLeafStem = netDryG * (1 - fracTuber);
  const toLeaf = toLeafStem * leafBias;
  const toStem = toLeafStem * (1 - leafBias);

  return {
    leafDryG: Math.max(today.leafDryG + toLeaf, 0),
    stemDryG: Math.max(today.stemDryG + toStem, 0),
    tuberDryG: Math.max(today.tuberDryG + toTuber, 0),
    chamberTempC: chamberTempStep(today.chamberTempC, chamber, scenario.targetChamberTempC, 1),
    thermalTime: today.thermalTime + dTT,
    cumEnergyKWh: today.cumEnergyKWh + run.ledKWhPerDay + run.otherKWhPerDay
  };
}

/* ============================================================
   SIMULATION LOOP
============================================================ */

export function initialSnapshot(scenario: ScenarioInput): DaySnapshot {
  return {
    leafDryG: scenario.initialLeafDryG,
    stemDryG: 0,
    tuberDryG: 0,
    chamberTempC: scenario.targetChamberTempC,
    thermalTime: 0,
    cumEnergyKWh: 0
  };
}

/**
 * Run the simulation for `scenario.days` days and return days + 1 samples,
 * day 0 holding the initial conditions.
 */
export function simulatePotato(
  scenario: ScenarioInput,
  growth: GrowthParameters = DEFAULT_GROWTH_PARAMETERS,
  chamber: ChamberParameters = DEFAULT_CHAMBER_PARAMETERS
): SimulationResult {
  const days = scenario.days;
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`Simulation length must be a non-negative integer, got ${days}`);
  }

  const samples = days + 1;
  const leafDry = new Array<number>(samples);
  const stemDry = new Array<number>(samples);
  const tuberDry = new Array<number>(samples);
  const chamberTemp = new Array<number>(samples);
  const thermalTime = new Array<number>(samples);
  const energy = new Array<number>(samples);

  const record = (t: number, snapshot: DaySnapshot): void => {
    leafDry[t] = snapshot.leafDryG;
    stemDry[t] = snapshot.stemDryG;
    tuberDry[t] = snapshot.tuberDryG;
    chamberTemp[t] = snapshot.chamberTempC;
    thermalTime[t] = snapshot.thermalTime;
    energy[t] = snapshot.cumEnergyKWh;
  };

  const run = createRunConstants(scenario, growth, chamber);
  let today = Object.freeze(initialSnapshot(scenario));
  record(0, today);

  for (let t = 0; t < days; t++) {
    today = Object.freeze(advanceDay(today, run));
    record(t + 1, today);
  }

  // Post-processing
  const totalDry = leafDry.map((leaf, t) => leaf + stemDry[t] + tuberDry[t]);
  const dryToFresh = Math.max(growth.dryToFreshRatio, MODEL_CONSTANTS.EPSILON);
  const tuberDryToFresh = Math.max(MODEL_CONSTANTS.TUBER_DRY_TO_FRESH_RATIO, MODEL_CONSTANTS.EPSILON);

  return Object.freeze({
    days: Object.freeze(Array.from({ length: samples }, (_, t) => t)),
    thermalTime: Object.freeze(thermalTime),
    leafDryG: Object.freeze(leafDry),
    stemDryG: Object.freeze(stemDry),
    tuberDryG: Object.freeze(tuberDry),
    totalDryG: Object.freeze(totalDry),
    freshTotalG: Object.freeze(totalDry.map(dry => dry / dryToFresh)),
    tuberFreshG: Object.freeze(tuberDry.map(dry => dry / tuberDryToFresh)),
    chamberTempC: Object.freeze(chamberTemp),
    cumEnergyKWh: Object.freeze(energy),
    dliMolM2D: run.dliMolM2D
  });
}

/* ============================================================
   PHENOLOGY AND SUMMARY
============================================================ */

function firstDayReaching(thermalTime: readonly number[], threshold: number): number | null {
  const day = thermalTime.findIndex(tt => tt >= threshold);
  return day === -1 ? null : day;
}

export function findPhenologyMilestones(
  thermalTime: readonly number[],
  growth: GrowthParameters
): PhenologyMilestones {
  return {
    emergence: firstDayReaching(thermalTime, growth.ttEmergence),
    tuberInitiation: firstDayReaching(thermalTime, growth.ttTuberInit),
    maturity: firstDayReaching(thermalTime, growth.ttMaturity)
  };
}

/**
 * Key outputs of a finished run: end-of-run yields, energy use and efficiency,
 * chamber temperature statistics and crop development.
 */
export function summarizeSimulation(
  result: SimulationResult,
  growth: GrowthParameters = DEFAULT_GROWTH_PARAMETERS
): SimulationSummary {
  const last = result.days.length - 1;
  const finalTuberDryG = result.tuberDryG[last];
  const finalTotalDryG = result.totalDryG[last];
  const finalTuberFreshG = result.tuberFreshG[last];
  const totalEnergyKWh = result.cumEnergyKWh[last];
  const finalThermalTime = result.thermalTime[last];
  const parMJPerM2Day = molParToMJ(result.dliMolM2D);
  const temperatures = result.chamberTempC;

  return {
    finalTuberFreshG,
    finalTotalFreshG: result.freshTotalG[last],
    totalEnergyKWh,
    dliMolM2D: result.dliMolM2D,
    parMJPerM2Day,
    incidentRadiationMJPerM2Day: parMJPerM2Day / Math.max(growth.fracPar, MODEL_CONSTANTS.EPSILON),
    harvestIndex: finalTotalDryG > 0 ? finalTuberDryG / finalTotalDryG : 0,
    tuberFreshGPerKWh: totalEnergyKWh > 0 ? finalTuberFreshG / totalEnergyKWh : 0,
    peakChamberTempC: Math.max(...temperatures),
    meanChamberTempC: temperatures.reduce((sum, t) => sum + t, 0) / temperatures.length,
    finalThermalTime,
    finalStage: phenologyStage(finalThermalTime, growth),
    milestones: findPhenologyMilestones(result.thermalTime, growth)
  };
}

/* ============================================================
   MAIN ENGINE
============================================================ */

export interface SimulationRun {
  result: SimulationResult;
  summary: SimulationSummary;
}

export class PotatoGrowthSimulationEngine {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLambdaLogger('PotatoGrowthSimulationEngine');
  }

  public run(
    scenario: ScenarioInput,
    growth: GrowthParameters = DEFAULT_GROWTH_PARAMETERS,
    chamber: ChamberParameters = DEFAULT_CHAMBER_PARAMETERS
  ): SimulationRun {
    const startTime = Date.now();
    this.logger.debug('Starting simulation', {
      days: scenario.days,
      ppfdUmolM2S: scenario.ppfdUmolM2S,
      photoperiodH: scenario.photoperiodH,
      co2Ppm: scenario.co2Ppm,
      targetChamberTempC: scenario.targetChamberTempC
    });

    let result: SimulationResult;
    try {
      result = simulatePotato(scenario, growth, chamber);
    } catch (error) {
      this.logger.error('Simulation failed', error, { days: scenario.days });
      throw error;
    }

    const summary = summarizeSimulation(result, growth);
    this.logger.performance('simulatePotato', Date.now() - startTime, {
      days: scenario.days,
      finalTuberFreshG: summary.finalTuberFreshG,
      totalEnergyKWh: summary.totalEnergyKWh
    });

    return { result, summary };
  }
}
