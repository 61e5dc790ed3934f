/**
 * Response functions of the potato growth model
 * Pure conversions from instantaneous conditions to fluxes and 0..1 modifiers
 */

import type { GrowthParameters } from '../types/potato-twin';
import { PhenologyStage } from '../types/core';
import { MODEL_CONSTANTS } from '../shared/config/constants';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Daily light integral (mol photons m⁻² day⁻¹) from PPFD and photoperiod
 */
export function dliFromPpfd(ppfdUmolM2S: number, photoperiodH: number): number {
  return ppfdUmolM2S * photoperiodH * MODEL_CONSTANTS.SECONDS_PER_HOUR / MODEL_CONSTANTS.UMOL_PER_MOL;
}

export function molParToMJ(molPar: number): number {
  return molPar * MODEL_CONSTANTS.MJ_PER_MOL_PAR;
}

/**
 * Triangular temperature response: 0 outside (base, max), 1 at the optimum.
 * Cardinal temperatures must satisfy base < opt < max.
 */
export function temperatureModifier(tempC: number, baseC: number, optC: number, maxC: number): number {
  if (tempC <= baseC || tempC >= maxC) {
    return 0;
  }
  if (tempC === optC) {
    return 1;
  }
  if (tempC < optC) {
    return (tempC - baseC) / (optC - baseC);
  }
  return (maxC - tempC) / (maxC - optC);
}

/**
 * Saturating CO₂ response: 0.5 at the reference concentration rising
 * linearly to 1 at saturation.
 */
export function co2Modifier(co2Ppm: number, refPpm: number, satPpm: number): number {
  if (co2Ppm <= 0) {
    return 0;
  }
  const x = (co2Ppm - refPpm) / (satPpm - refPpm + MODEL_CONSTANTS.EPSILON);
  return clamp(0.5 + 0.5 * clamp(x, 0, 1), 0, 1);
}

export function leafAreaIndex(leafDryG: number, params: GrowthParameters, groundAreaM2: number): number {
  return (leafDryG * params.slaM2PerGDry) / Math.max(groundAreaM2, MODEL_CONSTANTS.EPSILON);
}

/**
 * Fraction of incoming light intercepted by the canopy (Beer–Lambert)
 */
export function canopyInterceptionFraction(
  leafDryG: number,
  params: GrowthParameters,
  groundAreaM2: number
): number {
  const lai = leafAreaIndex(leafDryG, params, groundAreaM2);
  return clamp(1 - Math.exp(-params.kExtinction * lai), 0, 1);
}

/**
 * Fraction of new biomass allocated to tubers.
 * Steps up when thermal time reaches tuber initiation; short days add up to
 * PHOTOPERIOD_MAX_BONUS on top.
 */
export function tuberPartitionFraction(
  thermalTime: number,
  photoperiodH: number,
  params: GrowthParameters
): number {
  const base = thermalTime < params.ttTuberInit
    ? MODEL_CONSTANTS.TUBER_PARTITION_BEFORE_INIT
    : MODEL_CONSTANTS.TUBER_PARTITION_AFTER_INIT;

  const photoFactor = clamp(
    (MODEL_CONSTANTS.PHOTOPERIOD_NEUTRAL_H - photoperiodH) / MODEL_CONSTANTS.PHOTOPERIOD_RESPONSE_BAND_H,
    0,
    1
  );

  return clamp(
    base + MODEL_CONSTANTS.PHOTOPERIOD_MAX_BONUS * photoFactor,
    MODEL_CONSTANTS.TUBER_PARTITION_MIN,
    MODEL_CONSTANTS.TUBER_PARTITION_MAX
  );
}

/**
 * Share of the non-tuber allocation that goes to leaves rather than stems
 */
export function leafBiasFraction(thermalTime: number, params: GrowthParameters): number {
  return thermalTime < params.ttTuberInit
    ? MODEL_CONSTANTS.LEAF_BIAS_BEFORE_INIT
    : MODEL_CONSTANTS.LEAF_BIAS_AFTER_INIT;
}

export function phenologyStage(thermalTime: number, params: GrowthParameters): PhenologyStage {
  if (thermalTime < params.ttEmergence) {
    return PhenologyStage.PRE_EMERGENCE;
  }
  if (thermalTime < params.ttTuberInit) {
    return PhenologyStage.VEGETATIVE;
  }
  if (thermalTime < params.ttMaturity) {
    return PhenologyStage.TUBER_BULKING;
  }
  return PhenologyStage.MATURE;
}
