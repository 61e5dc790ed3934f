/**
 * Chamber thermal model
 * First-order heat balance of the growth chamber, one step at a time
 */

import type { ChamberParameters } from '../types/potato-twin';
import { MODEL_CONSTANTS } from '../shared/config/constants';

export interface ChamberHeatFlows {
  heatInKJ: number;
  heatLossKJ: number;
  coolingKJ: number;
}

/**
 * Electrical load in W as heat released over a day, in kJ
 */
export function wattsToKJPerDay(powerW: number): number {
  return powerW * MODEL_CONSTANTS.SECONDS_PER_DAY / 1000;
}

/**
 * Heat flows (kJ per day) at the given chamber temperature.
 * Loss only runs towards a colder ambient and cooling only engages above target;
 * there is no active heating.
 */
export function chamberHeatFlows(
  tempC: number,
  chamber: ChamberParameters,
  targetC: number,
  dtDay: number = 1
): ChamberHeatFlows {
  const heatInKJ = wattsToKJPerDay(chamber.ledPowerW) + wattsToKJPerDay(chamber.otherPowerW);
  const heatLossKJ = chamber.uKJPerDayPerK * Math.max(tempC - chamber.ambientTempC, 0);

  let coolingKJ = 0;
  if (tempC > targetC) {
    coolingKJ = Math.min(
      chamber.coolingCapacityKJPerDay,
      (tempC - targetC) * chamber.heatCapacityKJPerK / dtDay
    );
  }

  return { heatInKJ, heatLossKJ, coolingKJ };
}

export function chamberTempStep(
  tempC: number,
  chamber: ChamberParameters,
  targetC: number,
  dtDay: number = 1
): number {
  const { heatInKJ, heatLossKJ, coolingKJ } = chamberHeatFlows(tempC, chamber, targetC, dtDay);
  const deltaC = dtDay * (heatInKJ - heatLossKJ - coolingKJ) / chamber.heatCapacityKJPerK;
  return tempC + deltaC;
}
