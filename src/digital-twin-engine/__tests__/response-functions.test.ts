import { describe, it, expect } from 'vitest';
import {
  clamp,
  dliFromPpfd,
  molParToMJ,
  temperatureModifier,
  co2Modifier,
  leafAreaIndex,
  canopyInterceptionFraction,
  tuberPartitionFraction,
  leafBiasFraction,
  phenologyStage
} from '../response-functions';
import { DEFAULT_GROWTH_PARAMETERS } from '../../shared/config/constants';
import { PhenologyStage } from '../../types/core';

const gp = DEFAULT_GROWTH_PARAMETERS;

describe('light conversions', () => {
  it('converts PPFD and photoperiod to a daily light integral', () => {
    expect(dliFromPpfd(350, 12)).toBe(15.12);
    expect(dliFromPpfd(0, 12)).toBe(0);
    expect(dliFromPpfd(500, 24)).toBeCloseTo(43.2, 10);
  });

  it('converts moles of PAR to megajoules', () => {
    expect(molParToMJ(10)).toBeCloseTo(2.19, 12);
    expect(molParToMJ(0)).toBe(0);
  });
});

describe('temperatureModifier', () => {
  const f = (t: number) => temperatureModifier(t, gp.baseTempC, gp.optTempC, gp.maxTempC);

  it('is zero at and beyond both cardinal bounds', () => {
    expect(f(7)).toBe(0);
    expect(f(-3)).toBe(0);
    expect(f(30)).toBe(0);
    expect(f(42)).toBe(0);
  });

  it('peaks at exactly 1 at the optimum', () => {
    expect(f(18)).toBe(1);
  });

  it('ramps linearly on both sides of the optimum', () => {
    expect(f(12.5)).toBeCloseTo(0.5, 12);
    expect(f(24)).toBeCloseTo(0.5, 12);
    expect(f(27)).toBeCloseTo(0.25, 12);
  });

  it('rises below the optimum and falls above it', () => {
    let previous = f(7);
    for (let t = 7.5; t < 18; t += 0.5) {
      const value = f(t);
      expect(value).toBeGreaterThan(previous);
      expect(value).toBeLessThan(1);
      previous = value;
    }
    previous = f(18);
    for (let t = 18.5; t < 30; t += 0.5) {
      const value = f(t);
      expect(value).toBeLessThan(previous);
      expect(value).toBeGreaterThan(0);
      previous = value;
    }
  });
});

describe('co2Modifier', () => {
  const f = (co2: number) => co2Modifier(co2, gp.co2RefPpm, gp.co2SatPpm);

  it('is zero for non-positive concentrations', () => {
    expect(f(0)).toBe(0);
    expect(f(-50)).toBe(0);
  });

  it('is one half at and below the reference concentration', () => {
    expect(f(400)).toBe(0.5);
    expect(f(100)).toBe(0.5);
  });

  it('rises linearly between reference and saturation', () => {
    expect(f(800)).toBeCloseTo(0.75, 9);
  });

  it('saturates at 1', () => {
    expect(f(1200)).toBeCloseTo(1, 9);
    expect(f(2000)).toBe(1);
  });
});

describe('canopyInterceptionFraction', () => {
  it('computes leaf area index from specific leaf area and ground area', () => {
    expect(leafAreaIndex(50, gp, 2)).toBeCloseTo(0.5, 12);
  });

  it('intercepts nothing without leaves', () => {
    expect(canopyInterceptionFraction(0, gp, 1)).toBe(0);
  });

  it('follows Beer–Lambert for a given leaf mass', () => {
    expect(canopyInterceptionFraction(100, gp, 1)).toBeCloseTo(1 - Math.exp(-0.65 * 2), 12);
  });

  it('is non-decreasing in leaf mass and approaches 1', () => {
    let previous = 0;
    for (const leaf of [0.1, 1, 5, 20, 80, 200, 1000]) {
      const value = canopyInterceptionFraction(leaf, gp, 1);
      expect(value).toBeGreaterThanOrEqual(previous);
      expect(value).toBeLessThanOrEqual(1);
      previous = value;
    }
    expect(canopyInterceptionFraction(1e6, gp, 1)).toBe(1);
  });

  it('stays finite when the ground area is zero', () => {
    expect(canopyInterceptionFraction(1, gp, 0)).toBe(1);
  });
});

describe('tuberPartitionFraction', () => {
  it('uses the bare base allocation at a 16 h photoperiod', () => {
    expect(tuberPartitionFraction(0, 16, gp)).toBe(0.05);
    expect(tuberPartitionFraction(349.9, 16, gp)).toBe(0.05);
    expect(tuberPartitionFraction(350, 16, gp)).toBe(0.4);
    expect(tuberPartitionFraction(900, 16, gp)).toBe(0.4);
  });

  it('steps at the tuber initiation threshold', () => {
    const before = tuberPartitionFraction(349.999, 12, gp);
    const after = tuberPartitionFraction(350, 12, gp);
    expect(after - before).toBeCloseTo(0.35, 12);
  });

  it('adds a bonus for short days', () => {
    expect(tuberPartitionFraction(0, 12, gp)).toBeCloseTo(0.05 + 0.5 * (4 / 6), 12);
    expect(tuberPartitionFraction(0, 10, gp)).toBeCloseTo(0.55, 12);
    expect(tuberPartitionFraction(400, 10, gp)).toBeCloseTo(0.9, 12);
  });

  it('clamps to the allowed band', () => {
    expect(tuberPartitionFraction(400, 0, gp)).toBeCloseTo(0.9, 12);
    expect(tuberPartitionFraction(0, 22, gp)).toBe(0.05);
  });
});

describe('leafBiasFraction', () => {
  it('favours leaves before tuber initiation', () => {
    expect(leafBiasFraction(0, gp)).toBe(0.7);
    expect(leafBiasFraction(350, gp)).toBe(0.5);
  });
});

describe('phenologyStage', () => {
  it('maps thermal time onto development stages', () => {
    expect(phenologyStage(0, gp)).toBe(PhenologyStage.PRE_EMERGENCE);
    expect(phenologyStage(120, gp)).toBe(PhenologyStage.VEGETATIVE);
    expect(phenologyStage(349, gp)).toBe(PhenologyStage.VEGETATIVE);
    expect(phenologyStage(350, gp)).toBe(PhenologyStage.TUBER_BULKING);
    expect(phenologyStage(1500, gp)).toBe(PhenologyStage.MATURE);
  });
});

describe('clamp', () => {
  it('limits a value to the given bounds', () => {
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.3, 0, 1)).toBe(0.3);
    expect(clamp(7, 0, 1)).toBe(1);
  });
});
