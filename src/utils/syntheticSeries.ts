import seedrandom from "seedrandom";
import type { MetricSeries } from "../types/Supplier";

export const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"
];

const QPM_JITTER = 10;
const PPM_JITTER = 5;
const FALLBACK_SEED = 42;

export function emptySeries(): MetricSeries {
  return { months: [], values: [], actual: null, synthetic: false };
}

const round1 = (n: number) => Math.round(n * 10) / 10;

export function seriesSeed(qpmActual: number): number {
  const seed = Math.trunc(qpmActual);
  return seed > 0 ? seed : FALLBACK_SEED;
}

/**
 * Builds 12-month display series around the two actual values the scorecard
 * exposes. One generator, seeded from the QPM actual, draws the QPM and the
 * PPM jitter alternately for each month so the same actuals always give the
 * same charts. The last month is the real value.
 */
export function buildSyntheticSeries(
  qpmActual: number,
  ppmActual: number
): { qpm: MetricSeries; ppm: MetricSeries } {
  const rng = seedrandom(String(seriesSeed(qpmActual)));
  const uniform = (spread: number) => -spread + 2 * spread * rng();

  const qpmValues: number[] = [];
  const ppmValues: number[] = [];
  for (let i = 0; i < MONTHS.length; i++) {
    qpmValues.push(Math.max(0, round1(qpmActual + uniform(QPM_JITTER))));
    ppmValues.push(Math.max(0, round1(ppmActual + uniform(PPM_JITTER))));
  }
  qpmValues[qpmValues.length - 1] = qpmActual;
  ppmValues[ppmValues.length - 1] = ppmActual;

  return {
    qpm: { months: [...MONTHS], values: qpmValues, actual: qpmActual, synthetic: true },
    ppm: { months: [...MONTHS], values: ppmValues, actual: ppmActual, synthetic: true }
  };
}
