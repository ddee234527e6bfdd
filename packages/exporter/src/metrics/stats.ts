/**
 * Descriptive statistics over grouped counts.
 *
 * The result sets are small (one value per day, user or model), so these
 * are computed in-process after the database has done the grouping.
 */

import type { StdDevMode, Summary } from "@usage-exporter/shared";

/** Arithmetic mean; 0 for an empty set */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function sumOfSquaredDeviations(values: readonly number[]): number {
  const m = mean(values);
  let total = 0;
  for (const v of values) total += (v - m) ** 2;
  return total;
}

/** Population standard deviation (divides by n); 0 for an empty set */
export function stdDevPopulation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return Math.sqrt(sumOfSquaredDeviations(values) / values.length);
}

/** Sample standard deviation (divides by n - 1); 0 for fewer than two values */
export function stdDevSample(values: readonly number[]): number {
  if (values.length < 2) return 0;
  return Math.sqrt(sumOfSquaredDeviations(values) / (values.length - 1));
}

export function summarize(
  values: readonly number[],
  mode: StdDevMode = "population",
): Summary {
  return {
    count: values.length,
    mean: mean(values),
    stdDev: mode === "sample" ? stdDevSample(values) : stdDevPopulation(values),
  };
}
