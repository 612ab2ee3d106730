import type { PValueSummary } from "../HypothesisTest.ts";

/** @return formatter for numbers at fixed precision */
export function decimal(digits: number): (v: unknown) => string | null {
  return v => (typeof v === "number" ? v.toFixed(digits) : null);
}

/** @return statistic value with 4 significant digits */
export function statistic(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return Number(v.toPrecision(4)).toString();
}

/** @return standard error as ±value */
export function plusMinus(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `±${v.toFixed(3)}`;
}

/**
 * @return p-value at the run's resolution.
 * A zero p-value prints as "< 1/k", since k trials can't resolve below that.
 */
export function formatPValue(summary: PValueSummary): string {
  const digits = resolutionDigits(summary.iterations);
  if (summary.upperBound !== undefined) {
    return `< ${summary.upperBound.toFixed(digits)}`;
  }
  return summary.pValue.toFixed(digits);
}

/** @return formatted p-value, for table cells holding a PValueSummary */
export function pValueCell(v: unknown): string | null {
  return isSummary(v) ? formatPValue(v) : null;
}

/** @return decimal places needed to show a p-value step of 1/iterations */
function resolutionDigits(iterations: number): number {
  return Math.max(2, String(iterations - 1).length);
}

function isSummary(v: unknown): v is PValueSummary {
  return typeof v === "object" && v !== null && "pValue" in v;
}
