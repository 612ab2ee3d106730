/** @return sum of values */
export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** @return mean of values */
export function average(values: readonly number[]): number {
  return sum(values) / values.length;
}

/** @return population standard deviation (divides by n) */
export function populationStdDev(values: readonly number[]): number {
  const mean = average(values);
  const squares = values.reduce((acc, x) => acc + (x - mean) ** 2, 0);
  return Math.sqrt(squares / values.length);
}

/** @return standard deviation with Bessel's correction */
export function standardDeviation(values: readonly number[]): number {
  if (values.length <= 1) return 0;
  const mean = average(values);
  const squares = values.reduce((acc, x) => acc + (x - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** @return Pearson correlation of two equal-length series */
export function correlation(
  xs: readonly number[],
  ys: readonly number[],
): number {
  const meanX = average(xs);
  const meanY = average(ys);
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }
  return cov / Math.sqrt(varX * varY);
}

/** @return largest value, -Infinity for an empty array */
export function maxValue(values: readonly number[]): number {
  let max = Number.NEGATIVE_INFINITY;
  for (const v of values) if (v > max) max = v;
  return max;
}

/** @return count of each category's occurrences, in category order */
export function tally<T>(values: readonly T[], categories: readonly T[]) {
  const index = new Map(categories.map((c, i) => [c, i]));
  const counts = new Array<number>(categories.length).fill(0);
  for (const v of values) {
    const i = index.get(v);
    if (i !== undefined) counts[i]++;
  }
  return counts;
}

/** @return sorted distinct values */
export function distinctValues(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}
