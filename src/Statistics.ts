import type {
  CategoryCounts,
  PairedSeries,
  Sample,
  TwoGroups,
} from "./DataShapes.ts";
import {
  requireCounts,
  requirePaired,
  requireTwoGroups,
} from "./DataShapes.ts";
import { InvalidDataError } from "./Errors.ts";
import type { CategoricalState, PooledCategoricalState } from "./NullModels.ts";
import {
  average,
  correlation,
  populationStdDev,
  sum,
  tally,
} from "./StatisticalUtils.ts";

/**
 * Scalar measure of effect size for one data arrangement.
 *
 * compute() is pure. Its state argument is the null model's fixed state, which
 * categorical statistics read their expected frequencies from; the others
 * ignore it. Two-sided statistics return a magnitude, so that a right-tail
 * count is the only comparison the harness needs.
 */
export interface TestStatistic<D, S = unknown> {
  readonly name: string;
  /** fail with InvalidDataError if the statistic is undefined for data */
  validate?(data: D): void;
  compute(data: D, state: S): number;
}

/** |mean(a) - mean(b)| */
export const absDiffMeans: TestStatistic<TwoGroups> = {
  name: "|Δ mean|",
  validate: requireTwoGroups,
  compute: ([a, b]) => Math.abs(average(a) - average(b)),
};

/** mean(a) - mean(b), for the one-sided hypothesis that a is larger */
export const signedDiffMeans: TestStatistic<TwoGroups> = {
  name: "Δ mean",
  validate: requireTwoGroups,
  compute: ([a, b]) => average(a) - average(b),
};

/** std(a) - std(b), population standard deviations */
export const diffStd: TestStatistic<TwoGroups> = {
  name: "Δ std",
  validate: requireTwoGroups,
  compute: ([a, b]) => populationStdDev(a) - populationStdDev(b),
};

/** |pearson(xs, ys)| */
export const absCorrelation: TestStatistic<PairedSeries> = {
  name: "|corr|",
  validate: data => {
    requirePaired(data);
    if (isConstant(data.xs) || isConstant(data.ys)) {
      throw new InvalidDataError("correlation of a constant series");
    }
  },
  compute: ({ xs, ys }) => Math.abs(correlation(xs, ys)),
};

/** Σ |observed - expected| over categories */
export const categoricalAbsDeviation: TestStatistic<
  CategoryCounts,
  CategoricalState
> = {
  name: "Σ|Δ count|",
  validate: requireCounts,
  compute: (counts, state) => {
    const expected = expectedCounts(counts, state);
    return counts.reduce((acc, o, i) => acc + Math.abs(o - expected[i]), 0);
  },
};

/** Σ (observed - expected)² / expected over categories */
export const categoricalChiSquared: TestStatistic<
  CategoryCounts,
  CategoricalState
> = {
  name: "χ²",
  validate: requireCounts,
  compute: (counts, state) => chiSquared(counts, expectedCounts(counts, state)),
};

/**
 * χ²(a) + χ²(b), each group against the pooled expected distribution
 * scaled to the group's size.
 */
export const pooledChiSquared: TestStatistic<
  TwoGroups,
  PooledCategoricalState
> = {
  name: "pooled χ²",
  validate: requireTwoGroups,
  compute: ([a, b], state) =>
    groupChiSquared(a, state) + groupChiSquared(b, state),
};

/** @return expected count per category for the observed total */
function expectedCounts(counts: CategoryCounts, state: CategoricalState) {
  const n = sum(counts);
  return state.probabilities.map(p => p * n);
}

function groupChiSquared(group: Sample, state: PooledCategoricalState): number {
  const observed = tally(group, state.categories);
  const expected = state.expectedProbs.map(p => p * group.length);
  return chiSquared(observed, expected);
}

function chiSquared(observed: Sample, expected: Sample): number {
  let stat = 0;
  for (let i = 0; i < observed.length; i++) {
    stat += (observed[i] - expected[i]) ** 2 / expected[i];
  }
  return stat;
}

function isConstant(values: Sample): boolean {
  return values.every(v => v === values[0]);
}
