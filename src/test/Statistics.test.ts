import { expect, test } from "vitest";
import { InvalidDataError } from "../Errors.ts";
import {
  categoricalModel,
  categoricalRedraw,
  pooledShuffleSplit,
} from "../NullModels.ts";
import {
  absCorrelation,
  absDiffMeans,
  categoricalAbsDeviation,
  categoricalChiSquared,
  diffStd,
  pooledChiSquared,
  signedDiffMeans,
} from "../Statistics.ts";
import { loadedDieCounts } from "./TestUtils.ts";

test("difference in means, signed and absolute", () => {
  const groups = [[1, 2, 3], [4, 5, 6]] as const;
  expect(absDiffMeans.compute(groups, undefined)).toBe(3);
  expect(signedDiffMeans.compute(groups, undefined)).toBe(-3);
  expect(absDiffMeans.compute([[4, 5, 6], [1, 2, 3]], undefined)).toBe(3);
});

test("difference in population standard deviations", () => {
  const stat = diffStd.compute([[1, 2, 3], [2, 4, 6]], undefined);
  expect(stat).toBeCloseTo(-Math.sqrt(2 / 3), 10);
});

test("correlation magnitude", () => {
  const rising = { xs: [1, 2, 3, 4], ys: [2, 4, 6, 8] };
  const falling = { xs: [1, 2, 3, 4], ys: [8, 6, 4, 2] };
  expect(absCorrelation.compute(rising, undefined)).toBeCloseTo(1, 10);
  expect(absCorrelation.compute(falling, undefined)).toBeCloseTo(1, 10);
});

test("correlation rejects constant or mismatched series", () => {
  const constant = { xs: [1, 2, 3], ys: [5, 5, 5] };
  expect(() => absCorrelation.validate?.(constant)).toThrow(InvalidDataError);
  const mismatched = { xs: [1, 2, 3], ys: [1, 2] };
  expect(() => absCorrelation.validate?.(mismatched)).toThrow(
    /differ in length: 3 vs 2/,
  );
});

test("categorical deviation against uniform expected counts", () => {
  const state = categoricalRedraw.deriveState(loadedDieCounts);
  expect(categoricalAbsDeviation.compute(loadedDieCounts, state)).toBe(20);
  const chi = categoricalChiSquared.compute(loadedDieCounts, state);
  expect(chi).toBeCloseTo(11.6, 10);
});

test("categorical deviation against supplied probabilities", () => {
  const counts = [30, 10];
  const state = categoricalModel([0.75, 0.25]).deriveState(counts);
  expect(categoricalAbsDeviation.compute(counts, state)).toBe(0);
  expect(categoricalChiSquared.compute([20, 20], state)).toBeCloseTo(
    100 / 30 + 100 / 10,
    10,
  );
});

test("pooled chi-squared sums both groups against the pooled mix", () => {
  const groups = [[1, 1, 2], [2, 2, 1]] as const;
  const state = pooledShuffleSplit.deriveState(groups);
  expect(state.categories).toEqual([1, 2]);
  expect(state.expectedProbs).toEqual([0.5, 0.5]);
  expect(pooledChiSquared.compute(groups, state)).toBeCloseTo(2 / 3, 10);
});

test("two-group statistics require non-empty groups", () => {
  expect(() => absDiffMeans.validate?.([[], [1]])).toThrow(InvalidDataError);
  expect(() => diffStd.validate?.([[1], []])).toThrow("group 2 is empty");
});
