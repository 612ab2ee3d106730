import { InvalidDataError } from "./Errors.ts";

/** Ordered numeric observations */
export type Sample = readonly number[];

/** Two unpaired groups, e.g. first babies vs others */
export type TwoGroups = readonly [Sample, Sample];

/** Two equal-length series compared index for index */
export interface PairedSeries {
  readonly xs: Sample;
  readonly ys: Sample;
}

/** Observed count per category */
export type CategoryCounts = Sample;

/** Data arrangements accepted by the catalog tests */
export type DataShape = "two-groups" | "paired" | "counts";

/** @return frozen copy of a sample */
export function freezeSample(sample: Sample): Sample {
  return Object.freeze([...sample]);
}

/** @return frozen copy of both groups */
export function freezeGroups([a, b]: TwoGroups): TwoGroups {
  return Object.freeze([freezeSample(a), freezeSample(b)] as const);
}

/** @return frozen copy of both series */
export function freezePaired({ xs, ys }: PairedSeries): PairedSeries {
  return Object.freeze({ xs: freezeSample(xs), ys: freezeSample(ys) });
}

/** Fail unless data is a pair of finite, non-empty samples */
export function requireTwoGroups(data: TwoGroups): void {
  if (!Array.isArray(data) || data.length !== 2) {
    throw new InvalidDataError("expected exactly two groups");
  }
  data.forEach((group, i) => requireSample(group, `group ${i + 1}`));
}

/** Fail unless both series are finite, of equal length, with >= 2 points */
export function requirePaired(data: PairedSeries): void {
  requireSample(data.xs, "xs");
  requireSample(data.ys, "ys");
  const { length } = data.xs;
  if (data.ys.length !== length) {
    const lengths = `${length} vs ${data.ys.length}`;
    throw new InvalidDataError(`paired series differ in length: ${lengths}`);
  }
  if (length < 2) {
    throw new InvalidDataError("paired series need at least two points");
  }
}

/** Fail unless counts are non-negative integers with a positive total */
export function requireCounts(counts: CategoryCounts): void {
  requireSample(counts, "category counts");
  const bad = counts.find(c => !Number.isInteger(c) || c < 0);
  if (bad !== undefined) {
    throw new InvalidDataError(`invalid category count: ${bad}`);
  }
  if (counts.every(c => c === 0)) {
    throw new InvalidDataError("category counts total zero observations");
  }
}

/** Fail unless sample is a non-empty array of finite numbers */
export function requireSample(sample: Sample, label: string): void {
  if (!Array.isArray(sample) || sample.length === 0) {
    throw new InvalidDataError(`${label} is empty`);
  }
  const bad = sample.find(v => typeof v !== "number" || !Number.isFinite(v));
  if (bad !== undefined) {
    throw new InvalidDataError(`${label} contains non-finite value: ${bad}`);
  }
}
