import type {
  CategoryCounts,
  PairedSeries,
  Sample,
  TwoGroups,
} from "./DataShapes.ts";
import {
  freezePaired,
  freezeSample,
  requireCounts,
  requirePaired,
  requireTwoGroups,
} from "./DataShapes.ts";
import { InvalidDataError } from "./Errors.ts";
import { type RandomSource, randomInt, resample, shuffled } from "./Random.ts";
import { distinctValues, sum, tally } from "./StatisticalUtils.ts";

/**
 * Data-generating process for "no effect".
 *
 * deriveState() runs once per hypothesis test and validates the observed data.
 * simulate() produces one arrangement shaped like the observation, reading
 * the state without mutating it.
 */
export interface NullModel<D, S> {
  readonly name: string;
  deriveState(data: D): S;
  simulate(state: S, random: RandomSource): D;
}

/** Pooled observations of two groups */
export interface PooledState {
  readonly pool: Sample;
  readonly sizes: readonly [number, number];
}

/** Expected category probabilities under the null */
export interface CategoricalState {
  readonly n: number;
  readonly k: number;
  readonly probabilities: Sample;
}

/** Pooled categorical observations with a fixed expected distribution */
export interface PooledCategoricalState extends PooledState {
  readonly categories: Sample;
  readonly expectedProbs: Sample;
}

const probabilityTolerance = 1e-9;

/** Shuffle the pooled groups and split at the original boundary */
export const permutationSplit: NullModel<TwoGroups, PooledState> = {
  name: "permutation",
  deriveState: poolGroups,
  simulate: (state, random) => splitAt(shuffled(state.pool, random), state),
};

/** Draw each group independently, with replacement, from the pooled values */
export const resampleWithReplacement: NullModel<TwoGroups, PooledState> = {
  name: "resample",
  deriveState: poolGroups,
  simulate: ({ pool, sizes }, random) => [
    resample(pool, sizes[0], random),
    resample(pool, sizes[1], random),
  ],
};

/** Permute xs only, breaking any association while keeping both marginals */
export const singlesidePermutation: NullModel<PairedSeries, PairedSeries> = {
  name: "single-side permutation",
  deriveState: data => {
    requirePaired(data);
    return freezePaired(data);
  },
  simulate: ({ xs, ys }, random) => ({ xs: shuffled(xs, random), ys }),
};

/** Uniform null: each of the k categories equally likely */
export const categoricalRedraw: NullModel<CategoryCounts, CategoricalState> =
  categoricalModel();

/**
 * @return categorical redraw model.
 * With no probabilities the null is uniform over the observed categories.
 */
export function categoricalModel(
  probabilities?: readonly number[],
): NullModel<CategoryCounts, CategoricalState> {
  return {
    name: probabilities ? "categorical redraw" : "uniform redraw",
    deriveState: counts => {
      requireCounts(counts);
      const k = counts.length;
      const probs = probabilities ?? new Array<number>(k).fill(1 / k);
      requireProbabilities(probs, k);
      const n = sum(counts);
      return Object.freeze({ n, k, probabilities: freezeSample(probs) });
    },
    simulate: redrawCounts,
  };
}

/** Pooled chi-squared null over the distinct pooled values */
export const pooledShuffleSplit: NullModel<TwoGroups, PooledCategoricalState> =
  pooledCategoricalModel();

/**
 * @return pooled shuffle-and-split model for categorical observations.
 *
 * Expected probabilities come from the pooled sample, computed once.
 * Pass categories to restrict the comparison to a range of values (e.g.
 * pregnancy weeks 35..43); observations outside them are not tallied.
 */
export function pooledCategoricalModel(
  categories?: readonly number[],
): NullModel<TwoGroups, PooledCategoricalState> {
  return {
    name: "pooled shuffle",
    deriveState: data => {
      const pooled = poolGroups(data);
      const cats = categories ?? distinctValues(pooled.pool);
      if (cats.length === 0) throw new InvalidDataError("no categories");
      const counts = tally(pooled.pool, cats);
      const zero = cats.find((_, i) => counts[i] === 0);
      if (zero !== undefined) {
        const msg = `category ${zero} never occurs in the pooled sample`;
        throw new InvalidDataError(`${msg}, expected frequency would be zero`);
      }
      const total = pooled.pool.length;
      return Object.freeze({
        ...pooled,
        categories: freezeSample(cats),
        expectedProbs: freezeSample(counts.map(c => c / total)),
      });
    },
    simulate: (state, random) => splitAt(shuffled(state.pool, random), state),
  };
}

/** @return frozen pool and group sizes */
function poolGroups(data: TwoGroups): PooledState {
  requireTwoGroups(data);
  const [a, b] = data;
  return Object.freeze({
    pool: freezeSample([...a, ...b]),
    sizes: Object.freeze([a.length, b.length] as const),
  });
}

/** @return values split into groups of the original sizes */
function splitAt(values: number[], { sizes }: PooledState): TwoGroups {
  const n1 = sizes[0];
  return [values.slice(0, n1), values.slice(n1)];
}

/** @return counts of n categorical draws under the state's probabilities */
function redrawCounts(state: CategoricalState, random: RandomSource): Sample {
  const { n, k, probabilities } = state;
  const counts = new Array<number>(k).fill(0);
  const uniform = probabilities.every(p => p === probabilities[0]);
  for (let i = 0; i < n; i++) {
    const category = uniform
      ? randomInt(random, k)
      : drawCategory(probabilities, random);
    counts[category]++;
  }
  return counts;
}

/** @return category index drawn by inverting the cumulative distribution */
function drawCategory(probabilities: Sample, random: RandomSource): number {
  const u = random.random();
  let cumulative = 0;
  for (let i = 0; i < probabilities.length; i++) {
    cumulative += probabilities[i];
    if (u < cumulative) return i;
  }
  return probabilities.length - 1;
}

/** Fail unless probabilities form a strictly positive distribution over k */
function requireProbabilities(probs: readonly number[], k: number): void {
  if (probs.length !== k) {
    const msg = `${probs.length} probabilities for ${k} categories`;
    throw new InvalidDataError(msg);
  }
  const bad = probs.find(p => !Number.isFinite(p) || p <= 0);
  if (bad !== undefined) {
    const msg = `category probability ${bad} must be positive`;
    throw new InvalidDataError(`${msg}, expected frequency would be zero`);
  }
  if (Math.abs(sum(probs) - 1) > probabilityTolerance) {
    throw new InvalidDataError(`probabilities sum to ${sum(probs)}, not 1`);
  }
}
