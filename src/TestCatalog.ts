import type {
  CategoryCounts,
  DataShape,
  PairedSeries,
  TwoGroups,
} from "./DataShapes.ts";
import { InvalidArgumentError } from "./Errors.ts";
import {
  HypothesisTest,
  type HypothesisTestOptions,
  type MonteCarloTest,
  type RepeatOptions,
  repeatEstimates,
  type TestVariant,
} from "./HypothesisTest.ts";
import {
  categoricalModel,
  permutationSplit,
  pooledCategoricalModel,
  resampleWithReplacement,
  singlesidePermutation,
} from "./NullModels.ts";
import {
  absCorrelation,
  absDiffMeans,
  categoricalAbsDeviation,
  categoricalChiSquared,
  diffStd,
  pooledChiSquared,
  signedDiffMeans,
} from "./Statistics.ts";

/** Data arrangement type for each shape */
export interface ShapeData {
  "two-groups": TwoGroups;
  paired: PairedSeries;
  counts: CategoryCounts;
}

/** Parameters for the null models that take them */
export interface VariantOptions {
  /** null category probabilities for categorical redraw (default uniform) */
  probabilities?: readonly number[];
  /** category values for pooled chi-squared (default: distinct values) */
  categories?: readonly number[];
}

export type CatalogOptions = VariantOptions & HypothesisTestOptions;

/** Ready-made statistic / null model pairing */
export interface CatalogTest<K extends DataShape = DataShape> {
  name: string;
  description: string;
  shape: K;
  create(data: ShapeData[K], options?: CatalogOptions): MonteCarloTest;
  repeat(
    data: ShapeData[K],
    options: RepeatOptions & VariantOptions,
  ): number[];
}

export type AnyCatalogTest =
  | CatalogTest<"two-groups">
  | CatalogTest<"paired">
  | CatalogTest<"counts">;

// biome-ignore format: compact catalog table
export const testCatalog: AnyCatalogTest[] = [
  catalogTest("diff-means", "two-sided difference in means, permutation null", "two-groups",
    () => ({ statistic: absDiffMeans, model: permutationSplit })),
  catalogTest("diff-means-one-sided", "group a mean larger, permutation null", "two-groups",
    () => ({ statistic: signedDiffMeans, model: permutationSplit })),
  catalogTest("diff-std", "group a standard deviation larger, permutation null", "two-groups",
    () => ({ statistic: diffStd, model: permutationSplit })),
  catalogTest("diff-means-resample", "two-sided difference in means, resampling null", "two-groups",
    () => ({ statistic: absDiffMeans, model: resampleWithReplacement })),
  catalogTest("correlation", "paired correlation magnitude, single-side permutation", "paired",
    () => ({ statistic: absCorrelation, model: singlesidePermutation })),
  catalogTest("categorical-deviation", "total absolute deviation from expected counts", "counts",
    opts => ({ statistic: categoricalAbsDeviation, model: categoricalModel(opts.probabilities) })),
  catalogTest("categorical-chi-squared", "chi-squared deviation from expected counts", "counts",
    opts => ({ statistic: categoricalChiSquared, model: categoricalModel(opts.probabilities) })),
  catalogTest("pooled-chi-squared", "two groups against their pooled distribution", "two-groups",
    opts => ({ statistic: pooledChiSquared, model: pooledCategoricalModel(opts.categories) })),
];

/** @return catalog test with the given name */
export function findCatalogTest(name: string): AnyCatalogTest {
  const found = testCatalog.find(t => t.name === name);
  if (!found) {
    const known = testCatalog.map(t => t.name).join(", ");
    throw new InvalidArgumentError(`unknown test "${name}" (known: ${known})`);
  }
  return found;
}

function catalogTest<K extends DataShape, S>(
  name: string,
  description: string,
  shape: K,
  variant: (options: VariantOptions) => TestVariant<ShapeData[K], S>,
): CatalogTest<K> {
  return {
    name,
    description,
    shape,
    create: (data, options = {}) =>
      new HypothesisTest(data, variant(options), options),
    repeat: (data, options) => repeatEstimates(data, variant(options), options),
  };
}
