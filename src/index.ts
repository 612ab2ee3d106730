export type { Configure, DefaultCliArgs } from "./cli/CliArgs.ts";
export { defaultCliArgs, parseCliArgs, parseNumbers } from "./cli/CliArgs.ts";
export {
  defaultReport,
  parseTestArgs,
  runCatalogTest,
  runDefaultCLI,
} from "./cli/RunTestCLI.ts";
export type {
  CategoryCounts,
  DataShape,
  PairedSeries,
  Sample,
  TwoGroups,
} from "./DataShapes.ts";
export type { HypothesisTestErrorCode } from "./Errors.ts";
export {
  HypothesisTestError,
  InvalidArgumentError,
  InvalidDataError,
  NotYetEstimatedError,
  UnimplementedVariantError,
} from "./Errors.ts";
export type {
  HypothesisTestOptions,
  MonteCarloTest,
  PValueSummary,
  RepeatOptions,
  TestVariant,
} from "./HypothesisTest.ts";
export { HypothesisTest, repeatEstimates } from "./HypothesisTest.ts";
export { setVerbose } from "./Log.ts";
export type {
  CategoricalState,
  NullModel,
  PooledCategoricalState,
  PooledState,
} from "./NullModels.ts";
export {
  categoricalModel,
  categoricalRedraw,
  permutationSplit,
  pooledCategoricalModel,
  pooledShuffleSplit,
  resampleWithReplacement,
  singlesidePermutation,
} from "./NullModels.ts";
export type { Significance, TestReport } from "./PValueReport.ts";
export {
  describeResult,
  getSignificance,
  reportTestResults,
} from "./PValueReport.ts";
export type { RandomSource } from "./Random.ts";
export { deriveSeeds, mathRandom, SeededRandom } from "./Random.ts";
export type { TestStatistic } from "./Statistics.ts";
export {
  absCorrelation,
  absDiffMeans,
  categoricalAbsDeviation,
  categoricalChiSquared,
  diffStd,
  pooledChiSquared,
  signedDiffMeans,
} from "./Statistics.ts";
export type {
  AnyCatalogTest,
  CatalogOptions,
  CatalogTest,
  ShapeData,
  VariantOptions,
} from "./TestCatalog.ts";
export { findCatalogTest, testCatalog } from "./TestCatalog.ts";
export { formatPValue } from "./table-util/Formatters.ts";
