import pico from "picocolors";
import { hideBin } from "yargs/helpers";
import type { DataShape } from "../DataShapes.ts";
import { HypothesisTestError, InvalidArgumentError } from "../Errors.ts";
import { setVerbose } from "../Log.ts";
import {
  describeResult,
  reportTestResults,
  type TestReport,
} from "../PValueReport.ts";
import {
  type AnyCatalogTest,
  type CatalogOptions,
  type CatalogTest,
  findCatalogTest,
  type ShapeData,
} from "../TestCatalog.ts";
import {
  type Configure,
  type DefaultCliArgs,
  parseCliArgs,
  parseNumbers,
} from "./CliArgs.ts";

/** Parse CLI with custom configuration */
export function parseTestArgs<T = DefaultCliArgs>(
  configureArgs?: Configure<T>,
): T & DefaultCliArgs {
  const argv = hideBin(process.argv);
  return parseCliArgs(argv, configureArgs) as T & DefaultCliArgs;
}

/** Run the catalog test named in args */
export function runCatalogTest(args: DefaultCliArgs): TestReport {
  setVerbose(args.verbose);
  const test = findCatalogTest(args.test);
  switch (test.shape) {
    case "two-groups":
      return estimate(test, twoGroupsData(test, args), args);
    case "paired": {
      const [xs, ys] = twoGroupsData(test, args);
      return estimate(test, { xs, ys }, args);
    }
    case "counts":
      return estimate(test, countsData(test, args), args);
  }
}

/** @return report table and summary line for a test run */
export function defaultReport(report: TestReport): string {
  return `${reportTestResults([report])}${describeResult(report)}`;
}

/** Run the test named on the command line and print the report */
export function runDefaultCLI(): void {
  try {
    const args = parseTestArgs();
    console.log(defaultReport(runCatalogTest(args)));
  } catch (e) {
    if (!(e instanceof HypothesisTestError)) throw e;
    console.error(pico.red(`${e.name}: ${e.message}`));
    process.exitCode = 1;
  }
}

/** Estimate once, plus independent repeats when --runs > 1 */
function estimate<K extends DataShape>(
  test: CatalogTest<K>,
  data: ShapeData[K],
  args: DefaultCliArgs,
): TestReport {
  const { iterations, runs, seed } = args;
  const options = catalogOptions(args);
  const hypothesisTest = test.create(data, { ...options, seed });
  hypothesisTest.estimatePValue(iterations);
  const summary = hypothesisTest.summary();
  if (runs <= 1) return { name: test.name, summary };

  const repeated = test.repeat(data, { ...options, iterations, runs, seed });
  return { name: test.name, summary, runs: repeated };
}

function catalogOptions(args: DefaultCliArgs): CatalogOptions {
  const { probabilities, categories } = args;
  return {
    probabilities: probabilities
      ? parseNumbers(probabilities, "probabilities")
      : undefined,
    categories: categories ? parseNumbers(categories, "categories") : undefined,
  };
}

function twoGroupsData(
  test: AnyCatalogTest,
  args: DefaultCliArgs,
): [number[], number[]] {
  const { a, b } = args;
  if (a === undefined || b === undefined) {
    throw new InvalidArgumentError(`${test.name} needs --a and --b`);
  }
  return [parseNumbers(a, "a"), parseNumbers(b, "b")];
}

function countsData(test: AnyCatalogTest, args: DefaultCliArgs): number[] {
  if (args.counts === undefined) {
    throw new InvalidArgumentError(`${test.name} needs --counts`);
  }
  return parseNumbers(args.counts, "counts");
}
