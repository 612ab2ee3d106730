import {
  categoricalAbsDeviation,
  categoricalChiSquared,
  categoricalRedraw,
  describeResult,
  HypothesisTest,
  repeatEstimates,
  reportTestResults,
  type TestReport,
} from "../src/index.ts";

/** Is a coin with 140 heads in 250 tosses fair? A die with 19 threes? */
const coin = [140, 110];
const die = [8, 9, 19, 5, 8, 11];
const iterations = 10000;

const coinVariant = {
  statistic: categoricalAbsDeviation,
  model: categoricalRedraw,
};
const dieVariant = {
  statistic: categoricalChiSquared,
  model: categoricalRedraw,
};

const reports: TestReport[] = [
  run("fair coin", coin, coinVariant),
  run("fair die", die, dieVariant),
];
console.log(reportTestResults(reports));
for (const report of reports) console.log(describeResult(report));

function run(
  name: string,
  counts: number[],
  variant: typeof coinVariant,
): TestReport {
  const test = new HypothesisTest(counts, variant, { seed: 1 });
  test.estimatePValue(iterations);
  const runs = repeatEstimates(counts, variant, {
    iterations: iterations / 10,
    runs: 10,
    seed: 2,
  });
  return { name, summary: test.summary(), runs };
}
