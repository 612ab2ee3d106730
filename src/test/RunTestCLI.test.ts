import { afterEach, expect, test, vi } from "vitest";
import { parseCliArgs, parseNumbers } from "../cli/CliArgs.ts";
import { runCatalogTest, runDefaultCLI } from "../cli/RunTestCLI.ts";
import { InvalidArgumentError } from "../Errors.ts";
import { isVerbose, setVerbose } from "../Log.ts";
import { runTestCLI } from "./TestUtils.ts";

afterEach(() => {
  setVerbose(false);
  vi.restoreAllMocks();
});

test("parses the test name and option defaults", () => {
  const args = parseCliArgs(["diff-means", "--a", "1,2,3", "--b", "4,5"]);
  expect(args.test).toBe("diff-means");
  expect(args.a).toBe("1,2,3");
  expect(args.b).toBe("4,5");
  expect(args.iterations).toBe(1000);
  expect(args.runs).toBe(1);
  expect(args.verbose).toBe(false);
  expect(args.seed).toBeUndefined();
});

test("parses comma separated numbers", () => {
  expect(parseNumbers("8, 9,19,5 ,8,11", "counts")).toEqual([
    8, 9, 19, 5, 8, 11,
  ]);
  expect(parseNumbers("1.5,2,", "a")).toEqual([1.5, 2]);
  expect(() => parseNumbers("1,x,3", "a")).toThrow(
    '--a: not a number in "1,x,3"',
  );
});

test("coin example from the command line", () => {
  const output = runTestCLI(
    "categorical-deviation --counts 140,110 --iterations 10000 --seed 250",
  );
  expect(output).toContain("categorical-deviation");
  const match = output.match(/categorical-deviation: p = (\d\.\d{4}) /);
  expect(match).not.toBeNull();
  const p = Number(match?.[1]);
  expect(p).toBeGreaterThan(0.04);
  expect(p).toBeLessThan(0.1);
});

test("zero p-value prints its bound", () => {
  const a = "1,2,3,4,5,6,7,8,9,10,11,12,13,14,15";
  const b = "101,102,103,104,105,106,107,108,109,110,111,112,113,114,115";
  const output = runTestCLI(`diff-means --a ${a} --b ${b} --seed 3`);
  expect(output).toContain("diff-means: p < 0.001 (strong; max simulated");
  expect(output).toContain("vs actual 100)");
});

test("paired tests read --a and --b as xs and ys", () => {
  const args = parseCliArgs([
    "correlation",
    "--a",
    "1,2,3,4,5,6",
    "--b",
    "2,4,5,8,10,13",
    "--iterations",
    "50",
    "--seed",
    "1",
  ]);
  const report = runCatalogTest(args);
  expect(report.name).toBe("correlation");
  expect(report.summary.iterations).toBe(50);
  expect(report.summary.actual).toBeGreaterThan(0.9);
});

test("--runs adds independent repeats", () => {
  const output = runTestCLI(
    "diff-means --a 1,2,3,4 --b 5,6,7,8 --iterations 100 --runs 3 --seed 1",
  );
  expect(output).toContain("mean p");
  const args = parseCliArgs([
    "diff-means",
    "--a",
    "1,2,3,4",
    "--b",
    "5,6,7,8",
    "--iterations",
    "100",
    "--runs",
    "3",
    "--seed",
    "1",
  ]);
  expect(runCatalogTest(args).runs).toHaveLength(3);
});

test("missing data for the test's shape is an argument error", () => {
  const groups = parseCliArgs(["diff-means", "--a", "1,2"]);
  expect(() => runCatalogTest(groups)).toThrow(InvalidArgumentError);
  const counts = parseCliArgs(["categorical-chi-squared"]);
  expect(() => runCatalogTest(counts)).toThrow(
    "categorical-chi-squared needs --counts",
  );
});

test("--verbose traces estimation runs", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const args = parseCliArgs([
    "categorical-chi-squared",
    "--counts",
    "8,9,19,5,8,11",
    "--iterations",
    "20",
    "--verbose",
  ]);
  runCatalogTest(args);
  expect(isVerbose()).toBe(true);
  const traced = log.mock.calls.map(call => String(call[0]));
  const prefix = "[HypothesisTest] χ² under uniform redraw: p=";
  expect(traced.some(line => line.startsWith(prefix))).toBe(true);
});

test("CLI reports harness errors without throwing", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const argv = process.argv;
  process.argv = ["node", "nullsim", "diff-means", "--a", "1,2"];
  try {
    runDefaultCLI();
    expect(process.exitCode).toBe(1);
    expect(error).toHaveBeenCalledOnce();
    const message = String(error.mock.calls[0]?.[0]);
    expect(message).toContain(
      "InvalidArgumentError: diff-means needs --a and --b",
    );
  } finally {
    process.argv = argv;
    process.exitCode = undefined;
  }
});
