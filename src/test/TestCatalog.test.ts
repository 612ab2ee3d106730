import { expect, test } from "vitest";
import { InvalidArgumentError } from "../Errors.ts";
import type { MonteCarloTest, PValueSummary } from "../HypothesisTest.ts";
import {
  type AnyCatalogTest,
  findCatalogTest,
  testCatalog,
} from "../TestCatalog.ts";
import { assertValid, coinCounts, loadedDieCounts } from "./TestUtils.ts";

const groupA = [39, 39, 40, 38, 41, 39, 40, 39, 42, 39];
const groupB = [40, 39, 41, 41, 39, 40, 43, 40, 39, 41, 40];

test("catalog names are unique", () => {
  const names = testCatalog.map(t => t.name);
  expect(new Set(names).size).toBe(names.length);
  expect(names).toContain("diff-means");
  expect(names).toContain("pooled-chi-squared");
});

test("unknown test names are rejected", () => {
  expect(() => findCatalogTest("t-test")).toThrow(InvalidArgumentError);
  expect(() => findCatalogTest("t-test")).toThrow('unknown test "t-test"');
});

/** @return summary of a 200 trial run on shape-appropriate data */
function estimateEntry(entry: AnyCatalogTest): PValueSummary {
  const run = (t: MonteCarloTest) => {
    t.estimatePValue(200);
    return t.summary();
  };
  switch (entry.shape) {
    case "two-groups":
      return run(entry.create([groupA, groupB], { seed: 1 }));
    case "paired": {
      const ys = groupA.map((x, i) => x + (i % 4));
      return run(entry.create({ xs: groupA, ys }, { seed: 1 }));
    }
    case "counts":
      return run(entry.create(loadedDieCounts, { seed: 1 }));
  }
}

test("every catalog test estimates a valid p-value", () => {
  for (const entry of testCatalog) {
    const summary = estimateEntry(entry);
    assertValid.pValue(summary.pValue);
    expect(summary.iterations).toBe(200);
  }
});

test("catalog lookup returns the named pairing", () => {
  const entry = findCatalogTest("categorical-deviation");
  expect(entry.shape).toBe("counts");
  if (entry.shape !== "counts") return;
  const t = entry.create(coinCounts, { seed: 250 });
  expect(t.actualStatistic()).toBe(30);
});

test("categorical tests take null probabilities", () => {
  const entry = findCatalogTest("categorical-chi-squared");
  if (entry.shape !== "counts") throw new Error("expected a counts test");
  const t = entry.create([30, 10], { probabilities: [0.75, 0.25], seed: 3 });
  expect(t.actualStatistic()).toBe(0);
  expect(t.estimatePValue(100)).toBe(1);
});

test("pooled chi-squared takes explicit categories", () => {
  const entry = findCatalogTest("pooled-chi-squared");
  if (entry.shape !== "two-groups") throw new Error("expected two groups");
  const all = entry.create([groupA, groupB], { seed: 5 });
  const narrow = entry.create([groupA, groupB], {
    categories: [39, 40, 41],
    seed: 5,
  });
  expect(narrow.actualStatistic()).toBeLessThan(all.actualStatistic());
});

test("repeat gives one p-value per run", () => {
  const entry = findCatalogTest("diff-means");
  if (entry.shape !== "two-groups") throw new Error("expected two groups");
  const data = [groupA, groupB] as const;
  const ps = entry.repeat(data, { iterations: 50, runs: 4, seed: 8 });
  expect(ps).toHaveLength(4);
  ps.forEach(assertValid.pValue);
  expect(entry.repeat(data, { iterations: 50, runs: 4, seed: 8 })).toEqual(ps);
});
