import pico from "picocolors";
import type { PValueSummary } from "./HypothesisTest.ts";
import { average, standardDeviation } from "./StatisticalUtils.ts";
import {
  decimal,
  formatPValue,
  plusMinus,
  pValueCell,
  statistic,
} from "./table-util/Formatters.ts";
import { buildTable, type ColumnGroup } from "./table-util/TableReport.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { green, yellow } = isTest
  ? { green: (str: string) => str, yellow: (str: string) => str }
  : pico;

const significanceThreshold = 0.05;
const goodSignificance = 0.01;
const strongSignificance = 0.001;

export type Significance = "strong" | "good" | "weak" | "none";

/** One estimated test, ready for reporting */
export interface TestReport {
  name: string;
  summary: PValueSummary;
  /** p-values of repeated independent runs, if any */
  runs?: number[];
}

interface ReportRow {
  name: string;
  actual: number;
  maxSimulated: number;
  summary: PValueSummary;
  standardError: number;
  significance: string;
  runsMean?: number;
  runsSd?: number;
}

/** @return significance level based on p-value thresholds */
export function getSignificance(pValue: number): Significance {
  if (pValue < strongSignificance) return "strong";
  if (pValue < goodSignificance) return "good";
  if (pValue < significanceThreshold) return "weak";
  return "none";
}

/** @return one-line description of a test result */
export function describeResult(report: TestReport): string {
  const { name, summary } = report;
  const level = getSignificance(summary.pValue);
  const p = formatPValue(summary);
  if (summary.upperBound === undefined) return `${name}: p = ${p} (${level})`;
  const actual = statistic(summary.actual);
  const nearest = statistic(summary.maxSimulated);
  const bound = `max simulated ${nearest} vs actual ${actual}`;
  return `${name}: p ${p} (${level}; ${bound})`;
}

/** @return formatted table of test results */
export function reportTestResults(reports: TestReport[]): string {
  const rows = reports.map(toRow);
  const withRuns = reports.some(r => r.runs && r.runs.length > 1);
  return buildTable(reportColumns(withRuns), rows);
}

function toRow(report: TestReport): ReportRow {
  const { name, summary, runs } = report;
  const level = getSignificance(summary.pValue);
  const multiRun = runs !== undefined && runs.length > 1;
  return {
    name,
    actual: summary.actual,
    maxSimulated: summary.maxSimulated,
    summary,
    standardError: summary.standardError,
    significance: level === "none" ? level : colorLevel(level),
    runsMean: multiRun ? average(runs) : undefined,
    runsSd: multiRun ? standardDeviation(runs) : undefined,
  };
}

function colorLevel(level: Significance): string {
  return level === "weak" ? yellow(level) : green(level);
}

// biome-ignore format: compact column definitions
function reportColumns(withRuns: boolean): ColumnGroup<ReportRow>[] {
  const groups: ColumnGroup<ReportRow>[] = [
    { columns: [{ key: "name", title: "test" }] },
    { groupTitle: "statistic", columns: [
      { key: "actual", title: "actual", formatter: statistic, alignment: "right" },
      { key: "maxSimulated", title: "max sim", formatter: statistic, alignment: "right" },
    ] },
    { groupTitle: "p-value", columns: [
      { key: "summary", title: "p", formatter: pValueCell, alignment: "right" },
      { key: "standardError", title: "SE", formatter: plusMinus, alignment: "right" },
      { key: "significance", title: "signif" },
    ] },
  ];
  if (!withRuns) return groups;
  const runs: ColumnGroup<ReportRow> = { groupTitle: "runs", columns: [
    { key: "runsMean", title: "mean p", formatter: decimal(4), alignment: "right" },
    { key: "runsSd", title: "sd p", formatter: decimal(4), alignment: "right" },
  ] };
  return [...groups, runs];
}
