import type { Argv, InferredOptionTypes } from "yargs";
import yargs from "yargs";
import { InvalidArgumentError } from "../Errors.ts";
import { testCatalog } from "../TestCatalog.ts";

export const defaultIterations = 1000;

export type Configure<T> = (yargs: Argv) => Argv<T>;

/** CLI args type inferred from cliOptions, plus the positional test name */
export type DefaultCliArgs = InferredOptionTypes<typeof cliOptions> & {
  test: string;
};

// biome-ignore format: compact option definitions
const cliOptions = {
  a:             { type: "string",  requiresArg: true, describe: "group a (or paired xs), comma separated" },
  b:             { type: "string",  requiresArg: true, describe: "group b (or paired ys), comma separated" },
  counts:        { type: "string",  requiresArg: true, describe: "observed count per category, comma separated" },
  probabilities: { type: "string",  requiresArg: true, describe: "null probability per category (default uniform)" },
  categories:    { type: "string",  requiresArg: true, describe: "category values for pooled-chi-squared" },
  iterations:    { type: "number",  default: defaultIterations, requiresArg: true, describe: "simulation trials" },
  seed:          { type: "number",  requiresArg: true, describe: "seed for a reproducible random stream" },
  runs:          { type: "number",  default: 1, describe: "independent repeated estimates, for p-value spread" },
  verbose:       { type: "boolean", default: false, describe: "trace estimation runs" },
} as const;

/** @return yargs with the test positional and standard options */
export function defaultCliArgs(yargsInstance: Argv): Argv<DefaultCliArgs> {
  const names = testCatalog.map(t => t.name);
  return yargsInstance
    .command("$0 <test>", "estimate a p-value by simulation")
    .positional("test", { type: "string", choices: names, demandOption: true })
    .options(cliOptions)
    .help()
    .strict();
}

/** @return parsed command line arguments */
export function parseCliArgs<T = DefaultCliArgs>(
  args: string[],
  configure: Configure<T> = defaultCliArgs as Configure<T>,
): T {
  const yargsInstance = configure(yargs(args));
  return yargsInstance.parseSync() as T;
}

/** @return numbers from a comma separated list */
export function parseNumbers(list: string, label: string): number[] {
  const values = list
    .split(",")
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(Number);
  const bad = values.findIndex(v => !Number.isFinite(v));
  if (bad >= 0) {
    throw new InvalidArgumentError(`--${label}: not a number in "${list}"`);
  }
  return values;
}
