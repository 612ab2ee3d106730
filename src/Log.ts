import pico from "picocolors";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { dim } = isTest ? { dim: (str: string) => str } : pico;

let verbose = process.env.NULLSIM_DEBUG === "1";

/** Enable or disable debug tracing (also enabled by NULLSIM_DEBUG=1) */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/** @return true if debug tracing is on */
export function isVerbose(): boolean {
  return verbose;
}

/** Log a debug trace line, prefixed with the component name */
export function debugLog(component: string, message: string): void {
  if (verbose) console.log(dim(`[${component}] ${message}`));
}
