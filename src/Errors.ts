export type HypothesisTestErrorCode =
  | "INVALID_DATA"
  | "INVALID_ARGUMENT"
  | "NOT_YET_ESTIMATED"
  | "UNIMPLEMENTED_VARIANT";

/** Base class for errors raised by the hypothesis test harness */
export class HypothesisTestError extends Error {
  constructor(
    message: string,
    readonly code: HypothesisTestErrorCode,
  ) {
    super(message);
    this.name = "HypothesisTestError";
  }
}

/** Data arrangement doesn't fit the chosen statistic/model pair */
export class InvalidDataError extends HypothesisTestError {
  constructor(message: string) {
    super(message, "INVALID_DATA");
    this.name = "InvalidDataError";
  }
}

/** Bad argument to an estimation call, e.g. a non-positive iteration count */
export class InvalidArgumentError extends HypothesisTestError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

/** Diagnostic accessor called before any estimation run */
export class NotYetEstimatedError extends HypothesisTestError {
  constructor(accessor: string) {
    const message = `${accessor}() requires a prior estimatePValue() run`;
    super(message, "NOT_YET_ESTIMATED");
    this.name = "NotYetEstimatedError";
  }
}

/** Statistic or null model missing where a concrete variant is required */
export class UnimplementedVariantError extends HypothesisTestError {
  constructor(missing: string) {
    const message = `no concrete ${missing} bound to the hypothesis test`;
    super(message, "UNIMPLEMENTED_VARIANT");
    this.name = "UnimplementedVariantError";
  }
}
