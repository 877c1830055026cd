export type SimulationErrorCode = "configuration" | "invariant";

export class SimulationError extends Error {
  constructor(
    message: string,
    readonly code: SimulationErrorCode
  ) {
    super(message);
    this.name = "SimulationError";
  }
}

/**
 * Raised before a run starts when the scenario cannot be simulated
 * (zero servers, negative duration, unknown pattern or strategy).
 */
export class ConfigurationError extends SimulationError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid scenario parameters:\n  ${list.join("\n  ")}`, "configuration");
    this.name = "ConfigurationError";
    this.issues = list;
  }
}

/** A broken scheduler or server invariant: always a bug in the engine. */
export class InvariantViolationError extends SimulationError {
  constructor(message: string) {
    super(message, "invariant");
    this.name = "InvariantViolationError";
  }
}

export const invariant: (condition: unknown, message: string) => asserts condition = (
  condition,
  message
) => {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
};
