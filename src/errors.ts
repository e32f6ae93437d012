// Phoropter Refraction Engine - Error taxonomy
//
// Rejected adjustments and safety escalations are returned as values (see
// AdjustmentOutcome and TurnResult.escalation). Only the two kinds below are
// thrown.

/**
 * Raised when an operation is attempted on a session or controller that has
 * already reached a terminal state. Signals a caller bug upstream.
 */
export class InvalidTransitionError extends Error {
  readonly kind = "invalid_transition";

  constructor(
    readonly operation: string,
    readonly state: string,
    detail?: string,
  ) {
    super(
      `Invalid state transition: cannot call ${operation}() in "${state}" state.` +
        (detail ? ` ${detail}` : ""),
    );
    this.name = "InvalidTransitionError";
  }
}

/**
 * Raised at startup when the protocol step graph or the engine configuration
 * is inconsistent. Fatal: the engine must not start.
 */
export class ConfigurationError extends Error {
  readonly kind = "configuration";

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
  }
}
