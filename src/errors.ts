export class EngineError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EngineError";
  }
}

export class InvalidWindowError extends EngineError {
  constructor(windowType: string) {
    super("INVALID_WINDOW", `Invalid window type: ${windowType}. Must be '30d' or '180d'`, {
      windowType,
    });
    this.name = "InvalidWindowError";
  }
}

export type ConsentErrorCode = "CONSENT_REQUIRED" | "USER_NOT_FOUND";

export class ConsentError extends EngineError {
  constructor(
    public readonly userId: string,
    code: ConsentErrorCode,
  ) {
    super(
      code,
      code === "USER_NOT_FOUND"
        ? `User ${userId} not found`
        : `User ${userId} has not provided consent. Explicit opt-in is required before recommendations are shown.`,
      { userId },
    );
    this.name = "ConsentError";
  }
}

/**
 * Raised by a detector when the accounts it reads from do not exist.
 * The aggregator turns it into zero-valued signals.
 */
export class DataUnavailableError extends EngineError {
  constructor(
    public readonly detector: string,
    message: string,
  ) {
    super("DATA_UNAVAILABLE", message, { detector });
    this.name = "DataUnavailableError";
  }
}
