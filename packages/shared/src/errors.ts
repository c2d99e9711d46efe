export type TradingErrorCode =
  | "INSUFFICIENT_DATA"
  | "ADVISOR_UNAVAILABLE"
  | "REJECTED_BY_RISK"
  | "FILL_FAILED"
  | "CLOSE_FAILED"
  | "CONFIGURATION_INVALID"
  | "TIMEOUT"
  | "ILLEGAL_TRANSITION";

export abstract class TradingError extends Error {
  abstract readonly code: TradingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InsufficientDataError extends TradingError {
  readonly code = "INSUFFICIENT_DATA" as const;

  constructor(
    readonly available: number,
    readonly required: number
  ) {
    super(`Insufficient data: ${available} bars available, ${required} required`);
  }
}

export type AdvisorFailureKind = "TIMEOUT" | "RATE_LIMITED" | "MALFORMED_RESPONSE" | "HTTP_ERROR" | "NETWORK";

export class AdvisorUnavailableError extends TradingError {
  readonly code = "ADVISOR_UNAVAILABLE" as const;

  constructor(
    readonly kind: AdvisorFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type RiskRejectionReason = "NO_DIRECTION" | "ADVISOR_REJECTED" | "BASE_SIZE_ABOVE_MAX" | "INSUFFICIENT_BALANCE" | "INVALID_PRICE";

export class RejectedByRiskError extends TradingError {
  readonly code = "REJECTED_BY_RISK" as const;

  constructor(
    readonly reason: RiskRejectionReason,
    message: string
  ) {
    super(message);
  }
}

export class FillFailedError extends TradingError {
  readonly code = "FILL_FAILED" as const;
}

export class CloseFailedError extends TradingError {
  readonly code = "CLOSE_FAILED" as const;
}

export class ConfigurationInvalidError extends TradingError {
  readonly code = "CONFIGURATION_INVALID" as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export class TimeoutError extends TradingError {
  readonly code = "TIMEOUT" as const;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class IllegalTransitionError extends TradingError {
  readonly code = "ILLEGAL_TRANSITION" as const;

  constructor(
    readonly state: string,
    readonly event: string
  ) {
    super(`Event ${event} is not allowed in state ${state}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
