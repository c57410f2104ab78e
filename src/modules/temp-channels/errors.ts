/**
 * Temp channel error taxonomy.
 *
 * Purpose: one error class for every failure the engine and facade report, so
 * callers branch on `kind` (what family) or `code` (exact condition) instead of
 * matching messages.
 *
 * Invariants:
 * - `validation`, `authorization`, `rate_limit` and `state` errors are raised
 *   before any mutation.
 * - `platform` errors carry `transient` so retry policies can decide.
 */

export type TempChannelErrorKind =
  | "validation"
  | "authorization"
  | "rate_limit"
  | "state"
  | "platform";

export type TempChannelErrorCode =
  | "INVALID_DURATION"
  | "INVALID_TOPIC"
  | "INVALID_VISIBILITY"
  | "INVALID_TARGET"
  | "INVALID_AMOUNT"
  | "NOT_AUTHORIZED"
  | "COOLDOWN_ACTIVE"
  | "MAX_CHANNELS_REACHED"
  | "NOT_FOUND"
  | "CHANNEL_CLOSING"
  | "NOT_PRIVATE"
  | "FEATURE_DISABLED"
  | "PLATFORM_FAILURE";

const KIND_BY_CODE: Record<TempChannelErrorCode, TempChannelErrorKind> = {
  INVALID_DURATION: "validation",
  INVALID_TOPIC: "validation",
  INVALID_VISIBILITY: "validation",
  INVALID_TARGET: "validation",
  INVALID_AMOUNT: "validation",
  NOT_AUTHORIZED: "authorization",
  COOLDOWN_ACTIVE: "rate_limit",
  MAX_CHANNELS_REACHED: "rate_limit",
  NOT_FOUND: "state",
  CHANNEL_CLOSING: "state",
  NOT_PRIVATE: "state",
  FEATURE_DISABLED: "state",
  PLATFORM_FAILURE: "platform",
};

export interface TempChannelErrorDetails {
  /** Milliseconds until a cooldown ends. */
  retryAfterMs?: number;
  /** Per-user channel limit that was hit. */
  limit?: number;
  /** Whether a platform failure may succeed on retry. */
  transient?: boolean;
  cause?: unknown;
}

export class TempChannelError extends Error {
  readonly kind: TempChannelErrorKind;

  constructor(
    public readonly code: TempChannelErrorCode,
    message: string,
    public readonly details: TempChannelErrorDetails = {},
  ) {
    super(message);
    this.name = "TempChannelError";
    this.kind = KIND_BY_CODE[code];
  }

  get transient(): boolean {
    return this.details.transient === true;
  }
}

/** Wrap whatever the platform threw into a `PLATFORM_FAILURE`. */
export function platformError(
  error: unknown,
  transient: boolean,
): TempChannelError {
  const message = error instanceof Error ? error.message : String(error);
  return new TempChannelError("PLATFORM_FAILURE", message, {
    transient,
    cause: error,
  });
}
