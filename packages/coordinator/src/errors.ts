// Failure taxonomy shared by the coordinator, the stores and the platform gateway.

export type FailureReason =
  | "invalid-value"
  | "not-owner"
  | "not-ownerless"
  | "not-present"
  | "not-tracked"
  | "invalid-configuration"
  | "busy"
  | "platform-unavailable"
  | "forbidden"
  | "store-unavailable";

export type Outcome<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      reason: FailureReason;
      message: string;
    };

/** A precondition or validation failure raised inside a coordinator operation. */
export class OperationError extends Error {
  public readonly reason: FailureReason;

  public constructor(reason: FailureReason, message: string) {
    super(message);
    this.name = "OperationError";
    this.reason = reason;
  }
}

export type PlatformFailure = "platform-unavailable" | "forbidden" | "unknown-channel";

export class PlatformError extends Error {
  public readonly reason: PlatformFailure;

  public constructor(reason: PlatformFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PlatformError";
    this.reason = reason;
  }
}

export class StoreUnavailableError extends Error {
  public constructor(cause: unknown) {
    super(`Store unavailable: ${describeError(cause)}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

export const isUnknownChannel = (error: unknown): boolean => {
  return error instanceof PlatformError && error.reason === "unknown-channel";
};

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
