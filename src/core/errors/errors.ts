import { ErrorCode, getFailureKind, type FailureKind } from "./ErrorCode.js";

export class ProvisionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly kind: FailureKind = getFailureKind(code),
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "ProvisionError";
  }
}

/**
 * Raised once a pipeline run has stopped on a failed step.
 */
export class StepFailedError extends ProvisionError {
  constructor(
    public readonly stepName: string,
    public readonly stepError: ProvisionError,
  ) {
    super(
      `Step "${stepName}" failed: ${stepError.message}`,
      stepError.code,
      { step: stepName, kind: stepError.kind, ...stepError.details },
      stepError.hint,
      stepError,
      stepError.isOperational,
      stepError.kind,
    );
    this.name = "StepFailedError";
  }
}

/**
 * Normalizes anything thrown into a ProvisionError.
 */
export function toProvisionError(err: unknown, fallbackCode: ErrorCode = ErrorCode.INTERNAL_ERROR): ProvisionError {
  if (err instanceof ProvisionError) {
    return err;
  }
  if (err instanceof Error) {
    const wrapped = new ProvisionError(err.message, fallbackCode, undefined, undefined, err, false);
    wrapped.stack = err.stack;
    return wrapped;
  }
  return new ProvisionError(String(err), fallbackCode, undefined, undefined, undefined, false);
}
