export type CaptureSessionErrorKind =
  | "disposed"
  | "configuration"
  | "window"
  | "unknown";

export class CaptureSessionError extends Error {
  readonly kind: Exclude<CaptureSessionErrorKind, "unknown">;

  constructor(
    kind: Exclude<CaptureSessionErrorKind, "unknown">,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CaptureSessionError";
    this.kind = kind;
  }
}

export class SessionDisposedError extends CaptureSessionError {
  constructor(operation: string) {
    super("disposed", `Cannot ${operation}: capture session has been disposed`);
    this.name = "SessionDisposedError";
  }
}

export class WindowBuilderConfigError extends CaptureSessionError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "WindowBuilderConfigError";
  }
}

export type WindowOperation = "show" | "close" | "lock";

export class WindowOperationError extends CaptureSessionError {
  readonly operation: WindowOperation;

  constructor(operation: WindowOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("window", `Failed to ${operation} overlay window: ${reason}`, { cause });
    this.name = "WindowOperationError";
    this.operation = operation;
  }
}

export function classifyCaptureSessionError(error: unknown): CaptureSessionErrorKind {
  if (error instanceof CaptureSessionError) return error.kind;
  return "unknown";
}
