export type EngineErrorKind = "fatal_config" | "transport" | "execution";

export class EngineError extends Error {
  constructor(
    readonly kind: EngineErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Startup-only; not recoverable while running. */
export class FatalConfigError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal_config", message, options);
  }
}

export class TransportError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
  }
}

export class ExecutionError extends EngineError {
  constructor(
    readonly reason: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("execution", message, options);
  }
}

export const toError = (error: unknown): Error => {
  if (error instanceof Error) return error;
  if (typeof error === "string" && error.length > 0) return new Error(error);
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return new Error(error.message);
  }
  return new Error(String(error ?? "Unknown error"));
};

export const errorMessage = (error: unknown): string => toError(error).message;
