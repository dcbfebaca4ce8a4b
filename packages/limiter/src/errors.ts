export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
  }
}

/** Raised by a backend whose store is unreachable, closed, or answered with garbage. */
export class BackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackendError";
  }
}
