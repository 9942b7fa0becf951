/** Base class for failures that map onto an HTTP status. */
export class NamedayError extends Error {
  constructor(message: string, public readonly status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends NamedayError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends NamedayError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** An expected structural marker is missing from an upstream page. */
export class ParseError extends NamedayError {
  constructor(message: string, public readonly url: string) {
    super(message, 500);
  }
}

export class FetchError extends NamedayError {
  constructor(message: string, public readonly url: string, options?: ErrorOptions) {
    super(message, 503, options);
  }
}

export class TimeoutError extends NamedayError {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 504);
  }
}
