export class ConnectionError extends Error {
  constructor(message = "Serial link could not be opened", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class ReadTimeoutError extends Error {
  constructor(message = "No data available before the read timeout") {
    super(message);
    this.name = "ReadTimeoutError";
  }
}

export class TransientIOError extends Error {
  constructor(message = "Serial read failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientIOError";
  }
}

export class WriteError extends Error {
  constructor(message = "Serial write failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteError";
  }
}

export class TransportStateError extends Error {
  constructor(message = "Transport is not in a state that allows this operation") {
    super(message);
    this.name = "TransportStateError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
