export class AbortedError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/** Sensor hub or video source unreachable, timed out, or answered with garbage. Retried on the next cycle. */
export class ConnectivityError extends Error {
  constructor(message: string, readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

/** Missing model resources or invalid configuration. The process refuses to start. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof AbortedError || (error instanceof Error && error.message === 'Aborted');

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Bad request input on the query surface; carries the HTTP status to answer with. */
export class RequestError extends Error {
  constructor(message: string, readonly status = 400) {
    super(message);
    this.name = 'RequestError';
  }
}
