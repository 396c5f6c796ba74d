export class ApiError extends Error {
  status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ApiError";
    this.status = options.status;
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

/** Network failure or request timeout. Retried only inside the poll loop. */
export class TransportError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/** Invalid or expired token. Never retried. */
export class AuthenticationError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "AuthenticationError";
  }
}

export class ConfigurationError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "ConfigurationError";
  }
}

export class JobStartError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "JobStartError";
  }
}

export class JobAlreadyRunningError extends JobStartError {
  constructor(sessionName: string, status?: number) {
    super(`A prediction is already in progress for session '${sessionName}'`, status);
    this.name = "JobAlreadyRunningError";
  }
}

export class JobFailedError extends ApiError {
  log: string[];

  constructor(sessionName: string, log: string[] = []) {
    super(`Prediction failed for session '${sessionName}'`);
    this.name = "JobFailedError";
    this.log = log;
  }
}

export class ResultNotReadyError extends ApiError {
  constructor(sessionName: string, jobStatus: string) {
    super(`No result for session '${sessionName}' yet (status ${jobStatus})`);
    this.name = "ResultNotReadyError";
  }
}

/**
 * The client stopped waiting. The job itself may still be running
 * server-side.
 */
export class PollTimeoutError extends ApiError {
  timeoutMs: number;

  constructor(sessionName: string, timeoutMs: number) {
    super(`Gave up waiting for session '${sessionName}' after ${timeoutMs} ms`);
    this.name = "PollTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class SessionLimitError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "SessionLimitError";
  }
}

export class UploadError extends ApiError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options);
    this.name = "UploadError";
  }
}

export class DownloadError extends ApiError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options);
    this.name = "DownloadError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "NotFoundError";
  }
}

export class UnknownStatusError extends ApiError {
  label: string;

  constructor(label: string) {
    super(`Unrecognized prediction status '${label}'`);
    this.name = "UnknownStatusError";
    this.label = label;
  }
}

/** Unexpected status code or a body that does not match the route's shape. */
export class ResponseError extends ApiError {
  constructor(message: string, status?: number) {
    super(message, { status });
    this.name = "ResponseError";
  }
}
