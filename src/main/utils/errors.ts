export class CaptureError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'CaptureError';
  }
}

/** Candidate unreachable: socket refused, resource rejected, no backend */
export class ConnectError extends CaptureError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONNECT_ERROR', details);
    this.name = 'ConnectError';
  }
}

export class QueryError extends CaptureError {
  constructor(message: string, details?: unknown) {
    super(message, 'QUERY_ERROR', details);
    this.name = 'QueryError';
  }
}

export class InsufficientDataError extends CaptureError {
  constructor(
    public readonly bytesReceived: number,
    public readonly minimumBytes: number
  ) {
    super(`Image data too small (${bytesReceived} bytes, need ${minimumBytes})`, 'INSUFFICIENT_DATA');
    this.name = 'InsufficientDataError';
  }
}

/** No frame arrived within the per-read timeout */
export class StreamTimeoutError extends CaptureError {
  constructor(message: string = 'Read timed out') {
    super(message, 'STREAM_TIMEOUT');
    this.name = 'StreamTimeoutError';
  }
}

export class StreamClosedError extends CaptureError {
  constructor(
    message: string,
    public readonly bytesBuffered: number = 0
  ) {
    super(message, 'STREAM_CLOSED');
    this.name = 'StreamClosedError';
  }
}

export class EnvelopeParseError extends CaptureError {
  constructor(message: string) {
    super(message, 'ENVELOPE_PARSE_ERROR');
    this.name = 'EnvelopeParseError';
  }
}

export class StorageError extends CaptureError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

export class ConfigError extends CaptureError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class CaptureAbortedError extends CaptureError {
  constructor(message: string = 'Capture aborted') {
    super(message, 'CAPTURE_ABORTED');
    this.name = 'CaptureAbortedError';
  }
}

export class CaptureFailedError extends CaptureError {
  constructor(
    message: string,
    public readonly attempts: number,
    details?: unknown
  ) {
    // Surface the last attempt's reason, not just "no candidate succeeded"
    const innerMsg = details instanceof Error ? details.message : undefined;
    const fullMessage = innerMsg ? `${message}: ${innerMsg}` : message;
    super(fullMessage, 'CAPTURE_FAILED', details);
    this.name = 'CaptureFailedError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function isCaptureError(error: unknown): error is CaptureError {
  return error instanceof CaptureError;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}

/** Error code for attempt records; plain errors report their name */
export function getErrorCode(error: unknown): string {
  if (isCaptureError(error) && error.code) {
    return error.code;
  }
  return isError(error) ? error.name : 'UNKNOWN_ERROR';
}
