export class PrintLinkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PrintLinkError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

// Payload errors
export class ParseError extends PrintLinkError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error
  ) {
    super(message, 'PARSE_ERROR', cause);
    this.name = 'ParseError';
  }
}

// Device API errors
export class DeviceConnectionError extends PrintLinkError {
  constructor(message: string, cause?: Error) {
    super(message, 'DEVICE_CONNECTION_ERROR', cause);
    this.name = 'DeviceConnectionError';
  }
}

export class DeviceRequestError extends PrintLinkError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    cause?: Error
  ) {
    super(message, 'DEVICE_REQUEST_ERROR', cause);
    this.name = 'DeviceRequestError';
  }
}

export class StreamError extends PrintLinkError {
  constructor(message: string, cause?: Error) {
    super(message, 'STREAM_ERROR', cause);
    this.name = 'StreamError';
  }
}

// Config-related errors
export class ConfigError extends PrintLinkError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends PrintLinkError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

// Engine errors
export class EngineDisposedError extends PrintLinkError {
  constructor(message = 'Engine has been disposed') {
    super(message, 'ENGINE_DISPOSED');
    this.name = 'EngineDisposedError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
