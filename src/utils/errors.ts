export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  } {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier ${identifier} not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
  }
}

export class InstrumentNotFoundError extends NotFoundError {
  constructor(isin: string) {
    super('Instrument', isin);
  }
}

// Upstream feed errors are logged by the ingestion side and never reach an
// HTTP reply, so they keep the default status.

export class DecodeError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DECODE_ERROR', 500, details);
  }
}

export class NotImplementedError extends AppError {
  constructor(feature: string) {
    super(`${feature} is not implemented`, 'NOT_IMPLEMENTED');
  }
}

export class UpstreamConnectionError extends AppError {
  constructor(url: string, message: string, details?: unknown) {
    super(`Upstream feed ${url} unreachable: ${message}`, 'UPSTREAM_CONNECTION_ERROR', 500, details);
  }
}
