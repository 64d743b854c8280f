export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  BAD_REQUEST = 'BAD_REQUEST',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
  }
}

/**
 * Codes every service error family must define
 */
export interface BaseServiceErrorCodes<T extends string> {
  INTERNAL_ERROR: T;
  VALIDATION_ERROR: T;
  NOT_FOUND: T;
}

export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: BaseServiceErrorCodes<T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return new DomainError(error.message, 500, error, typeof code === 'string' ? code : undefined);
  }
  return new DomainError(String(error) || fallbackMessage, 500);
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof DomainError && error.code === code;
}
