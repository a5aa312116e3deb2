export interface ApiErrorOptions {
  message: string;
  /**
   * HTTP status code, or 0 when the request never reached the server
   */
  statusCode?: number;
  errorCode?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error for every failure raised once a request has been attempted.
 *
 * Classification is a pure function of `statusCode`; subclasses exist for
 * `instanceof` checks but never change the predicates.
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly errorCode?: string;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(options: ApiErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 0;
    this.errorCode = options.errorCode;
    this.details = Object.freeze({ ...options.details });

    Error.captureStackTrace(this, this.constructor);
  }

  isNotFound(): boolean {
    return this.statusCode === 404;
  }

  isUnauthorized(): boolean {
    return this.statusCode === 401;
  }

  isTimeout(): boolean {
    return this.statusCode === 408;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      errorCode: this.errorCode,
      details: this.details,
    };
  }
}
