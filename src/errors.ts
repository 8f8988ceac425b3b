/**
 * Errors a request handler can translate directly into an HTTP status.
 */
export class ServiceError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Malformed or out-of-range input. Storage failures during bulk discount
 * operations are reported with this kind as well, with the storage error kept
 * as `cause`.
 */
export class ValidationError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 400, options);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 404, options);
  }
}

export class UnsupportedMediaTypeError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 415, options);
  }
}
