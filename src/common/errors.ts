/**
 * HTTP-facing errors. Anything thrown from a route that is not an AppError
 * is reported as INTERNAL_ERROR by the global handler.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}

/**
 * A required credential is absent. Only the dependent feature is disabled.
 */
export class ConfigurationMissingError extends AppError {
  constructor(public readonly setting: string, message: string) {
    super('CONFIGURATION_MISSING', message, 503);
  }
}
