export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

export class BusinessRuleError extends AppError {
  constructor(message: string, details?: unknown) {
    super(422, 'BUSINESS_RULE_VIOLATION', message, details);
  }
}

/** Upload rejected before any remote call: unreadable file, missing sheet or columns. */
export class SchemaValidationError extends AppError {
  constructor(message: string, details?: { missingColumns?: string[]; sheet?: string }) {
    super(400, 'SCHEMA_VALIDATION_ERROR', message, details);
  }
}

/** A run cannot start: the input cannot be read back or the remote client cannot be built. */
export class UnrecoverableSetupError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'SETUP_ERROR', message, details);
  }
}
