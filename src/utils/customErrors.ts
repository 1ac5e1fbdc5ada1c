export type FieldErrors = Record<string, string[]>;

class AppError extends Error {
  statusCode: number;
  status: 'fail' | 'error';
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
    this.status = statusCode.toString().startsWith('4') ? 'fail' : 'error';
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 401);
  }
}

class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}

// Carries every failing field at once, keyed by field name.
class ValidationError extends AppError {
  fields: FieldErrors;

  constructor(fields: FieldErrors, message = 'Please correct the errors below.') {
    super(message, 422);
    this.fields = fields;
  }
}

const mergeFieldErrors = (...sources: FieldErrors[]): FieldErrors => {
  const merged: FieldErrors = {};
  for (const source of sources) {
    for (const [field, messages] of Object.entries(source)) {
      const existing = merged[field] ?? [];
      merged[field] = [...existing, ...messages.filter((m) => !existing.includes(m))];
    }
  }
  return merged;
};

const hasFieldErrors = (fields: FieldErrors): boolean =>
  Object.keys(fields).length > 0;

export {
  AppError,
  BadRequestError,
  NotFoundError,
  UnauthorizedError,
  ForbiddenError,
  ValidationError,
  mergeFieldErrors,
  hasFieldErrors,
};
