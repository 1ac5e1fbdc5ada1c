import type { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import multer from 'multer';
import logger from '../utils/logger';
import { AppError, BadRequestError, ValidationError } from '../utils/customErrors';
import { fieldErrorsFrom } from '../Books/models/book.model';
import { COVER_FIELD, MAX_COVER_SIZE } from './uploadCover';

interface MongoServerError extends Error {
  code?: number;
  keyValue?: Record<string, unknown>;
}

interface ErrorBody {
  success: false;
  status: 'fail' | 'error';
  message: string;
  errors?: Record<string, string[]>;
  stack?: string;
}

const isDuplicateKeyError = (err: Error): err is MongoServerError =>
  err.name === 'MongoServerError' && 'code' in err && err.code === 11000;

// Maps library errors onto the AppError hierarchy; unknown errors pass through.
const normalizeError = (err: Error): Error => {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof mongoose.Error.ValidationError) {
    return new ValidationError(fieldErrorsFrom(err));
  }

  if (err instanceof mongoose.Error.CastError) {
    return new BadRequestError(`Invalid ${err.path}: ${String(err.value)}`);
  }

  if (isDuplicateKeyError(err)) {
    const field = Object.keys(err.keyValue ?? {})[0] ?? 'value';
    return new ValidationError({ [field]: [`A record with this ${field} already exists.`] });
  }

  if (err instanceof multer.MulterError) {
    const field = err.field ?? COVER_FIELD;
    const message =
      err.code === 'LIMIT_FILE_SIZE'
        ? `File too large. Maximum size is ${MAX_COVER_SIZE / (1024 * 1024)}MB.`
        : err.message;
    return new ValidationError({ [field]: [message] });
  }

  return err;
};

const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const error = normalizeError(err);
  const isDevelopment = process.env.NODE_ENV === 'development';

  if (error instanceof AppError) {
    logger.warn(`${req.method} ${req.originalUrl} -> ${error.statusCode}: ${error.message}`);

    const body: ErrorBody = {
      success: false,
      status: error.status,
      message: error.message,
    };
    if (error instanceof ValidationError) {
      body.errors = error.fields;
    }
    if (isDevelopment) {
      body.stack = error.stack;
    }
    res.status(error.statusCode).json(body);
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);

  const body: ErrorBody = {
    success: false,
    status: 'error',
    message: isDevelopment ? error.message : 'Server Error!, Something went wrong!',
  };
  if (isDevelopment) {
    body.stack = error.stack;
  }
  res.status(500).json(body);
};

export default errorHandler;
