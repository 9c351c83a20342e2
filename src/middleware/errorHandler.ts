import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 422);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

// Token was issued but its validity window has passed
export class ExpiredError extends AppError {
  constructor(message: string) {
    super(message, 410);
  }
}

// Product exists but has no deliverable file
export class UnavailableError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class CorruptDocumentError extends AppError {
  constructor(collection: string, id: string, field: string) {
    super(`Stored ${collection} ${id} has an invalid "${field}" field`, 500);
    this.isOperational = false;
  }
}

interface FieldError {
  field?: string;
  message: string;
}

// body-parser flags unparseable JSON with this type
const isMalformedJson = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
) => {
  let statusCode = 500;
  let message = 'Internal server error';
  let errors: FieldError[] | undefined = undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.isOperational ? err.message : message;

    if (err instanceof ValidationError && err.field) {
      errors = [{ field: err.field, message: err.message }];
    }
  } else if (isMalformedJson(err)) {
    statusCode = 400;
    message = 'Malformed JSON body';
  }

  const requestInfo = { method: req.method, path: req.originalUrl, statusCode };
  if (statusCode >= 500) {
    logger.error('Request failed', err, requestInfo);
  } else {
    logger.warn(err.message, requestInfo);
  }

  res.status(statusCode).json({
    success: false,
    message,
    errors,
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
};
