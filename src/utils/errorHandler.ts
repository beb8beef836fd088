// src/utils/errorHandler.ts
import { Request, Response, NextFunction } from 'express';
import AppError from './AppError';

const errorName = (err: unknown): string | undefined =>
  err instanceof Error ? err.name : undefined;

// Global error handler middleware
export const globalErrorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  next: NextFunction,
) => {
  // 1. Handle AppError (operational, trusted errors, including domain failures)
  if (err instanceof AppError) {
    return res.status(err.statusCode).json({
      status: err.status,
      message: err.message,
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    });
  }

  // 2. Handle JWT errors
  if (errorName(err) === 'JsonWebTokenError') {
    return res.status(401).json({
      status: 'fail',
      message: 'Invalid token. Please log in again.',
    });
  }

  if (errorName(err) === 'TokenExpiredError') {
    return res.status(401).json({
      status: 'fail',
      message: 'Your token has expired! Please log in again.',
    });
  }

  // 3. Mongoose validation errors are caller mistakes
  if (errorName(err) === 'ValidationError' || errorName(err) === 'CastError') {
    return res.status(400).json({
      status: 'fail',
      message: err instanceof Error ? err.message : 'Invalid input.',
    });
  }

  // 4. Anything else (storage outages included) is unexpected
  console.error('ERROR (Unhandled):', err);

  if (process.env.NODE_ENV === 'development') {
    return res.status(500).json({
      status: 'error',
      message: 'Something went wrong on the server.',
      error: err,
      stack: err instanceof Error ? err.stack : undefined,
    });
  }

  return res.status(500).json({
    status: 'error',
    message: 'Something went wrong on the server.',
  });
};
