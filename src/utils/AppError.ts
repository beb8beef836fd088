// src/utils/AppError.ts

class AppError extends Error {
  statusCode: number;

  status: 'fail' | 'error';

  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);

    this.statusCode = statusCode;
    // 'fail' for 4xx errors, 'error' for 5xx errors
    this.status = `${statusCode}`.startsWith('4') ? 'fail' : 'error';

    // Operational errors are user-facing and safe to echo back
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export default AppError;
