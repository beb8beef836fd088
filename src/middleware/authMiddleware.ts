// src/middleware/authMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import AppError from '../utils/AppError';
import { JWT_SECRET } from '../config/constants';
import { UserRole, isUserRole } from '../types/lunchmate';

// Shape of the identity carried by the bearer token
export interface AuthenticatedUser {
  id: string;
  role: UserRole;
}

// Express Request with the identity resolved by `protect`
export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

const readIdentity = (decoded: string | jwt.JwtPayload): AuthenticatedUser | null => {
  if (typeof decoded === 'string') return null;

  const { id, role } = decoded;
  if (typeof id !== 'string' || !id || !isUserRole(role)) return null;

  return { id, role };
};

// Middleware function to protect routes
export const protect = (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  let token: string | undefined;

  // 1. Get token and check if it exists
  if (req.headers.authorization && req.headers.authorization.startsWith('Bearer')) {
    token = req.headers.authorization.split(' ')[1];
  }

  if (!token) {
    return next(new AppError('You are not logged in! Please log in to get access.', 401));
  }

  // 2. Verify it. JsonWebTokenError / TokenExpiredError go to the global handler.
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, JWT_SECRET);
  } catch (err) {
    return next(err);
  }

  // 3. The token must name a user and a role we know
  const user = readIdentity(decoded);
  if (!user) {
    return next(new AppError('Your token does not identify a cook or a customer.', 401));
  }

  req.user = user;
  next();
};

// Only let the listed roles through. Must run after `protect`.
export const restrictTo = (...roles: UserRole[]) => {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return next(new AppError('Role check failed: Missing user context from token.', 401));
    }

    if (!roles.includes(req.user.role)) {
      return next(new AppError('You do not have permission to perform this action.', 403));
    }

    next();
  };
};

// The id of the caller, for controllers mounted behind `protect`
export const currentUserId = (req: AuthenticatedRequest): string => {
  if (!req.user) {
    throw new AppError('You are not logged in! Please log in to get access.', 401);
  }
  return req.user.id;
};
