import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';
import { Principal } from '../utils/address';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.invalidToken('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.invalidToken('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.invalidToken('No token provided');
    }

    const payload = authService.verifyToken(token);

    req.principal = payload.sub;
    addLogContext({ principal: payload.sub });
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * The authenticated caller of a route mounted behind authMiddleware
 */
export const requirePrincipal = (req: AuthRequest): Principal => {
  if (!req.principal) {
    throw ApiError.invalidToken('Not authenticated');
  }
  return req.principal;
};
