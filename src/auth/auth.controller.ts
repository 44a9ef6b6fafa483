import { Response, NextFunction } from 'express';
import { requirePrincipal } from './auth.middleware';
import { AuthRequest } from './auth.types';

export class AuthController {
  me(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      res.status(200).json({
        success: true,
        data: { principal: requirePrincipal(req) },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const authController = new AuthController();
