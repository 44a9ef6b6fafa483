import { Router, Request, Response, NextFunction } from 'express';
import { authController } from './auth.controller';
import { authMiddleware } from './auth.middleware';

const router = Router();

// GET /auth/me - Principal the bearer token acts as
router.get('/me', authMiddleware, (req: Request, res: Response, next: NextFunction) => authController.me(req, res, next));

export default router;
