import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { PermissionController } from './permission.controller';
import { PermissionStore } from './permission.service';
import {
  hasRoleValidation,
  proposeAdminValidation,
  renounceValidation,
  roleChangeValidation,
} from './permission.validation';

export const createPermissionRoutes = (permissions: PermissionStore): Router => {
  const router = Router();
  const controller = new PermissionController(permissions);

  // GET /roles - Admin, pending admin, delay and members
  router.get('/', (req: Request, res: Response) => controller.overview(req, res));

  // Admin transfer (registered before /:role/:address)
  router.post('/admin/propose', authMiddleware, proposeAdminValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.proposeAdmin(req, res, next));
  router.post('/admin/accept', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.acceptAdmin(req, res, next));
  router.post('/admin/cancel', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.cancelAdmin(req, res, next));

  // Role grants
  router.post('/grant', authMiddleware, roleChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.grant(req, res, next));
  router.post('/revoke', authMiddleware, roleChangeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.revoke(req, res, next));
  router.post('/renounce', authMiddleware, renounceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.renounce(req, res, next));

  // GET /roles/:role/:address
  router.get('/:role/:address', hasRoleValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.hasRole(req, res, next));

  return router;
};
