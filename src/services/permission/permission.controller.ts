import { Request, Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { normalizeAddress } from '../../utils/address';
import { PermissionStore, ROLES, Role, isRole } from './permission.service';

const parseRole = (value: unknown): Role => {
  if (!isRole(value)) {
    throw ApiError.invalidInput(`role must be one of ${ROLES.join(', ')}`);
  }
  return value;
};

export class PermissionController {
  constructor(private readonly permissions: PermissionStore) {}

  /**
   * Admin record and role members
   * GET /roles
   */
  overview(_req: Request, res: Response): void {
    const members = Object.fromEntries(ROLES.map((role) => [role, this.permissions.members(role)]));

    res.status(200).json({
      success: true,
      data: {
        admin: this.permissions.admin(),
        pendingAdmin: this.permissions.pendingAdmin(),
        adminDelay: this.permissions.adminDelay(),
        members,
      },
    });
  }

  /**
   * GET /roles/:role/:address
   */
  hasRole(req: Request, res: Response, next: NextFunction): void {
    try {
      const role = parseRole(req.params.role);
      const address = normalizeAddress(req.params.address);
      res.status(200).json({
        success: true,
        data: { role, address, hasRole: this.permissions.hasPermission(address, role) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/grant
   */
  grant(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const role = parseRole(req.body.role);
      const account = normalizeAddress(String(req.body.account), 'account');

      const changed = this.permissions.grant(caller, role, account);

      res.status(200).json({ success: true, data: { role, account, changed } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/revoke
   */
  revoke(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const role = parseRole(req.body.role);
      const account = normalizeAddress(String(req.body.account), 'account');

      const changed = this.permissions.revoke(caller, role, account);

      res.status(200).json({ success: true, data: { role, account, changed } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/renounce
   */
  renounce(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const account = requirePrincipal(req);
      const role = parseRole(req.body.role);

      const changed = this.permissions.renounce(account, role);

      res.status(200).json({ success: true, data: { role, account, changed } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/admin/propose
   */
  proposeAdmin(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const candidate = normalizeAddress(String(req.body.candidate), 'candidate');
      const notBefore = typeof req.body.notBefore === 'number' ? req.body.notBefore : undefined;

      const pending = this.permissions.proposeAdmin(caller, candidate, notBefore);

      res.status(200).json({ success: true, data: { pendingAdmin: pending } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/admin/accept
   */
  acceptAdmin(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const admin = this.permissions.acceptAdmin(requirePrincipal(req));
      res.status(200).json({ success: true, data: { admin } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /roles/admin/cancel
   */
  cancelAdmin(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      this.permissions.cancelAdmin(requirePrincipal(req));
      res.status(200).json({ success: true, data: { pendingAdmin: null } });
    } catch (error) {
      next(error);
    }
  }
}
