import { Request, Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { normalizeAddress } from '../../utils/address';
import { parseUint } from '../../utils/units';
import { CurrencyService } from './currency.service';

export class CurrencyController {
  constructor(private readonly currency: CurrencyService) {}

  /**
   * GET /currency/balances/:address
   */
  balance(req: Request, res: Response, next: NextFunction): void {
    try {
      const address = normalizeAddress(req.params.address);
      res.status(200).json({
        success: true,
        data: { address, balance: this.currency.balanceOf(address) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Faucet for development and tests; defaults to the caller's own account
   * POST /currency/fund
   */
  fund(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const account = typeof req.body.account === 'string' ? normalizeAddress(req.body.account, 'account') : caller;
      const amount = parseUint(String(req.body.amount));

      const balance = this.currency.fund(account, amount);

      res.status(200).json({ success: true, data: { address: account, balance } });
    } catch (error) {
      next(error);
    }
  }
}
