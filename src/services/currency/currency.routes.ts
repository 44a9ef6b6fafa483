import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { CurrencyController } from './currency.controller';
import { CurrencyService } from './currency.service';
import { currencyBalanceValidation, fundValidation } from './currency.validation';

export interface CurrencyRouteOptions {
  /** Mount POST /fund; never in production */
  faucetEnabled: boolean;
}

export const createCurrencyRoutes = (currency: CurrencyService, options: CurrencyRouteOptions): Router => {
  const router = Router();
  const controller = new CurrencyController(currency);

  // GET /currency/balances/:address
  router.get('/balances/:address', currencyBalanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.balance(req, res, next));

  if (options.faucetEnabled) {
    // POST /currency/fund - Development faucet
    router.post('/fund', authMiddleware, fundValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.fund(req, res, next));
  }

  return router;
};
