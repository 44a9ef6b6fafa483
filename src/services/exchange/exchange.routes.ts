import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { ExchangeController } from './exchange.controller';
import { Exchange } from './exchange.service';
import {
  buyValidation,
  quoteBuyValidation,
  quoteSellValidation,
  receiveValidation,
  sellValidation,
  transferOwnershipValidation,
  withdrawTokensValidation,
} from './exchange.validation';

export const createExchangeRoutes = (exchange: Exchange): Router => {
  const router = Router();
  const controller = new ExchangeController(exchange);

  // GET /exchange - Prices, owner and reserves
  router.get('/', (req: Request, res: Response) => controller.info(req, res));

  // Quotes
  router.get('/quote/buy', quoteBuyValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.quoteBuy(req, res, next));
  router.get('/quote/sell', quoteSellValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.quoteSell(req, res, next));

  // Trading
  router.post('/buy', authMiddleware, buyValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.buy(req, res, next));
  router.post('/receive', authMiddleware, receiveValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.receive(req, res, next));
  router.post('/sell', authMiddleware, sellValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.sell(req, res, next));

  // Treasury (owner only)
  router.post('/withdraw-currency', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.withdrawCurrency(req, res, next));
  router.post('/withdraw-tokens', authMiddleware, withdrawTokensValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.withdrawTokens(req, res, next));

  // Ownership
  router.post('/ownership/transfer', authMiddleware, transferOwnershipValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.transferOwnership(req, res, next));
  router.post('/ownership/accept', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.acceptOwnership(req, res, next));

  return router;
};
