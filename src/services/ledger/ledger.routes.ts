import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { LedgerController } from './ledger.controller';
import { TokenLedger } from './ledger.service';
import {
  allowanceValidation,
  approveValidation,
  balanceValidation,
  mintValidation,
  transferFromValidation,
  transferValidation,
} from './ledger.validation';

export const createLedgerRoutes = (ledger: TokenLedger): Router => {
  const router = Router();
  const controller = new LedgerController(ledger);

  // GET /token - Metadata, supply and pause flag
  router.get('/', (req: Request, res: Response) => controller.info(req, res));

  // GET /token/balances/:address
  router.get('/balances/:address', balanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.balance(req, res, next));

  // GET /token/allowances/:owner/:spender
  router.get('/allowances/:owner/:spender', allowanceValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.allowance(req, res, next));

  // Mutations act as the bearer token's principal
  router.post('/mint', authMiddleware, mintValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.mint(req, res, next));
  router.post('/transfer', authMiddleware, transferValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.transfer(req, res, next));
  router.post('/transfer-from', authMiddleware, transferFromValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.transferFrom(req, res, next));
  router.post('/approve', authMiddleware, approveValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.approve(req, res, next));
  router.post('/pause', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.pause(req, res, next));
  router.post('/unpause', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.unpause(req, res, next));

  return router;
};
