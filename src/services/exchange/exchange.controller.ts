import { Request, Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { normalizeAddress } from '../../utils/address';
import { parseUint } from '../../utils/units';
import { Exchange } from './exchange.service';

export class ExchangeController {
  constructor(private readonly exchange: Exchange) {}

  /**
   * Prices, ownership and reserves
   * GET /exchange
   */
  info(_req: Request, res: Response): void {
    res.status(200).json({ success: true, data: this.exchange.info() });
  }

  /**
   * GET /exchange/quote/buy?value=
   */
  quoteBuy(req: Request, res: Response, next: NextFunction): void {
    try {
      const value = parseUint(String(req.query.value), 'value');
      res.status(200).json({ success: true, data: { value, ...this.exchange.quoteBuy(value) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /exchange/quote/sell?amount=
   */
  quoteSell(req: Request, res: Response, next: NextFunction): void {
    try {
      const amount = parseUint(String(req.query.amount));
      res.status(200).json({ success: true, data: { amount, ...this.exchange.quoteSell(amount) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Pay `value` currency for tokens
   * POST /exchange/buy
   */
  buy(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const value = parseUint(String(req.body.value), 'value');

      const purchase = this.exchange.buy(caller, value);

      res.status(200).json({ success: true, data: { purchase } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Bare currency payment to the exchange address
   * POST /exchange/receive
   */
  receive(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const value = parseUint(String(req.body.value), 'value');
      const data = typeof req.body.data === 'string' ? req.body.data : undefined;

      this.exchange.receive(caller, value, data);

      res.status(200).json({ success: true, data: { from: caller, value } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /exchange/sell
   */
  sell(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const amount = parseUint(String(req.body.amount));

      const sale = this.exchange.sell(caller, amount);

      res.status(200).json({ success: true, data: { sale } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /exchange/withdraw-currency
   */
  withdrawCurrency(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const amount = this.exchange.withdrawCurrency(requirePrincipal(req));
      res.status(200).json({ success: true, data: { owner: this.exchange.owner(), amount } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /exchange/withdraw-tokens
   */
  withdrawTokens(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const amount = this.exchange.withdrawTokens(caller, parseUint(String(req.body.amount)));
      res.status(200).json({ success: true, data: { owner: this.exchange.owner(), amount } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /exchange/ownership/transfer
   */
  transferOwnership(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const newOwner = normalizeAddress(String(req.body.newOwner), 'newOwner');

      const pendingOwner = this.exchange.transferOwnership(caller, newOwner);

      res.status(200).json({ success: true, data: { owner: this.exchange.owner(), pendingOwner } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /exchange/ownership/accept
   */
  acceptOwnership(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const owner = this.exchange.acceptOwnership(requirePrincipal(req));
      res.status(200).json({ success: true, data: { owner, pendingOwner: null } });
    } catch (error) {
      next(error);
    }
  }
}
