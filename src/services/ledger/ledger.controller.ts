import { Request, Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { normalizeAddress } from '../../utils/address';
import { parseUint } from '../../utils/units';
import { TokenLedger } from './ledger.service';

export class LedgerController {
  constructor(private readonly ledger: TokenLedger) {}

  /**
   * Token metadata and supply
   * GET /token
   */
  info(_req: Request, res: Response): void {
    res.status(200).json({ success: true, data: this.ledger.info() });
  }

  /**
   * GET /token/balances/:address
   */
  balance(req: Request, res: Response, next: NextFunction): void {
    try {
      const address = normalizeAddress(req.params.address);
      res.status(200).json({
        success: true,
        data: { address, balance: this.ledger.balanceOf(address) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /token/allowances/:owner/:spender
   */
  allowance(req: Request, res: Response, next: NextFunction): void {
    try {
      const owner = normalizeAddress(req.params.owner, 'owner');
      const spender = normalizeAddress(req.params.spender, 'spender');
      res.status(200).json({
        success: true,
        data: { owner, spender, allowance: this.ledger.allowance(owner, spender) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/mint
   */
  mint(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const caller = requirePrincipal(req);
      const to = normalizeAddress(String(req.body.to), 'to');
      const amount = parseUint(String(req.body.amount));

      this.ledger.mint(caller, to, amount);

      res.status(201).json({
        success: true,
        data: { to, amount, totalSupply: this.ledger.totalSupply() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/transfer
   */
  transfer(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const from = requirePrincipal(req);
      const to = normalizeAddress(String(req.body.to), 'to');
      const amount = parseUint(String(req.body.amount));

      this.ledger.transfer(from, to, amount);

      res.status(200).json({
        success: true,
        data: { from, to, amount, balance: this.ledger.balanceOf(from) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/transfer-from
   */
  transferFrom(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const spender = requirePrincipal(req);
      const from = normalizeAddress(String(req.body.from), 'from');
      const to = normalizeAddress(String(req.body.to), 'to');
      const amount = parseUint(String(req.body.amount));

      this.ledger.transferFrom(spender, from, to, amount);

      res.status(200).json({
        success: true,
        data: { spender, from, to, amount, allowance: this.ledger.allowance(from, spender) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/approve
   */
  approve(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const owner = requirePrincipal(req);
      const spender = normalizeAddress(String(req.body.spender), 'spender');
      const amount = parseUint(String(req.body.amount));

      this.ledger.approve(owner, spender, amount);

      res.status(200).json({ success: true, data: { owner, spender, allowance: amount } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/pause
   */
  pause(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      this.ledger.pause(requirePrincipal(req));
      res.status(200).json({ success: true, data: { paused: this.ledger.paused() } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/unpause
   */
  unpause(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      this.ledger.unpause(requirePrincipal(req));
      res.status(200).json({ success: true, data: { paused: this.ledger.paused() } });
    } catch (error) {
      next(error);
    }
  }
}
