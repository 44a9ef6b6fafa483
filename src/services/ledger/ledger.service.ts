/**
 * Ledger Service
 *
 * Balances, allowances and supply of the capped token.
 * Every balance change goes through update(), which enforces the pause flag
 * and the supply cap.
 */

import { ApiError } from '../../middlewares/errorHandler';
import type { EventLog } from '../../events/eventLog';
import type { AtomicExecutor } from '../../state/atomic';
import { EventType } from '../../types/events';
import { Principal, ZERO_ADDRESS, isZeroAddress, normalizeAddress } from '../../utils/address';
import type { Clock } from '../../utils/clock';
import { DECIMALS, assertUint } from '../../utils/units';
import { PermissionStore, Role } from '../permission/permission.service';

interface LedgerState {
  balances: Map<Principal, bigint>;
  allowances: Map<string, bigint>;
  totalSupply: bigint;
  paused: boolean;
}

export interface TokenLedgerOptions {
  name: string;
  symbol: string;
  maxSupply: bigint;
  permissions: PermissionStore;
  executor: AtomicExecutor;
  events: EventLog;
}

export interface TokenInfo {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  maxSupply: bigint;
  paused: boolean;
}

const allowanceKey = (owner: Principal, spender: Principal): string => `${owner}:${spender}`;

export class TokenLedger {
  readonly permissions: PermissionStore;
  private readonly executor: AtomicExecutor;
  private readonly events: EventLog;
  private readonly tokenName: string;
  private readonly tokenSymbol: string;
  private readonly cap: bigint;
  private readonly state: LedgerState = {
    balances: new Map(),
    allowances: new Map(),
    totalSupply: 0n,
    paused: false,
  };

  constructor(options: TokenLedgerOptions) {
    assertUint(options.maxSupply, 'maxSupply');
    if (options.maxSupply === 0n) {
      throw ApiError.zeroAmount('maxSupply must be greater than zero');
    }

    this.tokenName = options.name;
    this.tokenSymbol = options.symbol;
    this.cap = options.maxSupply;
    this.permissions = options.permissions;
    this.executor = options.executor;
    this.events = options.events;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  name(): string {
    return this.tokenName;
  }

  symbol(): string {
    return this.tokenSymbol;
  }

  decimals(): number {
    return DECIMALS;
  }

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  maxSupply(): bigint {
    return this.cap;
  }

  paused(): boolean {
    return this.state.paused;
  }

  balanceOf(principal: Principal): bigint {
    return this.state.balances.get(principal.toLowerCase()) ?? 0n;
  }

  allowance(owner: Principal, spender: Principal): bigint {
    return this.state.allowances.get(allowanceKey(owner.toLowerCase(), spender.toLowerCase())) ?? 0n;
  }

  info(): TokenInfo {
    return {
      name: this.tokenName,
      symbol: this.tokenSymbol,
      decimals: DECIMALS,
      totalSupply: this.state.totalSupply,
      maxSupply: this.cap,
      paused: this.state.paused,
    };
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  mint(caller: Principal, to: Principal, amount: bigint): void {
    this.executor.run(() => {
      this.permissions.requirePermission(caller, Role.MINTER);
      const recipient = this.destination(to, 'to');
      assertUint(amount);
      if (amount === 0n) {
        throw ApiError.zeroAmount('Mint amount must be greater than zero');
      }

      this.update(ZERO_ADDRESS, recipient, amount);
    });
  }

  transfer(caller: Principal, to: Principal, amount: bigint): void {
    this.executor.run(() => {
      const sender = normalizeAddress(caller, 'from');
      const recipient = this.destination(to, 'to');
      assertUint(amount);

      this.update(sender, recipient, amount);
    });
  }

  transferFrom(spender: Principal, from: Principal, to: Principal, amount: bigint): void {
    this.executor.run(() => {
      const operator = normalizeAddress(spender, 'spender');
      const owner = normalizeAddress(from, 'from');
      const recipient = this.destination(to, 'to');
      assertUint(amount);

      this.spendAllowance(owner, operator, amount);
      this.update(owner, recipient, amount);
    });
  }

  approve(owner: Principal, spender: Principal, amount: bigint): void {
    this.executor.run(() => {
      const holder = normalizeAddress(owner, 'owner');
      const operator = this.destination(spender, 'spender');
      assertUint(amount);

      this.setAllowance(allowanceKey(holder, operator), amount);
      this.events.emit({
        eventType: EventType.APPROVAL,
        payload: { owner: holder, spender: operator, amount },
      });
    });
  }

  pause(caller: Principal): void {
    this.executor.run(() => {
      this.permissions.requirePermission(caller, Role.PAUSER);
      if (this.state.paused) {
        throw ApiError.paused('Token is already paused');
      }

      this.executor.trackProperty(this.state, 'paused');
      this.state.paused = true;
      this.events.emit({ eventType: EventType.PAUSED, payload: { account: caller.toLowerCase() } });
    });
  }

  unpause(caller: Principal): void {
    this.executor.run(() => {
      this.permissions.requirePermission(caller, Role.PAUSER);
      if (!this.state.paused) {
        throw ApiError.notPaused();
      }

      this.executor.trackProperty(this.state, 'paused');
      this.state.paused = false;
      this.events.emit({ eventType: EventType.UNPAUSED, payload: { account: caller.toLowerCase() } });
    });
  }

  /**
   * The single balance transition. `from` equal to the zero address mints.
   */
  private update(from: Principal, to: Principal, amount: bigint): void {
    if (this.state.paused) {
      throw ApiError.paused();
    }

    if (from === ZERO_ADDRESS) {
      if (this.state.totalSupply + amount > this.cap) {
        throw ApiError.maxSupplyReached(
          `Minting ${amount} would exceed the max supply of ${this.cap}`
        );
      }
      this.executor.trackProperty(this.state, 'totalSupply');
      this.state.totalSupply += amount;
    } else {
      const balance = this.balanceOf(from);
      if (balance < amount) {
        throw ApiError.insufficientBalance(`Balance ${balance} is below ${amount}`);
      }
      this.setBalance(from, balance - amount);
    }

    this.setBalance(to, this.balanceOf(to) + amount);
    this.events.emit({ eventType: EventType.TRANSFER, payload: { from, to, amount } });
  }

  private spendAllowance(owner: Principal, spender: Principal, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw ApiError.insufficientAllowance(`Allowance ${current} is below ${amount}`);
    }
    this.setAllowance(allowanceKey(owner, spender), current - amount);
  }

  private setBalance(account: Principal, balance: bigint): void {
    this.executor.trackEntry(this.state.balances, account);
    this.state.balances.set(account, balance);
  }

  private setAllowance(key: string, allowance: bigint): void {
    this.executor.trackEntry(this.state.allowances, key);
    this.state.allowances.set(key, allowance);
  }

  private destination(value: Principal, field: string): Principal {
    const account = normalizeAddress(value, field);
    if (isZeroAddress(account)) {
      throw ApiError.zeroAddress(`${field} must not be the zero address`);
    }
    return account;
  }
}

export interface TokenDeploymentOptions {
  name: string;
  symbol: string;
  maxSupply: bigint;
  initialMint: bigint;
  initialMinter: Principal;
  admin: Principal;
  adminDelay: number;
  executor: AtomicExecutor;
  events: EventLog;
  clock?: Clock;
}

export interface TokenDeployment {
  ledger: TokenLedger;
  permissions: PermissionStore;
}

/**
 * Create the permission store and ledger together, grant minter and pauser to
 * the initial minter and mint the initial balance to it, all in one frame.
 */
export const deployToken = (options: TokenDeploymentOptions): TokenDeployment =>
  options.executor.run(() => {
    const permissions = new PermissionStore({
      admin: options.admin,
      adminDelay: options.adminDelay,
      executor: options.executor,
      events: options.events,
      clock: options.clock,
    });

    const ledger = new TokenLedger({
      name: options.name,
      symbol: options.symbol,
      maxSupply: options.maxSupply,
      permissions,
      executor: options.executor,
      events: options.events,
    });

    const admin = permissions.admin();
    permissions.grant(admin, Role.MINTER, options.initialMinter);
    permissions.grant(admin, Role.PAUSER, options.initialMinter);

    if (options.initialMint > 0n) {
      ledger.mint(options.initialMinter, options.initialMinter, options.initialMint);
    }

    return { ledger, permissions };
  });
