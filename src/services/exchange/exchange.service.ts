/**
 * Exchange Service
 *
 * Converts settlement currency into tokens at buyPrice and back at sellPrice.
 * Purchases are served from the exchange's own token balance when it covers
 * the whole amount, otherwise minted. Every mutating entry point holds the
 * reentrancy guard for its whole duration.
 */

import { ApiError } from '../../middlewares/errorHandler';
import type { EventLog } from '../../events/eventLog';
import type { AtomicExecutor } from '../../state/atomic';
import { EventType, PurchaseSource } from '../../types/events';
import { Principal, isZeroAddress, normalizeAddress } from '../../utils/address';
import { SCALE, assertUint } from '../../utils/units';
import type { CurrencyService, Payment } from '../currency/currency.service';
import type { TokenLedger } from '../ledger/ledger.service';

interface OwnershipState {
  owner: Principal;
  pendingOwner: Principal | null;
}

export interface ExchangeOptions {
  address: Principal;
  ledger: TokenLedger;
  currency: CurrencyService;
  /** Currency per whole token, scaled by 10^18 */
  buyPrice: bigint;
  /** Currency per whole token, scaled by 10^18 */
  sellPrice: bigint;
  owner: Principal;
  executor: AtomicExecutor;
  events: EventLog;
}

export interface PurchaseResult {
  buyer: Principal;
  currencyPaid: bigint;
  tokens: bigint;
  source: PurchaseSource;
}

export interface SaleResult {
  seller: Principal;
  tokens: bigint;
  currencyPaid: bigint;
}

export interface BuyQuote {
  tokens: bigint;
  /** Part of the payment that buys nothing and stays with the exchange */
  remainder: bigint;
  source: PurchaseSource;
}

export interface SellQuote {
  currency: bigint;
  payable: boolean;
}

export interface ExchangeInfo {
  address: Principal;
  owner: Principal;
  pendingOwner: Principal | null;
  buyPrice: bigint;
  sellPrice: bigint;
  tokenReserve: bigint;
  currencyReserve: bigint;
}

export class Exchange {
  readonly address: Principal;
  private readonly ledger: TokenLedger;
  private readonly currency: CurrencyService;
  private readonly executor: AtomicExecutor;
  private readonly events: EventLog;
  private readonly buyPriceValue: bigint;
  private readonly sellPriceValue: bigint;
  private readonly ownership: OwnershipState;
  private entered = false;

  constructor(options: ExchangeOptions) {
    assertUint(options.buyPrice, 'buyPrice');
    assertUint(options.sellPrice, 'sellPrice');
    if (options.buyPrice === 0n || options.sellPrice === 0n) {
      throw ApiError.zeroAmount('Prices must be greater than zero');
    }

    const address = normalizeAddress(options.address, 'address');
    const owner = normalizeAddress(options.owner, 'owner');
    if (isZeroAddress(address) || isZeroAddress(owner)) {
      throw ApiError.zeroAddress('Exchange address and owner must not be the zero address');
    }

    this.address = address;
    this.ledger = options.ledger;
    this.currency = options.currency;
    this.executor = options.executor;
    this.events = options.events;
    this.buyPriceValue = options.buyPrice;
    this.sellPriceValue = options.sellPrice;
    this.ownership = { owner, pendingOwner: null };

    this.currency.registerReceiver(this.address, (payment) => this.onPayment(payment));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  buyPrice(): bigint {
    return this.buyPriceValue;
  }

  sellPrice(): bigint {
    return this.sellPriceValue;
  }

  owner(): Principal {
    return this.ownership.owner;
  }

  pendingOwner(): Principal | null {
    return this.ownership.pendingOwner;
  }

  tokenReserve(): bigint {
    return this.ledger.balanceOf(this.address);
  }

  currencyReserve(): bigint {
    return this.currency.balanceOf(this.address);
  }

  info(): ExchangeInfo {
    return {
      address: this.address,
      owner: this.ownership.owner,
      pendingOwner: this.ownership.pendingOwner,
      buyPrice: this.buyPriceValue,
      sellPrice: this.sellPriceValue,
      tokenReserve: this.tokenReserve(),
      currencyReserve: this.currencyReserve(),
    };
  }

  quoteBuy(currencyPaid: bigint): BuyQuote {
    assertUint(currencyPaid, 'value');
    const tokens = this.tokensFor(currencyPaid);
    return {
      tokens,
      remainder: currencyPaid % this.buyPriceValue,
      source: this.tokenReserve() >= tokens ? 'reserve' : 'mint',
    };
  }

  quoteSell(tokenAmount: bigint): SellQuote {
    assertUint(tokenAmount);
    const currency = this.currencyFor(tokenAmount);
    return { currency, payable: this.currencyReserve() >= currency };
  }

  // ===========================================================================
  // Trading
  // ===========================================================================

  /**
   * Pay `currencyPaid` and receive whole tokens. The part of the payment below
   * one token's price is kept by the exchange.
   */
  buy(caller: Principal, currencyPaid: bigint): PurchaseResult {
    return this.guarded(() => {
      const buyer = normalizeAddress(caller, 'buyer');
      this.requirePurchasable(currencyPaid);
      this.currency.collect(buyer, this.address, currencyPaid);
      return this.deliver(buyer, currencyPaid);
    });
  }

  /**
   * Send bare currency to the exchange. The payment itself triggers the purchase.
   */
  receive(caller: Principal, amount: bigint, data?: string): void {
    this.currency.pay(caller, this.address, amount, data);
  }

  sell(caller: Principal, tokenAmount: bigint): SaleResult {
    return this.guarded(() => {
      const seller = normalizeAddress(caller, 'seller');
      assertUint(tokenAmount);
      if (tokenAmount === 0n) {
        throw ApiError.zeroAmount('Token amount must be greater than zero');
      }

      const currencyOwed = this.currencyFor(tokenAmount);
      const available = this.currencyReserve();
      if (available < currencyOwed) {
        throw ApiError.insufficientReserve(`Exchange holds ${available} currency, ${currencyOwed} is owed`);
      }

      this.ledger.transferFrom(this.address, seller, this.address, tokenAmount);
      this.currency.pay(this.address, seller, currencyOwed);

      this.events.emit({
        eventType: EventType.TOKENS_SOLD,
        payload: { seller, tokens: tokenAmount, currencyPaid: currencyOwed },
      });
      return { seller, tokens: tokenAmount, currencyPaid: currencyOwed };
    });
  }

  // ===========================================================================
  // Treasury
  // ===========================================================================

  withdrawCurrency(caller: Principal): bigint {
    return this.guarded(() => {
      this.requireOwner(caller);

      const amount = this.currencyReserve();
      if (amount === 0n) {
        throw ApiError.insufficientReserve('No currency to withdraw');
      }

      const owner = this.ownership.owner;
      this.currency.pay(this.address, owner, amount);
      this.events.emit({ eventType: EventType.CURRENCY_WITHDRAWN, payload: { owner, amount } });
      return amount;
    });
  }

  withdrawTokens(caller: Principal, amount: bigint): bigint {
    return this.guarded(() => {
      this.requireOwner(caller);
      assertUint(amount);
      if (amount === 0n) {
        throw ApiError.zeroAmount('Withdrawal amount must be greater than zero');
      }

      const reserve = this.tokenReserve();
      if (reserve < amount) {
        throw ApiError.insufficientReserve(`Exchange holds ${reserve} tokens, ${amount} requested`);
      }

      const owner = this.ownership.owner;
      this.ledger.transfer(this.address, owner, amount);
      this.events.emit({ eventType: EventType.TOKENS_WITHDRAWN, payload: { owner, amount } });
      return amount;
    });
  }

  // ===========================================================================
  // Ownership
  // ===========================================================================

  /**
   * Start a two-step handover. Proposing the zero address clears the pending owner.
   */
  transferOwnership(caller: Principal, candidate: Principal): Principal | null {
    return this.executor.run(() => {
      this.requireOwner(caller);

      const account = normalizeAddress(candidate, 'newOwner');
      this.executor.trackProperty(this.ownership, 'pendingOwner');
      this.ownership.pendingOwner = isZeroAddress(account) ? null : account;

      this.events.emit({
        eventType: EventType.OWNERSHIP_TRANSFER_STARTED,
        payload: { previousOwner: this.ownership.owner, newOwner: account },
      });
      return this.ownership.pendingOwner;
    });
  }

  acceptOwnership(caller: Principal): Principal {
    return this.executor.run(() => {
      const account = caller.toLowerCase();
      if (this.ownership.pendingOwner === null || this.ownership.pendingOwner !== account) {
        throw ApiError.unauthorized(`${account} is not the pending owner`);
      }

      const previousOwner = this.ownership.owner;
      this.executor.trackProperty(this.ownership, 'owner');
      this.executor.trackProperty(this.ownership, 'pendingOwner');
      this.ownership.owner = account;
      this.ownership.pendingOwner = null;

      this.events.emit({
        eventType: EventType.OWNERSHIP_TRANSFERRED,
        payload: { previousOwner, newOwner: account },
      });
      return account;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Receiver for currency paid to the exchange address.
   */
  private onPayment(payment: Payment): void {
    this.guarded(() => {
      if (payment.data !== undefined && payment.data !== '' && payment.data !== '0x') {
        throw ApiError.unsupportedCall();
      }
      this.requirePurchasable(payment.amount);
      this.deliver(payment.from, payment.amount);
    });
  }

  private guarded<T>(operation: () => T): T {
    if (this.entered) {
      throw ApiError.reentrantCall();
    }

    this.entered = true;
    try {
      return this.executor.run(operation);
    } finally {
      this.entered = false;
    }
  }

  private requirePurchasable(currencyPaid: bigint): void {
    assertUint(currencyPaid, 'value');
    if (currencyPaid === 0n) {
      throw ApiError.zeroAmount('Payment must be greater than zero');
    }
    if (this.tokensFor(currencyPaid) === 0n) {
      throw ApiError.zeroAmount('Payment does not cover one whole token');
    }
  }

  /**
   * Hand `tokens` to the buyer once the currency is already held by the exchange.
   */
  private deliver(buyer: Principal, currencyPaid: bigint): PurchaseResult {
    const tokens = this.tokensFor(currencyPaid);

    let source: PurchaseSource;
    if (this.tokenReserve() >= tokens) {
      this.ledger.transfer(this.address, buyer, tokens);
      source = 'reserve';
    } else {
      this.ledger.mint(this.address, buyer, tokens);
      source = 'mint';
    }

    this.events.emit({
      eventType: EventType.TOKENS_PURCHASED,
      payload: { buyer, currencyPaid, tokens, source },
    });
    return { buyer, currencyPaid, tokens, source };
  }

  private requireOwner(caller: Principal): void {
    if (caller.toLowerCase() !== this.ownership.owner) {
      throw ApiError.unauthorized(`${caller.toLowerCase()} is not the exchange owner`);
    }
  }

  private tokensFor(currencyPaid: bigint): bigint {
    return (currencyPaid / this.buyPriceValue) * SCALE;
  }

  private currencyFor(tokenAmount: bigint): bigint {
    return (tokenAmount * this.sellPriceValue) / SCALE;
  }
}

