/**
 * Currency Service
 *
 * Native settlement-currency balances. A payment hands control to the
 * receiver registered for the destination before the frame returns.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import type { AtomicExecutor } from '../../state/atomic';
import { Principal, isZeroAddress, normalizeAddress } from '../../utils/address';
import { assertUint } from '../../utils/units';

export interface Payment {
  from: Principal;
  to: Principal;
  amount: bigint;
  /** Call data attached to the payment, hex or free text */
  data?: string;
}

export type PaymentReceiver = (payment: Payment) => void;

export class CurrencyService {
  private readonly balances = new Map<Principal, bigint>();
  private readonly receivers = new Map<Principal, PaymentReceiver>();
  private readonly log = createServiceLogger('currency');

  constructor(private readonly executor: AtomicExecutor) {}

  balanceOf(principal: Principal): bigint {
    return this.balances.get(principal.toLowerCase()) ?? 0n;
  }

  /**
   * Credit an account out of thin air: genesis allocation and faucet only.
   */
  fund(principal: Principal, amount: bigint): bigint {
    return this.executor.run(() => {
      const account = this.destination(principal);
      assertUint(amount);
      if (amount === 0n) {
        throw ApiError.zeroAmount('Funding amount must be greater than zero');
      }

      const balance = this.balanceOf(account) + amount;
      this.setBalance(account, balance);
      this.log.debug({ account, amount: amount.toString() }, 'Currency funded');
      return balance;
    });
  }

  /**
   * Move currency without notifying the destination: value attached to a
   * call the destination itself is executing.
   */
  collect(from: Principal, to: Principal, amount: bigint): void {
    this.executor.run(() => {
      this.move(normalizeAddress(from, 'from'), this.destination(to), amount);
    });
  }

  /**
   * Move currency, then run the destination's receiver if it has one.
   * A receiver failure reverts the payment.
   */
  pay(from: Principal, to: Principal, amount: bigint, data?: string): void {
    this.executor.run(() => {
      const sender = normalizeAddress(from, 'from');
      const recipient = this.destination(to);
      this.move(sender, recipient, amount);

      const receiver = this.receivers.get(recipient);
      if (receiver) {
        receiver({ from: sender, to: recipient, amount, data });
      }
    });
  }

  /**
   * Returns a function that removes the receiver.
   */
  registerReceiver(principal: Principal, receiver: PaymentReceiver): () => void {
    const account = normalizeAddress(principal);
    this.receivers.set(account, receiver);
    return () => {
      if (this.receivers.get(account) === receiver) {
        this.receivers.delete(account);
      }
    };
  }

  private move(from: Principal, to: Principal, amount: bigint): void {
    assertUint(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw ApiError.insufficientBalance(`Currency balance ${balance} is below ${amount}`);
    }

    this.setBalance(from, balance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  private setBalance(account: Principal, balance: bigint): void {
    this.executor.trackEntry(this.balances, account);
    this.balances.set(account, balance);
  }

  private destination(value: Principal): Principal {
    const account = normalizeAddress(value, 'to');
    if (isZeroAddress(account)) {
      throw ApiError.zeroAddress('Currency cannot be sent to the zero address');
    }
    return account;
  }
}
