/**
 * Reentrancy through payment receivers
 *
 * A seller's receiver runs while the exchange is paying it. Every attempt to
 * re-enter a mutating exchange entry point from there must be refused.
 */

import { Payment } from '../../src/services/currency/currency.service';
import { isApiError } from '../../src/middlewares/errorHandler';
import { ErrorCode } from '../../src/types/errors';
import {
  ALL_ACCOUNTS,
  CAROL,
  EXCHANGE,
  OWNER,
  TestSystem,
  createTestSystem,
  observableState,
  rejectionCode,
  units,
} from '../helpers';

describe('Exchange reentrancy guard', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem();
    system.currency.fund(CAROL, units(10));
    system.exchange.buy(CAROL, units(1));
    system.ledger.approve(CAROL, EXCHANGE, units(1_000));
  });

  it('should revert a sale whose payment re-enters sell', () => {
    system.currency.registerReceiver(CAROL, () => {
      system.exchange.sell(CAROL, units(100));
    });
    const before = observableState(system, ALL_ACCOUNTS);

    expect(rejectionCode(() => system.exchange.sell(CAROL, units(100)))).toBe(ErrorCode.REENTRANT_CALL);

    expect(observableState(system, ALL_ACCOUNTS)).toEqual(before);
    expect(system.ledger.balanceOf(CAROL)).toBe(units(1_000));
  });

  it('should refuse every mutating entry point while a sale is paying out', () => {
    const codes: ErrorCode[] = [];
    const attempt = (fn: () => unknown): void => {
      try {
        fn();
      } catch (error) {
        if (isApiError(error)) {
          codes.push(error.errorCode);
          return;
        }
        throw error;
      }
    };

    system.currency.registerReceiver(CAROL, (payment: Payment) => {
      attempt(() => system.exchange.sell(CAROL, units(1)));
      attempt(() => system.exchange.buy(CAROL, units('0.001')));
      attempt(() => system.exchange.receive(CAROL, units('0.001')));
      attempt(() => system.currency.pay(CAROL, EXCHANGE, payment.amount));
      attempt(() => system.exchange.withdrawTokens(OWNER, 1n));
      attempt(() => system.exchange.withdrawCurrency(OWNER));
    });

    const sale = system.exchange.sell(CAROL, units(100));

    expect(codes).toEqual(Array(6).fill(ErrorCode.REENTRANT_CALL));
    expect(sale.currencyPaid).toBe(units('0.05'));
    expect(system.ledger.balanceOf(CAROL)).toBe(units(900));
    expect(system.currency.balanceOf(CAROL)).toBe(units('9.05'));
    expect(system.exchange.currencyReserve()).toBe(units('0.95'));
  });

  it('should release the guard after a failed call', () => {
    expect(rejectionCode(() => system.exchange.sell(CAROL, units(5_000)))).toBe(ErrorCode.INSUFFICIENT_RESERVE);

    const sale = system.exchange.sell(CAROL, units(10));
    expect(sale.tokens).toBe(units(10));
  });

  it('should refuse an owner receiver re-entering a currency withdrawal', () => {
    system.currency.registerReceiver(OWNER, () => {
      system.exchange.withdrawCurrency(OWNER);
    });

    expect(rejectionCode(() => system.exchange.withdrawCurrency(OWNER))).toBe(ErrorCode.REENTRANT_CALL);
    expect(system.exchange.currencyReserve()).toBe(units(1));
    expect(system.currency.balanceOf(OWNER)).toBe(0n);
  });
});
