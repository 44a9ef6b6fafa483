/**
 * Unit tests for settlement-currency payments
 */

import { AtomicExecutor } from '../../../src/state/atomic';
import { EventLog } from '../../../src/events/eventLog';
import { CurrencyService, Payment } from '../../../src/services/currency/currency.service';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import { ZERO_ADDRESS } from '../../../src/utils/address';
import { ALICE, BOB, CAROL, ManualClock, rejectionCode, units } from '../../helpers';

describe('CurrencyService', () => {
  let currency: CurrencyService;

  beforeEach(() => {
    const events = new EventLog(new ManualClock());
    currency = new CurrencyService(new AtomicExecutor(events));
    currency.fund(ALICE, units(10));
  });

  it('should fund accounts and report balances', () => {
    expect(currency.fund(ALICE, units(5))).toBe(units(15));
    expect(currency.balanceOf(ALICE)).toBe(units(15));
    expect(currency.balanceOf(BOB)).toBe(0n);
  });

  it('should reject zero and zero-address funding', () => {
    expect(rejectionCode(() => currency.fund(ALICE, 0n))).toBe(ErrorCode.ZERO_AMOUNT);
    expect(rejectionCode(() => currency.fund(ZERO_ADDRESS, units(1)))).toBe(ErrorCode.ZERO_ADDRESS);
  });

  it('should move currency on collect without notifying the destination', () => {
    const receiver = jest.fn();
    currency.registerReceiver(BOB, receiver);

    currency.collect(ALICE, BOB, units(4));

    expect(currency.balanceOf(ALICE)).toBe(units(6));
    expect(currency.balanceOf(BOB)).toBe(units(4));
    expect(receiver).not.toHaveBeenCalled();
  });

  it('should hand the payment to the destination receiver on pay', () => {
    const payments: Payment[] = [];
    currency.registerReceiver(BOB, (payment) => {
      payments.push(payment);
    });

    currency.pay(ALICE, BOB, units(3), '0xfeed');

    expect(payments).toEqual([{ from: ALICE, to: BOB, amount: units(3), data: '0xfeed' }]);
    expect(currency.balanceOf(BOB)).toBe(units(3));
  });

  it('should revert the payment when the receiver throws', () => {
    currency.registerReceiver(BOB, () => {
      throw ApiError.unsupportedCall();
    });

    expect(rejectionCode(() => currency.pay(ALICE, BOB, units(3)))).toBe(ErrorCode.UNSUPPORTED_CALL);

    expect(currency.balanceOf(ALICE)).toBe(units(10));
    expect(currency.balanceOf(BOB)).toBe(0n);
  });

  it('should stop notifying after the receiver is removed', () => {
    const receiver = jest.fn();
    const remove = currency.registerReceiver(CAROL, receiver);
    remove();

    currency.pay(ALICE, CAROL, units(1));

    expect(receiver).not.toHaveBeenCalled();
  });

  it('should reject short balances and the zero address', () => {
    expect(rejectionCode(() => currency.pay(BOB, ALICE, 1n))).toBe(ErrorCode.INSUFFICIENT_BALANCE);
    expect(rejectionCode(() => currency.pay(ALICE, ZERO_ADDRESS, 1n))).toBe(ErrorCode.ZERO_ADDRESS);
  });
});
