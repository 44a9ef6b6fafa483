/**
 * Ledger and exchange wired together: supply invariants, conservation,
 * round-trip loss, pause policy and the full purchase/sale lifecycle.
 */

import { Role } from '../../src/services/permission/permission.service';
import { EventType } from '../../src/types/events';
import { ErrorCode } from '../../src/types/errors';
import { SCALE } from '../../src/utils/units';
import {
  ADMIN,
  ALICE,
  ALL_ACCOUNTS,
  BOB,
  CAROL,
  EXCHANGE,
  MINTER,
  OWNER,
  TestSystem,
  createTestSystem,
  observableState,
  rejectionCode,
  units,
} from '../helpers';

const BUY_PRICE = units('0.001');
const SELL_PRICE = units('0.0005');

const sumOfBalances = (system: TestSystem): bigint =>
  ALL_ACCOUNTS.reduce((sum, account) => sum + system.ledger.balanceOf(account), 0n);

const expectSupplyInvariants = (system: TestSystem): void => {
  expect(system.ledger.totalSupply() <= system.ledger.maxSupply()).toBe(true);
  expect(sumOfBalances(system)).toBe(system.ledger.totalSupply());
};

describe('Exchange properties', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem();
  });

  it('should hold the supply invariants across a mixed sequence, failures included', () => {
    const steps: Array<() => unknown> = [
      () => system.ledger.mint(MINTER, ALICE, units(1_000)),
      () => system.exchange.buy(BOB, units(2)),
      () => system.ledger.approve(BOB, EXCHANGE, units(700)),
      () => system.exchange.sell(BOB, units(700)),
      () => system.exchange.buy(ALICE, BUY_PRICE * 300n),
      () => system.exchange.buy(ALICE, units(1_000)),
      () => system.ledger.mint(MINTER, CAROL, units(2_000_000)),
      () => system.exchange.withdrawTokens(OWNER, units(400)),
      () => system.ledger.transfer(ALICE, CAROL, units(50)),
      () => system.exchange.sell(CAROL, units(50)),
    ];

    for (const step of steps) {
      try {
        step();
      } catch {
        // rejected steps must leave the invariants intact too
      }
      expectSupplyInvariants(system);
    }
  });

  it('should conserve tokens on transfers, reserve purchases and sales', () => {
    system.ledger.transfer(MINTER, EXCHANGE, units(500));
    const total = sumOfBalances(system);

    system.ledger.transfer(MINTER, ALICE, units(10));
    system.exchange.buy(BOB, BUY_PRICE * 200n);
    system.ledger.approve(BOB, EXCHANGE, units(100));
    system.exchange.sell(BOB, units(100));

    expect(sumOfBalances(system)).toBe(total);
    expect(system.ledger.totalSupply()).toBe(total);
  });

  it('should lose exactly the spread plus the truncation remainder on a round trip', () => {
    const remainder = 700_000_000_000_000n;
    const paid = units(1) + remainder;
    const startingCurrency = system.currency.balanceOf(ALICE);

    const { tokens } = system.exchange.buy(ALICE, paid);
    system.ledger.approve(ALICE, EXCHANGE, tokens);
    const { currencyPaid } = system.exchange.sell(ALICE, tokens);

    const loss = paid - currencyPaid;
    expect(tokens).toBe(units(1_000));
    expect(currencyPaid < paid).toBe(true);
    expect(loss).toBe((tokens * (BUY_PRICE - SELL_PRICE)) / SCALE + remainder);
    expect(system.currency.balanceOf(ALICE)).toBe(startingCurrency - loss);
    expect(system.exchange.currencyReserve()).toBe(loss);
  });

  it('should block minting while paused, exchange purchases included', () => {
    system.ledger.pause(MINTER);
    const before = observableState(system, ALL_ACCOUNTS);

    expect(rejectionCode(() => system.ledger.mint(MINTER, ALICE, units(1)))).toBe(ErrorCode.PAUSED);
    expect(rejectionCode(() => system.exchange.buy(BOB, units(1)))).toBe(ErrorCode.PAUSED);

    expect(observableState(system, ALL_ACCOUNTS)).toEqual(before);
  });

  it('should leave every value unchanged when unauthorized callers try each restricted operation', () => {
    system.exchange.buy(BOB, units(1));
    system.ledger.transfer(MINTER, EXCHANGE, units(10));
    const before = observableState(system, ALL_ACCOUNTS);

    const attempts: Array<() => unknown> = [
      () => system.ledger.mint(CAROL, CAROL, units(1)),
      () => system.ledger.pause(CAROL),
      () => system.ledger.unpause(CAROL),
      () => system.permissions.grant(CAROL, Role.MINTER, CAROL),
      () => system.permissions.revoke(CAROL, Role.MINTER, MINTER),
      () => system.permissions.proposeAdmin(CAROL, CAROL),
      () => system.permissions.acceptAdmin(CAROL),
      () => system.permissions.cancelAdmin(CAROL),
      () => system.exchange.withdrawCurrency(CAROL),
      () => system.exchange.withdrawTokens(CAROL, units(1)),
      () => system.exchange.transferOwnership(CAROL, CAROL),
      () => system.exchange.acceptOwnership(CAROL),
    ];

    for (const attempt of attempts) {
      expect(rejectionCode(attempt)).toBe(ErrorCode.UNAUTHORIZED);
    }
    expect(observableState(system, ALL_ACCOUNTS)).toEqual(before);
  });

  it('should run the deployment-to-reserve lifecycle', () => {
    // minter mints 1,000 to A
    system.ledger.mint(MINTER, ALICE, units(1_000));
    expect(system.ledger.totalSupply()).toBe(units(11_000));

    // B buys 1,000 tokens with an empty reserve: minted
    const purchase = system.exchange.buy(BOB, BUY_PRICE * 1_000n);
    expect(purchase.source).toBe('mint');
    expect(system.ledger.balanceOf(BOB)).toBe(units(1_000));
    expect(system.ledger.totalSupply()).toBe(units(12_000));

    // B sells 500 back after approving them
    system.ledger.approve(BOB, EXCHANGE, units(500));
    const sale = system.exchange.sell(BOB, units(500));
    expect(sale.currencyPaid).toBe((units(500) * SELL_PRICE) / SCALE);
    expect(system.exchange.tokenReserve()).toBe(units(500));
    expect(system.ledger.totalSupply()).toBe(units(12_000));

    // 500 tokens' worth is served from the reserve
    const second = system.exchange.buy(ALICE, BUY_PRICE * 500n);
    expect(second.source).toBe('reserve');
    expect(system.ledger.totalSupply()).toBe(units(12_000));
    expect(system.exchange.tokenReserve()).toBe(0n);

    expect(system.exchange.currencyReserve()).toBe(units('1.25'));
    expect(
      system.events
        .list({ eventType: EventType.TOKENS_PURCHASED })
        .map((record) => (record.eventType === EventType.TOKENS_PURCHASED ? record.payload.source : null))
    ).toEqual(['mint', 'reserve']);
    expectSupplyInvariants(system);
  });

  it('should keep trading after the admin hands over and revokes the exchange minter role', () => {
    system.permissions.proposeAdmin(ADMIN, CAROL);
    system.permissions.acceptAdmin(CAROL);
    system.permissions.revoke(CAROL, Role.MINTER, EXCHANGE);

    expect(rejectionCode(() => system.exchange.buy(BOB, units(1)))).toBe(ErrorCode.UNAUTHORIZED);

    system.ledger.transfer(MINTER, EXCHANGE, units(1_000));
    expect(system.exchange.buy(BOB, units(1)).source).toBe('reserve');
  });
});
