/**
 * Unit tests for commit-or-revert frames
 */

import { EventLog } from '../../../src/events/eventLog';
import { AtomicExecutor } from '../../../src/state/atomic';
import { EventType, ReserveMintEvent } from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ALICE, BOB, ManualClock, rejectionCode } from '../../helpers';

class Counter {
  value = 0;

  constructor(private readonly executor: AtomicExecutor) {}

  set(value: number): void {
    this.executor.trackProperty(this, 'value');
    this.value = value;
  }
}

const transferEvent = (amount: bigint): ReserveMintEvent => ({
  eventType: EventType.TRANSFER,
  payload: { from: ALICE, to: BOB, amount },
});

describe('AtomicExecutor', () => {
  let events: EventLog;
  let executor: AtomicExecutor;
  let counter: Counter;

  beforeEach(() => {
    events = new EventLog(new ManualClock());
    executor = new AtomicExecutor(events);
    counter = new Counter(executor);
  });

  it('should keep the effects of a successful frame and return its result', () => {
    const result = executor.run(() => {
      counter.set(5);
      return 'done';
    });

    expect(result).toBe('done');
    expect(counter.value).toBe(5);
  });

  it('should restore every participant when the frame throws', () => {
    counter.set(1);

    expect(rejectionCode(() =>
      executor.run(() => {
        counter.set(99);
        events.emit(transferEvent(1n));
        throw ApiError.insufficientBalance();
      })
    )).toBe(ErrorCode.INSUFFICIENT_BALANCE);

    expect(counter.value).toBe(1);
    expect(events.list()).toEqual([]);
  });

  it('should unwind only the inner frame when the outer frame catches its failure', () => {
    executor.run(() => {
      counter.set(10);
      events.emit(transferEvent(10n));

      try {
        executor.run(() => {
          counter.set(20);
          events.emit(transferEvent(20n));
          throw ApiError.paused();
        });
      } catch {
        // the outer frame carries on
      }

      counter.set(counter.value + 1);
    });

    expect(counter.value).toBe(11);
    const committed = events.list();
    expect(committed).toHaveLength(1);
    expect(committed[0].payload).toEqual({ from: ALICE, to: BOB, amount: 10n });
  });

  it('should commit events only when the outermost frame returns', () => {
    const seen: number[] = [];
    events.subscribe((record) => {
      seen.push(record.sequence);
    });

    executor.run(() => {
      executor.run(() => events.emit(transferEvent(1n)));
      expect(seen).toEqual([]);
      events.emit(transferEvent(2n));
    });

    expect(seen).toEqual([1, 2]);
  });

  it('should tag every event of one outer call with the same transaction id', () => {
    executor.run(() => {
      events.emit(transferEvent(1n));
      executor.run(() => events.emit(transferEvent(2n)));
    });
    executor.run(() => events.emit(transferEvent(3n)));

    const [first, second, third] = events.list();
    expect(first.transactionId).toBe(second.transactionId);
    expect(third.transactionId).not.toBe(first.transactionId);
  });

  it('should expose the frame state while running', () => {
    expect(executor.inFrame()).toBe(false);
    expect(executor.currentTransactionId()).toBeNull();

    executor.run(() => {
      expect(executor.inFrame()).toBe(true);
      expect(executor.currentTransactionId()).toEqual(expect.any(String));
    });

    expect(executor.inFrame()).toBe(false);
    expect(executor.currentTransactionId()).toBeNull();
  });

  it('should reject asynchronous operations and revert their synchronous part', () => {
    expect(rejectionCode(() =>
      executor.run(() => {
        counter.set(7);
        return Promise.resolve();
      })
    )).toBe(ErrorCode.INTERNAL_ERROR);

    expect(counter.value).toBe(0);
  });

  it('should restore map entries and set members touched by a failed frame', () => {
    const balances = new Map<string, bigint>([[ALICE, 5n]]);
    const members = new Set<string>([ALICE]);

    expect(rejectionCode(() =>
      executor.run(() => {
        executor.trackEntry(balances, ALICE);
        balances.set(ALICE, 1n);
        executor.trackEntry(balances, BOB);
        balances.set(BOB, 4n);
        executor.trackMember(members, ALICE);
        members.delete(ALICE);
        executor.trackMember(members, BOB);
        members.add(BOB);
        throw ApiError.insufficientBalance();
      })
    )).toBe(ErrorCode.INSUFFICIENT_BALANCE);

    expect([...balances]).toEqual([[ALICE, 5n]]);
    expect([...members]).toEqual([ALICE]);
  });

  it('should replay undo steps newest first when a key is written twice', () => {
    const balances = new Map<string, bigint>([[ALICE, 5n]]);

    expect(rejectionCode(() =>
      executor.run(() => {
        executor.trackEntry(balances, ALICE);
        balances.set(ALICE, 3n);
        executor.trackEntry(balances, ALICE);
        balances.set(ALICE, 1n);
        throw ApiError.paused();
      })
    )).toBe(ErrorCode.PAUSED);

    expect(balances.get(ALICE)).toBe(5n);
  });

  it('should clear the journal once the outermost frame settles', () => {
    executor.run(() => {
      counter.set(1);
      executor.run(() => counter.set(2));
      expect(executor.journalSize()).toBe(2);
    });
    expect(executor.journalSize()).toBe(0);

    expect(rejectionCode(() =>
      executor.run(() => {
        counter.set(3);
        throw ApiError.paused();
      })
    )).toBe(ErrorCode.PAUSED);
    expect(executor.journalSize()).toBe(0);
    expect(counter.value).toBe(2);
  });

  it('should not journal writes made outside a frame', () => {
    counter.set(4);
    expect(executor.journalSize()).toBe(0);
    expect(counter.value).toBe(4);
  });
});
