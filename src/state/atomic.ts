import { v4 as uuid } from 'uuid';

import { ApiError } from '../middlewares/errorHandler';
import type { EventLog } from '../events/eventLog';
import { runWithContext } from '../observability/log-context';

/**
 * Puts back one piece of state a frame changed.
 */
export type Undo = () => void;

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function';

/**
 * Runs every state-mutating operation as a commit-or-revert frame.
 *
 * Components record an undo step just before each write (`trackEntry`,
 * `trackMember`, `trackProperty`). A frame that throws replays the steps
 * recorded since it opened, newest first, so a failure unwinds every effect
 * of the frame, nested calls included, at a cost proportional to what the
 * frame touched. Frames nest: an inner failure that the outer operation
 * catches unwinds only the inner frame. Notifications are released to
 * subscribers once the outermost frame returns.
 */
export class AtomicExecutor {
  private readonly journal: Undo[] = [];
  private depth = 0;
  private transactionId: string | null = null;

  constructor(private readonly events: EventLog) {}

  inFrame(): boolean {
    return this.depth > 0;
  }

  currentTransactionId(): string | null {
    return this.transactionId;
  }

  /**
   * Writes outside a frame are not journaled.
   */
  record(undo: Undo): void {
    if (this.depth > 0) {
      this.journal.push(undo);
    }
  }

  trackEntry<K, V>(map: Map<K, V>, key: K): void {
    const prior = map.get(key);
    const existed = map.has(key);
    this.record(() => {
      if (existed && prior !== undefined) {
        map.set(key, prior);
      } else {
        map.delete(key);
      }
    });
  }

  trackMember<T>(set: Set<T>, value: T): void {
    const existed = set.has(value);
    this.record(() => {
      if (existed) {
        set.add(value);
      } else {
        set.delete(value);
      }
    });
  }

  trackProperty<T extends object, K extends keyof T>(target: T, key: K): void {
    const prior = target[key];
    this.record(() => {
      target[key] = prior;
    });
  }

  journalSize(): number {
    return this.journal.length;
  }

  /**
   * Operations must be synchronous: a frame cannot stay open across an await.
   */
  run<T>(operation: () => T): T {
    if (this.depth > 0) {
      return this.enter(operation, false);
    }

    const transactionId = uuid();
    this.transactionId = transactionId;

    return runWithContext({ transactionId }, () => {
      const result = this.enter(operation, true);
      this.events.commit(transactionId);
      return result;
    });
  }

  private enter<T>(operation: () => T, outermost: boolean): T {
    const journalMark = this.journal.length;
    const pendingMark = this.events.snapshot();

    this.depth += 1;
    try {
      const result = operation();
      if (isPromiseLike(result)) {
        throw ApiError.internal('Atomic operations must be synchronous');
      }
      return result;
    } catch (error) {
      this.rollback(journalMark);
      this.events.restore(pendingMark);
      throw error;
    } finally {
      this.depth -= 1;
      if (outermost) {
        this.journal.length = 0;
        this.transactionId = null;
      }
    }
  }

  private rollback(mark: number): void {
    while (this.journal.length > mark) {
      const undo = this.journal.pop();
      undo?.();
    }
  }
}
