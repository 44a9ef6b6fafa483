import { createServiceLogger } from '../observability/logger';
import { EventHandler, EventType, RecordedEvent, ReserveMintEvent } from '../types/events';
import { Clock, systemClock } from '../utils/clock';

interface PendingEvent {
  event: ReserveMintEvent;
  timestamp: Date;
}

export interface EventQuery {
  /** Return records with a sequence strictly greater than this */
  after?: number;
  limit?: number;
  eventType?: EventType;
}

const DEFAULT_PAGE_SIZE = 100;

/**
 * Append-only notification log.
 *
 * Events emitted inside a frame stay pending until the outermost frame
 * commits; a reverted frame drops them. Committed records get a sequence
 * number and are handed to subscribers in order.
 */
export class EventLog {
  private readonly committed: RecordedEvent[] = [];
  private readonly pending: PendingEvent[] = [];
  private readonly handlers = new Set<EventHandler>();
  private readonly log = createServiceLogger('event-log');

  constructor(private readonly clock: Clock = systemClock) {}

  emit(event: ReserveMintEvent): void {
    this.pending.push({ event, timestamp: new Date(this.clock.now()) });
  }

  snapshot(): number {
    return this.pending.length;
  }

  restore(pendingCount: number): void {
    this.pending.length = pendingCount;
  }

  commit(transactionId: string): RecordedEvent[] {
    const records = this.pending.splice(0).map(({ event, timestamp }): RecordedEvent => {
      const record: RecordedEvent = {
        ...event,
        sequence: this.committed.length + 1,
        transactionId,
        timestamp,
      };
      this.committed.push(record);
      return record;
    });

    for (const record of records) {
      this.dispatch(record);
    }

    return records;
  }

  list(query: EventQuery = {}): RecordedEvent[] {
    const after = query.after ?? 0;
    const limit = query.limit ?? DEFAULT_PAGE_SIZE;

    return this.committed
      .slice(after)
      .filter((record) => !query.eventType || record.eventType === query.eventType)
      .slice(0, limit);
  }

  latestSequence(): number {
    return this.committed.length;
  }

  /**
   * Register a handler for committed records. Returns an unsubscribe function.
   */
  subscribe(handler: EventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private dispatch(record: RecordedEvent): void {
    for (const handler of this.handlers) {
      try {
        const outcome = handler(record);
        if (outcome instanceof Promise) {
          outcome.catch((error: unknown) => {
            this.log.error({ err: error, sequence: record.sequence }, `Error handling event ${record.eventType}`);
          });
        }
      } catch (error) {
        this.log.error({ err: error, sequence: record.sequence }, `Error handling event ${record.eventType}`);
      }
    }
  }
}
