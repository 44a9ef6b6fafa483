import { createServiceLogger } from '../observability/logger';
import type { RecordedEvent } from '../types/events';
import type { EventBus } from './eventBus';
import type { EventLog } from './eventLog';

const log = createServiceLogger('event-relay');

/**
 * Forward every committed record to the bus. Returns a function that stops
 * the relay.
 */
export const startEventRelay = (events: EventLog, bus: EventBus): (() => void) => {
  const unsubscribe = events.subscribe(async (record: RecordedEvent) => {
    try {
      await bus.publish(record);
    } catch (error) {
      log.error({ err: error, sequence: record.sequence }, `Failed to relay ${record.eventType}`);
    }
  });

  log.info('Event relay started');
  return unsubscribe;
};
