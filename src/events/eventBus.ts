import Redis from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability/logger';
import { RecordedEvent } from '../types/events';
import { toJson } from '../utils/json';

const log = createServiceLogger('event-bus');

/**
 * Redis publisher for committed notifications. Each record goes to a channel
 * named after its event type, under the configured prefix.
 */
export class EventBus {
  private publisher: Redis | null = null;
  private isConnected = false;

  constructor(private readonly channelPrefix: string = config.eventRelay.channelPrefix) {}

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const publisher = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.publisher = publisher;

    try {
      await new Promise<void>((resolve, reject) => {
        publisher.on('connect', () => resolve());
        publisher.on('error', (err: Error) => reject(err));
      });
    } catch (error) {
      publisher.disconnect();
      this.publisher = null;
      throw error;
    }

    this.isConnected = true;
    log.info({ host: config.redis.host, port: config.redis.port }, 'Event bus connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  channelFor(record: RecordedEvent): string {
    return `${this.channelPrefix}${record.eventType}`;
  }

  async publish(record: RecordedEvent): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    await this.publisher.publish(this.channelFor(record), toJson(record));
    log.debug(
      { sequence: record.sequence, transactionId: record.transactionId },
      `Event published: ${record.eventType}`
    );
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export const eventBus = new EventBus();
