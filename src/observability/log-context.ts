import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields merged into every log line.
 * `transactionId` is present only while an atomic frame is running.
 */
export interface LogContext {
  correlationId?: string;
  principal?: string;
  transactionId?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => asyncLocalStorage.getStore()?.correlationId;

/**
 * Current context, or an empty one outside any request or frame
 */
export const getLogContext = (): LogContext => asyncLocalStorage.getStore() ?? {};

/**
 * Set fields on the current request's context. Without one this does nothing.
 */
export const addLogContext = (context: LogContext): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

/**
 * Run `fn` with `context` layered over whatever context is already active.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T =>
  asyncLocalStorage.run({ ...getLogContext(), ...context }, fn);
