import {
  exchangeCurrencyReserve,
  exchangePurchasesTotal,
  exchangeSalesTotal,
  exchangeTokenReserve,
  exchangeWithdrawalsTotal,
  ledgerEventsTotal,
  tokenPaused,
  tokenTotalSupply,
} from '../observability';
import type { ReserveMintSystem } from '../system';
import { EventType, RecordedEvent } from '../types/events';
import { formatUnits } from '../utils/units';

const wholeUnits = (value: bigint): number => Number(formatUnits(value));

/**
 * Keep the domain metrics in step with committed notifications.
 * Returns a function that detaches the handler.
 */
export const registerMetricsHandlers = (system: ReserveMintSystem): (() => void) => {
  const { ledger, exchange } = system;

  const refreshGauges = (): void => {
    tokenTotalSupply.set(wholeUnits(ledger.totalSupply()));
    tokenPaused.set(ledger.paused() ? 1 : 0);
    exchangeTokenReserve.set(wholeUnits(exchange.tokenReserve()));
    exchangeCurrencyReserve.set(wholeUnits(exchange.currencyReserve()));
  };

  refreshGauges();

  return system.events.subscribe((record: RecordedEvent) => {
    ledgerEventsTotal.inc({ event_type: record.eventType });

    switch (record.eventType) {
      case EventType.TOKENS_PURCHASED:
        exchangePurchasesTotal.inc({ source: record.payload.source });
        break;
      case EventType.TOKENS_SOLD:
        exchangeSalesTotal.inc();
        break;
      case EventType.CURRENCY_WITHDRAWN:
        exchangeWithdrawalsTotal.inc({ asset: 'currency' });
        break;
      case EventType.TOKENS_WITHDRAWN:
        exchangeWithdrawalsTotal.inc({ asset: 'token' });
        break;
      default:
        break;
    }

    refreshGauges();
  });
};
