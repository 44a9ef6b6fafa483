export { CurrencyService } from './currency.service';
export type { Payment, PaymentReceiver } from './currency.service';
export { CurrencyController } from './currency.controller';
export { createCurrencyRoutes } from './currency.routes';
