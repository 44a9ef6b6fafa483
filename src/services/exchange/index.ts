export { Exchange } from './exchange.service';
export type {
  BuyQuote,
  ExchangeInfo,
  ExchangeOptions,
  PurchaseResult,
  SaleResult,
  SellQuote,
} from './exchange.service';
export { ExchangeController } from './exchange.controller';
export { createExchangeRoutes } from './exchange.routes';
