export { TokenLedger, deployToken } from './ledger.service';
export type { TokenLedgerOptions, TokenDeployment, TokenDeploymentOptions, TokenInfo } from './ledger.service';
export { LedgerController } from './ledger.controller';
export { createLedgerRoutes } from './ledger.routes';
