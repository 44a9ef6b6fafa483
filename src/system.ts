import type { AppConfig } from './config';
import { EventLog } from './events/eventLog';
import { ApiError } from './middlewares/errorHandler';
import { CurrencyService } from './services/currency/currency.service';
import { Exchange } from './services/exchange/exchange.service';
import { TokenLedger, deployToken } from './services/ledger/ledger.service';
import { PermissionStore, Role } from './services/permission/permission.service';
import { AtomicExecutor } from './state/atomic';
import { Principal, normalizeAddress } from './utils/address';
import { Clock, systemClock } from './utils/clock';
import { parseUnits } from './utils/units';

export interface GenesisAllocation {
  account: Principal;
  amount: bigint;
}

export interface SystemParams {
  token: {
    name: string;
    symbol: string;
    maxSupply: bigint;
    initialMint: bigint;
    initialMinter: Principal;
    admin: Principal;
    adminDelay: number;
  };
  exchange: {
    address: Principal;
    owner: Principal;
    buyPrice: bigint;
    sellPrice: bigint;
    /** Grant the exchange the minter role right after it is created */
    grantMinter: boolean;
  };
  genesisFunding: GenesisAllocation[];
  clock?: Clock;
}

export interface ReserveMintSystem {
  clock: Clock;
  events: EventLog;
  executor: AtomicExecutor;
  permissions: PermissionStore;
  ledger: TokenLedger;
  currency: CurrencyService;
  exchange: Exchange;
}

/**
 * Deploy the ledger and permission store, then the exchange, then fund the
 * genesis currency accounts.
 */
export const createSystem = (params: SystemParams): ReserveMintSystem => {
  const clock = params.clock ?? systemClock;
  const events = new EventLog(clock);
  const executor = new AtomicExecutor(events);

  const { ledger, permissions } = deployToken({ ...params.token, executor, events, clock });
  const currency = new CurrencyService(executor);
  const exchange = new Exchange({ ...params.exchange, ledger, currency, executor, events });

  if (params.exchange.grantMinter) {
    permissions.grant(permissions.admin(), Role.MINTER, exchange.address);
  }

  for (const { account, amount } of params.genesisFunding) {
    currency.fund(account, amount);
  }

  return { clock, events, executor, permissions, ledger, currency, exchange };
};

/**
 * Parse "0xabc...=100,0xdef...=2.5" into allocations of whole currency units.
 */
export const parseGenesisFunding = (value: string): GenesisAllocation[] =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [account, amount] = entry.split('=');
      if (!account || !amount) {
        throw ApiError.invalidInput(`Genesis funding entry "${entry}" must look like address=amount`);
      }
      return { account: normalizeAddress(account.trim(), 'genesis account'), amount: parseUnits(amount.trim()) };
    });

export const systemParamsFromConfig = (appConfig: AppConfig, clock?: Clock): SystemParams => ({
  token: {
    name: appConfig.token.name,
    symbol: appConfig.token.symbol,
    maxSupply: parseUnits(appConfig.token.maxSupply),
    initialMint: parseUnits(appConfig.token.initialMint),
    initialMinter: appConfig.token.initialMinter,
    admin: appConfig.token.admin,
    adminDelay: appConfig.token.adminDelaySeconds,
  },
  exchange: {
    address: appConfig.exchange.address,
    owner: appConfig.exchange.owner,
    buyPrice: parseUnits(appConfig.exchange.buyPrice),
    sellPrice: parseUnits(appConfig.exchange.sellPrice),
    grantMinter: appConfig.exchange.grantMinter,
  },
  genesisFunding: parseGenesisFunding(appConfig.currency.genesisFunding),
  clock,
});
