import type { Principal } from '../utils/address';

export enum EventType {
  // Ledger
  TRANSFER = 'TRANSFER',
  APPROVAL = 'APPROVAL',
  PAUSED = 'PAUSED',
  UNPAUSED = 'UNPAUSED',

  // Permission store
  ROLE_GRANTED = 'ROLE_GRANTED',
  ROLE_REVOKED = 'ROLE_REVOKED',
  ADMIN_TRANSFER_PROPOSED = 'ADMIN_TRANSFER_PROPOSED',
  ADMIN_TRANSFER_ACCEPTED = 'ADMIN_TRANSFER_ACCEPTED',
  ADMIN_TRANSFER_CANCELED = 'ADMIN_TRANSFER_CANCELED',

  // Exchange
  TOKENS_PURCHASED = 'TOKENS_PURCHASED',
  TOKENS_SOLD = 'TOKENS_SOLD',
  CURRENCY_WITHDRAWN = 'CURRENCY_WITHDRAWN',
  TOKENS_WITHDRAWN = 'TOKENS_WITHDRAWN',
  OWNERSHIP_TRANSFER_STARTED = 'OWNERSHIP_TRANSFER_STARTED',
  OWNERSHIP_TRANSFERRED = 'OWNERSHIP_TRANSFERRED',
}

export type PurchaseSource = 'reserve' | 'mint';

export interface BaseEvent {
  eventType: EventType;
  payload: Record<string, unknown>;
}

export interface TransferEvent extends BaseEvent {
  eventType: EventType.TRANSFER;
  payload: {
    from: Principal;
    to: Principal;
    amount: bigint;
  };
}

export interface ApprovalEvent extends BaseEvent {
  eventType: EventType.APPROVAL;
  payload: {
    owner: Principal;
    spender: Principal;
    amount: bigint;
  };
}

export interface PausedEvent extends BaseEvent {
  eventType: EventType.PAUSED | EventType.UNPAUSED;
  payload: {
    account: Principal;
  };
}

export interface RoleChangedEvent extends BaseEvent {
  eventType: EventType.ROLE_GRANTED | EventType.ROLE_REVOKED;
  payload: {
    role: string;
    account: Principal;
    sender: Principal;
  };
}

export interface AdminTransferProposedEvent extends BaseEvent {
  eventType: EventType.ADMIN_TRANSFER_PROPOSED;
  payload: {
    admin: Principal;
    candidate: Principal;
    notBefore: number;
  };
}

export interface AdminTransferAcceptedEvent extends BaseEvent {
  eventType: EventType.ADMIN_TRANSFER_ACCEPTED;
  payload: {
    previousAdmin: Principal;
    admin: Principal;
  };
}

export interface AdminTransferCanceledEvent extends BaseEvent {
  eventType: EventType.ADMIN_TRANSFER_CANCELED;
  payload: {
    admin: Principal;
    candidate: Principal;
  };
}

export interface TokensPurchasedEvent extends BaseEvent {
  eventType: EventType.TOKENS_PURCHASED;
  payload: {
    buyer: Principal;
    currencyPaid: bigint;
    tokens: bigint;
    source: PurchaseSource;
  };
}

export interface TokensSoldEvent extends BaseEvent {
  eventType: EventType.TOKENS_SOLD;
  payload: {
    seller: Principal;
    tokens: bigint;
    currencyPaid: bigint;
  };
}

export interface WithdrawalEvent extends BaseEvent {
  eventType: EventType.CURRENCY_WITHDRAWN | EventType.TOKENS_WITHDRAWN;
  payload: {
    owner: Principal;
    amount: bigint;
  };
}

export interface OwnershipEvent extends BaseEvent {
  eventType: EventType.OWNERSHIP_TRANSFER_STARTED | EventType.OWNERSHIP_TRANSFERRED;
  payload: {
    previousOwner: Principal;
    newOwner: Principal;
  };
}

export type ReserveMintEvent =
  | TransferEvent
  | ApprovalEvent
  | PausedEvent
  | RoleChangedEvent
  | AdminTransferProposedEvent
  | AdminTransferAcceptedEvent
  | AdminTransferCanceledEvent
  | TokensPurchasedEvent
  | TokensSoldEvent
  | WithdrawalEvent
  | OwnershipEvent;

/**
 * A committed notification: the event plus the metadata stamped on it when
 * the enclosing call committed.
 */
export type RecordedEvent = ReserveMintEvent & {
  sequence: number;
  transactionId: string;
  timestamp: Date;
};

export type EventHandler = (event: RecordedEvent) => void | Promise<void>;
