import { ApiError } from '../../middlewares/errorHandler';
import type { EventLog } from '../../events/eventLog';
import type { AtomicExecutor } from '../../state/atomic';
import { EventType } from '../../types/events';
import { Principal, ZERO_ADDRESS, isZeroAddress, normalizeAddress } from '../../utils/address';
import { Clock, systemClock, toUnixSeconds } from '../../utils/clock';

export enum Role {
  DEFAULT_ADMIN = 'DEFAULT_ADMIN',
  MINTER = 'MINTER',
  PAUSER = 'PAUSER',
}

export const ROLES: readonly Role[] = [Role.DEFAULT_ADMIN, Role.MINTER, Role.PAUSER];

export const isRole = (value: unknown): value is Role =>
  typeof value === 'string' && ROLES.some((role) => role === value);

export interface PendingAdmin {
  candidate: Principal;
  /** Unix seconds */
  notBefore: number;
}

interface PermissionState {
  admin: Principal;
  pending: PendingAdmin | null;
  members: Map<Role, Set<Principal>>;
}

export interface PermissionStoreOptions {
  admin: Principal;
  /** Minimum seconds between proposing and accepting an admin transfer */
  adminDelay: number;
  executor: AtomicExecutor;
  events: EventLog;
  clock?: Clock;
}

/**
 * Role sets plus the single admin record.
 *
 * The admin is never moved by grant/revoke; only proposeAdmin followed by the
 * candidate's acceptAdmin hands it over.
 */
export class PermissionStore {
  private readonly executor: AtomicExecutor;
  private readonly events: EventLog;
  private readonly clock: Clock;
  private readonly delay: number;
  private readonly state: PermissionState;

  constructor(options: PermissionStoreOptions) {
    if (!Number.isInteger(options.adminDelay) || options.adminDelay < 0) {
      throw ApiError.invalidInput('adminDelay must be a non-negative integer');
    }

    const admin = normalizeAddress(options.admin, 'admin');
    if (isZeroAddress(admin)) {
      throw ApiError.zeroAddress('Initial admin must not be the zero address');
    }

    this.executor = options.executor;
    this.events = options.events;
    this.clock = options.clock ?? systemClock;
    this.delay = options.adminDelay;
    this.state = {
      admin,
      pending: null,
      members: new Map(
        ROLES.filter((role) => role !== Role.DEFAULT_ADMIN).map((role): [Role, Set<Principal>] => [role, new Set()])
      ),
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  hasPermission(principal: Principal, role: Role): boolean {
    const account = principal.toLowerCase();
    if (role === Role.DEFAULT_ADMIN) {
      return account === this.state.admin;
    }
    return this.state.members.get(role)?.has(account) ?? false;
  }

  hasRole(role: Role, principal: Principal): boolean {
    return this.hasPermission(principal, role);
  }

  admin(): Principal {
    return this.state.admin;
  }

  pendingAdmin(): PendingAdmin | null {
    return this.state.pending ? { ...this.state.pending } : null;
  }

  adminDelay(): number {
    return this.delay;
  }

  members(role: Role): Principal[] {
    if (role === Role.DEFAULT_ADMIN) {
      return [this.state.admin];
    }
    return [...(this.state.members.get(role) ?? [])].sort();
  }

  /**
   * Capability check run at the top of every restricted operation.
   */
  requirePermission(principal: Principal, role: Role): void {
    if (!this.hasPermission(principal, role)) {
      throw ApiError.unauthorized(`${principal.toLowerCase()} is missing role ${role}`);
    }
  }

  // ===========================================================================
  // Role management
  // ===========================================================================

  grant(caller: Principal, role: Role, principal: Principal): boolean {
    return this.executor.run(() => {
      this.requirePermission(caller, Role.DEFAULT_ADMIN);
      const account = this.roleTarget(role, principal);

      const set = this.roleSet(role);
      if (set.has(account)) {
        return false;
      }

      this.executor.trackMember(set, account);
      set.add(account);
      this.events.emit({
        eventType: EventType.ROLE_GRANTED,
        payload: { role, account, sender: caller.toLowerCase() },
      });
      return true;
    });
  }

  revoke(caller: Principal, role: Role, principal: Principal): boolean {
    return this.executor.run(() => {
      this.requirePermission(caller, Role.DEFAULT_ADMIN);
      const account = this.roleTarget(role, principal);

      if (!this.removeMember(role, account)) {
        return false;
      }

      this.events.emit({
        eventType: EventType.ROLE_REVOKED,
        payload: { role, account, sender: caller.toLowerCase() },
      });
      return true;
    });
  }

  /**
   * A holder drops one of its own roles.
   */
  renounce(caller: Principal, role: Role): boolean {
    return this.executor.run(() => {
      const account = normalizeAddress(caller, 'caller');
      if (role === Role.DEFAULT_ADMIN) {
        throw ApiError.unauthorized('The admin role can only be handed over through an admin transfer');
      }

      if (!this.removeMember(role, account)) {
        return false;
      }

      this.events.emit({
        eventType: EventType.ROLE_REVOKED,
        payload: { role, account, sender: account },
      });
      return true;
    });
  }

  // ===========================================================================
  // Admin transfer
  // ===========================================================================

  proposeAdmin(caller: Principal, candidate: Principal, notBefore?: number): PendingAdmin {
    return this.executor.run(() => {
      this.requirePermission(caller, Role.DEFAULT_ADMIN);

      const account = normalizeAddress(candidate, 'candidate');
      if (isZeroAddress(account)) {
        throw ApiError.zeroAddress('Admin candidate must not be the zero address');
      }
      if (notBefore !== undefined && (!Number.isInteger(notBefore) || notBefore < 0)) {
        throw ApiError.invalidInput('notBefore must be a non-negative integer of unix seconds');
      }

      const pending: PendingAdmin = {
        candidate: account,
        notBefore: Math.max(notBefore ?? 0, toUnixSeconds(this.clock) + this.delay),
      };
      this.setPending(pending);

      this.events.emit({
        eventType: EventType.ADMIN_TRANSFER_PROPOSED,
        payload: { admin: this.state.admin, candidate: account, notBefore: pending.notBefore },
      });
      return { ...pending };
    });
  }

  acceptAdmin(caller: Principal): Principal {
    return this.executor.run(() => {
      const pending = this.state.pending;
      const account = caller.toLowerCase();
      if (!pending || pending.candidate !== account) {
        throw ApiError.unauthorized(`${account} is not the pending admin`);
      }
      if (toUnixSeconds(this.clock) < pending.notBefore) {
        throw ApiError.tooEarly(`Admin transfer cannot be accepted before ${pending.notBefore}`);
      }

      const previousAdmin = this.state.admin;
      this.executor.trackProperty(this.state, 'admin');
      this.state.admin = account;
      this.setPending(null);

      this.events.emit({
        eventType: EventType.ADMIN_TRANSFER_ACCEPTED,
        payload: { previousAdmin, admin: account },
      });
      return account;
    });
  }

  cancelAdmin(caller: Principal): void {
    this.executor.run(() => {
      this.requirePermission(caller, Role.DEFAULT_ADMIN);

      const pending = this.state.pending;
      if (!pending) {
        throw ApiError.noPendingTransfer('No admin transfer is pending');
      }

      this.setPending(null);
      this.events.emit({
        eventType: EventType.ADMIN_TRANSFER_CANCELED,
        payload: { admin: this.state.admin, candidate: pending.candidate },
      });
    });
  }

  private roleTarget(role: Role, principal: Principal): Principal {
    if (role === Role.DEFAULT_ADMIN) {
      throw ApiError.unauthorized('The admin role can only be handed over through an admin transfer');
    }
    const account = normalizeAddress(principal, 'account');
    if (account === ZERO_ADDRESS) {
      throw ApiError.zeroAddress('Roles cannot be granted to the zero address');
    }
    return account;
  }

  private roleSet(role: Role): Set<Principal> {
    let set = this.state.members.get(role);
    if (!set) {
      set = new Set<Principal>();
      this.executor.trackEntry(this.state.members, role);
      this.state.members.set(role, set);
    }
    return set;
  }

  private removeMember(role: Role, account: Principal): boolean {
    const set = this.roleSet(role);
    if (!set.has(account)) {
      return false;
    }
    this.executor.trackMember(set, account);
    return set.delete(account);
  }

  private setPending(pending: PendingAdmin | null): void {
    this.executor.trackProperty(this.state, 'pending');
    this.state.pending = pending;
  }
}
