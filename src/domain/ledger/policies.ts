import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, LedgerState } from './ledgerTypes.js';

export interface AccessPolicy {
  requireOwner(caller: Address): void;
}

export interface PausePolicy {
  isPaused(ledger: LedgerState): boolean;
  requireUnpaused(ledger: LedgerState): void;
  setPaused(ledger: LedgerState, paused: boolean): void;
}

/** One privileged identity gates every administrative operation. */
export class OwnerAccessPolicy implements AccessPolicy {
  constructor(private readonly owner: Address) {}

  requireOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller is not the ledger owner.', { caller });
    }
  }
}

/** Pause flag kept in the ledger state so it persists and rolls back with everything else. */
export class LedgerPausePolicy implements PausePolicy {
  isPaused(ledger: LedgerState): boolean {
    return ledger.paused;
  }

  requireUnpaused(ledger: LedgerState): void {
    if (ledger.paused) {
      throw new DomainError(ErrorCode.ProtocolPaused, 423, 'Protocol is paused.');
    }
  }

  setPaused(ledger: LedgerState, paused: boolean): void {
    ledger.paused = paused;
  }
}
