import { REJECTION_KINDS } from '../types.js';
import type { RejectionKind, RoleType, ValidationOutcome } from '../types.js';

export class ValidationTally {
  accepted = 0;

  readonly rejected: Record<RejectionKind, number> = {
    InvalidEmail: 0,
    PlaceholderData: 0,
    NotAnIndividual: 0,
    InvalidProfileUrl: 0,
    DuplicateEmail: 0,
  };

  readonly acceptedByRole: Record<RoleType, number> = {
    'UGC Creator': 0,
    'Video Editor': 0,
  };

  record(outcome: ValidationOutcome): void {
    if (outcome.status === 'accepted') {
      this.accepted += 1;
      this.acceptedByRole[outcome.record.role_type] += 1;
      return;
    }
    this.rejected[outcome.reason] += 1;
  }

  get rejectedTotal(): number {
    return REJECTION_KINDS.reduce((sum, kind) => sum + this.rejected[kind], 0);
  }

  get total(): number {
    return this.accepted + this.rejectedTotal;
  }
}
