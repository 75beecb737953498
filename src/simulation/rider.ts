// ============================================
// RIDESIM - Rider
// ============================================

import { RiderStatus, type Location } from '../models/types.js';
import { InvalidStateTransitionError } from '../errors.js';

export class Rider {
  readonly origin: Location;
  readonly destination: Location;
  private _status: RiderStatus = RiderStatus.WAITING;

  constructor(
    readonly id: string,
    origin: Location,
    destination: Location,
    readonly patience: number,
    readonly requestedAt: number
  ) {
    this.origin = { ...origin };
    this.destination = { ...destination };
  }

  get status(): RiderStatus {
    return this._status;
  }

  /** Last tick at which the rider is still willing to be picked up */
  get deadline(): number {
    return this.requestedAt + this.patience;
  }

  isWaiting(): boolean {
    return this._status === RiderStatus.WAITING;
  }

  // Losing a race with a pickup must never undo it
  cancel(): void {
    if (this._status !== RiderStatus.WAITING) return;
    this._status = RiderStatus.CANCELLED;
  }

  satisfy(): void {
    if (this._status === RiderStatus.SATISFIED) return;
    if (this._status === RiderStatus.CANCELLED) {
      throw new InvalidStateTransitionError('Rider', this.id, 'a cancelled request cannot be satisfied');
    }
    this._status = RiderStatus.SATISFIED;
  }
}
