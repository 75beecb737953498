// ============================================
// RIDESIM - Driver
// ============================================

import type { Location, TravelTimeRounding } from '../models/types.js';
import { DEFAULT_TRAVEL_TIME_ROUNDING } from '../config/simulation.js';
import { InvalidStateTransitionError } from '../errors.js';
import { manhattanDistance } from './location.js';
import type { Rider } from './rider.js';

export function roundTravelTime(value: number, mode: TravelTimeRounding): number {
  if (mode === 'truncate') {
    return Math.trunc(value);
  }

  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * A driver moves through Idle -> Driving (to a pickup) -> Riding (with a
 * passenger) -> Idle. Only `startDrive`, `startRide` and `endRide` flip the
 * idle flag; `endDrive` leaves it to the caller so the dispatcher can decide
 * what the driver does on arrival.
 */
export class Driver {
  location: Location;
  isIdle = true;
  destination: Location | null = null;
  passengerId: string | null = null;

  constructor(
    readonly id: string,
    location: Location,
    readonly speed: number,
    private readonly rounding: TravelTimeRounding = DEFAULT_TRAVEL_TIME_ROUNDING
  ) {
    this.location = { ...location };
  }

  /**
   * Ticks needed to reach `target` from the current location
   */
  getTravelTime(target: Location): number {
    return roundTravelTime(manhattanDistance(this.location, target) / this.speed, this.rounding);
  }

  /** Travel time of the leg currently being driven */
  remainingTravelTime(): number {
    if (this.destination === null) {
      throw new InvalidStateTransitionError('Driver', this.id, 'has no destination');
    }
    return this.getTravelTime(this.destination);
  }

  startDrive(target: Location): number {
    if (!this.isIdle) {
      throw new InvalidStateTransitionError('Driver', this.id, 'cannot start a drive while busy');
    }
    this.destination = { ...target };
    this.isIdle = false;
    return this.getTravelTime(target);
  }

  endDrive(): void {
    if (this.destination === null) {
      throw new InvalidStateTransitionError('Driver', this.id, 'cannot end a drive without a destination');
    }
    this.location = this.destination;
    this.destination = null;
  }

  startRide(rider: Rider): number {
    if (this.destination !== null || this.passengerId !== null) {
      throw new InvalidStateTransitionError('Driver', this.id, `cannot start a ride with ${rider.id} while en route`);
    }
    this.passengerId = rider.id;
    this.destination = { ...rider.destination };
    this.isIdle = false;
    return this.getTravelTime(rider.destination);
  }

  endRide(): void {
    if (this.destination === null || this.passengerId === null) {
      throw new InvalidStateTransitionError('Driver', this.id, 'has no ride to end');
    }
    this.location = this.destination;
    this.destination = null;
    this.passengerId = null;
    this.isIdle = true;
  }

  /**
   * Return an arrived driver to the idle pool without a passenger.
   */
  release(): void {
    if (this.destination !== null) {
      throw new InvalidStateTransitionError('Driver', this.id, 'cannot be released mid-drive');
    }
    this.isIdle = true;
  }
}
