// ============================================
// RIDESIM - Dispatcher
// ============================================

import type { WaitlistOrder } from '../models/types.js';
import { DEFAULT_WAITLIST_ORDER } from '../config/simulation.js';
import { InvariantViolationError, UnknownEntityError } from '../errors.js';
import { OrderedQueue } from './ordered-queue.js';
import type { Driver } from './driver.js';
import type { Rider } from './rider.js';

export interface DispatcherOptions {
  waitlistOrder?: WaitlistOrder;
}

function waitlistKey(order: WaitlistOrder): (rider: Rider) => number {
  switch (order) {
    case 'arrival':
      return (rider) => rider.requestedAt;
    case 'deadline':
      return (rider) => rider.deadline;
  }
}

/**
 * Matches riders with drivers.
 *
 * A rider asking for a driver gets the idle driver who can reach them
 * soonest, or joins the wait-list. A driver asking for a rider is registered
 * into the fleet and gets the first rider on the wait-list, if any.
 *
 * Every match starts the driver's drive to the rider inside the same call, so
 * a driver handed out here is never idle afterwards.
 */
export class Dispatcher {
  // Map iteration order is registration order
  private fleet = new Map<string, Driver>();
  private riders = new Map<string, Rider>();
  private waitlist: OrderedQueue<Rider>;

  constructor(options: DispatcherOptions = {}) {
    this.waitlist = new OrderedQueue(waitlistKey(options.waitlistOrder ?? DEFAULT_WAITLIST_ORDER));
  }

  /**
   * Return a driver now driving to the rider, or null if no driver is idle.
   * An unmatched rider is added to the wait-list.
   */
  requestDriver(rider: Rider): Driver | null {
    const known = this.riders.get(rider.id);
    if (known !== undefined && known !== rider) {
      throw new InvariantViolationError(`Rider ID '${rider.id}' is already taken by another rider`);
    }
    this.riders.set(rider.id, rider);

    let best: Driver | null = null;
    let bestTime = Infinity;
    for (const driver of this.fleet.values()) {
      if (!driver.isIdle) continue;
      const time = driver.getTravelTime(rider.origin);
      // Strict comparison keeps the earliest-registered driver on ties
      if (time < bestTime) {
        best = driver;
        bestTime = time;
      }
    }

    if (best === null) {
      if (!this.isWaiting(rider.id)) {
        this.waitlist.push(rider);
      }
      return null;
    }

    best.startDrive(rider.origin);
    return best;
  }

  /**
   * Return the next waiting rider with the driver now driving to them, or null.
   * Registers the driver on first sight; later calls with the same ID reuse
   * the registered record.
   */
  requestRider(driver: Driver): Rider | null {
    const registered = this.registerDriver(driver);
    if (!registered.isIdle || this.waitlist.isEmpty()) {
      return null;
    }

    const rider = this.waitlist.pop();
    registered.startDrive(rider.origin);
    return rider;
  }

  cancelRide(rider: Rider): void {
    this.removeFromWaitlist(rider.id);
    rider.cancel();
  }

  registerDriver(driver: Driver): Driver {
    const existing = this.fleet.get(driver.id);
    if (existing) return existing;
    this.fleet.set(driver.id, driver);
    return driver;
  }

  removeFromWaitlist(riderId: string): Rider | undefined {
    return this.waitlist.remove((rider) => rider.id === riderId);
  }

  releaseDriver(driver: Driver): void {
    driver.release();
  }

  isWaiting(riderId: string): boolean {
    return this.waitlist.has((rider) => rider.id === riderId);
  }

  getDriver(id: string): Driver {
    const driver = this.fleet.get(id);
    if (!driver) throw new UnknownEntityError('Driver', id);
    return driver;
  }

  getRider(id: string): Rider {
    const rider = this.riders.get(id);
    if (!rider) throw new UnknownEntityError('Rider', id);
    return rider;
  }

  getFleet(): Driver[] {
    return [...this.fleet.values()];
  }

  getWaitlist(): Rider[] {
    return this.waitlist.toArray();
  }
}
