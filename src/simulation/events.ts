// ============================================
// RIDESIM - Simulation Events
// ============================================

import { ActivityCategory, ActivityKind, RiderStatus, type Location } from '../models/types.js';
import { InvalidStateTransitionError } from '../errors.js';
import type { Dispatcher } from './dispatcher.js';
import type { Driver } from './driver.js';
import type { Rider } from './rider.js';

export interface RiderRequestEvent {
  kind: 'RiderRequest';
  timestamp: number;
  rider: Rider;
}

export interface DriverRequestEvent {
  kind: 'DriverRequest';
  timestamp: number;
  driver: Driver;
}

export interface CancellationEvent {
  kind: 'Cancellation';
  timestamp: number;
  riderId: string;
}

export interface PickupEvent {
  kind: 'Pickup';
  timestamp: number;
  riderId: string;
  driverId: string;
}

export interface DropoffEvent {
  kind: 'Dropoff';
  timestamp: number;
  riderId: string;
  driverId: string;
}

export type SimulationEvent =
  | RiderRequestEvent
  | DriverRequestEvent
  | CancellationEvent
  | PickupEvent
  | DropoffEvent;

export type Notify = (
  timestamp: number,
  category: ActivityCategory,
  kind: ActivityKind,
  id: string,
  location: Location
) => void;

export interface EventContext {
  dispatcher: Dispatcher;
  notify: Notify;
}

// === Constructors ===

export function riderRequest(timestamp: number, rider: Rider): RiderRequestEvent {
  return { kind: 'RiderRequest', timestamp, rider };
}

export function driverRequest(timestamp: number, driver: Driver): DriverRequestEvent {
  return { kind: 'DriverRequest', timestamp, driver };
}

export function cancellation(timestamp: number, riderId: string): CancellationEvent {
  return { kind: 'Cancellation', timestamp, riderId };
}

export function pickup(timestamp: number, riderId: string, driverId: string): PickupEvent {
  return { kind: 'Pickup', timestamp, riderId, driverId };
}

export function dropoff(timestamp: number, riderId: string, driverId: string): DropoffEvent {
  return { kind: 'Dropoff', timestamp, riderId, driverId };
}

// === Handlers ===

/**
 * Apply an event to the dispatcher and its entities, notifying the monitor
 * of every activity. Returns the follow-up events it spawns.
 */
export function applyEvent(event: SimulationEvent, context: EventContext): SimulationEvent[] {
  switch (event.kind) {
    case 'RiderRequest':
      return applyRiderRequest(event, context);
    case 'DriverRequest':
      return applyDriverRequest(event, context);
    case 'Cancellation':
      return applyCancellation(event, context);
    case 'Pickup':
      return applyPickup(event, context);
    case 'Dropoff':
      return applyDropoff(event, context);
    default: {
      const unreachable: never = event;
      throw new InvalidStateTransitionError('Event', String(unreachable), 'unhandled event kind');
    }
  }
}

function applyRiderRequest({ timestamp, rider }: RiderRequestEvent, { dispatcher, notify }: EventContext): SimulationEvent[] {
  notify(timestamp, ActivityCategory.RIDER, ActivityKind.REQUEST, rider.id, rider.origin);

  const events: SimulationEvent[] = [];
  const driver = dispatcher.requestDriver(rider);
  if (driver !== null) {
    events.push(pickup(timestamp + driver.remainingTravelTime(), rider.id, driver.id));
  }
  // Patience runs out whether or not a driver is on the way
  events.push(cancellation(timestamp + rider.patience, rider.id));
  return events;
}

function applyDriverRequest({ timestamp, driver }: DriverRequestEvent, { dispatcher, notify }: EventContext): SimulationEvent[] {
  const registered = dispatcher.registerDriver(driver);
  notify(timestamp, ActivityCategory.DRIVER, ActivityKind.REQUEST, registered.id, registered.location);

  const rider = dispatcher.requestRider(registered);
  if (rider === null) {
    return [];
  }
  return [pickup(timestamp + registered.remainingTravelTime(), rider.id, registered.id)];
}

function applyCancellation({ timestamp, riderId }: CancellationEvent, { dispatcher, notify }: EventContext): SimulationEvent[] {
  const rider = dispatcher.getRider(riderId);
  if (!rider.isWaiting()) {
    return [];
  }

  notify(timestamp, ActivityCategory.RIDER, ActivityKind.CANCEL, rider.id, rider.origin);
  dispatcher.cancelRide(rider);
  return [];
}

function applyPickup({ timestamp, riderId, driverId }: PickupEvent, { dispatcher, notify }: EventContext): SimulationEvent[] {
  const rider = dispatcher.getRider(riderId);
  const driver = dispatcher.getDriver(driverId);
  driver.endDrive();

  switch (rider.status) {
    case RiderStatus.WAITING: {
      notify(timestamp, ActivityCategory.DRIVER, ActivityKind.PICKUP, driver.id, rider.origin);
      notify(timestamp, ActivityCategory.RIDER, ActivityKind.PICKUP, rider.id, rider.origin);

      const rideTime = driver.startRide(rider);
      rider.satisfy();
      dispatcher.removeFromWaitlist(rider.id);
      return [dropoff(timestamp + rideTime, rider.id, driver.id)];
    }
    case RiderStatus.CANCELLED:
      // The rider gave up before the driver arrived; look for someone else
      dispatcher.releaseDriver(driver);
      return [driverRequest(timestamp, driver)];
    case RiderStatus.SATISFIED:
      throw new InvalidStateTransitionError('Rider', rider.id, 'already picked up');
  }
}

function applyDropoff({ timestamp, riderId, driverId }: DropoffEvent, { dispatcher, notify }: EventContext): SimulationEvent[] {
  const rider = dispatcher.getRider(riderId);
  const driver = dispatcher.getDriver(driverId);

  notify(timestamp, ActivityCategory.DRIVER, ActivityKind.DROPOFF, driver.id, rider.destination);
  notify(timestamp, ActivityCategory.RIDER, ActivityKind.DROPOFF, rider.id, rider.destination);

  driver.endRide();
  return [driverRequest(timestamp, driver)];
}

export function describeEvent(event: SimulationEvent): string {
  switch (event.kind) {
    case 'RiderRequest':
      return `${event.timestamp} -- ${event.rider.id}: Request a driver`;
    case 'DriverRequest':
      return `${event.timestamp} -- ${event.driver.id}: Request a rider`;
    case 'Cancellation':
      return `${event.timestamp} -- ${event.riderId}: Cancellation`;
    case 'Pickup':
      return `${event.timestamp} -- ${event.driverId}: Pick up ${event.riderId}`;
    case 'Dropoff':
      return `${event.timestamp} -- ${event.driverId}: Drop off ${event.riderId}`;
  }
}
