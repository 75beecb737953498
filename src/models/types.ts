// ============================================
// RIDESIM - Core Type Definitions
// ============================================

// === Grid ===
export interface Location {
  row: number;
  column: number;
}

// === Riders ===
export const RiderStatus = {
  WAITING: 'waiting',
  CANCELLED: 'cancelled',
  SATISFIED: 'satisfied',
} as const;

export type RiderStatus = (typeof RiderStatus)[keyof typeof RiderStatus];

// === Monitor activities ===
export const ActivityCategory = {
  RIDER: 'rider',
  DRIVER: 'driver',
} as const;

export type ActivityCategory = (typeof ActivityCategory)[keyof typeof ActivityCategory];

export const ActivityKind = {
  REQUEST: 'request',
  CANCEL: 'cancel',
  PICKUP: 'pickup',
  DROPOFF: 'dropoff',
} as const;

export type ActivityKind = (typeof ActivityKind)[keyof typeof ActivityKind];

export interface Activity {
  time: number;
  category: ActivityCategory;
  kind: ActivityKind;
  id: string;
  location: Location;
}

/**
 * Receives activity notifications from the simulation. Implementations
 * record; they never influence dispatch.
 */
export interface ActivityMonitor {
  notify(
    timestamp: number,
    category: ActivityCategory,
    kind: ActivityKind,
    id: string,
    location: Location
  ): void;
}

export interface SimulationReport {
  riderWaitTime: number;
  driverTotalDistance: number;
  driverRideDistance: number;
}

// === Dispatch rules ===
export type TravelTimeRounding = 'truncate' | 'half-even';
export type WaitlistOrder = 'arrival' | 'deadline';
