// ============================================
// RIDESIM - Activity Monitor
// ============================================

import {
  ActivityCategory,
  ActivityKind,
  type Activity,
  type ActivityMonitor,
  type Location,
  type SimulationReport,
} from '../models/types.js';
import { manhattanDistance } from './location.js';

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Records every activity it is told about, keyed by category and actor ID,
 * and summarizes them on demand.
 */
export class Monitor implements ActivityMonitor {
  private activities: Record<ActivityCategory, Map<string, Activity[]>> = {
    [ActivityCategory.RIDER]: new Map(),
    [ActivityCategory.DRIVER]: new Map(),
  };

  notify(timestamp: number, category: ActivityCategory, kind: ActivityKind, id: string, location: Location): void {
    let history = this.activities[category].get(id);
    if (!history) {
      history = [];
      this.activities[category].set(id, history);
    }
    history.push({ time: timestamp, category, kind, id, location: { ...location } });
  }

  getActivities(category: ActivityCategory, id: string): Activity[] {
    return [...(this.activities[category].get(id) ?? [])];
  }

  getIds(category: ActivityCategory): string[] {
    return [...this.activities[category].keys()];
  }

  report(): SimulationReport {
    return {
      riderWaitTime: this.averageWaitTime(),
      driverTotalDistance: average(this.getIds(ActivityCategory.DRIVER).map((id) => this.totalDistance(id))),
      driverRideDistance: average(this.getIds(ActivityCategory.DRIVER).map((id) => this.rideDistance(id))),
    };
  }

  /**
   * Distance a driver covered with a passenger on board
   */
  rideDistance(driverId: string): number {
    return this.sumLegs(driverId, (current, next) =>
      current.kind === ActivityKind.PICKUP && next.kind === ActivityKind.DROPOFF
    );
  }

  /**
   * Distance a driver covered heading out from a request to its next activity
   */
  riderlessDistance(driverId: string): number {
    return this.sumLegs(driverId, (current) => current.kind === ActivityKind.REQUEST);
  }

  totalDistance(driverId: string): number {
    return this.sumLegs(driverId, () => true);
  }

  // Only riders who stopped waiting (picked up or cancelled) count
  private averageWaitTime(): number {
    const waits: number[] = [];
    for (const history of this.activities[ActivityCategory.RIDER].values()) {
      if (history.length >= 2) {
        waits.push(history[1].time - history[0].time);
      }
    }
    return average(waits);
  }

  private sumLegs(driverId: string, counts: (current: Activity, next: Activity) => boolean): number {
    const history = this.activities[ActivityCategory.DRIVER].get(driverId) ?? [];
    let total = 0;
    for (let i = 0; i < history.length - 1; i++) {
      const current = history[i];
      const next = history[i + 1];
      if (counts(current, next)) {
        total += manhattanDistance(current.location, next.location);
      }
    }
    return total;
  }
}
