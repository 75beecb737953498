// ============================================
// RIDESIM - Monitor Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Monitor } from '../src/simulation/monitor.js';
import { createLocation } from '../src/simulation/location.js';
import { ActivityCategory, ActivityKind } from '../src/models/types.js';

const { RIDER, DRIVER } = ActivityCategory;
const { REQUEST, CANCEL, PICKUP, DROPOFF } = ActivityKind;

describe('Monitor', () => {
  let monitor: Monitor;

  beforeEach(() => {
    monitor = new Monitor();
  });

  it('should report zeros with nothing recorded', () => {
    expect(monitor.report()).toEqual({
      riderWaitTime: 0,
      driverTotalDistance: 0,
      driverRideDistance: 0,
    });
  });

  it('should keep activities per category and ID in arrival order', () => {
    monitor.notify(0, RIDER, REQUEST, 'x', createLocation(0, 0));
    monitor.notify(1, DRIVER, REQUEST, 'x', createLocation(1, 1));
    monitor.notify(2, RIDER, CANCEL, 'x', createLocation(0, 0));

    expect(monitor.getActivities(RIDER, 'x').map((a) => a.kind)).toEqual([REQUEST, CANCEL]);
    expect(monitor.getActivities(DRIVER, 'x')).toEqual([
      { time: 1, category: DRIVER, kind: REQUEST, id: 'x', location: { row: 1, column: 1 } },
    ]);
    expect(monitor.getActivities(DRIVER, 'nobody')).toEqual([]);
    expect(monitor.getIds(RIDER)).toEqual(['x']);
  });

  describe('with a recorded run', () => {
    beforeEach(() => {
      monitor.notify(0, RIDER, REQUEST, 'r1', createLocation(0, 4));
      monitor.notify(2, RIDER, REQUEST, 'r2', createLocation(3, 6));
      monitor.notify(3, RIDER, REQUEST, 'r3', createLocation(9, 9));
      monitor.notify(4, RIDER, PICKUP, 'r1', createLocation(0, 4));
      monitor.notify(5, RIDER, CANCEL, 'r2', createLocation(3, 6));
      monitor.notify(7, RIDER, DROPOFF, 'r1', createLocation(3, 4));

      monitor.notify(0, DRIVER, REQUEST, 'd1', createLocation(0, 0));
      monitor.notify(1, DRIVER, REQUEST, 'd2', createLocation(5, 5));
      monitor.notify(4, DRIVER, PICKUP, 'd1', createLocation(0, 4));
      monitor.notify(7, DRIVER, DROPOFF, 'd1', createLocation(3, 4));
      monitor.notify(7, DRIVER, REQUEST, 'd1', createLocation(3, 4));
      // d1 reached r2 after the cancellation and asked again from there
      monitor.notify(9, DRIVER, REQUEST, 'd1', createLocation(3, 6));
    });

    it('should split a driver distance into ride and riderless legs', () => {
      expect(monitor.rideDistance('d1')).toBe(3);
      expect(monitor.riderlessDistance('d1')).toBe(6);
      expect(monitor.totalDistance('d1')).toBe(9);
      expect(monitor.totalDistance('d2')).toBe(0);
    });

    it('should average over riders who stopped waiting and over all drivers', () => {
      expect(monitor.report()).toEqual({
        riderWaitTime: 3.5,
        driverTotalDistance: 4.5,
        driverRideDistance: 1.5,
      });
    });
  });
});
