// ============================================
// RIDESIM - Simulation Engine Tests
// ============================================

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { SimulationEngine, SimulationComplete } from '../src/simulation/engine.js';
import { Dispatcher } from '../src/simulation/dispatcher.js';
import { Monitor } from '../src/simulation/monitor.js';
import { Driver } from '../src/simulation/driver.js';
import { Rider } from '../src/simulation/rider.js';
import { createLocation } from '../src/simulation/location.js';
import { driverRequest, riderRequest, type SimulationEvent } from '../src/simulation/events.js';
import { RiderStatus, type ActivityMonitor } from '../src/models/types.js';
import { InvariantViolationError } from '../src/errors.js';

function setup(options: { endTime?: number; monitor?: ActivityMonitor } = {}) {
  const dispatcher = new Dispatcher();
  const monitor = new Monitor();
  const engine = new SimulationEngine(dispatcher, options.monitor ?? monitor, {
    endTime: options.endTime,
    logger: pino({ level: 'silent' }),
  });
  const applied: string[] = [];
  engine.on('event_applied', (event: SimulationEvent) => {
    applied.push(`${event.timestamp} ${event.kind}`);
  });
  return { dispatcher, monitor, engine, applied };
}

function simpleScenario(): SimulationEvent[] {
  return [
    driverRequest(0, new Driver('d1', createLocation(0, 0), 1)),
    riderRequest(0, new Rider('r1', createLocation(0, 0), createLocation(5, 0), 100, 0)),
  ];
}

describe('SimulationEngine', () => {
  it('should pick up at once and drop off after the ride', () => {
    const { engine, applied } = setup();

    const summary = engine.run(simpleScenario());

    expect(applied).toEqual([
      '0 DriverRequest',
      '0 RiderRequest',
      '0 Pickup',
      '5 Dropoff',
      '5 DriverRequest',
      '100 Cancellation',
    ]);
    expect(summary).toEqual({ eventsApplied: 6, finalTime: 100, discarded: 0 });
    expect(engine.getCurrentTime()).toBe(100);
  });

  it('should apply equal timestamps in insertion order', () => {
    const { engine, applied, dispatcher } = setup();

    // The rider comes first, so the driver finds them on the wait-list
    engine.run([
      riderRequest(0, new Rider('r1', createLocation(0, 2), createLocation(0, 3), 100, 0)),
      driverRequest(0, new Driver('d1', createLocation(0, 0), 1)),
    ]);

    expect(applied.slice(0, 4)).toEqual(['0 RiderRequest', '0 DriverRequest', '2 Pickup', '3 Dropoff']);
    expect(dispatcher.getRider('r1').status).toBe(RiderStatus.SATISFIED);
  });

  it('should cancel an impatient rider and give the late driver someone else', () => {
    const { engine, monitor, dispatcher } = setup();
    const impatient = new Rider('r1', createLocation(0, 0), createLocation(3, 0), 3, 0);
    const patient = new Rider('r2', createLocation(0, 2), createLocation(0, 6), 100, 1);

    engine.run([
      riderRequest(0, impatient),
      riderRequest(1, patient),
      driverRequest(4, new Driver('d1', createLocation(0, 0), 1)),
    ]);

    expect(impatient.status).toBe(RiderStatus.CANCELLED);
    expect(monitor.getActivities('rider', 'r1').map((a) => `${a.time} ${a.kind}`)).toEqual([
      '0 request',
      '3 cancel',
    ]);
    expect(patient.status).toBe(RiderStatus.SATISFIED);
    expect(monitor.getActivities('driver', 'd1').map((a) => `${a.time} ${a.kind}`)).toEqual([
      '4 request',
      '6 pickup',
      '10 dropoff',
      '10 request',
    ]);
    expect(dispatcher.getWaitlist()).toEqual([]);
  });

  it('should send a driver on to the next rider after a cancelled pickup', () => {
    const { engine, monitor, dispatcher } = setup();

    engine.run([
      driverRequest(0, new Driver('d1', createLocation(0, 0), 1)),
      riderRequest(1, new Rider('gone', createLocation(0, 5), createLocation(0, 9), 2, 1)),
      riderRequest(2, new Rider('stays', createLocation(0, 7), createLocation(0, 8), 100, 2)),
    ]);

    // d1 leaves at 1, the rider gives up at 3, d1 arrives at 6 and heads on to (0,7)
    expect(dispatcher.getRider('gone').status).toBe(RiderStatus.CANCELLED);
    expect(dispatcher.getRider('stays').status).toBe(RiderStatus.SATISFIED);
    expect(monitor.getActivities('driver', 'd1').map((a) => `${a.time} ${a.kind}`)).toEqual([
      '0 request',
      '6 request',
      '8 pickup',
      '9 dropoff',
      '9 request',
    ]);
  });

  it('should discard events past the end time', () => {
    const { engine, applied } = setup({ endTime: 5 });
    const horizon = vi.fn();
    engine.on('horizon_reached', horizon);

    const summary = engine.run(simpleScenario());

    expect(applied).toEqual(['0 DriverRequest', '0 RiderRequest', '0 Pickup', '5 Dropoff', '5 DriverRequest']);
    expect(summary).toEqual({ eventsApplied: 5, finalTime: 5, discarded: 1 });
    expect(horizon).toHaveBeenCalledWith(5, 1);
    expect(engine.getPendingCount()).toBe(0);
  });

  it('should report completion once the queue is empty', () => {
    const { engine } = setup();
    const completed = vi.fn();
    engine.on('completed', completed);

    expect(engine.step()).toBe(SimulationComplete);

    engine.schedule(simpleScenario());
    expect(engine.step()).toMatchObject({ kind: 'DriverRequest', timestamp: 0 });
    expect(engine.getPendingCount()).toBe(1);

    engine.run();
    expect(completed).toHaveBeenCalledWith({ eventsApplied: 6, finalTime: 100, discarded: 0 });
  });

  it('should refuse a follow-up scheduled in the past', () => {
    const { engine } = setup();
    const broken = new Rider('r1', createLocation(0, 0), createLocation(1, 1), -1, 5);

    expect(() => engine.run([riderRequest(5, broken)])).toThrow(InvariantViolationError);
  });

  it('should stop on a rider ID that is already in use', () => {
    const { engine, dispatcher } = setup();
    const first = new Rider('r1', createLocation(0, 0), createLocation(1, 0), 2, 0);
    const impostor = new Rider('r1', createLocation(5, 5), createLocation(6, 5), 100, 1);

    expect(() =>
      engine.run([
        riderRequest(0, first),
        riderRequest(1, impostor),
        driverRequest(3, new Driver('d1', createLocation(5, 5), 1)),
      ])
    ).toThrow(InvariantViolationError);
    expect(engine.getCurrentTime()).toBe(1);
    expect(dispatcher.getRider('r1')).toBe(first);
    expect(dispatcher.isWaiting('r1')).toBe(true);
  });

  it('should refuse negative or fractional timestamps', () => {
    const { engine } = setup();
    const driver = new Driver('d1', createLocation(0, 0), 1);

    expect(() => engine.schedule([driverRequest(-1, driver)])).toThrow(InvariantViolationError);
    expect(() => engine.schedule([driverRequest(1.5, driver)])).toThrow(InvariantViolationError);
  });

  it('should keep going when the monitor fails', () => {
    const failing: ActivityMonitor = {
      notify: () => {
        throw new Error('disk full');
      },
    };
    const { engine, dispatcher } = setup({ monitor: failing });

    const summary = engine.run(simpleScenario());

    expect(summary.eventsApplied).toBe(6);
    expect(dispatcher.getRider('r1').status).toBe(RiderStatus.SATISFIED);
  });
});
