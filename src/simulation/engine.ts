// ============================================
// RIDESIM - Simulation Engine
// ============================================

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import type { ActivityMonitor } from '../models/types.js';
import { InvariantViolationError } from '../errors.js';
import { OrderedQueue } from './ordered-queue.js';
import { formatLocation } from './location.js';
import { applyEvent, describeEvent, type Notify, type SimulationEvent } from './events.js';
import type { Dispatcher } from './dispatcher.js';

/** Returned by `step()` once the event queue is drained */
export const SimulationComplete = Symbol('SimulationComplete');

export type StepResult = SimulationEvent | typeof SimulationComplete;

export interface SimulationEngineOptions {
  /** Events later than this tick are discarded */
  endTime?: number;
  logger?: Logger;
}

export interface SimulationSummary {
  eventsApplied: number;
  finalTime: number;
  discarded: number;
}

/**
 * Drains a global event queue in timestamp order, FIFO among equal
 * timestamps, feeding every follow-up event back into the queue.
 *
 * Emits:
 * - `event_applied` (event, followUps)
 * - `horizon_reached` (endTime, discardedCount)
 * - `completed` (summary)
 */
export class SimulationEngine extends EventEmitter {
  private queue = new OrderedQueue<SimulationEvent>((event) => event.timestamp);
  private currentTime = 0;
  private eventsApplied = 0;
  private readonly endTime?: number;
  private readonly logger?: Logger;
  private readonly notify: Notify;

  constructor(
    private dispatcher: Dispatcher,
    private monitor: ActivityMonitor,
    options: SimulationEngineOptions = {}
  ) {
    super();
    this.endTime = options.endTime;
    this.logger = options.logger;
    this.notify = (timestamp, category, kind, id, location) => {
      try {
        this.monitor.notify(timestamp, category, kind, id, location);
      } catch (err) {
        this.logger?.error(
          { err, timestamp, category, kind, id, location: formatLocation(location) },
          'Failed to record simulation activity'
        );
      }
    };
  }

  getCurrentTime(): number {
    return this.currentTime;
  }

  getPendingCount(): number {
    return this.queue.size;
  }

  schedule(events: Iterable<SimulationEvent>): void {
    for (const event of events) {
      if (!Number.isInteger(event.timestamp) || event.timestamp < 0) {
        throw new InvariantViolationError(`Event timestamp must be a non-negative integer, got ${event.timestamp}`);
      }
      this.queue.push(event);
    }
  }

  /**
   * Apply the earliest pending event and queue its follow-ups.
   */
  step(): StepResult {
    if (this.queue.isEmpty()) {
      return SimulationComplete;
    }

    const event = this.queue.pop();
    this.currentTime = event.timestamp;

    const followUps = applyEvent(event, { dispatcher: this.dispatcher, notify: this.notify });
    for (const next of followUps) {
      if (next.timestamp < event.timestamp) {
        throw new InvariantViolationError(
          `${describeEvent(event)} scheduled ${next.kind} in the past (t=${next.timestamp})`
        );
      }
    }
    this.schedule(followUps);
    this.eventsApplied++;

    this.logger?.debug({ followUps: followUps.length }, describeEvent(event));
    this.emit('event_applied', event, followUps);
    return event;
  }

  /**
   * Run until the queue drains or the next event falls past the end time.
   */
  run(seedEvents: Iterable<SimulationEvent> = []): SimulationSummary {
    this.schedule(seedEvents);
    this.logger?.info({ pending: this.queue.size, endTime: this.endTime }, 'Simulation started');

    let discarded = 0;
    while (true) {
      const next = this.queue.peek();
      if (this.endTime !== undefined && next !== undefined && next.timestamp > this.endTime) {
        discarded = this.queue.size;
        this.queue.clear();
        this.logger?.info({ endTime: this.endTime, discarded }, 'Simulation horizon reached');
        this.emit('horizon_reached', this.endTime, discarded);
        break;
      }
      if (this.step() === SimulationComplete) {
        break;
      }
    }

    const summary: SimulationSummary = {
      eventsApplied: this.eventsApplied,
      finalTime: this.currentTime,
      discarded,
    };
    this.logger?.info(summary, 'Simulation completed');
    this.emit('completed', summary);
    return summary;
  }
}
