// ============================================
// RIDESIM - Simulation Setup
// ============================================

import { env } from './config/env.js';
import { REPORT_PRECISION } from './config/simulation.js';
import type { SimulationReport, TravelTimeRounding, WaitlistOrder } from './models/types.js';
import { Dispatcher } from './simulation/dispatcher.js';
import { Monitor } from './simulation/monitor.js';
import { SimulationEngine, type SimulationSummary } from './simulation/engine.js';
import type { SimulationEvent } from './simulation/events.js';
import { ScenarioService } from './services/scenario.service.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

export interface AppOptions {
  endTime?: number;
  rounding?: TravelTimeRounding;
  waitlistOrder?: WaitlistOrder;
  logger?: Logger;
}

export interface Simulation {
  engine: SimulationEngine;
  dispatcher: Dispatcher;
  monitor: Monitor;
  scenarios: ScenarioService;
}

export interface SimulationResult {
  summary: SimulationSummary;
  report: SimulationReport;
}

export function buildSimulation(options: AppOptions = {}): Simulation {
  const logger = options.logger ?? defaultLogger;
  const dispatcher = new Dispatcher({ waitlistOrder: options.waitlistOrder ?? env.WAITLIST_ORDER });
  const monitor = new Monitor();
  const engine = new SimulationEngine(dispatcher, monitor, {
    endTime: options.endTime ?? env.SIM_END_TIME,
    logger,
  });
  const scenarios = new ScenarioService({ rounding: options.rounding ?? env.TRAVEL_TIME_ROUNDING });

  return { engine, dispatcher, monitor, scenarios };
}

export function runEvents(seedEvents: SimulationEvent[], options: AppOptions = {}): SimulationResult {
  const { engine, monitor } = buildSimulation(options);
  const summary = engine.run(seedEvents);
  return { summary, report: monitor.report() };
}

export async function runScenario(filePath: string, options: AppOptions = {}): Promise<SimulationResult> {
  const { engine, monitor, scenarios } = buildSimulation(options);
  const seedEvents = await scenarios.load(filePath);
  const summary = engine.run(seedEvents);
  return { summary, report: monitor.report() };
}

export function formatReport(report: SimulationReport): Record<string, number> {
  const round = (value: number) => Number(value.toFixed(REPORT_PRECISION));
  return {
    rider_wait_time: round(report.riderWaitTime),
    driver_total_distance: round(report.driverTotalDistance),
    driver_ride_distance: round(report.driverRideDistance),
  };
}
