// ============================================
// RIDESIM - Scenario Service
// ============================================

import fs from 'fs/promises';
import type { ZodError } from 'zod';
import type { TravelTimeRounding } from '../models/types.js';
import { DEFAULT_TRAVEL_TIME_ROUNDING, SCENARIO_COMMENT_PREFIX } from '../config/simulation.js';
import { ScenarioParseError, UnknownEventTypeError } from '../errors.js';
import {
  SCENARIO_EVENT_TYPES,
  driverDirectiveSchema,
  riderDirectiveSchema,
  type ScenarioEventType,
} from '../schemas/scenario.schema.js';
import { Driver } from '../simulation/driver.js';
import { Rider } from '../simulation/rider.js';
import { driverRequest, riderRequest, type SimulationEvent } from '../simulation/events.js';

export interface ScenarioServiceOptions {
  rounding?: TravelTimeRounding;
}

function isScenarioEventType(value: string): value is ScenarioEventType {
  return SCENARIO_EVENT_TYPES.some((type) => type === value);
}

function issueDetails(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Turns a scenario file into the seed events of a simulation.
 *
 * One directive per line, whitespace separated. Blank lines and lines
 * starting with `#` are skipped:
 *
 *   0 DriverRequest alder 1,1 1
 *   10 RiderRequest birch 4,2 1,5 15
 */
export class ScenarioService {
  private rounding: TravelTimeRounding;

  constructor(options: ScenarioServiceOptions = {}) {
    this.rounding = options.rounding ?? DEFAULT_TRAVEL_TIME_ROUNDING;
  }

  async load(filePath: string): Promise<SimulationEvent[]> {
    const text = await fs.readFile(filePath, 'utf-8');
    return this.parse(text);
  }

  parse(text: string): SimulationEvent[] {
    const events: SimulationEvent[] = [];
    const riderLines = new Map<string, number>();
    const lines = text.split(/\r?\n/);

    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (!line || line.startsWith(SCENARIO_COMMENT_PREFIX)) return;

      const lineNumber = index + 1;
      const event = this.parseDirective(line.split(/\s+/), lineNumber);
      // Riders are looked up by ID for the rest of the run
      if (event.kind === 'RiderRequest') {
        const firstLine = riderLines.get(event.rider.id);
        if (firstLine !== undefined) {
          throw new ScenarioParseError(
            `Rider ID '${event.rider.id}' already requested on line ${firstLine}`,
            lineNumber
          );
        }
        riderLines.set(event.rider.id, lineNumber);
      }
      events.push(event);
    });

    return events;
  }

  private parseDirective(tokens: string[], lineNumber: number): SimulationEvent {
    const eventType = tokens[1] ?? '';
    if (!isScenarioEventType(eventType)) {
      throw new UnknownEventTypeError(eventType, lineNumber);
    }

    switch (eventType) {
      case 'DriverRequest': {
        const result = driverDirectiveSchema.safeParse(tokens);
        if (!result.success) {
          throw new ScenarioParseError('Invalid DriverRequest directive', lineNumber, issueDetails(result.error));
        }
        const [timestamp, , id, location, speed] = result.data;
        return driverRequest(timestamp, new Driver(id, location, speed, this.rounding));
      }
      case 'RiderRequest': {
        const result = riderDirectiveSchema.safeParse(tokens);
        if (!result.success) {
          throw new ScenarioParseError('Invalid RiderRequest directive', lineNumber, issueDetails(result.error));
        }
        const [timestamp, , id, origin, destination, patience] = result.data;
        return riderRequest(timestamp, new Rider(id, origin, destination, patience, timestamp));
      }
    }
  }
}
