// ============================================
// RIDESIM - Error Types
// ============================================

export class SimulationError extends Error {
  constructor(
    message: string,
    public code: string = 'SIMULATION_ERROR'
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

export class EmptyQueueError extends SimulationError {
  constructor() {
    super('Cannot pop from an empty queue', 'EMPTY_QUEUE');
    this.name = 'EmptyQueueError';
  }
}

export class UnknownEventTypeError extends SimulationError {
  constructor(
    public eventType: string,
    public line?: number
  ) {
    super(
      line !== undefined
        ? `Unknown event type '${eventType}' on line ${line}`
        : `Unknown event type '${eventType}'`,
      'UNKNOWN_EVENT_TYPE'
    );
    this.name = 'UnknownEventTypeError';
  }
}

export class ScenarioParseError extends SimulationError {
  constructor(
    message: string,
    public line: number,
    public details?: unknown
  ) {
    super(`Line ${line}: ${message}`, 'SCENARIO_PARSE_ERROR');
    this.name = 'ScenarioParseError';
  }
}

export class InvalidStateTransitionError extends SimulationError {
  constructor(entity: string, id: string, reason: string) {
    super(`${entity} '${id}': ${reason}`, 'INVALID_STATE_TRANSITION');
    this.name = 'InvalidStateTransitionError';
  }
}

export class InvariantViolationError extends SimulationError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

export class UnknownEntityError extends SimulationError {
  constructor(entity: string, id: string) {
    super(`${entity} with ID '${id}' not found`, 'UNKNOWN_ENTITY');
    this.name = 'UnknownEntityError';
  }
}
