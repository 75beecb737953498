// ============================================
// RIDESIM - Simulation Defaults
// ============================================

import type { TravelTimeRounding, WaitlistOrder } from '../models/types.js';

export const DEFAULT_TRAVEL_TIME_ROUNDING: TravelTimeRounding = 'truncate';

// Riders are served in the order they asked for a ride
export const DEFAULT_WAITLIST_ORDER: WaitlistOrder = 'arrival';

export const SCENARIO_COMMENT_PREFIX = '#';

export const REPORT_PRECISION = 2;
