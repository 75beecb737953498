// ============================================
// RIDESIM - Grid Locations
// ============================================

import type { Location } from '../models/types.js';

const LOCATION_PATTERN = /^(-?\d+),(-?\d+)$/;

export function createLocation(row: number, column: number): Location {
  return { row, column };
}

export function locationsEqual(a: Location, b: Location): boolean {
  return a.row === b.row && a.column === b.column;
}

/**
 * Manhattan distance between two grid locations
 */
export function manhattanDistance(origin: Location, destination: Location): number {
  return Math.abs(destination.row - origin.row) + Math.abs(destination.column - origin.column);
}

/**
 * Parse a location written as `row,col`. Returns null when the text is not
 * two comma-separated integers.
 */
export function parseLocation(text: string): Location | null {
  const match = LOCATION_PATTERN.exec(text.trim());
  if (!match) return null;
  return createLocation(Number(match[1]), Number(match[2]));
}

export function formatLocation(location: Location): string {
  return `${location.row},${location.column}`;
}
