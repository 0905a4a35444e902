/**
 * Departure types returned by the /departures endpoint
 */

export interface DepartureQuery {
  readonly stopName: string;
  readonly count: number;
}

export interface Departure {
  readonly stop: string; // "<code> <name>", e.g. "H3030 Malmin asema"
  readonly line: string; // Route short name
  readonly destination: string | null; // Headsign, null when upstream has none
  readonly scheduled: Date;
  readonly estimated: Date | null; // null when upstream has no real-time data
}

export interface DepartureList {
  readonly departures: readonly Departure[];
  readonly generated_at: Date;
}
