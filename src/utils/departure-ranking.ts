/**
 * Departure ranking
 *
 * Orders departures by the time a passenger should expect them to leave:
 * the real-time estimate when upstream has one, the schedule otherwise.
 */

import type { Departure } from '../types/departures.js';

export type RankingKey = (departure: Departure) => number;

/**
 * Effective departure time in epoch milliseconds
 */
export const effectiveTime: RankingKey = (departure) =>
  (departure.estimated ?? departure.scheduled).getTime();

/**
 * Sort departures ascending by key and keep the first n
 *
 * Stable: departures with equal keys keep their input order.
 * The input array is left untouched.
 *
 * @param departures - Normalized departures in upstream order
 * @param n - Maximum number of departures to return; n <= 0 returns none
 * @param key - Sort key, effective time by default
 */
export function rankDepartures(
  departures: readonly Departure[],
  n: number,
  key: RankingKey = effectiveTime
): Departure[] {
  if (n <= 0) {
    return [];
  }

  return departures
    .map((departure, index) => ({ departure, index, time: key(departure) }))
    .sort((a, b) => a.time - b.time || a.index - b.index)
    .slice(0, n)
    .map(({ departure }) => departure);
}
