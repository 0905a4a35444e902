/**
 * GraphQL query for the next departures of every stop matching a name
 *
 * The stop name is substituted as-is. A name that breaks the query syntax
 * is reported back by the transit API as a GraphQL error.
 */

const STOP_DEPARTURES_QUERY = `{
  stops(name: "{{stopName}}") {
    stoptimesWithoutPatterns(numberOfDepartures: {{count}}) {
      stop {name code}
      serviceDay
      scheduledDeparture
      realtimeDeparture
      trip {route {shortName}}
      headsign
    }
  }
}`;

export function buildStopDeparturesQuery(stopName: string, count: number): string {
  // Replacer functions keep "$" sequences in the stop name literal
  return STOP_DEPARTURES_QUERY
    .replace('{{stopName}}', () => stopName)
    .replace('{{count}}', () => String(count));
}
