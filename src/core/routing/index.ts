/**
 * Routing Module - Barrel Export
 */

export {
  PersonRouter,
  type PersonRouterDependencies,
  type RoutingSummary,
} from './person-router';
export { PersonLocks } from './person-locks';
export { RouteSchedule } from './route-schedule';
