/**
 * Relay Module Exports
 */

export { validateStation, isStationId } from './validator.js';
export {
  UpstreamClient,
  DEFAULT_UPSTREAM_CONFIG,
  isUnusableBody,
  type FetchFunction,
  type UpstreamConfig,
} from './upstream-client.js';
export { respond, failureMessage, STATUS_BY_FAILURE } from './responder.js';
export {
  ReportRelay,
  systemClock,
  type Clock,
  type ReportRelayDeps,
  type RelayStats,
} from './report-relay.js';
