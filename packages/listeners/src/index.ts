export {
  CATCH_ALL_HOSTNAME,
  compareTimestamps,
  type ListenerConflictReason,
  type ListenerMergeResult,
  type ListenerRejection,
  type ListenerRequest,
  type MergedListener,
  type MergedVirtualHost,
  mergeListeners,
  tlsEqual,
} from "./merge";
export {
  isWildcardHostname,
  listenerName,
  mapListenerPort,
  validateHostname,
} from "./ports";
