export {
  createStatusLedger,
  deriveVerdict,
  type LedgerDocument,
  ORPHANED_REASON,
  type StatusLedger,
} from "./ledger";
export {
  createInMemoryStatusSink,
  type InMemoryStatusSink,
} from "./memory-sink";
export {
  createStatusPublisher,
  type PublishSummary,
  type StatusPublisher,
  type StatusPublisherOptions,
} from "./publisher";
