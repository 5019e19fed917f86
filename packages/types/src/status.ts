export type ConditionLevel = "error" | "warning";

export type ConditionSubject =
  | "document"
  | "virtualhost"
  | "tls"
  | "include"
  | "delegation"
  | "route"
  | "service"
  | "listener"
  | "parent"
  | "orphan";

export type StatusCondition = {
  readonly level: ConditionLevel;
  readonly subject: ConditionSubject;
  readonly reason: string;
  readonly message: string;
};

export type StatusVerdict =
  | "valid"
  | "valid-with-warnings"
  | "invalid"
  | "orphaned";

export type StatusRecord = {
  readonly key: string;
  readonly observedRevision: number;
  readonly verdict: StatusVerdict;
  readonly vhost?: string;
  readonly conditions: readonly StatusCondition[];
};

/**
 * Receives status records from the builder. Implementations must accept
 * repeated upserts of the same record.
 */
export type StatusSink = {
  upsert(key: string, record: StatusRecord): Promise<void>;
};

export const createError = (
  subject: ConditionSubject,
  reason: string,
  message: string
): StatusCondition => ({ level: "error", subject, reason, message });

export const createWarning = (
  subject: ConditionSubject,
  reason: string,
  message: string
): StatusCondition => ({ level: "warning", subject, reason, message });
