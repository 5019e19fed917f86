import type {
  StatusCondition,
  StatusRecord,
  StatusVerdict,
} from "@routegraph/types";

export const ORPHANED_REASON = "Orphaned";

export type LedgerDocument = {
  readonly key: string;
  readonly revision: number;
  /** Kind label used in the orphaned message, such as `proxy`. */
  readonly kind?: string;
};

type LedgerEntry = {
  readonly condition: StatusCondition;
  readonly origin?: string;
};

/**
 * Collects the findings of one rebuild, keyed by document. Findings can be
 * tagged with the root whose traversal produced them so that they can be
 * withdrawn when that root is rejected later in the pipeline.
 */
export type StatusLedger = {
  addCondition(key: string, condition: StatusCondition, origin?: string): void;
  discardOrigin(origin: string): void;
  markOrphaned(key: string): void;
  setVirtualHost(key: string, hostname: string): void;
  conditionsFor(key: string): readonly StatusCondition[];
  hasErrors(key: string): boolean;
  toRecords(documents: readonly LedgerDocument[]): StatusRecord[];
};

const conditionKey = (condition: StatusCondition): string =>
  `${condition.level}|${condition.subject}|${condition.reason}|${condition.message}`;

export const deriveVerdict = (
  conditions: readonly StatusCondition[],
  orphaned: boolean
): StatusVerdict => {
  if (orphaned) {
    return "orphaned";
  }
  if (conditions.some((condition) => condition.level === "error")) {
    return "invalid";
  }
  if (conditions.some((condition) => condition.level === "warning")) {
    return "valid-with-warnings";
  }
  return "valid";
};

const orphanedCondition = (kind: string): StatusCondition => ({
  level: "warning",
  subject: "orphan",
  reason: ORPHANED_REASON,
  message: `this ${kind} is not part of a delegation chain from a root ${kind}`,
});

export const createStatusLedger = (): StatusLedger => {
  const entries = new Map<string, LedgerEntry[]>();
  const orphans = new Set<string>();
  const virtualHosts = new Map<string, string>();

  const conditionsFor = (key: string): StatusCondition[] => {
    const seen = new Set<string>();
    const conditions: StatusCondition[] = [];
    for (const { condition } of entries.get(key) ?? []) {
      const identity = conditionKey(condition);
      if (!seen.has(identity)) {
        seen.add(identity);
        conditions.push(condition);
      }
    }
    return conditions;
  };

  return {
    addCondition: (key, condition, origin) => {
      const list = entries.get(key) ?? [];
      list.push(origin === undefined ? { condition } : { condition, origin });
      entries.set(key, list);
    },
    discardOrigin: (origin) => {
      for (const [key, list] of entries) {
        entries.set(
          key,
          list.filter((entry) => entry.origin !== origin)
        );
      }
    },
    markOrphaned: (key) => {
      orphans.add(key);
    },
    setVirtualHost: (key, hostname) => {
      virtualHosts.set(key, hostname);
    },
    conditionsFor,
    hasErrors: (key) =>
      conditionsFor(key).some((condition) => condition.level === "error"),
    toRecords: (documents) =>
      documents.map((document) => {
        const orphaned = orphans.has(document.key);
        const conditions = conditionsFor(document.key);
        if (orphaned) {
          conditions.push(orphanedCondition(document.kind ?? "proxy"));
        }
        const vhost = virtualHosts.get(document.key);
        return {
          key: document.key,
          observedRevision: document.revision,
          verdict: deriveVerdict(conditions, orphaned),
          ...(vhost === undefined ? {} : { vhost }),
          conditions,
        };
      }),
  };
};
