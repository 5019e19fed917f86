import type { ProtocolClass, TlsDescriptor } from "@routegraph/types";

import { listenerName, mapListenerPort, validateHostname } from "./ports";

/** Catch-all virtual host name used for requests without a hostname. */
export const CATCH_ALL_HOSTNAME = "*";

export type ListenerRequest = {
  /** Unique within one merge; lets callers map results back. */
  readonly id: string;
  /** Document key of the configuration source making the request. */
  readonly source: string;
  readonly createdAt: string;
  readonly protocol: ProtocolClass;
  readonly port: number;
  readonly hostname?: string;
  readonly tls?: TlsDescriptor;
  /** All requests of an atomic source are admitted together or not at all. */
  readonly atomic: boolean;
  /** Mergeable requests share a virtual host with an equal request. */
  readonly mergeable: boolean;
};

export type ListenerConflictReason =
  | "PortInvalid"
  | "HostnameInvalid"
  | "PortCollision"
  | "ProtocolConflict"
  | "HostnameConflict"
  | "TLSConflict";

export type ListenerRejection = {
  readonly request: ListenerRequest;
  readonly reason: ListenerConflictReason;
  readonly message: string;
  /** Source that kept the contested slot, for cross-source conflicts. */
  readonly winner?: string;
};

export type MergedVirtualHost = {
  readonly hostname: string;
  readonly port: number;
  readonly tls?: TlsDescriptor;
  readonly requests: readonly ListenerRequest[];
};

export type MergedListener = {
  readonly name: string;
  readonly protocol: ProtocolClass;
  readonly port: number;
  readonly internalPort: number;
  readonly virtualHosts: readonly MergedVirtualHost[];
};

export type ListenerMergeResult = {
  readonly listeners: readonly MergedListener[];
  readonly admitted: readonly ListenerRequest[];
  readonly rejections: readonly ListenerRejection[];
};

type Candidate = {
  readonly request: ListenerRequest;
  readonly internalPort: number;
  readonly host: string;
};

type Conflict = {
  readonly reason: ListenerConflictReason;
  readonly message: string;
};

type SourceState = {
  readonly key: string;
  readonly createdAt: string;
  readonly atomic: boolean;
  readonly candidates: Candidate[];
  failure?: Conflict;
};

const compareStrings = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/** Orders creation timestamps chronologically, falling back to text order. */
export const compareTimestamps = (left: string, right: string): number => {
  const leftTime = Date.parse(left);
  const rightTime = Date.parse(right);
  if (Number.isNaN(leftTime) || Number.isNaN(rightTime)) {
    return compareStrings(left, right);
  }
  return leftTime - rightTime;
};

export const tlsEqual = (
  left: TlsDescriptor | undefined,
  right: TlsDescriptor | undefined
): boolean =>
  left === undefined || right === undefined
    ? left === right
    : left.secret === right.secret &&
      left.minimumProtocolVersion === right.minimumProtocolVersion &&
      left.maximumProtocolVersion === right.maximumProtocolVersion;

const findConflict = (
  candidate: Candidate,
  other: Candidate,
  winner?: string
): Conflict | undefined => {
  if (candidate.internalPort !== other.internalPort) {
    return;
  }
  const { port } = candidate.request;

  if (port !== other.request.port) {
    return {
      reason: "PortCollision",
      message: winner
        ? `port ${port} maps to internal port ${candidate.internalPort}, already used by port ${other.request.port} of ${winner}`
        : `ports ${port} and ${other.request.port} map to the same internal port ${candidate.internalPort}`,
    };
  }
  if (candidate.request.protocol !== other.request.protocol) {
    return {
      reason: "ProtocolConflict",
      message: winner
        ? `port ${port} is already served as ${other.request.protocol} by ${winner}`
        : "All Listener protocols for a given port must be compatible",
    };
  }
  if (candidate.host !== other.host) {
    return;
  }

  const sameTls = tlsEqual(candidate.request.tls, other.request.tls);
  if (
    winner &&
    sameTls &&
    candidate.request.mergeable &&
    other.request.mergeable
  ) {
    return;
  }
  if (!sameTls) {
    return {
      reason: "TLSConflict",
      message: winner
        ? `hostname ${candidate.host} on port ${port} is already claimed by ${winner} with a different TLS configuration`
        : `hostname ${candidate.host} on port ${port} is declared twice with different TLS configurations`,
    };
  }
  return {
    reason: "HostnameConflict",
    message: winner
      ? `hostname ${candidate.host} on port ${port} is already claimed by ${winner}`
      : "All Listener hostnames for a given port must be unique",
  };
};

const collectSources = (
  requests: readonly ListenerRequest[],
  reject: (request: ListenerRequest, conflict: Conflict) => void
): SourceState[] => {
  const sources = new Map<string, SourceState>();

  for (const request of requests) {
    let source = sources.get(request.source);
    if (!source) {
      source = {
        key: request.source,
        createdAt: request.createdAt,
        atomic: request.atomic,
        candidates: [],
      };
      sources.set(request.source, source);
    }

    const mapped = mapListenerPort(request.port);
    if (!mapped.ok) {
      const conflict: Conflict = { reason: "PortInvalid", message: mapped.error };
      reject(request, conflict);
      source.failure ??= conflict;
      continue;
    }
    if (request.hostname !== undefined) {
      const problem = validateHostname(request.hostname);
      if (problem) {
        const conflict: Conflict = { reason: "HostnameInvalid", message: problem };
        reject(request, conflict);
        source.failure ??= conflict;
        continue;
      }
    }
    source.candidates.push({
      request,
      internalPort: mapped.value,
      host: request.hostname ?? CATCH_ALL_HOSTNAME,
    });
  }

  return [...sources.values()].sort(
    (left, right) =>
      compareTimestamps(left.createdAt, right.createdAt) ||
      compareStrings(left.key, right.key)
  );
};

/** Rejects every member of a same-source conflict; returns the survivors. */
const dropSelfConflicts = (
  source: SourceState,
  reject: (request: ListenerRequest, conflict: Conflict) => void
): Candidate[] => {
  const conflicts = new Map<Candidate, Conflict>();
  for (const [index, candidate] of source.candidates.entries()) {
    for (const other of source.candidates.slice(index + 1)) {
      const conflict = findConflict(candidate, other);
      if (conflict) {
        if (!conflicts.has(candidate)) {
          conflicts.set(candidate, conflict);
        }
        if (!conflicts.has(other)) {
          conflicts.set(other, conflict);
        }
      }
    }
  }

  for (const [candidate, conflict] of conflicts) {
    reject(candidate.request, conflict);
    source.failure ??= conflict;
  }
  return source.candidates.filter((candidate) => !conflicts.has(candidate));
};

const buildListeners = (admitted: readonly Candidate[]): MergedListener[] => {
  const byPort = new Map<number, Candidate[]>();
  for (const candidate of admitted) {
    const group = byPort.get(candidate.internalPort) ?? [];
    group.push(candidate);
    byPort.set(candidate.internalPort, group);
  }

  return [...byPort.entries()]
    .sort(([left], [right]) => left - right)
    .flatMap(([internalPort, group]) => {
      const [first] = group;
      if (!first) {
        return [];
      }
      const hosts = new Map<string, { tls?: TlsDescriptor; requests: ListenerRequest[] }>();
      for (const candidate of group) {
        const host = hosts.get(candidate.host);
        if (host) {
          host.requests.push(candidate.request);
        } else {
          hosts.set(candidate.host, {
            ...(candidate.request.tls ? { tls: candidate.request.tls } : {}),
            requests: [candidate.request],
          });
        }
      }

      return [
        {
          name: listenerName(first.request.protocol, first.request.port),
          protocol: first.request.protocol,
          port: first.request.port,
          internalPort,
          virtualHosts: [...hosts.entries()].map(([hostname, host]) => ({
            hostname,
            port: first.request.port,
            ...host,
          })),
        },
      ];
    });
};

/**
 * Groups listener requests from every configuration source onto internal
 * ports. Sources are admitted oldest first; a request that collides with an
 * admitted one is rejected and the rejection names the source that won.
 */
export const mergeListeners = (
  requests: readonly ListenerRequest[]
): ListenerMergeResult => {
  const rejections: ListenerRejection[] = [];
  const reject = (
    request: ListenerRequest,
    conflict: Conflict,
    winner?: string
  ) => {
    rejections.push({ request, ...conflict, ...(winner ? { winner } : {}) });
  };

  const admitted: Candidate[] = [];

  for (const source of collectSources(requests, reject)) {
    const survivors = dropSelfConflicts(source, reject);

    const contested: { candidate: Candidate; conflict: Conflict; winner: string }[] = [];
    for (const candidate of survivors) {
      for (const other of admitted) {
        const winner = other.request.source;
        const conflict = findConflict(candidate, other, winner);
        if (conflict) {
          contested.push({ candidate, conflict, winner });
          break;
        }
      }
    }

    for (const { candidate, conflict, winner } of contested) {
      reject(candidate.request, conflict, winner);
    }

    const rejected = new Set(contested.map((entry) => entry.candidate));
    const first = contested[0];
    const failure = source.failure ?? first?.conflict;
    if (source.atomic && failure) {
      const winner = source.failure ? undefined : first?.winner;
      for (const candidate of survivors) {
        if (!rejected.has(candidate)) {
          reject(candidate.request, failure, winner);
        }
      }
      continue;
    }

    admitted.push(...survivors.filter((candidate) => !rejected.has(candidate)));
  }

  return {
    listeners: buildListeners(admitted),
    admitted: admitted.map((candidate) => candidate.request),
    rejections,
  };
};
