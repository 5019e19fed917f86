/**
 * Shared contracts for the routegraph toolchain.
 *
 * Every pipeline stage depends on these types instead of on each other, so a
 * stage can be tested against hand-built inputs.
 */

import type { JsonValue, ReadonlyDeep } from "type-fest";
import type {
  ResolvedService,
  ServiceReference,
  ServiceResolutionError,
} from "./collaborators";
import type { DocumentKind, RawDocument } from "./documents";

export type DocumentKey = {
  readonly kind: DocumentKind | (string & {});
  readonly namespace: string;
  readonly name: string;
};

export const formatDocumentKey = (key: DocumentKey): string =>
  `${key.kind}/${key.namespace}/${key.name}`;

export const documentKeyOf = (document: RawDocument): string =>
  formatDocumentKey({
    kind: document.kind,
    namespace: document.metadata.namespace,
    name: document.metadata.name,
  });

export const parseDocumentKey = (value: string): DocumentKey | undefined => {
  const segments = value.split("/");
  if (segments.length !== 3 || segments.some((segment) => segment === "")) {
    return;
  }
  const [kind, namespace, name] = segments;
  return { kind, namespace, name };
};

/** `namespace/name` form used in human-facing messages. */
export const formatNamespacedName = (namespace: string, name: string): string =>
  `${namespace}/${name}`;

const freezeArray = <TValue>(values?: readonly TValue[]): readonly TValue[] =>
  Object.freeze([...(values ?? [])]);

export type ResultOk<TValue> = {
  readonly ok: true;
  readonly value: TValue;
};

export type ResultErr<TError = GraphError> = {
  readonly ok: false;
  readonly error: TError;
};

export type Result<TValue, TError = GraphError> =
  | ResultOk<TValue>
  | ResultErr<TError>;

export const createResultOk = <TValue>(value: TValue): ResultOk<TValue> => ({
  ok: true as const,
  value,
});

export const createResultErr = <TError>(error: TError): ResultErr<TError> => ({
  ok: false as const,
  error,
});

export const isResultOk = <TValue, TError>(
  result: Result<TValue, TError>
): result is ResultOk<TValue> => result.ok === true;

export const isResultErr = <TValue, TError>(
  result: Result<TValue, TError>
): result is ResultErr<TError> => result.ok === false;

export const GRAPH_ERROR_CODES = [
  "STORE_UNAVAILABLE",
  "STATUS_SINK_UNAVAILABLE",
  "CONFIG_NOT_FOUND",
  "CONFIG_INVALID",
  "INTERNAL_ERROR",
] as const;

export type GraphErrorCode = (typeof GRAPH_ERROR_CODES)[number];

export type GraphError<TDetails = JsonValue> = ReadonlyDeep<{
  readonly code: GraphErrorCode;
  readonly message: string;
  readonly details?: TDetails;
  readonly issues?: readonly string[];
  readonly cause?: unknown;
  readonly help?: string;
}>;

export type GraphErrorInput<TDetails = JsonValue> = {
  readonly code: GraphErrorCode;
  readonly message: string;
  readonly details?: TDetails;
  readonly issues?: readonly string[];
  readonly cause?: unknown;
  readonly help?: string;
};

export const createGraphError = <TDetails = JsonValue>(
  input: GraphErrorInput<TDetails>
): GraphError<TDetails> => {
  const { details, issues, ...rest } = input;

  return Object.freeze({
    ...rest,
    ...(details === undefined ? {} : { details }),
    ...(issues === undefined ? {} : { issues: freezeArray(issues) }),
  }) as GraphError<TDetails>;
};

export const isGraphError = (value: unknown): value is GraphError => {
  if (!value || typeof value !== "object") {
    return false;
  }
  if (!("code" in value && "message" in value)) {
    return false;
  }
  const { code, message } = value;
  return (
    typeof code === "string" &&
    GRAPH_ERROR_CODES.some((known) => known === code) &&
    typeof message === "string"
  );
};

export type LogMetadata = {
  document?: string;
  generation?: number;
  [key: string]: unknown;
};

export type Logger = {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string | Error, metadata?: LogMetadata): void;
};

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type ServiceResolver = {
  resolve(
    reference: ServiceReference
  ): Result<ResolvedService, ServiceResolutionError>;
};

/**
 * Freezes a value and everything reachable from it. Already frozen objects
 * are left alone.
 */
export const deepFreeze = <TValue>(value: TValue): TValue => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export type RetryOptions = {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
};

/** Exponential backoff: `initialDelayMs * 2^attempt`, capped at `maxDelayMs`. */
export const computeBackoffDelay = (
  attempt: number,
  options: RetryOptions
): number =>
  Math.min(
    options.initialDelayMs * 2 ** Math.max(0, attempt),
    options.maxDelayMs
  );

export * from "./collaborators";
export * from "./config";
export * from "./documents";
export * from "./graph";
export * from "./status";
