import {
  createResultErr,
  createResultOk,
  type HeadersPolicySpec,
  type HeadersRewrite,
  type Result,
  type RouteSpec,
  type TimeoutSetting,
} from "@routegraph/types";

const DEFAULT_TIMEOUT: TimeoutSetting = { kind: "default" };
const DISABLED_TIMEOUT: TimeoutSetting = { kind: "disabled" };

const DURATION_UNITS: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/** Parses durations such as `30s`, `1m30s` or `250ms` into milliseconds. */
export const parseDuration = (value: string): Result<number, string> => {
  if (value === "0") {
    return createResultOk(0);
  }
  if (value === "") {
    return createResultErr('invalid duration ""');
  }

  let total = 0;
  DURATION_PART.lastIndex = 0;
  while (DURATION_PART.lastIndex < value.length) {
    const match = DURATION_PART.exec(value);
    const amount = match?.[1];
    const unit = match?.[2];
    if (amount === undefined || unit === undefined) {
      return createResultErr(`invalid duration "${value}"`);
    }
    total += Number(amount) * (DURATION_UNITS[unit] ?? 0);
  }
  return createResultOk(Math.round(total));
};

/**
 * Empty or missing values keep the default; `infinity` and `infinite` turn
 * the timeout off.
 */
export const parseTimeout = (
  value: string | undefined
): Result<TimeoutSetting, string> => {
  if (value === undefined || value === "") {
    return createResultOk(DEFAULT_TIMEOUT);
  }
  if (value === "infinity" || value === "infinite") {
    return createResultOk(DISABLED_TIMEOUT);
  }
  const parsed = parseDuration(value);
  return parsed.ok
    ? createResultOk<TimeoutSetting>({
        kind: "value",
        milliseconds: parsed.value,
      })
    : parsed;
};

export type PolicyWarning = {
  readonly reason: string;
  readonly message: string;
};

export type TimeoutPolicy = {
  readonly responseTimeout: TimeoutSetting;
  readonly idleTimeout: TimeoutSetting;
};

export const buildTimeoutPolicy = (
  spec: RouteSpec["timeoutPolicy"]
): Result<TimeoutPolicy, PolicyWarning> => {
  const response = parseTimeout(spec?.response);
  if (!response.ok) {
    return createResultErr({
      reason: "TimeoutPolicyNotValid",
      message: `route.timeoutPolicy failed to parse: error parsing response timeout: ${response.error}`,
    });
  }
  const idle = parseTimeout(spec?.idle);
  if (!idle.ok) {
    return createResultErr({
      reason: "TimeoutPolicyNotValid",
      message: `route.timeoutPolicy failed to parse: error parsing idle timeout: ${idle.error}`,
    });
  }
  return createResultOk({
    responseTimeout: response.value,
    idleTimeout: idle.value,
  });
};

export type RetryPolicy = {
  readonly count: number;
  readonly perTryTimeout: TimeoutSetting;
};

export const buildRetryPolicy = (
  spec: RouteSpec["retryPolicy"]
): Result<RetryPolicy | undefined, PolicyWarning> => {
  if (!spec) {
    return createResultOk(undefined);
  }
  const count = spec.count ?? 1;
  if (!Number.isInteger(count) || count < 0) {
    return createResultErr({
      reason: "RetryPolicyNotValid",
      message: `route.retryPolicy.count must be a non-negative integer, ${count} was supplied`,
    });
  }
  const perTry =
    spec.perTryTimeout === undefined
      ? undefined
      : parseDuration(spec.perTryTimeout);
  if (perTry && !perTry.ok) {
    return createResultErr({
      reason: "RetryPolicyNotValid",
      message: `route.retryPolicy.perTryTimeout failed to parse: ${perTry.error}`,
    });
  }
  const perTryTimeout: TimeoutSetting = perTry
    ? { kind: "value", milliseconds: perTry.value }
    : DEFAULT_TIMEOUT;
  return createResultOk({ count: Math.max(1, count), perTryTimeout });
};

const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** `x-forwarded-for` becomes `X-Forwarded-For`; invalid names pass through. */
export const canonicalHeaderName = (name: string): string =>
  HEADER_NAME.test(name)
    ? name
        .toLowerCase()
        .replace(
          /(^|-)([a-z])/g,
          (_match, dash: string, letter: string) =>
            `${dash}${letter.toUpperCase()}`
        )
    : name;

export type HeadersPolicyTarget = "request" | "response";

export const buildHeadersPolicy = (
  spec: HeadersPolicySpec | undefined,
  target: HeadersPolicyTarget
): Result<HeadersRewrite | undefined, PolicyWarning> => {
  if (!spec) {
    return createResultOk(undefined);
  }
  const reason =
    target === "request"
      ? "RequestHeadersPolicyInvalid"
      : "ResponseHeadersPolicyInvalid";
  const fail = (message: string) =>
    createResultErr<PolicyWarning>({
      reason,
      message: `route.${target}HeadersPolicy: ${message}`,
    });

  const set: { name: string; value: string }[] = [];
  const seen = new Set<string>();
  let hostRewrite: string | undefined;

  for (const entry of spec.set ?? []) {
    const name = canonicalHeaderName(entry.name);
    if (seen.has(name)) {
      return fail(`duplicate header addition: "${name}"`);
    }
    seen.add(name);
    if (name === "Host") {
      if (target === "response") {
        return fail(`rewriting "${name}" header is not supported`);
      }
      hostRewrite = entry.value;
      continue;
    }
    if (!HEADER_NAME.test(name)) {
      return fail(`invalid set header "${name}"`);
    }
    set.push({ name, value: entry.value });
  }

  const remove = new Set<string>();
  for (const entry of spec.remove ?? []) {
    const name = canonicalHeaderName(entry);
    if (remove.has(name)) {
      return fail(`duplicate header removal: "${name}"`);
    }
    if (!HEADER_NAME.test(name)) {
      return fail(`invalid remove header "${name}"`);
    }
    remove.add(name);
  }

  return createResultOk({
    set,
    remove: [...remove].sort(),
    ...(hostRewrite === undefined ? {} : { hostRewrite }),
  });
};

export type PrefixReplacement = NonNullable<
  RouteSpec["pathRewritePolicy"]
>["replacePrefix"][number];

export type PrefixRewriteError = {
  readonly reason: "DuplicateReplacement" | "AmbiguousReplacement";
  readonly message: string;
};

export const validatePrefixReplacements = (
  replacements: readonly PrefixReplacement[]
): PrefixRewriteError | undefined => {
  const prefixes = new Set<string>();
  for (const replacement of replacements) {
    const prefix = replacement.prefix ?? "";
    if (prefixes.has(prefix)) {
      return prefix.length > 0
        ? {
            reason: "DuplicateReplacement",
            message: `duplicate replacement prefix '${prefix}'`,
          }
        : {
            reason: "AmbiguousReplacement",
            message: "ambiguous prefix replacement",
          };
    }
    prefixes.add(prefix);
  }
  return;
};

/**
 * Picks the replacement for a route's effective prefix: an exact match on
 * the prefix first, then the replacement declared without a prefix.
 */
export const selectPrefixReplacement = (
  routingPrefix: string,
  replacements: readonly PrefixReplacement[]
): string | undefined => {
  const exact = replacements.find(
    (replacement) =>
      (replacement.prefix ?? "") !== "" && replacement.prefix === routingPrefix
  );
  if (exact) {
    return exact.replacement;
  }
  return replacements.find((replacement) => (replacement.prefix ?? "") === "")
    ?.replacement;
};
