import type { ListenerRequest } from "@routegraph/listeners";
import { validateHostname } from "@routegraph/listeners";
import type { StatusLedger } from "@routegraph/status";
import {
  type BuilderConfig,
  createError,
  documentKeyOf,
  type ProxyDocument,
  type TlsDescriptor,
  type TlsVersion,
} from "@routegraph/types";

import type { SecretLookup } from "./secrets";

export type QualifiedRoot = {
  readonly key: string;
  readonly document: ProxyDocument;
  readonly fqdn: string;
  readonly port?: number;
  readonly tls?: TlsDescriptor;
};

const TLS_VERSION_ORDER: Readonly<Record<TlsVersion, number>> = {
  "1.2": 0,
  "1.3": 1,
};

/**
 * Checks a root proxy's virtual host. Returns the qualified root, or
 * `undefined` after recording why the root contributes nothing.
 */
export const qualifyRoot = (
  document: ProxyDocument,
  config: BuilderConfig,
  secrets: SecretLookup,
  ledger: StatusLedger
): QualifiedRoot | undefined => {
  const { virtualHost } = document.spec;
  if (!virtualHost) {
    return;
  }
  const key = documentKeyOf(document);
  const { namespace } = document.metadata;
  const fail = (
    subject: "virtualhost" | "tls",
    reason: string,
    message: string
  ) => {
    ledger.addCondition(key, createError(subject, reason, message));
    return undefined;
  };

  if (
    config.rootNamespaces.length > 0 &&
    !config.rootNamespaces.includes(namespace)
  ) {
    return fail(
      "virtualhost",
      "RootNamespaceError",
      "root proxy cannot be defined in this namespace"
    );
  }

  const fqdn = virtualHost.fqdn.trim();
  if (fqdn === "") {
    return fail(
      "virtualhost",
      "FQDNNotSpecified",
      "Spec.VirtualHost.Fqdn must be specified"
    );
  }
  const hostnameProblem = validateHostname(fqdn);
  if (hostnameProblem) {
    return fail("virtualhost", "FQDNNotValid", `Spec.VirtualHost.Fqdn ${hostnameProblem}`);
  }

  const { includes = [], routes = [] } = document.spec;
  if (includes.length === 0 && routes.length === 0) {
    return fail(
      "virtualhost",
      "NothingDefined",
      "Spec must have at least one Route or Include"
    );
  }

  if (!virtualHost.tls) {
    return {
      key,
      document,
      fqdn,
      ...(virtualHost.port === undefined ? {} : { port: virtualHost.port }),
    };
  }

  const minimumProtocolVersion = virtualHost.tls.minimumProtocolVersion ?? "1.2";
  const maximumProtocolVersion = virtualHost.tls.maximumProtocolVersion ?? "1.3";
  if (
    TLS_VERSION_ORDER[minimumProtocolVersion] >
    TLS_VERSION_ORDER[maximumProtocolVersion]
  ) {
    return fail(
      "tls",
      "TLSVersionsNotValid",
      `Spec.VirtualHost.TLS minimum protocol version ${minimumProtocolVersion} is greater than maximum protocol version ${maximumProtocolVersion}`
    );
  }

  const secret = secrets.lookup(virtualHost.tls.secretName, namespace);
  if (!secret.ok) {
    return fail("tls", "SecretNotValid", `Spec.VirtualHost.TLS ${secret.error}`);
  }

  return {
    key,
    document,
    fqdn,
    ...(virtualHost.port === undefined ? {} : { port: virtualHost.port }),
    tls: {
      secret: secret.value,
      minimumProtocolVersion,
      maximumProtocolVersion,
    },
  };
};

/**
 * Listener requests of a root. Without an explicit port the root is served
 * on the configured HTTP port and, with TLS, on the HTTPS port as well.
 */
export const rootListenerRequests = (
  root: QualifiedRoot,
  config: BuilderConfig
): ListenerRequest[] => {
  const base = {
    source: root.key,
    createdAt: root.document.metadata.creationTimestamp,
    hostname: root.fqdn,
    atomic: true,
    mergeable: false,
  };

  if (root.port !== undefined) {
    return [
      root.tls
        ? { ...base, id: `${root.key}#https`, protocol: "https", port: root.port, tls: root.tls }
        : { ...base, id: `${root.key}#http`, protocol: "http", port: root.port },
    ];
  }

  const requests: ListenerRequest[] = [
    {
      ...base,
      id: `${root.key}#http`,
      protocol: "http",
      port: config.listeners.http.port,
    },
  ];
  if (root.tls) {
    requests.push({
      ...base,
      id: `${root.key}#https`,
      protocol: "https",
      port: config.listeners.https.port,
      tls: root.tls,
    });
  }
  return requests;
};
