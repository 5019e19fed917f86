import { isIP } from "node:net";

import {
  createResultErr,
  createResultOk,
  type ProtocolClass,
  type Result,
} from "@routegraph/types";

const MAX_PORT = 65_535;
const PRIVILEGED_PORT_LIMIT = 1024;
/** Privileged ports 1-1023 land on 64513-65535. */
const PRIVILEGED_PORT_OFFSET = 64_512;

const DNS1123_LABEL = "[a-z0-9]([-a-z0-9]*[a-z0-9])?";
const DNS1123_SUBDOMAIN = new RegExp(
  `^${DNS1123_LABEL}(\\.${DNS1123_LABEL})*$`
);
const WILDCARD_SUBDOMAIN = new RegExp(
  `^\\*\\.${DNS1123_LABEL}(\\.${DNS1123_LABEL})*$`
);
const MAX_HOSTNAME_LENGTH = 253;

export const mapListenerPort = (port: number): Result<number, string> => {
  if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
    return createResultErr(
      `port ${port} is not valid, must be between 1 and ${MAX_PORT}`
    );
  }
  return createResultOk(
    port < PRIVILEGED_PORT_LIMIT ? port + PRIVILEGED_PORT_OFFSET : port
  );
};

export const listenerName = (protocol: ProtocolClass, port: number): string =>
  `${protocol}-${port}`;

export const isWildcardHostname = (hostname: string): boolean =>
  hostname.startsWith("*.");

/** Returns a message describing why the hostname is unusable, if it is. */
export const validateHostname = (hostname: string): string | undefined => {
  if (isIP(hostname) !== 0) {
    return `invalid hostname "${hostname}": must be a DNS name, not an IP address`;
  }
  if (hostname.length > MAX_HOSTNAME_LENGTH) {
    return `invalid hostname "${hostname}": must be no more than ${MAX_HOSTNAME_LENGTH} characters`;
  }
  if (hostname.includes("*")) {
    return WILDCARD_SUBDOMAIN.test(hostname)
      ? undefined
      : `invalid hostname "${hostname}": a wildcard DNS-1123 subdomain must start with '*.', followed by a valid DNS subdomain`;
  }
  return DNS1123_SUBDOMAIN.test(hostname)
    ? undefined
    : `invalid hostname "${hostname}": a lowercase RFC 1123 subdomain must consist of lower case alphanumeric characters, '-' or '.', and must start and end with an alphanumeric character`;
};
