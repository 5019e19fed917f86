import {
  createResultErr,
  createResultOk,
  formatNamespacedName,
  type Result,
  type SecretDocument,
} from "@routegraph/types";

export const TLS_CERT_KEY = "tls.crt";
export const TLS_PRIVATE_KEY_KEY = "tls.key";

export type SecretLookup = {
  /**
   * Finds a TLS secret by reference. `secretName` may be `name` (same
   * namespace as the referrer) or `namespace/name`.
   */
  lookup(secretName: string, referrerNamespace: string): Result<string, string>;
};

const checkShape = (secret: SecretDocument): string | undefined => {
  if (secret.spec.type !== "tls") {
    return 'Secret type is not "tls"';
  }
  for (const key of [TLS_CERT_KEY, TLS_PRIVATE_KEY_KEY]) {
    if (!secret.spec.data[key]) {
      return `empty "${key}" key`;
    }
  }
  return;
};

/** Only secrets in the referrer's own namespace may be used. */
export const createSecretLookup = (
  secrets: readonly SecretDocument[]
): SecretLookup => {
  const byName = new Map<string, SecretDocument>();
  for (const secret of secrets) {
    byName.set(
      formatNamespacedName(secret.metadata.namespace, secret.metadata.name),
      secret
    );
  }

  return {
    lookup: (secretName, referrerNamespace) => {
      const segments = secretName.split("/");
      const [namespace, name] =
        segments.length === 2
          ? [segments[0] ?? "", segments[1] ?? ""]
          : [referrerNamespace, secretName];

      if (namespace !== referrerNamespace) {
        return createResultErr(
          `Secret "${secretName}" is not in namespace "${referrerNamespace}" and cross-namespace secret references are not permitted`
        );
      }

      const reference = formatNamespacedName(namespace, name);
      const secret = byName.get(reference);
      if (!secret) {
        return createResultErr(`Secret "${reference}" not found`);
      }
      const problem = checkShape(secret);
      if (problem) {
        return createResultErr(`Secret "${reference}" is invalid: ${problem}`);
      }
      return createResultOk(reference);
    },
  };
};
