import {
  createResultErr,
  createResultOk,
  formatNamespacedName,
  type ServiceDocument,
  type ServiceResolver,
} from "@routegraph/types";

const MAX_PORT = 65_535;

/** Resolves service references against the `service` documents of a rebuild. */
export const createServiceResolver = (
  services: readonly ServiceDocument[]
): ServiceResolver => {
  const byName = new Map<string, ServiceDocument>();
  for (const service of services) {
    byName.set(
      formatNamespacedName(service.metadata.namespace, service.metadata.name),
      service
    );
  }

  return {
    resolve: (reference) => {
      const name = formatNamespacedName(reference.namespace, reference.name);

      if (
        !Number.isInteger(reference.port) ||
        reference.port < 1 ||
        reference.port > MAX_PORT
      ) {
        return createResultErr({
          reason: "ServicePortInvalid",
          message: `service "${reference.name}": port must be in the range 1-${MAX_PORT}`,
        });
      }

      const service = byName.get(name);
      if (!service) {
        return createResultErr({
          reason: "ServiceUnresolvedReference",
          message: `Spec.Routes unresolved service reference: service "${name}" not found`,
        });
      }

      const port = service.spec.ports.find(
        (candidate) => candidate.port === reference.port
      );
      if (!port) {
        return createResultErr({
          reason: "ServiceUnresolvedReference",
          message: `Spec.Routes unresolved service reference: port "${reference.port}" on service "${name}" not matched`,
        });
      }

      if (
        reference.protocol !== undefined &&
        port.appProtocol !== undefined &&
        port.appProtocol !== reference.protocol
      ) {
        return createResultErr({
          reason: "ServiceProtocolMismatch",
          message: `protocol "${reference.protocol}" requested for port ${reference.port} of service "${name}", which declares "${port.appProtocol}"`,
        });
      }

      return createResultOk({
        namespace: reference.namespace,
        name: reference.name,
        port: reference.port,
        protocol: reference.protocol ?? port.appProtocol ?? "http",
      });
    },
  };
};
