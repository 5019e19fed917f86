import type { LedgerDocument, StatusLedger } from "@routegraph/status";
import {
  createError,
  documentKeyOf,
  type GatewayDocument,
  type HttpRouteDocument,
  type ProxyDocument,
  type RawDocument,
  type SecretDocument,
  type ServiceDocument,
  sourceDocumentSchema,
} from "@routegraph/types";

import { formatIssuePath } from "./config";

export type IngestedDocuments = {
  readonly proxies: readonly ProxyDocument[];
  readonly gateways: readonly GatewayDocument[];
  readonly httpRoutes: readonly HttpRouteDocument[];
  readonly services: readonly ServiceDocument[];
  readonly secrets: readonly SecretDocument[];
  /** Documents that receive a status record, in input order. */
  readonly reported: readonly LedgerDocument[];
};

const REPORTED_KINDS = new Set(["proxy", "gateway", "httproute"]);

/**
 * Parses every cached document with its schema. Documents that fail are left
 * out of the rebuild and reported with a `DocumentInvalid` error.
 */
export const ingestDocuments = (
  documents: readonly RawDocument[],
  ledger: StatusLedger
): IngestedDocuments => {
  const proxies: ProxyDocument[] = [];
  const gateways: GatewayDocument[] = [];
  const httpRoutes: HttpRouteDocument[] = [];
  const services: ServiceDocument[] = [];
  const secrets: SecretDocument[] = [];
  const reported: LedgerDocument[] = [];

  for (const raw of documents) {
    const key = documentKeyOf(raw);
    const parsed = sourceDocumentSchema.safeParse(raw);

    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${formatIssuePath(issue.path) || "document"} ${issue.message}`)
        .join("; ");
      ledger.addCondition(key, createError("document", "DocumentInvalid", message));
      reported.push({ key, revision: raw.metadata.revision, kind: raw.kind });
      continue;
    }

    const document = parsed.data;
    if (REPORTED_KINDS.has(document.kind)) {
      reported.push({ key, revision: document.metadata.revision, kind: document.kind });
    }

    switch (document.kind) {
      case "proxy":
        proxies.push(document);
        break;
      case "gateway":
        gateways.push(document);
        break;
      case "httproute":
        httpRoutes.push(document);
        break;
      case "service":
        services.push(document);
        break;
      case "secret":
        secrets.push(document);
        break;
      default: {
        const exhaustive: never = document;
        throw new Error(`Unhandled document kind: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  return { proxies, gateways, httpRoutes, services, secrets, reported };
};
