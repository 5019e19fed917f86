import { z } from "zod";
import { type JsonSchema7Type, zodToJsonSchema } from "zod-to-json-schema";

export const DOCUMENT_KINDS = [
  "proxy",
  "gateway",
  "httproute",
  "service",
  "secret",
] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

const nameSchema = z
  .string()
  .min(1)
  .max(253)
  .regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, {
    message: "Must be a lowercase RFC 1123 name",
  });

const portNumberSchema = z.number().int();

export const documentMetadataSchema = z.object({
  namespace: nameSchema,
  name: nameSchema,
  revision: z.number().int().nonnegative(),
  creationTimestamp: z.string().datetime({ offset: true }),
});

export const headerMatchClauseSchema = z.object({
  name: z.string().min(1),
  present: z.boolean().optional(),
  notPresent: z.boolean().optional(),
  exact: z.string().min(1).optional(),
  notExact: z.string().min(1).optional(),
  contains: z.string().min(1).optional(),
  notContains: z.string().min(1).optional(),
});

export const matchConditionSchema = z.object({
  prefix: z.string().optional(),
  exact: z.string().optional(),
  regex: z.string().optional(),
  header: headerMatchClauseSchema.optional(),
});

const tlsVersionSchema = z.enum(["1.2", "1.3"]);

export const virtualHostSpecSchema = z.object({
  fqdn: z.string(),
  port: portNumberSchema.optional(),
  tls: z
    .object({
      secretName: z.string(),
      minimumProtocolVersion: tlsVersionSchema.optional(),
      maximumProtocolVersion: tlsVersionSchema.optional(),
    })
    .optional(),
});

export const includeSpecSchema = z.object({
  name: nameSchema,
  namespace: nameSchema.optional(),
  conditions: z.array(matchConditionSchema).optional(),
});

export const routeServiceSchema = z.object({
  name: nameSchema,
  port: portNumberSchema,
  weight: z.number().int().nonnegative().optional(),
  protocol: z.enum(["h2", "h2c", "tls"]).optional(),
  mirror: z.boolean().optional(),
});

const headerValueSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export const headersPolicySchema = z.object({
  set: z.array(headerValueSchema).optional(),
  remove: z.array(z.string()).optional(),
});

export const routeSpecSchema = z.object({
  conditions: z.array(matchConditionSchema).optional(),
  services: z.array(routeServiceSchema).optional(),
  requestRedirectPolicy: z
    .object({
      scheme: z.enum(["http", "https"]).optional(),
      hostname: z.string().min(1).optional(),
      port: portNumberSchema.optional(),
      statusCode: z.union([z.literal(301), z.literal(302)]).optional(),
    })
    .optional(),
  directResponsePolicy: z
    .object({
      statusCode: z.number().int().min(200).max(599),
      body: z.string().optional(),
    })
    .optional(),
  pathRewritePolicy: z
    .object({
      replacePrefix: z.array(
        z.object({
          prefix: z.string().optional(),
          replacement: z.string().min(1),
        })
      ),
    })
    .optional(),
  timeoutPolicy: z
    .object({
      response: z.string().optional(),
      idle: z.string().optional(),
    })
    .optional(),
  retryPolicy: z
    .object({
      count: z.number().optional(),
      perTryTimeout: z.string().optional(),
    })
    .optional(),
  requestHeadersPolicy: headersPolicySchema.optional(),
  responseHeadersPolicy: headersPolicySchema.optional(),
  permitInsecure: z.boolean().optional(),
  enableWebsockets: z.boolean().optional(),
});

export const proxyDocumentSchema = z.object({
  kind: z.literal("proxy"),
  metadata: documentMetadataSchema,
  spec: z.object({
    virtualHost: virtualHostSpecSchema.optional(),
    includes: z.array(includeSpecSchema).optional(),
    routes: z.array(routeSpecSchema).optional(),
  }),
});

export const gatewayListenerSpecSchema = z.object({
  name: nameSchema,
  protocol: z.string().min(1),
  port: portNumberSchema,
  hostname: z.string().min(1).optional(),
  tls: z.object({ secretName: z.string().min(1) }).optional(),
});

export const gatewayDocumentSchema = z.object({
  kind: z.literal("gateway"),
  metadata: documentMetadataSchema,
  spec: z.object({
    listeners: z.array(gatewayListenerSpecSchema).min(1),
  }),
});

export const httpRouteMatchSchema = z.object({
  path: z
    .object({
      type: z.enum(["Exact", "PathPrefix", "RegularExpression"]),
      value: z.string(),
    })
    .optional(),
  headers: z
    .array(
      z.object({
        name: z.string().min(1),
        type: z.enum(["Exact", "RegularExpression"]).optional(),
        value: z.string(),
      })
    )
    .optional(),
});

export const httpRouteDocumentSchema = z.object({
  kind: z.literal("httproute"),
  metadata: documentMetadataSchema,
  spec: z.object({
    parentRefs: z
      .array(
        z.object({
          name: nameSchema,
          namespace: nameSchema.optional(),
          sectionName: nameSchema.optional(),
        })
      )
      .min(1),
    hostnames: z.array(z.string().min(1)).optional(),
    rules: z.array(
      z.object({
        matches: z.array(httpRouteMatchSchema).optional(),
        backendRefs: z
          .array(
            z.object({
              name: nameSchema,
              namespace: nameSchema.optional(),
              port: portNumberSchema,
              weight: z.number().int().nonnegative().optional(),
            })
          )
          .optional(),
      })
    ),
  }),
});

export const serviceDocumentSchema = z.object({
  kind: z.literal("service"),
  metadata: documentMetadataSchema,
  spec: z.object({
    ports: z.array(
      z.object({
        name: z.string().min(1).optional(),
        port: portNumberSchema,
        appProtocol: z.enum(["http", "h2", "h2c", "tls"]).optional(),
      })
    ),
  }),
});

export const secretDocumentSchema = z.object({
  kind: z.literal("secret"),
  metadata: documentMetadataSchema,
  spec: z.object({
    type: z.enum(["tls", "opaque"]),
    data: z.record(z.string()),
  }),
});

export const sourceDocumentSchema = z.discriminatedUnion("kind", [
  proxyDocumentSchema,
  gatewayDocumentSchema,
  httpRouteDocumentSchema,
  serviceDocumentSchema,
  secretDocumentSchema,
]);

export type DocumentMetadata = z.infer<typeof documentMetadataSchema>;
export type HeaderMatchClause = z.infer<typeof headerMatchClauseSchema>;
export type MatchConditionInput = z.infer<typeof matchConditionSchema>;
export type VirtualHostSpec = z.infer<typeof virtualHostSpecSchema>;
export type IncludeSpec = z.infer<typeof includeSpecSchema>;
export type RouteServiceSpec = z.infer<typeof routeServiceSchema>;
export type HeadersPolicySpec = z.infer<typeof headersPolicySchema>;
export type RouteSpec = z.infer<typeof routeSpecSchema>;
export type ProxyDocument = z.infer<typeof proxyDocumentSchema>;
export type GatewayListenerSpec = z.infer<typeof gatewayListenerSpecSchema>;
export type GatewayDocument = z.infer<typeof gatewayDocumentSchema>;
export type HttpRouteMatch = z.infer<typeof httpRouteMatchSchema>;
export type HttpRouteDocument = z.infer<typeof httpRouteDocumentSchema>;
export type ServiceDocument = z.infer<typeof serviceDocumentSchema>;
export type SecretDocument = z.infer<typeof secretDocumentSchema>;
export type SourceDocument = z.infer<typeof sourceDocumentSchema>;

/**
 * Untyped form of a document as held by the cache. The cache stores whatever
 * the store hands it; schema checks happen during ingestion.
 */
export type RawDocument = {
  readonly kind: string;
  readonly metadata: {
    readonly namespace: string;
    readonly name: string;
    readonly revision: number;
    readonly creationTimestamp?: string;
  };
  readonly spec?: unknown;
};

export type DocumentOfKind<TKind extends DocumentKind> = Extract<
  SourceDocument,
  { kind: TKind }
>;

export const sourceDocumentJsonSchema: JsonSchema7Type = zodToJsonSchema(
  sourceDocumentSchema,
  "SourceDocument"
);
