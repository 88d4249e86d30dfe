import { z } from 'zod';

/**
 * Runtime models for the SCIM messages a server may send back (RFC 7643 / RFC 7644).
 *
 * The schemas are deliberately tolerant about optional members and unknown
 * extra members: rejecting a response is the job of a check, which can say
 * *why* it is wrong.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const lowercase = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);

// ─── Error ───────────────────────────────────────────────────────────

/** RFC 7644 §3.12 — `status` is a string on the wire, but many servers send a number. */
export const ScimErrorSchema = z
  .object({
    schemas: z.array(z.string()),
    status: z.union([z.string(), z.number()]).pipe(z.coerce.number().int()),
    scimType: z.string().optional(),
    detail: z.string().optional(),
  })
  .passthrough();

export type ScimError = z.infer<typeof ScimErrorSchema>;

// ─── ListResponse ────────────────────────────────────────────────────

export const ListResponseSchema = z
  .object({
    schemas: z.array(z.string()),
    totalResults: z.number().int().nonnegative(),
    Resources: z.array(z.unknown()).default([]),
    startIndex: z.number().int().optional(),
    itemsPerPage: z.number().int().optional(),
  })
  .passthrough();

export type ListResponse = z.infer<typeof ListResponseSchema>;

// ─── ServiceProviderConfig ───────────────────────────────────────────

const SupportedSchema = z.object({ supported: z.boolean() }).passthrough();

export const ServiceProviderConfigSchema = z
  .object({
    schemas: z.array(z.string()),
    documentationUri: z.string().optional(),
    patch: SupportedSchema.optional(),
    bulk: SupportedSchema.extend({
      maxOperations: z.number().int().optional(),
      maxPayloadSize: z.number().int().optional(),
    }).optional(),
    filter: SupportedSchema.extend({
      maxResults: z.number().int().optional(),
    }).optional(),
    changePassword: SupportedSchema.optional(),
    sort: SupportedSchema.optional(),
    etag: SupportedSchema.optional(),
    authenticationSchemes: z
      .array(
        z
          .object({
            type: z.string(),
            name: z.string(),
            description: z.string().optional(),
            specUri: z.string().optional(),
            documentationUri: z.string().optional(),
            primary: z.boolean().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

export type ServiceProviderConfig = z.infer<typeof ServiceProviderConfigSchema>;

// ─── Schema ──────────────────────────────────────────────────────────

export const ATTRIBUTE_TYPES = [
  'string',
  'boolean',
  'decimal',
  'integer',
  'dateTime',
  'reference',
  'binary',
  'complex',
] as const;

export type AttributeType = (typeof ATTRIBUTE_TYPES)[number];

export const MUTABILITIES = ['readOnly', 'readWrite', 'immutable', 'writeOnly'] as const;

export type Mutability = (typeof MUTABILITIES)[number];

export interface ScimAttribute {
  name: string;
  type: AttributeType;
  multiValued: boolean;
  required: boolean;
  mutability: Mutability;
  description?: string;
  returned?: string;
  uniqueness?: string;
  caseExact?: boolean;
  canonicalValues?: string[];
  referenceTypes?: string[];
  subAttributes?: ScimAttribute[];
}

// Attribute types and mutabilities are matched case-insensitively: "dateTime" and "datetime" both occur in the wild.
const attributeType = z.preprocess(
  lowercase,
  z.enum(['string', 'boolean', 'decimal', 'integer', 'datetime', 'reference', 'binary', 'complex']),
).transform((value): AttributeType => (value === 'datetime' ? 'dateTime' : value));

const mutability = z.preprocess(
  lowercase,
  z.enum(['readonly', 'readwrite', 'immutable', 'writeonly']),
).transform((value): Mutability => {
  switch (value) {
    case 'readonly':
      return 'readOnly';
    case 'writeonly':
      return 'writeOnly';
    case 'immutable':
      return 'immutable';
    default:
      return 'readWrite';
  }
});

export const ScimAttributeSchema: z.ZodType<ScimAttribute, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    type: attributeType,
    multiValued: z.boolean().default(false),
    required: z.boolean().default(false),
    mutability: mutability.default('readWrite'),
    description: z.string().optional(),
    returned: z.string().optional(),
    uniqueness: z.string().optional(),
    caseExact: z.boolean().optional(),
    canonicalValues: z.array(z.string()).optional(),
    referenceTypes: z.array(z.string()).optional(),
    subAttributes: z.array(ScimAttributeSchema).optional(),
  }),
);

export const ScimSchemaSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    description: z.string().optional(),
    attributes: z.array(ScimAttributeSchema).default([]),
  })
  .passthrough();

export type ScimSchema = z.infer<typeof ScimSchemaSchema>;

// ─── ResourceType ────────────────────────────────────────────────────

export const ResourceTypeSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().min(1),
    description: z.string().optional(),
    endpoint: z.string().min(1),
    schema: z.string().min(1),
    schemaExtensions: z
      .array(
        z.object({
          schema: z.string().min(1),
          required: z.boolean().default(false),
        }),
      )
      .default([]),
  })
  .passthrough();

export type ResourceType = z.infer<typeof ResourceTypeSchema>;

// ─── Resources ───────────────────────────────────────────────────────

export const ScimResourceSchema = z
  .object({
    schemas: z.array(z.string()).min(1),
    id: z.string().optional(),
    externalId: z.string().optional(),
    meta: z
      .object({
        resourceType: z.string().optional(),
        created: z.string().optional(),
        lastModified: z.string().optional(),
        location: z.string().optional(),
        version: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ScimResource = z.infer<typeof ScimResourceSchema>;

// ─── Requests ────────────────────────────────────────────────────────

export interface ScimQueryParams {
  filter?: string;
  startIndex?: number;
  count?: number;
  attributes?: string;
  excludedAttributes?: string;
}

export interface SearchRequest extends ScimQueryParams {
  schemas: string[];
  sortBy?: string;
  sortOrder?: 'ascending' | 'descending';
}

export interface PatchOperation {
  op: 'add' | 'remove' | 'replace';
  path?: string;
  value?: unknown;
}

export interface PatchRequest {
  schemas: string[];
  Operations: PatchOperation[];
}

/** Attributes of a resource payload, keyed by attribute name or extension URN. */
export type ResourcePayload = { schemas: string[] } & Record<string, unknown>;

// ─── Client responses ────────────────────────────────────────────────

/**
 * A response classified by the client. Checks switch on `kind` instead of
 * inspecting the payload themselves.
 */
export type ScimMessage =
  | { kind: 'ServiceProviderConfig'; httpStatus: number; value: ServiceProviderConfig }
  | { kind: 'Schema'; httpStatus: number; value: ScimSchema }
  | { kind: 'ResourceType'; httpStatus: number; value: ResourceType }
  | { kind: 'ListResponse'; httpStatus: number; value: ListResponse }
  | { kind: 'Resource'; httpStatus: number; value: ScimResource }
  | { kind: 'Error'; httpStatus: number; value: ScimError }
  | { kind: 'Empty'; httpStatus: number };

export type ScimMessageKind = ScimMessage['kind'];

/** The parsed body of a message, for attaching to a result. */
export function messageData(message: ScimMessage): unknown {
  return message.kind === 'Empty' ? { httpStatus: message.httpStatus } : message.value;
}
