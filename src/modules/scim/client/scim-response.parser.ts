import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import {
  SCIM_ERROR_SCHEMA,
  SCIM_LIST_RESPONSE_SCHEMA,
  SCIM_RESOURCE_TYPE_SCHEMA,
  SCIM_SCHEMA_SCHEMA,
  SCIM_SP_CONFIG_SCHEMA,
} from '../common/scim-constants';
import { ScimParseError } from '../common/scim-errors';
import {
  ListResponseSchema,
  ResourceTypeSchema,
  ScimErrorSchema,
  ScimMessage,
  ScimResourceSchema,
  ScimSchemaSchema,
  ServiceProviderConfigSchema,
  isRecord,
} from '../models/scim-models';

export interface ParseOptions {
  /** Accept an empty body (e.g. `204 No Content` after DELETE). */
  allowEmpty?: boolean;
}

/** One line per zod issue: `path: message`. */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
  label: string,
  rawBody: string,
  httpStatus: number,
): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ScimParseError(`Response is not a valid ${label}: ${formatZodIssues(parsed.error)}`, rawBody, httpStatus);
  }
  return parsed.data;
}

/**
 * Classify a raw HTTP response body into a {@link ScimMessage}.
 *
 * The `schemas` attribute decides the message kind; any object whose schemas
 * name no protocol message is treated as a resource. Throws ScimParseError when
 * the body is not JSON, carries no `schemas`, or does not validate.
 */
export function parseScimResponse(httpStatus: number, rawBody: string, options: ParseOptions = {}): ScimMessage {
  if (rawBody.trim() === '') {
    if (options.allowEmpty) {
      return { kind: 'Empty', httpStatus };
    }
    throw new ScimParseError(`Response body is empty (HTTP ${httpStatus})`, rawBody, httpStatus);
  }

  let body: unknown;
  try {
    body = JSON.parse(rawBody);
  } catch (err) {
    throw new ScimParseError(
      `Response body is not valid JSON (HTTP ${httpStatus}): ${err instanceof Error ? err.message : String(err)}`,
      rawBody,
      httpStatus,
    );
  }

  if (!isRecord(body) || !Array.isArray(body.schemas) || !body.schemas.every((s) => typeof s === 'string')) {
    throw new ScimParseError(`Response has no "schemas" attribute (HTTP ${httpStatus})`, rawBody, httpStatus);
  }

  const schemas: unknown[] = body.schemas;

  if (schemas.includes(SCIM_ERROR_SCHEMA)) {
    return { kind: 'Error', httpStatus, value: validate(ScimErrorSchema, body, 'Error', rawBody, httpStatus) };
  }
  if (schemas.includes(SCIM_LIST_RESPONSE_SCHEMA)) {
    return { kind: 'ListResponse', httpStatus, value: validate(ListResponseSchema, body, 'ListResponse', rawBody, httpStatus) };
  }
  if (schemas.includes(SCIM_SP_CONFIG_SCHEMA)) {
    return {
      kind: 'ServiceProviderConfig',
      httpStatus,
      value: validate(ServiceProviderConfigSchema, body, 'ServiceProviderConfig', rawBody, httpStatus),
    };
  }
  if (schemas.includes(SCIM_SCHEMA_SCHEMA)) {
    return { kind: 'Schema', httpStatus, value: validate(ScimSchemaSchema, body, 'Schema', rawBody, httpStatus) };
  }
  if (schemas.includes(SCIM_RESOURCE_TYPE_SCHEMA)) {
    return { kind: 'ResourceType', httpStatus, value: validate(ResourceTypeSchema, body, 'ResourceType', rawBody, httpStatus) };
  }
  return { kind: 'Resource', httpStatus, value: validate(ScimResourceSchema, body, 'Resource', rawBody, httpStatus) };
}
