import { randomUUID } from 'node:crypto';

import type { CheckerLogger } from '../../logging/checker-logger.service';
import { resourcePath } from '../../scim/client/http-scim-client';
import type { ScimClient } from '../../scim/client/scim-client.interface';
import { SCIM_PATCH_SCHEMA, SCIM_SEARCH_SCHEMA } from '../../scim/common/scim-constants';
import {
  ListResponse,
  ResourceType,
  ScimError,
  ScimMessage,
  ScimResource,
  ScimSchema,
  ServiceProviderConfig,
  isRecord,
} from '../../scim/models/scim-models';
import { CheckResult, CheckResultInit, error, skipped, success } from '../check-result';
import { CheckReturn, ResultListener, decorateCheck, guardListener } from '../check-runner';
import { equalityFilter, findFilterTarget, findPatchableAttribute, generatePayload, generateValue } from '../fill/random-values';
import { unexpectedMessage } from './check-helpers';

/** Everything the lifecycle needs to know about one resource type. */
export interface ResourceCheckContext {
  resourceType: ResourceType;
  schema: ScimSchema;
  /** Resolved extension schemas, required ones included. */
  extensions: ScimSchema[];
  serviceProviderConfig: ServiceProviderConfig;
}

const titled =
  (label: string) =>
  (_client: ScimClient, ctx: ResourceCheckContext, _created?: ScimResource): string =>
    `${label} (${ctx.resourceType.name})`;

const NOT_CREATED = 'The object could not be created';

function createdId(resource: ScimResource | undefined): string | undefined {
  return resource?.id;
}

// ─── Response expectations ───────────────────────────────────────────

/** The response must be a 404 Error object. */
function expectNotFound(path: string, response: ScimMessage): CheckReturn<ScimError> {
  if (response.kind !== 'Error') {
    return unexpectedMessage(path, 'Error', response);
  }
  const status = response.value.status !== 404 ? response.value.status : response.httpStatus;
  if (status !== 404) {
    return error(`${path} returned an Error object with status ${status} instead of 404`, response.value);
  }
  return [success(`${path} correctly returned a 404 error`, response.value), response.value];
}

/** The response must be the resource `id`, with the given HTTP status. */
function expectResource(
  path: string,
  response: ScimMessage,
  httpStatus: number,
  id: string,
): CheckResultInit | ScimResource {
  if (response.kind !== 'Resource') {
    return unexpectedMessage(path, 'Resource', response);
  }
  if (response.httpStatus !== httpStatus) {
    return error(`${path} answered with HTTP ${response.httpStatus} instead of ${httpStatus}`, response.value);
  }
  if (response.value.id !== id) {
    return error(`${path} returned the object "${response.value.id ?? '(no id)'}" instead of "${id}"`, response.value);
  }
  return response.value;
}

function isResource(value: CheckResultInit | ScimResource): value is ScimResource {
  return 'schemas' in value;
}

function listContains(list: ListResponse, id: string): boolean {
  return list.Resources.some((item) => isRecord(item) && item.id === id);
}

// ─── Checks ──────────────────────────────────────────────────────────

export const checkUnknownResource = decorateCheck(
  titled('Unknown resource read'),
  async (client: ScimClient, ctx: ResourceCheckContext): Promise<CheckReturn<ScimError>> => {
    const path = resourcePath(ctx.resourceType, randomUUID());
    return expectNotFound(path, await client.query(path));
  },
);

export const checkObjectCreation = decorateCheck(
  titled('Object creation'),
  async (client: ScimClient, ctx: ResourceCheckContext): Promise<CheckReturn<ScimResource>> => {
    const path = resourcePath(ctx.resourceType);
    const payload = generatePayload(ctx.schema, ctx.extensions);
    const response = await client.create(ctx.resourceType, payload);

    if (response.kind !== 'Resource') {
      return unexpectedMessage(path, 'Resource', response);
    }
    const resource = response.value;
    if (response.httpStatus !== 201) {
      return [error(`${path} answered with HTTP ${response.httpStatus} instead of 201`, resource), resource];
    }
    if (!resource.id) {
      return error(`${path} returned an object without an id`, resource);
    }
    if (!resource.schemas.includes(ctx.resourceType.schema)) {
      return [error(`${path} returned an object without the schema ${ctx.resourceType.schema}`, resource), resource];
    }
    return [success(`Created ${ctx.resourceType.name} ${resource.id}`, resource), resource];
  },
);

export const checkObjectQuery = decorateCheck(
  titled('Object query'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ScimResource>> => {
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const path = resourcePath(ctx.resourceType, id);
    const outcome = expectResource(path, await client.query(path), 200, id);
    return isResource(outcome) ? [success(`Fetched ${ctx.resourceType.name} ${id}`, outcome), outcome] : outcome;
  },
);

export const checkObjectListing = decorateCheck(
  titled('Object listing'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ListResponse>> => {
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const path = resourcePath(ctx.resourceType);
    const response = await client.query(path);
    if (response.kind !== 'ListResponse') {
      return unexpectedMessage(path, 'ListResponse', response);
    }
    const list = response.value;
    if (response.httpStatus !== 200) {
      return error(`${path} answered with HTTP ${response.httpStatus} instead of 200`, list);
    }
    if (listContains(list, id)) {
      return [success(`${path} lists ${id} among ${list.totalResults} objects`), list];
    }
    if (list.totalResults > list.Resources.length) {
      return [skipped(`${id} is not on the first page of ${path} (${list.totalResults} objects)`), list];
    }
    return error(`${path} does not list ${id}`, list);
  },
);

export const checkFilteredQuery = decorateCheck(
  titled('Filtered query'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ListResponse>> => {
    if (!ctx.serviceProviderConfig.filter?.supported) return skipped('Filtering is not supported');
    const id = createdId(created);
    if (created === undefined || id === undefined) return skipped(NOT_CREATED);

    const target = findFilterTarget(ctx.schema, created);
    if (target === undefined) return skipped('No attribute identifies the object');

    const path = resourcePath(ctx.resourceType);
    const filter = equalityFilter(target);
    const response = await client.query(path, { filter });
    if (response.kind !== 'ListResponse') {
      return unexpectedMessage(`${path}?filter=${filter}`, 'ListResponse', response);
    }
    if (response.httpStatus !== 200) {
      return error(`${path}?filter=${filter} answered with HTTP ${response.httpStatus} instead of 200`, response.value);
    }
    if (!listContains(response.value, id)) {
      return error(`Filter '${filter}' did not match ${id}`, response.value);
    }
    return [success(`Filter '${filter}' matched ${id}`), response.value];
  },
);

export const checkObjectSearch = decorateCheck(
  titled('Object search'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ListResponse>> => {
    if (!ctx.serviceProviderConfig.filter?.supported) return skipped('Filtering is not supported');
    const id = createdId(created);
    if (created === undefined || id === undefined) return skipped(NOT_CREATED);

    const target = findFilterTarget(ctx.schema, created);
    if (target === undefined) return skipped('No attribute identifies the object');

    const path = `${resourcePath(ctx.resourceType)}/.search`;
    const filter = equalityFilter(target);
    const response = await client.search(ctx.resourceType, { schemas: [SCIM_SEARCH_SCHEMA], filter, startIndex: 1 });
    if (response.kind === 'Error' && (response.httpStatus === 501 || response.value.status === 501)) {
      return skipped(`${path} is not implemented`);
    }
    if (response.kind !== 'ListResponse') {
      return unexpectedMessage(path, 'ListResponse', response);
    }
    if (response.httpStatus !== 200) {
      return error(`${path} answered with HTTP ${response.httpStatus} instead of 200`, response.value);
    }
    if (!listContains(response.value, id)) {
      return error(`Search '${filter}' did not match ${id}`, response.value);
    }
    return [success(`Search '${filter}' matched ${id}`), response.value];
  },
);

export const checkObjectReplacement = decorateCheck(
  titled('Object replacement'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ScimResource>> => {
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const path = resourcePath(ctx.resourceType, id);
    const payload = generatePayload(ctx.schema, ctx.extensions, created);
    const outcome = expectResource(path, await client.update(ctx.resourceType, id, payload), 200, id);
    return isResource(outcome) ? [success(`Replaced ${ctx.resourceType.name} ${id}`, outcome), outcome] : outcome;
  },
);

export const checkObjectPatch = decorateCheck(
  titled('Object patch'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<unknown>> => {
    if (!ctx.serviceProviderConfig.patch?.supported) return skipped('PATCH is not supported');
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const attribute = findPatchableAttribute(ctx.schema);
    if (attribute === undefined) return skipped(`${ctx.schema.id} has no attribute to patch`);

    const path = resourcePath(ctx.resourceType, id);
    const value = generateValue(attribute);
    const response = await client.patch(ctx.resourceType, id, {
      schemas: [SCIM_PATCH_SCHEMA],
      Operations: [{ op: 'replace', path: attribute.name, value }],
    });

    if (response.kind === 'Empty') {
      if (response.httpStatus !== 204) {
        return error(`${path} answered with HTTP ${response.httpStatus} and no body`);
      }
      return success(`Replaced ${attribute.name} (HTTP 204)`);
    }

    const outcome = expectResource(path, response, 200, id);
    if (!isResource(outcome)) return outcome;
    const returned: unknown = outcome[attribute.name];
    if (returned !== undefined && returned !== value) {
      return error(`${path} returned ${attribute.name} = ${JSON.stringify(returned)} instead of ${JSON.stringify(value)}`, outcome);
    }
    return [success(`Replaced ${attribute.name}`, outcome), outcome];
  },
);

export const checkObjectDeletion = decorateCheck(
  titled('Object deletion'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<undefined>> => {
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const path = resourcePath(ctx.resourceType, id);
    const response = await client.delete(ctx.resourceType, id);
    if (response.kind !== 'Empty') {
      return unexpectedMessage(path, 'Empty', response);
    }
    if (response.httpStatus !== 204) {
      return error(`${path} answered with HTTP ${response.httpStatus} instead of 204`);
    }
    return success(`Deleted ${ctx.resourceType.name} ${id}`);
  },
);

export const checkQueryAfterDeletion = decorateCheck(
  titled('Query after deletion'),
  async (client: ScimClient, ctx: ResourceCheckContext, created?: ScimResource): Promise<CheckReturn<ScimError>> => {
    const id = createdId(created);
    if (id === undefined) return skipped(NOT_CREATED);

    const path = resourcePath(ctx.resourceType, id);
    return expectNotFound(path, await client.query(path));
  },
);

/**
 * Run the whole lifecycle for one resource type, in order. Steps that need
 * the created object are SKIPPED when creation failed.
 */
export async function checkResourceType(
  client: ScimClient,
  ctx: ResourceCheckContext,
  onResult?: ResultListener,
  logger?: CheckerLogger,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const notify = guardListener(onResult, logger);
  const record = (result: CheckResult): void => {
    results.push(result);
    notify(result);
  };

  const [unknown] = await checkUnknownResource(client, ctx);
  record(unknown);

  const [creation, created] = await checkObjectCreation(client, ctx);
  record(creation);

  const [query, fetched] = await checkObjectQuery(client, ctx, created);
  record(query);
  const current = fetched ?? created;

  for (const check of [checkObjectListing, checkFilteredQuery, checkObjectSearch]) {
    const [result] = await check(client, ctx, current);
    record(result);
  }

  const [replacement] = await checkObjectReplacement(client, ctx, current);
  record(replacement);

  for (const check of [checkObjectPatch, checkObjectDeletion, checkQueryAfterDeletion]) {
    const [result] = await check(client, ctx, current);
    record(result);
  }

  return results;
}
