import type { CheckerLogger } from '../logging/checker-logger.service';
import type { ScimClient } from '../scim/client/scim-client.interface';
import { DEFAULT_RESOURCE_TYPES } from '../scim/common/scim-constants';
import type { ResourceType, ScimSchema, ServiceProviderConfig } from '../scim/models/scim-models';
import { CheckResult, Report, error, skipped, toCheckResult } from './check-result';
import { ResultListener, guardListener } from './check-runner';
import { checkRandomUrl } from './checks/random-url.check';
import { ResourceCheckContext, checkResourceType } from './checks/resource.check';
import { checkResourceTypesEndpoint } from './checks/resource-types.check';
import { checkSchemasEndpoint } from './checks/schemas.check';
import { checkServiceProviderConfigEndpoint } from './checks/service-provider-config.check';

export interface CheckServerOptions {
  /**
   * Resource type names to exercise. Discovered types outside this list are
   * reported as SKIPPED; when omitted, every discovered type is exercised.
   */
  resourceTypes?: readonly string[];
  /** Called for each result as soon as it is produced. A throwing listener does not stop the run. */
  onResult?: ResultListener;
  /** Receives listener failures. */
  logger?: CheckerLogger;
}

const resourceTitle = (name: string): string => `Resource checks (${name})`;

function isRequested(resourceType: ResourceType, requested: readonly string[] | undefined): boolean {
  if (requested === undefined) return true;
  const name = resourceType.name.toLowerCase();
  return requested.some((candidate) => candidate.toLowerCase() === name);
}

/** Core schema plus the extensions available; undefined when the core or a required extension is missing. */
function resolveSchemas(
  resourceType: ResourceType,
  schemas: readonly ScimSchema[],
): { schema: ScimSchema; extensions: ScimSchema[] } | undefined {
  const byId = new Map(schemas.map((schema) => [schema.id, schema]));
  const schema = byId.get(resourceType.schema);
  if (schema === undefined) return undefined;

  const extensions: ScimSchema[] = [];
  for (const extension of resourceType.schemaExtensions) {
    const resolved = byId.get(extension.schema);
    if (resolved !== undefined) {
      extensions.push(resolved);
    } else if (extension.required) {
      return undefined;
    }
  }
  return { schema, extensions };
}

/**
 * Run every check against a SCIM server and return the ordered report.
 *
 *   1. Discovery: /ServiceProviderConfig, /Schemas, /ResourceTypes
 *   2. Misc: random URL
 *   3. Resource lifecycle, per resource type
 *
 * Never rejects: failures become ERROR results.
 */
export async function checkServer(client: ScimClient, options: CheckServerOptions = {}): Promise<Report> {
  const report: Report = [];
  const notify = guardListener(options.onResult, options.logger);
  const record = (result: CheckResult): void => {
    report.push(result);
    notify(result);
  };

  // ─── Discovery ─────────────────────────────────────────────────────

  const [configResult, serviceProviderConfig] = await checkServiceProviderConfigEndpoint(client);
  record(configResult);
  const [schemasResult, schemas] = await checkSchemasEndpoint(client);
  record(schemasResult);
  const [resourceTypesResult, resourceTypes] = await checkResourceTypesEndpoint(client);
  record(resourceTypesResult);

  // ─── Misc ──────────────────────────────────────────────────────────

  const [randomUrlResult] = await checkRandomUrl(client);
  record(randomUrlResult);

  // ─── Resources ─────────────────────────────────────────────────────

  if (resourceTypes === undefined) {
    for (const name of options.resourceTypes ?? DEFAULT_RESOURCE_TYPES) {
      record(toCheckResult(skipped('Resource types could not be discovered'), resourceTitle(name)));
    }
    return report;
  }

  for (const resourceType of resourceTypes) {
    const outcome = prepareResourceType(resourceType, options.resourceTypes, serviceProviderConfig, schemas);
    if ('status' in outcome) {
      record(outcome);
      continue;
    }
    await checkResourceType(client, outcome, record);
  }

  return report;
}

function prepareResourceType(
  resourceType: ResourceType,
  requested: readonly string[] | undefined,
  serviceProviderConfig: ServiceProviderConfig | undefined,
  schemas: ScimSchema[] | undefined,
): CheckResult | ResourceCheckContext {
  const title = resourceTitle(resourceType.name);
  if (!isRequested(resourceType, requested)) {
    return toCheckResult(skipped(`${resourceType.name} is not among the requested resource types`), title);
  }
  if (serviceProviderConfig === undefined) {
    return toCheckResult(skipped('The service provider configuration could not be retrieved'), title);
  }
  if (schemas === undefined) {
    return toCheckResult(skipped('Schemas could not be retrieved'), title);
  }
  const resolved = resolveSchemas(resourceType, schemas);
  if (resolved === undefined) {
    return toCheckResult(error(`No Schema matching the ResourceType ${resourceType.name}`, resourceType), title);
  }
  return { resourceType, serviceProviderConfig, ...resolved };
}
