/**
 * ScimClient — the protocol facade the checks talk to.
 *
 * Every method resolves to a classified {@link ScimMessage}, including SCIM
 * Error objects. Two conditions reject instead:
 *   - ScimTransportError: the server could not be reached
 *   - ScimParseError:     the body is not a recognised SCIM message (raw body attached)
 *
 * Implementations:
 *   - HttpScimClient (fetch)
 */
import type {
  PatchRequest,
  ResourcePayload,
  ResourceType,
  ScimMessage,
  ScimQueryParams,
  SearchRequest,
} from '../models/scim-models';

export interface ScimClient {
  /** GET a path relative to the base URL, e.g. `/ServiceProviderConfig` or `/Users/{id}`. */
  query(path: string, params?: ScimQueryParams): Promise<ScimMessage>;

  /** POST a new resource to the resource type's endpoint. */
  create(resourceType: ResourceType, payload: ResourcePayload): Promise<ScimMessage>;

  /** PUT (full replacement) of an existing resource. */
  update(resourceType: ResourceType, id: string, payload: ResourcePayload): Promise<ScimMessage>;

  /** PATCH an existing resource. */
  patch(resourceType: ResourceType, id: string, request: PatchRequest): Promise<ScimMessage>;

  /** DELETE a resource. Resolves to `Empty` on success. */
  delete(resourceType: ResourceType, id: string): Promise<ScimMessage>;

  /** POST `{endpoint}/.search` (RFC 7644 §3.4.3). */
  search(resourceType: ResourceType, request: SearchRequest): Promise<ScimMessage>;
}

