export const SCIM_CORE_USER_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const SCIM_CORE_GROUP_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const SCIM_ENTERPRISE_USER_SCHEMA = 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User';
export const SCIM_SCHEMA_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Schema';
export const SCIM_RESOURCE_TYPE_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:ResourceType';
export const SCIM_SP_CONFIG_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:ServiceProviderConfig';
export const SCIM_LIST_RESPONSE_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:ListResponse';
export const SCIM_PATCH_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:PatchOp';
export const SCIM_ERROR_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:Error';
export const SCIM_SEARCH_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:SearchRequest';

export const SCIM_MEDIA_TYPE = 'application/scim+json';

/** Discovery endpoints, relative to the service provider base URL (RFC 7644 §4). */
export const SERVICE_PROVIDER_CONFIG_PATH = '/ServiceProviderConfig';
export const SCHEMAS_PATH = '/Schemas';
export const RESOURCE_TYPES_PATH = '/ResourceTypes';

/** Resource types tested when discovery cannot tell which ones exist. */
export const DEFAULT_RESOURCE_TYPES: readonly string[] = ['User', 'Group'];

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * RFC 7643 §5 — attributes every ServiceProviderConfig must carry.
 * @see https://datatracker.ietf.org/doc/html/rfc7643#section-5
 */
export const SP_CONFIG_MANDATORY_ATTRIBUTES = [
  'patch',
  'bulk',
  'filter',
  'changePassword',
  'sort',
  'etag',
  'authenticationSchemes',
] as const;
