import { RESOURCE_TYPES_PATH } from '../../scim/common/scim-constants';
import type { ScimClient } from '../../scim/client/scim-client.interface';
import { ResourceType, ResourceTypeSchema } from '../../scim/models/scim-models';
import { error, skipped, success } from '../check-result';
import { CheckReturn, decorateCheck } from '../check-runner';
import { parseItems, unexpectedMessage } from './check-helpers';

/**
 * GET /ResourceTypes — must be a ListResponse of resource types.
 *
 * An empty list is reported as SKIPPED: there is nothing to test, which is
 * not in itself a protocol violation.
 */
export const checkResourceTypesEndpoint = decorateCheck(
  'Resource types endpoint',
  async (client: ScimClient): Promise<CheckReturn<ResourceType[]>> => {
    const response = await client.query(RESOURCE_TYPES_PATH);
    if (response.kind !== 'ListResponse') {
      return unexpectedMessage(RESOURCE_TYPES_PATH, 'ListResponse', response);
    }

    const { valid, invalid } = parseItems(response.value.Resources, ResourceTypeSchema);
    if (response.httpStatus !== 200) {
      return [error(`${RESOURCE_TYPES_PATH} answered with HTTP ${response.httpStatus} instead of 200`, response.value), valid];
    }
    if (invalid.length > 0) {
      return [error(`${RESOURCE_TYPES_PATH} returned invalid resource types: ${invalid.join(' | ')}`, response.value), valid];
    }
    if (valid.length === 0) {
      return [skipped(`${RESOURCE_TYPES_PATH} did not advertise any resource type`), valid];
    }
    return [success(`Found resource types: ${valid.map((type) => type.name).join(', ')}`, valid), valid];
  },
);
