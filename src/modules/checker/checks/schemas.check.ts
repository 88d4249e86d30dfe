import { SCHEMAS_PATH } from '../../scim/common/scim-constants';
import type { ScimClient } from '../../scim/client/scim-client.interface';
import { ScimSchema, ScimSchemaSchema } from '../../scim/models/scim-models';
import { error, success } from '../check-result';
import { CheckReturn, decorateCheck } from '../check-runner';
import { parseItems, unexpectedMessage } from './check-helpers';

/**
 * GET /Schemas — must be a ListResponse of schema definitions.
 * Valid schemas are forwarded even when some entries are rejected.
 */
export const checkSchemasEndpoint = decorateCheck(
  'Schemas endpoint',
  async (client: ScimClient): Promise<CheckReturn<ScimSchema[]>> => {
    const response = await client.query(SCHEMAS_PATH);
    if (response.kind !== 'ListResponse') {
      return unexpectedMessage(SCHEMAS_PATH, 'ListResponse', response);
    }

    const { valid, invalid } = parseItems(response.value.Resources, ScimSchemaSchema);
    if (response.httpStatus !== 200) {
      return [error(`${SCHEMAS_PATH} answered with HTTP ${response.httpStatus} instead of 200`, response.value), valid];
    }
    if (invalid.length > 0) {
      return [error(`${SCHEMAS_PATH} returned invalid schemas: ${invalid.join(' | ')}`, response.value), valid];
    }
    if (valid.length === 0) {
      return [error(`${SCHEMAS_PATH} did not return any schema`, response.value), valid];
    }
    return [success(`Found schemas: ${valid.map((schema) => schema.id).join(', ')}`, valid), valid];
  },
);
