import { randomUUID } from 'node:crypto';

import type { ScimClient } from '../../scim/client/scim-client.interface';
import { ScimParseError, ScimTransportError } from '../../scim/common/scim-errors';
import { ScimError, ScimMessage, messageData } from '../../scim/models/scim-models';
import { error, success } from '../check-result';
import { CheckReturn, decorateCheck } from '../check-runner';

/**
 * A request to a random URL should return a 404 Error object.
 *
 * Each failure mode gets its own reason so the report tells them apart:
 * unreachable server, unparseable body, non-Error object, wrong status.
 */
export const checkRandomUrl = decorateCheck(
  'Random URL returns a 404 Error',
  async (client: ScimClient): Promise<CheckReturn<ScimError>> => {
    const probablyInvalidUrl = `/${randomUUID()}`;

    let response: ScimMessage;
    try {
      response = await client.query(probablyInvalidUrl);
    } catch (err) {
      if (err instanceof ScimTransportError) {
        return error(err.message);
      }
      if (err instanceof ScimParseError) {
        return error(`${probablyInvalidUrl} did not return an Error object`, err.rawBody);
      }
      throw err;
    }

    if (response.kind !== 'Error') {
      return error(
        `${probablyInvalidUrl} did return an object, but not an Error object (HTTP ${response.httpStatus})`,
        messageData(response),
      );
    }

    const status = response.value.status !== 404 ? response.value.status : response.httpStatus;
    if (status !== 404) {
      return error(`${probablyInvalidUrl} did return an object, but the status code is ${status}`, response.value);
    }

    return [success(`${probablyInvalidUrl} correctly returned a 404 error`, response.value), response.value];
  },
);
