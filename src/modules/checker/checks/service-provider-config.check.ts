import { SERVICE_PROVIDER_CONFIG_PATH, SP_CONFIG_MANDATORY_ATTRIBUTES } from '../../scim/common/scim-constants';
import type { ScimClient } from '../../scim/client/scim-client.interface';
import type { ServiceProviderConfig } from '../../scim/models/scim-models';
import { error, success } from '../check-result';
import { CheckReturn, decorateCheck } from '../check-runner';
import { unexpectedMessage } from './check-helpers';

/**
 * GET /ServiceProviderConfig (RFC 7644 §4).
 *
 * The config is forwarded even when mandatory attributes are missing: the
 * capabilities that *are* advertised still gate the optional resource checks.
 */
export const checkServiceProviderConfigEndpoint = decorateCheck(
  'Service provider configuration endpoint',
  async (client: ScimClient): Promise<CheckReturn<ServiceProviderConfig>> => {
    const response = await client.query(SERVICE_PROVIDER_CONFIG_PATH);
    if (response.kind !== 'ServiceProviderConfig') {
      return unexpectedMessage(SERVICE_PROVIDER_CONFIG_PATH, 'ServiceProviderConfig', response);
    }

    const config = response.value;
    const missing = SP_CONFIG_MANDATORY_ATTRIBUTES.filter((attribute) => config[attribute] === undefined);
    if (missing.length > 0) {
      return [error(`ServiceProviderConfig is missing mandatory attributes: ${missing.join(', ')}`, config), config];
    }
    if (response.httpStatus !== 200) {
      return [error(`${SERVICE_PROVIDER_CONFIG_PATH} answered with HTTP ${response.httpStatus} instead of 200`, config), config];
    }

    const features = (['patch', 'bulk', 'filter', 'changePassword', 'sort', 'etag'] as const)
      .filter((feature) => config[feature]?.supported)
      .join(', ');
    return [success(`Supported features: ${features || 'none'}`, config), config];
  },
);
