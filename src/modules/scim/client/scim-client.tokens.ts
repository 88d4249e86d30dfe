/**
 * NestJS injection tokens for the SCIM client.
 *
 * Usage:
 *   @Inject(SCIM_CLIENT) private readonly client: ScimClient
 */
export const SCIM_CLIENT = 'SCIM_CLIENT';
