import type { ConfigService } from '@nestjs/config';
import { z } from 'zod';

import { DEFAULT_TIMEOUT_MS } from '../scim/common/scim-constants';
import { ConfigurationError } from '../scim/common/scim-errors';
import { formatZodIssues } from '../scim/client/scim-response.parser';

/**
 * Runtime configuration of one tester invocation.
 *
 * Sources, highest priority first:
 *   1. CLI options (passed to ScimTesterConfigModule.forRoot)
 *   2. Environment: SCIM_BASE_URL, SCIM_TOKEN, SCIM_TIMEOUT_MS, SCIM_RESOURCE_TYPES
 */
export interface ScimTesterConfig {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  /** Resource type names to exercise; undefined means every discovered type. */
  resourceTypes?: string[];
}

export type ScimTesterOverrides = Partial<ScimTesterConfig>;

export const SCIM_TESTER_CONFIG = 'SCIM_TESTER_CONFIG';

const ScimTesterConfigSchema = z.object({
  baseUrl: z
    .string({ required_error: 'A SCIM base URL is required (argument <host> or SCIM_BASE_URL)' })
    .url('The SCIM base URL must be an absolute URL')
    .refine((url) => /^https?:\/\//i.test(url), 'The SCIM base URL must use http or https'),
  token: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  resourceTypes: z.array(z.string().min(1)).min(1).optional(),
});

/** "User, Group" → ['User', 'Group']; blank → undefined. */
export function parseResourceTypeList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return names.length > 0 ? names : undefined;
}

export function buildScimTesterConfig(env: ConfigService, overrides: ScimTesterOverrides = {}): ScimTesterConfig {
  const parsed = ScimTesterConfigSchema.safeParse({
    baseUrl: overrides.baseUrl ?? env.get<string>('SCIM_BASE_URL'),
    token: overrides.token ?? (env.get<string>('SCIM_TOKEN') || undefined),
    timeoutMs: overrides.timeoutMs ?? env.get<string>('SCIM_TIMEOUT_MS'),
    resourceTypes: overrides.resourceTypes ?? parseResourceTypeList(env.get<string>('SCIM_RESOURCE_TYPES')),
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
