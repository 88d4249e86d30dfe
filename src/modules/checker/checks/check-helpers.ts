import type { ZodType, ZodTypeDef } from 'zod';

import { formatZodIssues } from '../../scim/client/scim-response.parser';
import { ScimMessage, ScimMessageKind, messageData } from '../../scim/models/scim-models';
import { CheckResultInit, error } from '../check-result';

const article = (word: string): string => (/^[AEIOU]/i.test(word) ? 'an' : 'a');

/** ERROR result for a response of the wrong kind. */
export function unexpectedMessage(path: string, expected: ScimMessageKind, message: ScimMessage): CheckResultInit {
  if (message.kind === 'Error') {
    const detail = message.value.detail ? `: ${message.value.detail}` : '';
    return error(`${path} returned an Error object with status ${message.value.status}${detail}`, message.value);
  }
  return error(
    `${path} did not return ${article(expected)} ${expected} object (got ${message.kind}, HTTP ${message.httpStatus})`,
    messageData(message),
  );
}

export interface ParsedItems<T> {
  valid: T[];
  /** `Resources[i]: issues`, one entry per rejected item. */
  invalid: string[];
}

/** Validate each `Resources` entry of a ListResponse independently. */
export function parseItems<T>(items: unknown[], schema: ZodType<T, ZodTypeDef, unknown>): ParsedItems<T> {
  const valid: T[] = [];
  const invalid: string[] = [];
  items.forEach((item, index) => {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      invalid.push(`Resources[${index}]: ${formatZodIssues(parsed.error)}`);
    }
  });
  return { valid, invalid };
}
