import { randomBytes, randomInt, randomUUID } from 'node:crypto';

import { ResourcePayload, ScimAttribute, ScimSchema, isRecord } from '../../scim/models/scim-models';

/** Attributes the service provider owns, whatever their declared mutability. */
const SERVER_OWNED_ATTRIBUTES = new Set(['id', 'meta', 'schemas']);

/** Reference types that point outside the service provider. */
const EXTERNAL_REFERENCE_TYPES = new Set(['external', 'uri']);

function token(): string {
  return randomUUID().slice(0, 8);
}

export function isWritable(attribute: ScimAttribute): boolean {
  return attribute.mutability !== 'readOnly' && !SERVER_OWNED_ATTRIBUTES.has(attribute.name.toLowerCase());
}

/**
 * True when the attribute (or one of its sub-attributes) references another
 * resource, e.g. `members.value` or `manager.$ref`. Such values would have to
 * point at existing objects, so they are never generated.
 */
export function referencesResources(attribute: ScimAttribute): boolean {
  if (attribute.type === 'reference') {
    const types = attribute.referenceTypes ?? [];
    return types.length > 0 && types.some((type) => !EXTERNAL_REFERENCE_TYPES.has(type.toLowerCase()));
  }
  if (attribute.type === 'complex') {
    return (attribute.subAttributes ?? []).some(referencesResources);
  }
  return false;
}

function stringValue(attribute: ScimAttribute, parent?: ScimAttribute): string {
  const name = attribute.name.toLowerCase();
  const parentName = parent?.name.toLowerCase();

  if (name.includes('email') || (name === 'value' && parentName === 'emails')) {
    return `${token()}@example.com`;
  }
  if (name === 'value' && parentName === 'phonenumbers') {
    return `+1-555-01${randomInt(10, 100)}`;
  }
  if (name === 'locale' || name === 'preferredlanguage') {
    return 'en-US';
  }
  if (name === 'timezone') {
    return 'America/Los_Angeles';
  }
  return `${attribute.name}-${token()}`;
}

function singleValue(attribute: ScimAttribute, parent?: ScimAttribute): unknown {
  switch (attribute.type) {
    case 'string':
      return attribute.canonicalValues?.[0] ?? stringValue(attribute, parent);
    case 'boolean':
      return true;
    case 'integer':
      return randomInt(1, 1000);
    case 'decimal':
      return randomInt(100, 100_000) / 100;
    case 'dateTime':
      return new Date().toISOString();
    case 'binary':
      return randomBytes(12).toString('base64');
    case 'reference':
      return referencesResources(attribute) ? undefined : `https://example.com/${token()}`;
    case 'complex': {
      const value: Record<string, unknown> = {};
      for (const sub of attribute.subAttributes ?? []) {
        if (!isWritable(sub)) continue;
        const generated = generateValue(sub, attribute);
        if (generated !== undefined) value[sub.name] = generated;
      }
      return Object.keys(value).length > 0 ? value : undefined;
    }
  }
}

/** A random value matching the attribute definition, wrapped in an array when multi-valued. */
export function generateValue(attribute: ScimAttribute, parent?: ScimAttribute): unknown {
  const value = singleValue(attribute, parent);
  if (value === undefined) return undefined;
  return attribute.multiValued ? [value] : value;
}

function fillAttributes(
  attributes: readonly ScimAttribute[],
  previous: Record<string, unknown> | undefined,
): Record<string, unknown> {
  const target: Record<string, unknown> = {};
  for (const attribute of attributes) {
    if (!isWritable(attribute) || referencesResources(attribute)) continue;

    if (attribute.mutability === 'immutable' && previous !== undefined) {
      // Immutable values may only be repeated once set.
      if (attribute.name in previous) target[attribute.name] = previous[attribute.name];
      continue;
    }

    const value = generateValue(attribute);
    if (value !== undefined) target[attribute.name] = value;
  }
  return target;
}

/**
 * Build a resource payload from a core schema and its extension schemas.
 *
 * Extension attributes are nested under the extension URN. When `previous`
 * is given (a replacement), immutable values are copied from it instead of
 * being regenerated.
 */
export function generatePayload(
  schema: ScimSchema,
  extensions: readonly ScimSchema[] = [],
  previous?: Record<string, unknown>,
): ResourcePayload {
  const payload: ResourcePayload = {
    schemas: [schema.id, ...extensions.map((extension) => extension.id)],
    ...fillAttributes(schema.attributes, previous),
  };

  for (const extension of extensions) {
    const previousExtension = previous?.[extension.id];
    const values = fillAttributes(extension.attributes, isRecord(previousExtension) ? previousExtension : undefined);
    if (Object.keys(values).length > 0) {
      payload[extension.id] = values;
    }
  }
  return payload;
}

// ─── Attribute selection ─────────────────────────────────────────────

/** `server` or `global` uniqueness, in any case. */
function isUnique(attribute: ScimAttribute): boolean {
  const uniqueness = attribute.uniqueness?.toLowerCase();
  return uniqueness === 'server' || uniqueness === 'global';
}

function isPlainString(attribute: ScimAttribute): boolean {
  return attribute.type === 'string' && !attribute.multiValued && attribute.canonicalValues === undefined;
}

/**
 * A top-level single-valued string attribute a PATCH `replace` may target.
 * Optional, non-unique attributes come first so the patch does not collide
 * with another object.
 */
export function findPatchableAttribute(schema: ScimSchema): ScimAttribute | undefined {
  const candidates = schema.attributes.filter(
    (attribute) => attribute.mutability === 'readWrite' && isWritable(attribute) && isPlainString(attribute),
  );
  return candidates.find((attribute) => !attribute.required && !isUnique(attribute)) ?? candidates[0];
}

export interface FilterTarget {
  attribute: string;
  value: string;
}

/**
 * Pick an attribute of `resource` that identifies it in a filter: a unique
 * string attribute when the schema declares one, otherwise a required one,
 * otherwise `id`.
 */
export function findFilterTarget(schema: ScimSchema, resource: Record<string, unknown>): FilterTarget | undefined {
  const present = schema.attributes.filter(
    (attribute) => isPlainString(attribute) && typeof resource[attribute.name] === 'string',
  );
  const chosen =
    present.find(isUnique) ??
    present.find((attribute) => attribute.required);
  if (chosen) {
    const value = resource[chosen.name];
    if (typeof value === 'string') return { attribute: chosen.name, value };
  }
  return typeof resource.id === 'string' ? { attribute: 'id', value: resource.id } : undefined;
}

/** `userName eq "bjensen"`, with quotes and backslashes escaped. */
export function equalityFilter(target: FilterTarget): string {
  const escaped = target.value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `${target.attribute} eq "${escaped}"`;
}
