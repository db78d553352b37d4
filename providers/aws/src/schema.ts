import {
  InvalidPropertyError,
  isInterpolation,
  isPropertyList,
  isReference,
  ISchema,
  MissingPropertyError,
  Properties,
  PropertyValue,
  ResolvedValue,
  SchemaType,
} from '@linkstack/contracts';

function isDeferred(value: PropertyValue): boolean {
  return isReference(value) || isInterpolation(value);
}

function matchesType(value: PropertyValue, type: SchemaType): boolean {
  // References only ever produce strings once resolved
  if (isDeferred(value)) return type === 'string';

  switch (type) {
    case 'string':
    case 'number':
    case 'boolean': {
      return typeof value === type;
    }
    case 'array': {
      return Array.isArray(value);
    }
    case 'object': {
      return value !== null && typeof value === 'object' && !Array.isArray(value);
    }
  }
}

/**
 * Checks properties against a schema. Unknown properties are rejected so a typo
 * never silently drops configuration.
 */
export function validateAgainstSchema(logicalId: string, schema: ISchema, properties: Properties): void {
  for (const [field, definition] of Object.entries(schema)) {
    const value = properties[field];

    if (value === undefined || value === null) {
      if (definition.required) throw new MissingPropertyError(logicalId, field);
      continue;
    }

    if (!matchesType(value, definition.type)) throw new InvalidPropertyError(logicalId, field, `of type ${definition.type}`);

    if (definition.nonEmpty && typeof value === 'string' && value.trim() === '') throw new MissingPropertyError(logicalId, field);
  }

  for (const field of Object.keys(properties)) if (!Object.hasOwn(schema, field)) throw new InvalidPropertyError(logicalId, field, 'a known property');
}

export function isPropertyRecord(value: PropertyValue | undefined): value is { readonly [key: string]: PropertyValue } {
  if (value === null || value === undefined || typeof value !== 'object') return false;
  return !isPropertyList(value) && !isDeferred(value);
}

export function requireRange(logicalId: string, properties: Properties, field: string, min: number, max: number): void {
  const value = properties[field];
  if (typeof value !== 'number') return;
  if (!Number.isFinite(value) || value < min || value > max) throw new InvalidPropertyError(logicalId, field, `between ${min} and ${max}`);
}

export function asString(value: ResolvedValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: ResolvedValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

export function asRecord(value: ResolvedValue | undefined): Record<string, ResolvedValue> | undefined {
  if (value === null || value === undefined || typeof value !== 'object' || Array.isArray(value)) return undefined;
  return value;
}

/** Drops undefined entries so rendered documents carry only what was configured */
export function compact(entries: Record<string, ResolvedValue | undefined>): Record<string, ResolvedValue> {
  const result: Record<string, ResolvedValue> = {};
  for (const [key, value] of Object.entries(entries)) if (value !== undefined) result[key] = value;
  return result;
}
