import {
  Interpolation,
  isInterpolation,
  isPropertyList,
  isReference,
  IResourceHandler,
  PropertyValue,
  Reference,
  ResolvedValue,
  ResourceDescriptor,
  UnresolvedReferenceError,
} from '@linkstack/contracts';

/** Concrete identifiers per logical id, computed once per synthesis run */
export type CompletedOutputs = ReadonlyMap<string, Readonly<Record<string, string>>>;

export interface ReferenceSite {
  reference: Reference;
  path: string;
}

export function makeReference(source: ResourceDescriptor | string, outputName: string): Reference {
  const reference: Reference = { type: 'Reference', sourceLogicalId: typeof source === 'string' ? source : source.logicalId, outputName };
  return Object.freeze(reference);
}

export function interpolate(...parts: (string | Reference)[]): Interpolation {
  const interpolation: Interpolation = { type: 'Interpolation', parts: Object.freeze([...parts]) };
  return Object.freeze(interpolation);
}

/**
 * Binds a dependency's output: the literal value when a literal property already fixes it,
 * a Reference resolved at synthesis otherwise.
 */
export function bindOutput(source: ResourceDescriptor, handler: IResourceHandler, outputName: string): string | Reference {
  const property = handler.literalOutputs[outputName];
  const literal = property === undefined ? undefined : source.properties[property];
  if (typeof literal === 'string' && literal !== '') return literal;

  return makeReference(source, outputName);
}

/** Every Reference nested in a value, with the property path it sits at */
export function collectReferences(value: PropertyValue | undefined, path: string): ReferenceSite[] {
  if (value === null || value === undefined || typeof value !== 'object') return [];

  if (isReference(value)) return [{ reference: value, path }];
  if (isInterpolation(value)) return value.parts.filter(isReference).map((reference) => ({ reference, path }));

  if (isPropertyList(value)) return value.flatMap((item: PropertyValue, index: number) => collectReferences(item, `${path}[${index}]`));

  return Object.entries(value).flatMap(([key, item]) => collectReferences(item, path ? `${path}.${key}` : key));
}

export function resolve(ref: Reference, completedOutputs: CompletedOutputs): string {
  const outputs = completedOutputs.get(ref.sourceLogicalId);
  // Only outputs the handler produced count, never names inherited from Object.prototype
  const value: unknown = outputs && Object.hasOwn(outputs, ref.outputName) ? outputs[ref.outputName] : undefined;
  if (typeof value !== 'string') throw new UnresolvedReferenceError(ref.sourceLogicalId, ref.outputName);

  return value;
}

export class ReferenceResolver {
  constructor(private completedOutputs: CompletedOutputs) {}

  resolve(ref: Reference): string {
    return resolve(ref, this.completedOutputs);
  }

  resolveValue(value: PropertyValue): ResolvedValue {
    if (value === null || typeof value !== 'object') return value;

    if (isReference(value)) return this.resolve(value);
    if (isInterpolation(value)) return this.interpolateParts(value);

    if (isPropertyList(value)) return value.map((item: PropertyValue) => this.resolveValue(item));

    const result: Record<string, ResolvedValue> = {};
    for (const [key, item] of Object.entries(value)) result[key] = this.resolveValue(item);
    return result;
  }

  resolveProperties(properties: Readonly<Record<string, PropertyValue>>): Record<string, ResolvedValue> {
    const result: Record<string, ResolvedValue> = {};
    for (const [key, value] of Object.entries(properties)) result[key] = this.resolveValue(value);
    return result;
  }

  interpolateParts(value: Interpolation): string {
    return value.parts.map((part) => (typeof part === 'string' ? part : this.resolve(part))).join('');
  }
}
