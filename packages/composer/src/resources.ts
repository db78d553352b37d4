import {
  DuplicateIdentityError,
  isInterpolation,
  isPropertyList,
  isReference,
  Properties,
  PropertyValue,
  Reference,
  ResourceDescriptor,
  ResourceKind,
} from '@linkstack/contracts';

import { interpolate, makeReference } from './resolvers/ReferenceResolver';
import { StackGraph } from './StackGraph';

/** Deep copy of a property value with every nested list and record frozen */
function freezeValue(value: PropertyValue): PropertyValue {
  if (value === null || typeof value !== 'object') return value;

  if (isReference(value)) return makeReference(value.sourceLogicalId, value.outputName);
  if (isInterpolation(value))
    return interpolate(...value.parts.map((part) => (typeof part === 'string' ? part : makeReference(part.sourceLogicalId, part.outputName))));

  if (isPropertyList(value)) return Object.freeze(value.map((item: PropertyValue) => freezeValue(item)));

  return freezeProperties(value);
}

function freezeProperties(properties: Properties): Properties {
  const copy: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(properties)) copy[key] = freezeValue(value);
  return Object.freeze(copy);
}

/**
 * Creates a descriptor and registers it in the graph. Properties are copied and frozen, so
 * the caller cannot change them afterwards; References among them are stored as they are
 * and only resolved at synthesis.
 */
export function createResource(graph: StackGraph, kind: ResourceKind, logicalId: string, properties: Properties): ResourceDescriptor {
  // Identity is checked before properties so a duplicate always reports as one
  if (graph.hasResource(logicalId)) throw new DuplicateIdentityError(logicalId);

  const frozen = freezeProperties(properties);
  const handler = graph.provider.getHandler(kind);
  handler.validate(logicalId, frozen);

  const outputs: Record<string, Reference> = {};
  for (const outputName of handler.outputNames) outputs[outputName] = makeReference(logicalId, outputName);

  const descriptor: ResourceDescriptor = {
    logicalId,
    kind,
    properties: frozen,
    outputs: Object.freeze(outputs),
  };

  graph.addResource(Object.freeze(descriptor));
  return descriptor;
}
