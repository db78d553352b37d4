export type CompositionErrorCode =
  | 'DuplicateIdentity'
  | 'MissingProperty'
  | 'InvalidProperty'
  | 'UnsupportedCapability'
  | 'DanglingGrant'
  | 'OutOfOrderConstruction'
  | 'UnresolvedReference'
  | 'DependencyCycle'
  | 'GraphConsumed';

export interface CompositionErrorDetails {
  /** Offending logical ids, dependent first */
  logicalIds: string[];
  field?: string;
}

/**
 * Base for every construction and synthesis failure. None of these are retryable:
 * the same input always fails the same way.
 */
export class CompositionError extends Error {
  override name = 'CompositionError';
  readonly code: CompositionErrorCode;
  readonly logicalIds: readonly string[];
  readonly field?: string;

  constructor(code: CompositionErrorCode, message: string, details: CompositionErrorDetails) {
    super(`[${code}] ${message}`);
    Object.setPrototypeOf(this, new.target.prototype);

    this.code = code;
    this.logicalIds = details.logicalIds;
    this.field = details.field;
  }

  toJSON(): { code: CompositionErrorCode; message: string; logicalIds: readonly string[]; field?: string } {
    return { code: this.code, message: this.message, logicalIds: this.logicalIds, field: this.field };
  }
}

export class DuplicateIdentityError extends CompositionError {
  override name = 'DuplicateIdentityError';

  constructor(logicalId: string) {
    super('DuplicateIdentity', `"${logicalId}" is already declared in the stack`, { logicalIds: [logicalId] });
  }
}

export class MissingPropertyError extends CompositionError {
  override name = 'MissingPropertyError';

  constructor(logicalId: string, field: string) {
    super('MissingProperty', `Resource "${logicalId}" is missing required property "${field}"`, { logicalIds: [logicalId], field });
  }
}

export class InvalidPropertyError extends CompositionError {
  override name = 'InvalidPropertyError';

  constructor(logicalId: string, field: string, expected: string) {
    super('InvalidProperty', `Property "${field}" of resource "${logicalId}" must be ${expected}`, { logicalIds: [logicalId], field });
  }
}

export class UnsupportedCapabilityError extends CompositionError {
  override name = 'UnsupportedCapabilityError';

  constructor(principalId: string, resourceId: string, kind: string, capability: string) {
    super('UnsupportedCapability', `Capability "${capability}" is not supported by ${kind} resource "${resourceId}" (requested by "${principalId}")`, {
      logicalIds: [principalId, resourceId],
      field: capability,
    });
  }
}

export class DanglingGrantError extends CompositionError {
  override name = 'DanglingGrantError';

  constructor(principalId: string, resourceId: string, missingId: string) {
    super('DanglingGrant', `Cannot grant "${principalId}" access to "${resourceId}": resource "${missingId}" does not exist yet`, {
      logicalIds: [principalId, resourceId],
    });
  }
}

export class OutOfOrderConstructionError extends CompositionError {
  override name = 'OutOfOrderConstructionError';

  constructor(dependentId: string, missingId: string, field: string) {
    super('OutOfOrderConstruction', `"${dependentId}" references "${missingId}" through "${field}" before "${missingId}" was created`, {
      logicalIds: [dependentId, missingId],
      field,
    });
  }
}

export class UnresolvedReferenceError extends CompositionError {
  override name = 'UnresolvedReferenceError';

  constructor(sourceLogicalId: string, outputName: string) {
    super('UnresolvedReference', `Resource "${sourceLogicalId}" does not produce output "${outputName}"`, {
      logicalIds: [sourceLogicalId],
      field: outputName,
    });
  }
}

export class DependencyCycleError extends CompositionError {
  override name = 'DependencyCycleError';

  /** `cycle` lists each id once, in dependency order */
  constructor(cycle: string[]) {
    super('DependencyCycle', `Dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`, { logicalIds: cycle });
  }
}

export class GraphConsumedError extends CompositionError {
  override name = 'GraphConsumedError';

  constructor(stackName: string) {
    super('GraphConsumed', `Stack graph "${stackName}" has already been synthesized`, { logicalIds: [] });
  }
}

export function isCompositionError(error: unknown): error is CompositionError {
  return error instanceof CompositionError;
}
