import {
  DeletionPolicy,
  InvalidPropertyError,
  isInterpolation,
  isReference,
  IResourceHandler,
  ISchema,
  Properties,
  ResolvedValue,
  ResourceDescriptor,
  SynthesisContext,
} from '@linkstack/contracts';

import { arn, physicalName } from '../naming';
import { asNumber, asRecord, asString, compact, isPropertyRecord, requireRange, validateAgainstSchema } from '../schema';

/**
 * Managed compute function. `code` points at a pre-built deployable package which is
 * never opened here; only its path has to be present.
 */
export class FunctionResource implements IResourceHandler {
  readonly kind = 'Function';
  readonly resourceType = 'AWS::Lambda::Function';
  readonly outputNames = ['functionName', 'arn'];
  readonly literalOutputs = { functionName: 'functionName' };
  readonly referenceKinds = {};
  readonly capabilities = {
    InvokeFunction: ['lambda:InvokeFunction'],
  };

  getSchema(): ISchema {
    return {
      functionName: { type: 'string' },
      runtime: { type: 'string', required: true },
      handler: { type: 'string', required: true },
      code: { type: 'string', required: true, nonEmpty: true },
      memorySize: { type: 'number', required: true },
      timeoutSeconds: { type: 'number', required: true },
      environment: { type: 'object' },
    };
  }

  validate(logicalId: string, properties: Properties): void {
    validateAgainstSchema(logicalId, this.getSchema(), properties);
    requireRange(logicalId, properties, 'memorySize', 128, 10_240);
    requireRange(logicalId, properties, 'timeoutSeconds', 1, 900);

    const environment = properties.environment;
    if (!isPropertyRecord(environment)) return;

    // Variables are strings, either literal or bound at synthesis
    for (const [name, value] of Object.entries(environment))
      if (typeof value !== 'string' && !isReference(value) && !isInterpolation(value))
        throw new InvalidPropertyError(logicalId, `environment.${name}`, 'a string or reference');
  }

  resolveOutputs(descriptor: ResourceDescriptor, context: SynthesisContext): Record<string, string> {
    const functionName = physicalName(descriptor.properties.functionName, descriptor.logicalId, context);
    return {
      functionName,
      arn: arn('lambda', context.environment, `function:${functionName}`),
    };
  }

  render(properties: Record<string, ResolvedValue>): Record<string, ResolvedValue> {
    const variables = asRecord(properties.environment);
    const code = asString(properties.code);

    return compact({
      FunctionName: asString(properties.functionName),
      Runtime: asString(properties.runtime),
      Handler: asString(properties.handler),
      Code: code === undefined ? undefined : { Package: code },
      MemorySize: asNumber(properties.memorySize),
      Timeout: asNumber(properties.timeoutSeconds),
      Environment: variables ? { Variables: variables } : undefined,
    });
  }

  deletionPolicy(): DeletionPolicy | undefined {
    return undefined;
  }
}
