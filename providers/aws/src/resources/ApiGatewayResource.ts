import {
  DeletionPolicy,
  InvalidPropertyError,
  isPropertyList,
  isReference,
  IResourceHandler,
  ISchema,
  MissingPropertyError,
  Properties,
  ResolvedValue,
  ResourceDescriptor,
  SynthesisContext,
} from '@linkstack/contracts';

import { generatedId } from '../naming';
import { asNumber, asString, compact, requireRange, validateAgainstSchema } from '../schema';

/**
 * HTTP-facing REST gateway proxying every request to a single backing function.
 * Throttling limits have no defaults and must be configured.
 */
export class ApiGatewayResource implements IResourceHandler {
  readonly kind = 'ApiGateway';
  readonly resourceType = 'AWS::ApiGateway::RestApi';
  readonly outputNames = ['restApiId', 'url'];
  readonly literalOutputs = {};
  readonly referenceKinds = { handler: 'Function' } as const;
  readonly capabilities = {};

  getSchema(): ISchema {
    return {
      restApiName: { type: 'string' },
      handler: { type: 'string', required: true },
      stageName: { type: 'string', required: true, nonEmpty: true },
      throttlingRateLimit: { type: 'number', required: true },
      throttlingBurstLimit: { type: 'number', required: true },
      proxy: { type: 'boolean' },
      binaryMediaTypes: { type: 'array' },
    };
  }

  validate(logicalId: string, properties: Properties): void {
    validateAgainstSchema(logicalId, this.getSchema(), properties);

    if (!isReference(properties.handler)) throw new InvalidPropertyError(logicalId, 'handler', 'a reference to a Function');
    // The stage is part of the URL, which has to be known without resolving anything
    if (typeof properties.stageName !== 'string') throw new InvalidPropertyError(logicalId, 'stageName', 'a literal string');

    requireRange(logicalId, properties, 'throttlingRateLimit', 0, 10_000);
    requireRange(logicalId, properties, 'throttlingBurstLimit', 0, 5_000);

    const burst = properties.throttlingBurstLimit;
    if (typeof burst === 'number' && !Number.isInteger(burst)) throw new InvalidPropertyError(logicalId, 'throttlingBurstLimit', 'an integer');

    const mediaTypes = properties.binaryMediaTypes;
    if (isPropertyList(mediaTypes) && mediaTypes.some((mediaType) => typeof mediaType !== 'string'))
      throw new InvalidPropertyError(logicalId, 'binaryMediaTypes', 'a list of strings');
  }

  resolveOutputs(descriptor: ResourceDescriptor, context: SynthesisContext): Record<string, string> {
    const restApiId = generatedId(context.stackName, descriptor.logicalId);
    const stageName = descriptor.properties.stageName;
    if (typeof stageName !== 'string') throw new MissingPropertyError(descriptor.logicalId, 'stageName');
    return {
      restApiId,
      url: `https://${restApiId}.execute-api.${context.environment.region}.amazonaws.com/${stageName}/`,
    };
  }

  render(properties: Record<string, ResolvedValue>): Record<string, ResolvedValue> {
    const proxy = properties.proxy !== false;

    return compact({
      Name: asString(properties.restApiName),
      BinaryMediaTypes: Array.isArray(properties.binaryMediaTypes) ? properties.binaryMediaTypes : undefined,
      Integration: {
        Type: proxy ? 'AWS_PROXY' : 'AWS',
        FunctionArn: asString(properties.handler) ?? null,
      },
      Stage: compact({
        StageName: asString(properties.stageName),
        ThrottlingRateLimit: asNumber(properties.throttlingRateLimit),
        ThrottlingBurstLimit: asNumber(properties.throttlingBurstLimit),
      }),
    });
  }

  deletionPolicy(): DeletionPolicy | undefined {
    return undefined;
  }
}
