import { DeletionPolicy, IResourceHandler, ISchema, Properties, ResolvedValue, ResourceDescriptor, SynthesisContext } from '@linkstack/contracts';

import { accountOf, arn, physicalName } from '../naming';
import { asNumber, asString, compact, requireRange, validateAgainstSchema } from '../schema';

export class QueueResource implements IResourceHandler {
  readonly kind = 'Queue';
  readonly resourceType = 'AWS::SQS::Queue';
  readonly outputNames = ['queueName', 'queueUrl', 'arn'];
  // The URL embeds the account, so only the name can be bound before synthesis
  readonly literalOutputs = { queueName: 'queueName' };
  readonly referenceKinds = {};
  readonly capabilities = {
    SendMessage: ['sqs:SendMessage'],
    ConsumeMessages: ['sqs:ReceiveMessage', 'sqs:DeleteMessage', 'sqs:ChangeMessageVisibility'],
  };

  getSchema(): ISchema {
    return {
      queueName: { type: 'string' },
      retentionPeriodSeconds: { type: 'number' },
      visibilityTimeoutSeconds: { type: 'number' },
    };
  }

  validate(logicalId: string, properties: Properties): void {
    validateAgainstSchema(logicalId, this.getSchema(), properties);
    requireRange(logicalId, properties, 'retentionPeriodSeconds', 60, 1_209_600);
    requireRange(logicalId, properties, 'visibilityTimeoutSeconds', 0, 43_200);
  }

  resolveOutputs(descriptor: ResourceDescriptor, context: SynthesisContext): Record<string, string> {
    const queueName = physicalName(descriptor.properties.queueName, descriptor.logicalId, context);
    const { environment } = context;
    return {
      queueName,
      queueUrl: `https://sqs.${environment.region}.amazonaws.com/${accountOf(environment)}/${queueName}`,
      arn: arn('sqs', environment, queueName),
    };
  }

  render(properties: Record<string, ResolvedValue>): Record<string, ResolvedValue> {
    return compact({
      QueueName: asString(properties.queueName),
      MessageRetentionPeriod: asNumber(properties.retentionPeriodSeconds),
      VisibilityTimeout: asNumber(properties.visibilityTimeoutSeconds),
    });
  }

  deletionPolicy(): DeletionPolicy | undefined {
    return undefined;
  }
}
