import {
  DeletionPolicy,
  InvalidPropertyError,
  IResourceHandler,
  ISchema,
  Properties,
  PropertyValue,
  ResolvedValue,
  ResourceDescriptor,
  SynthesisContext,
} from '@linkstack/contracts';

import { arn, physicalName } from '../naming';
import { asRecord, asString, compact, isPropertyRecord, validateAgainstSchema } from '../schema';

const ATTRIBUTE_TYPES: Record<string, string> = { STRING: 'S', NUMBER: 'N', BINARY: 'B' };
const BILLING_MODES = ['PAY_PER_REQUEST', 'PROVISIONED'];
const REMOVAL_POLICIES: Record<string, DeletionPolicy> = { DESTROY: 'Delete', RETAIN: 'Retain' };

const READ_ACTIONS = ['dynamodb:GetItem', 'dynamodb:Query', 'dynamodb:Scan'];
const READ_WRITE_ACTIONS = ['dynamodb:GetItem', 'dynamodb:PutItem', 'dynamodb:UpdateItem', 'dynamodb:DeleteItem', 'dynamodb:Query', 'dynamodb:Scan'];

/** Keyed data table. `timeToLiveAttribute` turns on lazy expiry of stale items. */
export class TableResource implements IResourceHandler {
  readonly kind = 'Table';
  readonly resourceType = 'AWS::DynamoDB::Table';
  readonly outputNames = ['tableName', 'arn'];
  readonly literalOutputs = { tableName: 'tableName' };
  readonly referenceKinds = {};
  readonly capabilities = {
    ReadData: READ_ACTIONS,
    ReadWriteData: READ_WRITE_ACTIONS,
  };

  getSchema(): ISchema {
    return {
      tableName: { type: 'string' },
      partitionKey: { type: 'object', required: true },
      sortKey: { type: 'object' },
      billingMode: { type: 'string', required: true },
      timeToLiveAttribute: { type: 'string', nonEmpty: true },
      removalPolicy: { type: 'string' },
    };
  }

  validate(logicalId: string, properties: Properties): void {
    validateAgainstSchema(logicalId, this.getSchema(), properties);

    this.validateKey(logicalId, 'partitionKey', properties.partitionKey);
    if (properties.sortKey !== undefined) this.validateKey(logicalId, 'sortKey', properties.sortKey);

    const billingMode = properties.billingMode;
    if (typeof billingMode === 'string' && !BILLING_MODES.includes(billingMode))
      throw new InvalidPropertyError(logicalId, 'billingMode', `one of ${BILLING_MODES.join(', ')}`);

    const removalPolicy = properties.removalPolicy;
    if (typeof removalPolicy === 'string' && !Object.hasOwn(REMOVAL_POLICIES, removalPolicy))
      throw new InvalidPropertyError(logicalId, 'removalPolicy', `one of ${Object.keys(REMOVAL_POLICIES).join(', ')}`);
  }

  resolveOutputs(descriptor: ResourceDescriptor, context: SynthesisContext): Record<string, string> {
    const tableName = physicalName(descriptor.properties.tableName, descriptor.logicalId, context);
    return {
      tableName,
      arn: arn('dynamodb', context.environment, `table/${tableName}`),
    };
  }

  render(properties: Record<string, ResolvedValue>): Record<string, ResolvedValue> {
    const keys = [
      { key: asRecord(properties.partitionKey), keyType: 'HASH' },
      { key: asRecord(properties.sortKey), keyType: 'RANGE' },
    ];

    const keySchema: ResolvedValue[] = [];
    const attributeDefinitions: ResolvedValue[] = [];
    for (const { key, keyType } of keys) {
      const name = asString(key?.name);
      const type = asString(key?.type);
      if (!name || !type) continue;
      keySchema.push({ AttributeName: name, KeyType: keyType });
      attributeDefinitions.push({ AttributeName: name, AttributeType: ATTRIBUTE_TYPES[type] ?? type });
    }

    const ttlAttribute = asString(properties.timeToLiveAttribute);

    return compact({
      TableName: asString(properties.tableName),
      KeySchema: keySchema,
      AttributeDefinitions: attributeDefinitions,
      BillingMode: asString(properties.billingMode),
      TimeToLiveSpecification: ttlAttribute ? { AttributeName: ttlAttribute, Enabled: true } : undefined,
    });
  }

  deletionPolicy(properties: Record<string, ResolvedValue>): DeletionPolicy | undefined {
    const removalPolicy = asString(properties.removalPolicy);
    return removalPolicy ? REMOVAL_POLICIES[removalPolicy] : undefined;
  }

  private validateKey(logicalId: string, field: string, value: PropertyValue | undefined): void {
    const key = isPropertyRecord(value) ? value : undefined;
    const name = key?.name;
    const type = key?.type;
    if (typeof name !== 'string' || name === '' || typeof type !== 'string' || !Object.hasOwn(ATTRIBUTE_TYPES, type))
      throw new InvalidPropertyError(logicalId, field, `{ name, type } with type one of ${Object.keys(ATTRIBUTE_TYPES).join(', ')}`);
  }
}
