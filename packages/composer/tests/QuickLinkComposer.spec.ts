import { AwsProvider } from '@linkstack/provider-aws';
import { describe, expect, it } from 'vitest';

import {
  createCompute,
  createGateway,
  createStorage,
  grantAccess,
  interpolate,
  LogicalIds,
  makeReference,
  QuickLinkComposer,
  StackGraph,
  type TopologyConfig,
} from '../src';

const config: TopologyConfig = {
  stackName: 'QuickLinkStack',
  environment: { account: '123456789012', region: 'eu-west-1' },
  codePath: 'build/quicklink.jar',
  throttling: { rateLimit: 50, burstLimit: 100 },
};

const READ_WRITE = ['dynamodb:GetItem', 'dynamodb:PutItem', 'dynamodb:UpdateItem', 'dynamodb:DeleteItem', 'dynamodb:Query', 'dynamodb:Scan'];

describe('QuickLinkComposer', () => {
  it('should declare the five resources in stage order', () => {
    const graph = new QuickLinkComposer(config).compose();

    expect(graph.resources.map((resource) => `${resource.kind}:${resource.logicalId}`)).toEqual([
      'Table:UrlsTable',
      'Table:TokensTable',
      'Queue:AnalyticsQueue',
      'Function:QuickLinkFunction',
      'ApiGateway:QuickLinkApi',
    ]);
    expect(graph.deploymentOrder()).toEqual([['UrlsTable', 'TokensTable', 'AnalyticsQueue'], ['QuickLinkFunction'], ['QuickLinkApi']]);
  });

  it('should enable expiry on the urls table only', () => {
    const graph = new QuickLinkComposer(config).compose();

    expect(graph.getResource(LogicalIds.urlsTable)?.properties.timeToLiveAttribute).toBe('expiresAt');
    expect(graph.getResource(LogicalIds.tokensTable)?.properties).not.toHaveProperty('timeToLiveAttribute');
  });

  it('should bind table names as literals and the queue URL as a reference', () => {
    const graph = new QuickLinkComposer(config).compose();

    expect(graph.getResource(LogicalIds.function)?.properties.environment).toEqual({
      SPRING_PROFILES_ACTIVE: 'prod',
      DYNAMODB_TABLE_URLS: 'quicklink-urls',
      DYNAMODB_TABLE_TOKENS: 'quicklink-tokens',
      AWS_SQS_ANALYTICS_QUEUE_URL: makeReference('AnalyticsQueue', 'queueUrl'),
    });
  });

  it('should hold one function grant per resource pair: read-write on each table, send on the queue', () => {
    const grants = new QuickLinkComposer(config).compose().grantsFor(LogicalIds.function);

    expect(grants.filter((grant) => grant.actions.join() === READ_WRITE.join()).map((grant) => grant.resourceLogicalId)).toEqual([
      'UrlsTable',
      'TokensTable',
    ]);
    expect(grants.filter((grant) => grant.resourceLogicalId === 'AnalyticsQueue').map((grant) => grant.actions)).toEqual([['sqs:SendMessage']]);
    expect(grants).toHaveLength(3);
  });

  it('should let the gateway invoke the function', () => {
    const graph = new QuickLinkComposer(config).compose();

    expect(graph.grantsFor(LogicalIds.api)).toEqual([
      { principalLogicalId: 'QuickLinkApi', resourceLogicalId: 'QuickLinkFunction', actions: ['lambda:InvokeFunction'], effect: 'Allow' },
    ]);
    expect(graph.getResource(LogicalIds.api)?.properties.handler).toEqual(makeReference('QuickLinkFunction', 'arn'));
  });

  it('should carry the throttling policy as given', () => {
    const graph = new QuickLinkComposer({ ...config, throttling: { rateLimit: 5, burstLimit: 10 } }).compose();
    const properties = graph.getResource(LogicalIds.api)?.properties;

    expect(properties?.throttlingRateLimit).toBe(5);
    expect(properties?.throttlingBurstLimit).toBe(10);
  });

  it('should declare outputs with the health endpoint derived from the URL', () => {
    const graph = new QuickLinkComposer(config).compose();

    expect(graph.outputs.map((output) => output.name)).toEqual(['ApiUrl', 'HealthEndpoint', 'LambdaFunctionName', 'AnalyticsQueueUrl']);
    expect(graph.outputs[1].value).toEqual(interpolate(makeReference('QuickLinkApi', 'url'), 'api/v1/health'));
  });

  it('should leave the queue, its grant and its output out without analytics', () => {
    const graph = new QuickLinkComposer({ ...config, analytics: false }).compose();

    expect(graph.hasResource(LogicalIds.analyticsQueue)).toBe(false);
    expect(graph.grantsFor(LogicalIds.function)).toHaveLength(2);
    expect(graph.getResource(LogicalIds.function)?.properties.environment).not.toHaveProperty('AWS_SQS_ANALYTICS_QUEUE_URL');
    expect(graph.outputs.map((output) => output.name)).toEqual(['ApiUrl', 'HealthEndpoint', 'LambdaFunctionName']);
  });

  it('should default the region', () => {
    const graph = new QuickLinkComposer({ ...config, environment: undefined }).compose();
    expect(graph.environment.region).toBe('us-east-1');
  });

  it('should start from an empty graph on every call', () => {
    const composer = new QuickLinkComposer(config);
    const first = composer.compose();
    const second = composer.compose();

    expect(second).not.toBe(first);
    expect(second.resources).toHaveLength(5);
  });

  it('should reject an invalid throttling policy', () => {
    expect(() => new QuickLinkComposer({ ...config, throttling: { rateLimit: -1, burstLimit: 100 } }).compose()).toThrow(
      '[InvalidProperty] Property "throttlingRateLimit" of resource "QuickLinkApi" must be between 0 and 10000'
    );
  });

  it('should reject a missing code location', () => {
    expect(() => new QuickLinkComposer({ ...config, codePath: '' }).compose()).toThrow(
      '[MissingProperty] Resource "QuickLinkFunction" is missing required property "code"'
    );
  });
});

describe('composition stages', () => {
  it('should refuse to create the gateway before the function', () => {
    const graph = new StackGraph('QuickLinkStack', {}, new AwsProvider());
    createStorage(graph, true);

    expect(() => createGateway(graph, LogicalIds.function, { rateLimit: 50, burstLimit: 100 })).toThrow(
      '[OutOfOrderConstruction] "QuickLinkApi" references "QuickLinkFunction" through "handler" before "QuickLinkFunction" was created'
    );
  });

  it('should refuse to declare the same stage twice', () => {
    const graph = new StackGraph('QuickLinkStack', {}, new AwsProvider());
    createStorage(graph, false);

    expect(() => createStorage(graph, false)).toThrow('[DuplicateIdentity] "UrlsTable" is already declared in the stack');
  });

  it('should grant only what exists', () => {
    const graph = new StackGraph('QuickLinkStack', {}, new AwsProvider());
    const storage = createStorage(graph, false);
    const fn = createCompute(graph, storage, 'build/quicklink.jar');

    expect(grantAccess(graph, fn, storage).map((grant) => grant.resourceLogicalId)).toEqual(['UrlsTable', 'TokensTable']);
  });
});
