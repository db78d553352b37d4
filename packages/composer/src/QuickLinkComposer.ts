import { debug, Environment, GrantStatement, IProvider, Reference, ResourceDescriptor } from '@linkstack/contracts';
import { AwsProvider } from '@linkstack/provider-aws';

import { GrantEngine } from './grants/GrantEngine';
import { createResource } from './resources';
import { bindOutput, interpolate, makeReference } from './resolvers/ReferenceResolver';
import { StackGraph } from './StackGraph';

export interface ThrottlingPolicy {
  rateLimit: number;
  burstLimit: number;
}

export interface TopologyConfig {
  stackName: string;
  environment?: Environment;
  /** Include the analytics queue and the function's permission to publish to it */
  analytics?: boolean;
  /** Path of the pre-built function package */
  codePath: string;
  throttling: ThrottlingPolicy;
}

export const LogicalIds = {
  urlsTable: 'UrlsTable',
  tokensTable: 'TokensTable',
  analyticsQueue: 'AnalyticsQueue',
  function: 'QuickLinkFunction',
  api: 'QuickLinkApi',
} as const;

export const HEALTH_CHECK_SUFFIX = 'api/v1/health';

export interface StorageResources {
  urlsTable: ResourceDescriptor;
  tokensTable: ResourceDescriptor;
  analyticsQueue?: ResourceDescriptor;
}

/** Stage 1: tables and queue, nothing to depend on */
export function createStorage(graph: StackGraph, analytics: boolean): StorageResources {
  const urlsTable = createResource(graph, 'Table', LogicalIds.urlsTable, {
    tableName: 'quicklink-urls',
    partitionKey: { name: 'shortCode', type: 'STRING' },
    billingMode: 'PAY_PER_REQUEST',
    removalPolicy: 'DESTROY',
    // Short links expire; tokens are kept until revoked
    timeToLiveAttribute: 'expiresAt',
  });

  const tokensTable = createResource(graph, 'Table', LogicalIds.tokensTable, {
    tableName: 'quicklink-tokens',
    partitionKey: { name: 'tokenId', type: 'STRING' },
    billingMode: 'PAY_PER_REQUEST',
    removalPolicy: 'DESTROY',
  });

  if (!analytics) return { urlsTable, tokensTable };

  const analyticsQueue = createResource(graph, 'Queue', LogicalIds.analyticsQueue, {
    queueName: 'quicklink-analytics',
    retentionPeriodSeconds: 4 * 24 * 60 * 60,
    visibilityTimeoutSeconds: 30,
  });

  return { urlsTable, tokensTable, analyticsQueue };
}

/** Stage 2: the function, configured with the identities of the storage it talks to */
export function createCompute(graph: StackGraph, storage: StorageResources, codePath: string): ResourceDescriptor {
  const { urlsTable, tokensTable, analyticsQueue } = storage;

  const environment: Record<string, string | Reference> = {
    SPRING_PROFILES_ACTIVE: 'prod',
    DYNAMODB_TABLE_URLS: bindOutput(urlsTable, graph.handlerFor(urlsTable), 'tableName'),
    DYNAMODB_TABLE_TOKENS: bindOutput(tokensTable, graph.handlerFor(tokensTable), 'tableName'),
  };
  if (analyticsQueue) environment.AWS_SQS_ANALYTICS_QUEUE_URL = bindOutput(analyticsQueue, graph.handlerFor(analyticsQueue), 'queueUrl');

  return createResource(graph, 'Function', LogicalIds.function, {
    functionName: 'quicklink-service',
    runtime: 'java17',
    handler: 'inc.skt.quicklink.StreamLambdaHandler::handleRequest',
    code: codePath,
    memorySize: 512,
    timeoutSeconds: 10,
    environment,
  });
}

/** Stage 3: least-privilege access from the function to each store */
export function grantAccess(graph: StackGraph, fn: ResourceDescriptor | string, storage: StorageResources): GrantStatement[] {
  const engine = new GrantEngine(graph);
  const statements = [engine.grant(fn, storage.urlsTable, 'ReadWriteData'), engine.grant(fn, storage.tokensTable, 'ReadWriteData')];
  if (storage.analyticsQueue) statements.push(engine.grant(fn, storage.analyticsQueue, 'SendMessage'));

  return statements;
}

/** Stage 4: the gateway, proxying to the function as its only handler */
export function createGateway(graph: StackGraph, fn: ResourceDescriptor | string, throttling: ThrottlingPolicy): ResourceDescriptor {
  const api = createResource(graph, 'ApiGateway', LogicalIds.api, {
    restApiName: 'quicklink-api',
    handler: makeReference(fn, 'arn'),
    proxy: true,
    binaryMediaTypes: ['*/*'],
    stageName: 'prod',
    throttlingRateLimit: throttling.rateLimit,
    throttlingBurstLimit: throttling.burstLimit,
  });

  new GrantEngine(graph).grant(api, fn, 'InvokeFunction');
  return api;
}

/** Stage 5: what the deployment reports back */
export function declareOutputs(graph: StackGraph, api: ResourceDescriptor | string, fn: ResourceDescriptor | string, analyticsQueue?: ResourceDescriptor): void {
  const apiUrl = makeReference(api, 'url');

  graph.addOutput({ name: 'ApiUrl', value: apiUrl, description: 'API Gateway endpoint URL' });
  graph.addOutput({ name: 'HealthEndpoint', value: interpolate(apiUrl, HEALTH_CHECK_SUFFIX), description: 'Health check endpoint URL' });
  graph.addOutput({ name: 'LambdaFunctionName', value: makeReference(fn, 'functionName'), description: 'Lambda function name' });

  if (analyticsQueue)
    graph.addOutput({ name: 'AnalyticsQueueUrl', value: makeReference(analyticsQueue, 'queueUrl'), description: 'SQS analytics queue URL' });
}

/**
 * Builds the URL shortener topology. Every call to `compose` starts from an empty graph,
 * so nothing leaks between runs.
 */
export class QuickLinkComposer {
  constructor(
    private config: TopologyConfig,
    private provider: IProvider = new AwsProvider()
  ) {}

  compose(): StackGraph {
    const { stackName, environment = {}, analytics = true, codePath, throttling } = this.config;
    const graph = new StackGraph(stackName, environment, this.provider);

    debug(`Composing ${stackName} (${graph.environment.region}, analytics ${analytics ? 'on' : 'off'})`);

    const storage = createStorage(graph, analytics);
    const fn = createCompute(graph, storage, codePath);
    grantAccess(graph, fn, storage);
    const api = createGateway(graph, fn, throttling);
    declareOutputs(graph, api, fn, storage.analyticsQueue);

    return graph;
  }
}
