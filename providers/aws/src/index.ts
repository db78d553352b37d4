import { IProvider, IResourceHandler, RESOURCE_KINDS, ResourceKind } from '@linkstack/contracts';

import { ApiGatewayResource } from './resources/ApiGatewayResource';
import { FunctionResource } from './resources/FunctionResource';
import { QueueResource } from './resources/QueueResource';
import { TableResource } from './resources/TableResource';

export class AwsProvider implements IProvider {
  readonly kinds: readonly ResourceKind[] = RESOURCE_KINDS;
  private handlers: Map<ResourceKind, IResourceHandler> = new Map();

  constructor() {
    this.handlers.set('Table', new TableResource());
    this.handlers.set('Queue', new QueueResource());
    this.handlers.set('Function', new FunctionResource());
    this.handlers.set('ApiGateway', new ApiGatewayResource());
  }

  getHandler(kind: ResourceKind): IResourceHandler {
    const handler = this.handlers.get(kind);
    if (!handler) throw new Error(`Unsupported resource kind: ${kind}`);

    return handler;
  }
}

export { UNKNOWN_ACCOUNT } from './naming';
export { ApiGatewayResource } from './resources/ApiGatewayResource';
export { FunctionResource } from './resources/FunctionResource';
export { QueueResource } from './resources/QueueResource';
export { TableResource } from './resources/TableResource';
