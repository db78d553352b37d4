import { Capability, DanglingGrantError, GrantStatement, ResourceDescriptor, UnsupportedCapabilityError } from '@linkstack/contracts';

import { StackGraph } from '../StackGraph';

/**
 * Turns (principal, resource, capability) into the provider actions for exactly that
 * capability and attaches them to the principal. Never widens: a capability the resource
 * kind does not list is rejected.
 */
export class GrantEngine {
  constructor(private graph: StackGraph) {}

  grant(principal: ResourceDescriptor | string, resource: ResourceDescriptor | string, capability: Capability): GrantStatement {
    const principalId = typeof principal === 'string' ? principal : principal.logicalId;
    const resourceId = typeof resource === 'string' ? resource : resource.logicalId;

    const target = this.graph.getResource(resourceId);
    if (!target) throw new DanglingGrantError(principalId, resourceId, resourceId);
    if (!this.graph.hasResource(principalId)) throw new DanglingGrantError(principalId, resourceId, principalId);

    const actions = this.actionsFor(target, capability);
    if (!actions) throw new UnsupportedCapabilityError(principalId, resourceId, target.kind, capability);

    return this.graph.addGrant({
      principalLogicalId: principalId,
      resourceLogicalId: resourceId,
      actions,
      effect: 'Allow',
    });
  }

  actionsFor(resource: ResourceDescriptor, capability: Capability): readonly string[] | undefined {
    return this.graph.handlerFor(resource).capabilities[capability];
  }
}
