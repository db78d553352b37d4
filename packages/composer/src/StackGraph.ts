import {
  assertValidStackName,
  DanglingGrantError,
  debug,
  DependencyCycleError,
  DuplicateIdentityError,
  Environment,
  GrantStatement,
  GraphConsumedError,
  InvalidPropertyError,
  IProvider,
  IResourceHandler,
  OutOfOrderConstructionError,
  OutputDeclaration,
  ResolvedEnvironment,
  ResourceDescriptor,
} from '@linkstack/contracts';
import { Graph } from '@linkstack/graph';

import { resolveEnvironment } from './environment';
import { collectReferences } from './resolvers/ReferenceResolver';

function grantKey(principalLogicalId: string, resourceLogicalId: string): string {
  return `${principalLogicalId} -> ${resourceLogicalId}`;
}

/**
 * Everything one stack declares: descriptors in insertion order, the grants attached to
 * them and the outputs to report. Every id referenced anywhere must already be in the graph
 * when the referencing piece is added. A graph is synthesized once and then discarded.
 */
export class StackGraph {
  readonly environment: ResolvedEnvironment;
  private graph = new Graph<ResourceDescriptor>();
  private grants: Map<string, GrantStatement> = new Map();
  private outputDeclarations: OutputDeclaration[] = [];
  private consumed = false;

  constructor(
    readonly stackName: string,
    environment: Environment,
    readonly provider: IProvider
  ) {
    assertValidStackName(stackName);
    this.environment = resolveEnvironment(environment);
  }

  handlerFor(descriptor: ResourceDescriptor): IResourceHandler {
    return this.provider.getHandler(descriptor.kind);
  }

  hasResource(logicalId: string): boolean {
    return this.graph.hasNode(logicalId);
  }

  getResource(logicalId: string): ResourceDescriptor | undefined {
    return this.graph.getNode(logicalId);
  }

  get resources(): ResourceDescriptor[] {
    return this.graph.nodeIds().flatMap((id) => this.graph.getNode(id) ?? []);
  }

  get grantStatements(): GrantStatement[] {
    return [...this.grants.values()];
  }

  get outputs(): readonly OutputDeclaration[] {
    return this.outputDeclarations;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  grantsFor(principalLogicalId: string): GrantStatement[] {
    return this.grantStatements.filter((statement) => statement.principalLogicalId === principalLogicalId);
  }

  dependenciesOf(logicalId: string): string[] {
    return this.graph.dependenciesOf(logicalId);
  }

  /** Layers of logical ids; throws if the dependency edges ever form a cycle */
  deploymentOrder(): string[][] {
    return this.graph.topologicalSort();
  }

  addResource(descriptor: ResourceDescriptor): void {
    this.assertMutable();
    if (this.hasResource(descriptor.logicalId)) throw new DuplicateIdentityError(descriptor.logicalId);

    const sites = collectReferences(descriptor.properties, '');
    const handler = this.handlerFor(descriptor);

    for (const { reference, path } of sites) {
      const source = this.getResource(reference.sourceLogicalId);
      if (!source) throw new OutOfOrderConstructionError(descriptor.logicalId, reference.sourceLogicalId, path);

      const expectedKind = handler.referenceKinds[path];
      if (expectedKind && source.kind !== expectedKind) throw new InvalidPropertyError(descriptor.logicalId, path, `a reference to a ${expectedKind}`);
    }

    this.graph.addNode(descriptor.logicalId, descriptor);
    for (const { reference } of sites) this.graph.addEdge(reference.sourceLogicalId, descriptor.logicalId);

    debug(`+ ${descriptor.kind} ${descriptor.logicalId}`);
  }

  /** Adds a statement, or widens the existing one for the same principal/resource pair */
  addGrant(statement: GrantStatement): GrantStatement {
    this.assertMutable();
    const { principalLogicalId, resourceLogicalId } = statement;

    for (const id of [principalLogicalId, resourceLogicalId])
      if (!this.hasResource(id)) throw new DanglingGrantError(principalLogicalId, resourceLogicalId, id);

    // The principal depends on the resource, so the resource must not already depend on the principal
    const cycle = principalLogicalId === resourceLogicalId ? undefined : this.graph.findPath(principalLogicalId, resourceLogicalId);
    if (cycle) throw new DependencyCycleError(cycle);

    const key = grantKey(principalLogicalId, resourceLogicalId);
    const existing = this.grants.get(key);
    const actions = existing ? [...new Set([...existing.actions, ...statement.actions])] : [...new Set(statement.actions)];

    const merged: GrantStatement = { principalLogicalId, resourceLogicalId, actions: Object.freeze(actions), effect: 'Allow' };
    this.grants.set(key, Object.freeze(merged));
    if (principalLogicalId !== resourceLogicalId) this.graph.addEdge(resourceLogicalId, principalLogicalId);

    debug(`  grant ${principalLogicalId} -> ${resourceLogicalId}: ${actions.join(', ')}`);
    return merged;
  }

  addOutput(declaration: OutputDeclaration): void {
    this.assertMutable();
    if (this.outputDeclarations.some((output) => output.name === declaration.name)) throw new DuplicateIdentityError(declaration.name);

    for (const { reference } of collectReferences(declaration.value, 'value'))
      if (!this.hasResource(reference.sourceLogicalId)) throw new OutOfOrderConstructionError(`Outputs.${declaration.name}`, reference.sourceLogicalId, 'value');

    this.outputDeclarations.push(Object.freeze({ ...declaration }));
  }

  /** Called by the synthesizer; afterwards the graph accepts no changes and no second synthesis */
  consume(): void {
    this.assertMutable();
    this.consumed = true;
  }

  private assertMutable(): void {
    if (this.consumed) throw new GraphConsumedError(this.stackName);
  }
}
