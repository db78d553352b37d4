import {
  assertValidStackName,
  GrantStatement,
  GraphConsumedError,
  isReference,
  ManifestEntry,
  PolicyStatement,
  ResourceDescriptor,
  SynthesisContext,
  TemplateDocument,
  TemplateResource,
  warn,
} from '@linkstack/contracts';
import { CompletedOutputs, makeReference, ReferenceResolver, StackGraph } from '@linkstack/composer';

import { TemplateWriter } from './TemplateWriter';

export interface SynthesisResult {
  template: TemplateDocument;
  outputs: ManifestEntry[];
  templatePath: string;
}

export interface SynthesizerOptions {
  outDir?: string;
}

/** Serializes a document the same way every time: two-space indent, trailing newline */
export function serializeTemplate(template: TemplateDocument): string {
  return `${JSON.stringify(template, null, 2)}\n`;
}

export class Synthesizer {
  private writer: TemplateWriter;

  constructor(options: SynthesizerOptions = {}) {
    this.writer = new TemplateWriter(options.outDir);
  }

  get outDir(): string {
    return this.writer.outDir;
  }

  /**
   * Resolves and serializes the graph, then writes the artifact. The graph is consumed
   * even when synthesis fails; nothing is written unless every reference resolved.
   */
  synthesize(graph: StackGraph, stackName: string = graph.stackName): SynthesisResult {
    assertValidStackName(stackName);
    if (graph.isConsumed) throw new GraphConsumedError(graph.stackName);
    graph.consume();

    const template = this.buildTemplate(graph, stackName);
    const templatePath = this.writer.write(stackName, serializeTemplate(template));

    return { template, outputs: template.Outputs, templatePath };
  }

  /** The resolution and serialization pass on its own, without touching the file system */
  buildTemplate(graph: StackGraph, stackName: string): TemplateDocument {
    const context: SynthesisContext = { stackName, environment: graph.environment };

    // Fails on a dependency cycle before anything is resolved
    graph.deploymentOrder();

    const resolver = new ReferenceResolver(this.completeOutputs(graph, context));

    const resources: Record<string, TemplateResource> = {};
    for (const descriptor of graph.resources) resources[descriptor.logicalId] = this.renderResource(graph, descriptor, resolver);

    const outputs: ManifestEntry[] = graph.outputs.map((output) => ({
      name: output.name,
      value: isReference(output.value) ? resolver.resolve(output.value) : resolver.interpolateParts(output.value),
      description: output.description,
    }));

    const { account, region } = graph.environment;
    if (account === undefined) warn(`No account configured for ${stackName}; identifiers use a placeholder account`);

    return {
      Description: `Stack ${stackName}`,
      Metadata: account === undefined ? { StackName: stackName, Region: region } : { StackName: stackName, Account: account, Region: region },
      Resources: resources,
      Outputs: outputs,
    };
  }

  private completeOutputs(graph: StackGraph, context: SynthesisContext): CompletedOutputs {
    const completed = new Map<string, Readonly<Record<string, string>>>();
    for (const descriptor of graph.resources) completed.set(descriptor.logicalId, graph.handlerFor(descriptor).resolveOutputs(descriptor, context));

    return completed;
  }

  private renderResource(graph: StackGraph, descriptor: ResourceDescriptor, resolver: ReferenceResolver): TemplateResource {
    const handler = graph.handlerFor(descriptor);
    const properties = resolver.resolveProperties(descriptor.properties);

    const dependsOn = graph.dependenciesOf(descriptor.logicalId);
    const deletionPolicy = handler.deletionPolicy(properties);
    const policies = this.renderPolicies(graph.grantsFor(descriptor.logicalId), resolver);

    return {
      Kind: descriptor.kind,
      Type: handler.resourceType,
      ...(dependsOn.length > 0 ? { DependsOn: dependsOn } : {}),
      ...(deletionPolicy ? { DeletionPolicy: deletionPolicy } : {}),
      Properties: handler.render(properties),
      ...(policies.length > 0 ? { Policies: policies } : {}),
    };
  }

  /** Grants with the same action list share one statement, resources in grant order */
  private renderPolicies(grants: GrantStatement[], resolver: ReferenceResolver): PolicyStatement[] {
    const byActions: Map<string, PolicyStatement> = new Map();

    for (const grant of grants) {
      const key = grant.actions.join(',');
      const resource = resolver.resolve(makeReference(grant.resourceLogicalId, 'arn'));
      const existing = byActions.get(key);

      if (existing) existing.Resource.push(resource);
      else byActions.set(key, { Effect: grant.effect, Action: [...grant.actions], Resource: [resource] });
    }

    return [...byActions.values()];
  }
}

export function synthesize(graph: StackGraph, stackName: string = graph.stackName, options: SynthesizerOptions = {}): SynthesisResult {
  return new Synthesizer(options).synthesize(graph, stackName);
}
