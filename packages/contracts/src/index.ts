import { InvalidPropertyError } from './errors';

export type ResourceKind = 'Table' | 'Queue' | 'Function' | 'ApiGateway';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['Table', 'Queue', 'Function', 'ApiGateway'];

/** Deferred pointer to an output another descriptor only gets once it is provisioned */
export interface Reference {
  readonly type: 'Reference';
  readonly sourceLogicalId: string;
  readonly outputName: string;
}

/** String assembled from literal parts and references, e.g. `${api.url}api/v1/health` */
export interface Interpolation {
  readonly type: 'Interpolation';
  readonly parts: readonly (string | Reference)[];
}

export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | Reference
  | Interpolation
  | readonly PropertyValue[]
  | { readonly [key: string]: PropertyValue };

/** Same shape as PropertyValue once every Reference and Interpolation has been replaced */
export type ResolvedValue = string | number | boolean | null | ResolvedValue[] | { [key: string]: ResolvedValue };

export type Properties = Readonly<Record<string, PropertyValue>>;

export interface ResourceDescriptor {
  readonly logicalId: string;
  readonly kind: ResourceKind;
  readonly properties: Properties;
  /** Output name -> reference to that output on this descriptor */
  readonly outputs: Readonly<Record<string, Reference>>;
}

export type Capability = 'ReadData' | 'ReadWriteData' | 'SendMessage' | 'ConsumeMessages' | 'InvokeFunction';

export interface GrantStatement {
  readonly principalLogicalId: string;
  readonly resourceLogicalId: string;
  readonly actions: readonly string[];
  readonly effect: 'Allow';
}

export interface OutputDeclaration {
  readonly name: string;
  readonly value: Reference | Interpolation;
  readonly description: string;
}

export interface Environment {
  account?: string;
  region?: string;
}

export interface ResolvedEnvironment {
  readonly account: string | undefined;
  readonly region: string;
}

export type SchemaType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export interface ISchemaDefinition {
  type: SchemaType;
  required?: boolean;
  nonEmpty?: boolean; // Strings only: an empty literal counts as missing
}

export type ISchema = Record<string, ISchemaDefinition>;

export interface SynthesisContext {
  stackName: string;
  environment: ResolvedEnvironment;
}

/**
 * Resource Handler Interface
 * Each resource kind (Table, Queue, ...) implements this interface
 */
export interface IResourceHandler {
  readonly kind: ResourceKind;

  /** Provider-level resource type written to the template, e.g. AWS::DynamoDB::Table */
  readonly resourceType: string;

  /** Names of the outputs other descriptors may reference */
  readonly outputNames: readonly string[];

  /**
   * Outputs whose value is fixed by a literal property, keyed by output name.
   * Lets the composer bind them directly instead of through a Reference.
   */
  readonly literalOutputs: Readonly<Partial<Record<string, string>>>;

  /** Properties that must reference a descriptor of a given kind, e.g. a gateway handler */
  readonly referenceKinds: Readonly<Partial<Record<string, ResourceKind>>>;

  /** Provider-level actions per supported capability */
  readonly capabilities: Readonly<Partial<Record<Capability, readonly string[]>>>;

  getSchema(): ISchema;

  /** Validate properties at creation. Throws MissingProperty / InvalidProperty. */
  validate(logicalId: string, properties: Properties): void;

  /** Concrete identifiers for every output name, computed from the descriptor alone */
  resolveOutputs(descriptor: ResourceDescriptor, context: SynthesisContext): Record<string, string>;

  /** Kind-specific concrete schema built from fully resolved properties */
  render(properties: Record<string, ResolvedValue>): Record<string, ResolvedValue>;

  /** What the provider does with the physical resource when it leaves the stack */
  deletionPolicy(properties: Record<string, ResolvedValue>): DeletionPolicy | undefined;
}

/** The contract a provider implements: one handler per resource kind */
export interface IProvider {
  readonly kinds: readonly ResourceKind[];
  getHandler(kind: ResourceKind): IResourceHandler;
}

export type DeletionPolicy = 'Delete' | 'Retain';

/** One rendered statement per distinct action list; `Resource` holds every resource granted that list */
export interface PolicyStatement {
  Effect: 'Allow';
  Action: string[];
  Resource: string[];
}

export interface TemplateResource {
  Kind: ResourceKind;
  Type: string;
  DependsOn?: string[];
  DeletionPolicy?: DeletionPolicy;
  Properties: Record<string, ResolvedValue>;
  Policies?: PolicyStatement[];
}

export interface ManifestEntry {
  name: string;
  value: string;
  description: string;
}

export interface TemplateDocument {
  Description: string;
  Metadata: {
    StackName: string;
    Account?: string;
    Region: string;
  };
  Resources: Record<string, TemplateResource>;
  Outputs: ManifestEntry[];
}

export function isReference(value: unknown): value is Reference {
  if (!value || typeof value !== 'object') return false;
  const ref = value as Partial<Reference>;
  return ref.type === 'Reference' && typeof ref.sourceLogicalId === 'string' && typeof ref.outputName === 'string';
}

export function isInterpolation(value: unknown): value is Interpolation {
  if (!value || typeof value !== 'object') return false;
  const interp = value as Partial<Interpolation>;
  return interp.type === 'Interpolation' && Array.isArray(interp.parts);
}

const STACK_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]{0,127}$/;

/** Stack names become file names and resource name prefixes */
export function assertValidStackName(stackName: string): void {
  if (!STACK_NAME_PATTERN.test(stackName))
    throw new InvalidPropertyError(stackName, 'stackName', 'letters, digits and hyphens, starting with a letter');
}

export function isPropertyList(value: PropertyValue | undefined): value is readonly PropertyValue[] {
  return Array.isArray(value);
}

export * from './errors';
export * from './logging';
