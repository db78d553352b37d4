export { DEFAULT_REGION, resolveEnvironment } from './environment';
export { GrantEngine } from './grants/GrantEngine';
export type { StorageResources, ThrottlingPolicy, TopologyConfig } from './QuickLinkComposer';
export {
  createCompute,
  createGateway,
  createStorage,
  declareOutputs,
  grantAccess,
  HEALTH_CHECK_SUFFIX,
  LogicalIds,
  QuickLinkComposer,
} from './QuickLinkComposer';
export type { CompletedOutputs, ReferenceSite } from './resolvers/ReferenceResolver';
export { bindOutput, collectReferences, interpolate, makeReference, ReferenceResolver, resolve } from './resolvers/ReferenceResolver';
export { createResource } from './resources';
export { StackGraph } from './StackGraph';
