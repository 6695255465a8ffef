export {
  PipelineResolver,
  STANDALONE_CONTEXT_PATTERN,
  normalizeContext,
  isStandaloneContext,
  preferredEnvironment,
  buildStrategies,
  type ResolutionStrategy,
  type ResolveRequest,
  type StrategicOverride,
  type PipelineResolverOptions,
} from './pipeline-resolver.js';
