export {
  SecurityGateInspector,
  hasPullRequestTrigger,
  splitFullName,
  decodeFileContent,
  type InspectorGitHubApi,
  type SecurityGateInspectorDeps,
} from './security-gate-inspector.js';

export { analyzeClassicPipeline, isStaticAnalysisStep } from './classic-analyzer.js';

export {
  HeuristicYamlDetector,
  StructuredYamlDetector,
  createYamlDetector,
  HEURISTIC_WINDOW,
  type YamlStaticAnalysisDetector,
  type YamlDetectorKind,
} from './yaml-detector.js';

export type { StaticAnalysisResult, StaticAnalysisTool } from './types.js';
