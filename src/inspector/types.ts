import type { GateInspection } from '../types/index.js';

/**
 * Static-analysis half of a gate inspection
 */
export type StaticAnalysisResult = Pick<GateInspection, 'staticAnalysis' | 'staticAnalysisDetail'>;

export interface StaticAnalysisTool {
  /** Tool name matched case-insensitively, e.g. "checkmarx" */
  name: string;
  /** Task GUID of the tool's classic build task */
  taskId: string;
}
