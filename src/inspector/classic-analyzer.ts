/**
 * Static-analysis detection for classic (designer) pipelines.
 */

import { DetailCode, StaticAnalysis } from '../types/index.js';
import type { BuildDefinition, BuildStep } from '../azure-devops/index.js';
import type { StaticAnalysisResult, StaticAnalysisTool } from './types.js';

const TASK_GROUP_DEFINITION_TYPE = 'metaTask';

/**
 * A step runs the tool directly (task GUID) or through a task group
 * whose display name mentions it.
 */
export function isStaticAnalysisStep(step: BuildStep, tool: StaticAnalysisTool): boolean {
  const task = step.task;
  if (!task) {
    return false;
  }
  if (task.id.toLowerCase() === tool.taskId.toLowerCase()) {
    return true;
  }
  return (
    task.definitionType === TASK_GROUP_DEFINITION_TYPE &&
    step.displayName.toLowerCase().includes(tool.name.toLowerCase())
  );
}

/**
 * One disabled occurrence fails the whole pipeline.
 */
export function analyzeClassicPipeline(
  definition: BuildDefinition,
  tool: StaticAnalysisTool
): StaticAnalysisResult {
  const steps = (definition.process?.phases ?? []).flatMap((phase) => phase.steps ?? []);
  const matches = steps.filter((step) => isStaticAnalysisStep(step, tool));

  const enabled = matches.filter((step) => step.enabled === true);
  const disabled = matches.filter((step) => step.enabled === false);

  if (enabled.length + disabled.length === 0) {
    return { staticAnalysis: StaticAnalysis.NOT_APPLICABLE, staticAnalysisDetail: DetailCode.NO_TOOL };
  }

  if (disabled.length > 0) {
    return {
      staticAnalysis: StaticAnalysis.DISABLED,
      staticAnalysisDetail: disabled.map((step) => step.displayName).join('; '),
    };
  }

  return { staticAnalysis: StaticAnalysis.ENABLED, staticAnalysisDetail: DetailCode.NONE };
}
