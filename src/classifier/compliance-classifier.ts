/**
 * Compliance Classifier
 *
 * Pure verdict over one branch's facts. Rules are evaluated in order
 * and the first match wins.
 */

import {
  ComplianceReason,
  PrValidation,
  StaticAnalysis,
  type BranchProtectionFacts,
  type ComplianceVerdict,
  type GateStatus,
} from '../types/index.js';

const REASON_DESCRIPTIONS: Record<ComplianceReason, string> = {
  [ComplianceReason.NO_STATUS_CHECKS]: 'Status checks not required',
  [ComplianceReason.NO_CONTEXTS_CONFIGURED]: 'Status checks required but no contexts configured',
  [ComplianceReason.PR_VALIDATION_DISABLED]: 'PR validation contains disabled status',
  [ComplianceReason.STATIC_ANALYSIS_DISABLED]:
    'PR validation enabled but static analysis is disabled',
  [ComplianceReason.COMPLIANT]: 'Compliant',
};

export function describeReason(reason: ComplianceReason): string {
  return REASON_DESCRIPTIONS[reason];
}

/**
 * Whether a fact was degraded by missing access instead of verified.
 */
export function isInconclusive(facts: BranchProtectionFacts, gates: readonly GateStatus[]): boolean {
  if (facts.probeErrors.length > 0) {
    return true;
  }
  return gates.some(
    (gate) =>
      gate.prValidation === PrValidation.NO_TOKEN ||
      gate.prValidation === PrValidation.ERROR ||
      gate.staticAnalysis === StaticAnalysis.ERROR
  );
}

function reasonFor(facts: BranchProtectionFacts, gates: readonly GateStatus[]): ComplianceReason {
  if (!facts.requiresStatusChecks) {
    return ComplianceReason.NO_STATUS_CHECKS;
  }
  if (facts.contexts.length === 0) {
    return ComplianceReason.NO_CONTEXTS_CONFIGURED;
  }
  if (gates.some((gate) => gate.prValidation !== PrValidation.ENABLED)) {
    return ComplianceReason.PR_VALIDATION_DISABLED;
  }
  if (gates.some((gate) => gate.staticAnalysis === StaticAnalysis.DISABLED)) {
    return ComplianceReason.STATIC_ANALYSIS_DISABLED;
  }
  return ComplianceReason.COMPLIANT;
}

export function classify(facts: BranchProtectionFacts, gates: readonly GateStatus[]): ComplianceVerdict {
  const reason = reasonFor(facts, gates);
  return {
    compliant: reason === ComplianceReason.COMPLIANT,
    reason,
    inconclusive: isInconclusive(facts, gates),
  };
}
