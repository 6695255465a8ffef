/**
 * Compliance Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { classify, describeReason, isInconclusive } from '../src/classifier/index.js';
import {
  ComplianceReason,
  DetailCode,
  PrValidation,
  ProtectionSource,
  StaticAnalysis,
  type BranchProtectionFacts,
  type GateStatus,
} from '../src/types/index.js';

function facts(contexts: string[], overrides: Partial<BranchProtectionFacts> = {}): BranchProtectionFacts {
  return {
    requiresStatusChecks: contexts.length > 0,
    contexts,
    source: contexts.length > 0 ? ProtectionSource.BRANCH_PROTECTION : ProtectionSource.NONE,
    probeErrors: [],
    ...overrides,
  };
}

function gate(overrides: Partial<GateStatus> = {}): GateStatus {
  return {
    context: 'buildA',
    prValidation: PrValidation.ENABLED,
    staticAnalysis: StaticAnalysis.ENABLED,
    staticAnalysisDetail: DetailCode.NONE,
    ...overrides,
  };
}

describe('classify', () => {
  it('should mark a fully gated branch compliant', () => {
    expect(classify(facts(['buildA']), [gate()])).toEqual({
      compliant: true,
      reason: ComplianceReason.COMPLIANT,
      inconclusive: false,
    });
  });

  it('should report NoStatusChecks for an unprotected branch', () => {
    expect(classify(facts([]), [])).toEqual({
      compliant: false,
      reason: ComplianceReason.NO_STATUS_CHECKS,
      inconclusive: false,
    });
  });

  it('should rank NoStatusChecks above a disabled PR validation', () => {
    const verdict = classify(
      facts(['buildA'], { requiresStatusChecks: false }),
      [gate({ prValidation: PrValidation.DISABLED, staticAnalysis: StaticAnalysis.DISABLED })]
    );
    expect(verdict.reason).toBe(ComplianceReason.NO_STATUS_CHECKS);
    expect(verdict.compliant).toBe(false);
  });

  it('should report NoContextsConfigured when checks are required without contexts', () => {
    const verdict = classify(facts([], { requiresStatusChecks: true }), []);
    expect(verdict.reason).toBe(ComplianceReason.NO_CONTEXTS_CONFIGURED);
  });

  it('should treat any non-enabled PR validation as PRValidationDisabled', () => {
    for (const prValidation of [
      PrValidation.DISABLED,
      PrValidation.NOT_FOUND,
      PrValidation.NO_TOKEN,
      PrValidation.ERROR,
    ]) {
      const verdict = classify(facts(['buildA', 'buildB']), [
        gate(),
        gate({ context: 'buildB', prValidation }),
      ]);
      expect(verdict.reason).toBe(ComplianceReason.PR_VALIDATION_DISABLED);
    }
  });

  it('should rank PR validation above static analysis', () => {
    const verdict = classify(facts(['buildA']), [
      gate({ prValidation: PrValidation.DISABLED, staticAnalysis: StaticAnalysis.DISABLED }),
    ]);
    expect(verdict.reason).toBe(ComplianceReason.PR_VALIDATION_DISABLED);
  });

  it('should report StaticAnalysisDisabled when a scan is disabled', () => {
    const verdict = classify(facts(['buildA']), [
      gate({ staticAnalysis: StaticAnalysis.DISABLED, staticAnalysisDetail: 'Checkmarx TG' }),
    ]);
    expect(verdict).toEqual({
      compliant: false,
      reason: ComplianceReason.STATIC_ANALYSIS_DISABLED,
      inconclusive: false,
    });
  });

  it('should not fail compliance for not-applicable static analysis', () => {
    const verdict = classify(facts(['pull-request-validation-foo/ADO']), [
      gate({
        context: 'pull-request-validation-foo/ADO',
        staticAnalysis: StaticAnalysis.NOT_APPLICABLE,
        staticAnalysisDetail: DetailCode.STANDALONE_REPO,
      }),
    ]);
    expect(verdict.compliant).toBe(true);
  });

  it('should keep errored static analysis compliant but inconclusive', () => {
    const verdict = classify(facts(['buildA']), [
      gate({ staticAnalysis: StaticAnalysis.ERROR, staticAnalysisDetail: DetailCode.YAML_FETCH_ERROR }),
    ]);
    expect(verdict).toEqual({
      compliant: true,
      reason: ComplianceReason.COMPLIANT,
      inconclusive: true,
    });
  });
});

describe('isInconclusive', () => {
  it('should flag protection probe failures', () => {
    expect(isInconclusive(facts([], { probeErrors: ['rulesets'] }), [])).toBe(true);
  });

  it('should flag missing tokens', () => {
    expect(
      isInconclusive(facts(['buildA']), [
        gate({ prValidation: PrValidation.NO_TOKEN, staticAnalysis: StaticAnalysis.ERROR }),
      ])
    ).toBe(true);
  });

  it('should not flag verified results', () => {
    expect(isInconclusive(facts(['buildA']), [gate({ prValidation: PrValidation.NOT_FOUND })])).toBe(false);
  });
});

describe('describeReason', () => {
  it('should describe each reason', () => {
    expect(describeReason(ComplianceReason.NO_STATUS_CHECKS)).toBe('Status checks not required');
    expect(describeReason(ComplianceReason.STATIC_ANALYSIS_DISABLED)).toBe(
      'PR validation enabled but static analysis is disabled'
    );
  });
});
