// Branches audited in every repository
export const TARGET_BRANCHES = ['main', 'staging', 'release'] as const;

export type TargetBranch = (typeof TARGET_BRANCHES)[number];

const TARGET_BRANCH_PATTERN = /^(main|staging|release)$/i;

export function isTargetBranch(branch: string): boolean {
  return TARGET_BRANCH_PATTERN.test(branch);
}

/**
 * Which protection mechanism supplied the contexts.
 */
export const ProtectionSource = {
  NONE: 'none',
  BRANCH_PROTECTION: 'branch-protection',
  RULESET: 'ruleset',
} as const;

export type ProtectionSource = (typeof ProtectionSource)[keyof typeof ProtectionSource];

/**
 * Facts about the status-check gate of one repository branch.
 *
 * `requiresStatusChecks` is false exactly when `contexts` is empty.
 * `probeErrors` names the protection lookups that failed, e.g.
 * `branch-protection`, `rulesets` or `ruleset:42`.
 */
export interface BranchProtectionFacts {
  requiresStatusChecks: boolean;
  contexts: string[];
  source: ProtectionSource;
  probeErrors: string[];
}
