import { z } from 'zod';

// ============================================================================
// Response subsets read by the audit
// ============================================================================

export const branchProtectionResponseSchema = z.object({
  required_status_checks: z
    .object({
      contexts: z.array(z.string()).default([]),
      checks: z.array(z.object({ context: z.string() })).default([]),
    })
    .nullish(),
});

export const rulesetSummarySchema = z.object({
  id: z.number().int(),
  name: z.string().default(''),
  target: z.string().nullish(),
});

export type RulesetSummary = z.infer<typeof rulesetSummarySchema>;

export const rulesetListResponseSchema = z.array(rulesetSummarySchema);

export const rulesetDetailResponseSchema = z.object({
  id: z.number().int(),
  name: z.string().default(''),
  target: z.string().nullish(),
  conditions: z
    .object({
      ref_name: z
        .object({
          include: z.array(z.string()).default([]),
        })
        .nullish(),
    })
    .nullish(),
  rules: z
    .array(
      z.object({
        type: z.string(),
        parameters: z
          .object({
            required_status_checks: z.array(z.object({ context: z.string() })).nullish(),
          })
          .nullish(),
      })
    )
    .default([]),
});

export const webhookListResponseSchema = z.array(
  z.object({
    id: z.number().int(),
    active: z.boolean().default(true),
    events: z.array(z.string()).default([]),
  })
);

export const fileContentResponseSchema = z.object({
  type: z.string(),
  path: z.string(),
  content: z.string().default(''),
  encoding: z.string().default('base64'),
});

// ============================================================================
// Mapped shapes
// ============================================================================

/**
 * Branch protection record reduced to its required contexts
 */
export interface BranchProtectionRecord {
  requiredContexts: string[];
}

/**
 * Ruleset detail reduced to its branch conditions and required contexts
 */
export interface RulesetDetail {
  id: number;
  name: string;
  includeRefs: string[];
  /** Contexts of every required_status_checks rule, in rule order */
  requiredContexts: string[];
}

export interface RepositoryWebhook {
  id: number;
  active: boolean;
  events: string[];
}

export interface RepositoryFile {
  path: string;
  encoding: string;
  content: string;
}
