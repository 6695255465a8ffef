/**
 * GitHub API client for the read-only audit
 *
 * Provides methods for:
 * - Listing organizations and their repositories
 * - Reading branch protection and rulesets
 * - Listing repository webhooks
 * - Reading file content at a ref
 */
import { Octokit } from '@octokit/rest';
import type { z, ZodTypeAny } from 'zod';
import { createLogger } from '../utils/logger.js';
import { createTimedFetch } from '../utils/http.js';
import { GitHubAuditError, GitHubAuditErrorCode } from '../types/index.js';
import {
  branchProtectionResponseSchema,
  rulesetListResponseSchema,
  rulesetDetailResponseSchema,
  webhookListResponseSchema,
  fileContentResponseSchema,
  type BranchProtectionRecord,
  type RulesetSummary,
  type RulesetDetail,
  type RepositoryWebhook,
  type RepositoryFile,
} from './schemas.js';

const logger = createLogger('github:client');

export const REPOSITORY_PAGE_SIZE = 100;

/**
 * GitHub reads used by the audit engine
 */
export interface SourceControlApi {
  getAuthenticatedUser(): Promise<string>;
  listOrganizations(): Promise<string[]>;
  listRepositoriesPage(org: string, page: number, perPage?: number): Promise<string[]>;
  /** Resolves to null when the branch is not protected */
  getBranchProtection(owner: string, repo: string, branch: string): Promise<BranchProtectionRecord | null>;
  listRulesets(owner: string, repo: string): Promise<RulesetSummary[]>;
  getRuleset(owner: string, repo: string, rulesetId: number): Promise<RulesetDetail>;
  listWebhooks(owner: string, repo: string): Promise<RepositoryWebhook[]>;
  getFileContent(owner: string, repo: string, path: string, ref: string): Promise<RepositoryFile>;
}

/**
 * Configuration options for GitHubClient
 */
export interface GitHubClientOptions {
  /** GitHub personal access token */
  token?: string;
  /** Base URL for GitHub Enterprise */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Pre-configured Octokit instance */
  octokit?: Octokit;
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** 404 messages meaning the branch has no protection record */
const UNPROTECTED_MESSAGES = ['Branch not protected', 'Branch not found'];

/**
 * A plain 404 ("Not Found") also comes back when the token lacks admin
 * access to the repository, so only the named messages count.
 */
export function isUnprotectedBranchError(error: unknown): boolean {
  if (statusOf(error) !== 404 || !(error instanceof Error)) {
    return false;
  }
  return UNPROTECTED_MESSAGES.some((text) => error.message.startsWith(text));
}

export class GitHubClient implements SourceControlApi {
  private readonly octokit: Octokit;

  constructor(options: GitHubClientOptions = {}) {
    if (options.octokit) {
      this.octokit = options.octokit;
      return;
    }

    if (!options.token) {
      throw new GitHubAuditError('GitHub token is required', GitHubAuditErrorCode.UNAUTHORIZED);
    }

    const octokitOptions: ConstructorParameters<typeof Octokit>[0] = {
      auth: options.token,
      userAgent: 'release-gate-audit/1.0.0',
      request: { fetch: createTimedFetch(options.timeoutMs ?? 30000) },
    };
    if (options.baseUrl) {
      octokitOptions.baseUrl = options.baseUrl;
    }

    this.octokit = new Octokit(octokitOptions);
  }

  /**
   * Login of the token's user; fails when the token is rejected
   */
  async getAuthenticatedUser(): Promise<string> {
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      return data.login;
    } catch (error) {
      throw this.handleError('Failed to validate GitHub token', error);
    }
  }

  async listOrganizations(): Promise<string[]> {
    try {
      const orgs = await this.octokit.paginate(this.octokit.rest.orgs.listForAuthenticatedUser, {
        per_page: 100,
      });
      return orgs.map((org) => org.login);
    } catch (error) {
      throw this.handleError('Failed to list organizations', error);
    }
  }

  /**
   * One page of an organization's repository names
   */
  async listRepositoriesPage(
    org: string,
    page: number,
    perPage = REPOSITORY_PAGE_SIZE
  ): Promise<string[]> {
    logger.debug({ org, page }, 'Listing repositories');

    try {
      const { data } = await this.octokit.rest.repos.listForOrg({ org, per_page: perPage, page });
      return data.map((repo) => repo.name);
    } catch (error) {
      throw this.handleError(`Failed to list repositories of ${org}`, error);
    }
  }

  async getBranchProtection(
    owner: string,
    repo: string,
    branch: string
  ): Promise<BranchProtectionRecord | null> {
    try {
      const { data } = await this.octokit.rest.repos.getBranchProtection({ owner, repo, branch });
      const parsed = this.parse(branchProtectionResponseSchema, data, 'branch protection');
      const checks = parsed.required_status_checks;
      const contexts = [
        ...(checks?.contexts ?? []),
        ...(checks?.checks ?? []).map((check) => check.context),
      ];
      return { requiredContexts: [...new Set(contexts)] };
    } catch (error) {
      if (isUnprotectedBranchError(error)) {
        return null;
      }
      throw this.handleError(`Failed to get protection of ${owner}/${repo}@${branch}`, error);
    }
  }

  async listRulesets(owner: string, repo: string): Promise<RulesetSummary[]> {
    try {
      const { data } = await this.octokit.rest.repos.getRepoRulesets({ owner, repo, per_page: 100 });
      return this.parse(rulesetListResponseSchema, data, 'ruleset list');
    } catch (error) {
      throw this.handleError(`Failed to list rulesets of ${owner}/${repo}`, error);
    }
  }

  async getRuleset(owner: string, repo: string, rulesetId: number): Promise<RulesetDetail> {
    try {
      const { data } = await this.octokit.rest.repos.getRepoRuleset({
        owner,
        repo,
        ruleset_id: rulesetId,
      });
      const parsed = this.parse(rulesetDetailResponseSchema, data, 'ruleset');

      const requiredContexts = parsed.rules
        .filter((rule) => rule.type === 'required_status_checks')
        .flatMap((rule) => rule.parameters?.required_status_checks ?? [])
        .map((check) => check.context);

      return {
        id: parsed.id,
        name: parsed.name,
        includeRefs: parsed.conditions?.ref_name?.include ?? [],
        requiredContexts,
      };
    } catch (error) {
      throw this.handleError(`Failed to get ruleset ${rulesetId} of ${owner}/${repo}`, error);
    }
  }

  async listWebhooks(owner: string, repo: string): Promise<RepositoryWebhook[]> {
    try {
      const { data } = await this.octokit.rest.repos.listWebhooks({ owner, repo, per_page: 100 });
      return this.parse(webhookListResponseSchema, data, 'webhook list');
    } catch (error) {
      throw this.handleError(`Failed to list webhooks of ${owner}/${repo}`, error);
    }
  }

  async getFileContent(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): Promise<RepositoryFile> {
    logger.debug({ owner, repo, path, ref }, 'Fetching file content');

    try {
      const { data } = await this.octokit.rest.repos.getContent({ owner, repo, path, ref });
      const parsed = this.parse(fileContentResponseSchema, data, 'file content');
      if (parsed.type !== 'file') {
        throw new GitHubAuditError(
          `${path} in ${owner}/${repo} is a ${parsed.type}, not a file`,
          GitHubAuditErrorCode.API_ERROR
        );
      }
      return { path: parsed.path, encoding: parsed.encoding, content: parsed.content };
    } catch (error) {
      throw this.handleError(`Failed to get ${path} from ${owner}/${repo}@${ref}`, error);
    }
  }

  private parse<S extends ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new GitHubAuditError(
        `Unexpected ${what} response: ${result.error.message}`,
        GitHubAuditErrorCode.API_ERROR
      );
    }
    return result.data;
  }

  /**
   * Convert Octokit errors to GitHubAuditError
   */
  private handleError(message: string, error: unknown): GitHubAuditError {
    if (error instanceof GitHubAuditError) {
      return error;
    }

    const statusCode = statusOf(error);
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.debug({ statusCode, message, errorMessage }, 'GitHub API error');

    switch (statusCode) {
      case 404:
        return new GitHubAuditError(
          `${message}: Resource not found`,
          GitHubAuditErrorCode.NOT_FOUND,
          statusCode
        );
      case 401:
        return new GitHubAuditError(
          `${message}: Authentication failed`,
          GitHubAuditErrorCode.UNAUTHORIZED,
          statusCode
        );
      case 403:
        return new GitHubAuditError(
          `${message}: Access denied (possibly rate limited)`,
          GitHubAuditErrorCode.FORBIDDEN,
          statusCode
        );
      case 429:
        return new GitHubAuditError(
          `${message}: Rate limited`,
          GitHubAuditErrorCode.RATE_LIMITED,
          statusCode
        );
      default:
        return new GitHubAuditError(
          `${message}: ${errorMessage}`,
          GitHubAuditErrorCode.API_ERROR,
          statusCode
        );
    }
  }
}
