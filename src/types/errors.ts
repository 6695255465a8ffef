/**
 * Error types shared across the audit engine.
 */

/**
 * Fatal setup problem: missing secret, invalid configuration,
 * no accessible organizations.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export const GitHubAuditErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  RATE_LIMITED: 'RATE_LIMITED',
  API_ERROR: 'API_ERROR',
} as const;

export type GitHubAuditErrorCode = (typeof GitHubAuditErrorCode)[keyof typeof GitHubAuditErrorCode];

/**
 * Error thrown when a GitHub API read fails
 */
export class GitHubAuditError extends Error {
  constructor(
    message: string,
    public readonly code: GitHubAuditErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'GitHubAuditError';
  }
}

export const AzureDevOpsErrorCode = {
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  HTTP_ERROR: 'HTTP_ERROR',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

export type AzureDevOpsErrorCode = (typeof AzureDevOpsErrorCode)[keyof typeof AzureDevOpsErrorCode];

/**
 * Error thrown when an Azure DevOps API read fails
 */
export class AzureDevOpsError extends Error {
  constructor(
    message: string,
    public readonly code: AzureDevOpsErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'AzureDevOpsError';
  }
}
