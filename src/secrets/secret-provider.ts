/**
 * Credential acquisition
 *
 * Tokens are read once at start-up and stay fixed for the run.
 */

import { createLogger } from '../utils/logger.js';
import { ConfigurationError, Environment } from '../types/index.js';
import type { AuditConfig } from '../config/index.js';

const log = createLogger('secrets');

export interface SecretProvider {
  getSecret(name: string): Promise<string>;
  secretExists(name: string): Promise<boolean>;
}

/**
 * Secrets taken from environment variables (a `.env` file is loaded
 * into the environment at start-up).
 */
export class EnvSecretProvider implements SecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async secretExists(name: string): Promise<boolean> {
    const value = this.env[name];
    return value !== undefined && value.trim() !== '';
  }

  async getSecret(name: string): Promise<string> {
    const value = this.env[name]?.trim();
    if (!value) {
      throw new ConfigurationError(`Secret ${name} is not set`);
    }
    return value;
  }
}

export interface AuditCredentials {
  githubToken: string;
  ciTokens: Readonly<Record<Environment, string | null>>;
}

async function optionalSecret(
  provider: SecretProvider,
  name: string,
  label: string
): Promise<string | null> {
  if (await provider.secretExists(name)) {
    return provider.getSecret(name);
  }
  log.warn({ secret: name }, `${label} CI token not available; its pipelines will report no-token`);
  return null;
}

/**
 * Read the GitHub token (required) and both CI tokens (optional).
 */
export async function loadCredentials(
  provider: SecretProvider,
  config: AuditConfig
): Promise<AuditCredentials> {
  if (!(await provider.secretExists(config.githubTokenSecret))) {
    throw new ConfigurationError(
      `GitHub token is required but secret ${config.githubTokenSecret} is not available`
    );
  }
  const githubToken = await provider.getSecret(config.githubTokenSecret);

  const [primary, secondary] = await Promise.all([
    optionalSecret(provider, config.primary.tokenSecret, config.primary.label),
    optionalSecret(provider, config.secondary.tokenSecret, config.secondary.label),
  ]);

  log.info(
    {
      primaryToken: primary !== null,
      secondaryToken: secondary !== null,
    },
    'Credentials loaded'
  );

  return {
    githubToken,
    ciTokens: {
      [Environment.PRIMARY]: primary,
      [Environment.SECONDARY]: secondary,
    },
  };
}
