/**
 * Secrets held in an Azure Key Vault, read with the ambient Azure
 * identity (managed identity on a VM, CLI login or environment
 * credentials elsewhere).
 */

import { DefaultAzureCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../types/index.js';
import type { SecretProvider } from './secret-provider.js';

const log = createLogger('secrets:key-vault');

export type KeyVaultClient = Pick<SecretClient, 'getSecret'>;

export interface KeyVaultSecretProviderOptions {
  vaultUrl: string;
  /** Injected client; defaults to one authenticated with DefaultAzureCredential */
  client?: KeyVaultClient;
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class KeyVaultSecretProvider implements SecretProvider {
  private readonly client: KeyVaultClient;
  private readonly vaultUrl: string;
  private readonly values = new Map<string, string | null>();

  constructor(options: KeyVaultSecretProviderOptions) {
    this.vaultUrl = options.vaultUrl;
    this.client = options.client ?? new SecretClient(options.vaultUrl, new DefaultAzureCredential());
  }

  async secretExists(name: string): Promise<boolean> {
    const value = await this.read(name);
    return value !== null;
  }

  async getSecret(name: string): Promise<string> {
    const value = await this.read(name);
    if (value === null) {
      throw new ConfigurationError(`Secret ${name} is not set in ${this.vaultUrl}`);
    }
    return value;
  }

  /**
   * Value of `name`, or null when the vault has no such secret or it
   * is empty. Results are kept for the life of the provider.
   */
  private async read(name: string): Promise<string | null> {
    const cached = this.values.get(name);
    if (cached !== undefined) {
      return cached;
    }

    let value: string | null;
    try {
      const secret = await this.client.getSecret(name);
      value = secret.value?.trim() || null;
    } catch (error) {
      if (statusOf(error) !== 404) {
        throw new ConfigurationError(
          `Failed to read secret ${name} from ${this.vaultUrl}: ${messageOf(error)}`
        );
      }
      value = null;
    }

    log.debug({ secret: name, found: value !== null }, 'Key Vault secret read');
    this.values.set(name, value);
    return value;
  }
}
