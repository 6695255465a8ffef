export {
  EnvSecretProvider,
  loadCredentials,
  type SecretProvider,
  type AuditCredentials,
} from './secret-provider.js';
export {
  KeyVaultSecretProvider,
  type KeyVaultClient,
  type KeyVaultSecretProviderOptions,
} from './key-vault-secret-provider.js';
