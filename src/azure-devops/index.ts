export {
  AzureDevOpsClient,
  AZURE_DEVOPS_API_VERSION,
  type PipelineDefinitionApi,
  type AzureDevOpsClientOptions,
} from './azure-devops-client.js';

export {
  buildDefinitionSchema,
  CLASSIC_PROCESS_TYPE,
  YAML_PROCESS_TYPE,
  type BuildDefinition,
  type BuildStep,
} from './schemas.js';
