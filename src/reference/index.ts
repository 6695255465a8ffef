export {
  ReferenceDataStore,
  PipelineTable,
  DEFAULT_OWNER_EMAIL,
  type IgnoreEntry,
  type OwnerEntry,
  type ReferenceDataInput,
} from './reference-store.js';

export {
  loadReferenceData,
  loadOwners,
  ownersFilePath,
  parsePipelineCsv,
  parseIgnoreCsv,
  parseOwnersCsv,
  type LoadResult,
} from './csv-loader.js';
