// Repository interfaces
// These define the contracts for data access, enabling backend independence.

export { DEFAULT_MULTI_FILE_PATTERN, type StorageProvider } from './storage-provider.js';

export type { FormatSerializer } from './format-serializer.js';

export type {
  Repository,
  RepositoryDefinition,
  RepositoryOperationOptions,
  RepositoryReference,
} from './repository.js';
