export {
  DataContext,
  defineDataContext,
  type DataContextDefinition,
  type DataContextOptions,
  type ContextState,
  type RepositoryMap,
  type RepositoriesOf,
} from './data-context.js';
