// Storage provider implementations

export { createFileSystemProvider } from './fs.js';
export { createInMemoryProvider, type InMemoryStorageProvider } from './memory.js';
