// @tablekit/repositories
// Typed, file-backed repositories grouped into data contexts.
//
// A storage provider moves raw text, serializers turn text into records,
// repositories hold the records by key, and a data context loads and saves
// a fixed set of repositories together. The localization overlay merges a
// key table with per-language text tables.
//
// Key concepts:
// - Repositories never know which format they are stored in
// - A failed load leaves a repository exactly as it was
// - Context instances share nothing but the serializer factory

export * from './interfaces/index.js';
export * from './providers/index.js';
export * from './serializers/index.js';
export * from './tables/index.js';
export * from './context/index.js';
export * from './localization/index.js';
export * from './errors.js';
export * from './logging.js';
