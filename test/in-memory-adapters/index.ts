/**
 * In-Memory Adapters for testing
 */
export * from './in-memory-catalog-api.adapter';
export * from './in-memory-asset-storage.adapter';
