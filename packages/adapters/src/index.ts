export { MemoryStorageAdapter } from './MemoryStorageAdapter';
export { FileStorageAdapter } from './FileStorageAdapter';
export { storageFromConfig } from './storageFromConfig';
