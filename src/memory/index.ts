export type { PathMemoryConfig, PathMemoryStats, LeaseRelease } from './interfaces/IPathMemory.ts'
export { PathMemoryStore, DEFAULT_MEMORY_CONFIG } from './PathMemoryStore.ts'
export { KeyedMutex } from './KeyedMutex.ts'
