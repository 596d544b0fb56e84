export * from './types'
export { createMemoryDeadLetterQueue } from './memory'
export type { MemoryDeadLetterQueue } from './memory'
export { createFileDeadLetterQueue } from './file'
export { replayDeadLetters } from './replay'
export type { ReplayHandler, ReplaySummary } from './replay'
