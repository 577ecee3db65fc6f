/**
 * Seed — process-wide, set-once hash seed.
 */

export { SeedProvider, processSeed, setHashSeed, deriveSeed } from './provider.js'
export type { SeedSource } from './provider.js'
