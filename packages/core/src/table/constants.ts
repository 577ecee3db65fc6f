/** Capacity multiplier applied on every grow. Not configurable. */
export const GROWTH_FACTOR = 2

export const DEFAULT_INITIAL_CAPACITY = 16

export const DEFAULT_MAX_LOAD_FACTOR = 1

/** Hard ceiling on bucket slots for a single table. */
export const MAX_BUCKET_SLOTS = 2 ** 30
