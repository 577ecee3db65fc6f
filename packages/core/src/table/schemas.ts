import { z } from 'zod'
import { CapacitySchema, LoadFactorSchema } from '../common/index.js'
import { DEFAULT_INITIAL_CAPACITY, DEFAULT_MAX_LOAD_FACTOR, MAX_BUCKET_SLOTS } from './constants.js'

export const CreateTableOptionsSchema = z.object({
  initialCapacity: CapacitySchema.default(DEFAULT_INITIAL_CAPACITY),
  maxLoadFactor: LoadFactorSchema.default(DEFAULT_MAX_LOAD_FACTOR),
  maxCapacity: CapacitySchema.max(MAX_BUCKET_SLOTS).default(MAX_BUCKET_SLOTS),
}).superRefine((data, ctx) => {
  if (data.initialCapacity > data.maxCapacity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `initialCapacity (${data.initialCapacity}) exceeds maxCapacity (${data.maxCapacity})`,
      path: ['initialCapacity'],
    })
  }
})

export type CreateTableOptions = z.input<typeof CreateTableOptionsSchema>
export type TableConfig = z.infer<typeof CreateTableOptionsSchema>
