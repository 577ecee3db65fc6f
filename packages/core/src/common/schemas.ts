/**
 * Shared Zod schemas for the numeric knobs.
 */

import { z } from 'zod'

export const SeedSchema = z.number().int().min(0).max(0xffffffff)

export const CapacitySchema = z.number().int().positive('capacity must be a positive integer')

export const LoadFactorSchema = z.number().int().min(1, 'max load factor must be at least 1')
