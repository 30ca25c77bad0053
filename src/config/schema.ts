/**
 * Zod schemas for simulator configuration.
 *
 * Numeric command-line values arrive either as numbers (the argument parser
 * converts numeric strings) or as raw strings, so each numeric field accepts
 * both and rejects booleans left behind by a flag given without its value.
 */

import { z } from 'zod'
import { ADDRESS_BITS } from '../core/address'

export const ReplacementPolicySchema = z.enum(['lru', 'approx-lru'])

/** Positive integer given as a number or a decimal string. */
export const PositiveIntSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a decimal integer').transform(Number)])
  .pipe(z.number().int('Expected an integer').positive('Expected a positive integer'))

export const TracePathSchema = z.string().min(1, 'Trace path cannot be empty')

export const SimConfigSchema = z
  .object({
    s: PositiveIntSchema,
    E: PositiveIntSchema,
    b: PositiveIntSchema,
    policy: ReplacementPolicySchema.default('lru'),
  })
  .refine(config => config.s + config.b < ADDRESS_BITS, {
    message: `s + b must be less than ${ADDRESS_BITS}`,
    path: ['s'],
  })

export const ShareableStateSchema = z.object({
  s: z.number().int().positive(),
  E: z.number().int().positive(),
  b: z.number().int().positive(),
  policy: ReplacementPolicySchema.optional(),
  trace: z.string(),
})
