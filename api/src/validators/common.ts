/**
 * Shared Validation Schemas
 */

import { z, type ZodError } from 'zod';

/**
 * zValidator hook: rethrow so handleError renders the 400 envelope
 */
export function throwOnInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}

export const uuid = () => z.string().uuid();

// A non-zero digit past the third fractional digit
const SUB_MILLISECOND = /\.\d{3}0*[1-9]/;

/**
 * ISO 8601 time with offset, parsed to a Date
 *
 * Date holds milliseconds, so finer input is rejected rather than rounded
 * onto a neighbouring point.
 */
export const isoDate = () =>
  z
    .string()
    .datetime({ offset: true })
    .refine((value) => !SUB_MILLISECOND.test(value), {
      message: 'Time precision finer than one millisecond is not supported',
    })
    .transform((value) => new Date(value));

export const name = () => z.string().trim().min(1).max(240);

export const geometrySchema = z.object({
  type: z.literal('Point'),
  coordinates: z.union([
    z.tuple([z.number(), z.number()]),
    z.tuple([z.number(), z.number(), z.number()]),
  ]),
});

/**
 * ?after=&before= window, both bounds optional
 */
export const timeWindowQuerySchema = z.object({
  after: isoDate().optional(),
  before: isoDate().optional(),
});

export type TimeWindowQuery = z.infer<typeof timeWindowQuerySchema>;
