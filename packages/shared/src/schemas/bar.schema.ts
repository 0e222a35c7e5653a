import { z } from 'zod';

/**
 * Zod schema for a canonical Bar
 */
export const BarSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().nonnegative(),
});

/**
 * Upstream timestamp: Unix ms as number or numeric string, or ISO-8601 string
 */
export const RawTimestampSchema = z.union([z.number().finite(), z.string().min(1)]);

/**
 * Upstream bar as a positional array: [timestamp, open, high, low, close, volume, ...extra]
 */
export const PositionalBarSchema = z
  .tuple([
    RawTimestampSchema,
    z.coerce.number(),
    z.coerce.number(),
    z.coerce.number(),
    z.coerce.number(),
    z.coerce.number(),
  ])
  .rest(z.unknown());

/**
 * Upstream bar as a keyed record, accepting short and long key names
 */
export const KeyedBarSchema = z
  .object({
    timestamp: RawTimestampSchema.optional(),
    time: RawTimestampSchema.optional(),
    date: RawTimestampSchema.optional(),
    datetime: RawTimestampSchema.optional(),
    open: z.coerce.number().optional(),
    o: z.coerce.number().optional(),
    high: z.coerce.number().optional(),
    h: z.coerce.number().optional(),
    low: z.coerce.number().optional(),
    l: z.coerce.number().optional(),
    close: z.coerce.number().optional(),
    c: z.coerce.number().optional(),
    volume: z.coerce.number().optional(),
    v: z.coerce.number().optional(),
  })
  .passthrough();

export type KeyedBar = z.infer<typeof KeyedBarSchema>;
