import { z } from 'zod';

/**
 * Order side schema
 */
export const OrderSideSchema = z.enum(['BUY', 'SELL']);

/**
 * Order type schema
 */
export const OrderTypeSchema = z.enum(['MARKET', 'LIMIT']);

/**
 * Inbound order payload. `tradingsymbol` is accepted as an alias of `symbol`;
 * quantity/symbol rules are enforced by the order validator so that each
 * failure carries its own reason.
 */
export const OrderPayloadSchema = z
  .object({
    symbol: z.string().optional(),
    tradingsymbol: z.string().optional(),
    side: OrderSideSchema.default('BUY'),
    quantity: z.coerce.number(),
    orderType: OrderTypeSchema.default('MARKET'),
    price: z.coerce.number().nonnegative().optional(),
    product: z.string().optional(),
    strategyId: z.union([z.string(), z.number()]).transform(String).optional(),
  })
  .transform(({ tradingsymbol, symbol, ...rest }) => ({
    ...rest,
    symbol: symbol || tradingsymbol || undefined,
  }));
