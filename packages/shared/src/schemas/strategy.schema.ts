import { z } from 'zod';

/**
 * SMA crossover parameters
 *
 * fastWindow must be strictly below slowWindow.
 */
export const StrategyParamsSchema = z
  .object({
    fastWindow: z.number().int().positive(),
    slowWindow: z.number().int().positive(),
    allocationFraction: z.number().gt(0).lte(1).default(1),
  })
  .refine((params) => params.fastWindow < params.slowWindow, {
    message: 'fastWindow must be smaller than slowWindow',
    path: ['fastWindow'],
  });

/**
 * Backtest run request
 */
export const BacktestRequestSchema = z.object({
  symbol: z.string().min(1),
  interval: z.string().min(1),
  from: z.union([z.string(), z.number()]).optional(),
  to: z.union([z.string(), z.number()]).optional(),
  strategyParams: StrategyParamsSchema,
});

/**
 * Live-run start parameters; omitted values fall back to configured defaults
 */
export const LiveRunParamsSchema = z.object({
  strategyId: z.string().min(1),
  capital: z.number().positive().optional(),
  maxDailyLoss: z.number().nonnegative().optional(),
  allocation: z.number().gt(0).lte(1).optional(),
});

export type StrategyParams = z.output<typeof StrategyParamsSchema>;
export type StrategyParamsInput = z.input<typeof StrategyParamsSchema>;
