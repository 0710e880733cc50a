import { z } from 'zod';

// FMP returns null for fields it has no value for
const nullableNumber = z.number().nullable().optional();

export const titledNewsItemSchema = z.object({
  title: z.string().min(1),
});

export const wrappedNewsFeedSchema = z.object({
  data: z.array(z.unknown()),
});

export const quoteSchema = z
  .object({
    symbol: z.string().optional(),
    name: z.string().nullable().optional(),
    price: nullableNumber,
    change: nullableNumber,
    changesPercentage: nullableNumber,
  })
  .passthrough();

export const quoteListSchema = z.array(quoteSchema);

export const moverSchema = z
  .object({
    symbol: z.string(),
    name: z.string().nullable().optional(),
    price: nullableNumber,
    volume: nullableNumber,
    changesPercentage: nullableNumber,
  })
  .passthrough();

export const moverListSchema = z.array(moverSchema);

export const benchmarkSymbolListSchema = z.array(
  z.object({
    symbol: z.string(),
    description: z.string(),
    group: z.string(),
  }),
);

export type FmpMover = z.infer<typeof moverSchema>;
