import { readFileSync } from 'node:fs';

import { z } from 'zod';

/** USD per million tokens. */
export interface ModelPrice {
  input: number;
  output: number;
}

export type PriceTable = Record<string, ModelPrice>;

export const ModelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

const PriceTableSchema = z.record(z.string(), ModelPriceSchema);

const FALLBACK_PRICE: ModelPrice = { input: 1.0, output: 2.0 };

export const DEFAULT_PRICE_TABLE: Readonly<PriceTable> = Object.freeze(
  PriceTableSchema.parse(JSON.parse(readFileSync(new URL('./pricing.json', import.meta.url), 'utf8')))
);

export function mergePriceTable(overrides: PriceTable = {}): PriceTable {
  return { ...DEFAULT_PRICE_TABLE, ...overrides };
}

export function priceFor(model: string, table: PriceTable = DEFAULT_PRICE_TABLE): ModelPrice {
  return table[model] ?? table.default ?? FALLBACK_PRICE;
}

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number, table: PriceTable = DEFAULT_PRICE_TABLE): number {
  const price = priceFor(model, table);
  return (inputTokens / 1_000_000) * price.input + (outputTokens / 1_000_000) * price.output;
}
