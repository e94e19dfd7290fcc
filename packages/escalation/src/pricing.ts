import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { roundUsd, type TokenUsage, type UsageRecord } from "@buildwarden/architecture";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PRICING_FILE = join(__dirname, "model-pricing.json");
const TOKENS_PER_UNIT = 1_000_000;

export interface ModelPrice {
  input: number;
  output: number;
}

export type PriceTable = Record<string, ModelPrice>;

const pricingSchema = z.object({
  models: z.record(z.object({ input: z.number().nonnegative(), output: z.number().nonnegative() })),
});

let cached: PriceTable | null = null;

export function loadPriceTable(path: string = PRICING_FILE): PriceTable {
  if (path === PRICING_FILE && cached) return cached;
  const table = pricingSchema.parse(JSON.parse(readFileSync(path, "utf-8"))).models;
  if (path === PRICING_FILE) cached = table;
  return table;
}

/**
 * Resolve a price for a model id. Dated snapshots ("o3-2025-04-16") fall back
 * to the longest listed prefix.
 */
export function priceFor(model: string, table: PriceTable = loadPriceTable()): ModelPrice | null {
  const exact = table[model];
  if (exact) return exact;
  let best: string | null = null;
  for (const name of Object.keys(table)) {
    if (model.startsWith(`${name}-`) && (!best || name.length > best.length)) best = name;
  }
  return best ? (table[best] ?? null) : null;
}

/** Cost of a call in USD. Unknown models cost zero. */
export function priceUsage(
  model: string,
  usage: TokenUsage,
  table: PriceTable = loadPriceTable(),
): UsageRecord["cost_usd"] {
  const price = priceFor(model, table);
  if (!price) return { input: 0, output: 0, total: 0 };
  const input = (usage.input / TOKENS_PER_UNIT) * price.input;
  const output = (usage.output / TOKENS_PER_UNIT) * price.output;
  return { input: roundUsd(input), output: roundUsd(output), total: roundUsd(input + output) };
}
