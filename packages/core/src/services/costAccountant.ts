import type { PriceTable } from "../config/models.js";

/**
 * Blended USD price per million tokens for `model`, or 0 when the table has
 * no entry for it.
 */
export function pricePerMillion(model: string, pricing: PriceTable): number {
  return pricing[model] ?? 0;
}

/**
 * Estimated USD cost of one call. Input and output tokens are billed at the
 * same blended rate.
 */
export function calculateCost(
  inputTokens: number,
  outputTokens: number,
  model: string,
  pricing: PriceTable,
): number {
  return (
    (pricePerMillion(model, pricing) * (inputTokens + outputTokens)) /
    1_000_000
  );
}

/**
 * Formats a USD amount with six decimals, e.g. `$0.000045`.
 */
export function formatCost(cost: number): string {
  return `$${cost.toFixed(6)}`;
}
