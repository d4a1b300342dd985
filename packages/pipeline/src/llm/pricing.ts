import type { ChatMessage } from './client.js';

export interface ModelPrice {
  inputPerMillionUsd: number;
  outputPerMillionUsd: number;
}

export type PriceTable = Record<string, ModelPrice>;

export const FALLBACK_PRICE: ModelPrice = { inputPerMillionUsd: 0.15, outputPerMillionUsd: 0.6 };

export const DEFAULT_PRICES: PriceTable = {
  'gpt-4o-mini': { inputPerMillionUsd: 0.15, outputPerMillionUsd: 0.6 },
  'gpt-4o': { inputPerMillionUsd: 2.5, outputPerMillionUsd: 10 },
  'gpt-4.1-mini': { inputPerMillionUsd: 0.4, outputPerMillionUsd: 1.6 },
  'gpt-4.1-nano': { inputPerMillionUsd: 0.1, outputPerMillionUsd: 0.4 },
  'deepseek-chat': { inputPerMillionUsd: 0.27, outputPerMillionUsd: 1.1 },
};
const MESSAGE_OVERHEAD_TOKENS = 4;

/** Byte-level BPE never yields more than one token per UTF-8 byte. */
export function estimateTokens(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

export function priceFor(model: string, table: PriceTable = DEFAULT_PRICES): ModelPrice {
  return table[model] ?? DEFAULT_PRICES[model] ?? FALLBACK_PRICE;
}

export function computeCostUsd(price: ModelPrice, tokensIn: number, tokensOut: number): number {
  return (tokensIn / 1_000_000) * price.inputPerMillionUsd + (tokensOut / 1_000_000) * price.outputPerMillionUsd;
}

/**
 * Upper-bound cost of one call: estimated prompt tokens plus the full output allowance.
 */
export function estimateCallCostUsd(price: ModelPrice, messages: ChatMessage[], maxTokens: number): number {
  const promptTokens = messages.reduce(
    (sum, message) => sum + estimateTokens(message.content) + MESSAGE_OVERHEAD_TOKENS,
    0,
  );

  return computeCostUsd(price, promptTokens, maxTokens);
}
