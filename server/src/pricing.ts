/**
 * USD per 1,000 tokens, by model id.
 */
export interface ModelPrice {
  input: number;
  output: number;
}

export const PRICE_TABLE: Record<string, ModelPrice> = {
  // Google Gemini
  'gemini-2.5-pro': { input: 0.00125, output: 0.01 },
  'gemini-2.5-flash': { input: 0.00015, output: 0.0035 },
  'gemini-2.0-flash': { input: 0.0001, output: 0.0004 },
  'gemini-2.0-flash-lite': { input: 0, output: 0 },
  'gemini-1.5-pro': { input: 0.00125, output: 0.005 },
  'gemini-1.5-flash': { input: 0.000075, output: 0.0003 },
  // Anthropic Claude
  'claude-sonnet-4-20250514': { input: 0.003, output: 0.015 },
  'claude-3-7-sonnet-20250219': { input: 0.003, output: 0.015 },
  'claude-3-5-sonnet-20241022': { input: 0.003, output: 0.015 },
  'claude-3-5-sonnet-20240620': { input: 0.003, output: 0.015 },
  'claude-3-5-haiku-20241022': { input: 0.0008, output: 0.004 },
  'claude-3-opus-20240229': { input: 0.015, output: 0.075 },
  'claude-3-sonnet-20240229': { input: 0.003, output: 0.015 },
  'claude-3-haiku-20240307': { input: 0.00025, output: 0.00125 },
  // OpenAI
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-4': { input: 0.03, output: 0.06 },
  'gpt-3.5-turbo': { input: 0.0005, output: 0.0015 },
};

/**
 * Exact id first, then the first table key that contains the id or is
 * contained in it (e.g. 'models/gemini-2.5-pro-latest').
 */
export function findPrice(model: string, table: Record<string, ModelPrice> = PRICE_TABLE): ModelPrice | null {
  // Own keys only: 'toString' and friends are not models
  if (Object.hasOwn(table, model)) return table[model] ?? null;
  for (const [key, price] of Object.entries(table)) {
    if (key.includes(model) || model.includes(key)) return price;
  }
  return null;
}

/** Cost in USD rounded to 8 decimals; unknown models cost nothing */
export function calcCost(model: string, inputTokens: number, outputTokens: number): number {
  const price = findPrice(model);
  if (!price) {
    console.warn(`[Cost] Unknown model '${model}', using zero cost`);
    return 0;
  }
  const cost = (inputTokens / 1000) * price.input + (outputTokens / 1000) * price.output;
  return Number(cost.toFixed(8));
}
