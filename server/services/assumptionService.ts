import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { z } from 'zod';
import { loadConfig } from '../config';

export const ASSUMPTION_DEFAULTS = {
  forecastYears: 10,
  fcffGrowthRate: 0.14,
  terminalGrowthRate: 0.05,
  beta: 1.0,
  marketReturn: 0.09,
} as const;

export const AssumptionSetSchema = z.object({
  forecastYears: z.number().int().min(5).max(15).default(ASSUMPTION_DEFAULTS.forecastYears),
  fcffGrowthRate: z.number().min(0).max(0.3).default(ASSUMPTION_DEFAULTS.fcffGrowthRate),
  terminalGrowthRate: z.number().min(0).max(0.1).default(ASSUMPTION_DEFAULTS.terminalGrowthRate),
  beta: z.number().min(0).default(ASSUMPTION_DEFAULTS.beta),
  marketReturn: z.number().min(0).default(ASSUMPTION_DEFAULTS.marketReturn),
});

export type AssumptionSet = z.infer<typeof AssumptionSetSchema>;

export const TickerSchema = z
  .string()
  .trim()
  .min(1, 'Ticker symbol is required')
  .max(20, 'Ticker symbol is at most 20 characters')
  .transform(ticker => ticker.toUpperCase());

export function normalizeTicker(raw: string): string {
  return TickerSchema.parse(raw);
}

export function parseAssumptions(raw: unknown): AssumptionSet {
  const parsed = AssumptionSetSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid assumptions: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export type AssumptionLLMProvider = 'openai' | 'anthropic' | 'deepseek' | 'perplexity' | 'grok';

const ASSUMPTION_SYSTEM_PROMPT = `You extract discounted cash flow assumptions from a short natural language request.

Return a JSON object with ONLY the fields the user actually states (omit anything not mentioned):
{
  "forecastYears": integer between 5 and 15,
  "fcffGrowthRate": decimal between 0 and 0.30 (e.g. 0.14 for 14%),
  "terminalGrowthRate": decimal between 0 and 0.10 (e.g. 0.05 for 5%),
  "beta": number >= 0,
  "marketReturn": decimal >= 0 (e.g. 0.09 for 9%)
}

Percentages MUST be converted to decimals.
IMPORTANT: Return ONLY valid JSON, no markdown, no explanations.`;

/** Pulls the first JSON object out of an LLM reply that may be wrapped in fences or prose. */
export function extractJsonObject(responseText: string): string {
  let cleanedText = responseText.trim();

  const fenced = cleanedText.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    cleanedText = fenced[1].trim();
  }

  if (!cleanedText.startsWith('{')) {
    const startIdx = cleanedText.indexOf('{');
    const endIdx = cleanedText.lastIndexOf('}');
    if (startIdx !== -1 && endIdx > startIdx) {
      cleanedText = cleanedText.slice(startIdx, endIdx + 1);
    }
  }

  return cleanedText.trim();
}

const OPENAI_COMPATIBLE: Record<Exclude<AssumptionLLMProvider, 'anthropic'>, { baseURL?: string; model: string }> = {
  openai: { model: 'gpt-4o' },
  deepseek: { baseURL: 'https://api.deepseek.com/v1', model: 'deepseek-chat' },
  perplexity: { baseURL: 'https://api.perplexity.ai', model: 'sonar' },
  grok: { baseURL: 'https://api.x.ai/v1', model: 'grok-3' },
};

async function completeWithProvider(userPrompt: string, llmProvider: AssumptionLLMProvider): Promise<string> {
  const config = loadConfig();

  if (llmProvider === 'anthropic') {
    const anthropic = new Anthropic({ apiKey: config.ANTHROPIC_API_KEY });
    const response = await anthropic.messages.create({
      model: 'claude-3-7-sonnet-20250219',
      max_tokens: 500,
      temperature: 0,
      system: ASSUMPTION_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: userPrompt }]
    });
    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }
    return content.text;
  }

  const apiKeys: Record<Exclude<AssumptionLLMProvider, 'anthropic'>, string | undefined> = {
    openai: config.OPENAI_API_KEY,
    deepseek: config.DEEPSEEK_API_KEY,
    perplexity: config.PERPLEXITY_API_KEY,
    grok: config.GROK_API_KEY,
  };
  const { baseURL, model } = OPENAI_COMPATIBLE[llmProvider];
  const client = new OpenAI({ baseURL, apiKey: apiKeys[llmProvider] });
  const response = await client.chat.completions.create({
    model,
    max_tokens: 500,
    temperature: 0,
    messages: [
      { role: 'system', content: ASSUMPTION_SYSTEM_PROMPT },
      { role: 'user', content: userPrompt }
    ]
  });
  return response.choices[0]?.message?.content || '';
}

/**
 * Asks an LLM to turn a request such as "10 years at 12% growth, beta 1.1"
 * into an AssumptionSet. Fields the model leaves out fall back to the defaults;
 * out-of-range values are rejected by the same schema the CLI flags go through.
 */
export async function parseAssumptionDescription(
  description: string,
  llmProvider: AssumptionLLMProvider = 'anthropic'
): Promise<AssumptionSet> {
  const userPrompt = `Extract DCF assumptions from this request:\n\n${description}`;
  const responseText = await completeWithProvider(userPrompt, llmProvider);
  const cleanedText = extractJsonObject(responseText);

  let raw: unknown;
  try {
    raw = JSON.parse(cleanedText);
  } catch (error) {
    console.error('[Assumptions] Failed to parse AI response:', responseText);
    throw new Error('Failed to parse valuation assumptions from description', { cause: error });
  }

  const assumptions = parseAssumptions(raw);
  console.log(`[Assumptions] ${llmProvider}: ${assumptions.forecastYears}y, g=${(assumptions.fcffGrowthRate*100).toFixed(1)}%, tg=${(assumptions.terminalGrowthRate*100).toFixed(1)}%, beta=${assumptions.beta.toFixed(2)}, Rm=${(assumptions.marketReturn*100).toFixed(1)}%`);
  return assumptions;
}
