import { z } from 'zod';

const ConfigSchema = z.object({
  YAHOO_FINANCE_BASE_URL: z.string().url().default('https://query2.finance.yahoo.com'),
  FRED_BASE_URL: z.string().url().default('https://fred.stlouisfed.org'),
  DCF_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DCF_RISK_FREE_START: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).default('2023-01-01'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  DEEPSEEK_API_KEY: z.string().optional(),
  PERPLEXITY_API_KEY: z.string().optional(),
  GROK_API_KEY: z.string().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}
