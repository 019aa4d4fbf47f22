/**
 * Command line valuation of a single ticker.
 * Run with: npx tsx server/run-dcf.ts --ticker MSFT --years 10 --growth 14 --terminal 5
 *
 * Rates are given in percent, the way the assumption sliders read.
 */

import { parseArgs } from 'node:util';
import {
  ASSUMPTION_DEFAULTS,
  parseAssumptionDescription,
  parseAssumptions,
  TickerSchema,
  type AssumptionLLMProvider,
  type AssumptionSet,
} from './services/assumptionService';
import { runAndRender } from './services/dcfPipeline';
import { ConsoleRenderer, ExcelFileRenderer, type ValuationRenderer } from './services/dcfReportService';
import { FredRateProvider, YahooFinanceProvider } from './services/marketDataService';

const LLM_PROVIDERS: AssumptionLLMProvider[] = ['openai', 'anthropic', 'deepseek', 'perplexity', 'grok'];

function isLLMProvider(value: string): value is AssumptionLLMProvider {
  return LLM_PROVIDERS.some(candidate => candidate === value);
}

function percentFlag(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value) / 100;
}

function numberFlag(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

async function resolveAssumptions(values: Record<string, string | undefined>): Promise<AssumptionSet> {
  if (values.describe) {
    const provider = values.provider ?? 'anthropic';
    if (!isLLMProvider(provider)) {
      throw new Error(`Unknown LLM provider: ${provider}`);
    }
    return parseAssumptionDescription(values.describe, provider);
  }

  return parseAssumptions({
    forecastYears: numberFlag(values.years, ASSUMPTION_DEFAULTS.forecastYears),
    fcffGrowthRate: percentFlag(values.growth, ASSUMPTION_DEFAULTS.fcffGrowthRate),
    terminalGrowthRate: percentFlag(values.terminal, ASSUMPTION_DEFAULTS.terminalGrowthRate),
    beta: numberFlag(values.beta, ASSUMPTION_DEFAULTS.beta),
    marketReturn: percentFlag(values['market-return'], ASSUMPTION_DEFAULTS.marketReturn),
  });
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      ticker: { type: 'string', default: 'MSFT' },
      years: { type: 'string' },
      growth: { type: 'string' },
      terminal: { type: 'string' },
      beta: { type: 'string' },
      'market-return': { type: 'string' },
      describe: { type: 'string' },
      provider: { type: 'string' },
      excel: { type: 'string' },
    },
  });

  const ticker = TickerSchema.safeParse(values.ticker);
  if (!ticker.success) {
    console.error(`⚠️ ${ticker.error.issues[0]?.message ?? 'Invalid ticker symbol'}`);
    return 1;
  }

  let assumptions: AssumptionSet;
  try {
    assumptions = await resolveAssumptions(values);
  } catch (error) {
    console.error(`⚠️ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  // The workbook is written first so a bad path fails before any report is printed.
  const renderers: ValuationRenderer[] = [];
  if (values.excel) {
    renderers.push(new ExcelFileRenderer(values.excel));
  }
  renderers.push(new ConsoleRenderer());

  const outcome = await runAndRender(
    { ticker: ticker.data, assumptions },
    { marketData: new YahooFinanceProvider(), rates: new FredRateProvider() },
    renderers
  );
  return outcome.ok ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    // Anything reaching here is unexpected; show a notice, never a stack.
    console.error(`⚠️ Valuation failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
