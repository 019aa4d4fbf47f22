import { beforeEach, describe, expect, it, vi } from 'vitest';

const { anthropicCreate, openaiCreate, openaiOptions } = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  openaiCreate: vi.fn(),
  openaiOptions: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: anthropicCreate };
  },
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: openaiCreate } };

    constructor(options: unknown) {
      openaiOptions(options);
    }
  },
}));

import {
  ASSUMPTION_DEFAULTS,
  extractJsonObject,
  normalizeTicker,
  parseAssumptionDescription,
  parseAssumptions,
} from './assumptionService';

beforeEach(() => {
  anthropicCreate.mockReset();
  openaiCreate.mockReset();
  openaiOptions.mockReset();
});

describe('parseAssumptions', () => {
  it('fills unspecified fields with the slider defaults', () => {
    expect(parseAssumptions({ forecastYears: 7 })).toEqual({ ...ASSUMPTION_DEFAULTS, forecastYears: 7 });
    expect(parseAssumptions(undefined)).toEqual(ASSUMPTION_DEFAULTS);
  });

  it('rejects values outside the slider ranges', () => {
    expect(() => parseAssumptions({ forecastYears: 4 })).toThrow(/forecastYears/);
    expect(() => parseAssumptions({ fcffGrowthRate: 0.35 })).toThrow(/fcffGrowthRate/);
    expect(() => parseAssumptions({ terminalGrowthRate: 0.12 })).toThrow(/terminalGrowthRate/);
    expect(() => parseAssumptions({ beta: -0.1 })).toThrow(/beta/);
    expect(() => parseAssumptions({ forecastYears: 7.5 })).toThrow(/forecastYears/);
  });
});

describe('normalizeTicker', () => {
  it('trims and uppercases the symbol', () => {
    expect(normalizeTicker('  brk-b ')).toBe('BRK-B');
  });

  it('rejects an empty symbol', () => {
    expect(() => normalizeTicker('   ')).toThrow('Ticker symbol is required');
  });
});

describe('extractJsonObject', () => {
  it('unwraps fenced JSON', () => {
    expect(extractJsonObject('```json\n{"beta": 1.1}\n```')).toBe('{"beta": 1.1}');
  });

  it('cuts the object out of surrounding prose', () => {
    expect(extractJsonObject('Here you go: {"beta": 1.1} hope it helps')).toBe('{"beta": 1.1}');
  });
});

describe('parseAssumptionDescription', () => {
  it('reads assumptions from an Anthropic reply', async () => {
    anthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: '```json\n{"forecastYears": 8, "fcffGrowthRate": 0.12}\n```' }],
    });

    const assumptions = await parseAssumptionDescription('Eight years at 12% growth', 'anthropic');

    expect(assumptions).toEqual({ ...ASSUMPTION_DEFAULTS, forecastYears: 8, fcffGrowthRate: 0.12 });
    expect(anthropicCreate).toHaveBeenCalledTimes(1);
  });

  it('routes OpenAI-compatible providers to their endpoint', async () => {
    openaiCreate.mockResolvedValue({
      choices: [{ message: { content: 'Sure! {"beta": 1.3, "marketReturn": 0.1}' } }],
    });

    const assumptions = await parseAssumptionDescription('beta 1.3, market return 10%', 'grok');

    expect(assumptions).toEqual({ ...ASSUMPTION_DEFAULTS, beta: 1.3, marketReturn: 0.1 });
    expect(openaiOptions).toHaveBeenCalledWith(expect.objectContaining({ baseURL: 'https://api.x.ai/v1' }));
    expect(openaiCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'grok-3', temperature: 0 }));
  });

  it('fails on a reply that is not JSON', async () => {
    openaiCreate.mockResolvedValue({ choices: [{ message: { content: 'I cannot help with that.' } }] });

    await expect(parseAssumptionDescription('whatever', 'openai'))
      .rejects.toThrow('Failed to parse valuation assumptions from description');
  });

  it('applies the same range checks as manual input', async () => {
    anthropicCreate.mockResolvedValue({ content: [{ type: 'text', text: '{"forecastYears": 30}' }] });

    await expect(parseAssumptionDescription('thirty years')).rejects.toThrow(/forecastYears/);
  });
});
