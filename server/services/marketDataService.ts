import Papa from 'papaparse';
import { z } from 'zod';
import { loadConfig, type AppConfig } from '../config';
import {
  MONETARY_UNIT,
  type CapitalStructureSnapshot,
  type CashFlowPeriod,
} from './dcfModelService';
import { DataInsufficientError, DataUnavailableError } from './valuationErrors';

// Line items are keyed by Yahoo's annual fundamentals names, without the "annual" prefix.
export const LINE_ITEMS = {
  operatingCashFlow: 'OperatingCashFlow',
  capitalExpenditure: 'CapitalExpenditure',
  interestExpense: 'InterestExpense',
  totalDebt: 'TotalDebt',
  totalCash: 'CashAndCashEquivalents',
  sharesOutstanding: 'OrdinarySharesNumber',
} as const;

const INCOME_STATEMENT_ITEMS = ['TotalRevenue', 'EBIT', 'NetIncome', LINE_ITEMS.interestExpense];
const BALANCE_SHEET_ITEMS = [LINE_ITEMS.totalDebt, LINE_ITEMS.totalCash, LINE_ITEMS.sharesOutstanding];
const CASH_FLOW_ITEMS = [LINE_ITEMS.operatingCashFlow, LINE_ITEMS.capitalExpenditure, 'FreeCashFlow'];

/** One fiscal period of a statement; values are raw currency units as reported. */
export interface StatementPeriod {
  periodEnd: Date;
  items: Record<string, number | null>;
}

export interface FinancialStatements {
  incomeStatement: StatementPeriod[];
  balanceSheet: StatementPeriod[];
  cashFlowStatement: StatementPeriod[];
}

/** Point-in-time snapshot in raw currency units; absent fields are left undefined. */
export interface CompanyProfile {
  marketCap?: number;
  totalDebt?: number;
  totalCash?: number;
  sharesOutstanding?: number;
}

export interface MarketDataProvider {
  getFinancials(ticker: string): Promise<FinancialStatements>;
  getProfile(ticker: string): Promise<CompanyProfile>;
}

export interface RateProvider {
  getRiskFreeRate(asOf: Date): Promise<number>;
}

function latestValue(periods: StatementPeriod[], item: string): number | undefined {
  const sorted = [...periods].sort((a, b) => b.periodEnd.getTime() - a.periodEnd.getTime());
  for (const period of sorted) {
    const value = period.items[item];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
  }
  return undefined;
}

export function toCashFlowPeriods(statements: FinancialStatements): CashFlowPeriod[] {
  if (statements.cashFlowStatement.length === 0) {
    throw new DataUnavailableError('Cash flow statement is empty');
  }
  const scale = (value: number | null | undefined) =>
    typeof value === 'number' ? value / MONETARY_UNIT : value;

  return statements.cashFlowStatement.map(period => ({
    periodEnd: period.periodEnd,
    operatingCashFlow: scale(period.items[LINE_ITEMS.operatingCashFlow]),
    capitalExpenditure: scale(period.items[LINE_ITEMS.capitalExpenditure]),
  }));
}

/**
 * Converts the provider snapshot to billions. Missing amounts default to 0,
 * shares outstanding is required. Interest expense is only needed when the
 * company carries debt, since it drives the cost of debt.
 */
export function toCapitalStructure(profile: CompanyProfile, statements: FinancialStatements): CapitalStructureSnapshot {
  const sharesOutstanding = profile.sharesOutstanding;
  if (sharesOutstanding === undefined || !(sharesOutstanding > 0)) {
    throw new DataInsufficientError('Shares outstanding is not reported');
  }

  const marketCap = (profile.marketCap ?? 0) / MONETARY_UNIT;
  const totalDebt = (profile.totalDebt ?? 0) / MONETARY_UNIT;
  const totalCash = (profile.totalCash ?? 0) / MONETARY_UNIT;

  let interestExpense = 0;
  if (totalDebt > 0) {
    const reported = latestValue(statements.incomeStatement, LINE_ITEMS.interestExpense);
    if (reported === undefined) {
      throw new DataInsufficientError('Interest expense is not reported although the company carries debt');
    }
    interestExpense = Math.abs(reported) / MONETARY_UNIT;
  }

  return {
    marketCap,
    totalDebt,
    totalCash,
    netDebt: totalDebt - totalCash,
    sharesOutstanding,
    interestExpense,
  };
}

async function fetchWithTimeout(url: string, timeoutMs: number): Promise<Response> {
  return fetch(url, {
    headers: { 'User-Agent': 'Mozilla/5.0 (dcf-valuation)', 'Accept': 'application/json, text/csv' },
    signal: AbortSignal.timeout(timeoutMs),
  });
}

const TimeseriesPointSchema = z
  .object({
    asOfDate: z.string(),
    reportedValue: z.object({ raw: z.number() }).optional(),
  })
  .nullable();

const TimeseriesEntrySchema = z
  .object({
    meta: z.object({ type: z.array(z.string()).min(1) }),
  })
  .passthrough();

const TimeseriesResponseSchema = z.object({
  timeseries: z.object({
    result: z.array(TimeseriesEntrySchema).nullable(),
  }),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(z.object({ meta: z.object({ regularMarketPrice: z.number().optional() }) }))
      .nullable(),
    error: z.object({ description: z.string() }).nullable().optional(),
  }),
});

const TIMESERIES_LOOKBACK_YEARS = 10;

export class YahooFinanceProvider implements MarketDataProvider {
  constructor(
    private readonly config: AppConfig = loadConfig(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async getFinancials(ticker: string): Promise<FinancialStatements> {
    const periods = await this.fetchAnnualSeries(ticker, [
      ...INCOME_STATEMENT_ITEMS,
      ...BALANCE_SHEET_ITEMS,
      ...CASH_FLOW_ITEMS,
    ]);

    const statements: FinancialStatements = {
      incomeStatement: selectItems(periods, INCOME_STATEMENT_ITEMS),
      balanceSheet: selectItems(periods, BALANCE_SHEET_ITEMS),
      cashFlowStatement: selectItems(periods, CASH_FLOW_ITEMS),
    };

    if (statements.cashFlowStatement.length === 0) {
      throw new DataUnavailableError(`No financial statements found for ${ticker}`);
    }

    console.log(`[MarketData] ${ticker}: ${statements.incomeStatement.length} income, ${statements.balanceSheet.length} balance, ${statements.cashFlowStatement.length} cash flow periods`);
    return statements;
  }

  async getProfile(ticker: string): Promise<CompanyProfile> {
    const balance = await this.fetchAnnualSeries(ticker, BALANCE_SHEET_ITEMS);
    const price = await this.fetchLastPrice(ticker);

    const sharesOutstanding = latestValue(balance, LINE_ITEMS.sharesOutstanding);
    const profile: CompanyProfile = {
      marketCap: sharesOutstanding !== undefined ? price * sharesOutstanding : undefined,
      totalDebt: latestValue(balance, LINE_ITEMS.totalDebt),
      totalCash: latestValue(balance, LINE_ITEMS.totalCash),
      sharesOutstanding,
    };

    console.log(`[MarketData] ${ticker}: price=${price.toFixed(2)}, shares=${sharesOutstanding ?? 'n/a'}`);
    return profile;
  }

  private async fetchAnnualSeries(ticker: string, items: string[]): Promise<StatementPeriod[]> {
    const period2 = Math.floor(this.now().getTime() / 1000);
    const period1 = period2 - TIMESERIES_LOOKBACK_YEARS * 365 * 24 * 3600;
    const types = items.map(item => `annual${item}`).join(',');
    const url = `${this.config.YAHOO_FINANCE_BASE_URL}/ws/fundamentals-timeseries/v1/finance/timeseries/${encodeURIComponent(ticker)}`
      + `?symbol=${encodeURIComponent(ticker)}&type=${types}&period1=${period1}&period2=${period2}`;

    const response = await fetchWithTimeout(url, this.config.DCF_FETCH_TIMEOUT_MS);
    if (!response.ok) {
      throw new DataUnavailableError(`Yahoo Finance fundamentals request for ${ticker} failed: ${response.status}`);
    }

    const parsed = TimeseriesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DataUnavailableError(`Malformed fundamentals response for ${ticker}`);
    }

    const byDate = new Map<string, StatementPeriod>();
    for (const entry of parsed.data.timeseries.result ?? []) {
      const type = entry.meta.type[0];
      const item = type.replace(/^annual/, '');
      const points = z.array(TimeseriesPointSchema).safeParse(entry[type]);
      if (!points.success) {
        continue;
      }
      for (const point of points.data) {
        if (!point) continue;
        const period = byDate.get(point.asOfDate) ?? { periodEnd: new Date(`${point.asOfDate}T00:00:00Z`), items: {} };
        period.items[item] = point.reportedValue?.raw ?? null;
        byDate.set(point.asOfDate, period);
      }
    }

    return [...byDate.values()].sort((a, b) => a.periodEnd.getTime() - b.periodEnd.getTime());
  }

  private async fetchLastPrice(ticker: string): Promise<number> {
    const url = `${this.config.YAHOO_FINANCE_BASE_URL}/v8/finance/chart/${encodeURIComponent(ticker)}?range=5d&interval=1d`;
    const response = await fetchWithTimeout(url, this.config.DCF_FETCH_TIMEOUT_MS);
    if (!response.ok) {
      throw new DataUnavailableError(`Ticker ${ticker} not found (quote request failed: ${response.status})`);
    }

    const parsed = ChartResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DataUnavailableError(`Malformed quote response for ${ticker}`);
    }
    const { result, error } = parsed.data.chart;
    const price = result?.[0]?.meta.regularMarketPrice;
    if (price === undefined) {
      throw new DataUnavailableError(error?.description ?? `No quote available for ${ticker}`);
    }
    return price;
  }
}

function selectItems(periods: StatementPeriod[], items: string[]): StatementPeriod[] {
  return periods.flatMap(period => {
    const selected: Record<string, number | null> = {};
    let found = false;
    for (const item of items) {
      if (item in period.items) {
        selected[item] = period.items[item];
        found = true;
      }
    }
    return found ? [{ periodEnd: period.periodEnd, items: selected }] : [];
  });
}

export const TREASURY_10Y_SERIES = 'DGS10';

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Reads a FRED graph CSV and returns the last published observation on or
 * before `asOf`, as a decimal. FRED marks holidays with "." instead of a value.
 */
export function parseTreasuryCsv(csv: string, asOf: Date, seriesId: string = TREASURY_10Y_SERIES): number {
  const parsed = Papa.parse<Record<string, string>>(csv.trim(), { header: true, skipEmptyLines: true });
  const cutoff = toIsoDate(asOf);

  const observations = parsed.data
    .map(row => ({
      date: row['observation_date'] ?? row['DATE'] ?? '',
      value: Number.parseFloat(row[seriesId] ?? ''),
    }))
    .filter(observation => observation.date !== '' && observation.date <= cutoff && Number.isFinite(observation.value));

  if (observations.length === 0) {
    throw new DataUnavailableError(`No ${seriesId} observations on or before ${cutoff}`);
  }
  return observations[observations.length - 1].value / 100;
}

export class FredRateProvider implements RateProvider {
  constructor(private readonly config: AppConfig = loadConfig()) {}

  async getRiskFreeRate(asOf: Date): Promise<number> {
    const url = `${this.config.FRED_BASE_URL}/graph/fredgraph.csv?id=${TREASURY_10Y_SERIES}`
      + `&cosd=${this.config.DCF_RISK_FREE_START}&coed=${toIsoDate(asOf)}`;

    const response = await fetchWithTimeout(url, this.config.DCF_FETCH_TIMEOUT_MS);
    if (!response.ok) {
      throw new DataUnavailableError(`FRED ${TREASURY_10Y_SERIES} request failed: ${response.status}`);
    }

    const rate = parseTreasuryCsv(await response.text(), asOf);
    console.log(`[Rates] ${TREASURY_10Y_SERIES} as of ${toIsoDate(asOf)}: ${(rate * 100).toFixed(2)}%`);
    return rate;
  }
}
