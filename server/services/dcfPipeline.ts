import { TickerSchema, type AssumptionSet } from './assumptionService';
import {
  buildFcffHistory,
  buildFcffSeries,
  buildSensitivityGrid,
  calculateDiscountRate,
  calculateValuation,
  projectFcff,
  sensitivityDiscountRates,
  type CapitalStructureSnapshot,
  type DiscountRateInputs,
  type FcffSeriesPoint,
  type FinancialHistory,
  type ProjectedFcff,
  type SensitivityGrid,
  type ValuationResult,
} from './dcfModelService';
import { formatErrorNotice, type ValuationRenderer } from './dcfReportService';
import type { CompanyProfile, FinancialStatements, MarketDataProvider, RateProvider } from './marketDataService';
import { toCapitalStructure, toCashFlowPeriods } from './marketDataService';
import { DataUnavailableError, fail, runFetchStage, runStage, type StageResult } from './valuationErrors';

export interface ValuationRequest {
  ticker: string;
  assumptions: AssumptionSet;
}

export interface PipelineDependencies {
  marketData: MarketDataProvider;
  rates: RateProvider;
  now?: () => Date;
}

export interface AcquiredData {
  statements: FinancialStatements;
  profile: CompanyProfile;
  riskFreeRate: number;
}

export interface ValuationReport {
  ticker: string;
  asOf: Date;
  assumptions: AssumptionSet;
  capitalStructure: CapitalStructureSnapshot;
  discountRate: DiscountRateInputs;
  history: FinancialHistory;
  projections: ProjectedFcff[];
  valuation: ValuationResult;
  fcffSeries: FcffSeriesPoint[];
  sensitivity: SensitivityGrid;
}

async function acquire(ticker: string, asOf: Date, deps: PipelineDependencies): Promise<StageResult<AcquiredData>> {
  // Fetches run one after another and all complete before any computation.
  const statements = await runFetchStage(() => deps.marketData.getFinancials(ticker));
  if (!statements.ok) return statements;

  const profile = await runFetchStage(() => deps.marketData.getProfile(ticker));
  if (!profile.ok) return profile;

  const riskFreeRate = await runFetchStage(() => deps.rates.getRiskFreeRate(asOf));
  if (!riskFreeRate.ok) return riskFreeRate;

  return {
    ok: true,
    value: { statements: statements.value, profile: profile.value, riskFreeRate: riskFreeRate.value },
  };
}

export function valueCompany(
  ticker: string,
  asOf: Date,
  assumptions: AssumptionSet,
  data: AcquiredData
): StageResult<ValuationReport> {
  return runStage(() => {
    const history = buildFcffHistory(toCashFlowPeriods(data.statements));
    const capitalStructure = toCapitalStructure(data.profile, data.statements);

    const projections = projectFcff(
      history.baseFcff,
      assumptions.fcffGrowthRate,
      assumptions.forecastYears,
      history.lastHistoricalYear
    );

    const discountRate = calculateDiscountRate({
      riskFreeRate: data.riskFreeRate,
      beta: assumptions.beta,
      marketReturn: assumptions.marketReturn,
      marketCap: capitalStructure.marketCap,
      totalDebt: capitalStructure.totalDebt,
      totalCash: capitalStructure.totalCash,
      interestExpense: capitalStructure.interestExpense,
    });

    const base = {
      projections,
      netDebt: capitalStructure.netDebt,
      sharesOutstanding: capitalStructure.sharesOutstanding,
    };
    const valuation = calculateValuation({
      ...base,
      discountRate: discountRate.wacc,
      terminalGrowthRate: assumptions.terminalGrowthRate,
    });
    const sensitivity = buildSensitivityGrid(base, sensitivityDiscountRates(discountRate.wacc));

    return {
      ticker,
      asOf,
      assumptions,
      capitalStructure,
      discountRate,
      history,
      projections,
      valuation,
      fcffSeries: buildFcffSeries(history, projections),
      sensitivity,
    };
  });
}

/**
 * One full pass: acquisition, then valuation. The first failing stage ends the
 * run and its error is returned; nothing downstream is computed.
 */
export async function runValuationPipeline(
  request: ValuationRequest,
  deps: PipelineDependencies
): Promise<StageResult<ValuationReport>> {
  const parsedTicker = TickerSchema.safeParse(request.ticker);
  if (!parsedTicker.success) {
    const message = parsedTicker.error.issues[0]?.message ?? 'Invalid ticker symbol';
    console.warn(`[DCF] Rejected ticker "${request.ticker}": ${message}`);
    return fail(new DataUnavailableError(message));
  }
  const ticker = parsedTicker.data;
  const asOf = (deps.now ?? (() => new Date()))();

  console.log(`[DCF] Valuing ${ticker} as of ${asOf.toISOString().slice(0, 10)}`);

  const acquired = await acquire(ticker, asOf, deps);
  if (!acquired.ok) {
    console.warn(`[DCF] ${ticker}: acquisition failed (${acquired.error.kind}): ${acquired.error.message}`);
    return acquired;
  }

  const outcome = valueCompany(ticker, asOf, request.assumptions, acquired.value);
  if (!outcome.ok) {
    console.warn(`[DCF] ${ticker}: valuation failed (${outcome.error.kind}): ${outcome.error.message}`);
  }
  return outcome;
}

/**
 * Runs the pipeline and hands a successful report to every renderer, in order.
 * A pipeline failure produces a single notice through `reportError` and no
 * renderer is called. A renderer that throws stops the remaining renderers and
 * the error propagates to the caller.
 */
export async function runAndRender(
  request: ValuationRequest,
  deps: PipelineDependencies,
  renderers: ValuationRenderer[],
  reportError: (notice: string) => void = notice => console.error(notice)
): Promise<StageResult<ValuationReport>> {
  const outcome = await runValuationPipeline(request, deps);
  if (!outcome.ok) {
    reportError(formatErrorNotice(request.ticker.trim().toUpperCase(), outcome.error));
    return outcome;
  }
  for (const renderer of renderers) {
    await renderer.render(outcome.value);
  }
  return outcome;
}
