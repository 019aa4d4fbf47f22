import { DataInsufficientError, InvalidRateRelationError } from './valuationErrors';

// All monetary amounts in this module are in billions; share counts are raw.
export const MONETARY_UNIT = 1e9;
export const TAX_RATE = 0.21;
export const FALLBACK_COST_OF_DEBT = 0.02;
export const BASE_FCFF_WINDOW = 3;
export const NOT_APPLICABLE = 'N/A' as const;

export interface CashFlowPeriod {
  periodEnd: Date;
  operatingCashFlow: number | null | undefined;
  capitalExpenditure: number | null | undefined;
}

export interface FcffPeriod {
  fiscalYear: number;
  periodEnd: Date;
  cashFromOperations: number;
  capitalExpenditure: number;
  freeCashFlowToFirm: number;
}

export interface FinancialHistory {
  periods: FcffPeriod[];
  baseFcff: number;
  lastHistoricalYear: number;
}

export interface ProjectedFcff {
  year: number;
  projectedFcff: number;
}

export interface CapitalStructureSnapshot {
  marketCap: number;
  totalDebt: number;
  totalCash: number;
  netDebt: number;
  sharesOutstanding: number;
  interestExpense: number;
}

export interface DiscountRateParameters {
  riskFreeRate: number;
  beta: number;
  marketReturn: number;
  marketCap: number;
  totalDebt: number;
  totalCash: number;
  interestExpense: number;
}

export interface DiscountRateInputs {
  riskFreeRate: number;
  costOfDebt: number;
  costOfEquity: number;
  equityWeight: number;
  debtWeight: number;
  taxRate: number;
  wacc: number;
}

export interface ValuationInput {
  projections: ProjectedFcff[];
  discountRate: number;
  terminalGrowthRate: number;
  netDebt: number;
  sharesOutstanding: number;
}

export interface ValuationResult {
  discountedFcffs: number[];
  terminalValue: number;
  terminalValueDiscounted: number;
  enterpriseValue: number;
  equityValue: number;
  fairValuePerShare: number;
}

export type SensitivityCell = number | typeof NOT_APPLICABLE;

export interface SensitivityGrid {
  discountRates: number[];
  terminalGrowthRates: number[];
  rowLabels: string[];
  columnLabels: string[];
  cells: SensitivityCell[][];
}

export interface FcffSeriesPoint {
  year: number;
  fcff: number;
  kind: 'historical' | 'projected';
}

function isPresent(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function buildFcffHistory(rawPeriods: CashFlowPeriod[]): FinancialHistory {
  const periods: FcffPeriod[] = [...rawPeriods]
    .sort((a, b) => a.periodEnd.getTime() - b.periodEnd.getTime())
    .flatMap(period => {
      const { operatingCashFlow, capitalExpenditure } = period;
      if (!isPresent(operatingCashFlow) || !isPresent(capitalExpenditure)) {
        return [];
      }
      return [{
        fiscalYear: period.periodEnd.getUTCFullYear(),
        periodEnd: period.periodEnd,
        cashFromOperations: operatingCashFlow,
        capitalExpenditure,
        // capex is reported as a negative outflow
        freeCashFlowToFirm: operatingCashFlow + capitalExpenditure,
      }];
    });

  if (periods.length === 0) {
    throw new DataInsufficientError('No fiscal period reports both operating cash flow and capital expenditure');
  }

  const window = periods.slice(-BASE_FCFF_WINDOW);
  const baseFcff = window.reduce((sum, period) => sum + period.freeCashFlowToFirm, 0) / window.length;
  const lastHistoricalYear = periods[periods.length - 1].fiscalYear;

  console.log(`[DCF] ${periods.length} valid FCFF periods, base FCFF=${baseFcff.toFixed(2)}B (mean of last ${window.length})`);

  return { periods, baseFcff, lastHistoricalYear };
}

export function projectFcff(
  baseFcff: number,
  growthRate: number,
  forecastYears: number,
  lastHistoricalYear: number
): ProjectedFcff[] {
  const projections: ProjectedFcff[] = [];
  for (let i = 1; i <= forecastYears; i++) {
    // anchored to the base: base * (1+g)^i, not prior year * (1+g)
    projections.push({
      year: lastHistoricalYear + i,
      projectedFcff: baseFcff * Math.pow(1 + growthRate, i),
    });
  }
  return projections;
}

export function calculateDiscountRate(params: DiscountRateParameters): DiscountRateInputs {
  const { riskFreeRate, beta, marketReturn, marketCap, totalDebt, totalCash, interestExpense } = params;

  const costOfEquity = riskFreeRate + beta * (marketReturn - riskFreeRate);
  const costOfDebt = totalDebt > 0 ? interestExpense / totalDebt : FALLBACK_COST_OF_DEBT;

  // Net cash gives a negative debt weight; it is kept and pulls WACC down.
  const netDebt = totalDebt - totalCash;
  const totalCapital = marketCap + netDebt;
  const equityWeight = totalCapital !== 0 ? marketCap / totalCapital : 1;
  const debtWeight = totalCapital !== 0 ? netDebt / totalCapital : 0;

  const wacc = equityWeight * costOfEquity + debtWeight * costOfDebt * (1 - TAX_RATE);

  console.log(`[DCF] Ke=${(costOfEquity*100).toFixed(2)}%, Kd=${(costOfDebt*100).toFixed(2)}%, E/V=${(equityWeight*100).toFixed(1)}%, D/V=${(debtWeight*100).toFixed(1)}%, WACC=${(wacc*100).toFixed(2)}%`);

  return { riskFreeRate, costOfDebt, costOfEquity, equityWeight, debtWeight, taxRate: TAX_RATE, wacc };
}

function valueAtRates(input: ValuationInput): ValuationResult {
  const { projections, discountRate, terminalGrowthRate, netDebt, sharesOutstanding } = input;
  const forecastYears = projections.length;

  const discountedFcffs = projections.map(
    (projection, index) => projection.projectedFcff / Math.pow(1 + discountRate, index + 1)
  );

  // Gordon growth on the final projected year
  const finalFcff = projections[forecastYears - 1].projectedFcff;
  const terminalValue = finalFcff * (1 + terminalGrowthRate) / (discountRate - terminalGrowthRate);
  const terminalValueDiscounted = terminalValue / Math.pow(1 + discountRate, forecastYears);

  const enterpriseValue = discountedFcffs.reduce((sum, value) => sum + value, 0) + terminalValueDiscounted;
  const equityValue = enterpriseValue - netDebt;
  const fairValuePerShare = equityValue * MONETARY_UNIT / sharesOutstanding;

  return { discountedFcffs, terminalValue, terminalValueDiscounted, enterpriseValue, equityValue, fairValuePerShare };
}

function assertValuable(input: ValuationInput): void {
  if (!(input.sharesOutstanding > 0)) {
    throw new DataInsufficientError('Shares outstanding is missing or not positive');
  }
  if (input.projections.length === 0) {
    throw new DataInsufficientError('No projected cash flows to discount');
  }
}

export function calculateValuation(input: ValuationInput): ValuationResult {
  assertValuable(input);
  if (input.discountRate <= input.terminalGrowthRate) {
    throw new InvalidRateRelationError(input.discountRate, input.terminalGrowthRate);
  }

  const result = valueAtRates(input);
  console.log(`[DCF] EV=${result.enterpriseValue.toFixed(2)}B, Equity=${result.equityValue.toFixed(2)}B, Fair value/share=${result.fairValuePerShare.toFixed(2)}`);
  return result;
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function formatRateLabel(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

// Grid rates are compared in whole basis points; `wacc + offset` carries float drift.
export function toBasisPoints(rate: number): number {
  return Math.round(rate * 1e4);
}

export function sensitivityDiscountRates(wacc: number): number[] {
  return [-0.01, -0.005, 0, 0.005, 0.01].map(offset => wacc + offset);
}

export const SENSITIVITY_TERMINAL_GROWTH_RATES = [0.035, 0.04, 0.045, 0.05, 0.055];

export function buildSensitivityGrid(
  base: Omit<ValuationInput, 'discountRate' | 'terminalGrowthRate'>,
  discountRates: number[],
  terminalGrowthRates: number[] = SENSITIVITY_TERMINAL_GROWTH_RATES
): SensitivityGrid {
  assertValuable({ ...base, discountRate: 0, terminalGrowthRate: 0 });

  const cells: SensitivityCell[][] = discountRates.map(discountRate =>
    terminalGrowthRates.map(terminalGrowthRate => {
      if (toBasisPoints(discountRate) <= toBasisPoints(terminalGrowthRate)) {
        return NOT_APPLICABLE;
      }
      const { fairValuePerShare } = valueAtRates({ ...base, discountRate, terminalGrowthRate });
      return roundTo(fairValuePerShare, 2);
    })
  );

  return {
    discountRates,
    terminalGrowthRates,
    rowLabels: discountRates.map(formatRateLabel),
    columnLabels: terminalGrowthRates.map(formatRateLabel),
    cells,
  };
}

export function buildFcffSeries(history: FinancialHistory, projections: ProjectedFcff[]): FcffSeriesPoint[] {
  const historical = history.periods
    .slice(-BASE_FCFF_WINDOW)
    .map((period): FcffSeriesPoint => ({ year: period.fiscalYear, fcff: period.freeCashFlowToFirm, kind: 'historical' }));
  const projected = projections
    .map((projection): FcffSeriesPoint => ({ year: projection.year, fcff: projection.projectedFcff, kind: 'projected' }));
  return [...historical, ...projected];
}
