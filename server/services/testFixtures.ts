import type { AssumptionSet } from './assumptionService';
import type { AcquiredData } from './dcfPipeline';
import type { CompanyProfile, FinancialStatements, MarketDataProvider, RateProvider } from './marketDataService';

const date = (iso: string) => new Date(`${iso}T00:00:00Z`);

export const VALUATION_DATE = date('2025-01-15');

export const sampleAssumptions: AssumptionSet = {
  forecastYears: 5,
  fcffGrowthRate: 0.10,
  terminalGrowthRate: 0.03,
  beta: 1.2,
  marketReturn: 0.09,
};

// FCFF of 60, 60, 75, 90 (billions) for 2021-2024, plus one period without capex.
export function sampleStatements(): FinancialStatements {
  return {
    incomeStatement: [
      { periodEnd: date('2023-12-31'), items: { InterestExpense: -2.5e9 } },
      { periodEnd: date('2024-12-31'), items: { InterestExpense: -3e9 } },
    ],
    balanceSheet: [
      { periodEnd: date('2024-12-31'), items: { TotalDebt: 60e9, CashAndCashEquivalents: 20e9, OrdinarySharesNumber: 5e9 } },
    ],
    cashFlowStatement: [
      { periodEnd: date('2024-12-31'), items: { OperatingCashFlow: 110e9, CapitalExpenditure: -20e9 } },
      { periodEnd: date('2022-12-31'), items: { OperatingCashFlow: 90e9, CapitalExpenditure: -30e9 } },
      { periodEnd: date('2023-12-31'), items: { OperatingCashFlow: 100e9, CapitalExpenditure: -25e9 } },
      { periodEnd: date('2021-12-31'), items: { OperatingCashFlow: 80e9, CapitalExpenditure: -20e9 } },
      { periodEnd: date('2020-12-31'), items: { OperatingCashFlow: 70e9, CapitalExpenditure: null } },
    ],
  };
}

export function sampleProfile(): CompanyProfile {
  return { marketCap: 300e9, totalDebt: 60e9, totalCash: 20e9, sharesOutstanding: 5e9 };
}

export function sampleAcquiredData(): AcquiredData {
  return { statements: sampleStatements(), profile: sampleProfile(), riskFreeRate: 0.04 };
}

export class FakeMarketData implements MarketDataProvider {
  readonly requestedTickers: string[] = [];

  constructor(
    private readonly statements: FinancialStatements = sampleStatements(),
    private readonly profile: CompanyProfile = sampleProfile()
  ) {}

  async getFinancials(ticker: string): Promise<FinancialStatements> {
    this.requestedTickers.push(ticker);
    return this.statements;
  }

  async getProfile(ticker: string): Promise<CompanyProfile> {
    this.requestedTickers.push(ticker);
    return this.profile;
  }
}

export class FakeRates implements RateProvider {
  readonly requestedDates: Date[] = [];

  constructor(private readonly rate: number = 0.04) {}

  async getRiskFreeRate(asOf: Date): Promise<number> {
    this.requestedDates.push(asOf);
    return this.rate;
  }
}
