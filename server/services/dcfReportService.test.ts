import { describe, expect, it } from 'vitest';
import type { SensitivityGrid } from './dcfModelService';
import { valueCompany, type ValuationReport } from './dcfPipeline';
import {
  buildValuationWorkbook,
  ConsoleRenderer,
  formatErrorNotice,
  formatFcffChart,
  formatSensitivityTable,
  formatValuationReport,
  generateValuationExcel,
} from './dcfReportService';
import { sampleAcquiredData, sampleAssumptions, VALUATION_DATE } from './testFixtures';
import { DataUnavailableError, InvalidRateRelationError } from './valuationErrors';

function sampleReport(overrides: Partial<ReturnType<typeof sampleAcquiredData>> = {}): ValuationReport {
  const outcome = valueCompany('MSFT', VALUATION_DATE, sampleAssumptions, { ...sampleAcquiredData(), ...overrides });
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

const tinyGrid: SensitivityGrid = {
  discountRates: [0.05, 0.06],
  terminalGrowthRates: [0.05],
  rowLabels: ['5.0%', '6.0%'],
  columnLabels: ['5.0%'],
  cells: [['N/A'], [123.4]],
};

describe('formatValuationReport', () => {
  it('lists inputs, discount rate and results as labelled metrics', () => {
    const lines = formatValuationReport(sampleReport()).split('\n');

    expect(lines[0]).toBe('MSFT DCF Valuation Model');
    expect(lines).toContain('  Market Cap (B)              $300.00');
    expect(lines).toContain('  Net Debt (B)                $40.00');
    expect(lines).toContain('  WACC                        9.29%');
    expect(lines).toContain('  Forecast Period             5 years');
    expect(lines).toContain('  Fair Value per Share        $322.28');
  });

  it('shows excess cash instead of a negative net debt', () => {
    const report = sampleReport({ profile: { marketCap: 300e9, totalDebt: 60e9, totalCash: 80e9, sharesOutstanding: 5e9 } });
    const lines = formatValuationReport(report).split('\n');

    expect(lines).toContain('  Net Debt                    Excess Cash');
    expect(lines.some(line => line.startsWith('  Net Debt (B)'))).toBe(false);
  });
});

describe('formatFcffChart', () => {
  it('scales bars to the largest magnitude and marks projections', () => {
    const lines = formatFcffChart([
      { year: 2023, fcff: 50, kind: 'historical' },
      { year: 2024, fcff: -25, kind: 'historical' },
      { year: 2025, fcff: 100, kind: 'projected' },
    ]);

    expect(lines).toEqual([
      `  2023  ${'█'.repeat(20)} 50.00`,
      `  2024  -${'█'.repeat(10)} -25.00`,
      `  2025  ${'▒'.repeat(40)} 100.00`,
    ]);
  });
});

describe('formatSensitivityTable', () => {
  it('aligns labels and prints the sentinel for invalid cells', () => {
    expect(formatSensitivityTable(tinyGrid)).toEqual([
      '  WACC \\ g        5.0%',
      '  5.0%             N/A',
      '  6.0%          123.40',
    ]);
  });
});

describe('formatErrorNotice', () => {
  it('renders one line without stack detail', () => {
    expect(formatErrorNotice('ZZZZ', new DataUnavailableError('No financial statements found for ZZZZ')))
      .toBe('⚠️ Error fetching data for ZZZZ: No financial statements found for ZZZZ. Please enter another ticker.');
    expect(formatErrorNotice('MSFT', new InvalidRateRelationError(0.08, 0.08)))
      .toBe('⚠️ Error fetching data for MSFT: Discount rate 8.00% must exceed terminal growth rate 8.00%. Please enter another ticker.');
  });
});

describe('ConsoleRenderer', () => {
  it('writes the formatted report once', async () => {
    const written: string[] = [];
    const report = sampleReport();

    await new ConsoleRenderer(text => written.push(text)).render(report);

    expect(written).toEqual([formatValuationReport(report)]);
  });
});

describe('buildValuationWorkbook', () => {
  it('lays out summary, cash flow and sensitivity sheets', () => {
    const workbook = buildValuationWorkbook(sampleReport());

    const summary = workbook.getWorksheet('Summary');
    expect(summary?.getCell('A1').value).toBe('MSFT - DCF Valuation Model');
    expect(summary?.getCell('A2').value).toBe('Valuation Date: 2025-01-15');
    expect(summary?.getCell('A5').value).toBe('Market Cap (B):');
    expect(summary?.getCell('B5').value).toBe(300);
    expect(summary?.getCell('A21').value).toBe('WACC:');
    expect(summary?.getCell('B21').value).toBeCloseTo(0.0928823529, 8);
    expect(summary?.getCell('A33').value).toBe('Fair Value per Share:');
    expect(summary?.getCell('B33').value).toBeCloseTo(322.2807465685, 6);

    const fcff = workbook.getWorksheet('FCFF');
    expect(fcff?.getCell('A1').value).toBe('Year');
    expect(fcff?.getCell('A2').value).toBe(2021);
    expect(fcff?.getCell('D5').value).toBe(90);
    expect(fcff?.getCell('A6').value).toBe(2025);
    expect(fcff?.getCell('E6').value).toBe('Projected');

    const sensitivity = workbook.getWorksheet('Sensitivity');
    expect(sensitivity?.getCell('B1').value).toBe('3.5%');
    expect(sensitivity?.getCell('A2').value).toBe('8.3%');
    expect(sensitivity?.getCell('B2').value).toBeCloseTo(421.31, 2);
  });

  it('shades not-applicable sensitivity cells', () => {
    const workbook = buildValuationWorkbook({ ...sampleReport(), sensitivity: tinyGrid });
    const cell = workbook.getWorksheet('Sensitivity')?.getCell('B2');

    expect(cell?.value).toBe('N/A');
    expect(cell?.fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFE0E0E0' } });
  });
});

describe('generateValuationExcel', () => {
  it('serializes the workbook as an xlsx archive', async () => {
    const buffer = await generateValuationExcel(sampleReport());
    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});
