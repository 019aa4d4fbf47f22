import ExcelJS from 'exceljs';
import { NOT_APPLICABLE, type FcffSeriesPoint, type SensitivityGrid } from './dcfModelService';
import type { ValuationReport } from './dcfPipeline';
import type { ValuationError } from './valuationErrors';

export interface ValuationRenderer {
  render(report: ValuationReport): Promise<void>;
}

const LABEL_WIDTH = 28;
const TABLE_CELL_WIDTH = 10;
const CHART_WIDTH = 40;

const money = (value: number) => `$${value.toFixed(2)}`;
const percent = (value: number) => `${(value * 100).toFixed(2)}%`;
const metricLine = (label: string, value: string) => `  ${label.padEnd(LABEL_WIDTH)}${value}`;

export function formatFcffChart(series: FcffSeriesPoint[]): string[] {
  const maxMagnitude = Math.max(...series.map(point => Math.abs(point.fcff)), 0);
  return series.map(point => {
    const length = maxMagnitude > 0 ? Math.round(Math.abs(point.fcff) / maxMagnitude * CHART_WIDTH) : 0;
    const bar = (point.kind === 'historical' ? '█' : '▒').repeat(length);
    const sign = point.fcff < 0 ? '-' : '';
    return `  ${point.year}  ${sign}${bar} ${point.fcff.toFixed(2)}`;
  });
}

export function formatSensitivityTable(grid: SensitivityGrid): string[] {
  const header = 'WACC \\ g'.padEnd(TABLE_CELL_WIDTH) + grid.columnLabels.map(label => label.padStart(TABLE_CELL_WIDTH)).join('');
  const rows = grid.cells.map((row, rowIndex) =>
    grid.rowLabels[rowIndex].padEnd(TABLE_CELL_WIDTH)
      + row.map(cell => (cell === NOT_APPLICABLE ? cell : cell.toFixed(2)).padStart(TABLE_CELL_WIDTH)).join('')
  );
  return [`  ${header}`, ...rows.map(row => `  ${row}`)];
}

export function formatValuationReport(report: ValuationReport): string {
  const { ticker, assumptions, capitalStructure, discountRate, valuation } = report;
  const rule = '-'.repeat(60);

  const netDebtLine = capitalStructure.netDebt >= 0
    ? metricLine('Net Debt (B)', money(capitalStructure.netDebt))
    : metricLine('Net Debt', 'Excess Cash');

  return [
    `${ticker} DCF Valuation Model`,
    rule,
    'Key Financial Inputs',
    metricLine('Market Cap (B)', money(capitalStructure.marketCap)),
    metricLine('Total Debt (B)', money(capitalStructure.totalDebt)),
    metricLine('Total Cash (B)', money(capitalStructure.totalCash)),
    netDebtLine,
    metricLine('Interest Expense (B)', money(capitalStructure.interestExpense)),
    metricLine('Beta', assumptions.beta.toFixed(2)),
    metricLine('Risk-Free Rate', percent(discountRate.riskFreeRate)),
    metricLine('Market Return', percent(assumptions.marketReturn)),
    metricLine('Cost of Debt', percent(discountRate.costOfDebt)),
    metricLine('Cost of Equity', percent(discountRate.costOfEquity)),
    metricLine('WACC', percent(discountRate.wacc)),
    rule,
    'Valuation Results',
    metricLine('Forecast Period', `${assumptions.forecastYears} years`),
    metricLine('FCFF Growth Rate', percent(assumptions.fcffGrowthRate)),
    metricLine('Terminal Growth Rate', percent(assumptions.terminalGrowthRate)),
    metricLine('Enterprise Value (B)', money(valuation.enterpriseValue)),
    metricLine('Equity Value (B)', money(valuation.equityValue)),
    metricLine('Fair Value per Share', money(valuation.fairValuePerShare)),
    rule,
    'Historical & Projected FCFF (B)',
    ...formatFcffChart(report.fcffSeries),
    rule,
    'Sensitivity Analysis (fair value per share)',
    ...formatSensitivityTable(report.sensitivity),
  ].join('\n');
}

export function formatErrorNotice(ticker: string, error: ValuationError): string {
  return `⚠️ Error fetching data for ${ticker}: ${error.message}. Please enter another ticker.`;
}

export class ConsoleRenderer implements ValuationRenderer {
  constructor(private readonly write: (text: string) => void = text => console.log(text)) {}

  async render(report: ValuationReport): Promise<void> {
    this.write(formatValuationReport(report));
  }
}

const CURRENCY_FORMAT = '"$"#,##0.00';
const PERCENT_FORMAT = '0.00%';
const SHARES_FORMAT = '#,##0';

type SummaryRow = [label: string, value: number, numFmt: string];

function writeSection(sheet: ExcelJS.Worksheet, startRow: number, title: string, rows: SummaryRow[]): number {
  sheet.getCell(`A${startRow}`).value = title;
  sheet.getCell(`A${startRow}`).font = { bold: true, size: 14 };
  rows.forEach(([label, value, numFmt], index) => {
    const row = startRow + 1 + index;
    sheet.getCell(`A${row}`).value = `${label}:`;
    sheet.getCell(`B${row}`).value = value;
    sheet.getCell(`B${row}`).numFmt = numFmt;
  });
  return startRow + rows.length + 2;
}

export function buildValuationWorkbook(report: ValuationReport): ExcelJS.Workbook {
  const { ticker, assumptions, capitalStructure, discountRate, history, projections, valuation, sensitivity } = report;

  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'DCF Valuation';
  workbook.created = report.asOf;

  // ============ SUMMARY ============
  const summarySheet = workbook.addWorksheet('Summary');
  summarySheet.columns = [
    { header: '', key: 'label', width: 35 },
    { header: '', key: 'value', width: 20 }
  ];

  summarySheet.getCell('A1').value = `${ticker} - DCF Valuation Model`;
  summarySheet.getCell('A1').font = { bold: true, size: 16 };
  summarySheet.getCell('A2').value = `Valuation Date: ${report.asOf.toISOString().slice(0, 10)}`;

  let nextRow = writeSection(summarySheet, 4, 'KEY FINANCIAL INPUTS', [
    ['Market Cap (B)', capitalStructure.marketCap, CURRENCY_FORMAT],
    ['Total Debt (B)', capitalStructure.totalDebt, CURRENCY_FORMAT],
    ['Total Cash (B)', capitalStructure.totalCash, CURRENCY_FORMAT],
    ['Net Debt (B)', capitalStructure.netDebt, CURRENCY_FORMAT],
    ['Interest Expense (B)', capitalStructure.interestExpense, CURRENCY_FORMAT],
    ['Shares Outstanding', capitalStructure.sharesOutstanding, SHARES_FORMAT],
  ]);

  nextRow = writeSection(summarySheet, nextRow, 'DISCOUNT RATE', [
    ['Beta', assumptions.beta, '0.00'],
    ['Risk-Free Rate', discountRate.riskFreeRate, PERCENT_FORMAT],
    ['Market Return', assumptions.marketReturn, PERCENT_FORMAT],
    ['Cost of Debt', discountRate.costOfDebt, PERCENT_FORMAT],
    ['Cost of Equity', discountRate.costOfEquity, PERCENT_FORMAT],
    ['Equity Weight', discountRate.equityWeight, PERCENT_FORMAT],
    ['Debt Weight', discountRate.debtWeight, PERCENT_FORMAT],
    ['Tax Rate', discountRate.taxRate, PERCENT_FORMAT],
    ['WACC', discountRate.wacc, PERCENT_FORMAT],
  ]);

  writeSection(summarySheet, nextRow, 'VALUATION RESULTS', [
    ['Forecast Period (Years)', assumptions.forecastYears, '0'],
    ['FCFF Growth Rate', assumptions.fcffGrowthRate, PERCENT_FORMAT],
    ['Terminal Growth Rate', assumptions.terminalGrowthRate, PERCENT_FORMAT],
    ['Base FCFF (B)', history.baseFcff, CURRENCY_FORMAT],
    ['PV of Projected FCFF (B)', valuation.discountedFcffs.reduce((sum, value) => sum + value, 0), CURRENCY_FORMAT],
    ['Terminal Value (B)', valuation.terminalValue, CURRENCY_FORMAT],
    ['PV of Terminal Value (B)', valuation.terminalValueDiscounted, CURRENCY_FORMAT],
    ['Enterprise Value (B)', valuation.enterpriseValue, CURRENCY_FORMAT],
    ['Equity Value (B)', valuation.equityValue, CURRENCY_FORMAT],
    ['Fair Value per Share', valuation.fairValuePerShare, CURRENCY_FORMAT],
  ]);

  // ============ FCFF ============
  const fcffSheet = workbook.addWorksheet('FCFF');
  fcffSheet.columns = [
    { header: 'Year', key: 'year', width: 10 },
    { header: 'Cash From Operations (B)', key: 'cfo', width: 26 },
    { header: 'Capex (B)', key: 'capex', width: 14 },
    { header: 'FCFF (B)', key: 'fcff', width: 14 },
    { header: 'Type', key: 'kind', width: 12 },
    { header: 'Discounted FCFF (B)', key: 'discounted', width: 22 }
  ];
  fcffSheet.getRow(1).font = { bold: true };

  for (const period of history.periods) {
    fcffSheet.addRow({
      year: period.fiscalYear,
      cfo: period.cashFromOperations,
      capex: period.capitalExpenditure,
      fcff: period.freeCashFlowToFirm,
      kind: 'Historical',
    });
  }
  projections.forEach((projection, index) => {
    fcffSheet.addRow({
      year: projection.year,
      fcff: projection.projectedFcff,
      kind: 'Projected',
      discounted: valuation.discountedFcffs[index],
    });
  });
  for (const key of ['cfo', 'capex', 'fcff', 'discounted']) {
    fcffSheet.getColumn(key).numFmt = CURRENCY_FORMAT;
  }

  // ============ SENSITIVITY ============
  const sensitivitySheet = workbook.addWorksheet('Sensitivity');
  sensitivitySheet.getCell('A1').value = 'WACC \\ Terminal Growth';
  sensitivitySheet.getCell('A1').font = { bold: true };
  sensitivitySheet.getColumn(1).width = 24;

  sensitivity.columnLabels.forEach((label, colIndex) => {
    const cell = sensitivitySheet.getCell(1, colIndex + 2);
    cell.value = label;
    cell.font = { bold: true };
    cell.alignment = { horizontal: 'center' };
    sensitivitySheet.getColumn(colIndex + 2).width = 12;
  });

  sensitivity.cells.forEach((row, rowIndex) => {
    const labelCell = sensitivitySheet.getCell(rowIndex + 2, 1);
    labelCell.value = sensitivity.rowLabels[rowIndex];
    labelCell.font = { bold: true };

    row.forEach((value, colIndex) => {
      const cell = sensitivitySheet.getCell(rowIndex + 2, colIndex + 2);
      cell.value = value;
      if (value === NOT_APPLICABLE) {
        cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFE0E0E0' } };
        cell.alignment = { horizontal: 'center' };
      } else {
        cell.numFmt = CURRENCY_FORMAT;
      }
    });
  });

  return workbook;
}

export async function generateValuationExcel(report: ValuationReport): Promise<Buffer> {
  const workbook = buildValuationWorkbook(report);
  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}

export class ExcelFileRenderer implements ValuationRenderer {
  constructor(private readonly outputPath: string) {}

  async render(report: ValuationReport): Promise<void> {
    await buildValuationWorkbook(report).xlsx.writeFile(this.outputPath);
    console.log(`[Excel] Wrote ${report.ticker} valuation to ${this.outputPath}`);
  }
}
