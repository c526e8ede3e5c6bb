import { err, ok, type Result } from "neverthrow";
import * as XLSX from "xlsx";
import { aggregateRecords, yearRange, type AggregationResult } from "./emissionAggregator";
import { noDataForPeriod, reportAlreadyExists, type BuildReportError } from "./emissionErrors";
import type { EmissionsStore, NewReport, Report } from "./emissionsStore";

export type ReportRegenerationPolicy = "version" | "reject";

export interface BuildReportOptions {
  policy: ReportRegenerationPolicy;
  methodology: string;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Turn an aggregation into the row that gets persisted. Breakdown and
 * monthly data are copied so later changes to the aggregation cannot leak in.
 */
export function createReportSnapshot(
  companyId: number,
  year: number,
  aggregation: AggregationResult,
  methodology: string
): NewReport {
  return {
    companyId,
    year,
    totalCo2e: aggregation.totalCo2e,
    scope1Co2e: aggregation.scope1Co2e,
    scope2Co2e: aggregation.scope2Co2e,
    scope3Co2e: aggregation.scope3Co2e,
    breakdown: aggregation.categoryBreakdown.map(entry => ({ ...entry })),
    monthlyData: aggregation.monthlySeries.map(point => ({ ...point })),
    coverage: aggregation.dataCoveragePct,
    dataSourcesCount: aggregation.recordCount,
    methodology,
  };
}

/**
 * Aggregate a company's records for one calendar year and store the result
 * as a new report snapshot.
 */
export async function buildReport(
  store: EmissionsStore,
  companyId: number,
  year: number,
  options: BuildReportOptions
): Promise<Result<Report, BuildReportError>> {
  const range = yearRange(year);
  const records = await store.findRecords(companyId, range);

  if (records.length === 0) {
    return err(noDataForPeriod(companyId, year));
  }

  const aggregation = aggregateRecords(records, range);
  const snapshot = createReportSnapshot(companyId, year, aggregation, options.methodology);

  let report: Report;
  if (options.policy === "reject") {
    const insertion = await store.saveReportIfAbsent(snapshot);
    if (!insertion.created) {
      return err(reportAlreadyExists(companyId, year, insertion.existing.id));
    }
    report = insertion.report;
  } else {
    report = await store.saveReport(snapshot);
  }

  console.log(`[Report] Generated report ${report.id} for company ${companyId} (${year}): ${aggregation.totalCo2e.toFixed(3)} kgCO2e`);

  return ok(deepFreeze(report));
}

/**
 * Reports are versioned snapshots; the newest by creation time wins.
 */
export function latestReport(reports: readonly Report[]): Report | undefined {
  return reports.reduce<Report | undefined>(
    (latest, report) => (!latest || report.createdAt.getTime() > latest.createdAt.getTime() ? report : latest),
    undefined
  );
}

/**
 * CSV export of a stored snapshot
 */
export function reportToCsv(report: Report): string {
  const rows: string[][] = [
    ["Section", "Key", "kgCO2e"],
    ["Total", "All scopes", report.totalCo2e.toFixed(3)],
    ["Scope", "Scope 1", report.scope1Co2e.toFixed(3)],
    ["Scope", "Scope 2", report.scope2Co2e.toFixed(3)],
    ["Scope", "Scope 3", report.scope3Co2e.toFixed(3)],
    ...report.breakdown.map(entry => ["Category", entry.category, entry.co2e.toFixed(3)]),
    ...report.monthlyData.map(point => ["Month", point.month, point.co2e.toFixed(3)]),
  ];

  return XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(rows));
}
