import type { DateRange, EmissionRecord, EmissionsStore } from "./emissionsStore";

export interface MonthlyPoint {
  month: string; // YYYY-MM
  co2e: number;
}

export interface CategoryTotal {
  category: string;
  co2e: number;
}

export interface SupplierTotal {
  supplier: string;
  co2e: number;
}

export interface AggregationResult {
  totalCo2e: number;
  scope1Co2e: number;
  scope2Co2e: number;
  scope3Co2e: number;
  dataCoveragePct: number;
  recordCount: number;
  monthlySeries: MonthlyPoint[];
  categoryBreakdown: CategoryTotal[];
}

export type AggregatableRecord = Pick<EmissionRecord, "category" | "scope" | "co2e" | "date">;

/**
 * Calendar month of a date in UTC, as YYYY-MM
 */
export function monthKey(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${date.getUTCFullYear()}-${month}`;
}

/**
 * UTC bounds of a calendar year, both ends inclusive
 */
export function yearRange(year: number): DateRange {
  return {
    start: new Date(Date.UTC(year, 0, 1)),
    end: new Date(Date.UTC(year, 11, 31, 23, 59, 59, 999)),
  };
}

export function isWithinRange(date: Date | null, range: DateRange): boolean {
  const { start, end } = range;
  if (!start && !end) return true;
  if (!date) return false;
  if (start && date.getTime() < start.getTime()) return false;
  if (end && date.getTime() > end.getTime()) return false;
  return true;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Fold records into scope, month and category totals.
 *
 * Only records with a co2e value contribute to sums. The monthly series is
 * sparse: a month appears only if at least one dated record in it has co2e.
 */
export function aggregateRecords(records: readonly AggregatableRecord[], range: DateRange = {}): AggregationResult {
  const inRange = records.filter(r => isWithinRange(r.date, range));

  let totalCo2e = 0;
  const scopeTotals = { 1: 0, 2: 0, 3: 0 };
  const byMonth = new Map<string, number>();
  const byCategory = new Map<string, number>();
  let resolvedCount = 0;

  for (const record of inRange) {
    if (record.co2e === null) continue;
    const co2e = record.co2e;
    resolvedCount++;
    totalCo2e += co2e;

    if (record.scope === 1 || record.scope === 2 || record.scope === 3) {
      scopeTotals[record.scope] += co2e;
    }

    if (record.date) {
      const key = monthKey(record.date);
      byMonth.set(key, (byMonth.get(key) ?? 0) + co2e);
    }

    byCategory.set(record.category, (byCategory.get(record.category) ?? 0) + co2e);
  }

  // YYYY-MM sorts chronologically as a string
  const monthlySeries = Array.from(byMonth.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, co2e]) => ({ month, co2e }));

  const categoryBreakdown = Array.from(byCategory.entries(), ([category, co2e]) => ({ category, co2e }));

  return {
    totalCo2e,
    scope1Co2e: scopeTotals[1],
    scope2Co2e: scopeTotals[2],
    scope3Co2e: scopeTotals[3],
    dataCoveragePct: inRange.length > 0 ? roundTo((resolvedCount / inRange.length) * 100, 2) : 0,
    recordCount: inRange.length,
    monthlySeries,
    categoryBreakdown,
  };
}

/**
 * Aggregate a company's stored records over a date range
 */
export async function aggregate(store: EmissionsStore, companyId: number, range: DateRange = {}): Promise<AggregationResult> {
  const records = await store.findRecords(companyId, range);
  return aggregateRecords(records, range);
}

/**
 * Largest emitters by supplier, descending. Records without a supplier or
 * without co2e are ignored.
 */
export function rankSuppliers(
  records: readonly Pick<EmissionRecord, "supplier" | "co2e">[],
  limit = 5
): SupplierTotal[] {
  const bySupplier = new Map<string, number>();
  for (const { supplier, co2e } of records) {
    if (!supplier || co2e === null) continue;
    bySupplier.set(supplier, (bySupplier.get(supplier) ?? 0) + co2e);
  }

  return Array.from(bySupplier.entries(), ([supplier, co2e]) => ({ supplier, co2e }))
    .sort((a, b) => b.co2e - a.co2e)
    .slice(0, limit);
}
