import type { Company, Document, UsageLog } from "../drizzle/schema";
import { aggregateRecords, type MonthlyPoint } from "./emissionAggregator";
import type { AppStore, Report, UsageEventType } from "./emissionsStore";

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_UPLOAD_DAYS = 30;
const EMISSIONS_WINDOW_DAYS = 365;
const RECENT_EVENTS = 20;
const RECENT_ITEMS = 10;

export type CompanyProfile = Omit<Company, "passwordHash">;

export interface CompanyOverview {
  company: CompanyProfile;
  uploads30d: number;
  totalCo2e12m: number;
}

export interface CompanyDetail {
  company: CompanyProfile;
  timeseries: MonthlyPoint[];
  scopeBreakdown: { scope1: number; scope2: number; scope3: number };
  recentEvents: UsageLog[];
  recentDocuments: Document[];
  recentReports: Report[];
}

export interface ActivityFilter {
  eventType?: UsageEventType;
  companyId?: number;
  page: number;
  pageSize: number;
}

export interface ActivityPage {
  total: number;
  page: number;
  pageSize: number;
  pages: number;
  logs: Array<UsageLog & { companyName: string }>;
}

export interface CompanyDataStats {
  totalDocuments: number;
  totalRecords: number;
  totalCo2e: number;
  earliest: Date | null;
  latest: Date | null;
}

function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

function toProfile({ passwordHash: _passwordHash, ...profile }: Company): CompanyProfile {
  return profile;
}

/**
 * Every company with its upload count over the last 30 days and its
 * emissions over the last 12 months, newest company first.
 */
export async function listCompanyOverviews(
  store: AppStore,
  now: Date,
  filter: { sector?: string } = {}
): Promise<CompanyOverview[]> {
  const sector = filter.sector?.toLowerCase();
  const companies = (await store.listCompanies())
    .filter(company => !sector || (company.sector ?? "").toLowerCase().includes(sector));

  const uploadsSince = daysBefore(now, RECENT_UPLOAD_DAYS);
  const emissionsWindow = { start: daysBefore(now, EMISSIONS_WINDOW_DAYS) };

  return await Promise.all(
    companies.map(async company => {
      const [uploads, records] = await Promise.all([
        store.listUsageEvents({ companyId: company.id, eventType: "upload", since: uploadsSince, offset: 0, limit: 1 }),
        store.findRecords(company.id, emissionsWindow),
      ]);

      return {
        company: toProfile(company),
        uploads30d: uploads.total,
        totalCo2e12m: aggregateRecords(records, emissionsWindow).totalCo2e,
      };
    })
  );
}

export async function getCompanyDetail(store: AppStore, companyId: number, now: Date): Promise<CompanyDetail | undefined> {
  const company = await store.findCompany(companyId);
  if (!company) return undefined;

  const [records, events, documents, reports] = await Promise.all([
    store.findRecords(companyId, {}),
    store.listUsageEvents({ companyId, offset: 0, limit: RECENT_EVENTS }),
    store.listDocuments(companyId),
    store.findReports(companyId),
  ]);

  const allTime = aggregateRecords(records);
  const lastYear = aggregateRecords(records, { start: daysBefore(now, EMISSIONS_WINDOW_DAYS) });

  return {
    company: toProfile(company),
    timeseries: lastYear.monthlySeries,
    scopeBreakdown: {
      scope1: allTime.scope1Co2e,
      scope2: allTime.scope2Co2e,
      scope3: allTime.scope3Co2e,
    },
    recentEvents: events.items,
    recentDocuments: documents.slice(0, RECENT_ITEMS),
    recentReports: reports.slice(0, RECENT_ITEMS),
  };
}

/**
 * Paged usage log across companies, newest first. Events whose company no
 * longer exists are labelled "Unknown".
 */
export async function listActivity(store: AppStore, filter: ActivityFilter): Promise<ActivityPage> {
  const { page, pageSize } = filter;
  const [events, companies] = await Promise.all([
    store.listUsageEvents({
      companyId: filter.companyId,
      eventType: filter.eventType,
      offset: (page - 1) * pageSize,
      limit: pageSize,
    }),
    store.listCompanies(),
  ]);

  const names = new Map(companies.map(company => [company.id, company.name]));

  return {
    total: events.total,
    page,
    pageSize,
    pages: Math.ceil(events.total / pageSize),
    logs: events.items.map(log => ({
      ...log,
      companyName: (log.companyId !== null ? names.get(log.companyId) : undefined) ?? "Unknown",
    })),
  };
}

/**
 * Document and record counts, total emissions and the span of record dates
 */
export async function getCompanyDataStats(store: AppStore, companyId: number): Promise<CompanyDataStats> {
  const [documents, records] = await Promise.all([
    store.listDocuments(companyId),
    store.findRecords(companyId, {}),
  ]);

  let earliest: Date | null = null;
  let latest: Date | null = null;
  for (const { date } of records) {
    if (!date) continue;
    if (!earliest || date.getTime() < earliest.getTime()) earliest = date;
    if (!latest || date.getTime() > latest.getTime()) latest = date;
  }

  return {
    totalDocuments: documents.length,
    totalRecords: records.length,
    totalCo2e: aggregateRecords(records).totalCo2e,
    earliest,
    latest,
  };
}
