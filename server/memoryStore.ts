import type { Company, Document, UsageLog, WaitlistSubmission } from "../drizzle/schema";
import { isWithinRange } from "./emissionAggregator";
import type { EmissionFactor } from "./emissionFactorTable";
import type { AppStore, EmissionRecord, NewReport, Report } from "./emissionsStore";

export interface MemoryStoreSeed {
  factors?: EmissionFactor[];
  records?: EmissionRecord[];
  companies?: Company[];
  waitlist?: WaitlistSubmission[];
  documents?: Document[];
}

export interface MemoryStore extends AppStore {
  readonly state: {
    records: EmissionRecord[];
    reports: Report[];
    factors: EmissionFactor[];
    documents: Document[];
    companies: Company[];
    waitlist: WaitlistSubmission[];
    usageLogs: UsageLog[];
  };
}

/**
 * In-process implementation of the store ports, used by tests in place of MySQL.
 * `now` is injectable so report ordering by createdAt is predictable.
 */
export function createMemoryStore(seed: MemoryStoreSeed = {}, now: () => Date = () => new Date()): MemoryStore {
  const state: MemoryStore["state"] = {
    records: [...(seed.records ?? [])],
    reports: [],
    factors: [...(seed.factors ?? [])],
    documents: [...(seed.documents ?? [])],
    companies: [...(seed.companies ?? [])],
    waitlist: [...(seed.waitlist ?? [])],
    usageLogs: [],
  };

  const nextId = (rows: ReadonlyArray<{ id: number }>) => rows.reduce((max, row) => Math.max(max, row.id), 0) + 1;
  const newestFirst = (a: { createdAt: Date; id: number }, b: { createdAt: Date; id: number }) =>
    b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;

  const insertReport = (report: NewReport): Report => {
    const saved: Report = {
      ...report,
      breakdown: report.breakdown.map(entry => ({ ...entry })),
      monthlyData: report.monthlyData.map(point => ({ ...point })),
      id: nextId(state.reports),
      createdAt: now(),
    };
    state.reports.push(saved);
    return saved;
  };

  return {
    state,

    async findRecords(companyId, range) {
      return state.records.filter(r => r.companyId === companyId && isWithinRange(r.date, range));
    },

    async listRecords(companyId, offset, limit) {
      const owned = state.records
        .filter(r => r.companyId === companyId)
        .sort((a, b) => (b.date?.getTime() ?? -Infinity) - (a.date?.getTime() ?? -Infinity) || b.id - a.id);
      return { total: owned.length, items: owned.slice(offset, offset + limit) };
    },

    async saveRecord(record) {
      const saved: EmissionRecord = { ...record, id: nextId(state.records), createdAt: now() };
      state.records.push(saved);
      return saved;
    },

    async saveReport(report) {
      return insertReport(report);
    },

    async saveReportIfAbsent(report) {
      const [existing] = state.reports
        .filter(r => r.companyId === report.companyId && r.year === report.year)
        .sort(newestFirst);
      if (existing) return { created: false, existing };
      return { created: true, report: insertReport(report) };
    },

    async findReports(companyId, year) {
      return state.reports
        .filter(r => r.companyId === companyId && (year === undefined || r.year === year))
        .sort(newestFirst);
    },

    async findReport(companyId, reportId) {
      return state.reports.find(r => r.companyId === companyId && r.id === reportId);
    },

    async loadEmissionFactors() {
      return [...state.factors];
    },

    async countEmissionFactors() {
      return state.factors.length;
    },

    async insertEmissionFactors(factors) {
      state.factors.push(...factors);
    },

    async createDocument(document) {
      const saved: Document = {
        status: "uploaded",
        errorMessage: null,
        processedAt: null,
        uploadedAt: now(),
        ...document,
        id: nextId(state.documents),
      };
      state.documents.push(saved);
      return saved;
    },

    async findDocument(companyId, documentId) {
      return state.documents.find(d => d.companyId === companyId && d.id === documentId);
    },

    async listDocuments(companyId) {
      return state.documents
        .filter(d => d.companyId === companyId)
        .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime() || b.id - a.id);
    },

    async deleteDocument(companyId, documentId) {
      const owned = state.documents.some(d => d.companyId === companyId && d.id === documentId);
      if (!owned) return false;
      state.documents = state.documents.filter(d => d.id !== documentId);
      state.records = state.records.filter(r => r.documentId !== documentId);
      return true;
    },

    async updateDocumentStatus(documentId, status, errorMessage = null) {
      const index = state.documents.findIndex(d => d.id === documentId);
      if (index === -1) return;
      state.documents[index] = {
        ...state.documents[index],
        status,
        errorMessage,
        processedAt: status === "completed" || status === "failed" ? now() : state.documents[index].processedAt,
      };
    },

    async logUsageEvent(event) {
      state.usageLogs.push({
        id: nextId(state.usageLogs),
        companyId: event.companyId ?? null,
        eventType: event.eventType,
        details: event.details,
        createdAt: now(),
      });
    },

    async listUsageEvents({ companyId, eventType, since, offset, limit }) {
      const matching = state.usageLogs
        .filter(log => companyId === undefined || log.companyId === companyId)
        .filter(log => !eventType || log.eventType === eventType)
        .filter(log => !since || log.createdAt.getTime() >= since.getTime())
        .sort(newestFirst);
      return { total: matching.length, items: matching.slice(offset, offset + limit) };
    },

    async listSubmissions({ role, search, offset, limit }) {
      const term = search?.toLowerCase();
      const matching = state.waitlist
        .filter(s => !role || s.role === role)
        .filter(s => !term || [s.name, s.company, s.email].some(value => value.toLowerCase().includes(term)))
        .sort(newestFirst);
      return { total: matching.length, items: matching.slice(offset, offset + limit) };
    },

    async findSubmission(submissionId) {
      return state.waitlist.find(s => s.id === submissionId);
    },

    async deleteSubmission(submissionId) {
      const before = state.waitlist.length;
      state.waitlist = state.waitlist.filter(s => s.id !== submissionId);
      return state.waitlist.length < before;
    },

    async listCompanies() {
      return [...state.companies].sort(newestFirst);
    },

    async findCompany(companyId) {
      return state.companies.find(c => c.id === companyId);
    },

    async findCompanyByEmail(email) {
      return state.companies.find(c => c.email === email);
    },

    async promoteSubmission(submissionId, company) {
      const created: Company = {
        email: null,
        passwordHash: null,
        sector: null,
        country: "ES",
        size: null,
        role: "company",
        ...company,
        id: nextId(state.companies),
        createdAt: now(),
        updatedAt: now(),
      };
      state.companies.push(created);

      const index = state.waitlist.findIndex(s => s.id === submissionId);
      if (index !== -1) {
        state.waitlist[index] = { ...state.waitlist[index], promotedCompanyId: created.id, promotedAt: now() };
      }
      return created;
    },
  };
}
