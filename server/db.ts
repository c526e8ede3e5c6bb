import { and, count, desc, eq, gte, like, lte, or, type SQL } from "drizzle-orm";
import { drizzle } from "drizzle-orm/mysql2";
import {
  companies,
  documents,
  emissionFactors,
  records,
  reports,
  usageLogs,
  waitlistSubmissions,
} from "../drizzle/schema";
import { ENV } from "./_core/env";
import type { AppStore, DateRange, ReportInsertion, UsageEventFilter } from "./emissionsStore";

let _db: ReturnType<typeof drizzle> | null = null;

export async function getDb() {
  if (!_db && ENV.databaseUrl) {
    try {
      _db = drizzle(ENV.databaseUrl);
    } catch (error) {
      console.warn("[Database] Failed to connect:", error);
      _db = null;
    }
  }
  return _db;
}

async function requireDb() {
  const db = await getDb();
  if (!db) throw new Error("Database not available");
  return db;
}

function rangeConditions(range: DateRange): SQL[] {
  const conditions: SQL[] = [];
  if (range.start) conditions.push(gte(records.date, range.start));
  if (range.end) conditions.push(lte(records.date, range.end));
  return conditions;
}

// ============================================================================
// Emission Records
// ============================================================================

export async function findRecords(companyId: number, range: DateRange) {
  const db = await requireDb();
  return await db
    .select()
    .from(records)
    .where(and(eq(records.companyId, companyId), ...rangeConditions(range)))
    .orderBy(records.id);
}

export async function listRecords(companyId: number, offset: number, limit: number) {
  const db = await requireDb();

  const [{ total }] = await db.select({ total: count() }).from(records).where(eq(records.companyId, companyId));
  const items = await db
    .select()
    .from(records)
    .where(eq(records.companyId, companyId))
    .orderBy(desc(records.date), desc(records.id))
    .limit(limit)
    .offset(offset);

  return { total, items };
}

export async function saveRecord(record: Omit<typeof records.$inferInsert, "id" | "createdAt">) {
  const db = await requireDb();

  const result = await db.insert(records).values(record);
  const [saved] = await db.select().from(records).where(eq(records.id, result[0].insertId)).limit(1);
  return saved;
}

// ============================================================================
// Reports
// ============================================================================

export async function saveReport(report: Omit<typeof reports.$inferInsert, "id" | "createdAt">) {
  const db = await requireDb();

  const result = await db.insert(reports).values(report);
  const [saved] = await db.select().from(reports).where(eq(reports.id, result[0].insertId)).limit(1);
  return saved;
}

/**
 * Locks the company's existing rows for the year (or the index gap) so a
 * concurrent insert for the same year waits for this transaction.
 */
export async function saveReportIfAbsent(
  report: Omit<typeof reports.$inferInsert, "id" | "createdAt">
): Promise<ReportInsertion> {
  const db = await requireDb();

  return await db.transaction(async (tx): Promise<ReportInsertion> => {
    const [existing] = await tx
      .select()
      .from(reports)
      .where(and(eq(reports.companyId, report.companyId), eq(reports.year, report.year)))
      .orderBy(desc(reports.createdAt), desc(reports.id))
      .limit(1)
      .for("update");
    if (existing) {
      return { created: false, existing };
    }

    const result = await tx.insert(reports).values(report);
    const [saved] = await tx.select().from(reports).where(eq(reports.id, result[0].insertId)).limit(1);
    return { created: true, report: saved };
  });
}

export async function findReports(companyId: number, year?: number) {
  const db = await requireDb();

  const conditions = [eq(reports.companyId, companyId)];
  if (year !== undefined) {
    conditions.push(eq(reports.year, year));
  }

  return await db
    .select()
    .from(reports)
    .where(and(...conditions))
    .orderBy(desc(reports.createdAt), desc(reports.id));
}

export async function findReport(companyId: number, reportId: number) {
  const db = await requireDb();

  const result = await db
    .select()
    .from(reports)
    .where(and(eq(reports.companyId, companyId), eq(reports.id, reportId)))
    .limit(1);
  return result.length > 0 ? result[0] : undefined;
}

// ============================================================================
// Emission Factors
// ============================================================================

export async function loadEmissionFactors() {
  const db = await requireDb();

  const rows = await db.select().from(emissionFactors);
  return rows.map(({ id: _id, ...factor }) => factor);
}

export async function countEmissionFactors() {
  const db = await requireDb();

  const [{ total }] = await db.select({ total: count() }).from(emissionFactors);
  return total;
}

export async function insertEmissionFactors(factors: Array<Omit<typeof emissionFactors.$inferInsert, "id">>) {
  const db = await requireDb();

  if (factors.length === 0) return;
  await db.insert(emissionFactors).values(factors);
}

// ============================================================================
// Documents & Usage Logs
// ============================================================================

export async function createDocument(document: Omit<typeof documents.$inferInsert, "id">) {
  const db = await requireDb();

  const result = await db.insert(documents).values(document);
  const [saved] = await db.select().from(documents).where(eq(documents.id, result[0].insertId)).limit(1);
  return saved;
}

export async function findDocument(companyId: number, documentId: number) {
  const db = await requireDb();

  const result = await db
    .select()
    .from(documents)
    .where(and(eq(documents.companyId, companyId), eq(documents.id, documentId)))
    .limit(1);
  return result.length > 0 ? result[0] : undefined;
}

export async function listDocuments(companyId: number) {
  const db = await requireDb();

  return await db
    .select()
    .from(documents)
    .where(eq(documents.companyId, companyId))
    .orderBy(desc(documents.uploadedAt), desc(documents.id));
}

export async function deleteDocument(companyId: number, documentId: number) {
  const db = await requireDb();

  return await db.transaction(async (tx) => {
    const owned = await tx
      .select({ id: documents.id })
      .from(documents)
      .where(and(eq(documents.companyId, companyId), eq(documents.id, documentId)))
      .limit(1);
    if (owned.length === 0) return false;

    await tx.delete(records).where(eq(records.documentId, documentId));
    await tx.delete(documents).where(eq(documents.id, documentId));
    return true;
  });
}

export async function updateDocumentStatus(
  documentId: number,
  status: "uploaded" | "processing" | "completed" | "failed",
  errorMessage: string | null = null
) {
  const db = await requireDb();

  await db.update(documents)
    .set({
      status,
      errorMessage,
      processedAt: status === "completed" || status === "failed" ? new Date() : undefined,
    })
    .where(eq(documents.id, documentId));
}

export async function logUsageEvent(event: Pick<typeof usageLogs.$inferInsert, "companyId" | "eventType" | "details">) {
  const db = await getDb();
  if (!db) {
    console.warn("[Database] Cannot log usage event: database not available");
    return;
  }

  await db.insert(usageLogs).values(event);
}

export async function listUsageEvents(filter: UsageEventFilter) {
  const db = await requireDb();

  const conditions: SQL[] = [];
  if (filter.companyId !== undefined) {
    conditions.push(eq(usageLogs.companyId, filter.companyId));
  }
  if (filter.eventType) {
    conditions.push(eq(usageLogs.eventType, filter.eventType));
  }
  if (filter.since) {
    conditions.push(gte(usageLogs.createdAt, filter.since));
  }

  const where = and(...conditions);
  const [{ total }] = await db.select({ total: count() }).from(usageLogs).where(where);
  const items = await db
    .select()
    .from(usageLogs)
    .where(where)
    .orderBy(desc(usageLogs.createdAt), desc(usageLogs.id))
    .limit(filter.limit)
    .offset(filter.offset);

  return { total, items };
}

// ============================================================================
// Companies & Waitlist
// ============================================================================

export async function listCompanies() {
  const db = await requireDb();

  return await db.select().from(companies).orderBy(desc(companies.createdAt), desc(companies.id));
}

export async function findCompany(companyId: number) {
  const db = await requireDb();

  const result = await db.select().from(companies).where(eq(companies.id, companyId)).limit(1);
  return result.length > 0 ? result[0] : undefined;
}

export async function findCompanyByEmail(email: string) {
  const db = await requireDb();

  const result = await db.select().from(companies).where(eq(companies.email, email)).limit(1);
  return result.length > 0 ? result[0] : undefined;
}

export async function listSubmissions(filter: {
  role?: "sme" | "consultant" | "corporate" | "other";
  search?: string;
  offset: number;
  limit: number;
}) {
  const db = await requireDb();

  const conditions: Array<SQL | undefined> = [];
  if (filter.role) {
    conditions.push(eq(waitlistSubmissions.role, filter.role));
  }
  if (filter.search) {
    const term = `%${filter.search}%`;
    conditions.push(
      or(
        like(waitlistSubmissions.name, term),
        like(waitlistSubmissions.company, term),
        like(waitlistSubmissions.email, term)
      )
    );
  }

  const where = and(...conditions);
  const [{ total }] = await db.select({ total: count() }).from(waitlistSubmissions).where(where);
  const items = await db
    .select()
    .from(waitlistSubmissions)
    .where(where)
    .orderBy(desc(waitlistSubmissions.createdAt), desc(waitlistSubmissions.id))
    .limit(filter.limit)
    .offset(filter.offset);

  return { total, items };
}

export async function findSubmission(submissionId: number) {
  const db = await requireDb();

  const result = await db.select().from(waitlistSubmissions).where(eq(waitlistSubmissions.id, submissionId)).limit(1);
  return result.length > 0 ? result[0] : undefined;
}

export async function deleteSubmission(submissionId: number) {
  const db = await requireDb();

  const result = await db.delete(waitlistSubmissions).where(eq(waitlistSubmissions.id, submissionId));
  return result[0].affectedRows > 0;
}

export async function promoteSubmission(submissionId: number, company: Omit<typeof companies.$inferInsert, "id">) {
  const db = await requireDb();

  return await db.transaction(async (tx) => {
    const result = await tx.insert(companies).values(company);
    const companyId = result[0].insertId;

    await tx.update(waitlistSubmissions)
      .set({ promotedCompanyId: companyId, promotedAt: new Date() })
      .where(eq(waitlistSubmissions.id, submissionId));

    const [created] = await tx.select().from(companies).where(eq(companies.id, companyId)).limit(1);
    return created;
  });
}

/**
 * MySQL-backed implementation of the store ports
 */
export const drizzleStore: AppStore = {
  findRecords,
  listRecords,
  saveRecord,
  saveReport,
  saveReportIfAbsent,
  findReports,
  findReport,
  loadEmissionFactors,
  countEmissionFactors,
  insertEmissionFactors,
  createDocument,
  findDocument,
  listDocuments,
  updateDocumentStatus,
  deleteDocument,
  logUsageEvent,
  listUsageEvents,
  listSubmissions,
  findSubmission,
  deleteSubmission,
  listCompanies,
  findCompany,
  findCompanyByEmail,
  promoteSubmission,
};
