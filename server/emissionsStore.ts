import type {
  Company,
  Document,
  EmissionRecordRow,
  InsertCompany,
  InsertDocument,
  InsertUsageLog,
  ReportRow,
  UsageLog,
  WaitlistSubmission,
} from "../drizzle/schema";
import type { EmissionFactor } from "./emissionFactorTable";

export type EmissionRecord = EmissionRecordRow;
export type NewEmissionRecord = Omit<EmissionRecordRow, "id" | "createdAt">;
export type Report = ReportRow;
export type NewReport = Omit<ReportRow, "id" | "createdAt">;
export type DocumentStatus = Document["status"];
export type UsageEvent = Pick<InsertUsageLog, "companyId" | "eventType" | "details">;
export type UsageEventType = UsageLog["eventType"];

export type ReportInsertion =
  | { created: true; report: Report }
  | { created: false; existing: Report };

export interface UsageEventFilter {
  companyId?: number;
  eventType?: UsageEventType;
  /** Inclusive lower bound on createdAt */
  since?: Date;
  offset: number;
  limit: number;
}

/**
 * Inclusive date bounds. An unset bound is open.
 */
export interface DateRange {
  start?: Date | null;
  end?: Date | null;
}

export interface Page<T> {
  total: number;
  items: T[];
}

/**
 * Persistence port for the emission core. Records and reports are
 * insert-only.
 */
export interface EmissionsStore {
  findRecords(companyId: number, range: DateRange): Promise<EmissionRecord[]>;
  listRecords(companyId: number, offset: number, limit: number): Promise<Page<EmissionRecord>>;
  saveRecord(record: NewEmissionRecord): Promise<EmissionRecord>;

  saveReport(report: NewReport): Promise<Report>;
  /**
   * Insert unless the company already has a report for that year. The check
   * and the insert happen atomically.
   */
  saveReportIfAbsent(report: NewReport): Promise<ReportInsertion>;
  /** Newest first */
  findReports(companyId: number, year?: number): Promise<Report[]>;
  findReport(companyId: number, reportId: number): Promise<Report | undefined>;

  loadEmissionFactors(): Promise<EmissionFactor[]>;
  countEmissionFactors(): Promise<number>;
  insertEmissionFactors(factors: EmissionFactor[]): Promise<void>;

  createDocument(document: Omit<InsertDocument, "id">): Promise<Document>;
  findDocument(companyId: number, documentId: number): Promise<Document | undefined>;
  /** Newest upload first */
  listDocuments(companyId: number): Promise<Document[]>;
  updateDocumentStatus(documentId: number, status: DocumentStatus, errorMessage?: string | null): Promise<void>;
  /**
   * Removes the document together with the records extracted from it.
   * Returns false when the company owns no such document.
   */
  deleteDocument(companyId: number, documentId: number): Promise<boolean>;

  logUsageEvent(event: UsageEvent): Promise<void>;
  /** Newest first */
  listUsageEvents(filter: UsageEventFilter): Promise<Page<UsageLog>>;
}

export interface WaitlistFilter {
  role?: WaitlistSubmission["role"];
  search?: string;
  offset: number;
  limit: number;
}

export interface WaitlistStore {
  /** Newest first */
  listSubmissions(filter: WaitlistFilter): Promise<Page<WaitlistSubmission>>;
  findSubmission(submissionId: number): Promise<WaitlistSubmission | undefined>;
  deleteSubmission(submissionId: number): Promise<boolean>;
  /** Newest first */
  listCompanies(): Promise<Company[]>;
  findCompany(companyId: number): Promise<Company | undefined>;
  findCompanyByEmail(email: string): Promise<Company | undefined>;
  /**
   * Inserts the company and marks the submission promoted in one transaction
   */
  promoteSubmission(submissionId: number, company: Omit<InsertCompany, "id">): Promise<Company>;
}

export type AppStore = EmissionsStore & WaitlistStore;
