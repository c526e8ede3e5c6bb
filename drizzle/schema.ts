import { date, double, index, int, json, mysqlEnum, mysqlTable, text, timestamp, unique, varchar } from "drizzle-orm/mysql-core";

/**
 * Client companies using the dashboard.
 */
export const companies = mysqlTable("companies", {
  id: int("id").autoincrement().primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 255 }),
  passwordHash: varchar("password_hash", { length: 255 }),
  sector: varchar("sector", { length: 100 }),
  country: varchar("country", { length: 2 }).default("ES").notNull(), // ISO 3166-1 alpha-2
  size: int("size"),
  role: mysqlEnum("role", ["company", "admin"]).default("company").notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().onUpdateNow().notNull(),
}, (table) => ({
  emailIdx: unique("email_idx").on(table.email),
}));

export type Company = typeof companies.$inferSelect;
export type InsertCompany = typeof companies.$inferInsert;

/**
 * Uploaded invoices, utility bills and ERP exports
 */
export const documents = mysqlTable("documents", {
  id: int("id").autoincrement().primaryKey(),
  companyId: int("company_id").notNull(),
  filename: varchar("filename", { length: 255 }).notNull(),
  fileType: mysqlEnum("file_type", ["pdf", "csv", "xlsx", "png", "jpg"]).notNull(),
  status: mysqlEnum("status", ["uploaded", "processing", "completed", "failed"]).default("uploaded").notNull(),
  errorMessage: text("error_message"),
  uploadedAt: timestamp("uploadedAt").defaultNow().notNull(),
  processedAt: timestamp("processedAt"),
}, (table) => ({
  companyIdx: index("company_idx").on(table.companyId),
}));

export type Document = typeof documents.$inferSelect;
export type InsertDocument = typeof documents.$inferInsert;

/**
 * Emission data points extracted from documents. Append-only: re-analysis
 * inserts new rows.
 */
export const records = mysqlTable("records", {
  id: int("id").autoincrement().primaryKey(),
  documentId: int("document_id").notNull(),
  companyId: int("company_id").notNull(),
  supplier: varchar("supplier", { length: 255 }),
  category: varchar("category", { length: 100 }).notNull(),
  usage: double("usage").notNull(),
  unit: varchar("unit", { length: 20 }).notNull(),
  cost: double("cost"),
  scope: int("scope"), // 1, 2, 3 or null
  co2e: double("co2e"), // null when no emission factor matched
  factorSource: varchar("factor_source", { length: 100 }).notNull(),
  emissionFactor: double("emission_factor"),
  date: date("date"),
  invoiceNumber: varchar("invoice_number", { length: 100 }),
  notes: text("notes"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  companyDateIdx: index("company_date_idx").on(table.companyId, table.date),
  documentIdx: index("document_idx").on(table.documentId),
}));

export type EmissionRecordRow = typeof records.$inferSelect;
export type InsertEmissionRecord = typeof records.$inferInsert;

/**
 * Reference emission factors (kgCO2e per unit)
 */
export const emissionFactors = mysqlTable("emission_factors", {
  id: int("id").autoincrement().primaryKey(),
  category: varchar("category", { length: 100 }).notNull(),
  unit: varchar("unit", { length: 20 }).notNull(),
  factor: double("factor").notNull(),
  source: varchar("source", { length: 100 }).notNull(),
  year: int("year").notNull(),
  region: varchar("region", { length: 10 }).default("EU").notNull(),
  notes: varchar("notes", { length: 500 }),
}, (table) => ({
  factorIdx: unique("uix_factor").on(table.category, table.unit, table.source, table.year),
  categoryIdx: index("category_idx").on(table.category),
}));

export type EmissionFactorRow = typeof emissionFactors.$inferSelect;
export type InsertEmissionFactor = typeof emissionFactors.$inferInsert;

/**
 * Frozen report snapshots. Never updated after insert.
 */
export const reports = mysqlTable("reports", {
  id: int("id").autoincrement().primaryKey(),
  companyId: int("company_id").notNull(),
  year: int("year").notNull(),
  totalCo2e: double("total_co2e").notNull(),
  scope1Co2e: double("scope1_co2e").notNull(),
  scope2Co2e: double("scope2_co2e").notNull(),
  scope3Co2e: double("scope3_co2e").notNull(),
  breakdown: json("breakdown").$type<Array<{ category: string; co2e: number }>>().notNull(),
  monthlyData: json("monthly_data").$type<Array<{ month: string; co2e: number }>>().notNull(),
  coverage: double("coverage").notNull(),
  dataSourcesCount: int("data_sources_count").notNull(),
  methodology: varchar("methodology", { length: 1000 }).notNull(),
  createdAt: timestamp("createdAt", { fsp: 3 }).defaultNow().notNull(),
}, (table) => ({
  companyYearIdx: index("company_year_idx").on(table.companyId, table.year),
}));

export type ReportRow = typeof reports.$inferSelect;
export type InsertReport = typeof reports.$inferInsert;

/**
 * Usage events for the admin panel
 */
export const usageLogs = mysqlTable("usage_logs", {
  id: int("id").autoincrement().primaryKey(),
  companyId: int("company_id"),
  eventType: mysqlEnum("event_type", ["upload", "analyze", "report_generated", "waitlist_promoted"]).notNull(),
  details: json("details").$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  companyTimeIdx: index("company_time_idx").on(table.companyId, table.createdAt),
}));

export type UsageLog = typeof usageLogs.$inferSelect;
export type InsertUsageLog = typeof usageLogs.$inferInsert;

/**
 * Landing page waitlist submissions
 */
export const waitlistSubmissions = mysqlTable("waitlist_submissions", {
  id: int("id").autoincrement().primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  company: varchar("company", { length: 150 }).notNull(),
  email: varchar("email", { length: 150 }).notNull(),
  role: mysqlEnum("role", ["sme", "consultant", "corporate", "other"]).notNull(),
  promotedCompanyId: int("promoted_company_id"),
  promotedAt: timestamp("promotedAt"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  emailIdx: unique("waitlist_email_idx").on(table.email),
  createdIdx: index("created_idx").on(table.createdAt),
}));

export type WaitlistSubmission = typeof waitlistSubmissions.$inferSelect;
export type InsertWaitlistSubmission = typeof waitlistSubmissions.$inferInsert;
