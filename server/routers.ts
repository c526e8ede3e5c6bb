import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { invalidateFactorTable } from "./_core/context";
import { adminProcedure, protectedProcedure, publicProcedure, router } from "./_core/trpc";
import { ENV } from "./_core/env";
import { getCompanyDataStats, getCompanyDetail, listActivity, listCompanyOverviews } from "./companyOverview";
import { analyzeDocument, type DocumentAnalysis } from "./documentAnalyzer";
import { parseDocument, type ParsedRow } from "./documentParser";
import type { BuildReportError } from "./emissionErrors";
import { aggregateRecords, rankSuppliers, yearRange } from "./emissionAggregator";
import type { DateRange } from "./emissionsStore";
import { RecordNormalizer } from "./recordNormalizer";
import { buildReport, latestReport, reportToCsv } from "./reportBuilder";
import { seedEmissionFactors } from "./seedFactors";
import { getWaitlistDetail, promoteWaitlistEntry, type PromotionError } from "./waitlist";

const fileType = z.enum(["pdf", "csv", "xlsx", "png", "jpg"]);
const reportYear = z.number().int().min(2000).max(2100);
const usageEventType = z.enum(["upload", "analyze", "report_generated", "waitlist_promoted"]);

function reportError(error: BuildReportError): TRPCError {
  switch (error.type) {
    case "NoDataForPeriod":
      return new TRPCError({ code: "NOT_FOUND", message: error.message });
    case "ReportAlreadyExists":
      return new TRPCError({ code: "CONFLICT", message: error.message });
  }
}

function promotionError(error: PromotionError): TRPCError {
  switch (error.type) {
    case "SubmissionNotFound":
      return new TRPCError({ code: "NOT_FOUND", message: error.message });
    case "AlreadyPromoted":
      return new TRPCError({ code: "BAD_REQUEST", message: error.message });
  }
}

function summarizeAnalysis(analysis: DocumentAnalysis) {
  return {
    documentId: analysis.documentId,
    status: analysis.status,
    message: analysis.message,
    recordsCount: analysis.records.length,
    rejectedCount: analysis.rejectedCount,
    unresolvedCount: analysis.unresolvedCount,
    totalCo2e: analysis.totalCo2e,
    scope1Co2e: analysis.scope1Co2e,
    scope2Co2e: analysis.scope2Co2e,
    scope3Co2e: analysis.scope3Co2e,
    records: analysis.records,
    rejected: analysis.outcomes.flatMap(outcome =>
      outcome.status === "rejected"
        ? [{ rowIndex: outcome.rowIndex, field: outcome.error.field, message: outcome.error.message }]
        : []
    ),
  };
}

export const appRouter = router({
  system: router({
    health: publicProcedure.query(({ ctx }) => ({
      ok: true,
      emissionFactors: ctx.factors.size,
    })),
  }),

  dashboard: router({
    /**
     * Scope totals, monthly series and top suppliers for a year or a date range
     */
    summary: protectedProcedure
      .input(z.object({
        year: reportYear.optional(),
        startDate: z.date().optional(),
        endDate: z.date().optional(),
      }).default({}))
      .query(async ({ ctx, input }) => {
        const { year, startDate, endDate } = input;
        const range: DateRange = year !== undefined
          ? yearRange(year)
          : { start: startDate ?? null, end: endDate ?? null };

        const records = await ctx.store.findRecords(ctx.company.id, range);
        const aggregation = aggregateRecords(records, range);

        return {
          ...aggregation,
          topSuppliers: rankSuppliers(records),
        };
      }),

    /**
     * Document and record counts, total emissions and the record date span
     */
    stats: protectedProcedure.query(async ({ ctx }) => {
      return await getCompanyDataStats(ctx.store, ctx.company.id);
    }),

    /**
     * Paginated record listing, newest date first
     */
    records: protectedProcedure
      .input(z.object({
        limit: z.number().int().min(1).max(100).default(20),
        offset: z.number().int().min(0).default(0),
      }))
      .query(async ({ ctx, input }) => {
        return await ctx.store.listRecords(ctx.company.id, input.offset, input.limit);
      }),
  }),

  analysis: router({
    /**
     * Register a document, extract its rows and store the resulting records.
     * Spreadsheets arrive base64 encoded; PDFs and images arrive as OCR text.
     */
    upload: protectedProcedure
      .input(z.object({
        filename: z.string().min(1),
        fileType,
        fileBuffer: z.string().optional(), // Base64 encoded
        text: z.string().optional(),
      }))
      .mutation(async ({ ctx, input }) => {
        const { store, company } = ctx;

        const document = await store.createDocument({
          companyId: company.id,
          filename: input.filename,
          fileType: input.fileType,
        });
        await store.logUsageEvent({
          companyId: company.id,
          eventType: "upload",
          details: { documentId: document.id, filename: input.filename, fileType: input.fileType },
        });
        console.log(`[Upload ${document.id}] Received ${input.filename} (${input.fileType})`);

        let rows: ParsedRow[];
        try {
          rows = parseDocument({
            fileType: input.fileType,
            buffer: input.fileBuffer === undefined ? undefined : Buffer.from(input.fileBuffer, "base64"),
            text: input.text,
          });
        } catch (error) {
          const message = error instanceof Error ? error.message : "Unknown error";
          console.error(`[Upload ${document.id}] Parsing failed:`, error);
          await store.updateDocumentStatus(document.id, "failed", message);
          throw new TRPCError({ code: "BAD_REQUEST", message, cause: error });
        }

        const analysis = await analyzeDocument(store, new RecordNormalizer(ctx.factors), {
          companyId: company.id,
          documentId: document.id,
          rows,
          context: { country: company.country },
        });

        return summarizeAnalysis(analysis);
      }),

    /**
     * Run already-extracted rows through normalization for an existing document
     */
    analyzeRows: protectedProcedure
      .input(z.object({
        documentId: z.number().int(),
        rows: z.array(z.unknown()),
      }))
      .mutation(async ({ ctx, input }) => {
        const document = await ctx.store.findDocument(ctx.company.id, input.documentId);
        if (!document) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Document not found" });
        }
        if (document.status === "processing") {
          throw new TRPCError({ code: "CONFLICT", message: "Document is already being processed" });
        }

        const analysis = await analyzeDocument(ctx.store, new RecordNormalizer(ctx.factors), {
          companyId: ctx.company.id,
          documentId: document.id,
          rows: input.rows,
          context: { country: ctx.company.country },
        });

        return summarizeAnalysis(analysis);
      }),

    /**
     * Get document processing status
     */
    status: protectedProcedure
      .input(z.object({ documentId: z.number().int() }))
      .query(async ({ ctx, input }) => {
        const document = await ctx.store.findDocument(ctx.company.id, input.documentId);
        if (!document) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Document not found" });
        }
        return document;
      }),

    /**
     * The company's documents, newest upload first
     */
    documents: protectedProcedure.query(async ({ ctx }) => {
      const documents = await ctx.store.listDocuments(ctx.company.id);
      return { total: documents.length, documents };
    }),

    /**
     * Delete a document together with the records extracted from it
     */
    deleteDocument: protectedProcedure
      .input(z.object({ documentId: z.number().int() }))
      .mutation(async ({ ctx, input }) => {
        const deleted = await ctx.store.deleteDocument(ctx.company.id, input.documentId);
        if (!deleted) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Document not found" });
        }
        console.log(`[Upload ${input.documentId}] Deleted document and its records`);
        return { success: true };
      }),
  }),

  report: router({
    /**
     * Snapshot the year's aggregation as a new report
     */
    generate: protectedProcedure
      .input(z.object({ year: reportYear }))
      .mutation(async ({ ctx, input }) => {
        const result = await buildReport(ctx.store, ctx.company.id, input.year, {
          policy: ENV.reportRegenerationPolicy,
          methodology: ENV.reportMethodology,
        });

        if (result.isErr()) {
          throw reportError(result.error);
        }

        const report = result.value;
        await ctx.store.logUsageEvent({
          companyId: ctx.company.id,
          eventType: "report_generated",
          details: { reportId: report.id, year: report.year, totalCo2e: report.totalCo2e },
        });

        return report;
      }),

    /**
     * All report versions, newest first
     */
    list: protectedProcedure
      .input(z.object({ year: reportYear.optional() }).optional())
      .query(async ({ ctx, input }) => {
        return await ctx.store.findReports(ctx.company.id, input?.year);
      }),

    /**
     * Newest report version, or null if none was generated
     */
    latest: protectedProcedure
      .input(z.object({ year: reportYear.optional() }).optional())
      .query(async ({ ctx, input }) => {
        const reports = await ctx.store.findReports(ctx.company.id, input?.year);
        return latestReport(reports) ?? null;
      }),

    get: protectedProcedure
      .input(z.object({ reportId: z.number().int() }))
      .query(async ({ ctx, input }) => {
        const report = await ctx.store.findReport(ctx.company.id, input.reportId);
        if (!report) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Report not found" });
        }
        return report;
      }),

    exportCsv: protectedProcedure
      .input(z.object({ reportId: z.number().int() }))
      .query(async ({ ctx, input }) => {
        const report = await ctx.store.findReport(ctx.company.id, input.reportId);
        if (!report) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Report not found" });
        }
        return {
          filename: `emissions-report-${report.year}-${report.id}.csv`,
          content: reportToCsv(report),
        };
      }),
  }),

  admin: router({
    /**
     * Load the bundled emission factors into an empty table.
     * Requests that start afterwards resolve against the new factors.
     */
    seedFactors: adminProcedure.mutation(async ({ ctx }) => {
      const inserted = await seedEmissionFactors(ctx.store);
      if (inserted > 0) {
        invalidateFactorTable(ctx.store);
      }
      return { inserted };
    }),

    /**
     * Companies with uploads over the last 30 days and emissions over the last 12 months
     */
    companies: adminProcedure
      .input(z.object({
        sector: z.string().trim().min(1).optional(),
        asOf: z.date().optional(),
      }).default({}))
      .query(async ({ ctx, input }) => {
        const companies = await listCompanyOverviews(ctx.store, input.asOf ?? new Date(), { sector: input.sector });
        return { total: companies.length, companies };
      }),

    company: adminProcedure
      .input(z.object({
        companyId: z.number().int(),
        asOf: z.date().optional(),
      }))
      .query(async ({ ctx, input }) => {
        const detail = await getCompanyDetail(ctx.store, input.companyId, input.asOf ?? new Date());
        if (!detail) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Company not found" });
        }
        return detail;
      }),

    /**
     * Paginated usage log across all companies
     */
    activity: adminProcedure
      .input(z.object({
        eventType: usageEventType.optional(),
        companyId: z.number().int().optional(),
        page: z.number().int().min(1).default(1),
        pageSize: z.number().int().min(1).max(500).default(50),
      }).default({}))
      .query(async ({ ctx, input }) => {
        return await listActivity(ctx.store, input);
      }),

    waitlist: router({
      list: adminProcedure
        .input(z.object({
          role: z.enum(["sme", "consultant", "corporate", "other"]).optional(),
          search: z.string().trim().min(1).optional(),
          limit: z.number().int().min(1).max(100).default(50),
          offset: z.number().int().min(0).default(0),
        }))
        .query(async ({ ctx, input }) => {
          return await ctx.store.listSubmissions(input);
        }),

      get: adminProcedure
        .input(z.object({ submissionId: z.number().int() }))
        .query(async ({ ctx, input }) => {
          const detail = await getWaitlistDetail(ctx.store, input.submissionId);
          if (!detail) {
            throw new TRPCError({ code: "NOT_FOUND", message: "Submission not found" });
          }
          return detail;
        }),

      /**
       * Create a company account for a submission. The temporary password is
       * only ever returned here.
       */
      promote: adminProcedure
        .input(z.object({ submissionId: z.number().int() }))
        .mutation(async ({ ctx, input }) => {
          const result = await promoteWaitlistEntry(ctx.store, input.submissionId, {
            defaultCountry: ENV.defaultCompanyCountry,
          });

          if (result.isErr()) {
            throw promotionError(result.error);
          }

          const { company, temporaryPassword } = result.value;
          return {
            companyId: company.id,
            email: company.email,
            temporaryPassword,
          };
        }),

      /**
       * Reject a submission by deleting it
       */
      delete: adminProcedure
        .input(z.object({ submissionId: z.number().int() }))
        .mutation(async ({ ctx, input }) => {
          const deleted = await ctx.store.deleteSubmission(input.submissionId);
          if (!deleted) {
            throw new TRPCError({ code: "NOT_FOUND", message: "Submission not found" });
          }
          console.log(`[Waitlist] Deleted submission ${input.submissionId}`);
          return { success: true };
        }),
    }),
  }),
});

export type AppRouter = typeof appRouter;
