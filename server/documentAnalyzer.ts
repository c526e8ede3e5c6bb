import { aggregateRecords } from "./emissionAggregator";
import type { EmissionRecord, EmissionsStore } from "./emissionsStore";
import type { CompanyContext, NormalizeOutcome, RecordNormalizer } from "./recordNormalizer";

export interface AnalyzeDocumentInput {
  companyId: number;
  documentId: number;
  rows: readonly unknown[];
  context: CompanyContext;
}

export interface DocumentAnalysis {
  documentId: number;
  status: "completed" | "failed";
  outcomes: NormalizeOutcome[];
  records: EmissionRecord[];
  rejectedCount: number;
  unresolvedCount: number;
  totalCo2e: number;
  scope1Co2e: number;
  scope2Co2e: number;
  scope3Co2e: number;
  message: string;
}

/**
 * Normalize a document's parsed rows and append the resulting records.
 *
 * Rejected rows are reported back in `outcomes` and skipped; unresolved ones
 * are stored with a null co2e. Running this again for the same document adds
 * a fresh set of records next to the earlier ones.
 */
export async function analyzeDocument(
  store: EmissionsStore,
  normalizer: RecordNormalizer,
  input: AnalyzeDocumentInput
): Promise<DocumentAnalysis> {
  const { companyId, documentId, rows, context } = input;

  if (rows.length === 0) {
    const message = "No data could be extracted from document";
    await store.updateDocumentStatus(documentId, "failed", message);
    return {
      documentId,
      status: "failed",
      outcomes: [],
      records: [],
      rejectedCount: 0,
      unresolvedCount: 0,
      totalCo2e: 0,
      scope1Co2e: 0,
      scope2Co2e: 0,
      scope3Co2e: 0,
      message,
    };
  }

  await store.updateDocumentStatus(documentId, "processing");

  try {
    console.log(`[Analyze ${documentId}] Normalizing ${rows.length} rows...`);
    const outcomes = normalizer.normalizeBatch(rows, context);

    const records: EmissionRecord[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") continue;
      records.push(await store.saveRecord({ ...outcome.record, companyId, documentId }));
    }

    const rejectedCount = outcomes.filter(o => o.status === "rejected").length;
    const unresolvedCount = outcomes.filter(o => o.status === "unresolved").length;
    const totals = aggregateRecords(records);

    await store.updateDocumentStatus(documentId, "completed");
    await store.logUsageEvent({
      companyId,
      eventType: "analyze",
      details: { documentId, recordsCount: records.length, rejectedCount, totalCo2e: totals.totalCo2e },
    });

    console.log(
      `[Analyze ${documentId}] Completed: ${records.length} records saved, ${unresolvedCount} unresolved, ${rejectedCount} rejected`
    );

    return {
      documentId,
      status: "completed",
      outcomes,
      records,
      rejectedCount,
      unresolvedCount,
      totalCo2e: totals.totalCo2e,
      scope1Co2e: totals.scope1Co2e,
      scope2Co2e: totals.scope2Co2e,
      scope3Co2e: totals.scope3Co2e,
      message: `Successfully extracted ${records.length} emission records`,
    };
  } catch (error) {
    console.error(`[Analyze ${documentId}] Analysis failed:`, error);
    await store.updateDocumentStatus(documentId, "failed", error instanceof Error ? error.message : "Unknown error");
    throw error;
  }
}
