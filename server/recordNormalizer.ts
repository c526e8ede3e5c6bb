import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  invalidRecordData,
  unresolvedFactor,
  type InvalidRecordData,
  type UnresolvedFactor,
} from "./emissionErrors";
import type { EmissionFactorTable } from "./emissionFactorTable";
import { inferCategory, normalizeCategory, normalizeUnit } from "./emissionVocabulary";
import { classifyScope, knownScope, type Scope } from "./scopeClassifier";

export const UNRESOLVED_FACTOR_SOURCE = "unresolved";

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be formatted YYYY-MM-DD")
  .transform(value => new Date(`${value}T00:00:00.000Z`))
  .pipe(z.date());

/**
 * Shape of a parsed row coming out of document ingestion.
 */
export const rawRowSchema = z.object({
  category: z.string().nullish(),
  usage: z
    .number({ required_error: "usage is required", invalid_type_error: "usage must be a number" })
    .finite("usage must be a finite number")
    .positive("usage must be greater than zero"),
  unit: z
    .string({ required_error: "unit is required", invalid_type_error: "unit must be a string" })
    .trim()
    .min(1, "unit is required"),
  cost: z.number().finite().nullish(),
  date: z.union([z.date(), isoDate]).nullish(),
  supplier: z.string().trim().nullish(),
  invoiceNumber: z.string().trim().nullish(),
  notes: z.string().nullish(),
});

export type RawRow = z.input<typeof rawRowSchema>;

export interface CompanyContext {
  country: string | null;
}

/**
 * A normalized, classified record that has not been attached to a document yet.
 */
export interface RecordDraft {
  readonly supplier: string | null;
  readonly category: string;
  readonly usage: number;
  readonly unit: string;
  readonly cost: number | null;
  readonly scope: Scope | null;
  readonly co2e: number | null;
  readonly factorSource: string;
  readonly emissionFactor: number | null;
  readonly date: Date | null;
  readonly invoiceNumber: string | null;
  readonly notes: string | null;
}

export type NormalizeOutcome =
  | { status: "normalized"; rowIndex: number; record: RecordDraft }
  | { status: "unresolved"; rowIndex: number; record: RecordDraft; error: UnresolvedFactor }
  | { status: "rejected"; rowIndex: number; error: InvalidRecordData };

export class RecordNormalizer {
  constructor(private readonly factors: EmissionFactorTable) {}

  normalizeAndClassify(row: unknown, context: CompanyContext): Result<RecordDraft, InvalidRecordData> {
    const parsed = rawRowSchema.safeParse(row);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const field = issue && issue.path.length > 0 ? String(issue.path[0]) : null;
      return err(invalidRecordData(issue?.message ?? "Row does not match the expected shape", field));
    }

    const input = parsed.data;
    const unit = normalizeUnit(input.unit);
    const supplier = input.supplier || null;
    const rawCategory = input.category?.trim() ?? "";
    const category = rawCategory !== "" ? normalizeCategory(rawCategory) : inferCategory(unit, supplier);

    if (!category) {
      return err(invalidRecordData(`Could not determine category for unit ${unit}`, "category"));
    }

    const base = {
      supplier,
      category,
      usage: input.usage,
      unit,
      cost: input.cost ?? null,
      date: input.date ?? null,
      invoiceNumber: input.invoiceNumber || null,
      notes: input.notes || null,
    };

    const record = this.factors.resolve(category, unit, context.country).match<RecordDraft>(
      factor => ({
        ...base,
        scope: classifyScope(category),
        co2e: input.usage * factor.factor,
        factorSource: `${factor.source} ${factor.year}`,
        emissionFactor: factor.factor,
      }),
      () => ({
        ...base,
        scope: knownScope(category),
        co2e: null,
        factorSource: UNRESOLVED_FACTOR_SOURCE,
        emissionFactor: null,
      })
    );

    return ok(Object.freeze(record));
  }

  /**
   * Normalizes every row independently. Bad rows become `rejected` outcomes;
   * the rest of the batch still goes through.
   */
  normalizeBatch(rows: readonly unknown[], context: CompanyContext): NormalizeOutcome[] {
    return rows.map((row, rowIndex): NormalizeOutcome => {
      const result = this.normalizeAndClassify(row, context);
      if (result.isErr()) {
        console.warn(`[Normalizer] Row ${rowIndex} rejected: ${result.error.message}`);
        return { status: "rejected", rowIndex, error: result.error };
      }

      const record = result.value;
      if (record.co2e === null) {
        return { status: "unresolved", rowIndex, record, error: unresolvedFactor(record.category, record.unit) };
      }
      return { status: "normalized", rowIndex, record };
    });
  }
}
