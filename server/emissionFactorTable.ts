import { err, ok, type Result } from "neverthrow";
import type { EmissionFactorRow } from "../drizzle/schema";
import { unresolvedFactor, type UnresolvedFactor } from "./emissionErrors";
import { normalizeCategory, normalizeUnit } from "./emissionVocabulary";

export type EmissionFactor = Omit<EmissionFactorRow, "id">;

export interface ResolutionContext {
  country: string | null;
  defaultSource: string;
}

/**
 * One step of the ordering applied when several factors share a
 * (category, unit) key. Negative means `a` is preferred.
 */
export interface TieBreakRule {
  name: string;
  compare: (a: EmissionFactor, b: EmissionFactor, context: ResolutionContext) => number;
}

const preferTrue = (a: boolean, b: boolean): number => Number(b) - Number(a);

export const FACTOR_TIE_BREAK_RULES: readonly TieBreakRule[] = [
  {
    name: "region_matches_country",
    compare: (a, b, { country }) => {
      if (!country) return 0;
      const wanted = country.toUpperCase();
      return preferTrue(a.region.toUpperCase() === wanted, b.region.toUpperCase() === wanted);
    },
  },
  {
    name: "most_recent_year",
    compare: (a, b) => b.year - a.year,
  },
  {
    name: "default_source",
    compare: (a, b, { defaultSource }) => preferTrue(a.source === defaultSource, b.source === defaultSource),
  },
  {
    // (category, unit, source, year) is unique, so this makes the order total
    name: "source_name",
    compare: (a, b) => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0),
  },
];

export interface EmissionFactorTableOptions {
  defaultSource: string;
  rules?: readonly TieBreakRule[];
}

const factorKey = (category: string, unit: string) => `${category}|${unit}`;

/**
 * Read-only lookup over the emission factor reference data.
 *
 * Built once from the seeded rows and handed to whatever needs it; nothing
 * mutates it afterwards, so concurrent readers need no coordination.
 */
export class EmissionFactorTable {
  private readonly byKey: ReadonlyMap<string, readonly EmissionFactor[]>;
  private readonly defaultSource: string;
  private readonly rules: readonly TieBreakRule[];

  constructor(factors: readonly EmissionFactor[], options: EmissionFactorTableOptions) {
    this.defaultSource = options.defaultSource;
    this.rules = options.rules ?? FACTOR_TIE_BREAK_RULES;

    const byKey = new Map<string, EmissionFactor[]>();
    for (const factor of factors) {
      const normalized: EmissionFactor = Object.freeze({
        ...factor,
        category: normalizeCategory(factor.category),
        unit: normalizeUnit(factor.unit),
      });
      const key = factorKey(normalized.category, normalized.unit);
      const bucket = byKey.get(key);
      if (bucket) {
        bucket.push(normalized);
      } else {
        byKey.set(key, [normalized]);
      }
    }

    this.byKey = new Map(Array.from(byKey.entries(), ([key, bucket]) => [key, Object.freeze(bucket)]));
  }

  get size(): number {
    let count = 0;
    this.byKey.forEach(bucket => {
      count += bucket.length;
    });
    return count;
  }

  /**
   * All factors for a normalized (category, unit), in no particular order
   */
  candidates(category: string, unit: string): readonly EmissionFactor[] {
    return this.byKey.get(factorKey(category, unit)) ?? [];
  }

  /**
   * Candidates sorted by the tie-break rules, best first
   */
  rank(category: string, unit: string, country: string | null): EmissionFactor[] {
    const context: ResolutionContext = { country, defaultSource: this.defaultSource };
    return [...this.candidates(category, unit)].sort((a, b) => {
      for (const rule of this.rules) {
        const order = rule.compare(a, b, context);
        if (order !== 0) return order;
      }
      return 0;
    });
  }

  resolve(category: string, unit: string, country: string | null): Result<EmissionFactor, UnresolvedFactor> {
    const [best] = this.rank(category, unit, country);
    return best ? ok(best) : err(unresolvedFactor(category, unit));
  }
}
