import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { EmissionFactorTable, type EmissionFactor } from "./emissionFactorTable";
import type { EmissionsStore } from "./emissionsStore";

export const DEFAULT_SEED_PATH = fileURLToPath(new URL("./data/emissionFactors.json", import.meta.url));

const seedSchema = z.array(
  z.object({
    category: z.string().min(1),
    unit: z.string().min(1),
    factor: z.number().positive(),
    source: z.string().min(1),
    year: z.number().int(),
    region: z.string().min(1).default("EU"),
    notes: z.string().nullable().default(null),
  })
);

/**
 * Read and validate the bundled emission factor dataset
 */
export function readSeedFactors(path: string = DEFAULT_SEED_PATH): EmissionFactor[] {
  const factors = seedSchema.parse(JSON.parse(readFileSync(path, "utf-8")));

  const seen = new Set<string>();
  for (const { category, unit, source, year } of factors) {
    const key = `${category}|${unit}|${source}|${year}`;
    if (seen.has(key)) {
      throw new Error(`Duplicate emission factor in seed data: ${key}`);
    }
    seen.add(key);
  }

  return factors;
}

/**
 * Insert the seed dataset when the table is empty. Returns the number of rows inserted.
 */
export async function seedEmissionFactors(
  store: Pick<EmissionsStore, "countEmissionFactors" | "insertEmissionFactors">,
  factors: EmissionFactor[] = readSeedFactors()
): Promise<number> {
  const existing = await store.countEmissionFactors();
  if (existing > 0) {
    console.log(`[Seed] Emission factors already loaded (${existing} records)`);
    return 0;
  }

  await store.insertEmissionFactors(factors);
  console.log(`[Seed] Loaded ${factors.length} emission factors`);
  return factors.length;
}

/**
 * Build the read-only lookup from whatever the store holds
 */
export async function loadFactorTable(
  store: Pick<EmissionsStore, "loadEmissionFactors">,
  defaultSource: string
): Promise<EmissionFactorTable> {
  const factors = await store.loadEmissionFactors();
  if (factors.length === 0) {
    console.warn("[Seed] No emission factors available; every record will be unresolved");
  }
  return new EmissionFactorTable(factors, { defaultSource });
}
