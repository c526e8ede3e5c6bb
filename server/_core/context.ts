import type { Company } from "../../drizzle/schema";
import { drizzleStore } from "../db";
import type { EmissionFactorTable } from "../emissionFactorTable";
import type { AppStore } from "../emissionsStore";
import { loadFactorTable } from "../seedFactors";
import { ENV } from "./env";

export type TrpcContext = {
  store: AppStore;
  factors: EmissionFactorTable;
  company: Company | null;
};

export interface CreateContextOptions {
  /** Company resolved by the session layer, if any */
  companyId: number | null;
  store?: AppStore;
}

// Factor tables are read once per store and then shared by every request
const factorTables = new WeakMap<AppStore, Promise<EmissionFactorTable>>();

function factorTableFor(store: AppStore): Promise<EmissionFactorTable> {
  let table = factorTables.get(store);
  if (!table) {
    table = loadFactorTable(store, ENV.defaultFactorSource);
    factorTables.set(store, table);
    // A failed load should be retried on the next request
    table.catch(() => factorTables.delete(store));
  }
  return table;
}

export function invalidateFactorTable(store: AppStore): void {
  factorTables.delete(store);
}

export async function createContext(opts: CreateContextOptions): Promise<TrpcContext> {
  const store = opts.store ?? drizzleStore;
  const [factors, company] = await Promise.all([
    factorTableFor(store),
    opts.companyId === null ? Promise.resolve(undefined) : store.findCompany(opts.companyId),
  ]);

  return {
    store,
    factors,
    company: company ?? null,
  };
}
