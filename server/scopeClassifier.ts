export type Scope = 1 | 2 | 3;

/**
 * GHG Protocol scope per canonical category.
 *
 * Scope 1: direct emissions from owned or controlled sources
 * Scope 2: indirect emissions from purchased energy
 * Scope 3: other indirect (value chain) emissions
 */
export const SCOPE_BY_CATEGORY: ReadonlyMap<string, Scope> = new Map<string, Scope>([
  ["natural_gas", 1],
  ["diesel", 1],
  ["petrol", 1],
  ["fuel", 1],
  ["lpg", 1],
  ["heating_oil", 1],
  ["electricity", 2],
  ["district_heating", 2],
  ["freight_transport", 3],
  ["transport", 3],
  ["purchased_goods", 3],
  ["business_travel", 3],
  ["waste", 3],
  ["water", 3],
]);

export const DEFAULT_SCOPE: Scope = 3;

export function knownScope(category: string): Scope | null {
  return SCOPE_BY_CATEGORY.get(category) ?? null;
}

/**
 * Categories missing from the table fall back to Scope 3.
 * TODO: have the fallback reviewed against CSRD categorization rules.
 */
export function classifyScope(category: string): Scope {
  return knownScope(category) ?? DEFAULT_SCOPE;
}
