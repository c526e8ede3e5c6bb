/**
 * Canonical category and unit names shared by the factor table and the
 * record normalizer. Free text from invoices (ES/EN) is mapped onto them.
 */

const CATEGORY_SYNONYMS = new Map<string, string>([
  ["electric", "electricity"],
  ["electricidad", "electricity"],
  ["energia", "electricity"],
  ["energía", "electricity"],
  ["luz", "electricity"],
  ["power", "electricity"],
  ["gas", "natural_gas"],
  ["gas_natural", "natural_gas"],
  ["gasnatural", "natural_gas"],
  ["gasoleo", "diesel"],
  ["gasóleo", "diesel"],
  ["gasoil", "diesel"],
  ["gasolina", "petrol"],
  ["gasoline", "petrol"],
  ["transporte", "freight_transport"],
  ["flete", "freight_transport"],
  ["freight", "freight_transport"],
  ["compras", "purchased_goods"],
  ["materiales", "purchased_goods"],
  ["viajes", "business_travel"],
  ["travel", "business_travel"],
]);

const UNIT_SYNONYMS = new Map<string, string>([
  ["kw_h", "kwh"],
  ["mw_h", "mwh"],
  ["m³", "m3"],
  ["m^3", "m3"],
  ["l", "liters"],
  ["lt", "liters"],
  ["litro", "liters"],
  ["litros", "liters"],
  ["liter", "liters"],
  ["litre", "liters"],
  ["litres", "liters"],
  ["kgs", "kg"],
  ["kilogram", "kg"],
  ["kilograms", "kg"],
  ["t", "tonnes"],
  ["ton", "tonnes"],
  ["tonne", "tonnes"],
  ["tkm", "tonne_km"],
  ["t_km", "tonne_km"],
  ["kilometers", "km"],
  ["kilometres", "km"],
  ["euro", "eur"],
  ["euros", "eur"],
  ["€", "eur"],
  ["dollar", "usd"],
  ["dollars", "usd"],
  ["$", "usd"],
]);

const ELECTRICITY_SUPPLIERS = ["endesa", "iberdrola", "naturgy", "eléctrica", "electric"];
const DIESEL_HINTS = ["diesel", "gasóleo", "gasoleo", "gasoil"];
const CURRENCY_UNITS = new Set(["eur", "usd"]);

function toKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function normalizeCategory(category: string): string {
  const key = toKey(category);
  return CATEGORY_SYNONYMS.get(key) ?? key;
}

export function normalizeUnit(unit: string): string {
  const key = toKey(unit);
  return UNIT_SYNONYMS.get(key) ?? key;
}

/**
 * Guess a category for rows that arrive without one, from the (already
 * normalized) unit and the supplier name.
 */
export function inferCategory(unit: string, supplier: string | null): string | null {
  const supplierLower = (supplier ?? "").toLowerCase();

  if (unit === "kwh" || unit === "mwh") return "electricity";
  if (ELECTRICITY_SUPPLIERS.some(s => supplierLower.includes(s))) return "electricity";

  if (unit === "m3") return "natural_gas";
  if (supplierLower.includes("gas")) return "natural_gas";

  if (unit === "liters") {
    return DIESEL_HINTS.some(s => supplierLower.includes(s)) ? "diesel" : "petrol";
  }

  if (unit === "tonne_km" || unit === "km") return "freight_transport";
  if (CURRENCY_UNITS.has(unit)) return "purchased_goods";

  return null;
}
