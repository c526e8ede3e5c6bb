import * as XLSX from 'xlsx';
import type { Document } from '../drizzle/schema';

/**
 * A row as extracted from a document, before validation. Any field may be
 * missing; the record normalizer decides what is acceptable.
 */
export interface ParsedRow {
  date?: Date;
  supplier?: string;
  category?: string;
  usage?: number;
  unit?: string;
  cost?: number;
  invoiceNumber?: string;
  notes?: string;
}

type ParsedField = keyof ParsedRow;

/**
 * Column header synonyms (ES/EN). A header maps to the first field that lists it.
 */
const COLUMN_SYNONYMS: Array<[ParsedField, string[]]> = [
  ['date', ['date', 'fecha', 'date_invoice', 'invoice_date', 'fecha_factura']],
  ['supplier', ['supplier', 'proveedor', 'vendor', 'empresa', 'company']],
  ['category', ['category', 'categoria', 'categoría', 'tipo', 'type', 'concept', 'concepto']],
  ['usage', ['usage', 'consumo', 'consumption', 'quantity', 'cantidad', 'amount']],
  ['unit', ['unit', 'unidad', 'units', 'uom']],
  ['cost', ['cost', 'coste', 'importe', 'total', 'precio', 'price']],
  ['invoiceNumber', ['invoice', 'invoice_number', 'factura', 'numero_factura', 'n_factura']],
  ['notes', ['notes', 'observaciones', 'comments', 'comentarios', 'description']],
];

const KNOWN_SUPPLIERS = ['Endesa', 'Iberdrola', 'Naturgy', 'Repsol', 'Cepsa', 'Gas Natural'];

/**
 * Convert Excel date serial number to a UTC Date
 * Excel dates are stored as days since 1899-12-30 (with the 1900 leap year bug)
 */
function excelSerialToDate(serial: number): Date {
  const excelEpoch = Date.UTC(1899, 11, 30);
  const msPerDay = 24 * 60 * 60 * 1000;
  return new Date(excelEpoch + Math.round(serial * msPerDay));
}

/**
 * Parse a number written either way round: "1.234,56", "1,234.56", "210.50",
 * "187,45 €". A lone dot followed by exactly three digits is read as a
 * thousands separator ("1.250" is 1250).
 */
export function parseLocaleNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  let cleaned = value.trim().replace(/[^\d.,-]/g, '');
  if (cleaned === '' || cleaned === '-') return null;

  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever separator comes last is the decimal one
    cleaned = lastComma > lastDot
      ? cleaned.replace(/\./g, '').replace(',', '.')
      : cleaned.replace(/,/g, '');
  } else if (lastComma >= 0) {
    cleaned = /^-?\d{1,3}(,\d{3}){2,}$/.test(cleaned) ? cleaned.replace(/,/g, '') : cleaned.replace(',', '.');
  } else if (/^-?\d{1,3}(\.\d{3})+$/.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, '');
  }

  const num = parseFloat(cleaned);
  return isNaN(num) ? null : num;
}

/**
 * Parse DD/MM/YYYY, YYYY-MM-DD, DD-MM-YYYY, DD.MM.YYYY or an Excel serial into a UTC date
 */
export function parseDateValue(value: unknown): Date | null {
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') return value > 0 ? excelSerialToDate(value) : null;
  if (typeof value !== 'string') return null;

  const text = value.trim();
  const iso = text.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  const european = text.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/);

  let parts: { year: number; month: number; day: number };
  if (iso) {
    parts = { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
  } else if (european) {
    parts = { year: Number(european[3]), month: Number(european[2]), day: Number(european[1]) };
  } else {
    return null;
  }

  const { year, month, day } = parts;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers such as 31/02
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

/**
 * Map spreadsheet headers to parsed fields
 */
function mapColumns(headers: string[]): Map<string, ParsedField> {
  const columnMap = new Map<string, ParsedField>();
  const taken = new Set<ParsedField>();

  for (const header of headers) {
    const key = header.trim().toLowerCase();
    const match = COLUMN_SYNONYMS.find(([field, synonyms]) => !taken.has(field) && synonyms.includes(key));
    if (match) {
      columnMap.set(header, match[0]);
      taken.add(match[0]);
    }
  }

  return columnMap;
}

function extractRow(row: Record<string, unknown>, columnMap: Map<string, ParsedField>): ParsedRow | null {
  const record: ParsedRow = {};

  columnMap.forEach((field, header) => {
    const value = row[header];
    if (value === undefined || value === null || value === '') return;

    switch (field) {
      case 'usage':
      case 'cost': {
        const num = parseLocaleNumber(value);
        if (num !== null) record[field] = num;
        break;
      }
      case 'date': {
        const date = parseDateValue(value);
        if (date) record.date = date;
        break;
      }
      default:
        record[field] = String(value).trim();
    }
  });

  // Must have at least usage or cost
  return record.usage !== undefined || record.cost !== undefined ? record : null;
}

/**
 * Parse the first sheet of a CSV or XLSX file into rows
 */
export function parseSpreadsheet(buffer: Buffer): ParsedRow[] {
  // raw: keep CSV cells as text so locale-specific numbers and dates are parsed here
  const workbook = XLSX.read(buffer, { type: 'buffer', raw: true });
  const [firstSheet] = workbook.SheetNames;
  if (!firstSheet) {
    throw new Error('Spreadsheet contains no sheets');
  }

  // defval: blank cells still produce a key, so every header is present on every row
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[firstSheet], { defval: '' });
  const headers = rows.length > 0 ? Object.keys(rows[0]) : [];
  const columnMap = mapColumns(headers);

  const parsed: ParsedRow[] = [];
  for (const row of rows) {
    const record = extractRow(row, columnMap);
    if (record) parsed.push(record);
  }

  console.log(`[Parser] Parsed spreadsheet: ${parsed.length} of ${rows.length} rows kept`);
  return parsed;
}

function extractSupplier(text: string): string | undefined {
  const lower = text.toLowerCase();
  return KNOWN_SUPPLIERS.find(supplier => lower.includes(supplier.toLowerCase()));
}

function extractInvoiceNumber(text: string): string | undefined {
  const patterns = [
    /N[úu]mero\s+(?:de\s+)?factura[:\s]+([A-Z0-9-]+)/i,
    /Factura\s+n[úu]m\.\s*([A-Z0-9-]+)/i,
    /Invoice\s+(?:number|#)[:\s]+([A-Z0-9-]+)/i,
  ];
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) return match[1];
  }
  return undefined;
}

function extractDate(text: string): Date | undefined {
  const match = text.match(/(\d{1,2})[/-](\d{1,2})[/-](\d{4})/);
  return match ? parseDateValue(`${match[1]}/${match[2]}/${match[3]}`) ?? undefined : undefined;
}

/**
 * Look for an amount in euros within `window` characters of `position`
 */
function extractCostNear(text: string, position: number, window = 200): number | undefined {
  const snippet = text.slice(Math.max(0, position - window), Math.min(text.length, position + window));
  const patterns = [
    /([0-9][0-9.,]*)\s*€/,
    /€\s*([0-9][0-9.,]*)/,
    /Total[:\s]+([0-9][0-9.,]*)/i,
    /Importe[:\s]+([0-9][0-9.,]*)/i,
  ];
  for (const pattern of patterns) {
    const match = snippet.match(pattern);
    const cost = match ? parseLocaleNumber(match[1]) : null;
    if (cost !== null && cost > 0) return cost;
  }
  return undefined;
}

function extractQuantity(text: string, patterns: RegExp[]): { usage: number; index: number } | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match) continue;
    const usage = parseLocaleNumber(match[1]);
    if (usage !== null && usage > 0) return { usage, index: match.index };
  }
  return null;
}

/**
 * Extract consumption lines from OCR text of a utility bill or fuel receipt
 */
export function parseBillText(text: string): ParsedRow[] {
  const shared = {
    supplier: extractSupplier(text) ?? 'Unknown',
    date: extractDate(text),
    invoiceNumber: extractInvoiceNumber(text),
  };
  const rows: ParsedRow[] = [];

  const electricity = extractQuantity(text, [
    /Consumo[:\s]+([0-9][0-9.,]*)\s*kWh/i,
    /([0-9][0-9.,]*)\s*kWh/i,
    /Energ[íi]a consumida[:\s]+([0-9][0-9.,]*)/i,
  ]);
  if (electricity) {
    rows.push({ ...shared, category: 'electricity', usage: electricity.usage, unit: 'kWh', cost: extractCostNear(text, electricity.index) });
  }

  const gas = extractQuantity(text, [
    /Consumo[:\s]+([0-9][0-9.,]*)\s*m[³3]/i,
    /([0-9][0-9.,]*)\s*m[³3]/i,
    /Gas natural[:\s]+([0-9][0-9.,]*)/i,
  ]);
  if (gas) {
    rows.push({ ...shared, category: 'natural_gas', usage: gas.usage, unit: 'm3', cost: extractCostNear(text, gas.index) });
  }

  const fuel = text.match(/(Diesel|Gas[óo]leo|Gasolina)[:\s]+([0-9][0-9.,]*)\s*L/i);
  if (fuel && fuel.index !== undefined) {
    const usage = parseLocaleNumber(fuel[2]);
    if (usage !== null && usage > 0) {
      const category = /gasolina/i.test(fuel[1]) ? 'petrol' : 'diesel';
      rows.push({ ...shared, category, usage, unit: 'liters', cost: extractCostNear(text, fuel.index) });
    }
  }

  console.log(`[Parser] Parsed bill text: ${rows.length} records extracted`);
  return rows;
}

export interface DocumentContent {
  fileType: Document['fileType'];
  buffer?: Buffer;
  text?: string;
}

/**
 * Extract rows from a document. PDFs and images must arrive as OCR text.
 */
export function parseDocument(content: DocumentContent): ParsedRow[] {
  switch (content.fileType) {
    case 'csv':
    case 'xlsx':
      if (!content.buffer) throw new Error(`A file buffer is required for ${content.fileType} documents`);
      return parseSpreadsheet(content.buffer);
    case 'pdf':
    case 'png':
    case 'jpg':
      if (content.text === undefined) throw new Error(`OCR text is required for ${content.fileType} documents`);
      return parseBillText(content.text);
  }
}
