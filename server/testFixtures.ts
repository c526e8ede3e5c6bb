import type { Company, Document, WaitlistSubmission } from '../drizzle/schema';
import type { EmissionFactor } from './emissionFactorTable';
import type { EmissionRecord } from './emissionsStore';

export const utcDate = (isoDay: string) => new Date(`${isoDay}T00:00:00.000Z`);

export function makeFactor(overrides: Partial<EmissionFactor> = {}): EmissionFactor {
  return {
    category: 'electricity',
    unit: 'kwh',
    factor: 0.233,
    source: 'DEFRA',
    year: 2023,
    region: 'EU',
    notes: null,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<EmissionRecord> = {}): EmissionRecord {
  return {
    id: 1,
    documentId: 1,
    companyId: 1,
    supplier: null,
    category: 'electricity',
    usage: 100,
    unit: 'kwh',
    cost: null,
    scope: 2,
    co2e: 23.3,
    factorSource: 'DEFRA 2023',
    emissionFactor: 0.233,
    date: utcDate('2024-01-15'),
    invoiceNumber: null,
    notes: null,
    createdAt: utcDate('2024-06-01'),
    ...overrides,
  };
}

export function makeCompany(overrides: Partial<Company> = {}): Company {
  return {
    id: 1,
    name: 'Acme Foods',
    email: 'ops@acme.test',
    passwordHash: null,
    sector: 'food',
    country: 'ES',
    size: 40,
    role: 'company',
    createdAt: utcDate('2024-01-01'),
    updatedAt: utcDate('2024-01-01'),
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    id: 1,
    companyId: 1,
    filename: 'bill.csv',
    fileType: 'csv',
    status: 'uploaded',
    errorMessage: null,
    uploadedAt: utcDate('2024-06-01'),
    processedAt: null,
    ...overrides,
  };
}

export function makeSubmission(overrides: Partial<WaitlistSubmission> = {}): WaitlistSubmission {
  return {
    id: 1,
    name: 'Ana Ruiz',
    company: 'Ruiz Logistics',
    email: 'ana@ruiz.test',
    role: 'sme',
    promotedCompanyId: null,
    promotedAt: null,
    createdAt: utcDate('2024-05-01'),
    ...overrides,
  };
}

/**
 * Clock that advances one second per call
 */
export function steppingClock(start = Date.UTC(2025, 0, 1)): () => Date {
  let current = start;
  return () => {
    current += 1000;
    return new Date(current);
  };
}
