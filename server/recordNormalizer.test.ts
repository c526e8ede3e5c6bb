import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { aggregateRecords } from './emissionAggregator';
import { EmissionFactorTable } from './emissionFactorTable';
import { RecordNormalizer, UNRESOLVED_FACTOR_SOURCE } from './recordNormalizer';
import { makeFactor, utcDate } from './testFixtures';

const spain = { country: 'ES' };

function createNormalizer() {
  const table = new EmissionFactorTable(
    [
      makeFactor({ category: 'electricity', unit: 'kwh', factor: 0.233 }),
      makeFactor({ category: 'diesel', unit: 'liters', factor: 2.68, source: 'IPCC', year: 2006 }),
    ],
    { defaultSource: 'DEFRA' }
  );
  return new RecordNormalizer(table);
}

describe('RecordNormalizer', () => {
  let normalizer: RecordNormalizer;

  beforeEach(() => {
    normalizer = createNormalizer();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('computes co2e and scope for electricity and diesel rows', () => {
    const outcomes = normalizer.normalizeBatch(
      [
        { category: 'electricity', usage: 100, unit: 'kwh' },
        { category: 'diesel', usage: 50, unit: 'liters' },
      ],
      spain
    );

    const records = outcomes.flatMap(o => (o.status === 'normalized' ? [o.record] : []));
    expect(records).toHaveLength(2);

    const [electricity, diesel] = records;
    expect(electricity.co2e).toBeCloseTo(23.3, 10);
    expect(electricity.scope).toBe(2);
    expect(electricity.factorSource).toBe('DEFRA 2023');
    expect(diesel.co2e).toBeCloseTo(134.0, 10);
    expect(diesel.scope).toBe(1);
    expect(diesel.factorSource).toBe('IPCC 2006');
    expect(diesel.emissionFactor).toBe(2.68);

    const totals = aggregateRecords(records);
    expect(totals.scope2Co2e).toBeCloseTo(23.3, 10);
    expect(totals.scope1Co2e).toBeCloseTo(134.0, 10);
    expect(totals.totalCo2e).toBeCloseTo(157.3, 10);
  });

  it('maps category and unit synonyms before resolving', () => {
    const record = normalizer.normalizeAndClassify({ category: 'Electricidad', usage: 10, unit: 'kWh' }, spain)._unsafeUnwrap();

    expect(record.category).toBe('electricity');
    expect(record.unit).toBe('kwh');
    expect(record.co2e).toBeCloseTo(2.33, 10);
  });

  it('carries optional fields and parses ISO date strings as UTC days', () => {
    const record = normalizer
      .normalizeAndClassify(
        {
          category: 'diesel',
          usage: 40,
          unit: 'L',
          cost: 62.4,
          date: '2024-03-15',
          supplier: ' Repsol ',
          invoiceNumber: 'T-88',
          notes: 'Van 2',
        },
        spain
      )
      ._unsafeUnwrap();

    expect(record).toMatchObject({
      supplier: 'Repsol',
      unit: 'liters',
      cost: 62.4,
      date: utcDate('2024-03-15'),
      invoiceNumber: 'T-88',
      notes: 'Van 2',
    });
  });

  it('defaults absent optional fields to null', () => {
    const record = normalizer.normalizeAndClassify({ category: 'electricity', usage: 1, unit: 'kwh' }, spain)._unsafeUnwrap();

    expect(record.supplier).toBeNull();
    expect(record.cost).toBeNull();
    expect(record.date).toBeNull();
    expect(record.invoiceNumber).toBeNull();
    expect(record.notes).toBeNull();
  });

  it.each([
    [{ category: 'electricity', usage: 0, unit: 'kwh' }, 'usage must be greater than zero', 'usage'],
    [{ category: 'electricity', usage: -5, unit: 'kwh' }, 'usage must be greater than zero', 'usage'],
    [{ category: 'electricity', usage: '12', unit: 'kwh' }, 'usage must be a number', 'usage'],
    [{ category: 'electricity', unit: 'kwh' }, 'usage is required', 'usage'],
    [{ category: 'electricity', usage: Infinity, unit: 'kwh' }, 'usage must be a finite number', 'usage'],
    [{ category: 'electricity', usage: 3 }, 'unit is required', 'unit'],
    [{ category: 'electricity', usage: 3, unit: '   ' }, 'unit is required', 'unit'],
  ])('rejects %o', (row, message, field) => {
    const result = normalizer.normalizeAndClassify(row, spain);

    expect(result._unsafeUnwrapErr()).toEqual({ type: 'InvalidRecordData', message, field });
  });

  it('rejects dates that are not YYYY-MM-DD', () => {
    const error = normalizer
      .normalizeAndClassify({ category: 'electricity', usage: 3, unit: 'kwh', date: '15/03/2024' }, spain)
      ._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidRecordData');
    expect(error.field).toBe('date');
  });

  it('rejects values that are not objects', () => {
    const error = normalizer.normalizeAndClassify('electricity,100,kwh', spain)._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidRecordData');
    expect(error.field).toBeNull();
  });

  it('infers a missing category from the unit and supplier', () => {
    const record = normalizer.normalizeAndClassify({ usage: 120, unit: 'kWh', supplier: 'Iberdrola' }, spain)._unsafeUnwrap();

    expect(record.category).toBe('electricity');
    expect(record.co2e).toBeCloseTo(27.96, 10);
  });

  it('rejects rows whose category cannot be inferred', () => {
    const error = normalizer.normalizeAndClassify({ usage: 3, unit: 'boxes' }, spain)._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'InvalidRecordData',
      message: 'Could not determine category for unit boxes',
      field: 'category',
    });
  });

  it('keeps rows without a factor as unresolved records', () => {
    const [outcome] = normalizer.normalizeBatch([{ category: 'unknown_widget', usage: 5, unit: 'units' }], spain);

    expect(outcome.status).toBe('unresolved');
    if (outcome.status !== 'unresolved') return;
    expect(outcome.record).toMatchObject({
      category: 'unknown_widget',
      co2e: null,
      scope: null,
      emissionFactor: null,
      factorSource: UNRESOLVED_FACTOR_SOURCE,
    });
    expect(outcome.error.message).toBe('No emission factor found for unknown_widget (units)');
  });

  it('still assigns the scope of a known category when its factor is missing', () => {
    const record = normalizer.normalizeAndClassify({ category: 'natural_gas', usage: 10, unit: 'm3' }, spain)._unsafeUnwrap();

    expect(record.scope).toBe(1);
    expect(record.co2e).toBeNull();
  });

  it('continues past rejected rows in a batch', () => {
    const outcomes = normalizer.normalizeBatch(
      [
        { category: 'electricity', usage: 10, unit: 'kwh' },
        { category: 'electricity', usage: -1, unit: 'kwh' },
        { category: 'diesel', usage: 2, unit: 'liters' },
      ],
      spain
    );

    expect(outcomes.map(o => o.status)).toEqual(['normalized', 'rejected', 'normalized']);
    expect(outcomes[1]).toMatchObject({ rowIndex: 1, error: { field: 'usage' } });
    expect(console.warn).toHaveBeenCalledWith('[Normalizer] Row 1 rejected: usage must be greater than zero');
  });

  it('returns frozen records', () => {
    const record = normalizer.normalizeAndClassify({ category: 'electricity', usage: 1, unit: 'kwh' }, spain)._unsafeUnwrap();

    expect(Object.isFrozen(record)).toBe(true);
  });
});
