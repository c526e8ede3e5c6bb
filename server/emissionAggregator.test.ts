import { describe, expect, it } from 'vitest';
import { aggregate, aggregateRecords, monthKey, rankSuppliers, yearRange } from './emissionAggregator';
import { createMemoryStore } from './memoryStore';
import { makeRecord, utcDate } from './testFixtures';

describe('aggregateRecords', () => {
  it('splits the total across scopes', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, category: 'natural_gas', scope: 1, co2e: 10 }),
      makeRecord({ id: 2, category: 'electricity', scope: 2, co2e: 20 }),
      makeRecord({ id: 3, category: 'freight_transport', scope: 3, co2e: 5 }),
    ]);

    expect(result.totalCo2e).toBe(35);
    expect(result.scope1Co2e).toBe(10);
    expect(result.scope2Co2e).toBe(20);
    expect(result.scope3Co2e).toBe(5);
    expect(result.scope1Co2e + result.scope2Co2e + result.scope3Co2e).toBe(result.totalCo2e);
  });

  it('counts records without a scope in the total only', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, scope: 2, co2e: 20 }),
      makeRecord({ id: 2, category: 'custom', scope: null, co2e: 3 }),
    ]);

    expect(result.totalCo2e).toBe(23);
    expect(result.scope2Co2e).toBe(20);
    expect(result.scope1Co2e + result.scope2Co2e + result.scope3Co2e).toBeLessThanOrEqual(result.totalCo2e);
  });

  it('reports coverage as the share of records with co2e', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, co2e: 10 }),
      makeRecord({ id: 2, co2e: 10 }),
      makeRecord({ id: 3, co2e: 10 }),
      makeRecord({ id: 4, category: 'unknown_widget', scope: null, co2e: null }),
    ]);

    expect(result.dataCoveragePct).toBe(75);
    expect(result.recordCount).toBe(4);
    expect(result.totalCo2e).toBe(30);
  });

  it('rounds coverage to two decimals', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, co2e: 10 }),
      makeRecord({ id: 2, co2e: null }),
      makeRecord({ id: 3, co2e: null }),
    ]);

    expect(result.dataCoveragePct).toBe(33.33);
  });

  it('keeps coverage under 100 when a record is unresolved', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, co2e: 23.3 }),
      makeRecord({ id: 2, category: 'unknown_widget', scope: null, co2e: null }),
    ]);

    expect(result.dataCoveragePct).toBeLessThan(100);
  });

  it('builds a sparse monthly series in ascending order', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, co2e: 4, date: utcDate('2024-03-10') }),
      makeRecord({ id: 2, co2e: 1, date: utcDate('2024-01-05') }),
      makeRecord({ id: 3, co2e: 2, date: utcDate('2024-03-20') }),
      makeRecord({ id: 4, co2e: null, date: utcDate('2024-02-11') }),
    ]);

    expect(result.monthlySeries).toEqual([
      { month: '2024-01', co2e: 1 },
      { month: '2024-03', co2e: 6 },
    ]);
  });

  it('sums two records in the same month into one entry', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, co2e: 1.5, date: utcDate('2024-05-02') }),
      makeRecord({ id: 2, co2e: 2.5, date: utcDate('2024-05-28') }),
    ]);

    expect(result.monthlySeries).toEqual([{ month: '2024-05', co2e: 4 }]);
  });

  it('lists categories in the order they first appear', () => {
    const result = aggregateRecords([
      makeRecord({ id: 1, category: 'electricity', co2e: 2 }),
      makeRecord({ id: 2, category: 'diesel', scope: 1, co2e: 7 }),
      makeRecord({ id: 3, category: 'electricity', co2e: 3 }),
      makeRecord({ id: 4, category: 'unknown_widget', scope: null, co2e: null }),
    ]);

    expect(result.categoryBreakdown).toEqual([
      { category: 'electricity', co2e: 5 },
      { category: 'diesel', co2e: 7 },
    ]);
  });

  it('applies an inclusive UTC date range and drops undated records', () => {
    const result = aggregateRecords(
      [
        makeRecord({ id: 1, co2e: 1, date: utcDate('2023-12-31') }),
        makeRecord({ id: 2, co2e: 2, date: utcDate('2024-01-01') }),
        makeRecord({ id: 3, co2e: 4, date: new Date('2024-12-31T23:00:00.000Z') }),
        makeRecord({ id: 4, co2e: 8, date: null }),
      ],
      yearRange(2024)
    );

    expect(result.totalCo2e).toBe(6);
    expect(result.recordCount).toBe(2);
  });

  it('includes undated records when no range is given', () => {
    const result = aggregateRecords([makeRecord({ co2e: 8, date: null })]);

    expect(result.totalCo2e).toBe(8);
    expect(result.monthlySeries).toEqual([]);
  });

  it('returns zeros for an empty input', () => {
    expect(aggregateRecords([])).toEqual({
      totalCo2e: 0,
      scope1Co2e: 0,
      scope2Co2e: 0,
      scope3Co2e: 0,
      dataCoveragePct: 0,
      recordCount: 0,
      monthlySeries: [],
      categoryBreakdown: [],
    });
  });

  it('gives the same result when run twice over the same records', () => {
    const records = [
      makeRecord({ id: 1, co2e: 0.1, date: utcDate('2024-02-01') }),
      makeRecord({ id: 2, category: 'diesel', scope: 1, co2e: 0.2, date: utcDate('2024-02-15') }),
    ];

    expect(aggregateRecords(records)).toEqual(aggregateRecords(records));
  });
});

describe('monthKey', () => {
  it('uses the UTC calendar month', () => {
    expect(monthKey(new Date('2024-01-31T23:30:00.000Z'))).toBe('2024-01');
    expect(monthKey(utcDate('2024-11-01'))).toBe('2024-11');
  });
});

describe('rankSuppliers', () => {
  it('orders suppliers by total co2e and keeps the top entries', () => {
    const ranked = rankSuppliers(
      [
        makeRecord({ supplier: 'Endesa', co2e: 10 }),
        makeRecord({ supplier: 'Repsol', co2e: 30 }),
        makeRecord({ supplier: 'Endesa', co2e: 25 }),
        makeRecord({ supplier: 'Naturgy', co2e: 5 }),
        makeRecord({ supplier: null, co2e: 100 }),
        makeRecord({ supplier: 'Cepsa', co2e: null }),
      ],
      2
    );

    expect(ranked).toEqual([
      { supplier: 'Endesa', co2e: 35 },
      { supplier: 'Repsol', co2e: 30 },
    ]);
  });
});

describe('aggregate', () => {
  it('reads only the requested company from the store', async () => {
    const store = createMemoryStore({
      records: [
        makeRecord({ id: 1, companyId: 1, co2e: 10 }),
        makeRecord({ id: 2, companyId: 2, co2e: 99 }),
      ],
    });

    const result = await aggregate(store, 1, yearRange(2024));

    expect(result.totalCo2e).toBe(10);
    expect(result.recordCount).toBe(1);
  });
});
