import { describe, expect, it } from 'vitest';
import { inferCategory, normalizeCategory, normalizeUnit } from './emissionVocabulary';

describe('normalizeCategory', () => {
  it('maps Spanish and English synonyms to canonical keys', () => {
    expect(normalizeCategory('Electricidad')).toBe('electricity');
    expect(normalizeCategory(' Gas Natural ')).toBe('natural_gas');
    expect(normalizeCategory('Gasóleo')).toBe('diesel');
  });

  it('snake-cases unknown categories', () => {
    expect(normalizeCategory('Office Supplies')).toBe('office_supplies');
  });
});

describe('normalizeUnit', () => {
  it('maps unit spellings to canonical units', () => {
    expect(normalizeUnit('kWh')).toBe('kwh');
    expect(normalizeUnit('Litros')).toBe('liters');
    expect(normalizeUnit('L')).toBe('liters');
    expect(normalizeUnit('m³')).toBe('m3');
    expect(normalizeUnit('€')).toBe('eur');
  });
});

describe('inferCategory', () => {
  it('reads electricity from the unit or the supplier', () => {
    expect(inferCategory('kwh', null)).toBe('electricity');
    expect(inferCategory('eur', 'Iberdrola Clientes')).toBe('electricity');
  });

  it('reads fuels from litres and the supplier name', () => {
    expect(inferCategory('liters', 'Diesel Repsol')).toBe('diesel');
    expect(inferCategory('liters', 'Repsol')).toBe('petrol');
  });

  it('reads gas, transport and spend', () => {
    expect(inferCategory('m3', null)).toBe('natural_gas');
    expect(inferCategory('tonne_km', null)).toBe('freight_transport');
    expect(inferCategory('eur', 'Papeleria Sol')).toBe('purchased_goods');
  });

  it('gives up on anything else', () => {
    expect(inferCategory('boxes', 'Acme')).toBeNull();
  });
});
