/**
 * Field Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  cleanText,
  normalizeFields,
  normalizeHeadOfGovernment,
  normalizeLabel,
  normalizeValue,
  normalizeWebsite,
  parseDecimal,
  parseInteger,
  parsePopulation,
  resolveLabel,
  truncateText,
} from '../../../extraction/field-normalizer.js';

describe('cleanText', () => {
  it('should drop footnote markers and collapse whitespace', () => {
    expect(cleanText('  Bonn[1] am \n Rhein[Anm. 2] ')).toBe('Bonn am Rhein');
  });
});

describe('truncateText', () => {
  it('should return text within the limit unchanged', () => {
    expect(truncateText('Bonn', 4)).toBe('Bonn');
    expect(truncateText('Bonn', 10)).toBe('Bonn');
  });

  it('should not split a surrogate pair at the cut', () => {
    expect(truncateText('ab\u{1F3F0}cd', 3)).toBe('ab');
    expect(truncateText('ab\u{1F3F0}cd', 4)).toBe('ab\u{1F3F0}');
  });

  it('should drop whitespace left at the cut', () => {
    expect(truncateText('Bonn am Rhein', 5)).toBe('Bonn');
  });

  it('should be a no-op on its own output', () => {
    for (const limit of [0, 1, 2, 3, 4, 5, 6]) {
      const once = truncateText('ab\u{1F3F0}c d', limit);
      expect(once.length).toBeLessThanOrEqual(limit);
      expect(truncateText(once, limit)).toBe(once);
    }
  });
});

describe('normalizeLabel', () => {
  it('should lower-case and strip trailing colons', () => {
    expect(normalizeLabel('Einwohner:[2] ')).toBe('einwohner');
    expect(normalizeLabel('Kfz-Kennzeichen : ')).toBe('kfz-kennzeichen');
  });
});

describe('resolveLabel', () => {
  it('should map label variants to their attribute', () => {
    expect(resolveLabel('Einwohner: 31. Dez. 2023')?.mapping.attribute).toBe('population');
    expect(resolveLabel('Fläche (km²)')?.mapping.attribute).toBe('areaKm2');
    expect(resolveLabel('Höhe ü. NHN')?.mapping.attribute).toBe('elevationM');
    expect(resolveLabel('Bürgermeisterin')?.mapping.attribute).toBe('mayor');
  });

  it('should prefer the longest matching variant', () => {
    expect(resolveLabel('Area code')?.mapping.attribute).toBe('areaCode');
    expect(resolveLabel('Area')?.mapping.attribute).toBe('areaKm2');
    expect(resolveLabel('Kfz-Kennzeichen')?.mapping.label).toBe('kfz-kennzeichen');
  });

  it('should not treat population density as population', () => {
    expect(resolveLabel('Bevölkerungsdichte')).toBeNull();
    expect(resolveLabel('Bevölkerung')?.mapping.attribute).toBe('population');
  });

  it('should rank earlier variants higher', () => {
    const einwohner = resolveLabel('Einwohner');
    const bevoelkerung = resolveLabel('Bevölkerung');

    expect(einwohner?.priority).toBe(0);
    expect(bevoelkerung?.priority).toBe(1);
  });

  it('should return null for unknown or empty labels', () => {
    expect(resolveLabel('Partnerstädte')).toBeNull();
    expect(resolveLabel(' [1] ')).toBeNull();
  });
});

describe('value parsers', () => {
  it('should read grouped integers', () => {
    expect(parseInteger('653.253')).toBe(653253);
    expect(parseInteger('64 m ü. NHN')).toBe(64);
    expect(parseInteger('k. A.')).toBeNull();
  });

  it('should read decimal-comma numbers', () => {
    expect(parseDecimal('45,7 km²')).toBe(45.7);
    expect(parseDecimal('160,85')).toBe(160.85);
    expect(parseDecimal('unbekannt')).toBeNull();
  });

  it('should split population and reference date', () => {
    expect(parsePopulation('12.345 (2021)')).toEqual({ population: 12345, populationDate: '2021' });
    expect(parsePopulation('31.337')).toEqual({ population: 31337, populationDate: null });
    expect(parsePopulation('(31. Dez. 2023)')).toEqual({
      population: null,
      populationDate: '31. Dez. 2023',
    });
  });

  it('should add a scheme to bare website values', () => {
    expect(normalizeWebsite('www.bonn.de')).toBe('https://www.bonn.de');
    expect(normalizeWebsite('http://www.bonn.de')).toBe('http://www.bonn.de');
    expect(normalizeWebsite('   ')).toBeNull();
  });

  it('should strip party annotations from the head of government', () => {
    expect(normalizeHeadOfGovernment('Jane Doe (SPD)')).toBe('Jane Doe');
    expect(normalizeHeadOfGovernment('(parteilos)')).toBeNull();
  });

  it('should dispatch on the attribute', () => {
    expect(normalizeValue('elevationM', '120 m')).toEqual({ elevationM: 120 });
    expect(normalizeValue('district', ' Kreis Euskirchen[3] ')).toEqual({
      district: 'Kreis Euskirchen',
    });
    expect(normalizeValue('areaKm2', 'k. A.')).toBeNull();
  });
});

describe('normalizeFields', () => {
  it('should let the higher-priority variant win regardless of row order', () => {
    const { fields, rejected } = normalizeFields([
      { label: 'Bevölkerung', value: '1.000' },
      { label: 'Einwohner', value: '2.000 (2022)' },
    ]);

    expect(fields).toEqual({ population: 2000, populationDate: '2022' });
    expect(rejected).toEqual([]);
  });

  it('should keep the first row of the same variant', () => {
    const { fields } = normalizeFields([
      { label: 'Einwohner', value: '5' },
      { label: 'Einwohner', value: '6' },
    ]);

    expect(fields.population).toBe(5);
  });

  it('should fall back to a later synonym when the preferred value is unusable', () => {
    const { fields, rejected } = normalizeFields([
      { label: 'Einwohner:', value: 'k. A.' },
      { label: 'Bevölkerung', value: '700' },
    ]);

    expect(fields).toEqual({ population: 700, populationDate: null });
    expect(rejected).toEqual([{ attribute: 'population', label: 'Einwohner:', raw: 'k. A.' }]);
  });

  it('should ignore unrecognized labels and merge attributes', () => {
    const { fields, rejected } = normalizeFields([
      { label: 'Partnerstädte', value: 'Irgendwo' },
      { label: 'Website', value: 'www.example.org' },
      { label: 'Bürgermeister', value: 'Max Beispiel (CDU)' },
      { label: 'Vorwahl', value: '02253' },
    ]);

    expect(fields).toEqual({
      website: 'https://www.example.org',
      mayor: 'Max Beispiel',
      areaCode: '02253',
    });
    expect(rejected).toEqual([]);
  });
});
