import { describe, it, expect } from 'vitest';
import { findSteelGrade, STEEL_E_KGF_CM2 } from '../standards/AISC360';
import { SectionNotFoundError } from '../standards/errors';
import { withGrade, WSectionLibrary } from './WSectionLibrary';

describe('WSectionLibrary', () => {
  it('loads the full catalogue', () => {
    expect(WSectionLibrary.size).toBe(193);
  });

  it('looks up designations case-insensitively', () => {
    const section = WSectionLibrary.getSection(' w8x10 ');
    expect(section.designation).toBe('W8X10');
    expect(section.d).toBe(20.04);
    expect(section.bf).toBe(10.01);
    expect(section.A).toBe(19.1);
    expect(section.Zx).toBe(145);
    expect(section.E).toBe(STEEL_E_KGF_CM2);
    expect(section.Fy).toBe(3515);
    expect(section.Fu).toBe(4570);
  });

  it('returns undefined from findSection for an unknown name', () => {
    expect(WSectionLibrary.findSection('W99X1')).toBeUndefined();
  });

  it('throws from getSection for an unknown name', () => {
    expect(() => WSectionLibrary.getSection('W99X1')).toThrow(SectionNotFoundError);
    expect(() => WSectionLibrary.getSection('W99X1')).toThrow(
      "Section 'W99X1' not found. Use listSections() to see available designations."
    );
  });

  it('applies a steel grade on lookup', () => {
    const a36 = findSteelGrade('a36');
    expect(a36).toBeDefined();
    if (!a36) return;
    const section = WSectionLibrary.getSection('W8X10', a36);
    expect(section.Fy).toBe(2531);
    expect(section.Fu).toBe(4078);
  });

  it('filters by plain prefix', () => {
    expect(WSectionLibrary.listSections('W8')).toHaveLength(13);
    expect(WSectionLibrary.listSections('w4')).toEqual([
      'W40X331', 'W40X397', 'W40X503', 'W44X230', 'W44X290', 'W44X335', 'W4X13',
    ]);
  });

  it('lists the members of one series', () => {
    expect(WSectionLibrary.listSectionsInSeries('w4')).toEqual(['W4X13']);
    expect(WSectionLibrary.listSectionsInSeries('W8')).toEqual(WSectionLibrary.listSections('W8'));
    expect(WSectionLibrary.listSectionsInSeries('W7')).toEqual([]);
  });

  it('lists every designation without a prefix', () => {
    const all = WSectionLibrary.listSections();
    expect(all).toHaveLength(193);
    expect(all[0]).toBe('W10X100');
  });

  it('orders series by nominal depth', () => {
    const series = WSectionLibrary.listSeries();
    expect(series).toHaveLength(17);
    expect(series[0]).toBe('W4');
    expect(series.slice(-2)).toEqual(['W40', 'W44']);
  });

  it('compares two sections property by property', () => {
    const rows = WSectionLibrary.compareSections('W8X10', 'W8X10');
    expect(rows.map(r => r.property)).toEqual(['d', 'bf', 'tf', 'tw', 'A', 'Ix', 'Iy', 'Sx', 'Sy', 'Zx', 'Zy', 'rx', 'ry']);
    expect(rows.every(r => r.differencePct === 0)).toBe(true);

    const [depth] = WSectionLibrary.compareSections('W8X10', 'W14X90');
    expect(depth.unit).toBe('cm');
    expect(depth.first).toBe(20.04);
    expect(depth.second).toBe(28.19);
    expect(depth.differencePct).toBeCloseTo(((28.19 - 20.04) / 20.04) * 100, 10);
  });
});

describe('withGrade', () => {
  it('copies the section with new stresses', () => {
    const section = WSectionLibrary.getSection('W8X10');
    const graded = withGrade(section, { name: 'test', Fy: 1000, Fu: 2000 });
    expect(graded.Fy).toBe(1000);
    expect(graded.Fu).toBe(2000);
    expect(graded.A).toBe(section.A);
    expect(section.Fy).toBe(3515);
  });
});
