import { describe, it, expect } from 'vitest';
import { WSectionLibrary } from '../section/WSectionLibrary';
import { checkCompression, checkCompressionSlender, checkCompressionStandard } from './CompressionCheck';
import { DegenerateGeometryError } from './errors';
import type { ILoadConditions, ISectionProperties } from './types';

const column = (Pu: number, length: number): ILoadConditions => ({
  Pu, Mux: 0, Muy: 0, L: length, Lx: length, Ly: length, Lt: length,
});

// Built-up shape with a slender flange and a slender web
const wideFlange: ISectionProperties = {
  d: 40, bf: 60, tf: 0.8, tw: 0.25, A: 120,
  Ix: 30720, Sx: 1536, Zx: 1700, rx: 16,
  Iy: 23520, Sy: 784, Zy: 1200, ry: 14,
  J: 20, Cw: 1.5e7, ho: 39.2,
  Fy: 3515, Fu: 4570, E: 2038902,
};

describe('checkCompressionStandard', () => {
  const section = WSectionLibrary.getSection('W8X10');

  it('uses elastic buckling for a slender column', () => {
    const r = checkCompressionStandard(section, column(-20000, 300));
    expect(r.KLrX).toBeCloseTo(36.6748166, 6);
    expect(r.KLrY).toBeCloseTo(140.1869159, 6);
    expect(r.KLr).toBe(r.KLrY);
    expect(r.Fe).toBeCloseTo(1023.9556213, 5);
    expect(r.bucklingMode).toBe('elastic');
    expect(r.Fcr).toBeCloseTo(0.877 * r.Fe, 8);
    expect(r.Pc).toBeCloseTo(15436.776083, 4);
    expect(r.ratio).toBeCloseTo(1.29560731, 6);
    expect(r.status).toBe('FAIL');
    expect(r.equations).toEqual(['E3-1', 'E3-3', 'E3-4']);
  });

  it('uses inelastic buckling for a stocky column', () => {
    const r = checkCompressionStandard(section, column(-20000, 100));
    expect(r.bucklingMode).toBe('inelastic');
    expect(r.Fcr).toBeCloseTo(Math.pow(0.658, section.Fy / r.Fe) * section.Fy, 8);
    expect(r.equations[1]).toBe('E3-2');
  });

  it('reaches the squash load at zero effective length', () => {
    const r = checkCompressionStandard(section, column(-1, 0));
    expect(r.Fe).toBe(Number.POSITIVE_INFINITY);
    expect(r.Fcr).toBe(section.Fy);
    expect(r.Pc).toBeCloseTo(60422.85, 6);
  });

  it('reports the applied force as a magnitude', () => {
    expect(checkCompressionStandard(section, column(-20000, 300)).Pu).toBe(20000);
  });
});

describe('checkCompressionSlender', () => {
  it('equals the standard path for a section without slender elements', () => {
    const section = WSectionLibrary.getSection('W8X10');
    const loads = column(-20000, 300);
    const standard = checkCompressionStandard(section, loads);
    const slender = checkCompressionSlender(section, loads);
    expect(slender.path).toBe('slender');
    expect(slender.Ae).toBe(section.A);
    expect(slender.FyMod).toBe(section.Fy);
    expect(slender.Pc).toBe(standard.Pc);
    expect(slender.ratio).toBe(standard.ratio);
    expect(slender.flange).toBeUndefined();
    expect(slender.web).toBeUndefined();
  });

  it('reduces the web of W14X22', () => {
    const section = WSectionLibrary.getSection('W14X22');
    const r = checkCompressionSlender(section, column(-20000, 200));
    expect(r.Fn).toBeCloseTo(60427.277673, 4);
    expect(r.web?.reduced).toBe(true);
    expect(r.beWeb).toBeCloseTo(7.65776574, 6);
    expect(r.beFlange).toBe(section.bf);
    expect(r.Ae).toBeCloseTo(36.62938612, 6);
    expect(r.FyMod).toBeCloseTo(3023.7738895, 5);
    expect(r.bucklingMode).toBe('inelastic');
    expect(r.Pc).toBeCloseTo(50018.896609, 4);
    expect(r.ratio).toBeCloseTo(0.39984888, 6);
    expect(r.equations).toEqual(['E7-1', 'E7-2', 'E7-3', 'E7-5']);
  });

  it('reduces a slender flange and a slender web together', () => {
    const r = checkCompressionSlender(wideFlange, column(-10000, 100));
    expect(r.flange?.reduced).toBe(true);
    expect(r.web?.reduced).toBe(true);
    expect(r.Fn).toBeCloseTo(378206.61583, 4);
    expect(r.beFlange).toBeCloseTo(4.59073066, 6);
    expect(r.beWeb).toBeCloseTo(3.62342505, 6);
    expect(r.Ae).toBeCloseTo(22.65102532, 6);
    expect(r.FyMod).toBeCloseTo(663.48628326, 5);
    expect(r.bucklingMode).toBe('inelastic');
    expect(r.Pc).toBeCloseTo(13516.26014, 4);
  });

  it('limits the effective area to the gross area', () => {
    const r = checkCompressionSlender(wideFlange, column(-500, 20000));
    expect(r.beFlange).toBeGreaterThan(wideFlange.bf);
    expect(r.Ae).toBe(wideFlange.A);
    expect(r.FyMod).toBe(wideFlange.Fy);
    expect(r.bucklingMode).toBe('elastic');
    expect(r.Pc).toBeCloseTo(933.93258049, 6);
  });

  it('rejects a non-positive effective area', () => {
    expect(() => checkCompressionSlender({ ...wideFlange, A: 30 }, column(-10000, 100))).toThrow(DegenerateGeometryError);
  });
});

describe('checkCompression', () => {
  it('dispatches on the section classification', () => {
    const loads = column(-20000, 200);
    expect(checkCompression(WSectionLibrary.getSection('W8X10'), loads).path).toBe('standard');
    expect(checkCompression(WSectionLibrary.getSection('W14X22'), loads).path).toBe('slender');
    expect(checkCompression(wideFlange, loads).path).toBe('slender');
  });
});
