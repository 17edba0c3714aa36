import { describe, it, expect } from 'vitest';
import { WSectionLibrary } from '../section/WSectionLibrary';
import { ZeroCapacityError } from './errors';
import { checkTension } from './TensionCheck';
import type { ILoadConditions } from './types';

const loads = (Pu: number): ILoadConditions => ({ Pu, Mux: 0, Muy: 0, L: 300, Lx: 300, Ly: 300, Lt: 300 });

describe('checkTension', () => {
  const section = WSectionLibrary.getSection('W8X10');

  it('takes the smaller of gross yielding and net rupture', () => {
    const r = checkTension(section, loads(30000));
    expect(r.PtYielding).toBeCloseTo(60422.85, 6);
    expect(r.PtRupture).toBeCloseTo(65465.25, 6);
    expect(r.Pt).toBe(r.PtYielding);
    expect(r.governingMode).toBe('yielding');
    expect(r.ratio).toBeCloseTo(0.496500910, 8);
    expect(r.status).toBe('OK');
    expect(r.equations).toEqual(['D2-1', 'D2-2']);
  });

  it('fails above capacity', () => {
    const r = checkTension(section, loads(70000));
    expect(r.ratio).toBeGreaterThan(1);
    expect(r.status).toBe('FAIL');
  });

  it('reports rupture when both limit states give the same capacity', () => {
    const r = checkTension({ ...section, A: 10, Fy: 3000, Fu: 3600 }, loads(1000));
    expect(r.PtYielding).toBe(27000);
    expect(r.PtRupture).toBe(27000);
    expect(r.governingMode).toBe('rupture');
  });

  it('applies resistance factor overrides', () => {
    const r = checkTension(section, loads(30000), { tensionYielding: 0.5 });
    expect(r.PtYielding).toBeCloseTo(0.5 * 3515 * 19.1, 6);
    expect(r.PtRupture).toBeCloseTo(65465.25, 6);
  });

  it('throws when the design capacity is zero', () => {
    expect(() => checkTension(section, loads(1000), { tensionYielding: 0 })).toThrow(ZeroCapacityError);
  });
});
