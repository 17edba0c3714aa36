import { describe, it, expect } from 'vitest';
import { WSectionLibrary } from '../section/WSectionLibrary';
import { checkCompressionStandard } from './CompressionCheck';
import { checkStrongAxisFlexure, checkWeakAxisFlexure } from './FlexureCheck';
import { checkInteraction } from './InteractionCheck';
import type { ILoadConditions } from './types';

const section = WSectionLibrary.getSection('W8X10');
const base: ILoadConditions = { Pu: -1, Mux: 1, Muy: 1, L: 300, Lx: 300, Ly: 300, Lt: 300 };
const Pc = checkCompressionStandard(section, base).Pc;
const Mcx = checkStrongAxisFlexure(section, base).Mb;
const Mcy = checkWeakAxisFlexure(section, base).Mb;

function evaluate(loads: ILoadConditions) {
  const result = checkInteraction(loads, {
    compression: checkCompressionStandard(section, loads),
    strongAxisFlexure: checkStrongAxisFlexure(section, loads),
    weakAxisFlexure: checkWeakAxisFlexure(section, loads),
  });
  if (result.outcome !== 'evaluated') throw new Error('expected an evaluated interaction');
  return result;
}

describe('checkInteraction', () => {
  it('uses H1-1a when Pr/Pc is 0.5', () => {
    const r = evaluate({ ...base, Pu: -0.5 * Pc, Mux: 0.45 * Mcx, Muy: 0 });
    expect(r.equation).toBe('H1-1a');
    expect(r.PrPc).toBe(0.5);
    expect(r.value).toBeCloseTo(0.5 + (8 / 9) * 0.45, 10);
    expect(r.ratio).toBe(r.value);
    expect(r.status).toBe('OK');
  });

  it('adds both bending axes to H1-1a', () => {
    const r = evaluate({ ...base, Pu: -0.5 * Pc, Mux: 0.3 * Mcx, Muy: 0.2 * Mcy });
    expect(r.equation).toBe('H1-1a');
    expect(r.PrPc).toBe(0.5);
    expect(r.MrxMcx).toBeCloseTo(0.3, 12);
    expect(r.MryMcy).toBeCloseTo(0.2, 12);
    expect(r.Mcy).toBe(Mcy);
    expect(r.value).toBeCloseTo(0.5 + (8 / 9) * (0.3 + 0.2), 10);
    expect(r.status).toBe('OK');
  });

  it('uses H1-1b below the axial threshold', () => {
    const r = evaluate({ ...base, Pu: -0.1 * Pc, Mux: 0.3 * Mcx, Muy: 0.2 * Mcy });
    expect(r.equation).toBe('H1-1b');
    expect(r.value).toBeCloseTo(0.05 + 0.3 + 0.2, 10);
    expect(r.equations).toEqual(['H1-1b']);
  });

  it('jumps across the 0.2 boundary', () => {
    const below = evaluate({ ...base, Pu: -(0.2 - 1e-9) * Pc, Mux: 0.5 * Mcx, Muy: 0 });
    const above = evaluate({ ...base, Pu: -(0.2 + 1e-9) * Pc, Mux: 0.5 * Mcx, Muy: 0 });
    expect(below.equation).toBe('H1-1b');
    expect(above.equation).toBe('H1-1a');
    expect(below.value).toBeCloseTo(0.6, 6);
    expect(above.value).toBeCloseTo(0.2 + 4 / 9, 6);
  });

  it('uses H1-1a when Pr/Pc is exactly 0.2', () => {
    const loads: ILoadConditions = { ...base, Pu: -1000, Mux: 0.5 * Mcx, Muy: 0 };
    const r = checkInteraction(loads, {
      compression: { ...checkCompressionStandard(section, loads), Pc: 5000 },
      strongAxisFlexure: checkStrongAxisFlexure(section, loads),
    });
    if (r.outcome !== 'evaluated') throw new Error('expected an evaluated interaction');
    expect(r.PrPc).toBe(0.2);
    expect(r.equation).toBe('H1-1a');
    expect(r.value).toBeCloseTo(0.2 + 4 / 9, 10);
  });

  it('fails above unity', () => {
    const r = evaluate({ ...base, Pu: -0.8 * Pc, Mux: 0.5 * Mcx, Muy: 0 });
    expect(r.status).toBe('FAIL');
  });

  it('counts a missing flexure axis as zero', () => {
    const loads: ILoadConditions = { ...base, Pu: -0.5 * Pc, Mux: 0.45 * Mcx, Muy: 0.3 * Mcy };
    const r = checkInteraction(loads, {
      compression: checkCompressionStandard(section, loads),
      strongAxisFlexure: checkStrongAxisFlexure(section, loads),
    });
    expect(r.outcome).toBe('evaluated');
    if (r.outcome === 'evaluated') {
      expect(r.Mcy).toBe(0);
      expect(r.MryMcy).toBe(0);
      expect(r.value).toBeCloseTo(0.9, 10);
    }
  });

  it('reports a missing compression result', () => {
    const r = checkInteraction(base, {});
    expect(r).toEqual({
      kind: 'interaction',
      outcome: 'missing-prerequisite',
      status: 'ERROR',
      note: 'A compression check result is required for the interaction check',
    });
  });
});
