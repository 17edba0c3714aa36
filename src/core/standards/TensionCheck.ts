/**
 * Tension Check: AISC 360 Chapter D
 * Tensile yielding on the gross section (D2-1) and tensile rupture on the
 * net section (D2-2).
 */

import { type IResistanceFactors, resolveResistanceFactors } from './AISC360';
import { requireCapacity } from './errors';
import type { ILoadConditions, ISectionProperties, ITensionResult } from './types';

export function checkTension(
  section: ISectionProperties,
  loads: ILoadConditions,
  factors?: Partial<IResistanceFactors>
): ITensionResult {
  const phi = resolveResistanceFactors(factors);

  // D2-1: yielding on the gross section
  const PnYielding = section.Fy * section.A;
  const PtYielding = phi.tensionYielding * PnYielding;

  // D2-2: rupture on the net section
  // Ae taken as the gross area; no hole or shear lag deduction
  const Ae = section.A;
  const PnRupture = section.Fu * Ae;
  const PtRupture = phi.tensionRupture * PnRupture;

  const Pt = requireCapacity('tension', Math.min(PtYielding, PtRupture));
  const ratio = Math.abs(loads.Pu) / Pt;

  return {
    kind: 'tension',
    PnYielding,
    PtYielding,
    PnRupture,
    PtRupture,
    Pt,
    Pu: loads.Pu,
    ratio,
    status: ratio <= 1.0 ? 'OK' : 'FAIL',
    governingMode: PtYielding < PtRupture ? 'yielding' : 'rupture',
    equations: ['D2-1', 'D2-2'],
  };
}
