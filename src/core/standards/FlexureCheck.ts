/**
 * Flexure Check: AISC 360 Chapter F
 * F2: doubly symmetric I-shaped members bent about the strong axis
 *     (yielding and lateral-torsional buckling).
 * F6: I-shaped members bent about the weak axis (yielding and flange local
 *     buckling).
 */

import { type IResistanceFactors, resolveResistanceFactors } from './AISC360';
import { requireCapacity, requirePositive } from './errors';
import { classifySection } from './SectionClassification';
import type {
  FlexureAxis,
  IFlexureResult,
  ILoadConditions,
  ISectionClassification,
  ISectionProperties,
  IStrongAxisFlexureResult,
  IWeakAxisFlexureResult,
  StrongAxisLimitState,
  WeakAxisLimitState,
} from './types';

/** Lateral-torsional buckling length limits and effective radius of gyration */
export interface ILtbLimits {
  Lp: number;
  Lr: number;
  rts: number;
  /** J·c / (Sx·ho) with c = 1 for doubly symmetric sections */
  torsionTerm: number;
}

export function calculateLtbLimits(section: ISectionProperties): ILtbLimits {
  const { E, Fy, J, Iy, Cw } = section;
  const Sx = requirePositive('Sx', section.Sx);
  const ho = requirePositive('ho', section.ho);
  const c = 1.0;

  // F2-5
  const Lp = 1.76 * section.ry * Math.sqrt(E / Fy);

  // F2-7
  const rts = Math.sqrt(Math.sqrt(Iy * Cw) / Sx);

  // F2-6
  const torsionTerm = (J * c) / (Sx * ho);
  const Lr = 1.95 * rts * (E / (0.7 * Fy)) *
    Math.sqrt(torsionTerm + Math.sqrt(torsionTerm * torsionTerm + 6.76 * Math.pow(0.7 * Fy / E, 2)));

  return { Lp, Lr, rts, torsionTerm };
}

export function checkStrongAxisFlexure(
  section: ISectionProperties,
  loads: ILoadConditions,
  classification: ISectionClassification = classifySection(section),
  factors?: Partial<IResistanceFactors>
): IStrongAxisFlexureResult {
  const phi = resolveResistanceFactors(factors);
  const { E, Fy, Sx, Zx } = section;
  const { Lp, Lr, rts, torsionTerm } = calculateLtbLimits(section);
  const Lt = loads.Lt;
  const Cb = loads.Cb ?? 1.0;
  const Mp = Fy * Zx;

  let Mn: number;
  let Fcr: number | undefined;
  let cappedAtPlastic = false;
  let limitState: StrongAxisLimitState;
  let equation: string;

  if (Lt <= Lp) {
    // F2-1: yielding
    Mn = Mp;
    limitState = 'yielding';
    equation = 'F2-1';
  } else if (Lt <= Lr) {
    // F2-2: inelastic LTB
    Mn = Cb * (Mp - (Mp - 0.7 * Fy * Sx) * (Lt - Lp) / (Lr - Lp));
    limitState = 'inelastic-ltb';
    equation = 'F2-2';
  } else {
    // F2-3, F2-4: elastic LTB
    const slenderness = Lt / rts;
    Fcr = (Cb * Math.PI * Math.PI * E) / (slenderness * slenderness) *
      Math.sqrt(1 + 0.078 * torsionTerm * slenderness * slenderness);
    Mn = Fcr * Sx;
    if (Mn > Mp) {
      Mn = Mp;
      cappedAtPlastic = true;
    }
    limitState = 'elastic-ltb';
    equation = 'F2-3';
  }

  const Mb = requireCapacity('strong-axis flexure', phi.flexure * Mn);
  const Mu = Math.abs(loads.Mux);
  const ratio = Mu / Mb;

  return {
    kind: 'flexure',
    axis: 'strong',
    Lp,
    Lr,
    Lt,
    rts,
    Cb,
    Mp,
    Fcr,
    cappedAtPlastic,
    Mn,
    Mb,
    Mu,
    ratio,
    status: ratio <= 1.0 ? 'OK' : 'FAIL',
    limitState,
    classification: classification.flangeFlexure,
    equations: [equation, 'F2-5', 'F2-6'],
  };
}

export function checkWeakAxisFlexure(
  section: ISectionProperties,
  loads: ILoadConditions,
  classification: ISectionClassification = classifySection(section),
  factors?: Partial<IResistanceFactors>
): IWeakAxisFlexureResult {
  const phi = resolveResistanceFactors(factors);
  const { E, Fy, Sy, Zy } = section;
  const { lambdaF, lambdaPFFlex, lambdaRFFlex } = classification.ratios;
  const Mp = Fy * Zy;

  // F6-4
  const Fcr = (0.7 * E) / (lambdaF * lambdaF);

  let Mn: number;
  let limitState: WeakAxisLimitState;
  let equation: string;

  if (classification.flangeFlexure === 'compact') {
    // F6-1
    Mn = Mp;
    limitState = 'yielding';
    equation = 'F6-1';
  } else if (classification.flangeFlexure === 'noncompact') {
    // F6-2; the reduced moment term is 0.70·Sy²
    Mn = Mp - (Mp - 0.7 * Sy * Sy) * ((lambdaF - lambdaPFFlex) / (lambdaRFFlex - lambdaPFFlex));
    limitState = 'flange-local-buckling-noncompact';
    equation = 'F6-2';
  } else {
    // F6-3
    Mn = Fcr * Sy;
    limitState = 'flange-local-buckling-slender';
    equation = 'F6-3';
  }

  const Mb = requireCapacity('weak-axis flexure', phi.flexure * Mn);
  const Mu = Math.abs(loads.Muy);
  const ratio = Mu / Mb;

  return {
    kind: 'flexure',
    axis: 'weak',
    Mp,
    Fcr,
    Mn,
    Mb,
    Mu,
    ratio,
    status: ratio <= 1.0 ? 'OK' : 'FAIL',
    limitState,
    classification: classification.flangeFlexure,
    equations: [equation],
  };
}

export function checkFlexure(
  section: ISectionProperties,
  loads: ILoadConditions,
  axis: FlexureAxis,
  classification: ISectionClassification = classifySection(section),
  factors?: Partial<IResistanceFactors>
): IFlexureResult {
  return axis === 'strong'
    ? checkStrongAxisFlexure(section, loads, classification, factors)
    : checkWeakAxisFlexure(section, loads, classification, factors);
}
