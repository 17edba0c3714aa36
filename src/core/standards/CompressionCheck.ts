/**
 * Compression Check: AISC 360 Chapter E
 * Flexural buckling of members without slender elements (E3) and of members
 * with slender elements through effective widths (E7).
 */

import {
  EFFECTIVE_WIDTH_C1,
  EFFECTIVE_WIDTH_C2,
  E7_FLANGE_LAMBDA_R,
  E7_WEB_LAMBDA_R,
  INELASTIC_SLENDERNESS_LIMIT,
  INELASTIC_STRESS_RATIO_LIMIT,
  type IResistanceFactors,
  resolveResistanceFactors,
} from './AISC360';
import { DegenerateGeometryError, requireCapacity, requirePositive } from './errors';
import { classifySection } from './SectionClassification';
import type {
  BucklingMode,
  ICompressionResult,
  ILoadConditions,
  ISectionClassification,
  ISectionProperties,
  ISlenderCompressionResult,
  ISlenderElementReduction,
  IStandardCompressionResult,
} from './types';

interface IFlexuralBuckling {
  KLrX: number;
  KLrY: number;
  KLr: number;
  Fe: number;
  lambdaC: number;
  Fcr: number;
  bucklingMode: BucklingMode;
}

/**
 * Critical flexural buckling stress for the governing axis (E3-2 .. E3-4).
 * Fy is a parameter so the E7 path can re-run the same regime selection with
 * its reduced yield stress.
 */
function flexuralBuckling(section: ISectionProperties, loads: ILoadConditions, Fy: number): IFlexuralBuckling {
  const E = section.E;
  const KLrX = loads.Lx / requirePositive('rx', section.rx);
  const KLrY = loads.Ly / requirePositive('ry', section.ry);
  const KLr = Math.max(KLrX, KLrY);

  // E3-4; KL/r = 0 gives Fe = Infinity and Fcr = Fy
  const Fe = (Math.PI * Math.PI * E) / (KLr * KLr);
  const lambdaC = Fy / Fe;

  if (KLr <= INELASTIC_SLENDERNESS_LIMIT * Math.sqrt(E / Fy) || lambdaC <= INELASTIC_STRESS_RATIO_LIMIT) {
    // E3-2
    return { KLrX, KLrY, KLr, Fe, lambdaC, Fcr: Math.pow(0.658, lambdaC) * Fy, bucklingMode: 'inelastic' };
  }
  // E3-3
  return { KLrX, KLrY, KLr, Fe, lambdaC, Fcr: 0.877 * Fe, bucklingMode: 'elastic' };
}

function finishCompression(Pn: number, loads: ILoadConditions, phi: number) {
  const Pc = requireCapacity('compression', phi * Pn);
  const Pu = Math.abs(loads.Pu);
  const ratio = Pu / Pc;
  return { Pn, Pc, Pu, ratio, status: ratio <= 1.0 ? 'OK' as const : 'FAIL' as const };
}

/** E3: flexural buckling of members without slender elements */
export function checkCompressionStandard(
  section: ISectionProperties,
  loads: ILoadConditions,
  factors?: Partial<IResistanceFactors>
): IStandardCompressionResult {
  const phi = resolveResistanceFactors(factors);
  const buckling = flexuralBuckling(section, loads, section.Fy);

  return {
    kind: 'compression',
    path: 'standard',
    ...buckling,
    ...finishCompression(buckling.Fcr * section.A, loads, phi.compression),
    equations: ['E3-1', buckling.bucklingMode === 'inelastic' ? 'E3-2' : 'E3-3', 'E3-4'],
  };
}

/**
 * Effective width of one slender element (E7-2, E7-3, E7-5).
 * Fn is the reference value against which the local critical stress is
 * compared.
 */
function reduceElement(
  width: number,
  lambda: number,
  lambdaRCoefficient: number,
  section: ISectionProperties,
  Fn: number
): ISlenderElementReduction {
  const { E, Fy } = section;
  const lambdaR = lambdaRCoefficient * Math.sqrt(E / Fy);

  // E7-5, limited to Fy
  const Fcl = Math.min(EFFECTIVE_WIDTH_C2 * Math.pow(lambdaR / lambda, 2) * Fy, Fy);

  const reduced = lambda > lambdaR;
  let effectiveWidth = width;
  if (reduced) {
    const r = Math.sqrt(Fcl / Fn);
    effectiveWidth = width * (1 - EFFECTIVE_WIDTH_C1 * r) * r;
  }

  return { lambda, lambdaR, Fcl, width, effectiveWidth, reduced };
}

/**
 * E7: members with slender elements.
 *
 * The flange is reduced when slender under compression, the web when slender
 * under flexure. The global buckling check then runs on the effective area
 * with Fy scaled by Ae / A. Can be called for any section: without slender
 * elements Ae = A and the result equals the E3 result.
 */
export function checkCompressionSlender(
  section: ISectionProperties,
  loads: ILoadConditions,
  classification: ISectionClassification = classifySection(section),
  factors?: Partial<IResistanceFactors>
): ISlenderCompressionResult {
  const phi = resolveResistanceFactors(factors);

  // Reference value: the E3 design capacity on gross properties
  const Fn = checkCompressionStandard(section, loads, factors).Pc;

  const h = section.d - 2 * section.tf;
  const { lambdaF, lambdaW } = classification.ratios;

  const flange = classification.flangeCompression === 'slender'
    ? reduceElement(section.bf, lambdaF, E7_FLANGE_LAMBDA_R, section, Fn)
    : undefined;
  const web = classification.webFlexure === 'slender'
    ? reduceElement(h, lambdaW, E7_WEB_LAMBDA_R, section, Fn)
    : undefined;

  const beFlange = flange?.effectiveWidth ?? section.bf;
  const beWeb = web?.effectiveWidth ?? h;

  // Both flanges lose (bf - be) * tf; the web loses (h - be) * tw
  let Ae = section.A - 2 * (section.bf - beFlange) * section.tf - (h - beWeb) * section.tw;
  if (Ae > section.A) Ae = section.A;
  if (!(Ae > 0)) throw new DegenerateGeometryError('Ae', Ae);

  const FyMod = section.Fy * (Ae / section.A);
  const buckling = flexuralBuckling(section, loads, FyMod);

  return {
    kind: 'compression',
    path: 'slender',
    ...buckling,
    ...finishCompression(buckling.Fcr * Ae, loads, phi.compression),
    Fn,
    Ae,
    FyMod,
    beFlange,
    beWeb,
    flange,
    web,
    equations: ['E7-1', 'E7-2', 'E7-3', 'E7-5'],
  };
}

/** Compression check dispatching on the section classification */
export function checkCompression(
  section: ISectionProperties,
  loads: ILoadConditions,
  classification: ISectionClassification = classifySection(section),
  factors?: Partial<IResistanceFactors>
): ICompressionResult {
  if (classification.flangeCompression === 'slender' || classification.webFlexure === 'slender') {
    return checkCompressionSlender(section, loads, classification, factors);
  }
  return checkCompressionStandard(section, loads, factors);
}
