/**
 * Types for AISC 360 wide-flange member checks.
 * Units follow whatever the caller supplies; the bundled catalogue uses
 * cm, cm², cm³, cm⁴, cm⁶ and kgf/cm².
 */

export interface ISectionProperties {
  readonly designation?: string;
  readonly d: number;    // Overall depth
  readonly bf: number;   // Flange width
  readonly tf: number;   // Flange thickness
  readonly tw: number;   // Web thickness
  readonly A: number;    // Gross area
  readonly Ix: number;   // Second moment of area, strong axis
  readonly Sx: number;   // Elastic section modulus, strong axis
  readonly Zx: number;   // Plastic section modulus, strong axis
  readonly rx: number;   // Radius of gyration, strong axis
  readonly Iy: number;   // Second moment of area, weak axis
  readonly Sy: number;   // Elastic section modulus, weak axis
  readonly Zy: number;   // Plastic section modulus, weak axis
  readonly ry: number;   // Radius of gyration, weak axis
  readonly J: number;    // Torsional constant
  readonly Cw: number;   // Warping constant
  readonly ho: number;   // Distance between flange centroids
  readonly Fy: number;   // Yield stress
  readonly Fu: number;   // Ultimate tensile stress
  readonly E: number;    // Modulus of elasticity
}

export interface ILoadConditions {
  readonly Pu: number;   // Axial force (+ tension, - compression)
  readonly Mux: number;  // Strong-axis moment
  readonly Muy: number;  // Weak-axis moment
  readonly L: number;    // Unbraced length
  readonly Lx: number;   // Effective length for strong-axis buckling
  readonly Ly: number;   // Effective length for weak-axis buckling
  readonly Lt: number;   // Unbraced length for lateral-torsional buckling
  readonly Cb?: number;  // Lateral-torsional buckling modification factor (default 1.0)
}

export type ElementClass = 'compact' | 'noncompact' | 'slender';

export type CheckStatus = 'OK' | 'FAIL';

export type FlexureAxis = 'strong' | 'weak';

export interface IWidthThicknessRatios {
  lambdaF: number;       // bf / 2tf
  lambdaW: number;       // (d - 2tf) / tw
  lambdaPFComp: number;
  lambdaRFComp: number;
  lambdaPFFlex: number;
  lambdaRFFlex: number;
  lambdaPWFlex: number;
  lambdaRWFlex: number;
}

export interface ISectionClassification {
  flangeCompression: ElementClass;
  flangeFlexure: ElementClass;
  webFlexure: ElementClass;
  ratios: IWidthThicknessRatios;
}

interface ICheckOutcome {
  ratio: number;          // Demand / design capacity
  status: CheckStatus;
  equations: string[];    // AISC 360 equation references
}

export interface ITensionResult extends ICheckOutcome {
  kind: 'tension';
  PnYielding: number;
  PtYielding: number;
  PnRupture: number;
  PtRupture: number;
  Pt: number;             // Governing design capacity
  Pu: number;             // Applied tension
  governingMode: 'yielding' | 'rupture';
}

export type BucklingMode = 'inelastic' | 'elastic';

interface ICompressionOutcome extends ICheckOutcome {
  kind: 'compression';
  KLrX: number;
  KLrY: number;
  KLr: number;            // Governing slenderness
  Fe: number;             // Elastic buckling stress
  lambdaC: number;        // Fy / Fe with the yield stress actually used
  Fcr: number;
  Pn: number;
  Pc: number;             // Design capacity
  Pu: number;             // Applied compression (absolute)
  bucklingMode: BucklingMode;
}

export interface IStandardCompressionResult extends ICompressionOutcome {
  path: 'standard';
}

/** Local buckling reduction of one slender element */
export interface ISlenderElementReduction {
  lambda: number;
  lambdaR: number;
  Fcl: number;            // Local critical stress, capped at Fy
  width: number;          // Gross element width
  effectiveWidth: number;
  reduced: boolean;       // lambda > lambdaR
}

export interface ISlenderCompressionResult extends ICompressionOutcome {
  path: 'slender';
  Fn: number;             // Reference value taken from the standard-path Pc
  Ae: number;
  FyMod: number;
  beFlange: number;
  beWeb: number;
  flange?: ISlenderElementReduction;
  web?: ISlenderElementReduction;
}

export type ICompressionResult = IStandardCompressionResult | ISlenderCompressionResult;

export type StrongAxisLimitState = 'yielding' | 'inelastic-ltb' | 'elastic-ltb';

export interface IStrongAxisFlexureResult extends ICheckOutcome {
  kind: 'flexure';
  axis: 'strong';
  Lp: number;
  Lr: number;
  Lt: number;
  rts: number;
  Cb: number;
  Mp: number;
  Fcr?: number;           // Only in the elastic LTB regime
  cappedAtPlastic: boolean;
  Mn: number;
  Mb: number;             // Design capacity
  Mu: number;             // Applied moment (absolute)
  limitState: StrongAxisLimitState;
  classification: ElementClass;
}

export type WeakAxisLimitState = 'yielding' | 'flange-local-buckling-noncompact' | 'flange-local-buckling-slender';

export interface IWeakAxisFlexureResult extends ICheckOutcome {
  kind: 'flexure';
  axis: 'weak';
  Mp: number;
  Fcr: number;            // F6-4 elastic local buckling stress
  Mn: number;
  Mb: number;
  Mu: number;
  limitState: WeakAxisLimitState;
  classification: ElementClass;
}

export type IFlexureResult = IStrongAxisFlexureResult | IWeakAxisFlexureResult;

export type InteractionEquation = 'H1-1a' | 'H1-1b';

export interface IInteractionResult extends ICheckOutcome {
  kind: 'interaction';
  outcome: 'evaluated';
  value: number;          // Combined interaction value (same as ratio)
  equation: InteractionEquation;
  PrPc: number;
  MrxMcx: number;
  MryMcy: number;
  Pr: number;
  Pc: number;
  Mrx: number;
  Mcx: number;
  Mry: number;
  Mcy: number;
}

export interface IInteractionMissingPrerequisite {
  kind: 'interaction';
  outcome: 'missing-prerequisite';
  status: 'ERROR';
  note: string;
}

export type IInteractionOutcome = IInteractionResult | IInteractionMissingPrerequisite;

export type CheckName = 'tension' | 'compression' | 'strongAxisFlexure' | 'weakAxisFlexure' | 'interaction';

export interface IMemberCheckSummary {
  status: CheckStatus;
  maxRatio: number;
  governingCheck: CheckName | null;
}

export interface IMemberCheckResult {
  designation?: string;
  classification: ISectionClassification;
  tension?: ITensionResult;
  compression?: ICompressionResult;
  strongAxisFlexure?: IStrongAxisFlexureResult;
  weakAxisFlexure?: IWeakAxisFlexureResult;
  interaction?: IInteractionOutcome;
  summary: IMemberCheckSummary;
}

export interface ILoadCase {
  name: string;
  loads: ILoadConditions;
}

export interface ILoadCaseResult {
  name: string;
  result: IMemberCheckResult;
}

export interface ILoadCasesResult {
  cases: ILoadCaseResult[];
  governingCase: string | null;
  status: CheckStatus;
}
