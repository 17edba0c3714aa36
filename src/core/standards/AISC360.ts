/**
 * AISC 360 Standards Data
 * Reference values for LRFD design of wide-flange members.
 *
 * Stress values are in kgf/cm², the unit system of the bundled W-section
 * catalogue. Callers supplying their own sections must keep units consistent.
 */

// LRFD resistance factors (AISC 360 Chapters D, E, F)
export interface IResistanceFactors {
  tensionYielding: number;  // phi_t, D2(a)
  tensionRupture: number;   // phi_t, D2(b)
  compression: number;      // phi_c, E1
  flexure: number;          // phi_b, F1
}

export const LRFD_RESISTANCE_FACTORS: IResistanceFactors = {
  tensionYielding: 0.9,
  tensionRupture: 0.75,
  compression: 0.9,
  flexure: 0.9,
};

/** Merge a partial override onto the LRFD defaults */
export function resolveResistanceFactors(overrides?: Partial<IResistanceFactors>): IResistanceFactors {
  return { ...LRFD_RESISTANCE_FACTORS, ...overrides };
}

// Width-to-thickness limit coefficients, multiplied by sqrt(E/Fy)
export interface IWidthThicknessLimits {
  lambdaP: number;
  lambdaR: number;
}

export const WIDTH_THICKNESS_COEFFICIENTS = {
  flangeCompression: { lambdaP: 0.56, lambdaR: 1.49 },  // Table B4.1a, cases 1 and 5
  flangeFlexure: { lambdaP: 0.38, lambdaR: 1.0 },       // Table B4.1b, case 10
  webFlexure: { lambdaP: 3.76, lambdaR: 5.7 },          // Table B4.1b, case 15
} as const satisfies Record<string, IWidthThicknessLimits>;

// Effective width imperfection adjustment factors (Table E7.1, case c)
export const EFFECTIVE_WIDTH_C1 = 0.22;
export const EFFECTIVE_WIDTH_C2 = 1.49;

// Local buckling limits used by the E7 effective width reduction
export const E7_FLANGE_LAMBDA_R = 1.03;
export const E7_WEB_LAMBDA_R = 5.7;

// Flexural buckling regime boundaries (E3-2 / E3-3)
export const INELASTIC_SLENDERNESS_LIMIT = 4.71;
export const INELASTIC_STRESS_RATIO_LIMIT = 2.25;

// Interaction equation switch (H1-1a / H1-1b)
export const INTERACTION_AXIAL_THRESHOLD = 0.2;

// Steel material
export const STEEL_E_KGF_CM2 = 2038902;

export interface ISteelGrade {
  name: string;
  Fy: number;  // Yield stress (kgf/cm²)
  Fu: number;  // Ultimate tensile stress (kgf/cm²)
}

export const STEEL_GRADES: ISteelGrade[] = [
  { name: 'A36', Fy: 2531, Fu: 4078 },
  { name: 'A572 Gr.50', Fy: 3515, Fu: 4570 },
  { name: 'A992', Fy: 3515, Fu: 4570 },
  { name: 'A913 Gr.65', Fy: 4570, Fu: 5625 },
];

export const DEFAULT_STEEL_GRADE: ISteelGrade = STEEL_GRADES[2];

/** Find a grade by name (case-insensitive) */
export function findSteelGrade(name: string): ISteelGrade | undefined {
  const key = name.toLowerCase();
  return STEEL_GRADES.find(g => g.name.toLowerCase() === key);
}
