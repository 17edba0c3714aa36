/**
 * Cross-section classification: AISC 360 Section B4
 * Width-to-thickness ratios of the flange and web compared against the
 * limits of Tables B4.1a (axial compression) and B4.1b (flexure).
 */

import { WIDTH_THICKNESS_COEFFICIENTS } from './AISC360';
import { requirePositive } from './errors';
import type { ElementClass, ISectionClassification, ISectionProperties } from './types';

const SECTION_PROPERTY_KEYS = [
  'd', 'bf', 'tf', 'tw', 'A', 'Ix', 'Sx', 'Zx', 'rx',
  'Iy', 'Sy', 'Zy', 'ry', 'J', 'Cw', 'ho', 'Fy', 'Fu', 'E',
] as const;

/**
 * Check the section invariant: every geometric and material property is a
 * positive finite number. Throws DegenerateGeometryError naming the first
 * offending property.
 */
export function assertSectionProperties(section: ISectionProperties): void {
  for (const key of SECTION_PROPERTY_KEYS) {
    requirePositive(key, section[key]);
  }
  // Web clear height must remain positive for the web ratio
  requirePositive('d - 2tf', section.d - 2 * section.tf);
}

/**
 * Classify a single element.
 * Bands are inclusive on their upper bound: lambda = lambdaP is compact,
 * lambda = lambdaR is noncompact.
 */
export function classifyElement(lambda: number, lambdaP: number, lambdaR: number): ElementClass {
  if (lambda <= lambdaP) return 'compact';
  if (lambda <= lambdaR) return 'noncompact';
  return 'slender';
}

/** Flange ratio bf / 2tf */
export function flangeRatio(section: ISectionProperties): number {
  return section.bf / (2 * requirePositive('tf', section.tf));
}

/** Web ratio h / tw with h = d - 2tf */
export function webRatio(section: ISectionProperties): number {
  return (section.d - 2 * section.tf) / requirePositive('tw', section.tw);
}

export function classifySection(section: ISectionProperties): ISectionClassification {
  const lambdaF = flangeRatio(section);
  const lambdaW = webRatio(section);

  const k = Math.sqrt(section.E / requirePositive('Fy', section.Fy));
  const { flangeCompression, flangeFlexure, webFlexure } = WIDTH_THICKNESS_COEFFICIENTS;

  const lambdaPFComp = flangeCompression.lambdaP * k;
  const lambdaRFComp = flangeCompression.lambdaR * k;
  const lambdaPFFlex = flangeFlexure.lambdaP * k;
  const lambdaRFFlex = flangeFlexure.lambdaR * k;
  const lambdaPWFlex = webFlexure.lambdaP * k;
  const lambdaRWFlex = webFlexure.lambdaR * k;

  return {
    flangeCompression: classifyElement(lambdaF, lambdaPFComp, lambdaRFComp),
    flangeFlexure: classifyElement(lambdaF, lambdaPFFlex, lambdaRFFlex),
    webFlexure: classifyElement(lambdaW, lambdaPWFlex, lambdaRWFlex),
    ratios: {
      lambdaF,
      lambdaW,
      lambdaPFComp,
      lambdaRFComp,
      lambdaPFFlex,
      lambdaRFFlex,
      lambdaPWFlex,
      lambdaRWFlex,
    },
  };
}
