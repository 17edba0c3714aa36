/**
 * W-Section Member Check: AISC 360 (LRFD)
 * Runs the limit-state checks that apply to one set of loads and assembles
 * the aggregate result:
 * - Chapter D tension when Pu > 0
 * - Chapter E compression when Pu < 0
 * - Chapter F flexure about each axis with a nonzero moment
 * - Chapter H interaction when compression and bending coexist
 */

import { ConsoleService } from '../console/ConsoleService';
import type { IResistanceFactors } from './AISC360';
import { checkCompression } from './CompressionCheck';
import { checkStrongAxisFlexure, checkWeakAxisFlexure } from './FlexureCheck';
import { checkInteraction } from './InteractionCheck';
import { assertSectionProperties, classifySection } from './SectionClassification';
import { checkTension } from './TensionCheck';
import type {
  CheckName,
  ILoadCase,
  ILoadCasesResult,
  ILoadConditions,
  IMemberCheckResult,
  IMemberCheckSummary,
  ISectionProperties,
} from './types';

export interface IMemberCheckOptions {
  /** Overrides for the LRFD resistance factors */
  factors?: Partial<IResistanceFactors>;
  /** Write one console entry per evaluated check (default true) */
  log?: boolean;
}

type ISummaryInput = Omit<IMemberCheckResult, 'summary' | 'classification' | 'designation'>;

const CHECK_ORDER: CheckName[] = ['tension', 'compression', 'strongAxisFlexure', 'weakAxisFlexure', 'interaction'];

function ratioOf(results: ISummaryInput, name: CheckName): { ratio: number; status: string; equation?: string } | null {
  const r = results[name];
  if (!r) return null;
  if (r.kind === 'interaction') {
    return r.outcome === 'evaluated' ? { ratio: r.value, status: r.status, equation: r.equation } : null;
  }
  return { ratio: r.ratio, status: r.status, equation: r.equations[0] };
}

/** Governing (highest) demand/capacity ratio over every evaluated check */
export function summarizeChecks(results: ISummaryInput): IMemberCheckSummary {
  let maxRatio = 0;
  let governingCheck: CheckName | null = null;
  let failed = false;

  for (const name of CHECK_ORDER) {
    const r = ratioOf(results, name);
    if (!r) continue;
    if (r.status === 'FAIL') failed = true;
    if (governingCheck === null || r.ratio > maxRatio) {
      maxRatio = r.ratio;
      governingCheck = name;
    }
  }

  return { status: failed ? 'FAIL' : 'OK', maxRatio, governingCheck };
}

export function checkMember(
  section: ISectionProperties,
  loads: ILoadConditions,
  options: IMemberCheckOptions = {}
): IMemberCheckResult {
  const { factors, log = true } = options;
  assertSectionProperties(section);

  const classification = classifySection(section);
  const hasCompression = loads.Pu < 0;
  const hasStrongMoment = Math.abs(loads.Mux) > 0;
  const hasWeakMoment = Math.abs(loads.Muy) > 0;

  const results: ISummaryInput = {};
  if (loads.Pu > 0) {
    results.tension = checkTension(section, loads, factors);
  }
  if (hasCompression) {
    results.compression = checkCompression(section, loads, classification, factors);
  }
  if (hasStrongMoment) {
    results.strongAxisFlexure = checkStrongAxisFlexure(section, loads, classification, factors);
  }
  if (hasWeakMoment) {
    results.weakAxisFlexure = checkWeakAxisFlexure(section, loads, classification, factors);
  }
  if (hasCompression && (hasStrongMoment || hasWeakMoment)) {
    results.interaction = checkInteraction(loads, results);
  }

  const summary = summarizeChecks(results);

  const result: IMemberCheckResult = {
    designation: section.designation,
    classification,
    ...results,
    summary,
  };
  if (log) logMemberCheck(result);
  return result;
}

/** Write one console entry per evaluated check of a finished result */
export function logMemberCheck(result: IMemberCheckResult): void {
  const source = result.designation ?? 'section';
  for (const name of CHECK_ORDER) {
    const r = ratioOf(result, name);
    if (r) ConsoleService.logCheck(source, name, r.ratio, r.status, r.equation);
  }
}

/**
 * Check one section against several named load cases.
 * The governing case is the one with the highest ratio; ties keep the first.
 */
export function checkLoadCases(
  section: ISectionProperties,
  cases: ILoadCase[],
  options: IMemberCheckOptions = {}
): ILoadCasesResult {
  const results = cases.map(c => ({ name: c.name, result: checkMember(section, c.loads, options) }));

  let governing: { name: string; ratio: number } | null = null;
  for (const { name, result } of results) {
    if (governing === null || result.summary.maxRatio > governing.ratio) {
      governing = { name, ratio: result.summary.maxRatio };
    }
  }

  return {
    cases: results,
    governingCase: governing?.name ?? null,
    status: results.some(r => r.result.summary.status === 'FAIL') ? 'FAIL' : 'OK',
  };
}
