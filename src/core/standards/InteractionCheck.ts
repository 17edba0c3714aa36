/**
 * Combined axial force and flexure: AISC 360 Chapter H, H1.1
 */

import { INTERACTION_AXIAL_THRESHOLD } from './AISC360';
import type {
  ICompressionResult,
  IInteractionOutcome,
  ILoadConditions,
  InteractionEquation,
  IStrongAxisFlexureResult,
  IWeakAxisFlexureResult,
} from './types';

export interface IInteractionInputs {
  compression?: ICompressionResult;
  strongAxisFlexure?: IStrongAxisFlexureResult;
  weakAxisFlexure?: IWeakAxisFlexureResult;
}

/**
 * H1-1a when Pr/Pc >= 0.2, H1-1b otherwise.
 * An axis without a flexure result contributes 0 to the bending sum.
 * Returns a missing-prerequisite outcome when there is no compression result.
 */
export function checkInteraction(loads: ILoadConditions, inputs: IInteractionInputs): IInteractionOutcome {
  const { compression, strongAxisFlexure, weakAxisFlexure } = inputs;
  if (!compression) {
    return {
      kind: 'interaction',
      outcome: 'missing-prerequisite',
      status: 'ERROR',
      note: 'A compression check result is required for the interaction check',
    };
  }

  const Pc = compression.Pc;
  const Mcx = strongAxisFlexure?.Mb ?? 0;
  const Mcy = weakAxisFlexure?.Mb ?? 0;

  const Pr = Math.abs(loads.Pu);
  const Mrx = Math.abs(loads.Mux);
  const Mry = Math.abs(loads.Muy);

  const PrPc = Pr / Pc;
  const MrxMcx = Mcx > 0 ? Mrx / Mcx : 0;
  const MryMcy = Mcy > 0 ? Mry / Mcy : 0;

  let value: number;
  let equation: InteractionEquation;
  if (PrPc >= INTERACTION_AXIAL_THRESHOLD) {
    value = PrPc + (8.0 / 9.0) * (MrxMcx + MryMcy);
    equation = 'H1-1a';
  } else {
    value = Pr / (2 * Pc) + (MrxMcx + MryMcy);
    equation = 'H1-1b';
  }

  return {
    kind: 'interaction',
    outcome: 'evaluated',
    value,
    ratio: value,
    status: value <= 1.0 ? 'OK' : 'FAIL',
    equation,
    PrPc,
    MrxMcx,
    MryMcy,
    Pr,
    Pc,
    Mrx,
    Mcx,
    Mry,
    Mcy,
    equations: [equation],
  };
}
