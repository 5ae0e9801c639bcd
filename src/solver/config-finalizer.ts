// ============================================================
// Config Finalizer
// Maps a solved divider configuration onto the named
// parameters, attributes and signal bindings of the PLL
// primitive.
// ============================================================

import type {
  ClockPlanSnapshot, DividerConfiguration, ParameterValue, PllFamily, PrimitiveParameters,
} from '../types';
import { encodeCoarsePhase } from './phase-encoder';
import { formatMHzText } from '../util/format';

export const RESET_SIGNAL = 'reset';
export const STANDBY_SIGNAL = 'stdby';
export const LOCK_SIGNAL = 'locked';
export const FEEDBACK_SIGNAL = 'clkfb';

export const DYNAMIC_PHASE_INPUTS: Readonly<Record<string, string>> = Object.freeze({
  PHASESEL0: 'phase_sel[0]',
  PHASESEL1: 'phase_sel[1]',
  PHASEDIR: 'phase_dir',
  PHASESTEP: 'phase_step',
  PHASELOADREG: 'phase_load',
});

export function slotLetter(family: PllFamily, slot: number): string {
  const letter = family.slotLetters[slot];
  if (letter === undefined) {
    throw new Error(`Output slot ${slot} has no port name on ${family.primitive}`);
  }
  return letter;
}

export function feedbackPathTag(family: PllFamily, slot: number): string {
  return `INT_O${slotLetter(family, slot)}`;
}

export function domainClockSignal(domain: string): string {
  return `${domain}_clk`;
}

export function finalizeParameters(
  config: DividerConfiguration,
  plan: ClockPlanSnapshot,
): PrimitiveParameters {
  const { family } = plan;
  const parameters: Record<string, ParameterValue> = {};
  const inputs: Record<string, string> = {
    RST: RESET_SIGNAL,
    CLKI: plan.input.signal,
    STDBY: STANDBY_SIGNAL,
  };
  const outputs: Record<string, string> = { LOCK: LOCK_SIGNAL };

  if (plan.dynamicPhaseAdjust) {
    parameters.DPHASE_SOURCE = 'ENABLED';
    Object.assign(inputs, DYNAMIC_PHASE_INPUTS);
  }

  parameters.FEEDBK_PATH = feedbackPathTag(family, config.feedbackSlot);
  parameters.CLKFB_DIV = config.feedbackDivider;
  parameters.CLKI_DIV = config.inputDivider;

  for (const out of config.outputs) {
    const port = `CLKO${slotLetter(family, out.slot)}`;
    parameters[`${port}_ENABLE`] = 'ENABLED';
    parameters[`${port}_DIV`] = out.divider;
    parameters[`${port}_FPHASE`] = 0;
    parameters[`${port}_CPHASE`] = encodeCoarsePhase(out.phase, out.divider);

    const request = plan.outputs.find(o => o.slot === out.slot);
    outputs[port] = out.phantom || !request ? FEEDBACK_SIGNAL : domainClockSignal(request.domain);
  }

  return {
    primitive: family.primitive,
    attributes: [
      ['FREQUENCY_PIN_CLKI', formatMHzText(plan.input.frequency)],
      ...family.calibration.map(([name, value]): [string, string] => [name, value]),
    ],
    parameters,
    inputs,
    outputs,
    resetSynchronizedDomains: plan.outputs.filter(o => o.withReset).map(o => o.domain),
    configuration: { ...config, outputs: config.outputs.map(o => ({ ...o })) },
  };
}
