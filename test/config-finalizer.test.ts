import { describe, it, expect } from 'vitest';
import { feedbackPathTag, finalizeParameters, slotLetter } from '../src/solver/config-finalizer';
import { getPllFamily } from '../src/pll/family-registry';
import { formatMHzText } from '../src/util/format';
import type { ClockPlanSnapshot, DividerConfiguration } from '../src/types';

const ecp5 = getPllFamily('ecp5');

describe('Config finalizer', () => {
  it('should name output slots after the primitive ports', () => {
    expect([0, 1, 2, 3].map(n => slotLetter(ecp5, n))).toEqual(['P', 'S', 'S2', 'S3']);
    expect(feedbackPathTag(ecp5, 2)).toBe('INT_OS2');
    expect(() => slotLetter(ecp5, 4)).toThrow('Output slot 4 has no port name on EHXPLLL');
  });

  it('should map every resolved slot including the phantom feedback output', () => {
    const plan: ClockPlanSnapshot = {
      family: ecp5,
      input: { frequency: 48e6, signal: 'osc' },
      outputs: [
        { slot: 0, domain: 'sys', frequency: 60e6, phase: 0, margin: 0.01, withReset: true, usesDynamicPhase: true },
        { slot: 1, domain: 'video', frequency: 120e6, phase: 180, margin: 0.01, withReset: false, usesDynamicPhase: true },
      ],
      dynamicPhaseAdjust: false,
    };
    const config: DividerConfiguration = {
      inputFrequency: 48e6,
      inputDivider: 4,
      feedbackDivider: 5,
      feedbackOutputDivider: 10,
      vcoFrequency: 600e6,
      feedbackSlot: 2,
      outputs: [
        { slot: 0, divider: 10, frequency: 60e6, phase: 0, phantom: false },
        { slot: 1, divider: 5, frequency: 120e6, phase: 180, phantom: false },
        { slot: 2, divider: 10, frequency: 60e6, phase: 0, phantom: true },
      ],
    };

    const params = finalizeParameters(config, plan);
    expect(params.attributes[0]).toEqual(['FREQUENCY_PIN_CLKI', '48.0']);
    expect(params.inputs.CLKI).toBe('osc');
    expect(params.parameters.FEEDBK_PATH).toBe('INT_OS2');
    expect(params.parameters.CLKOS_CPHASE).toBe(7);
    expect(params.parameters.CLKOS2_DIV).toBe(10);
    expect(params.parameters.CLKOS2_CPHASE).toBe(9);
    expect(params.outputs).toEqual({
      LOCK: 'locked',
      CLKOP: 'sys_clk',
      CLKOS: 'video_clk',
      CLKOS2: 'clkfb',
    });
    expect(params.resetSynchronizedDomains).toEqual(['sys']);
    expect(params.configuration).toEqual(config);
    expect(params.configuration).not.toBe(config);
    expect(params.configuration.outputs[0]).not.toBe(config.outputs[0]);
  });

  it('should write the input frequency as float MHz text', () => {
    expect(formatMHzText(25e6)).toBe('25.0');
    expect(formatMHzText(12.288e6)).toBe('12.288');
  });
});
