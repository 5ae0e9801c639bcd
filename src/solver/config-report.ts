// ============================================================
// Human-readable log lines for registrations and solved plans
// ============================================================

import type { ClockOutputRequest, DividerConfiguration } from '../types';
import { formatMHz } from '../util/format';

export function formatInputRegistration(frequency: number): string {
  return `Registering ClkIn of ${formatMHz(frequency)}.`;
}

export function formatOutputRegistration(request: ClockOutputRequest): string {
  const margin = (request.margin * 100).toFixed(2);
  return `Creating ClkOut${request.slot} ${request.domain} of ${formatMHz(request.frequency)} (+-${margin}%).`;
}

export function formatConfiguration(config: DividerConfiguration): string {
  const lines = [
    'Config:',
    `  clki_div  : ${config.inputDivider}`,
    `  clkfb_div : ${config.feedbackDivider}`,
    `  clkfb     : ClkOut${config.feedbackSlot}`,
    `  vco       : ${formatMHz(config.vcoFrequency)}`,
  ];
  for (const out of config.outputs) {
    const tag = out.phantom ? ' (feedback)' : '';
    lines.push(
      `  clko${out.slot}     : div ${out.divider}, ${formatMHz(out.frequency)}, phase ${out.phase}${tag}`,
    );
  }
  return lines.join('\n');
}
