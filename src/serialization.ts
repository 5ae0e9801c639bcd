import type { DividerConfiguration, ParameterValue, PrimitiveParameters, ResolvedOutput } from './types';
import { PlanStateError } from './errors';

// ============================================================
// Instance Keyword Form
// ============================================================

export interface InstanceKeywords {
  primitive: string;
  attr: [string, string][];
  // p_* parameters, i_* inputs, o_* outputs
  keywords: Record<string, ParameterValue>;
}

export function toInstanceKeywords(params: PrimitiveParameters): InstanceKeywords {
  const keywords: Record<string, ParameterValue> = {};
  for (const [name, value] of Object.entries(params.inputs)) {
    keywords[`i_${name}`] = value;
  }
  for (const [name, value] of Object.entries(params.outputs)) {
    keywords[`o_${name}`] = value;
  }
  for (const [name, value] of Object.entries(params.parameters)) {
    keywords[`p_${name}`] = value;
  }
  return {
    primitive: params.primitive,
    attr: params.attributes.map(([k, v]) => [k, v]),
    keywords,
  };
}

// ============================================================
// Configuration (JSON-safe)
// ============================================================

export interface SerializedConfiguration {
  inputFrequency: number;
  inputDivider: number;
  feedbackDivider: number;
  feedbackOutputDivider: number;
  vcoFrequency: number;
  feedbackSlot: number;
  // slot -> [divider, frequency, phase, phantom ? 1 : 0]
  outputs: Record<string, [number, number, number, number]>;
}

export function serializeConfiguration(config: DividerConfiguration): SerializedConfiguration {
  return {
    inputFrequency: config.inputFrequency,
    inputDivider: config.inputDivider,
    feedbackDivider: config.feedbackDivider,
    feedbackOutputDivider: config.feedbackOutputDivider,
    vcoFrequency: config.vcoFrequency,
    feedbackSlot: config.feedbackSlot,
    outputs: Object.fromEntries(
      config.outputs.map(o => [String(o.slot), [o.divider, o.frequency, o.phase, o.phantom ? 1 : 0]]),
    ),
  };
}

export function deserializeConfiguration(data: unknown): DividerConfiguration {
  if (!isRecord(data)) {
    throw new PlanStateError('Serialized configuration must be an object');
  }

  const outputsData = data.outputs;
  if (!isRecord(outputsData)) {
    throw new PlanStateError('Serialized configuration is missing "outputs"');
  }

  const outputs: ResolvedOutput[] = [];
  for (const [slotKey, entry] of Object.entries(outputsData)) {
    const slot = Number(slotKey);
    if (!Number.isInteger(slot) || slot < 0) {
      throw new PlanStateError(`Invalid output slot "${slotKey}"`);
    }
    if (!isOutputTuple(entry)) {
      throw new PlanStateError(`Invalid output entry for slot ${slot}`);
    }
    const [divider, frequency, phase, phantom] = entry;
    outputs.push({ slot, divider, frequency, phase, phantom: phantom === 1 });
  }
  outputs.sort((a, b) => a.slot - b.slot);

  const config: DividerConfiguration = {
    inputFrequency: readNumber(data, 'inputFrequency'),
    inputDivider: readNumber(data, 'inputDivider'),
    feedbackDivider: readNumber(data, 'feedbackDivider'),
    feedbackOutputDivider: readNumber(data, 'feedbackOutputDivider'),
    vcoFrequency: readNumber(data, 'vcoFrequency'),
    feedbackSlot: readNumber(data, 'feedbackSlot'),
    outputs,
  };

  if (!outputs.some(o => o.slot === config.feedbackSlot)) {
    throw new PlanStateError(`Feedback slot ${config.feedbackSlot} has no output entry`);
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputTuple(value: unknown): value is [number, number, number, number] {
  return Array.isArray(value) && value.length === 4 && value.every(v => typeof v === 'number');
}

function readNumber(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PlanStateError(`Serialized configuration field "${key}" must be a finite number`);
  }
  return value;
}
