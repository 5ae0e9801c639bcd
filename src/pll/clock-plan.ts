// ============================================================
// Clock Plan Registry
//
// Collects one input and up to maxOutputs output requests,
// validating each against the family's ranges as it is
// registered. finalize() solves the plan from an immutable
// snapshot; the registry itself is never touched by the
// solver.
// ============================================================

import type {
  ClockInputSpec, ClockOutputRequest, ClockPlanSnapshot, DividerConfiguration, PllFamily,
  PrimitiveParameters,
} from '../types';
import {
  CapacityError, FrequencyRangeError, NoConfigurationFoundError, PlanStateError,
} from '../errors';
import { getPllFamily, inFrequencyRange } from './family-registry';
import { solveDividers, type SolverOptions } from '../solver/divider-solver';
import { finalizeParameters } from '../solver/config-finalizer';
import { formatInputRegistration, formatOutputRegistration } from '../solver/config-report';
import { createLogger } from '../util/logger';

const log = createLogger('clock-plan');

export interface ClockPlanOptions {
  family: string;
  solver: Partial<Omit<SolverOptions, 'family'>>;
}

const DEFAULT_OPTIONS: ClockPlanOptions = {
  family: 'ecp5',
  solver: {},
};

export interface OutputOptions {
  phase?: number;
  margin?: number;
  withReset?: boolean;
  usesDynamicPhase?: boolean;
}

export class ClockPlanRegistry {
  readonly family: PllFamily;
  private readonly solverOptions: Partial<Omit<SolverOptions, 'family'>>;
  private input: ClockInputSpec | null = null;
  private readonly outputs: ClockOutputRequest[] = [];
  private dynamicPhaseAdjust = false;
  private solved: { plan: ClockPlanSnapshot; configuration: DividerConfiguration } | null = null;

  constructor(options: Partial<ClockPlanOptions> = {}) {
    const cfg = { ...DEFAULT_OPTIONS, ...options };
    this.family = getPllFamily(cfg.family);
    this.solverOptions = cfg.solver;
    log.info(`Creating ${this.family.primitive} plan (${this.family.name}).`);
  }

  get outputCount(): number {
    return this.outputs.length;
  }

  get isFinalized(): boolean {
    return this.solved !== null;
  }

  registerInput(frequency: number, signal = 'clkin'): void {
    this.assertOpen('registerInput');
    if (this.input) {
      throw new PlanStateError('Input clock is already registered');
    }
    const range = this.family.ranges.inputFrequency;
    if (!inFrequencyRange(frequency, range)) {
      throw new FrequencyRangeError('Input', frequency, range);
    }
    this.input = Object.freeze({ frequency, signal });
    log.info(formatInputRegistration(frequency));
  }

  registerOutput(domain: string, frequency: number, options: OutputOptions = {}): void {
    this.assertOpen('registerOutput');
    if (!this.input) {
      throw new PlanStateError('Register the input clock before its outputs');
    }
    const { ranges } = this.family;
    if (!inFrequencyRange(frequency, ranges.outputFrequency)) {
      throw new FrequencyRangeError(`Output ${domain}`, frequency, ranges.outputFrequency);
    }
    if (this.outputs.length >= ranges.maxOutputs) {
      throw new CapacityError(ranges.maxOutputs);
    }
    const request: ClockOutputRequest = Object.freeze({
      slot: this.outputs.length,
      domain,
      frequency,
      phase: options.phase ?? 0,
      margin: options.margin ?? 1e-2,
      withReset: options.withReset ?? true,
      usesDynamicPhase: options.usesDynamicPhase ?? true,
    });
    this.outputs.push(request);
    log.info(formatOutputRegistration(request));
  }

  enableDynamicPhaseAdjust(): void {
    this.assertOpen('enableDynamicPhaseAdjust');
    this.dynamicPhaseAdjust = true;
  }

  snapshot(): ClockPlanSnapshot {
    if (!this.input) {
      throw new PlanStateError('No input clock registered');
    }
    return Object.freeze({
      family: this.family,
      input: this.input,
      outputs: Object.freeze([...this.outputs]),
      dynamicPhaseAdjust: this.dynamicPhaseAdjust,
    });
  }

  /** Solves once; later calls rebuild fresh parameters from the cached solution. */
  finalize(): PrimitiveParameters {
    if (this.solved) {
      return finalizeParameters(this.solved.configuration, this.solved.plan);
    }

    const plan = this.snapshot();
    const result = solveDividers(plan.input.frequency, plan.outputs, plan.dynamicPhaseAdjust, {
      ...this.solverOptions,
      family: this.family,
    });
    if (result.status === 'failed') {
      throw new NoConfigurationFoundError(result.error.message, result.statistics);
    }

    this.solved = { plan, configuration: result.configuration };
    return finalizeParameters(result.configuration, plan);
  }

  private assertOpen(operation: string): void {
    if (this.solved) {
      throw new PlanStateError(`${operation} called after finalize()`);
    }
  }
}
