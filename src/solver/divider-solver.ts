// ============================================================
// Divider Solver
//
// Deterministic first-fit search over (input divider,
// feedback output divider, feedback divider). For each
// candidate VCO frequency every requested output takes the
// smallest divider within its margin; the first combination
// that resolves all outputs and has a feedback path wins.
// No attempt is made to find the lowest-error plan.
// ============================================================

import type {
  CandidateResult, ClockOutputRequest, DividerConfiguration,
  DividerRange, PllFamily, PllRangeTable, ResolvedOutput, SolveResult, SolverStats,
} from '../types';
import { dividerValues, getPllFamily, inFrequencyRange } from '../pll/family-registry';
import { createLogger } from '../util/logger';
import { formatConfiguration } from './config-report';

const log = createLogger('divider-solver');

// ============================================================
// Solver Configuration
// ============================================================

export interface SolverOptions {
  family: PllFamily;
  // Upper bound on evaluated (input, output-feedback, feedback) triples;
  // defaults to the family's full search space
  maxCombinations?: number;
}

export const DEFAULT_SOLVER_OPTIONS: Readonly<SolverOptions> = Object.freeze({
  family: getPllFamily('ecp5'),
});

export function defaultCombinationLimit(ranges: PllRangeTable): number {
  return dividerValues(ranges.inputDivider).length
    * dividerValues(ranges.outputDivider).length
    * dividerValues(ranges.feedbackDivider).length;
}

export interface SearchContext {
  family: PllFamily;
  inputFrequency: number;
  outputs: readonly ClockOutputRequest[];
  dynamicPhaseEnabled: boolean;
}

// ============================================================
// Output Resolution
// ============================================================

/**
 * Smallest divider in `range` whose output lands within the request's margin,
 * or null when none does.
 */
export function resolveOutputDivider(
  vcoFrequency: number,
  request: Pick<ClockOutputRequest, 'frequency' | 'margin'>,
  range: DividerRange,
): number | null {
  const tolerance = request.frequency * request.margin;
  for (const d of dividerValues(range)) {
    if (Math.abs(vcoFrequency / d - request.frequency) <= tolerance) {
      return d;
    }
  }
  return null;
}

/**
 * Truncates. The ratio equals the shared output divider only up to
 * floating-point error, so an inexact input such as 100/3 MHz can come out one
 * below it (d_in=2, d_ofb=7, d_fb=5 gives 6).
 */
export function phantomFeedbackDivider(
  vcoFrequency: number,
  inputDivider: number,
  inputFrequency: number,
  feedbackDivider: number,
): number {
  return Math.trunc((vcoFrequency * inputDivider) / (inputFrequency * feedbackDivider));
}

function canCarryFeedback(request: ClockOutputRequest, dynamicPhaseEnabled: boolean): boolean {
  return !(dynamicPhaseEnabled && request.usesDynamicPhase);
}

// ============================================================
// Candidate Evaluation
// ============================================================

export function evaluateCandidate(
  ctx: SearchContext,
  inputDivider: number,
  feedbackOutputDivider: number,
  feedbackDivider: number,
): CandidateResult {
  const { ranges } = ctx.family;
  const vcoFrequency = (ctx.inputFrequency / inputDivider) * feedbackDivider * feedbackOutputDivider;
  if (!inFrequencyRange(vcoFrequency, ranges.vcoFrequency)) {
    return { kind: 'rejected', reason: 'vco_out_of_range' };
  }

  const resolved: ResolvedOutput[] = [];
  let feedbackSlot: number | null = null;

  for (const request of ctx.outputs) {
    const divider = resolveOutputDivider(vcoFrequency, request, ranges.outputDivider);
    if (divider === null) {
      return { kind: 'rejected', reason: 'output_unresolved' };
    }
    resolved.push({
      slot: request.slot,
      divider,
      frequency: vcoFrequency / divider,
      phase: request.phase,
      phantom: false,
    });
    if (
      feedbackSlot === null &&
      divider === feedbackOutputDivider &&
      canCarryFeedback(request, ctx.dynamicPhaseEnabled)
    ) {
      feedbackSlot = request.slot;
    }
  }

  if (feedbackSlot === null) {
    // No usable output; route feedback through a spare slot
    if (ctx.outputs.length >= ranges.maxOutputs) {
      return { kind: 'rejected', reason: 'no_free_feedback_slot' };
    }
    feedbackSlot = ctx.outputs.length;
    const divider = phantomFeedbackDivider(vcoFrequency, inputDivider, ctx.inputFrequency, feedbackDivider);
    resolved.push({
      slot: feedbackSlot,
      divider,
      frequency: vcoFrequency / divider,
      phase: 0,
      phantom: true,
    });
  }

  return {
    kind: 'valid',
    configuration: {
      inputFrequency: ctx.inputFrequency,
      inputDivider,
      feedbackDivider,
      feedbackOutputDivider,
      vcoFrequency,
      feedbackSlot,
      outputs: resolved,
    },
  };
}

// ============================================================
// Search
// ============================================================

export function solveDividers(
  inputFrequency: number,
  outputs: readonly ClockOutputRequest[],
  dynamicPhaseEnabled: boolean,
  options: Partial<SolverOptions> = {},
): SolveResult {
  const cfg: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const { ranges } = cfg.family;
  const limit = cfg.maxCombinations ?? defaultCombinationLimit(ranges);
  const ctx: SearchContext = { family: cfg.family, inputFrequency, outputs, dynamicPhaseEnabled };

  const startTime = performance.now();
  const stats: SolverStats = {
    evaluatedCombinations: 0,
    vcoCandidates: 0,
    rejectedCombinations: 0,
    phantomFeedback: false,
    limitReached: false,
    solveTimeMs: 0,
  };

  const configuration = search(ctx, ranges.inputDivider, ranges.outputDivider, ranges.feedbackDivider, limit, stats);
  stats.solveTimeMs = performance.now() - startTime;

  if (configuration) {
    stats.phantomFeedback = configuration.outputs.some(o => o.phantom);
    log.debug(`Solved after ${stats.evaluatedCombinations} combinations (${stats.solveTimeMs.toFixed(1)}ms)`);
    log.debug(formatConfiguration(configuration));
    return { status: 'solved', configuration, statistics: stats };
  }

  const message = stats.limitReached
    ? `No PLL config found within ${limit} combinations`
    : 'No PLL config found';
  log.warn(`${message} (${stats.vcoCandidates} VCO candidates, ${stats.rejectedCombinations} rejected)`);
  return {
    status: 'failed',
    error: { kind: 'NoConfigurationFound', message },
    statistics: stats,
  };
}

function search(
  ctx: SearchContext,
  inputDividers: DividerRange,
  outputDividers: DividerRange,
  feedbackDividers: DividerRange,
  maxCombinations: number,
  stats: SolverStats,
): DividerConfiguration | null {
  const { pfdFrequency } = ctx.family.ranges;

  const ofbValues = dividerValues(outputDividers);
  const fbValues = dividerValues(feedbackDividers);

  for (const inputDivider of dividerValues(inputDividers)) {
    if (!inFrequencyRange(ctx.inputFrequency / inputDivider, pfdFrequency)) continue;

    for (const ofbDivider of ofbValues) {
      for (const fbDivider of fbValues) {
        if (stats.evaluatedCombinations >= maxCombinations) {
          stats.limitReached = true;
          return null;
        }
        stats.evaluatedCombinations++;

        const result = evaluateCandidate(ctx, inputDivider, ofbDivider, fbDivider);
        if (result.kind === 'valid') {
          stats.vcoCandidates++;
          return result.configuration;
        }
        if (result.reason !== 'vco_out_of_range') {
          stats.vcoCandidates++;
          stats.rejectedCombinations++;
        }
      }
    }
  }

  return null;
}
