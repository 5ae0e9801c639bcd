// ============================================================
// Frequency Ranges
// ============================================================

/** Inclusive [min, max] bounds, in Hz. */
export interface FrequencyRange {
  min: number;
  max: number;
}

/** Half-open integer range [low, high), as used for divider enumeration. */
export interface DividerRange {
  low: number;
  high: number;
}

export interface PllRangeTable {
  maxOutputs: number;
  inputDivider: DividerRange;
  feedbackDivider: DividerRange;
  outputDivider: DividerRange;
  inputFrequency: FrequencyRange;
  outputFrequency: FrequencyRange;
  vcoFrequency: FrequencyRange;
  pfdFrequency: FrequencyRange;
}

export interface PllFamily {
  id: string;
  name: string;
  primitive: string;
  ranges: PllRangeTable;
  // Output slot index -> port letter suffix (0 -> "P" gives CLKOP)
  slotLetters: string[];
  // Device calibration attributes emitted verbatim on the primitive
  calibration: [string, string][];
}

// ============================================================
// Clock Plan Data Model
// ============================================================

export interface ClockInputSpec {
  frequency: number;
  signal: string;
}

export interface ClockOutputRequest {
  slot: number;
  domain: string;
  frequency: number;
  phase: number;
  margin: number;
  withReset: boolean;
  usesDynamicPhase: boolean;
}

export interface ClockPlanSnapshot {
  family: PllFamily;
  input: ClockInputSpec;
  outputs: readonly ClockOutputRequest[];
  dynamicPhaseAdjust: boolean;
}

// ============================================================
// Solver Data Model
// ============================================================

export interface ResolvedOutput {
  slot: number;
  divider: number;
  frequency: number;
  phase: number;
  // Phantom slots exist only to carry the feedback path
  phantom: boolean;
}

export interface DividerConfiguration {
  inputFrequency: number;
  inputDivider: number;
  feedbackDivider: number;
  feedbackOutputDivider: number;
  vcoFrequency: number;
  feedbackSlot: number;
  outputs: ResolvedOutput[];
}

export type RejectionReason =
  | 'vco_out_of_range'
  | 'output_unresolved'
  | 'no_free_feedback_slot';

export type CandidateResult =
  | { kind: 'valid'; configuration: DividerConfiguration }
  | { kind: 'rejected'; reason: RejectionReason };

export interface SolverStats {
  evaluatedCombinations: number;
  vcoCandidates: number;
  rejectedCombinations: number;
  phantomFeedback: boolean;
  limitReached: boolean;
  solveTimeMs: number;
}

export interface SolverError {
  kind: 'NoConfigurationFound';
  message: string;
}

export type SolveResult =
  | { status: 'solved'; configuration: DividerConfiguration; statistics: SolverStats }
  | { status: 'failed'; error: SolverError; statistics: SolverStats };

// ============================================================
// Primitive Parameters
// ============================================================

export type ParameterValue = string | number;

export interface PrimitiveParameters {
  primitive: string;
  attributes: [string, string][];
  parameters: Record<string, ParameterValue>;
  inputs: Record<string, string>;
  outputs: Record<string, string>;
  resetSynchronizedDomains: string[];
  configuration: DividerConfiguration;
}
