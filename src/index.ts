export * from './types';
export * from './errors';
export { ClockPlanRegistry } from './pll/clock-plan';
export type { ClockPlanOptions, OutputOptions } from './pll/clock-plan';
export {
  ECP5_PLL_RANGES, inFrequencyRange, dividerValues,
  registerPllFamily, getPllFamily, getPllFamilies,
} from './pll/family-registry';
export {
  solveDividers, evaluateCandidate, resolveOutputDivider, phantomFeedbackDivider,
  defaultCombinationLimit, DEFAULT_SOLVER_OPTIONS,
} from './solver/divider-solver';
export type { SolverOptions, SearchContext } from './solver/divider-solver';
export { encodeCoarsePhase } from './solver/phase-encoder';
export { finalizeParameters, feedbackPathTag, slotLetter } from './solver/config-finalizer';
export { formatConfiguration, formatInputRegistration, formatOutputRegistration } from './solver/config-report';
export {
  toInstanceKeywords, serializeConfiguration, deserializeConfiguration,
} from './serialization';
export type { InstanceKeywords, SerializedConfiguration } from './serialization';
export { createLogger, configureLogging, resetLogging, getLoggingConfig } from './util/logger';
export type { Logger, LogLevel, LoggerConfig } from './util/logger';
