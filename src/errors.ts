import type { FrequencyRange, SolverStats } from './types';
import { formatMHz } from './util/format';

export type PllErrorKind =
  | 'RangeError'
  | 'CapacityError'
  | 'NoConfigurationFound'
  | 'PlanStateError';

export class PllError extends Error {
  readonly kind: PllErrorKind;

  constructor(kind: PllErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A registered frequency lies outside the primitive's operating range. */
export class FrequencyRangeError extends PllError {
  readonly frequency: number;
  readonly range: FrequencyRange;

  constructor(what: string, frequency: number, range: FrequencyRange) {
    super(
      'RangeError',
      `${what} frequency ${formatMHz(frequency)} is outside ${formatMHz(range.min)}..${formatMHz(range.max)}`,
    );
    this.frequency = frequency;
    this.range = range;
  }
}

export class CapacityError extends PllError {
  readonly maxOutputs: number;

  constructor(maxOutputs: number) {
    super('CapacityError', `PLL supports at most ${maxOutputs} outputs`);
    this.maxOutputs = maxOutputs;
  }
}

export class NoConfigurationFoundError extends PllError {
  readonly statistics: SolverStats;

  constructor(message: string, statistics: SolverStats) {
    super('NoConfigurationFound', message);
    this.statistics = statistics;
  }
}

export class PlanStateError extends PllError {
  constructor(message: string) {
    super('PlanStateError', message);
  }
}
