// ============================================================
// Coarse Phase Encoding
// ============================================================

/**
 * Convert a phase in degrees into the primitive's coarse-phase (CPHASE)
 * cycle offset for an output running at `divider`.
 *
 * The phase counter steps in `divider + 1` increments per turn and idles at
 * `divider - 1`, so phase 0 encodes to `divider - 1` and 360 degrees lands one
 * full counter cycle later. Phase values are not range-checked here.
 */
export function encodeCoarsePhase(phaseDegrees: number, divider: number): number {
  return Math.trunc(phaseDegrees * (divider + 1) / 360 + divider - 1);
}
