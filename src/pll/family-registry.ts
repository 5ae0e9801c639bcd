import type { DividerRange, FrequencyRange, PllFamily, PllRangeTable } from '../types';

// ============================================================
// ECP5 Operating Ranges
// ============================================================

export const ECP5_PLL_RANGES: Readonly<PllRangeTable> = Object.freeze({
  maxOutputs: 4,
  inputDivider: Object.freeze({ low: 1, high: 128 + 1 }),
  feedbackDivider: Object.freeze({ low: 1, high: 128 + 1 }),
  outputDivider: Object.freeze({ low: 1, high: 128 + 1 }),
  inputFrequency: Object.freeze({ min: 8e6, max: 400e6 }),
  outputFrequency: Object.freeze({ min: 3.125e6, max: 400e6 }),
  vcoFrequency: Object.freeze({ min: 400e6, max: 800e6 }),
  pfdFrequency: Object.freeze({ min: 10e6, max: 400e6 }),
});

export function inFrequencyRange(frequency: number, range: FrequencyRange): boolean {
  return frequency >= range.min && frequency <= range.max;
}

export function dividerValues(range: DividerRange): number[] {
  const values: number[] = [];
  for (let d = range.low; d < range.high; d++) {
    values.push(d);
  }
  return values;
}

// ============================================================
// Family Registry
// ============================================================

const families = new Map<string, PllFamily>();

export function registerPllFamily(family: PllFamily): void {
  if (family.slotLetters.length < family.ranges.maxOutputs) {
    throw new Error(
      `PLL family "${family.id}" names ${family.slotLetters.length} slots but allows ${family.ranges.maxOutputs} outputs`,
    );
  }
  families.set(family.id, family);
}

export function getPllFamilies(): PllFamily[] {
  return [...families.values()];
}

export function getPllFamily(id: string): PllFamily {
  const family = families.get(id);
  if (!family) {
    throw new Error(`Unknown PLL family "${id}"`);
  }
  return family;
}

// Register built-in families
registerPllFamily({
  id: 'ecp5',
  name: 'Lattice ECP5 EHXPLLL',
  primitive: 'EHXPLLL',
  ranges: ECP5_PLL_RANGES,
  slotLetters: ['P', 'S', 'S2', 'S3'],
  calibration: [
    ['ICP_CURRENT', '6'],
    ['LPF_RESISTOR', '16'],
    ['MFG_ENABLE_FILTEROPAMP', '1'],
    ['MFG_GMCREF_SEL', '2'],
  ],
});
