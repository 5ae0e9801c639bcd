export function formatMHz(frequency: number): string {
  return `${(frequency / 1e6).toFixed(2)}MHz`;
}

/** Float text as the vendor attribute expects it: whole values keep a ".0". */
export function formatMHzText(frequency: number): string {
  const mhz = frequency / 1e6;
  return Number.isInteger(mhz) ? mhz.toFixed(1) : String(mhz);
}
