/**
 * Mask a secret for display, keeping only enough to recognise it.
 *
 * Values of eight characters or fewer are fully masked.
 */
export function maskSecret(value: string): string {
  if (value.length <= 8) {
    return "***";
  }
  return `${value.slice(0, 3)}...${value.slice(-3)}`;
}
