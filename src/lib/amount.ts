export const DEFAULT_AMOUNT = 1;

// Largest page step a buffer may express
export const MAX_PAGE_STEP = 0xffff;

export const isDigit = (input: string): boolean => input.length === 1 && input >= '0' && input <= '9';

/**
 * Turns the digit buffer typed before an action into a step count.
 * Empty, non-numeric or out-of-range buffers give the default of 1.
 */
export function parseAmount(buffer: string, max: number = Number.MAX_SAFE_INTEGER): number {
  if (!/^\d+$/.test(buffer)) {
    return DEFAULT_AMOUNT;
  }
  const value = Number(buffer);
  return Number.isSafeInteger(value) && value <= max ? value : DEFAULT_AMOUNT;
}
