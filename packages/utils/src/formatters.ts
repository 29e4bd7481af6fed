/**
 * Utility functions for formatting data
 */

/**
 * Format a byte sequence as lowercase hex, two digits per byte
 */
export function formatHex(data: Uint8Array | readonly number[]): string {
  return Array.from(data, (byte) => byte.toString(16).padStart(2, "0")).join("");
}

/**
 * Parse a hex string into bytes
 * Accepts an optional 0x prefix and whitespace between bytes.
 * Returns null for odd-length or non-hex input.
 */
export function parseHex(hex: string): Uint8Array | null {
  const digits = hex.trim().replace(/^0x/i, "").replace(/\s+/g, "");
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
    return null;
  }

  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxAttempts?: number;
    delayMs?: number;
    exponential?: boolean;
    shouldRetry?: (error: unknown) => boolean;
  } = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    exponential = true,
    shouldRetry = () => true,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = exponential ? delayMs * Math.pow(2, attempt - 1) : delayMs;
      await sleep(delay);
    }
  }
}
