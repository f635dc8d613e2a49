import { InvalidArgumentError } from "commander";

/** Commander parser for counts and millisecond values. */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError("Expected a whole number.");
  return parseInt(value, 10);
}

/** Commander parser for thresholds and ratios in [0, 1]. */
export function parseRatio(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1)
    throw new InvalidArgumentError("Expected a number between 0 and 1.");
  return n;
}

/** Reject with "<label> timed out" after `ms`; zero or a non-finite value means no limit. */
export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return work;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
