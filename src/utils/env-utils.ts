import os from 'node:os';

const MAX_MOVE_CONCURRENCY = 8;

/**
 * Number of parallel file moves: the user's value when valid, otherwise two
 * thirds of the CPU cores, capped to keep disk contention low.
 */
export function getOptimalConcurrency(userSpecified?: number): number {
  if (
    userSpecified !== undefined &&
    Number.isInteger(userSpecified) &&
    userSpecified > 0
  ) {
    return userSpecified;
  }
  const cores = os.cpus().length || 1;
  return Math.max(1, Math.min(MAX_MOVE_CONCURRENCY, Math.floor((cores * 2) / 3)));
}
