/**
 * Tests for Environment Utilities
 */

import os from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { getOptimalConcurrency } from './env-utils';

function fakeCpus(count: number): os.CpuInfo[] {
  return Array.from({ length: count }, () => ({
    model: 'test',
    speed: 1000,
    times: { user: 0, nice: 0, sys: 0, idle: 0, irq: 0 },
  }));
}

describe('getOptimalConcurrency', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use a valid user-specified value', () => {
    expect(getOptimalConcurrency(4)).toBe(4);
    expect(getOptimalConcurrency(1)).toBe(1);
  });

  it('should fall back to detection for invalid values', () => {
    const detected = getOptimalConcurrency();
    expect(getOptimalConcurrency(0)).toBe(detected);
    expect(getOptimalConcurrency(-1)).toBe(detected);
    expect(getOptimalConcurrency(2.5)).toBe(detected);
  });

  it('should use two thirds of the cores', () => {
    vi.spyOn(os, 'cpus').mockReturnValue(fakeCpus(6));
    expect(getOptimalConcurrency()).toBe(4);
  });

  it('should cap detection at 8 and never return less than 1', () => {
    vi.spyOn(os, 'cpus').mockReturnValue(fakeCpus(32));
    expect(getOptimalConcurrency()).toBe(8);
    vi.spyOn(os, 'cpus').mockReturnValue(fakeCpus(1));
    expect(getOptimalConcurrency()).toBe(1);
  });
});
