import { describe, it, expect } from 'vitest';
import { backoffDelay } from '../src/lib/reconciler/backoff';

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 1_000, 30_000))).toEqual([1_000, 2_000, 4_000, 8_000]);
  });

  it('caps at the ceiling', () => {
    expect(backoffDelay(5, 1_000, 30_000)).toBe(16_000);
    expect(backoffDelay(6, 1_000, 30_000)).toBe(30_000);
    expect(backoffDelay(20, 1_000, 30_000)).toBe(30_000);
  });

  it('treats attempt 0 like the first attempt', () => {
    expect(backoffDelay(0, 500, 30_000)).toBe(500);
  });
});
