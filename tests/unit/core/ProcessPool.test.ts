/**
 * Unit tests for ProcessPool
 */

import { describe, it, expect, vi } from 'vitest';
import { ProcessPool } from '../../../src/core/ProcessPool.js';
import type { TerminationSignal } from '../../../src/core/types.js';

function fakeProcess(pid: number) {
  return { pid, kill: vi.fn<(signal?: TerminationSignal) => boolean>(() => true) };
}

describe('ProcessPool', () => {
  it('should refuse admission once full', () => {
    const pool = new ProcessPool(2);

    expect(pool.tryAdmit()).not.toBeNull();
    expect(pool.tryAdmit()).not.toBeNull();
    expect(pool.tryAdmit()).toBeNull();

    expect(pool.getStats()).toEqual({ active: 2, max: 2, peak: 2, admitted: 2, refused: 1 });
  });

  it('should free a slot on release', () => {
    const pool = new ProcessPool(1);
    const slot = pool.tryAdmit();
    expect(slot).not.toBeNull();
    if (!slot) return;

    pool.release(slot);
    expect(slot.released).toBe(true);
    expect(pool.getStats().active).toBe(0);
    expect(pool.tryAdmit()).not.toBeNull();
  });

  it('should treat repeated releases as no-ops', () => {
    const pool = new ProcessPool(3);
    const first = pool.tryAdmit();
    pool.tryAdmit();
    if (!first) throw new Error('expected a slot');

    first.release();
    first.release();
    pool.release(first);

    expect(pool.getStats().active).toBe(1);
  });

  it('should hand out distinct slot ids', () => {
    const pool = new ProcessPool(2);
    const ids = [pool.tryAdmit()?.id, pool.tryAdmit()?.id];
    expect(ids).toEqual([1, 2]);
  });

  it('should kill bound children and clear the pool', () => {
    const pool = new ProcessPool(3);
    const a = pool.tryAdmit();
    const b = pool.tryAdmit();
    const unbound = pool.tryAdmit();
    const childA = fakeProcess(101);
    const childB = fakeProcess(102);
    a?.bind(childA);
    b?.bind(childB);

    expect(pool.killAll()).toBe(2);
    expect(childA.kill).toHaveBeenCalledWith('SIGTERM');
    expect(childB.kill).toHaveBeenCalledWith('SIGTERM');
    expect(unbound?.released).toBe(true);
    expect(pool.getStats().active).toBe(0);
  });

  it('should pass the requested signal', () => {
    const pool = new ProcessPool(1);
    const child = fakeProcess(7);
    pool.tryAdmit()?.bind(child);

    pool.killAll('SIGKILL');
    expect(child.kill).toHaveBeenCalledWith('SIGKILL');
  });

  it('should ignore bind after release', () => {
    const pool = new ProcessPool(1);
    const slot = pool.tryAdmit();
    slot?.release();
    slot?.bind(fakeProcess(9));
    expect(slot?.process).toBeNull();
  });

  it('should track the peak across admissions', () => {
    const pool = new ProcessPool(4);
    const slots = [pool.tryAdmit(), pool.tryAdmit(), pool.tryAdmit()];
    slots.forEach((slot) => slot?.release());
    pool.tryAdmit();

    expect(pool.getStats()).toMatchObject({ active: 1, peak: 3, admitted: 4 });
  });

  it('should reject a non-positive or fractional maximum', () => {
    expect(() => new ProcessPool(0)).toThrow(RangeError);
    expect(() => new ProcessPool(1.5)).toThrow(RangeError);
  });
});
