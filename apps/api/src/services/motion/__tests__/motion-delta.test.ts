import { describe, it, expect } from '@jest/globals';
import { InMemoryMotionCache } from '@uwb-locator/adapters';
import { computeMotionDelta, updateMotion } from '../motion-delta.js';

const T0 = new Date('2026-01-05T10:00:00.000Z');
const at = (ms: number) => new Date(T0.getTime() + ms);

describe('computeMotionDelta', () => {
  it('has no delta without a prior fix', () => {
    expect(computeMotionDelta(undefined, { x: 1, y: 2, at: T0 })).toEqual({
      distanceTravelled: null,
      elapsedSeconds: null,
    });
  });

  it('returns Euclidean distance and whole elapsed seconds', () => {
    const prior = { tagId: '4', lastX: 1, lastY: 1, lastTimestamp: T0 };
    expect(computeMotionDelta(prior, { x: 4, y: 5, at: at(2_900) })).toEqual({
      distanceTravelled: 5,
      elapsedSeconds: 2,
    });
  });

  it('clamps a fix older than the cached one to zero seconds', () => {
    const prior = { tagId: '4', lastX: 0, lastY: 0, lastTimestamp: T0 };
    expect(computeMotionDelta(prior, { x: 0, y: 2, at: at(-5_000) })).toEqual({
      distanceTravelled: 2,
      elapsedSeconds: 0,
    });
  });
});

describe('updateMotion', () => {
  it('yields (null, null) first, then the delta against the previous fix', async () => {
    const cache = new InMemoryMotionCache();

    const first = await cache.transact(async (view) => updateMotion(view, '4', { x: 0, y: 0, at: T0 }));
    const second = await cache.transact(async (view) =>
      updateMotion(view, '4', { x: 6, y: 8, at: at(10_000) }),
    );

    expect(first).toEqual({ distanceTravelled: null, elapsedSeconds: null });
    expect(second).toEqual({ distanceTravelled: 10, elapsedSeconds: 10 });
    expect(cache.get('4')).toEqual({ tagId: '4', lastX: 6, lastY: 8, lastTimestamp: at(10_000) });
  });

  it('keeps tags independent', async () => {
    const cache = new InMemoryMotionCache();
    await cache.transact(async (view) => {
      updateMotion(view, '1', { x: 0, y: 0, at: T0 });
      updateMotion(view, '2', { x: 50, y: 50, at: T0 });
    });
    const delta = await cache.transact(async (view) =>
      updateMotion(view, '1', { x: 3, y: 4, at: at(1_000) }),
    );
    expect(delta.distanceTravelled).toBe(5);
    expect(cache.get('2')?.lastX).toBe(50);
  });

  it('sees its own staged writes within one transaction', async () => {
    const cache = new InMemoryMotionCache();
    const deltas = await cache.transact(async (view) => [
      updateMotion(view, '4', { x: 0, y: 0, at: T0 }),
      updateMotion(view, '4', { x: 0, y: 3, at: at(1_500) }),
    ]);
    expect(deltas[1]).toEqual({ distanceTravelled: 3, elapsedSeconds: 1 });
  });

  it('starts over after a reset', async () => {
    const cache = new InMemoryMotionCache();
    await cache.transact(async (view) => updateMotion(view, '4', { x: 1, y: 1, at: T0 }));
    cache.reset();
    const delta = await cache.transact(async (view) =>
      updateMotion(view, '4', { x: 2, y: 2, at: at(1_000) }),
    );
    expect(delta).toEqual({ distanceTravelled: null, elapsedSeconds: null });
  });
});
