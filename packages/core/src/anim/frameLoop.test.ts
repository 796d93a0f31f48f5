import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFrameLoop } from './frameLoop';

describe('anim/frameLoop', () => {
  it('runs subscribers by order, then by subscription', () => {
    const loop = createFrameLoop({ autoStart: false });
    const calls: string[] = [];

    loop.add(() => calls.push('interaction'), 1);
    loop.add(() => calls.push('timeline-a'), 0);
    loop.add(() => calls.push('timeline-b'), 0);

    loop.step(16);
    expect(calls).toEqual(['timeline-a', 'timeline-b', 'interaction']);
  });

  it('passes the step delta through', () => {
    const loop = createFrameLoop({ autoStart: false });
    const deltas: number[] = [];
    loop.add((dt) => deltas.push(dt));

    loop.step(16);
    loop.step(33);
    expect(deltas).toEqual([16, 33]);
  });

  it('skips subscribers removed earlier in the same step', () => {
    const loop = createFrameLoop({ autoStart: false });
    const calls: string[] = [];

    const removeB = loop.add(() => calls.push('b'), 1);
    loop.add(() => {
      calls.push('a');
      removeB();
    }, 0);

    loop.step(16);
    expect(calls).toEqual(['a']);
    expect(loop.size()).toBe(1);
  });

  it('holds subscribers added during a step until the next one', () => {
    const loop = createFrameLoop({ autoStart: false });
    const calls: string[] = [];

    loop.add(() => {
      calls.push('outer');
      if (loop.size() === 1) loop.add(() => calls.push('inner'));
    });

    loop.step(16);
    expect(calls).toEqual(['outer']);

    loop.step(16);
    expect(calls).toEqual(['outer', 'outer', 'inner']);
  });

  it('ignores a second unsubscribe', () => {
    const loop = createFrameLoop({ autoStart: false });
    const remove = loop.add(() => {});
    loop.add(() => {});

    remove();
    remove();
    expect(loop.size()).toBe(1);
  });
});

describe('anim/frameLoop driver', () => {
  // No requestAnimationFrame under Node, so the loop drives itself with
  // setTimeout.
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts on the first subscriber and halts after the last', () => {
    const loop = createFrameLoop();
    expect(vi.getTimerCount()).toBe(0);

    const removeA = loop.add(() => {});
    const removeB = loop.add(() => {});
    expect(vi.getTimerCount()).toBe(1);

    removeA();
    expect(vi.getTimerCount()).toBe(1);
    removeB();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('steps every subscriber once per frame', () => {
    const loop = createFrameLoop();
    let calls = 0;
    loop.add(() => calls++);

    vi.advanceTimersByTime(16 * 5);
    expect(calls).toBe(5);
  });

  it('keeps a single driver when a subscriber is added mid-step', () => {
    const loop = createFrameLoop();
    let calls = 0;
    loop.add(() => {
      calls++;
      if (calls === 1) loop.add(() => {});
    });

    vi.advanceTimersByTime(16);
    expect(calls).toBe(1);
    expect(loop.size()).toBe(2);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(16 * 10);
    expect(calls).toBe(11);
  });

  it('stops driving when the last subscriber leaves mid-step', () => {
    const loop = createFrameLoop();
    let remove = () => {};
    remove = loop.add(() => remove());

    vi.advanceTimersByTime(16);
    expect(loop.size()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
