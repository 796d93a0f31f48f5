import { getEasing, type Ease, type EasingFn } from './easing';
import type { FrameScheduler } from './frameLoop';
import type { CycleMode } from './spec';

export type TweenOutcome = 'completed' | 'stopped';

export interface TweenOptions<T> {
  from: T;
  to: T;
  lerp: (a: T, b: T, t: number) => T;
  durationMs: number;
  delayMs?: number;
  ease?: Ease | EasingFn;
  /** Negative loops forever; 0 and 1 both run a single cycle. */
  cycles?: number;
  cycleMode?: CycleMode;
  onUpdate: (value: T) => void;
  /** Fires once when the last cycle ends. Never fires after `stop()`. */
  onComplete?: () => void;
}

export interface TweenHandle {
  isAlive(): boolean;
  /** Cancels immediately. The last emitted value stays where it is. */
  stop(): void;
  /** Elapsed cycles, e.g. 1.5 halfway through the second cycle. */
  progress(): number;
  readonly finished: Promise<TweenOutcome>;
}

/**
 * Drives `onUpdate(lerp(from, to, x))` once per scheduler step, where `x`
 * depends on the cycle mode: `ease(p)` for restart, `ease(p)` and
 * `ease(1 - p)` on alternate cycles for yoyo, and `k + ease(p)` for
 * incremental, so cycle `k` starts where cycle `k - 1` ended.
 */
export function runTween<T>(
  scheduler: FrameScheduler,
  opts: TweenOptions<T>,
  /** Scheduler order; tracks that must write first use a lower value. */
  order = 0
): TweenHandle {
  const ease = getEasing(opts.ease);
  const duration = Math.max(0, opts.durationMs);
  const delay = Math.max(0, opts.delayMs ?? 0);
  const requested = opts.cycles ?? 1;
  const cycles = requested < 0 ? Infinity : Math.max(1, requested);
  const mode = opts.cycleMode ?? 'restart';

  let alive = true;
  let elapsed = 0;
  let cycleProgress = 0;
  let settle: (outcome: TweenOutcome) => void = () => {};
  const finished = new Promise<TweenOutcome>((resolve) => {
    settle = resolve;
  });

  function valueAt(cycle: number, p: number): number {
    switch (mode) {
      case 'yoyo':
        return cycle % 2 === 0 ? ease(p) : ease(1 - p);
      case 'incremental':
        return cycle + ease(p);
      case 'restart':
        return ease(p);
    }
  }

  // Exact end of the last cycle, without going through the easing curve.
  function endValue(): number {
    const last = Number.isFinite(cycles) ? cycles : 1;
    switch (mode) {
      case 'yoyo':
        return last % 2 === 0 ? 0 : 1;
      case 'incremental':
        return last;
      case 'restart':
        return 1;
    }
  }

  function end(outcome: TweenOutcome) {
    alive = false;
    unsubscribe();
    if (outcome === 'completed') opts.onComplete?.();
    settle(outcome);
  }

  function step(deltaMs: number) {
    if (!alive) return;
    elapsed += deltaMs;
    if (elapsed < delay) return;

    const active = elapsed - delay;
    if (duration === 0 || active >= cycles * duration) {
      cycleProgress = Number.isFinite(cycles) ? cycles : 1;
      opts.onUpdate(opts.lerp(opts.from, opts.to, endValue()));
      end('completed');
      return;
    }

    const cycle = Math.floor(active / duration);
    const p = (active - cycle * duration) / duration;
    cycleProgress = cycle + p;
    opts.onUpdate(opts.lerp(opts.from, opts.to, valueAt(cycle, p)));
  }

  const unsubscribe = scheduler.add(step, order);

  return {
    isAlive: () => alive,
    stop() {
      if (alive) end('stopped');
    },
    progress: () => cycleProgress,
    finished,
  };
}

/** Owner of at most one live tween. */
export interface TweenTrack {
  run<T>(opts: TweenOptions<T>): TweenHandle;
  stop(): void;
  isAlive(): boolean;
}

export function createTweenTrack(
  scheduler: FrameScheduler,
  order: number
): TweenTrack {
  let current: TweenHandle | null = null;

  return {
    run(opts) {
      current?.stop();
      current = runTween(scheduler, opts, order);
      return current;
    },
    stop() {
      current?.stop();
      current = null;
    },
    isAlive() {
      return current?.isAlive() ?? false;
    },
  };
}
