export type FrameCallback = (deltaMs: number) => void;

export interface FrameScheduler {
  /**
   * Subscribe to frame steps. Lower `order` runs first within a step;
   * equal orders run in subscription order. Returns an unsubscribe function.
   */
  add(callback: FrameCallback, order?: number): () => void;
}

export interface FrameLoop extends FrameScheduler {
  /** Advance every subscriber by `deltaMs`. */
  step(deltaMs: number): void;
  size(): number;
}

type Entry = {
  callback: FrameCallback;
  order: number;
  seq: number;
  removed: boolean;
};

const FALLBACK_FRAME_MS = 16;

export function createFrameLoop(opts: { autoStart?: boolean } = {}): FrameLoop {
  const autoStart = opts.autoStart ?? true;

  let entries: Entry[] = [];
  let seq = 0;

  let rafId: number | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let lastFrameTime = 0;

  function running() {
    return rafId != null || timer != null;
  }

  function schedule() {
    if (typeof globalThis.requestAnimationFrame === 'function') {
      rafId = globalThis.requestAnimationFrame(tick);
    } else {
      timer = setTimeout(() => tick(performance.now()), FALLBACK_FRAME_MS);
    }
  }

  function halt() {
    if (rafId != null) {
      globalThis.cancelAnimationFrame(rafId);
      rafId = null;
    }
    if (timer != null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  function tick(now: number) {
    rafId = null;
    timer = null;
    const delta = now - lastFrameTime;
    lastFrameTime = now;
    loop.step(delta);
    // A subscriber added during the step may already have started a driver.
    if (entries.length > 0 && !running()) schedule();
  }

  function start() {
    if (!autoStart || running()) return;
    lastFrameTime = performance.now();
    schedule();
  }

  const loop: FrameLoop = {
    add(callback, order = 0) {
      const entry: Entry = { callback, order, seq: seq++, removed: false };
      entries.push(entry);
      entries.sort((a, b) =>
        a.order !== b.order ? a.order - b.order : a.seq - b.seq
      );
      start();

      return () => {
        if (entry.removed) return;
        entry.removed = true;
        entries = entries.filter((e) => e !== entry);
        if (entries.length === 0) halt();
      };
    },

    step(deltaMs) {
      // Subscribers added during this step wait for the next one.
      const snapshot = entries.slice();
      for (const entry of snapshot) {
        if (!entry.removed) entry.callback(deltaMs);
      }
    },

    size() {
      return entries.length;
    },
  };

  return loop;
}

let shared: FrameLoop | null = null;

/** Process-wide loop used by engines created without a scheduler. */
export function sharedFrameLoop(): FrameLoop {
  shared = shared ?? createFrameLoop();
  return shared;
}
