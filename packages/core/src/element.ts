import {
  createAnimationEngine,
  type AnimationEngine,
} from './anim/engine';
import type { FrameScheduler } from './anim/frameLoop';
import type { ElementStyle } from './serialization';
import { createStyleCell, type StyleCell } from './styleHost';

export type ElementFlag = 'hover' | 'press' | 'select' | 'check';

export interface ElementHooks {
  /** Runs after the style is refreshed and before the entrance plays. */
  onShow?: () => void | Promise<void>;
  /** Runs before the exit plays. */
  onHide?: () => void | Promise<void>;
  /** Called with the resolved state key before each state request. */
  onStateChange?: (key: string) => void;
}

export interface StyledElement {
  readonly cell: StyleCell;
  readonly engine: AnimationEngine;

  show(opts?: { instant?: boolean }): Promise<void>;
  hide(opts?: { instant?: boolean }): Promise<void>;
  /** Re-reads the element's style; the hot reload entry point. */
  refresh(): void;
  setFlag(flag: ElementFlag, value: boolean): void;
  resolveStateKey(): string;
  isVisible(): boolean;
}

/**
 * Wires a style cell and an animation engine into the show / hide / flag
 * lifecycle of one element.
 *
 * `resolveStyle` is asked for the element's style on every refresh, so a
 * reloaded sheet is picked up without rebuilding the element.
 */
export function createStyledElement(opts: {
  resolveStyle: () => ElementStyle | null;
  cell?: StyleCell;
  scheduler?: FrameScheduler;
  hooks?: ElementHooks;
}): StyledElement {
  const cell = opts.cell ?? createStyleCell();
  const engine = createAnimationEngine(cell, { scheduler: opts.scheduler });
  const hooks = opts.hooks ?? {};

  let visible = false;
  const flags: Record<ElementFlag, boolean> = {
    hover: false,
    press: false,
    select: false,
    check: false,
  };

  // Check > press > hover > select > normal.
  function resolveStateKey(): string {
    if (flags.check) return 'check';
    if (flags.press) return 'press';
    if (flags.hover) return 'hover';
    if (flags.select) return 'select';
    return 'normal';
  }

  function notify() {
    const key = resolveStateKey();
    hooks.onStateChange?.(key);
    engine.playState(key);
  }

  function refresh() {
    const style = opts.resolveStyle();
    if (!style) return;
    cell.applyDefinition(style.base);
    engine.setup(style.animation);
    notify();
  }

  return {
    cell,
    engine,

    async show({ instant = false } = {}) {
      if (visible) return;
      visible = true;

      engine.stop();
      refresh();
      await hooks.onShow?.();

      if (instant) {
        engine.playState('normal');
      } else {
        await engine.playShow();
      }
    },

    async hide({ instant = false } = {}) {
      if (!visible) return;
      visible = false;

      await hooks.onHide?.();
      if (!instant) await engine.playHide();
      // A hidden element runs nothing; skip if show() took over meanwhile.
      if (!visible) engine.stop();
    },

    refresh,

    setFlag(flag, value) {
      flags[flag] = value;
      notify();
    },

    resolveStateKey,
    isVisible: () => visible,
  };
}
