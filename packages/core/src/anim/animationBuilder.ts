import type { StylePatch } from '../types';
import type { Ease } from './easing';
import {
  DEFAULT_REPEAT,
  DEFAULT_TRANSITION,
  type AnimationConfig,
  type AnimationState,
  type CycleMode,
  type NamedState,
  type Repeat,
  type StateDefinition,
  type Transition,
} from './spec';

export type TransitionOptions = {
  duration?: number; // s
  delay?: number; // s
  ease?: Ease;
};

function toTransition(
  opts: TransitionOptions,
  base: Transition = DEFAULT_TRANSITION
): Transition {
  return {
    duration: Math.max(0, opts.duration ?? base.duration),
    delay: Math.max(0, opts.delay ?? base.delay),
    ease: opts.ease ?? base.ease,
  };
}

/**
 * Fluent authoring API that compiles to a plain `AnimationConfig`.
 *
 * ```ts
 * const config = new AnimationConfigBuilder()
 *   .transition({ duration: 0.3, ease: 'easeOutQuad' })
 *   .enter({ opacity: 0, scale: { x: 0.8, y: 0.8 } })
 *   .hover({ scale: { x: 1.05, y: 1.05 } }, { duration: 0.1 })
 *   .build();
 * ```
 */
export class AnimationConfigBuilder {
  private defaultTransition: Transition = { ...DEFAULT_TRANSITION };
  private repeatSpec: Repeat = { ...DEFAULT_REPEAT };
  private readonly states: Partial<Record<NamedState, StateDefinition>> = {};

  /** Default timing for every state without its own transition. */
  transition(opts: TransitionOptions): this {
    this.defaultTransition = toTransition(opts, this.defaultTransition);
    return this;
  }

  /** Idle loop between `initial` and `animate`. `-1` loops forever. */
  repeat(cycles: number, cycleMode: CycleMode = 'restart'): this {
    this.repeatSpec = { cycles: Math.trunc(cycles), cycleMode };
    return this;
  }

  state(
    name: AnimationState,
    style: StylePatch,
    transition?: TransitionOptions
  ): this {
    if (name === 'normal') {
      console.warn(
        'AnimationConfigBuilder.state(): "normal" comes from the base style and cannot be configured'
      );
      return this;
    }
    const def: StateDefinition = { style };
    // Unset timing falls back to the default transition as built so far.
    if (transition) {
      def.transition = toTransition(transition, this.defaultTransition);
    }
    this.states[name] = def;
    return this;
  }

  enter(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('enter', style, transition);
  }

  exit(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('exit', style, transition);
  }

  initial(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('initial', style, transition);
  }

  animate(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('animate', style, transition);
  }

  hover(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('hover', style, transition);
  }

  press(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('press', style, transition);
  }

  check(style: StylePatch, transition?: TransitionOptions): this {
    return this.state('check', style, transition);
  }

  build(): AnimationConfig {
    return {
      transition: { ...this.defaultTransition },
      repeat: { ...this.repeatSpec },
      states: { ...this.states },
    };
  }
}

/** Convenience helper for one-off compilation. */
export function buildAnimationConfig(
  cb: (anim: AnimationConfigBuilder) => unknown
): AnimationConfig {
  const anim = new AnimationConfigBuilder();
  cb(anim);
  return anim.build();
}
