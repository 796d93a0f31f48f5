import type { StylePatch } from '../types';
import type { Ease } from './easing';

export const AnimationState = {
  Normal: 'normal',
  Enter: 'enter',
  Exit: 'exit',
  Initial: 'initial',
  Animate: 'animate',
  Hover: 'hover',
  Press: 'press',
  Check: 'check',
} as const;

export type AnimationState =
  (typeof AnimationState)[keyof typeof AnimationState];

/** States that carry their own definition; `normal` is the element itself. */
export type NamedState = Exclude<AnimationState, 'normal'>;

/** States reachable through `playState()`. */
export type InteractionState = 'normal' | 'hover' | 'press' | 'check';

export const NAMED_STATES: readonly NamedState[] = [
  'enter',
  'exit',
  'initial',
  'animate',
  'hover',
  'press',
  'check',
];

export type CycleMode = 'restart' | 'yoyo' | 'incremental';

export interface Transition {
  duration: number; // s
  delay: number; // s
  ease: Ease;
}

export interface Repeat {
  /** -1 loops forever; 0 and 1 both mean a single cycle. */
  cycles: number;
  cycleMode: CycleMode;
}

export interface StateDefinition {
  style: StylePatch;
  /** Overrides the configuration's default transition for this state. */
  transition?: Transition;
}

export interface AnimationConfig {
  transition: Transition;
  repeat: Repeat;
  states: Partial<Record<NamedState, StateDefinition>>;
}

export const DEFAULT_TRANSITION: Transition = {
  duration: 0.2,
  delay: 0,
  ease: 'linear',
};

export const DEFAULT_REPEAT: Repeat = {
  cycles: 1,
  cycleMode: 'restart',
};

export type ParsedInteraction =
  | { ok: true; state: InteractionState }
  | { ok: false };

/** Maps an external key such as `"Hover"` to an interaction state. */
export function parseInteractionState(key: string): ParsedInteraction {
  switch (key.trim().toLowerCase()) {
    case 'normal':
      return { ok: true, state: 'normal' };
    case 'hover':
      return { ok: true, state: 'hover' };
    case 'press':
      return { ok: true, state: 'press' };
    case 'check':
      return { ok: true, state: 'check' };
    default:
      return { ok: false };
  }
}

export function parseCycleMode(text: string): CycleMode | null {
  switch (text.trim().toLowerCase()) {
    case 'restart':
      return 'restart';
    case 'yoyo':
      return 'yoyo';
    case 'incremental':
      return 'incremental';
    default:
      return null;
  }
}
