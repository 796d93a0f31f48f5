import { mergeStyle } from '../styles';
import type { StyleRecord } from '../types';
import type { AnimationConfig, AnimationState, Transition } from './spec';

export function hasState(
  config: AnimationConfig,
  state: AnimationState
): boolean {
  if (state === 'normal') return true;
  return config.states[state] !== undefined;
}

/**
 * Target record for a named state: the state's patch over the Normal
 * baseline, or the baseline itself when the state is not defined.
 */
export function resolveState(
  config: AnimationConfig,
  normal: StyleRecord,
  state: AnimationState
): StyleRecord {
  if (state === 'normal') return normal;
  const def = config.states[state];
  return def ? mergeStyle(normal, def.style) : normal;
}

export function resolveTransition(
  config: AnimationConfig,
  state: AnimationState
): Transition {
  if (state === 'normal') return config.transition;
  return config.states[state]?.transition ?? config.transition;
}

/** Whether `playShow()` should hand over to the idle loop. */
export function isLoopConfigured(config: AnimationConfig): boolean {
  return (
    config.repeat.cycles !== 0 &&
    config.states.initial !== undefined &&
    config.states.animate !== undefined
  );
}
