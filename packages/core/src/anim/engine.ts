import type { StyleHost } from '../styleHost';
import { lerpStyle } from '../styles';
import type { StyleRecord } from '../types';
import { sharedFrameLoop, type FrameScheduler } from './frameLoop';
import {
  hasState,
  isLoopConfigured,
  resolveState,
  resolveTransition,
} from './resolve';
import {
  parseInteractionState,
  type AnimationConfig,
  type InteractionState,
  type Transition,
} from './spec';
import {
  createTweenTrack,
  type TweenOptions,
  type TweenOutcome,
} from './tween';

export interface AnimationEngine {
  /** Replace the configuration. Starts nothing by itself. */
  setup(config: AnimationConfig | null): void;
  /** Cancel both tracks and return to the Normal interaction. */
  stop(): void;
  /** Entrance sequence; resolves once the entrance settles. */
  playShow(): Promise<void>;
  /** Exit sequence; resolves at once when there is no `exit` state. */
  playHide(): Promise<void>;
  /** Interaction request (`hover`, `press`, `check`, `normal`). */
  playState(key: string): void;

  config(): AnimationConfig | null;
  activeInteraction(): InteractionState;
  isLooping(): boolean;
  isTimelineAlive(): boolean;
  isInteractionAlive(): boolean;
}

// Within a frame the timeline writes first, so an interaction overlays it.
const TIMELINE_ORDER = 0;
const INTERACTION_ORDER = 1;

function seconds(s: number): number {
  return Math.max(0, s) * 1000;
}

export function createAnimationEngine(
  host: StyleHost,
  opts: { scheduler?: FrameScheduler } = {}
): AnimationEngine {
  const scheduler = opts.scheduler ?? sharedFrameLoop();
  const timeline = createTweenTrack(scheduler, TIMELINE_ORDER);
  const interaction = createTweenTrack(scheduler, INTERACTION_ORDER);

  let config: AnimationConfig | null = null;
  let looping = false;
  let active: InteractionState = 'normal';

  const apply = (style: StyleRecord) => host.apply(style);

  function tweenTo(
    target: StyleRecord,
    transition: Transition
  ): TweenOptions<StyleRecord> {
    return {
      from: host.current(),
      to: target,
      lerp: lerpStyle,
      durationMs: seconds(transition.duration),
      delayMs: seconds(transition.delay),
      ease: transition.ease,
      onUpdate: apply,
    };
  }

  function runTimeline(
    target: StyleRecord,
    transition: Transition
  ): Promise<TweenOutcome> {
    return timeline.run(tweenTo(target, transition)).finished;
  }

  function startLoop(cfg: AnimationConfig) {
    const normal = host.normal();
    const { duration, delay, ease } = cfg.transition;

    looping = true;
    timeline.run({
      from: resolveState(cfg, normal, 'initial'),
      to: resolveState(cfg, normal, 'animate'),
      lerp: lerpStyle,
      durationMs: seconds(duration),
      delayMs: seconds(delay),
      ease,
      cycles: cfg.repeat.cycles,
      cycleMode: cfg.repeat.cycleMode,
      onUpdate: apply,
      onComplete: () => {
        looping = false;
        // Settle back to Normal; nothing awaits this.
        timeline.run({
          from: host.current(),
          to: host.normal(),
          lerp: lerpStyle,
          durationMs: seconds(duration),
          ease,
          onUpdate: apply,
        });
      },
    });
  }

  function stop() {
    timeline.stop();
    interaction.stop();
    looping = false;
    active = 'normal';
  }

  async function playShow() {
    const cfg = config;
    if (!cfg) return;
    stop();

    const normal = host.normal();
    const loop = isLoopConfigured(cfg);

    if (!cfg.states.enter) {
      if (loop) {
        apply(resolveState(cfg, normal, 'initial'));
        startLoop(cfg);
      } else {
        apply(normal);
      }
      return;
    }

    apply(resolveState(cfg, normal, 'enter'));
    const outcome = await runTimeline(
      resolveState(cfg, normal, loop ? 'initial' : 'normal'),
      resolveTransition(cfg, 'enter')
    );
    if (!loop || outcome !== 'completed') return;

    // Read the configuration again: a reload may have landed mid-entrance.
    const latest = config;
    if (latest && isLoopConfigured(latest)) startLoop(latest);
  }

  async function playHide() {
    const cfg = config;
    if (!cfg?.states.exit) return;
    stop();

    await runTimeline(
      resolveState(cfg, host.normal(), 'exit'),
      resolveTransition(cfg, 'exit')
    );
  }

  function playState(key: string) {
    const cfg = config;
    if (!cfg) return;
    // Entrance and exit own the element until they settle; the idle loop
    // does not.
    if (timeline.isAlive() && !looping) return;

    const parsed = parseInteractionState(key);
    if (!parsed.ok || !hasState(cfg, parsed.state)) return;
    if (parsed.state === active) return;

    // Leaving an interaction mirrors the timing it came in with.
    const transition = resolveTransition(
      cfg,
      parsed.state === 'normal' ? active : parsed.state
    );
    active = parsed.state;

    interaction.run(
      tweenTo(resolveState(cfg, host.normal(), active), transition)
    );
  }

  return {
    setup(next) {
      config = next;
    },
    stop,
    playShow,
    playHide,
    playState,
    config: () => config,
    activeInteraction: () => active,
    isLooping: () => looping,
    isTimelineAlive: () => timeline.isAlive(),
    isInteractionAlive: () => interaction.isAlive(),
  };
}
