import { describe, it, expect, vi } from 'vitest';
import { createStyleCell } from '../styleHost';
import { DEFAULT_STYLE, mergeStyle } from '../styles';
import { AnimationConfigBuilder } from './animationBuilder';
import { createAnimationEngine } from './engine';
import { createFrameLoop } from './frameLoop';
import type { AnimationConfig } from './spec';

function setup(config: AnimationConfig | null) {
  const loop = createFrameLoop({ autoStart: false });
  const cell = createStyleCell();
  const engine = createAnimationEngine(cell, { scheduler: loop });
  engine.setup(config);
  return { loop, cell, engine };
}

describe('anim/engine show', () => {
  it('tweens from the enter state back to Normal', async () => {
    const config = new AnimationConfigBuilder().enter({ opacity: 0 }).build();
    const { loop, cell, engine } = setup(config);

    const shown = engine.playShow();
    expect(cell.current()).toEqual(mergeStyle(DEFAULT_STYLE, { opacity: 0 }));
    expect(engine.isTimelineAlive()).toBe(true);

    loop.step(100);
    expect(cell.current().opacity).toBe(0.5);

    loop.step(100);
    await shown;
    expect(cell.current()).toEqual(DEFAULT_STYLE);
    expect(engine.isTimelineAlive()).toBe(false);
    expect(loop.size()).toBe(0);
  });

  it('hands over to an endless yoyo loop after the entrance', async () => {
    const config = new AnimationConfigBuilder()
      .transition({ duration: 0.1 })
      .repeat(-1, 'yoyo')
      .enter({ opacity: 0 })
      .initial({ radius: 4 })
      .animate({ radius: 8 })
      .build();
    const { loop, cell, engine } = setup(config);

    const shown = engine.playShow();
    loop.step(100);
    await shown;

    expect(cell.current().opacity).toBe(1);
    expect(cell.current().radius).toBe(4);
    expect(engine.isLooping()).toBe(true);

    const radii: number[] = [];
    for (let i = 0; i < 4; i++) {
      loop.step(50);
      radii.push(cell.current().radius);
    }
    expect(radii).toEqual([6, 8, 6, 4]);
    expect(engine.isTimelineAlive()).toBe(true);
  });

  it('snaps to initial and loops when there is no enter state', async () => {
    const config = new AnimationConfigBuilder()
      .transition({ duration: 0.1 })
      .repeat(2, 'restart')
      .initial({ radius: 4 })
      .animate({ radius: 8 })
      .build();
    const { loop, cell, engine } = setup(config);

    await engine.playShow();
    expect(cell.current().radius).toBe(4);
    expect(engine.isLooping()).toBe(true);

    loop.step(50);
    loop.step(50);
    loop.step(50);
    expect(cell.current().radius).toBe(6);

    // Last cycle ends on animate, then a tail tween settles on Normal.
    loop.step(50);
    expect(cell.current().radius).toBe(8);
    expect(engine.isLooping()).toBe(false);
    expect(engine.isTimelineAlive()).toBe(true);

    loop.step(50);
    expect(cell.current().radius).toBe(4);
    loop.step(50);
    expect(cell.current()).toEqual(DEFAULT_STYLE);
    expect(engine.isTimelineAlive()).toBe(false);
  });

  it('snaps straight to Normal without enter or loop', async () => {
    const config = new AnimationConfigBuilder().hover({ opacity: 0.5 }).build();
    const { loop, cell, engine } = setup(config);
    cell.apply(mergeStyle(DEFAULT_STYLE, { opacity: 0.3 }));

    await engine.playShow();
    expect(cell.current()).toEqual(DEFAULT_STYLE);
    expect(loop.size()).toBe(0);
  });

  it('resolves without looping when stopped mid-entrance', async () => {
    const config = new AnimationConfigBuilder()
      .repeat(-1, 'yoyo')
      .enter({ opacity: 0 })
      .initial({ radius: 4 })
      .animate({ radius: 8 })
      .build();
    const { loop, engine } = setup(config);

    const shown = engine.playShow();
    loop.step(50);
    engine.stop();
    await shown;

    expect(engine.isLooping()).toBe(false);
    expect(loop.size()).toBe(0);
  });

  it('does nothing without a configuration', async () => {
    const { loop, cell, engine } = setup(null);

    await engine.playShow();
    await engine.playHide();
    engine.playState('hover');

    expect(cell.current()).toBe(DEFAULT_STYLE);
    expect(engine.activeInteraction()).toBe('normal');
    expect(loop.size()).toBe(0);
  });
});

describe('anim/engine hide', () => {
  it('resolves at once and starts nothing without an exit state', async () => {
    const config = new AnimationConfigBuilder().enter({ opacity: 0 }).build();
    const { loop, cell, engine } = setup(config);
    const before = cell.current();

    await engine.playHide();
    expect(loop.size()).toBe(0);
    expect(cell.current()).toBe(before);
  });

  it('cancels interactions and tweens to the exit state', async () => {
    const config = new AnimationConfigBuilder()
      .hover({ scale: { x: 2, y: 2 } })
      .exit({ opacity: 0 }, { duration: 0.1 })
      .build();
    const { loop, cell, engine } = setup(config);

    engine.playState('hover');
    expect(engine.isInteractionAlive()).toBe(true);

    const hidden = engine.playHide();
    expect(engine.isInteractionAlive()).toBe(false);
    expect(engine.activeInteraction()).toBe('normal');

    loop.step(50);
    expect(cell.current().opacity).toBe(0.5);
    loop.step(50);
    await hidden;
    expect(cell.current().opacity).toBe(0);
    expect(cell.current().scale).toEqual({ x: 1, y: 1 });
  });
});

describe('anim/engine interactions', () => {
  const hoverConfig = () =>
    new AnimationConfigBuilder()
      .transition({ duration: 0.4 })
      .hover({ opacity: 0.5 }, { duration: 0.1 })
      .build();

  it('returns to Normal with the timing of the interaction it leaves', () => {
    const { loop, cell, engine } = setup(hoverConfig());

    engine.playState('hover');
    loop.step(100);
    expect(cell.current().opacity).toBe(0.5);
    expect(engine.isInteractionAlive()).toBe(false);

    engine.playState('normal');
    loop.step(50);
    expect(cell.current().opacity).toBe(0.75);
    loop.step(50);
    expect(cell.current().opacity).toBe(1);
    expect(engine.isInteractionAlive()).toBe(false);
  });

  it('starts one tween for a repeated request', () => {
    const { loop, engine } = setup(hoverConfig());
    const add = vi.spyOn(loop, 'add');

    engine.playState('hover');
    engine.playState('hover');

    expect(add).toHaveBeenCalledTimes(1);
    expect(engine.activeInteraction()).toBe('hover');
  });

  it('ignores requests while an entrance is running', async () => {
    const config = new AnimationConfigBuilder()
      .enter({ opacity: 0 })
      .hover({ radius: 10 })
      .build();
    const { loop, engine } = setup(config);

    const shown = engine.playShow();
    engine.playState('hover');
    expect(engine.activeInteraction()).toBe('normal');
    expect(engine.isInteractionAlive()).toBe(false);

    loop.step(200);
    await shown;
    engine.playState('hover');
    expect(engine.activeInteraction()).toBe('hover');
  });

  it('overlays the idle loop, writing after it within a frame', async () => {
    const config = new AnimationConfigBuilder()
      .transition({ duration: 0.1 })
      .repeat(-1, 'restart')
      .initial({ radius: 4 })
      .animate({ radius: 8 })
      .hover({ radius: 20 })
      .build();
    const { loop, cell, engine } = setup(config);

    await engine.playShow();
    engine.playState('hover');
    expect(engine.activeInteraction()).toBe('hover');

    loop.step(100);
    expect(cell.current().radius).toBe(20);
    expect(engine.isLooping()).toBe(true);
  });

  it('ignores unknown keys and undefined states', () => {
    const { loop, engine } = setup(hoverConfig());

    engine.playState('focus');
    engine.playState('press');
    expect(engine.activeInteraction()).toBe('normal');
    expect(loop.size()).toBe(0);

    engine.playState('HOVER');
    expect(engine.activeInteraction()).toBe('hover');
  });

  it('holds the target until the transition delay has passed', () => {
    const config = new AnimationConfigBuilder()
      .hover({ opacity: 0 }, { duration: 0.1, delay: 0.05 })
      .build();
    const { loop, cell, engine } = setup(config);

    engine.playState('hover');
    loop.step(50);
    expect(cell.current().opacity).toBe(1);
    loop.step(50);
    expect(cell.current().opacity).toBe(0.5);
  });

  it('clears everything on stop', () => {
    const { loop, engine } = setup(hoverConfig());

    engine.playState('hover');
    engine.stop();

    expect(engine.activeInteraction()).toBe('normal');
    expect(engine.isInteractionAlive()).toBe(false);
    expect(engine.isTimelineAlive()).toBe(false);
    expect(engine.isLooping()).toBe(false);
    expect(loop.size()).toBe(0);

    // Safe with nothing running.
    engine.stop();
    expect(loop.size()).toBe(0);
  });

  it('merges states over the current Normal baseline', () => {
    const { loop, cell, engine } = setup(hoverConfig());
    cell.applyDefinition({ radius: 6 });

    engine.playState('hover');
    loop.step(100);
    expect(cell.current().radius).toBe(6);
    expect(cell.current().opacity).toBe(0.5);
  });
});
