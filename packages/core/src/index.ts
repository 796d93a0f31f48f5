export * from './types';
export * from './color';
export * from './styles';
export * from './styleHost';
export * from './element';
export * from './serialization';

// Animation configuration model + fluent compiler
export * from './anim/spec';
export * from './anim/easing';
export * from './anim/animationBuilder';
export * from './anim/resolve';

// Scheduling and playback
export * from './anim/frameLoop';
export * from './anim/tween';
export * from './anim/engine';
