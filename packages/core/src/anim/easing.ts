export type EasingFn = (t: number) => number;

export type Ease =
  | 'linear'
  | 'easeIn'
  | 'easeOut'
  | 'easeInOut'
  | 'easeInSine'
  | 'easeOutSine'
  | 'easeInOutSine'
  | 'easeInQuad'
  | 'easeOutQuad'
  | 'easeInOutQuad'
  | 'easeInCubic'
  | 'easeOutCubic'
  | 'easeInOutCubic'
  | 'easeInExpo'
  | 'easeOutExpo'
  | 'easeInOutExpo'
  | 'easeInBack'
  | 'easeOutBack'
  | 'easeInOutBack'
  | 'easeInElastic'
  | 'easeOutElastic'
  | 'easeInOutElastic'
  | 'easeInBounce'
  | 'easeOutBounce'
  | 'easeInOutBounce';

const BACK = 1.70158;
const BACK_IN_OUT = BACK * 1.525;
const ELASTIC = (2 * Math.PI) / 3;
const ELASTIC_IN_OUT = (2 * Math.PI) / 4.5;

const inQuad: EasingFn = (t) => t * t;
const outQuad: EasingFn = (t) => 1 - (1 - t) * (1 - t);
const inOutQuad: EasingFn = (t) =>
  t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2;

function outBounce(t: number): number {
  const n = 7.5625;
  const d = 2.75;
  if (t < 1 / d) return n * t * t;
  if (t < 2 / d) {
    const u = t - 1.5 / d;
    return n * u * u + 0.75;
  }
  if (t < 2.5 / d) {
    const u = t - 2.25 / d;
    return n * u * u + 0.9375;
  }
  const u = t - 2.625 / d;
  return n * u * u + 0.984375;
}

// Curves follow the usual Penner definitions. Back and elastic leave 0..1
// on purpose; nothing here clamps.
export const easingFns: Record<Ease, EasingFn> = {
  linear: (t) => t,
  easeIn: inQuad,
  easeOut: outQuad,
  easeInOut: inOutQuad,

  easeInSine: (t) => 1 - Math.cos((t * Math.PI) / 2),
  easeOutSine: (t) => Math.sin((t * Math.PI) / 2),
  easeInOutSine: (t) => -(Math.cos(Math.PI * t) - 1) / 2,

  easeInQuad: inQuad,
  easeOutQuad: outQuad,
  easeInOutQuad: inOutQuad,

  easeInCubic: (t) => t * t * t,
  easeOutCubic: (t) => 1 - Math.pow(1 - t, 3),
  easeInOutCubic: (t) =>
    t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2,

  easeInExpo: (t) => (t <= 0 ? 0 : Math.pow(2, 10 * t - 10)),
  easeOutExpo: (t) => (t >= 1 ? 1 : 1 - Math.pow(2, -10 * t)),
  easeInOutExpo: (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return t < 0.5
      ? Math.pow(2, 20 * t - 10) / 2
      : (2 - Math.pow(2, -20 * t + 10)) / 2;
  },

  easeInBack: (t) => (BACK + 1) * t * t * t - BACK * t * t,
  easeOutBack: (t) =>
    1 + (BACK + 1) * Math.pow(t - 1, 3) + BACK * Math.pow(t - 1, 2),
  easeInOutBack: (t) =>
    t < 0.5
      ? (Math.pow(2 * t, 2) * ((BACK_IN_OUT + 1) * 2 * t - BACK_IN_OUT)) / 2
      : (Math.pow(2 * t - 2, 2) *
          ((BACK_IN_OUT + 1) * (t * 2 - 2) + BACK_IN_OUT) +
          2) /
        2,

  easeInElastic: (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * ELASTIC);
  },
  easeOutElastic: (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return Math.pow(2, -10 * t) * Math.sin((t * 10 - 0.75) * ELASTIC) + 1;
  },
  easeInOutElastic: (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return t < 0.5
      ? -(Math.pow(2, 20 * t - 10) * Math.sin((20 * t - 11.125) * ELASTIC_IN_OUT)) /
          2
      : (Math.pow(2, -20 * t + 10) *
          Math.sin((20 * t - 11.125) * ELASTIC_IN_OUT)) /
          2 +
          1;
  },

  easeInBounce: (t) => 1 - outBounce(1 - t),
  easeOutBounce: outBounce,
  easeInOutBounce: (t) =>
    t < 0.5 ? (1 - outBounce(1 - 2 * t)) / 2 : (1 + outBounce(2 * t - 1)) / 2,
};

const EASE_NAMES = Object.keys(easingFns).filter(isEase);

function isEase(name: string): name is Ease {
  return Object.prototype.hasOwnProperty.call(easingFns, name);
}

// Lowercased lookup that accepts both `easeOutBack` and `OutBack`.
const easeByLowerName = new Map<string, Ease>();
for (const name of EASE_NAMES) {
  easeByLowerName.set(name.toLowerCase(), name);
  if (name.startsWith('ease')) {
    easeByLowerName.set(name.slice(4).toLowerCase(), name);
  }
}

/** Resolves an ease id from configuration text; `null` when unknown. */
export function parseEase(text: string): Ease | null {
  return easeByLowerName.get(text.trim().toLowerCase()) ?? null;
}

export function getEasing(ease: Ease | EasingFn | undefined): EasingFn {
  if (typeof ease === 'function') return ease;
  return easingFns[ease ?? 'linear'];
}
