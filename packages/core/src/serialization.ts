import { parseEase } from './anim/easing';
import {
  DEFAULT_REPEAT,
  DEFAULT_TRANSITION,
  NAMED_STATES,
  parseCycleMode,
  type AnimationConfig,
  type Repeat,
  type StateDefinition,
  type Transition,
} from './anim/spec';
import type {
  BorderPatch,
  LayoutItemPatch,
  RectPatch,
  ShadowPatch,
  StylePatch,
  Vec2,
  Vec3,
} from './types';

/** Resolved style of one selector (`#id` or `.class`). */
export interface ElementStyle {
  base: StylePatch;
  animation: AnimationConfig;
  /** Nested selectors, keyed as written (`.icon`, `#label`). */
  children: Record<string, ElementStyle>;
}

export interface StyleSheet {
  styles: Record<string, ElementStyle>;
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function num(obj: JsonObject, key: string): number | undefined {
  const v = obj[key];
  return isNumber(v) ? v : undefined;
}

function str(obj: JsonObject, key: string): string | undefined {
  const v = obj[key];
  return typeof v === 'string' ? v : undefined;
}

function readVec2(v: unknown): Vec2 | undefined {
  if (Array.isArray(v)) {
    const [x, y] = v;
    return isNumber(x) && isNumber(y) ? { x, y } : undefined;
  }
  if (isObject(v) && isNumber(v.x) && isNumber(v.y)) {
    return { x: v.x, y: v.y };
  }
  return undefined;
}

function readVec3(v: unknown): Vec3 | undefined {
  if (Array.isArray(v)) {
    const [x, y, z = 0] = v;
    return isNumber(x) && isNumber(y) && isNumber(z) ? { x, y, z } : undefined;
  }
  if (isObject(v) && isNumber(v.x) && isNumber(v.y)) {
    return { x: v.x, y: v.y, z: isNumber(v.z) ? v.z : 0 };
  }
  return undefined;
}

function assign<T extends object, K extends keyof T>(
  target: T,
  key: K,
  value: T[K] | undefined
): void {
  if (value !== undefined) target[key] = value;
}

function nonEmpty<T extends object>(obj: T): T | undefined {
  return Object.keys(obj).length > 0 ? obj : undefined;
}

function readBorder(v: unknown): BorderPatch | undefined {
  if (!isObject(v)) return undefined;
  const border: BorderPatch = {};
  assign(border, 'width', num(v, 'width'));
  assign(border, 'color', str(v, 'color'));
  return nonEmpty(border);
}

function readShadow(v: unknown): ShadowPatch | undefined {
  if (!isObject(v)) return undefined;
  const shadow: ShadowPatch = {};
  assign(shadow, 'x', num(v, 'x'));
  assign(shadow, 'y', num(v, 'y'));
  assign(shadow, 'color', str(v, 'color'));
  assign(shadow, 'softness', num(v, 'softness'));
  return nonEmpty(shadow);
}

function readRect(v: unknown): RectPatch | undefined {
  if (!isObject(v)) return undefined;
  const rect: RectPatch = {};
  assign(rect, 'anchoredPosition', readVec2(v.anchoredPosition));
  assign(rect, 'sizeDelta', readVec2(v.sizeDelta));
  assign(rect, 'anchorMin', readVec2(v.anchorMin));
  assign(rect, 'anchorMax', readVec2(v.anchorMax));
  assign(rect, 'pivot', readVec2(v.pivot));
  return nonEmpty(rect);
}

function readLayoutItem(v: unknown): LayoutItemPatch | undefined {
  if (!isObject(v)) return undefined;
  const layout: LayoutItemPatch = {};
  assign(layout, 'preferredWidth', num(v, 'preferredWidth'));
  assign(layout, 'preferredHeight', num(v, 'preferredHeight'));
  assign(layout, 'flexibleWidth', num(v, 'flexibleWidth'));
  assign(layout, 'flexibleHeight', num(v, 'flexibleHeight'));
  return nonEmpty(layout);
}

/** Reads the style fields of an entry; keys it does not know are skipped. */
function readPatch(obj: JsonObject): StylePatch {
  const patch: StylePatch = {};
  assign(patch, 'backgroundColor', str(obj, 'backgroundColor'));
  assign(patch, 'opacity', num(obj, 'opacity'));
  assign(patch, 'radius', num(obj, 'radius'));
  assign(patch, 'border', readBorder(obj.border));
  assign(patch, 'shadow', readShadow(obj.shadow));
  assign(patch, 'textColor', str(obj, 'textColor'));
  assign(patch, 'fontSize', num(obj, 'fontSize'));
  assign(patch, 'characterSpacing', num(obj, 'characterSpacing'));
  assign(patch, 'scale', readVec2(obj.scale));
  assign(patch, 'rotation', readVec3(obj.rotation));
  assign(patch, 'rect', readRect(obj.rect));
  assign(patch, 'layoutItem', readLayoutItem(obj.layoutItem));
  return patch;
}

function readTransition(obj: JsonObject, base: Transition): Transition {
  const t: Transition = { ...base };
  const duration = num(obj, 'duration');
  const delay = num(obj, 'delay');
  const ease = str(obj, 'ease');
  if (duration !== undefined) t.duration = Math.max(0, duration);
  if (delay !== undefined) t.delay = Math.max(0, delay);
  if (ease !== undefined) {
    const parsed = parseEase(ease);
    if (parsed) {
      t.ease = parsed;
    } else {
      console.warn(
        `parseStyleSheet: unknown ease "${ease}", keeping ${t.ease}`
      );
    }
  }
  return t;
}

function readRepeat(obj: JsonObject): Repeat {
  const r: Repeat = { ...DEFAULT_REPEAT };
  const cycles = num(obj, 'cycles');
  const mode = str(obj, 'cycleMode');
  if (cycles !== undefined) r.cycles = Math.trunc(cycles);
  if (mode !== undefined) {
    const parsed = parseCycleMode(mode);
    if (parsed) {
      r.cycleMode = parsed;
    } else {
      console.warn(
        `parseStyleSheet: unknown cycleMode "${mode}", keeping ${r.cycleMode}`
      );
    }
  }
  return r;
}

function readAnimation(obj: JsonObject | undefined): AnimationConfig {
  const config: AnimationConfig = {
    transition: { ...DEFAULT_TRANSITION },
    repeat: { ...DEFAULT_REPEAT },
    states: {},
  };
  if (!obj) return config;

  // The group's transition is read first so states can inherit from it.
  if (isObject(obj.transition)) {
    config.transition = readTransition(obj.transition, DEFAULT_TRANSITION);
  }
  if (isObject(obj.repeat)) {
    config.repeat = readRepeat(obj.repeat);
  }

  for (const [key, value] of Object.entries(obj)) {
    if (!isObject(value)) continue;
    const name = NAMED_STATES.find((s) => s === key.toLowerCase());
    if (!name) continue;

    const def: StateDefinition = { style: readPatch(value) };
    if (isObject(value.transition)) {
      def.transition = readTransition(value.transition, config.transition);
    }
    config.states[name] = def;
  }

  return config;
}

function readElement(obj: JsonObject): ElementStyle {
  const animation = isObject(obj.animation) ? obj.animation : undefined;
  const children: Record<string, ElementStyle> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (!isObject(value)) continue;
    if (key.startsWith('.') || key.startsWith('#')) {
      children[key] = readElement(value);
    }
  }

  return {
    base: readPatch(obj),
    animation: readAnimation(animation),
    children,
  };
}

function cloneJson(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (isObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) out[k] = cloneJson(v);
    return out;
  }
  return value;
}

function substitute(value: unknown, vars: JsonObject): unknown {
  if (typeof value === 'string' && value.length > 1 && value.startsWith('$')) {
    const name = value.slice(1);
    if (Object.prototype.hasOwnProperty.call(vars, name)) {
      return cloneJson(vars[name]);
    }
    console.warn(`parseStyleSheet: unresolved variable "${value}"`);
    return value;
  }
  if (Array.isArray(value)) return value.map((v) => substitute(v, vars));
  if (isObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) out[k] = substitute(v, vars);
    return out;
  }
  return value;
}

/**
 * Parses a style sheet of the form
 * `{ variables?: { name: value }, styles: { ".class" | "#id": {...} } }`.
 *
 * Any string `"$name"` under `styles` is replaced by a copy of
 * `variables.name` before the entries are read. Unknown keys are ignored.
 *
 * @param input JSON text or an already parsed value.
 * @throws Error if the input is not valid JSON or has no `styles` object.
 */
export function parseStyleSheet(input: unknown): StyleSheet {
  let payload: unknown = input;
  if (typeof input === 'string') {
    try {
      payload = JSON.parse(input);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`parseStyleSheet: invalid JSON (${reason})`);
    }
  }

  if (!isObject(payload)) {
    throw new Error('parseStyleSheet: payload must be an object');
  }
  if (!isObject(payload.styles)) {
    throw new Error('parseStyleSheet: missing or invalid styles object');
  }

  const vars = isObject(payload.variables) ? payload.variables : {};
  const resolved = substitute(payload.styles, vars);
  const styles: Record<string, ElementStyle> = {};

  if (isObject(resolved)) {
    for (const [selector, value] of Object.entries(resolved)) {
      if (isObject(value)) styles[selector] = readElement(value);
    }
  }

  return { styles };
}

/**
 * Picks the style for an element: its `#id` entry wins, then the first of
 * its classes with a `.class` entry.
 */
export function resolveElementStyle(
  sheet: StyleSheet | null,
  id: string | null | undefined,
  classes: readonly string[] = []
): ElementStyle | null {
  if (!sheet) return null;
  if (id) {
    const byId = sheet.styles[`#${id}`];
    if (byId) return byId;
  }
  for (const cls of classes) {
    const byClass = sheet.styles[`.${cls}`];
    if (byClass) return byClass;
  }
  return null;
}
