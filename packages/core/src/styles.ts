import { BLACK, CLEAR, parseColor } from './color';
import type { Color, StylePatch, StyleRecord, Vec2, Vec3 } from './types';

/** The canonical record every element starts from. */
export const DEFAULT_STYLE: StyleRecord = {
  backgroundColor: CLEAR,
  radius: 0,
  opacity: 1,

  borderWidth: 0,
  borderColor: CLEAR,

  shadowColor: CLEAR,
  shadowOffset: { x: 0, y: 0 },
  shadowSoftness: 1,

  textColor: BLACK,
  fontSize: 14,
  characterSpacing: 0,

  scale: { x: 1, y: 1 },
  rotation: { x: 0, y: 0, z: 0 },

  anchoredPosition: { x: 0, y: 0 },
  sizeDelta: { x: 0, y: 0 },
  anchorMin: { x: 0.5, y: 0.5 },
  anchorMax: { x: 0.5, y: 0.5 },
  pivot: { x: 0.5, y: 0.5 },

  preferredWidth: -1,
  preferredHeight: -1,
  flexibleWidth: -1,
  flexibleHeight: -1,
};

function isNumber(v: unknown): v is number {
  return typeof v === 'number' && !Number.isNaN(v);
}

function pickColor(text: string | undefined, fallback: Color): Color {
  return parseColor(text) ?? fallback;
}

function pickVec2(v: Vec2 | undefined, fallback: Vec2): Vec2 {
  return v ? { x: v.x, y: v.y } : fallback;
}

/**
 * Applies every field present in `patch` on top of `base`.
 *
 * Grouped fields (border, shadow, rect, layoutItem) are applied member by
 * member, so `{ shadow: { softness: 4 } }` leaves the shadow color alone.
 * Colors that fail to parse leave the field as it was.
 */
export function mergeStyle(
  base: StyleRecord,
  patch: StylePatch | null | undefined
): StyleRecord {
  if (!patch) return base;

  const border = patch.border ?? {};
  const shadow = patch.shadow ?? {};
  const rect = patch.rect ?? {};
  const layout = patch.layoutItem ?? {};

  return {
    backgroundColor: pickColor(patch.backgroundColor, base.backgroundColor),
    radius: isNumber(patch.radius) ? patch.radius : base.radius,
    opacity: isNumber(patch.opacity) ? patch.opacity : base.opacity,

    borderWidth: isNumber(border.width) ? border.width : base.borderWidth,
    borderColor: pickColor(border.color, base.borderColor),

    shadowColor: pickColor(shadow.color, base.shadowColor),
    shadowOffset: {
      x: isNumber(shadow.x) ? shadow.x : base.shadowOffset.x,
      y: isNumber(shadow.y) ? shadow.y : base.shadowOffset.y,
    },
    shadowSoftness: isNumber(shadow.softness)
      ? shadow.softness
      : base.shadowSoftness,

    textColor: pickColor(patch.textColor, base.textColor),
    fontSize: isNumber(patch.fontSize) ? patch.fontSize : base.fontSize,
    characterSpacing: isNumber(patch.characterSpacing)
      ? patch.characterSpacing
      : base.characterSpacing,

    scale: pickVec2(patch.scale, base.scale),
    rotation: patch.rotation
      ? { x: patch.rotation.x, y: patch.rotation.y, z: patch.rotation.z }
      : base.rotation,

    anchoredPosition: pickVec2(rect.anchoredPosition, base.anchoredPosition),
    sizeDelta: pickVec2(rect.sizeDelta, base.sizeDelta),
    anchorMin: pickVec2(rect.anchorMin, base.anchorMin),
    anchorMax: pickVec2(rect.anchorMax, base.anchorMax),
    pivot: pickVec2(rect.pivot, base.pivot),

    preferredWidth: isNumber(layout.preferredWidth)
      ? layout.preferredWidth
      : base.preferredWidth,
    preferredHeight: isNumber(layout.preferredHeight)
      ? layout.preferredHeight
      : base.preferredHeight,
    flexibleWidth: isNumber(layout.flexibleWidth)
      ? layout.flexibleWidth
      : base.flexibleWidth,
    flexibleHeight: isNumber(layout.flexibleHeight)
      ? layout.flexibleHeight
      : base.flexibleHeight,
  };
}

// `a * (1 - t) + b * t` rather than `a + (b - a) * t`: both endpoints come
// out exact.
export function lerpNumber(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

export function lerpVec2(a: Vec2, b: Vec2, t: number): Vec2 {
  return { x: lerpNumber(a.x, b.x, t), y: lerpNumber(a.y, b.y, t) };
}

export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: lerpNumber(a.x, b.x, t),
    y: lerpNumber(a.y, b.y, t),
    z: lerpNumber(a.z, b.z, t),
  };
}

export function lerpColor(a: Color, b: Color, t: number): Color {
  return {
    r: lerpNumber(a.r, b.r, t),
    g: lerpNumber(a.g, b.g, t),
    b: lerpNumber(a.b, b.b, t),
    a: lerpNumber(a.a, b.a, t),
  };
}

/**
 * Field-wise interpolation. `t` is not clamped so overshooting easings
 * (back, elastic) carry through.
 */
export function lerpStyle(
  a: StyleRecord,
  b: StyleRecord,
  t: number
): StyleRecord {
  return {
    backgroundColor: lerpColor(a.backgroundColor, b.backgroundColor, t),
    radius: lerpNumber(a.radius, b.radius, t),
    opacity: lerpNumber(a.opacity, b.opacity, t),

    borderWidth: lerpNumber(a.borderWidth, b.borderWidth, t),
    borderColor: lerpColor(a.borderColor, b.borderColor, t),

    shadowColor: lerpColor(a.shadowColor, b.shadowColor, t),
    shadowOffset: lerpVec2(a.shadowOffset, b.shadowOffset, t),
    shadowSoftness: lerpNumber(a.shadowSoftness, b.shadowSoftness, t),

    textColor: lerpColor(a.textColor, b.textColor, t),
    fontSize: lerpNumber(a.fontSize, b.fontSize, t),
    characterSpacing: lerpNumber(a.characterSpacing, b.characterSpacing, t),

    scale: lerpVec2(a.scale, b.scale, t),
    rotation: lerpVec3(a.rotation, b.rotation, t),

    anchoredPosition: lerpVec2(a.anchoredPosition, b.anchoredPosition, t),
    sizeDelta: lerpVec2(a.sizeDelta, b.sizeDelta, t),
    anchorMin: lerpVec2(a.anchorMin, b.anchorMin, t),
    anchorMax: lerpVec2(a.anchorMax, b.anchorMax, t),
    pivot: lerpVec2(a.pivot, b.pivot, t),

    preferredWidth: lerpNumber(a.preferredWidth, b.preferredWidth, t),
    preferredHeight: lerpNumber(a.preferredHeight, b.preferredHeight, t),
    flexibleWidth: lerpNumber(a.flexibleWidth, b.flexibleWidth, t),
    flexibleHeight: lerpNumber(a.flexibleHeight, b.flexibleHeight, t),
  };
}
