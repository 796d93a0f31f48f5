export type Vec2 = { x: number; y: number };
export type Vec3 = { x: number; y: number; z: number };

/** RGBA with every channel in 0..1. */
export type Color = { r: number; g: number; b: number; a: number };

/**
 * A fully populated, interpolatable style value.
 *
 * Treated as immutable: the algebra and the engine always produce a new
 * record instead of writing into an existing one.
 */
export interface StyleRecord {
  // Visual
  readonly backgroundColor: Color;
  readonly radius: number;
  readonly opacity: number;

  // Border
  readonly borderWidth: number;
  readonly borderColor: Color;

  // Shadow
  readonly shadowColor: Color;
  readonly shadowOffset: Vec2;
  readonly shadowSoftness: number;

  // Text
  readonly textColor: Color;
  readonly fontSize: number;
  readonly characterSpacing: number;

  // Transform
  readonly scale: Vec2;
  readonly rotation: Vec3;

  // Rect
  readonly anchoredPosition: Vec2;
  readonly sizeDelta: Vec2;
  readonly anchorMin: Vec2;
  readonly anchorMax: Vec2;
  readonly pivot: Vec2;

  // Layout
  readonly preferredWidth: number;
  readonly preferredHeight: number;
  readonly flexibleWidth: number;
  readonly flexibleHeight: number;
}

export interface BorderPatch {
  width?: number;
  color?: string;
}

export interface ShadowPatch {
  x?: number;
  y?: number;
  color?: string;
  softness?: number;
}

export interface RectPatch {
  anchoredPosition?: Vec2;
  sizeDelta?: Vec2;
  anchorMin?: Vec2;
  anchorMax?: Vec2;
  pivot?: Vec2;
}

export interface LayoutItemPatch {
  preferredWidth?: number;
  preferredHeight?: number;
  flexibleWidth?: number;
  flexibleHeight?: number;
}

/**
 * Sparse override over a `StyleRecord`. Colors are authored as text
 * (`#RGB`, `#RGBA`, `#RRGGBB`, `#RRGGBBAA` or a color name).
 */
export interface StylePatch {
  backgroundColor?: string;
  opacity?: number;
  radius?: number;
  border?: BorderPatch;
  shadow?: ShadowPatch;

  textColor?: string;
  fontSize?: number;
  characterSpacing?: number;

  scale?: Vec2;
  rotation?: Vec3;

  rect?: RectPatch;
  layoutItem?: LayoutItemPatch;
}
