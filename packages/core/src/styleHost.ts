import { DEFAULT_STYLE, mergeStyle } from './styles';
import type { StylePatch, StyleRecord } from './types';

/** What the animation engine needs from the element it animates. */
export interface StyleHost {
  /** The live record, as last applied. */
  current(): StyleRecord;
  /** The resting record every named state is merged on top of. */
  normal(): StyleRecord;
  apply(style: StyleRecord): void;
}

export interface StyleCell extends StyleHost {
  /** Record captured from the host before any style sheet is applied. */
  baseline(): StyleRecord;
  /** Replace the captured baseline; the live record snaps to it. */
  capture(baseline: StyleRecord): void;
  /**
   * Re-derive Normal as `baseline + patch` and apply it. This is the path a
   * style sheet reload goes through.
   */
  applyDefinition(patch: StylePatch | null | undefined): void;
}

export function createStyleCell(
  opts: {
    baseline?: StyleRecord;
    /** Pushes a record to whatever visual primitives the host owns. */
    render?: (style: StyleRecord) => void;
  } = {}
): StyleCell {
  let baseline = opts.baseline ?? DEFAULT_STYLE;
  let normal = baseline;
  let current = baseline;

  const cell: StyleCell = {
    current: () => current,
    normal: () => normal,
    baseline: () => baseline,

    apply(style) {
      current = style;
      opts.render?.(style);
    },

    capture(next) {
      baseline = next;
      normal = next;
      cell.apply(next);
    },

    applyDefinition(patch) {
      const merged = mergeStyle(baseline, patch);
      cell.apply(merged);
      normal = merged;
    },
  };

  return cell;
}
