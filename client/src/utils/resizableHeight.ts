/**
 * A declared height bound, either an explicit pixel height, a number of
 * text lines, or no bound at all.
 */
export type ResizableHeight =
  | { type: 'height'; height: number }
  | { type: 'lines'; lines: number }
  | { type: 'unbounded' };

export const UNBOUNDED: ResizableHeight = { type: 'unbounded' };

/** Font and box values needed to turn a line count into pixels. */
export interface LineMetrics {
  /** Line height in pixels, `null` when no font is configured. */
  lineHeight: number | null;
  /** Vertical insets included in the element's height (padding, borders). */
  insets: number;
}

export interface ClampedHeight {
  height: number;
  isAtMax: boolean;
}

const HEIGHT_PATTERN = /^(\d*\.?\d+)\s*(px)?$/i;
const LINES_PATTERN = /^(\d+)\s*lines?$/i;

/**
 * Parses a bound from its attribute form.
 *
 * @example
 * parseResizableHeight('200px'); // { type: 'height', height: 200 }
 * parseResizableHeight('3 lines'); // { type: 'lines', lines: 3 }
 * parseResizableHeight(''); // { type: 'unbounded' }
 * parseResizableHeight('tall'); // null
 */
export const parseResizableHeight = (value = ''): ResizableHeight | null => {
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === 'none') return UNBOUNDED;

  const height = HEIGHT_PATTERN.exec(trimmed);
  if (height) return { type: 'height', height: Number(height[1]) };

  const lines = LINES_PATTERN.exec(trimmed);
  if (lines) return { type: 'lines', lines: Number(lines[1]) };

  return null;
};

/**
 * Formats a bound into the attribute form read by `parseResizableHeight`.
 */
export const formatResizableHeight = (bound: ResizableHeight): string => {
  switch (bound.type) {
    case 'height':
      return `${bound.height}px`;
    case 'lines':
      return `${bound.lines} ${bound.lines === 1 ? 'line' : 'lines'}`;
    default:
      return '';
  }
};

/**
 * Resolves a bound to a concrete height in pixels, `null` meaning no bound.
 * A line count cannot be resolved without a line height and is then unbounded.
 */
export const resolveResizableHeight = (
  bound: ResizableHeight,
  { lineHeight, insets }: LineMetrics,
): number | null => {
  switch (bound.type) {
    case 'height':
      return bound.height;
    case 'lines':
      return lineHeight === null ? null : lineHeight * bound.lines + insets;
    default:
      return null;
  }
};

/**
 * Clamps the ideal height between the resolved bounds. Reaching the maximum
 * takes precedence over the minimum.
 */
export const clampHeight = (
  idealHeight: number,
  { max = null, min = null }: { max?: number | null; min?: number | null } = {},
): ClampedHeight => {
  if (max !== null && idealHeight >= max) {
    return { height: max, isAtMax: true };
  }

  return {
    height: min === null ? idealHeight : Math.max(idealHeight, min),
    isAtMax: false,
  };
};
