import type { LineMetrics } from '../utils/resizableHeight';

/** Line height multiplier browsers use for `line-height: normal`. */
export const NORMAL_LINE_HEIGHT = 1.2;

const NUMBER_PATTERN = /^\d*\.?\d+$/;

export interface BoxMetrics extends LineMetrics {
  /** Amount to add to `scrollHeight` to get a value for the `height` style. */
  scrollOffset: number;
}

const toPixels = (value: string) => {
  const pixels = parseFloat(value);
  return Number.isFinite(pixels) ? pixels : 0;
};

/**
 * Resolves the computed line height in pixels, falling back to the font size
 * for `normal` and unitless values. Returns `null` if no font size is set.
 */
export const getLineHeight = ({
  fontSize,
  lineHeight,
}: Pick<CSSStyleDeclaration, 'fontSize' | 'lineHeight'>): number | null => {
  if (lineHeight.trim().endsWith('px')) {
    const pixels = parseFloat(lineHeight);
    if (Number.isFinite(pixels)) return pixels;
  }

  const size = parseFloat(fontSize);
  if (!Number.isFinite(size) || size <= 0) return null;

  const multiplier = NUMBER_PATTERN.test(lineHeight.trim())
    ? Number(lineHeight)
    : NORMAL_LINE_HEIGHT;

  return size * multiplier;
};

/**
 * Reads the metrics needed to size the element from its computed style.
 *
 * With `border-box` sizing the `height` style includes padding and borders,
 * so both count as insets and the borders are added to `scrollHeight`
 * (which already includes padding). With `content-box` sizing there are no
 * insets and the padding is taken off `scrollHeight`.
 */
export const getBoxMetrics = (element: HTMLElement): BoxMetrics => {
  const style = window.getComputedStyle(element);
  const padding = toPixels(style.paddingTop) + toPixels(style.paddingBottom);
  const border =
    toPixels(style.borderTopWidth) + toPixels(style.borderBottomWidth);
  const isBorderBox = style.boxSizing === 'border-box';

  return {
    insets: isBorderBox ? padding + border : 0,
    lineHeight: getLineHeight(style),
    scrollOffset: isBorderBox ? border : -padding,
  };
};

/**
 * Reads layout so that the browser applies pending style changes, making the
 * current height the starting point of the next height transition.
 */
const reflow = (element: HTMLElement) => element.offsetHeight;

/**
 * Finds the scroll positions of scrolled ancestors, so that they can be put
 * back after the element momentarily loses its height.
 */
const getScrollTops = (element: HTMLElement) => {
  const scrollTops: [Element, number][] = [];
  let node = element.parentElement;

  while (node) {
    if (node.scrollTop) scrollTops.push([node, node.scrollTop]);
    node = node.parentElement;
  }

  const { scrollingElement } = document;
  if (scrollingElement && scrollingElement.scrollTop) {
    scrollTops.push([scrollingElement, scrollingElement.scrollTop]);
  }

  return scrollTops;
};

/**
 * Measures the smallest height that shows all of the element's content at
 * its current width, in the units of the element's `height` style.
 *
 * The height is restored and laid out again before returning, so a height
 * written afterwards transitions from the restored height rather than `auto`.
 */
export const measureIdealHeight = (
  element: HTMLElement,
  { scrollOffset }: Pick<BoxMetrics, 'scrollOffset'> = getBoxMetrics(element),
) => {
  const scrollTops = getScrollTops(element);
  const height = element.style.getPropertyValue('height');

  element.style.setProperty('height', 'auto');
  const idealHeight = element.scrollHeight + scrollOffset;

  if (height) {
    element.style.setProperty('height', height);
  } else {
    element.style.removeProperty('height');
  }
  reflow(element);

  scrollTops.forEach(([node, scrollTop]) => {
    // eslint-disable-next-line no-param-reassign
    node.scrollTop = scrollTop;
  });

  return Math.max(0, idealHeight);
};
