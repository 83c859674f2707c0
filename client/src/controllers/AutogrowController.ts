import { Controller } from '@hotwired/stimulus';

import { getBoxMetrics, measureIdealHeight } from '../includes/boxMetrics';
import type { BoxMetrics } from '../includes/boxMetrics';
import { HeightConstraint } from '../includes/heightConstraint';
import {
  clampHeight,
  formatResizableHeight,
  parseResizableHeight,
  resolveResizableHeight,
  UNBOUNDED,
} from '../utils/resizableHeight';
import type { ClampedHeight, ResizableHeight } from '../utils/resizableHeight';
import { transition } from '../utils/transition';

/** Default duration of the height transition, in milliseconds. */
export const DEFAULT_RESIZE_DURATION = 100;

type Bound = 'max' | 'min';
type HeightCallback = (height: number) => void;

interface ScrollAffordances {
  scroll: boolean;
  scrollbar: boolean;
}

/**
 * Adds the ability for a text area to grow and shrink with its content,
 * animating between heights and optionally clamped to a minimum and maximum.
 *
 * Bounds are given as a pixel height (`120px`), a number of text lines
 * (`3 lines`) or left empty for no bound. Once the content reaches the
 * maximum, scrolling and the scrollbar are turned on until it shrinks again.
 *
 * @example - Grow from one line up to five lines
 * ```html
 * <textarea
 *   data-controller="autogrow"
 *   data-autogrow-min-value="1 line"
 *   data-autogrow-max-value="5 lines"
 * ></textarea>
 * ```
 *
 * @example - Resize after changing the value from code
 * ```html
 * <textarea data-controller="autogrow" data-action="change->autogrow#resize"></textarea>
 * ```
 *
 * @fires autogrow:resize - before the height changes, with `{ height, previousHeight }`
 * @fires autogrow:resized - once the height transition completes, with `{ height }`
 */
export class AutogrowController extends Controller<HTMLTextAreaElement> {
  static values = {
    duration: { default: DEFAULT_RESIZE_DURATION, type: Number },
    max: { default: '', type: String },
    min: { default: '', type: String },
    scroll: { default: false, type: Boolean },
    scrollbar: { default: false, type: Boolean },
  };

  /** Duration of the height transition in milliseconds, zero to resize without animating. */
  declare durationValue: number;
  /** Maximum height, e.g. `200px` or `5 lines`. */
  declare maxValue: string;
  /** Minimum height, e.g. `40px` or `1 line`. */
  declare minValue: string;
  /** Whether the content can be scrolled, forced on while at the maximum height. */
  declare scrollValue: boolean;
  /** Whether the scrollbar is shown, forced on while at the maximum height. */
  declare scrollbarValue: boolean;

  /** Called just before the height starts to change. */
  willChangeHeight?: HeightCallback;
  /** Called once the new height has been committed and its transition is done. */
  didChangeHeight?: HeightCallback;

  heightConstraint?: HeightConstraint;
  isAtMaxHeight = false;
  resizeObserver?: ResizeObserver;

  private hasPendingLayout = false;
  private initialStyles: Record<string, string> = {};
  private pendingResize?: AbortController;
  private savedAffordances?: ScrollAffordances;
  private warned = new Set<string>();

  initialize() {
    this.layout = this.layout.bind(this);
    this.resize = this.resize.bind(this);
    this.initialStyles = Object.fromEntries(
      ['overflow-y', 'scrollbar-width', 'transition'].map((property) => [
        property,
        this.element.style.getPropertyValue(property),
      ]),
    );
  }

  connect() {
    this.heightConstraint =
      HeightConstraint.find(this.element) ?? this.createHeightConstraint();
    this.element.addEventListener('input', this.resize);
    this.resizeObserver = new ResizeObserver(this.layout);
    this.resizeObserver.observe(this.element);
  }

  disconnect() {
    this.element.removeEventListener('input', this.resize);
    this.resizeObserver?.disconnect();
    this.resizeObserver = undefined;

    this.heightConstraint?.remove();
    this.heightConstraint = undefined;
    this.pendingResize?.abort();
    this.pendingResize = undefined;
    this.hasPendingLayout = false;

    if (this.savedAffordances) {
      this.scrollValue = this.savedAffordances.scroll;
      this.scrollbarValue = this.savedAffordances.scrollbar;
      this.savedAffordances = undefined;
    }
    this.isAtMaxHeight = false;

    Object.entries(this.initialStyles).forEach(([property, value]) => {
      this.setStyle(property, value);
    });
  }

  get maxResizableHeight(): ResizableHeight {
    return this.parseBound('max', this.maxValue);
  }

  set maxResizableHeight(bound: ResizableHeight) {
    this.maxValue = formatResizableHeight(bound);
  }

  get minResizableHeight(): ResizableHeight {
    return this.parseBound('min', this.minValue);
  }

  set minResizableHeight(bound: ResizableHeight) {
    this.minValue = formatResizableHeight(bound);
  }

  get resizeDuration() {
    const duration = this.durationValue;
    return Number.isFinite(duration) && duration > 0 ? duration : 0;
  }

  set resizeDuration(duration: number) {
    this.durationValue = duration;
  }

  /**
   * Resizes after a layout change. Measuring resets the height, which would
   * interrupt a running height transition, so while one is pending the
   * resize is left until it completes.
   */
  layout() {
    if (this.pendingResize) {
      this.hasPendingLayout = true;
      return;
    }
    this.resize();
  }

  /**
   * Measures the content and, if the clamped height differs from the current
   * one, transitions to it. Returns the new height, or `null` if unchanged.
   */
  resize(): number | null {
    const constraint = this.heightConstraint;
    if (!constraint) return null;

    const { height, isAtMax } = this.getClampedHeight();
    this.updateMaxHeightState(isAtMax);

    if (height === constraint.constant) return null;

    this.changeHeight(constraint, height);
    return height;
  }

  durationValueChanged() {
    const duration = this.resizeDuration;
    this.setStyle(
      'transition',
      [
        this.initialStyles.transition,
        duration ? `height ${duration}ms ease-in-out` : '',
      ]
        .filter(Boolean)
        .join(', '),
    );
  }

  maxValueChanged() {
    this.resize();
  }

  minValueChanged() {
    this.resize();
  }

  scrollValueChanged(scroll: boolean) {
    this.setStyle('overflow-y', scroll ? 'auto' : 'hidden');
  }

  scrollbarValueChanged(scrollbar: boolean) {
    this.setStyle('scrollbar-width', scrollbar ? 'auto' : 'none');
  }

  private createHeightConstraint() {
    const { height, isAtMax } = this.getClampedHeight();
    this.updateMaxHeightState(isAtMax);
    return HeightConstraint.create(this.element, height);
  }

  private getClampedHeight(): ClampedHeight {
    const metrics = getBoxMetrics(this.element);
    const idealHeight = measureIdealHeight(this.element, metrics);

    return clampHeight(idealHeight, {
      max: this.resolveBound('max', this.maxResizableHeight, metrics),
      min: this.resolveBound('min', this.minResizableHeight, metrics),
    });
  }

  private resolveBound(
    bound: Bound,
    resizableHeight: ResizableHeight,
    metrics: BoxMetrics,
  ) {
    if (resizableHeight.type === 'lines' && metrics.lineHeight === null) {
      this.warnOnce(
        `${bound}-font`,
        `${this.identifier}: the ${bound} height is set in lines but no font is set on the element, it will be ignored.`,
      );
    }
    return resolveResizableHeight(resizableHeight, metrics);
  }

  private parseBound(bound: Bound, value: string): ResizableHeight {
    const resizableHeight = parseResizableHeight(value);
    if (resizableHeight) return resizableHeight;

    this.warnOnce(
      `${bound}-value`,
      `${this.identifier}: unable to read the ${bound} height '${value}', it will be ignored.`,
    );
    return UNBOUNDED;
  }

  /**
   * Turns scrolling on when the maximum height is reached, remembering the
   * previous settings to restore once the content fits again.
   */
  private updateMaxHeightState(isAtMax: boolean) {
    if (isAtMax === this.isAtMaxHeight) return;
    this.isAtMaxHeight = isAtMax;

    if (isAtMax) {
      this.savedAffordances = {
        scroll: this.scrollValue,
        scrollbar: this.scrollbarValue,
      };
      this.scrollValue = true;
      this.scrollbarValue = true;
      return;
    }

    if (this.savedAffordances) {
      this.scrollValue = this.savedAffordances.scroll;
      this.scrollbarValue = this.savedAffordances.scrollbar;
      this.savedAffordances = undefined;
    }
  }

  private changeHeight(constraint: HeightConstraint, height: number) {
    const previousHeight = constraint.constant;

    this.willChangeHeight?.(height);
    this.dispatch('resize', {
      cancelable: false,
      detail: { height, previousHeight },
    });
    this.application.logDebugActivity(this.identifier, 'resize', {
      height,
      previousHeight,
    });

    // Only the latest change can still be transitioning, settle the earlier one
    this.pendingResize?.abort();
    const pendingResize = new AbortController();
    this.pendingResize = pendingResize;

    // eslint-disable-next-line no-param-reassign
    constraint.constant = height;

    transition(this.element, {
      maxDelay: this.resizeDuration,
      propertyName: 'height',
      signal: pendingResize.signal,
    })
      .then(() => {
        this.heightDidChange(constraint, height);
        if (this.pendingResize === pendingResize) this.resizeDidSettle();
      })
      .catch((error: unknown) => {
        this.application.handleError(
          error instanceof Error ? error : new Error(String(error)),
          `${this.identifier}: error completing the resize`,
          { height },
        );
      });
  }

  /**
   * Completes a height change, unless the controller has since been
   * disconnected and the constraint it was changing is gone.
   */
  private heightDidChange(constraint: HeightConstraint, height: number) {
    if (this.heightConstraint !== constraint) return;

    this.didChangeHeight?.(height);
    this.element.scrollTop = 0;
    this.dispatch('resized', { cancelable: false, detail: { height } });
  }

  /**
   * Clears the pending transition and runs any layout resize that was held
   * back while it was running.
   */
  private resizeDidSettle() {
    this.pendingResize = undefined;
    if (!this.hasPendingLayout) return;
    this.hasPendingLayout = false;
    this.resize();
  }

  private setStyle(property: string, value: string) {
    if (value) {
      this.element.style.setProperty(property, value);
    } else {
      this.element.style.removeProperty(property);
    }
  }

  private warnOnce(key: string, message: string) {
    if (this.warned.has(key)) return;
    this.warned.add(key);
    // eslint-disable-next-line no-console
    console.warn(message);
  }
}
