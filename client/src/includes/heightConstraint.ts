const PIXELS_PATTERN = /^(\d*\.?\d+)px$/;

const parsePixels = (value: string) => {
  const match = PIXELS_PATTERN.exec(value.trim());
  return match ? Number(match[1]) : null;
};

/**
 * The height an element is held to, applied through its inline `height` style
 * so that the browser's layout enforces it.
 *
 * A constraint is either discovered from a pixel height already present in
 * the element's markup, or created (and owned) by the caller. Removing an
 * owned constraint clears the inline height; removing a discovered one puts
 * back the height the markup declared.
 */
export class HeightConstraint {
  readonly element: HTMLElement;
  readonly isOwned: boolean;
  private readonly initialHeight: string;
  private value: number;

  private constructor(element: HTMLElement, value: number, isOwned: boolean) {
    this.element = element;
    this.value = value;
    this.isOwned = isOwned;
    this.initialHeight = element.style.getPropertyValue('height');
  }

  /**
   * Finds an existing pixel height on the element, if there is one.
   */
  static find(element: HTMLElement): HeightConstraint | null {
    const height = parsePixels(element.style.height);
    return height === null ? null : new HeightConstraint(element, height, false);
  }

  /**
   * Creates a new constraint, writing the initial height to the element.
   */
  static create(element: HTMLElement, height: number): HeightConstraint {
    const constraint = new HeightConstraint(element, height, true);
    constraint.apply();
    return constraint;
  }

  get constant(): number {
    return this.value;
  }

  set constant(height: number) {
    this.value = height;
    this.apply();
  }

  remove() {
    if (this.isOwned) {
      this.element.style.removeProperty('height');
    } else {
      this.element.style.setProperty('height', this.initialHeight);
    }
  }

  private apply() {
    this.element.style.setProperty('height', `${this.value}px`);
  }
}
