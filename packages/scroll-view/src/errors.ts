/**
 * Raised while constructing a scroll view from options that contradict each other
 * (for example `primary: true` alongside an explicit controller for the main axis).
 */
export class ScrollViewConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScrollViewConfigurationError";
  }
}

/**
 * Raised during layout when the viewport was wired with an axis-direction pair that does
 * not describe one horizontal and one vertical direction.
 */
export class ViewportGeometryError extends Error {
  readonly horizontalAxisDirection: string;
  readonly verticalAxisDirection: string;

  constructor(horizontalAxisDirection: string, verticalAxisDirection: string) {
    super(
      `Invalid axis direction pair for a two-dimensional viewport: horizontal=${horizontalAxisDirection}, vertical=${verticalAxisDirection}`
    );
    this.name = "ViewportGeometryError";
    this.horizontalAxisDirection = horizontalAxisDirection;
    this.verticalAxisDirection = verticalAxisDirection;
  }
}
