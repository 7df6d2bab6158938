import type { Axis, AxisDirection, HorizontalAxisDirection, TextDirection, VerticalAxisDirection } from "./types";

export function horizontalAxisDirection(textDirection: TextDirection, reverse: boolean): HorizontalAxisDirection {
  // Reading order for ltr text runs rightwards; `reverse` flips whatever reading order gives.
  const readingRight = textDirection === "ltr";
  return readingRight !== reverse ? "right" : "left";
}

export function verticalAxisDirection(reverse: boolean): VerticalAxisDirection {
  return reverse ? "up" : "down";
}

export function axisOf(direction: AxisDirection): Axis {
  return direction === "left" || direction === "right" ? "horizontal" : "vertical";
}

/**
 * Whether the direction runs against increasing pixel coordinates (leftwards or upwards).
 */
export function axisDirectionIsReversed(direction: AxisDirection): boolean {
  return direction === "left" || direction === "up";
}
