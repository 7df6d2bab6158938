import { ViewportGeometryError } from "../errors";
import type { AxisDirection, ClipBehavior, Offset, Size } from "./types";

/**
 * Maps the scroll position of both axes to the translation applied to the child before it is
 * painted.
 *
 * Forward axes (`right`, `down`) anchor the child's leading edge at the viewport's leading
 * edge and move it against the scroll position. Reversed axes (`left`, `up`) anchor the
 * child's trailing edge at the viewport's trailing edge instead, so a scroll position of 0
 * shows the end of the child.
 */
export function paintOffsetForScrollOffset(options: {
  horizontalAxisDirection: AxisDirection;
  verticalAxisDirection: AxisDirection;
  scrollOffset: Offset;
  childSize: Size;
  viewportSize: Size;
}): Offset {
  const { horizontalAxisDirection, verticalAxisDirection, scrollOffset, childSize, viewportSize } = options;
  const key = `${horizontalAxisDirection}:${verticalAxisDirection}`;

  switch (key) {
    case "right:down":
      return { x: 0 - scrollOffset.x, y: 0 - scrollOffset.y };
    case "right:up":
      return { x: 0 - scrollOffset.x, y: scrollOffset.y - childSize.height + viewportSize.height };
    case "left:down":
      return { x: scrollOffset.x - childSize.width + viewportSize.width, y: 0 - scrollOffset.y };
    case "left:up":
      return {
        x: scrollOffset.x - childSize.width + viewportSize.width,
        y: scrollOffset.y - childSize.height + viewportSize.height
      };
    default:
      throw new ViewportGeometryError(horizontalAxisDirection, verticalAxisDirection);
  }
}

/**
 * Largest scroll position along one axis: how far the child overflows the viewport, or 0 when
 * it fits.
 */
export function maxScrollExtent(childDimension: number, viewportDimension: number): number {
  return Math.max(0, childDimension - viewportDimension);
}

export function childOverflowsViewport(paintOffset: Offset, childSize: Size, viewportSize: Size): boolean {
  return (
    paintOffset.x < 0 ||
    paintOffset.y < 0 ||
    paintOffset.x + childSize.width > viewportSize.width ||
    paintOffset.y + childSize.height > viewportSize.height
  );
}

export function shouldClipAtPaintOffset(
  clipBehavior: ClipBehavior,
  paintOffset: Offset,
  childSize: Size,
  viewportSize: Size
): boolean {
  switch (clipBehavior) {
    case "none":
      return false;
    case "hardEdge":
    case "antiAlias":
    case "antiAliasWithSaveLayer":
      return childOverflowsViewport(paintOffset, childSize, viewportSize);
  }
}
