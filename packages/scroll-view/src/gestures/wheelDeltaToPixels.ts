import type { Offset, Size } from "../geometry/types";

export interface WheelLike {
  deltaX: number;
  deltaY: number;
  deltaMode: number;
  shiftKey?: boolean;
}

export interface WheelDeltaOptions {
  /**
   * Pixel height of one "line" when `WheelEvent.deltaMode === DOM_DELTA_LINE`.
   *
   * Browsers disagree on line-mode deltas (Firefox typically emits `deltaY=3`),
   * so the line unit is converted into pixels to keep scrolling speed consistent.
   */
  lineHeight?: number;
  /**
   * Viewport size used as the page size when `WheelEvent.deltaMode === DOM_DELTA_PAGE`.
   */
  pageSize?: Size;
}

const DEFAULT_LINE_HEIGHT = 16;

function toPixels(delta: number, deltaMode: number, lineHeight: number, pageSize: number): number {
  if (!Number.isFinite(delta)) return 0;
  switch (deltaMode) {
    // DOM_DELTA_LINE
    case 1:
      return delta * lineHeight;
    // DOM_DELTA_PAGE
    case 2:
      return delta * pageSize;
    // DOM_DELTA_PIXEL
    default:
      return delta;
  }
}

/**
 * Converts a wheel event into a visual pixel delta on both axes. Shift+wheel with no horizontal
 * component scrolls horizontally.
 */
export function wheelDeltaToPixels(event: WheelLike, options?: WheelDeltaOptions): Offset {
  const rawLineHeight = options?.lineHeight;
  const lineHeight =
    rawLineHeight !== undefined && Number.isFinite(rawLineHeight) && rawLineHeight > 0 ? rawLineHeight : DEFAULT_LINE_HEIGHT;
  const page = options?.pageSize ?? { width: 800, height: 800 };

  let x = toPixels(event.deltaX, event.deltaMode, lineHeight, page.width);
  let y = toPixels(event.deltaY, event.deltaMode, lineHeight, page.height);

  if (event.shiftKey && x === 0) {
    x = y;
    y = 0;
  }

  return { x, y };
}
