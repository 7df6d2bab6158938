import type { ScrollOffset } from "./ScrollOffset";

/**
 * Decides how user input (wheel, drag) moves a scroll offset. Programmatic moves through a
 * controller do not consult physics.
 */
export interface ScrollPhysics {
  shouldAcceptUserOffset(offset: ScrollOffset): boolean;
  /**
   * Returns the new pixel value for `delta` pixels of user scroll.
   */
  applyUserDelta(offset: ScrollOffset, delta: number): number;
}

export class ClampingScrollPhysics implements ScrollPhysics {
  shouldAcceptUserOffset(offset: ScrollOffset): boolean {
    return offset.maxScrollExtent > offset.minScrollExtent;
  }

  applyUserDelta(offset: ScrollOffset, delta: number): number {
    if (!Number.isFinite(delta)) return offset.pixels;
    const next = offset.pixels + delta;
    return Math.min(offset.maxScrollExtent, Math.max(offset.minScrollExtent, next));
  }
}

export class NeverScrollableScrollPhysics implements ScrollPhysics {
  shouldAcceptUserOffset(): boolean {
    return false;
  }

  applyUserDelta(offset: ScrollOffset): number {
    return offset.pixels;
  }
}

export const DEFAULT_SCROLL_PHYSICS: ScrollPhysics = new ClampingScrollPhysics();

/**
 * Applies a user scroll delta through `physics`. Returns whether the offset moved.
 */
export function applyUserScroll(offset: ScrollOffset, physics: ScrollPhysics, delta: number): boolean {
  if (delta === 0 || !physics.shouldAcceptUserOffset(offset)) return false;
  const before = offset.pixels;
  offset.jumpTo(physics.applyUserDelta(offset, delta));
  return offset.pixels !== before;
}
