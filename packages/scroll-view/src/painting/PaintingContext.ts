import type { ClipBehavior, Offset, Rect } from "../geometry/types";

/**
 * A clip region established by {@link PaintingContext.pushClipRect}. Layers are cached by
 * their owner between frames and released through {@link ClipRectLayer.dispose}.
 */
export interface ClipRectLayer {
  /** Clip bounds in the painting context's coordinate space. */
  readonly clipRect: Rect;
  readonly clipBehavior: ClipBehavior;
  readonly disposed: boolean;
  dispose(): void;
}

export type PaintCallback = (context: PaintingContext, offset: Offset) => void;

export interface PaintingContext {
  /**
   * Draws the viewport's child with its top-left corner at `offset`.
   */
  paintChild(offset: Offset): void;

  /**
   * Clips to `clipRect` (relative to `offset`) while `painter` runs.
   *
   * When `oldLayer` is provided and still describes the same region it is returned unchanged;
   * otherwise it is disposed and a new layer is returned.
   */
  pushClipRect(
    offset: Offset,
    clipRect: Rect,
    painter: PaintCallback,
    options: { clipBehavior: ClipBehavior; oldLayer: ClipRectLayer | null }
  ): ClipRectLayer;
}
