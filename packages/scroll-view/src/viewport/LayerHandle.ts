import type { ClipRectLayer } from "../painting/PaintingContext";

/**
 * Owns at most one layer. Assigning a different layer (or `null`) disposes the previous one,
 * so callers only have to clear the handle on each exit path.
 */
export class LayerHandle<T extends ClipRectLayer> {
  private current: T | null = null;

  get layer(): T | null {
    return this.current;
  }

  set layer(next: T | null) {
    if (next === this.current) return;
    const previous = this.current;
    this.current = next;
    if (previous && !previous.disposed) previous.dispose();
  }
}
