import type { Axis } from "../geometry/types";

export type ScrollOffsetListener = (pixels: number) => void;

/**
 * Scroll position of one axis.
 *
 * The viewport reads `pixels` and reports the viewport and content extents back every layout
 * pass. Only user input (through physics) and controllers move `pixels`; reporting extents
 * clamps it back into range when the content shrank underneath an existing position.
 */
export class ScrollOffset {
  readonly axis: Axis;

  private _pixels: number;
  private _minScrollExtent = 0;
  private _maxScrollExtent = 0;
  private _viewportDimension = 0;
  private haveDimensions = false;
  private disposed = false;
  private readonly listeners = new Set<ScrollOffsetListener>();

  constructor(axis: Axis, initialPixels = 0) {
    if (!Number.isFinite(initialPixels)) {
      throw new Error(`initialPixels must be a finite number, got ${initialPixels}`);
    }
    this.axis = axis;
    this._pixels = initialPixels;
  }

  get pixels(): number {
    return this._pixels;
  }

  get minScrollExtent(): number {
    return this._minScrollExtent;
  }

  get maxScrollExtent(): number {
    return this._maxScrollExtent;
  }

  get viewportDimension(): number {
    return this._viewportDimension;
  }

  get hasContentDimensions(): boolean {
    return this.haveDimensions;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  applyViewportDimension(viewportDimension: number): boolean {
    const next = Math.max(0, viewportDimension);
    if (next === this._viewportDimension) return false;
    this._viewportDimension = next;
    return true;
  }

  /**
   * Returns whether the extents or the (clamped) pixel value changed.
   */
  applyContentDimensions(minScrollExtent: number, maxScrollExtent: number): boolean {
    if (!Number.isFinite(minScrollExtent) || !Number.isFinite(maxScrollExtent)) {
      throw new Error(`content dimensions must be finite, got [${minScrollExtent}, ${maxScrollExtent}]`);
    }

    const min = minScrollExtent;
    const max = Math.max(min, maxScrollExtent);
    let changed = !this.haveDimensions || min !== this._minScrollExtent || max !== this._maxScrollExtent;

    this._minScrollExtent = min;
    this._maxScrollExtent = max;
    this.haveDimensions = true;

    const clamped = Math.min(max, Math.max(min, this._pixels));
    if (clamped !== this._pixels) {
      this.setPixels(clamped);
      changed = true;
    }
    return changed;
  }

  /**
   * Moves the position without consulting physics. Values outside the known extents are
   * clamped once extents have been reported.
   */
  jumpTo(pixels: number): void {
    if (!Number.isFinite(pixels)) return;
    const next = this.haveDimensions
      ? Math.min(this._maxScrollExtent, Math.max(this._minScrollExtent, pixels))
      : pixels;
    this.setPixels(next);
  }

  subscribe(listener: ScrollOffsetListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }

  private setPixels(pixels: number): void {
    if (pixels === this._pixels) return;
    this._pixels = pixels;
    for (const listener of [...this.listeners]) {
      listener(pixels);
    }
  }
}
