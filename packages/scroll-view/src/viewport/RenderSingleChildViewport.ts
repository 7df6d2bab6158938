import { paintOffsetForScrollOffset, maxScrollExtent, shouldClipAtPaintOffset } from "../geometry/paintOffset";
import { addOffsets, ZERO_SIZE, type AxisDirection, type ClipBehavior, type Offset, type Size } from "../geometry/types";
import { getDefaultLogger, type ScrollViewLogger } from "../logger";
import type { ClipRectLayer, PaintingContext } from "../painting/PaintingContext";
import { LayerHandle } from "./LayerHandle";
import type { ScrollOffset } from "./ScrollOffset";

/**
 * The viewport's only child. Laying it out places no constraints on it; the returned size is
 * its natural size and is authoritative for the rest of the layout pass.
 */
export interface ViewportChild {
  layout(): Size;
}

export interface ViewportLayoutResult {
  childSize: Size;
  paintOffset: Offset;
  horizontalExtent: { min: number; max: number };
  verticalExtent: { min: number; max: number };
}

export interface RenderSingleChildViewportOptions {
  horizontalOffset: ScrollOffset;
  horizontalAxisDirection: AxisDirection;
  verticalOffset: ScrollOffset;
  verticalAxisDirection: AxisDirection;
  clipBehavior?: ClipBehavior;
  child?: ViewportChild | null;
  logger?: ScrollViewLogger;
}

function validateViewportDimension(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative finite number, got ${value}`);
  }
}

/**
 * Viewport that scrolls a single child along both axes.
 *
 * `layout()` must run before `paint()` for a given frame: layout measures the child, computes
 * where it is painted and reports the scrollable extents to both offsets; paint then decides
 * whether the child overflows and needs a clip.
 */
export class RenderSingleChildViewport {
  private _horizontalOffset: ScrollOffset;
  private _verticalOffset: ScrollOffset;
  private _horizontalAxisDirection: AxisDirection;
  private _verticalAxisDirection: AxisDirection;
  private _clipBehavior: ClipBehavior;
  private _child: ViewportChild | null;
  private _logger: ScrollViewLogger;

  private size: Size = ZERO_SIZE;
  private childSize: Size = ZERO_SIZE;
  private paintOffset: Offset | null = null;
  private _needsLayout = true;
  private disposed = false;

  private readonly clipRectLayer = new LayerHandle<ClipRectLayer>();

  constructor(options: RenderSingleChildViewportOptions) {
    this._horizontalOffset = options.horizontalOffset;
    this._verticalOffset = options.verticalOffset;
    this._horizontalAxisDirection = options.horizontalAxisDirection;
    this._verticalAxisDirection = options.verticalAxisDirection;
    this._clipBehavior = options.clipBehavior ?? "hardEdge";
    this._child = options.child ?? null;
    this._logger = options.logger ?? getDefaultLogger();
  }

  get logger(): ScrollViewLogger {
    return this._logger;
  }

  set logger(value: ScrollViewLogger) {
    this._logger = value;
  }

  get needsLayout(): boolean {
    return this._needsLayout;
  }

  get horizontalOffset(): ScrollOffset {
    return this._horizontalOffset;
  }

  set horizontalOffset(value: ScrollOffset) {
    if (value === this._horizontalOffset) return;
    this._horizontalOffset = value;
    this.markNeedsLayout();
  }

  get verticalOffset(): ScrollOffset {
    return this._verticalOffset;
  }

  set verticalOffset(value: ScrollOffset) {
    if (value === this._verticalOffset) return;
    this._verticalOffset = value;
    this.markNeedsLayout();
  }

  get horizontalAxisDirection(): AxisDirection {
    return this._horizontalAxisDirection;
  }

  set horizontalAxisDirection(value: AxisDirection) {
    if (value === this._horizontalAxisDirection) return;
    this._horizontalAxisDirection = value;
    this.markNeedsLayout();
  }

  get verticalAxisDirection(): AxisDirection {
    return this._verticalAxisDirection;
  }

  set verticalAxisDirection(value: AxisDirection) {
    if (value === this._verticalAxisDirection) return;
    this._verticalAxisDirection = value;
    this.markNeedsLayout();
  }

  get clipBehavior(): ClipBehavior {
    return this._clipBehavior;
  }

  set clipBehavior(value: ClipBehavior) {
    // Only paint depends on the clip behavior.
    this._clipBehavior = value;
  }

  get child(): ViewportChild | null {
    return this._child;
  }

  set child(value: ViewportChild | null) {
    if (value === this._child) return;
    this._child = value;
    this.paintOffset = null;
    this.childSize = ZERO_SIZE;
    this.markNeedsLayout();
  }

  get viewportSize(): Size {
    return this.size;
  }

  setViewportSize(width: number, height: number): void {
    validateViewportDimension("width", width);
    validateViewportDimension("height", height);
    if (width === this.size.width && height === this.size.height) return;
    this.size = { width, height };
    this.markNeedsLayout();
  }

  markNeedsLayout(): void {
    this._needsLayout = true;
  }

  /**
   * Lays out the child and reports content extents to both scroll offsets.
   *
   * Runs the full computation on every call; nothing is carried over from the previous pass.
   */
  layout(): ViewportLayoutResult {
    if (this.disposed) return this.lastLayoutResult();

    const viewportWidth = this.size.width;
    const viewportHeight = this.size.height;

    const child = this._child;
    if (!child) {
      this._horizontalOffset.applyViewportDimension(viewportWidth);
      this._verticalOffset.applyViewportDimension(viewportHeight);
      this._horizontalOffset.applyContentDimensions(0, 0);
      this._verticalOffset.applyContentDimensions(0, 0);
      this.childSize = ZERO_SIZE;
      this.paintOffset = null;
      this._needsLayout = false;
      return this.lastLayoutResult();
    }

    const childSize = child.layout();
    let scrollOffset = { x: this._horizontalOffset.pixels, y: this._verticalOffset.pixels };
    // Throws for an invalid direction pair before either offset is touched.
    let paintOffset = this.computePaintOffset(scrollOffset, childSize);

    const horizontalMax = maxScrollExtent(childSize.width, viewportWidth);
    const verticalMax = maxScrollExtent(childSize.height, viewportHeight);
    this._horizontalOffset.applyViewportDimension(viewportWidth);
    this._verticalOffset.applyViewportDimension(viewportHeight);
    this._horizontalOffset.applyContentDimensions(0, horizontalMax);
    this._verticalOffset.applyContentDimensions(0, verticalMax);

    // Reporting smaller extents may have clamped a position that was past the new end.
    if (scrollOffset.x !== this._horizontalOffset.pixels || scrollOffset.y !== this._verticalOffset.pixels) {
      scrollOffset = { x: this._horizontalOffset.pixels, y: this._verticalOffset.pixels };
      paintOffset = this.computePaintOffset(scrollOffset, childSize);
    }

    this.childSize = childSize;
    this.paintOffset = paintOffset;
    this._needsLayout = false;

    this.logger.debug(
      {
        viewport: this.size,
        childSize,
        scrollOffset,
        paintOffset,
        maxScrollX: horizontalMax,
        maxScrollY: verticalMax
      },
      "viewport layout"
    );

    return {
      childSize,
      paintOffset,
      horizontalExtent: { min: 0, max: horizontalMax },
      verticalExtent: { min: 0, max: verticalMax }
    };
  }

  private lastLayoutResult(): ViewportLayoutResult {
    return {
      childSize: this.childSize,
      paintOffset: this.paintOffset ?? { x: 0, y: 0 },
      horizontalExtent: { min: 0, max: maxScrollExtent(this.childSize.width, this.size.width) },
      verticalExtent: { min: 0, max: maxScrollExtent(this.childSize.height, this.size.height) }
    };
  }

  private computePaintOffset(scrollOffset: Offset, childSize: Size): Offset {
    try {
      return paintOffsetForScrollOffset({
        horizontalAxisDirection: this._horizontalAxisDirection,
        verticalAxisDirection: this._verticalAxisDirection,
        scrollOffset,
        childSize,
        viewportSize: this.size
      });
    } catch (err) {
      this.logger.error(
        {
          err,
          horizontalAxisDirection: this._horizontalAxisDirection,
          verticalAxisDirection: this._verticalAxisDirection
        },
        "viewport layout failed"
      );
      throw err;
    }
  }

  /**
   * Offset at which the child was placed by the last layout, or `null` before the first layout
   * or when there is no child.
   */
  getPaintOffset(): Offset | null {
    return this.paintOffset;
  }

  /** The cached clip layer, if the last paint clipped. */
  get clipLayer(): ClipRectLayer | null {
    return this.clipRectLayer.layer;
  }

  /**
   * Whether painting the laid-out child at its paint offset needs a clip with the current
   * clip behavior.
   */
  shouldClip(): boolean {
    if (!this._child || !this.paintOffset) return false;
    return shouldClipAtPaintOffset(this._clipBehavior, this.paintOffset, this.childSize, this.size);
  }

  paint(context: PaintingContext, offset: Offset): void {
    if (this.disposed) return;
    const child = this._child;
    const paintOffset = this.paintOffset;
    if (!child || !paintOffset) return;

    if (shouldClipAtPaintOffset(this._clipBehavior, paintOffset, this.childSize, this.size)) {
      this.clipRectLayer.layer = context.pushClipRect(
        offset,
        { x: 0, y: 0, width: this.size.width, height: this.size.height },
        (ctx, origin) => ctx.paintChild(addOffsets(origin, paintOffset)),
        { clipBehavior: this._clipBehavior, oldLayer: this.clipRectLayer.layer }
      );
    } else {
      this.clipRectLayer.layer = null;
      context.paintChild(addOffsets(offset, paintOffset));
    }
  }

  dispose(): void {
    this.clipRectLayer.layer = null;
    this.disposed = true;
  }
}
