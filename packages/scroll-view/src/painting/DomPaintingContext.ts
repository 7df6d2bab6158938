import { rectsEqual, type ClipBehavior, type Offset, type Rect } from "../geometry/types";
import type { ClipRectLayer, PaintCallback, PaintingContext } from "./PaintingContext";

interface SavedStyle {
  overflow: string;
  clipPath: string;
}

function restoreProperty(element: HTMLElement, property: string, value: string): void {
  if (value) {
    element.style.setProperty(property, value);
  } else {
    element.style.removeProperty(property);
  }
}

/**
 * Clips the viewport element to `clipRect`, given relative to the element's border box.
 *
 * Uses `overflow: clip` rather than `hidden` so the element never becomes a scroll container.
 * Dispose puts back the inline styles the layer replaced.
 */
class DomClipRectLayer implements ClipRectLayer {
  readonly clipRect: Rect;
  readonly clipBehavior: ClipBehavior;
  private readonly element: HTMLElement;
  private readonly saved: SavedStyle;
  private _disposed = false;

  constructor(element: HTMLElement, clipRect: Rect, clipBehavior: ClipBehavior) {
    this.element = element;
    this.clipRect = clipRect;
    this.clipBehavior = clipBehavior;
    this.saved = {
      overflow: element.style.getPropertyValue("overflow"),
      clipPath: element.style.getPropertyValue("clip-path")
    };

    const bounds = element.getBoundingClientRect();
    const top = clipRect.y;
    const left = clipRect.x;
    const right = Math.max(0, bounds.width - (clipRect.x + clipRect.width));
    const bottom = Math.max(0, bounds.height - (clipRect.y + clipRect.height));

    element.style.setProperty("overflow", "clip");
    element.style.setProperty("clip-path", `inset(${top}px ${right}px ${bottom}px ${left}px)`);
    element.dataset.clip = clipBehavior;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    restoreProperty(this.element, "overflow", this.saved.overflow);
    restoreProperty(this.element, "clip-path", this.saved.clipPath);
    delete this.element.dataset.clip;
  }
}

/**
 * Paints a viewport whose child is an absolutely positioned element inside the viewport
 * element. Offsets are relative to the viewport element's padding box.
 */
export class DomPaintingContext implements PaintingContext {
  private readonly viewportElement: HTMLElement;
  private readonly childElement: HTMLElement;

  constructor(elements: { viewport: HTMLElement; child: HTMLElement }) {
    this.viewportElement = elements.viewport;
    this.childElement = elements.child;
  }

  paintChild(offset: Offset): void {
    const transform = `translate(${offset.x}px, ${offset.y}px)`;
    if (this.childElement.style.transform !== transform) {
      this.childElement.style.transform = transform;
    }
  }

  pushClipRect(
    offset: Offset,
    clipRect: Rect,
    painter: PaintCallback,
    options: { clipBehavior: ClipBehavior; oldLayer: ClipRectLayer | null }
  ): ClipRectLayer {
    const rect: Rect = {
      x: offset.x + clipRect.x,
      y: offset.y + clipRect.y,
      width: clipRect.width,
      height: clipRect.height
    };

    const { oldLayer, clipBehavior } = options;
    let layer: ClipRectLayer;
    if (oldLayer && !oldLayer.disposed && oldLayer.clipBehavior === clipBehavior && rectsEqual(oldLayer.clipRect, rect)) {
      layer = oldLayer;
    } else {
      oldLayer?.dispose();
      layer = new DomClipRectLayer(this.viewportElement, rect, clipBehavior);
    }

    painter(this, offset);
    return layer;
  }
}
