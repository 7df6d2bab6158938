import type { Axis } from "../geometry/types";
import { ScrollOffset, type ScrollOffsetListener } from "./ScrollOffset";

/**
 * Caller-owned handle on the scroll position of one axis.
 *
 * A scroll view asks the controller for an offset with {@link createScrollOffset}, attaches it
 * for as long as it is mounted, and detaches it on teardown. The controller can then read the
 * position or move it.
 */
export class ScrollController {
  readonly initialScrollOffset: number;

  private readonly offsets: ScrollOffset[] = [];
  private readonly listeners = new Set<ScrollOffsetListener>();
  private readonly unsubscribers = new Map<ScrollOffset, () => void>();
  private disposed = false;

  constructor(options: { initialScrollOffset?: number } = {}) {
    const initialScrollOffset = options.initialScrollOffset ?? 0;
    if (!Number.isFinite(initialScrollOffset)) {
      throw new Error(`initialScrollOffset must be a finite number, got ${initialScrollOffset}`);
    }
    this.initialScrollOffset = initialScrollOffset;
  }

  createScrollOffset(axis: Axis): ScrollOffset {
    return new ScrollOffset(axis, this.initialScrollOffset);
  }

  get hasClients(): boolean {
    return this.offsets.length > 0;
  }

  /**
   * The single attached scroll offset. Throws when nothing or more than one offset is attached.
   */
  get position(): ScrollOffset {
    if (this.offsets.length === 0) {
      throw new Error("ScrollController is not attached to any scroll view.");
    }
    if (this.offsets.length > 1) {
      throw new Error(`ScrollController is attached to ${this.offsets.length} scroll views.`);
    }
    return this.offsets[0]!;
  }

  get offset(): number {
    return this.position.pixels;
  }

  attach(offset: ScrollOffset): void {
    if (this.disposed) {
      throw new Error("Cannot attach to a disposed ScrollController.");
    }
    if (this.offsets.includes(offset)) return;
    this.offsets.push(offset);
    this.unsubscribers.set(
      offset,
      offset.subscribe((pixels) => {
        for (const listener of [...this.listeners]) listener(pixels);
      })
    );
  }

  detach(offset: ScrollOffset): void {
    const index = this.offsets.indexOf(offset);
    if (index === -1) return;
    this.offsets.splice(index, 1);
    this.unsubscribers.get(offset)?.();
    this.unsubscribers.delete(offset);
  }

  jumpTo(value: number): void {
    for (const offset of this.offsets) offset.jumpTo(value);
  }

  scrollBy(delta: number): void {
    for (const offset of this.offsets) offset.jumpTo(offset.pixels + delta);
  }

  subscribe(listener: ScrollOffsetListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.values()) unsubscribe();
    this.unsubscribers.clear();
    this.offsets.length = 0;
    this.listeners.clear();
    this.disposed = true;
  }
}
