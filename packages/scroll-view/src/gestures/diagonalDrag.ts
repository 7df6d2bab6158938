import { axisDirectionIsReversed } from "../geometry/axisDirection";
import type { Axis, AxisDirection, Offset } from "../geometry/types";

/**
 * How a drag that is not parallel to either axis is split between the two scroll offsets.
 *
 * - `none`: the drag is locked to the axis its first movement favours, for the whole drag.
 * - `weightedEvent`: the first movement decides; if it is within {@link AXIS_LOCK_ANGLE} of an
 *   axis the drag is locked to that axis, otherwise it moves both axes until it ends.
 * - `weightedContinuous`: like `weightedEvent`, re-evaluated for every movement.
 * - `free`: every movement moves both axes.
 */
export type DiagonalDragBehavior = "none" | "weightedEvent" | "weightedContinuous" | "free";

export type DragStartBehavior = "start" | "down";

export type DragLock = Axis | "both";

export interface DragSession {
  lock: DragLock | null;
}

export const AXIS_LOCK_ANGLE = Math.PI / 8;

export function createDragSession(): DragSession {
  return { lock: null };
}

/**
 * The axis `delta` runs within {@link AXIS_LOCK_ANGLE} of, or `null` for a diagonal movement.
 */
export function axisWithinLockAngle(delta: Offset): Axis | null {
  const angle = Math.atan2(Math.abs(delta.y), Math.abs(delta.x));
  if (angle <= AXIS_LOCK_ANGLE) return "horizontal";
  if (angle >= Math.PI / 2 - AXIS_LOCK_ANGLE) return "vertical";
  return null;
}

function dominantAxis(delta: Offset): Axis {
  return Math.abs(delta.x) >= Math.abs(delta.y) ? "horizontal" : "vertical";
}

function applyLock(delta: Offset, lock: DragLock): Offset {
  switch (lock) {
    case "horizontal":
      return { x: delta.x, y: 0 };
    case "vertical":
      return { x: 0, y: delta.y };
    case "both":
      return { x: delta.x, y: delta.y };
  }
}

/**
 * Filters a pointer movement according to `behavior`. `session` carries the lock decided by
 * earlier movements of the same drag and is updated in place.
 */
export function resolveDragDelta(behavior: DiagonalDragBehavior, delta: Offset, session: DragSession): Offset {
  if (delta.x === 0 && delta.y === 0) return { x: 0, y: 0 };

  switch (behavior) {
    case "free":
      return { x: delta.x, y: delta.y };
    case "weightedContinuous":
      return applyLock(delta, axisWithinLockAngle(delta) ?? "both");
    case "weightedEvent":
      session.lock ??= axisWithinLockAngle(delta) ?? "both";
      return applyLock(delta, session.lock);
    case "none":
      session.lock ??= dominantAxis(delta);
      return applyLock(delta, session.lock);
  }
}

/**
 * Converts a visual drag movement along one axis into a change of that axis's scroll pixels.
 * Content follows the pointer, so a forward axis scrolls against the movement.
 */
export function dragDeltaToScrollDelta(direction: AxisDirection, dragDelta: number): number {
  return axisDirectionIsReversed(direction) ? dragDelta : -dragDelta;
}

/**
 * Converts a wheel delta along one axis into a change of that axis's scroll pixels.
 */
export function wheelDeltaToScrollDelta(direction: AxisDirection, wheelDelta: number): number {
  return axisDirectionIsReversed(direction) ? -wheelDelta : wheelDelta;
}

export const DRAG_SLOP = 8;

/**
 * Tracks one pointer from pointerdown until the drag is recognized and then reports the
 * movement since the previous event.
 */
export class DragTracker {
  private readonly downPoint: Offset;
  private lastPoint: Offset;
  private started = false;
  private readonly dragStartBehavior: DragStartBehavior;
  private readonly slop: number;

  constructor(downPoint: Offset, options: { dragStartBehavior: DragStartBehavior; slop?: number }) {
    this.downPoint = downPoint;
    this.lastPoint = downPoint;
    this.dragStartBehavior = options.dragStartBehavior;
    this.slop = options.slop ?? DRAG_SLOP;
  }

  get isDragging(): boolean {
    return this.started;
  }

  /**
   * Returns `null` while the pointer is still within the slop, and the movement since the last
   * reported point once dragging.
   *
   * With `start` the drag origin is where the drag was recognized, so the slop distance is not
   * applied; with `down` it is the pointerdown point and the first movement includes the slop.
   */
  move(point: Offset): { delta: Offset; started: boolean } | null {
    if (!this.started) {
      const dx = point.x - this.downPoint.x;
      const dy = point.y - this.downPoint.y;
      if (Math.hypot(dx, dy) < this.slop) return null;

      this.started = true;
      const origin = this.dragStartBehavior === "down" ? this.downPoint : point;
      this.lastPoint = point;
      return { delta: { x: point.x - origin.x, y: point.y - origin.y }, started: true };
    }

    const delta = { x: point.x - this.lastPoint.x, y: point.y - this.lastPoint.y };
    this.lastPoint = point;
    return { delta, started: false };
  }
}
