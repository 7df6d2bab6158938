export type Axis = "horizontal" | "vertical";

export type HorizontalAxisDirection = "right" | "left";
export type VerticalAxisDirection = "down" | "up";
export type AxisDirection = HorizontalAxisDirection | VerticalAxisDirection;

export type TextDirection = "ltr" | "rtl";

export type ClipBehavior = "none" | "hardEdge" | "antiAlias" | "antiAliasWithSaveLayer";

export interface Offset {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const ZERO_OFFSET: Readonly<Offset> = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Readonly<Size> = Object.freeze({ width: 0, height: 0 });

export function addOffsets(a: Offset, b: Offset): Offset {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}
