import type { Size, TextDirection } from "../geometry/types";

export interface EdgeInsets {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Insets whose horizontal sides follow the reading direction: `start` is the left side for
 * ltr text and the right side for rtl text.
 */
export interface EdgeInsetsDirectional {
  start: number;
  top: number;
  end: number;
  bottom: number;
}

export type EdgeInsetsGeometry = EdgeInsets | EdgeInsetsDirectional;

export const EDGE_INSETS_ZERO: Readonly<EdgeInsets> = Object.freeze({ left: 0, top: 0, right: 0, bottom: 0 });

export function edgeInsetsAll(value: number): EdgeInsets {
  return { left: value, top: value, right: value, bottom: value };
}

export function edgeInsetsSymmetric(options: { horizontal?: number; vertical?: number }): EdgeInsets {
  const horizontal = options.horizontal ?? 0;
  const vertical = options.vertical ?? 0;
  return { left: horizontal, top: vertical, right: horizontal, bottom: vertical };
}

function isDirectional(insets: EdgeInsetsGeometry): insets is EdgeInsetsDirectional {
  return "start" in insets;
}

function sanitizeInset(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function resolveEdgeInsets(insets: EdgeInsetsGeometry | null | undefined, textDirection: TextDirection): EdgeInsets {
  if (!insets) return EDGE_INSETS_ZERO;

  if (isDirectional(insets)) {
    const ltr = textDirection === "ltr";
    return {
      left: sanitizeInset(ltr ? insets.start : insets.end),
      top: sanitizeInset(insets.top),
      right: sanitizeInset(ltr ? insets.end : insets.start),
      bottom: sanitizeInset(insets.bottom)
    };
  }

  return {
    left: sanitizeInset(insets.left),
    top: sanitizeInset(insets.top),
    right: sanitizeInset(insets.right),
    bottom: sanitizeInset(insets.bottom)
  };
}

export function horizontalInsets(insets: EdgeInsets): number {
  return insets.left + insets.right;
}

export function verticalInsets(insets: EdgeInsets): number {
  return insets.top + insets.bottom;
}

/**
 * Size of a box holding content of `size` surrounded by `insets`.
 */
export function inflateSize(size: Size, insets: EdgeInsets): Size {
  return {
    width: size.width + horizontalInsets(insets),
    height: size.height + verticalInsets(insets)
  };
}
