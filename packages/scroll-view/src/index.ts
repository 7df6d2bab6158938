export type {
  Axis,
  AxisDirection,
  ClipBehavior,
  HorizontalAxisDirection,
  Offset,
  Rect,
  Size,
  TextDirection,
  VerticalAxisDirection
} from "./geometry/types";
export {
  axisDirectionIsReversed,
  axisOf,
  horizontalAxisDirection,
  verticalAxisDirection
} from "./geometry/axisDirection";
export {
  childOverflowsViewport,
  maxScrollExtent,
  paintOffsetForScrollOffset,
  shouldClipAtPaintOffset
} from "./geometry/paintOffset";

export type { EdgeInsets, EdgeInsetsDirectional, EdgeInsetsGeometry } from "./layout/EdgeInsets";
export { EDGE_INSETS_ZERO, edgeInsetsAll, edgeInsetsSymmetric, inflateSize, resolveEdgeInsets } from "./layout/EdgeInsets";

export { ScrollOffset } from "./viewport/ScrollOffset";
export type { ScrollOffsetListener } from "./viewport/ScrollOffset";
export { ScrollController } from "./viewport/ScrollController";
export type { ScrollPhysics } from "./viewport/ScrollPhysics";
export {
  ClampingScrollPhysics,
  DEFAULT_SCROLL_PHYSICS,
  NeverScrollableScrollPhysics,
  applyUserScroll
} from "./viewport/ScrollPhysics";
export { LayerHandle } from "./viewport/LayerHandle";
export { RenderSingleChildViewport } from "./viewport/RenderSingleChildViewport";
export type {
  RenderSingleChildViewportOptions,
  ViewportChild,
  ViewportLayoutResult
} from "./viewport/RenderSingleChildViewport";

export type { ClipRectLayer, PaintCallback, PaintingContext } from "./painting/PaintingContext";
export { DomPaintingContext } from "./painting/DomPaintingContext";

export type { DiagonalDragBehavior, DragLock, DragSession, DragStartBehavior } from "./gestures/diagonalDrag";
export {
  AXIS_LOCK_ANGLE,
  DRAG_SLOP,
  DragTracker,
  axisWithinLockAngle,
  createDragSession,
  dragDeltaToScrollDelta,
  resolveDragDelta,
  wheelDeltaToScrollDelta
} from "./gestures/diagonalDrag";
export type { ScrollViewKeyboardDismissBehavior } from "./gestures/keyboardDismiss";
export { dismissKeyboardOnDrag } from "./gestures/keyboardDismiss";
export { wheelDeltaToPixels } from "./gestures/wheelDeltaToPixels";
export type { WheelDeltaOptions, WheelLike } from "./gestures/wheelDeltaToPixels";

export type { AxisConfiguration, ResolvedScrollViewOptions, ScrollViewOptions } from "./config/scrollViewOptions";
export { ScrollViewSettingsSchema, resolveScrollViewOptions } from "./config/scrollViewOptions";

export { ScrollViewConfigurationError, ViewportGeometryError } from "./errors";
export { createLogger, getDefaultLogger } from "./logger";
export type { ScrollViewLogger } from "./logger";

export { SingleChildTwoDimensionalScrollView } from "./react/SingleChildTwoDimensionalScrollView";
export type { ScrollViewApi, SingleChildTwoDimensionalScrollViewProps } from "./react/SingleChildTwoDimensionalScrollView";
export { PrimaryScrollController, usePrimaryScrollController } from "./react/PrimaryScrollController";
export type { PrimaryScrollControllerProps } from "./react/PrimaryScrollController";
