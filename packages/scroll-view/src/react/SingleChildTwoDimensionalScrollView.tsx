import React, { useImperativeHandle, useLayoutEffect, useMemo, useRef } from "react";
import { resolveScrollViewOptions, type ScrollViewOptions } from "../config/scrollViewOptions";
import { ZERO_OFFSET, type Offset, type Size } from "../geometry/types";
import {
  createDragSession,
  dragDeltaToScrollDelta,
  DragTracker,
  resolveDragDelta,
  wheelDeltaToScrollDelta,
  type DragSession
} from "../gestures/diagonalDrag";
import { dismissKeyboardOnDrag } from "../gestures/keyboardDismiss";
import { wheelDeltaToPixels } from "../gestures/wheelDeltaToPixels";
import { inflateSize } from "../layout/EdgeInsets";
import { getDefaultLogger, type ScrollViewLogger } from "../logger";
import { DomPaintingContext } from "../painting/DomPaintingContext";
import { RenderSingleChildViewport, type ViewportChild } from "../viewport/RenderSingleChildViewport";
import { ScrollOffset } from "../viewport/ScrollOffset";
import { applyUserScroll } from "../viewport/ScrollPhysics";
import { usePrimaryScrollController } from "./PrimaryScrollController";

export interface ScrollViewApi {
  /** Moves both axes without consulting physics. */
  scrollTo(x: number, y: number): void;
  scrollBy(deltaX: number, deltaY: number): void;
  getScroll(): { x: number; y: number };
  getMaxScroll(): { maxScrollX: number; maxScrollY: number };
  /** Runs layout and paint synchronously. */
  layoutImmediately(): void;
}

export interface SingleChildTwoDimensionalScrollViewProps extends ScrollViewOptions {
  /** The content that scrolls in two dimensions. */
  children?: React.ReactNode;
  apiRef?: React.Ref<ScrollViewApi>;
  onScroll?: (scroll: { x: number; y: number }) => void;
  logger?: ScrollViewLogger;
  style?: React.CSSProperties;
  ariaLabel?: string;
}

interface ViewportState {
  renderObject: RenderSingleChildViewport;
  horizontalOffset: ScrollOffset;
  verticalOffset: ScrollOffset;
  paintingContext: DomPaintingContext;
}

/**
 * A box in which a single child can be scrolled in two dimensions.
 *
 * Useful for content that is normally fully visible (a clock face, a form laid out in rows and
 * columns) but must stay reachable when the container becomes too small along both axes, for
 * example in a split-screen window or with the on-screen keyboard open.
 *
 * The child is laid out without constraints and keeps its natural size; the view reports that
 * size to one scroll offset per axis and translates the child by the current offsets. When the
 * child overflows the viewport it is clipped to the viewport bounds according to
 * `clipBehavior`.
 */
export function SingleChildTwoDimensionalScrollView(props: SingleChildTwoDimensionalScrollViewProps): React.ReactElement {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const childRef = useRef<HTMLDivElement | null>(null);
  const contentRef = useRef<HTMLDivElement | null>(null);
  const stateRef = useRef<ViewportState | null>(null);
  const inFrameRef = useRef(false);
  const lastEmittedScrollRef = useRef<{ x: number; y: number } | null>(null);

  const primaryController = usePrimaryScrollController();
  const options = useMemo(
    () =>
      resolveScrollViewOptions(
        {
          padding: props.padding,
          reverseVertical: props.reverseVertical,
          reverseHorizontal: props.reverseHorizontal,
          textDirection: props.textDirection,
          primary: props.primary,
          mainAxis: props.mainAxis,
          verticalController: props.verticalController,
          horizontalController: props.horizontalController,
          verticalPhysics: props.verticalPhysics,
          horizontalPhysics: props.horizontalPhysics,
          clipBehavior: props.clipBehavior,
          diagonalDragBehavior: props.diagonalDragBehavior,
          dragStartBehavior: props.dragStartBehavior,
          keyboardDismissBehavior: props.keyboardDismissBehavior
        },
        primaryController
      ),
    [
      props.padding,
      props.reverseVertical,
      props.reverseHorizontal,
      props.textDirection,
      props.primary,
      props.mainAxis,
      props.verticalController,
      props.horizontalController,
      props.verticalPhysics,
      props.horizontalPhysics,
      props.clipBehavior,
      props.diagonalDragBehavior,
      props.dragStartBehavior,
      props.keyboardDismissBehavior,
      primaryController
    ]
  );

  const optionsRef = useRef(options);
  optionsRef.current = options;
  const onScrollRef = useRef(props.onScroll);
  onScrollRef.current = props.onScroll;

  const hasChild = props.children !== undefined && props.children !== null && props.children !== false;
  const hasChildRef = useRef(hasChild);
  hasChildRef.current = hasChild;

  const viewportChild = useMemo<ViewportChild>(
    () => ({
      layout: (): Size => {
        const content = contentRef.current;
        const rect = content ? content.getBoundingClientRect() : { width: 0, height: 0 };
        return inflateSize({ width: rect.width, height: rect.height }, optionsRef.current.padding);
      }
    }),
    []
  );

  const performFrame = () => {
    const state = stateRef.current;
    const container = containerRef.current;
    if (!state || !container || inFrameRef.current) return;

    inFrameRef.current = true;
    try {
      const rect = container.getBoundingClientRect();
      const { renderObject } = state;
      renderObject.setViewportSize(Math.max(0, rect.width), Math.max(0, rect.height));
      renderObject.layout();
      renderObject.paint(state.paintingContext, ZERO_OFFSET);
    } finally {
      inFrameRef.current = false;
    }

    const scroll = { x: state.horizontalOffset.pixels, y: state.verticalOffset.pixels };
    const last = lastEmittedScrollRef.current;
    if (!last) {
      lastEmittedScrollRef.current = scroll;
    } else if (last.x !== scroll.x || last.y !== scroll.y) {
      lastEmittedScrollRef.current = scroll;
      onScrollRef.current?.(scroll);
    }
  };

  const horizontalController = options.horizontal.controller;
  const verticalController = options.vertical.controller;
  const logger = props.logger ?? getDefaultLogger();
  const loggerRef = useRef(logger);
  loggerRef.current = logger;

  useLayoutEffect(() => {
    const container = containerRef.current;
    const childElement = childRef.current;
    const content = contentRef.current;
    if (!container || !childElement || !content) return;

    const horizontalOffset = horizontalController?.createScrollOffset("horizontal") ?? new ScrollOffset("horizontal");
    const verticalOffset = verticalController?.createScrollOffset("vertical") ?? new ScrollOffset("vertical");
    horizontalController?.attach(horizontalOffset);
    verticalController?.attach(verticalOffset);

    const current = optionsRef.current;
    const renderObject = new RenderSingleChildViewport({
      horizontalOffset,
      horizontalAxisDirection: current.horizontal.axisDirection,
      verticalOffset,
      verticalAxisDirection: current.vertical.axisDirection,
      clipBehavior: current.clipBehavior,
      child: hasChildRef.current ? viewportChild : null,
      logger: loggerRef.current
    });

    stateRef.current = {
      renderObject,
      horizontalOffset,
      verticalOffset,
      paintingContext: new DomPaintingContext({ viewport: container, child: childElement })
    };
    lastEmittedScrollRef.current = null;

    const unsubscribeHorizontal = horizontalOffset.subscribe(() => performFrame());
    const unsubscribeVertical = verticalOffset.subscribe(() => performFrame());

    performFrame();

    let ro: ResizeObserver | null = null;
    if (typeof ResizeObserver !== "undefined") {
      ro = new ResizeObserver(() => performFrame());
      ro.observe(container);
      ro.observe(content);
    }

    return () => {
      ro?.disconnect();
      unsubscribeHorizontal();
      unsubscribeVertical();
      renderObject.dispose();
      horizontalController?.detach(horizontalOffset);
      verticalController?.detach(verticalOffset);
      horizontalOffset.dispose();
      verticalOffset.dispose();
      stateRef.current = null;
    };
  }, [horizontalController, verticalController, viewportChild]);

  // Mirrors configuration onto the render object after every render, then lays out again so
  // content changes made by React are measured in the same commit.
  useLayoutEffect(() => {
    const state = stateRef.current;
    if (!state) return;
    const { renderObject } = state;
    renderObject.horizontalAxisDirection = options.horizontal.axisDirection;
    renderObject.verticalAxisDirection = options.vertical.axisDirection;
    renderObject.clipBehavior = options.clipBehavior;
    renderObject.child = hasChild ? viewportChild : null;
    renderObject.logger = logger;
    performFrame();
  });

  useLayoutEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const onWheel = (event: WheelEvent) => {
      const state = stateRef.current;
      if (!state) return;
      const current = optionsRef.current;

      const delta = wheelDeltaToPixels(event, { pageSize: state.renderObject.viewportSize });
      const movedX = applyUserScroll(
        state.horizontalOffset,
        current.horizontal.physics,
        wheelDeltaToScrollDelta(current.horizontal.axisDirection, delta.x)
      );
      const movedY = applyUserScroll(
        state.verticalOffset,
        current.vertical.physics,
        wheelDeltaToScrollDelta(current.vertical.axisDirection, delta.y)
      );

      if (movedX || movedY) event.preventDefault();
    };

    container.addEventListener("wheel", onWheel, { passive: false });
    return () => {
      container.removeEventListener("wheel", onWheel);
    };
  }, []);

  useLayoutEffect(() => {
    const container = containerRef.current;
    if (!container) return;
    const ownerWindow = container.ownerDocument.defaultView;
    if (!ownerWindow) return;

    let detachDrag: (() => void) | null = null;

    const onPointerDown = (event: PointerEvent) => {
      if (event.button !== 0 || !stateRef.current) return;
      detachDrag?.();

      const pointerId = event.pointerId;
      const tracker = new DragTracker(
        { x: event.clientX, y: event.clientY },
        { dragStartBehavior: optionsRef.current.dragStartBehavior }
      );
      const session: DragSession = createDragSession();

      const onMove = (moveEvent: PointerEvent) => {
        if (moveEvent.pointerId !== pointerId) return;
        const state = stateRef.current;
        if (!state) return;
        const result = tracker.move({ x: moveEvent.clientX, y: moveEvent.clientY });
        if (!result) return;

        const current = optionsRef.current;
        if (result.started) {
          dismissKeyboardOnDrag(current.keyboardDismissBehavior, container.ownerDocument);
        }
        moveEvent.preventDefault();

        const delta: Offset = resolveDragDelta(current.diagonalDragBehavior, result.delta, session);
        applyUserScroll(
          state.horizontalOffset,
          current.horizontal.physics,
          dragDeltaToScrollDelta(current.horizontal.axisDirection, delta.x)
        );
        applyUserScroll(
          state.verticalOffset,
          current.vertical.physics,
          dragDeltaToScrollDelta(current.vertical.axisDirection, delta.y)
        );
      };

      const onUp = (upEvent: PointerEvent) => {
        if (upEvent.pointerId !== pointerId) return;
        detachDrag?.();
      };

      ownerWindow.addEventListener("pointermove", onMove, { passive: false });
      ownerWindow.addEventListener("pointerup", onUp);
      ownerWindow.addEventListener("pointercancel", onUp);
      detachDrag = () => {
        ownerWindow.removeEventListener("pointermove", onMove);
        ownerWindow.removeEventListener("pointerup", onUp);
        ownerWindow.removeEventListener("pointercancel", onUp);
        detachDrag = null;
      };
    };

    container.addEventListener("pointerdown", onPointerDown);
    return () => {
      container.removeEventListener("pointerdown", onPointerDown);
      detachDrag?.();
    };
  }, []);

  useImperativeHandle(
    props.apiRef,
    (): ScrollViewApi => ({
      scrollTo: (x, y) => {
        const state = stateRef.current;
        if (!state) return;
        state.horizontalOffset.jumpTo(x);
        state.verticalOffset.jumpTo(y);
      },
      scrollBy: (dx, dy) => {
        const state = stateRef.current;
        if (!state) return;
        state.horizontalOffset.jumpTo(state.horizontalOffset.pixels + dx);
        state.verticalOffset.jumpTo(state.verticalOffset.pixels + dy);
      },
      getScroll: () => {
        const state = stateRef.current;
        return state ? { x: state.horizontalOffset.pixels, y: state.verticalOffset.pixels } : { x: 0, y: 0 };
      },
      getMaxScroll: () => {
        const state = stateRef.current;
        return state
          ? { maxScrollX: state.horizontalOffset.maxScrollExtent, maxScrollY: state.verticalOffset.maxScrollExtent }
          : { maxScrollX: 0, maxScrollY: 0 };
      },
      layoutImmediately: () => performFrame()
    }),
    [props.apiRef]
  );

  const { padding } = options;

  const containerStyle: React.CSSProperties = useMemo(
    () => ({
      position: "relative",
      width: "100%",
      height: "100%",
      touchAction: "none",
      ...props.style
    }),
    [props.style]
  );

  return (
    <div
      ref={containerRef}
      style={containerStyle}
      data-testid="two-dimensional-scroll-view"
      role="region"
      aria-label={props.ariaLabel}
      dir={options.textDirection}
    >
      <div
        ref={childRef}
        data-testid="two-dimensional-scroll-view-child"
        style={{
          position: "absolute",
          left: 0,
          top: 0,
          width: "max-content",
          paddingLeft: padding.left,
          paddingTop: padding.top,
          paddingRight: padding.right,
          paddingBottom: padding.bottom,
          willChange: "transform"
        }}
      >
        <div ref={contentRef} data-testid="two-dimensional-scroll-view-content" style={{ width: "max-content" }}>
          {props.children}
        </div>
      </div>
    </div>
  );
}
