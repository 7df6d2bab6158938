import React, { useEffect, useMemo, useState } from "react";
import { SingleChildTwoDimensionalScrollView } from "../react/SingleChildTwoDimensionalScrollView";
import { ScrollController } from "../viewport/ScrollController";

export interface ScrollViewDemoProps {
  contentSize?: number;
  reverseHorizontal?: boolean;
  reverseVertical?: boolean;
}

/**
 * A large padded box with wrapped text that can be dragged around along both axes. The current
 * scroll position is shown above the viewport.
 */
export function ScrollViewDemo({
  contentSize = 1500,
  reverseHorizontal = false,
  reverseVertical = false
}: ScrollViewDemoProps): React.ReactElement {
  const verticalController = useMemo(() => new ScrollController(), []);
  const horizontalController = useMemo(() => new ScrollController(), []);
  const [scroll, setScroll] = useState({ x: 0, y: 0 });

  useEffect(
    () => () => {
      verticalController.dispose();
      horizontalController.dispose();
    },
    [verticalController, horizontalController]
  );

  const text = useMemo(() => Array.from({ length: 1400 }, () => "hello world").join(" "), []);

  return (
    <div style={{ display: "flex", flexDirection: "column", width: "100%", height: "100%" }}>
      <div data-testid="scroll-view-demo-position" style={{ padding: 8, fontFamily: "system-ui, sans-serif" }}>
        x: {Math.round(scroll.x)}, y: {Math.round(scroll.y)}
      </div>
      <div style={{ flex: 1, minHeight: 0, background: "#fff" }}>
        <SingleChildTwoDimensionalScrollView
          verticalController={verticalController}
          horizontalController={horizontalController}
          reverseHorizontal={reverseHorizontal}
          reverseVertical={reverseVertical}
          padding={{ left: 8, top: 8, right: 8, bottom: 8 }}
          diagonalDragBehavior="free"
          onScroll={setScroll}
          ariaLabel="Two-dimensional scroll demo"
        >
          <div
            style={{
              width: contentSize,
              height: contentSize,
              padding: 8,
              boxSizing: "border-box",
              background: "#3b82f6",
              display: "flex",
              alignItems: "center",
              justifyContent: "center"
            }}
          >
            <p style={{ margin: 0, color: "#fff" }}>{text}</p>
          </div>
        </SingleChildTwoDimensionalScrollView>
      </div>
    </div>
  );
}
