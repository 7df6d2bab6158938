// @vitest-environment jsdom
import React, { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Size } from "../../geometry/types";
import { createLogger } from "../../logger";
import { ScrollController } from "../../viewport/ScrollController";
import { NeverScrollableScrollPhysics } from "../../viewport/ScrollPhysics";
import { PrimaryScrollController } from "../PrimaryScrollController";
import { SingleChildTwoDimensionalScrollView, type ScrollViewApi } from "../SingleChildTwoDimensionalScrollView";

let sizes: { viewport: Size; content: Size } = {
  viewport: { width: 400, height: 300 },
  content: { width: 1500, height: 1500 }
};

function rectOf(size: Size): DOMRect {
  return {
    left: 0,
    top: 0,
    right: size.width,
    bottom: size.height,
    width: size.width,
    height: size.height,
    x: 0,
    y: 0,
    toJSON: () => ({})
  } as unknown as DOMRect;
}

function getByTestId(host: HTMLElement, testId: string): HTMLElement {
  const element = host.querySelector<HTMLElement>(`[data-testid="${testId}"]`);
  if (!element) throw new Error(`missing element ${testId}`);
  return element;
}

interface Rendered {
  host: HTMLDivElement;
  root: Root;
  container: HTMLElement;
  child: HTMLElement;
  unmount(): Promise<void>;
}

async function render(element: React.ReactElement): Promise<Rendered> {
  const host = document.createElement("div");
  document.body.appendChild(host);
  const root = createRoot(host);

  await act(async () => {
    root.render(element);
  });

  return {
    host,
    root,
    container: getByTestId(host, "two-dimensional-scroll-view"),
    child: getByTestId(host, "two-dimensional-scroll-view-child"),
    unmount: async () => {
      await act(async () => {
        root.unmount();
      });
      host.remove();
    }
  };
}

describe("SingleChildTwoDimensionalScrollView", () => {
  beforeEach(() => {
    sizes = {
      viewport: { width: 400, height: 300 },
      content: { width: 1500, height: 1500 }
    };

    vi.stubGlobal(
      "ResizeObserver",
      class ResizeObserver {
        observe(): void {}
        unobserve(): void {}
        disconnect(): void {}
      }
    );

    vi.spyOn(HTMLElement.prototype, "getBoundingClientRect").mockImplementation(function (this: HTMLElement) {
      switch (this.dataset.testid) {
        case "two-dimensional-scroll-view":
          return rectOf(sizes.viewport);
        case "two-dimensional-scroll-view-content":
          return rectOf(sizes.content);
        default:
          return rectOf({ width: 0, height: 0 });
      }
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    document.body.innerHTML = "";
  });

  it("places an oversized child at the origin, clips it and reports the scroll range", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    expect(view.child.style.transform).toBe("translate(0px, 0px)");
    expect(view.container.style.overflow).toBe("clip");
    expect(view.container.style.getPropertyValue("clip-path")).toBe("inset(0px 0px 0px 0px)");
    expect(view.container.dataset.clip).toBe("hardEdge");
    expect(apiRef.current?.getMaxScroll()).toEqual({ maxScrollX: 1100, maxScrollY: 1200 });

    await view.unmount();
  });

  it("shows the right edge of the child first when the horizontal axis is reversed", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView reverseHorizontal>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    expect(view.child.style.transform).toBe("translate(-1100px, 0px)");
    await view.unmount();
  });

  it("moves the child and reports scroll changes for imperative scrolling", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const onScroll = vi.fn();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef} onScroll={onScroll}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );
    expect(onScroll).not.toHaveBeenCalled();

    await act(async () => {
      apiRef.current?.scrollTo(100, 50);
    });

    expect(view.child.style.transform).toBe("translate(-100px, -50px)");
    expect(apiRef.current?.getScroll()).toEqual({ x: 100, y: 50 });
    expect(onScroll).toHaveBeenCalledTimes(2);
    expect(onScroll).toHaveBeenLastCalledWith({ x: 100, y: 50 });

    await act(async () => {
      apiRef.current?.scrollBy(5000, 0);
    });
    expect(apiRef.current?.getScroll()).toEqual({ x: 1100, y: 50 });

    await view.unmount();
  });

  it("scrolls both axes with the wheel", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    const event = new WheelEvent("wheel", { deltaX: 30, deltaY: 120, bubbles: true, cancelable: true });
    await act(async () => {
      view.container.dispatchEvent(event);
    });

    expect(event.defaultPrevented).toBe(true);
    expect(view.child.style.transform).toBe("translate(-30px, -120px)");
    await view.unmount();
  });

  it("scrolls a reversed vertical axis against the wheel", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView reverseVertical>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );
    expect(view.child.style.transform).toBe("translate(0px, -1200px)");

    await act(async () => {
      view.container.dispatchEvent(new WheelEvent("wheel", { deltaY: -120, bubbles: true, cancelable: true }));
    });

    // 120 - 1500 + 300
    expect(view.child.style.transform).toBe("translate(0px, -1080px)");
    await view.unmount();
  });

  it("lets physics refuse user scrolling on one axis", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView verticalPhysics={new NeverScrollableScrollPhysics()}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    await act(async () => {
      view.container.dispatchEvent(new WheelEvent("wheel", { deltaX: 30, deltaY: 120, bubbles: true, cancelable: true }));
    });

    expect(view.child.style.transform).toBe("translate(-30px, 0px)");
    await view.unmount();
  });

  it("does not clip with clip behavior none", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView clipBehavior="none">
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    expect(view.container.style.overflow).toBe("");
    expect(view.container.dataset.clip).toBeUndefined();
    expect(view.child.style.transform).toBe("translate(0px, 0px)");
    await view.unmount();
  });

  it("neither clips nor scrolls a child that fits", async () => {
    sizes.viewport = { width: 2000, height: 2000 };
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef} reverseHorizontal reverseVertical>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    expect(view.container.style.overflow).toBe("");
    expect(view.child.style.transform).toBe("translate(500px, 500px)");
    expect(apiRef.current?.getMaxScroll()).toEqual({ maxScrollX: 0, maxScrollY: 0 });
    await view.unmount();
  });

  it("grows the scrollable area by the padding", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef} padding={{ left: 10, top: 20, right: 30, bottom: 40 }}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    // (1500 + 40 - 400, 1500 + 60 - 300)
    expect(apiRef.current?.getMaxScroll()).toEqual({ maxScrollX: 1140, maxScrollY: 1260 });
    expect(view.child.style.paddingLeft).toBe("10px");
    expect(view.child.style.paddingBottom).toBe("40px");
    await view.unmount();
  });

  it("relayouts when the content size changes", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    await act(async () => {
      apiRef.current?.scrollTo(1000, 0);
    });
    sizes.content = { width: 600, height: 1500 };
    await act(async () => {
      apiRef.current?.layoutImmediately();
    });

    expect(apiRef.current?.getScroll()).toEqual({ x: 200, y: 0 });
    expect(view.child.style.transform).toBe("translate(-200px, 0px)");
    await view.unmount();
  });

  it("attaches caller-owned controllers for as long as it is mounted", async () => {
    const horizontalController = new ScrollController({ initialScrollOffset: 200 });
    const view = await render(
      <SingleChildTwoDimensionalScrollView horizontalController={horizontalController}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    expect(horizontalController.hasClients).toBe(true);
    expect(horizontalController.offset).toBe(200);
    expect(view.child.style.transform).toBe("translate(-200px, 0px)");

    await act(async () => {
      horizontalController.jumpTo(300);
    });
    expect(view.child.style.transform).toBe("translate(-300px, 0px)");

    const { container } = view;
    await view.unmount();
    expect(horizontalController.hasClients).toBe(false);
    expect(container.style.overflow).toBe("");
    expect(container.dataset.clip).toBeUndefined();
  });

  it("keeps the scroll position when re-rendered with a new logger", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef} logger={createLogger("silent")}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    await act(async () => {
      apiRef.current?.scrollTo(300, 200);
    });
    await act(async () => {
      view.root.render(
        <SingleChildTwoDimensionalScrollView apiRef={apiRef} logger={createLogger("silent")}>
          <div>content</div>
        </SingleChildTwoDimensionalScrollView>
      );
    });

    expect(apiRef.current?.getScroll()).toEqual({ x: 300, y: 200 });
    expect(view.child.style.transform).toBe("translate(-300px, -200px)");
    await view.unmount();
  });

  it("restores the caller's overflow once the child fits again", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef} style={{ overflow: "auto" }}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );
    expect(view.container.style.overflow).toBe("clip");

    sizes.content = { width: 300, height: 200 };
    await act(async () => {
      apiRef.current?.layoutImmediately();
    });

    expect(view.container.style.overflow).toBe("auto");
    expect(view.container.style.getPropertyValue("clip-path")).toBe("");
    expect(view.container.dataset.clip).toBeUndefined();
    await view.unmount();
  });

  it("uses the ambient controller for the vertical axis", async () => {
    const primary = new ScrollController();
    const view = await render(
      <PrimaryScrollController controller={primary}>
        <SingleChildTwoDimensionalScrollView primary>
          <div>content</div>
        </SingleChildTwoDimensionalScrollView>
      </PrimaryScrollController>
    );

    expect(primary.hasClients).toBe(true);
    expect(primary.position.axis).toBe("vertical");
    expect(primary.position.maxScrollExtent).toBe(1200);
    await view.unmount();
  });

  it("paints nothing without a child", async () => {
    const view = await render(<SingleChildTwoDimensionalScrollView />);

    expect(view.child.style.transform).toBe("");
    expect(view.container.style.overflow).toBe("");
    await view.unmount();
  });
});

describe("SingleChildTwoDimensionalScrollView drags", () => {
  beforeEach(() => {
    vi.stubGlobal(
      "ResizeObserver",
      class ResizeObserver {
        observe(): void {}
        unobserve(): void {}
        disconnect(): void {}
      }
    );

    vi.spyOn(HTMLElement.prototype, "getBoundingClientRect").mockImplementation(function (this: HTMLElement) {
      if (this.dataset.testid === "two-dimensional-scroll-view") return rectOf({ width: 400, height: 300 });
      if (this.dataset.testid === "two-dimensional-scroll-view-content") return rectOf({ width: 1500, height: 1500 });
      return rectOf({ width: 0, height: 0 });
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    document.body.innerHTML = "";
  });

  async function drag(container: HTMLElement, points: Array<{ x: number; y: number }>): Promise<void> {
    const [down, ...moves] = points;
    if (!down) return;
    await act(async () => {
      container.dispatchEvent(
        new PointerEvent("pointerdown", { clientX: down.x, clientY: down.y, pointerId: 1, button: 0, bubbles: true })
      );
    });
    for (const point of moves) {
      await act(async () => {
        window.dispatchEvent(new PointerEvent("pointermove", { clientX: point.x, clientY: point.y, pointerId: 1 }));
      });
    }
    await act(async () => {
      window.dispatchEvent(new PointerEvent("pointerup", { pointerId: 1 }));
    });
  }

  it("moves both axes with a free diagonal drag", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView diagonalDragBehavior="free" dragStartBehavior="down">
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    await drag(view.container, [
      { x: 100, y: 100 },
      { x: 60, y: 70 },
      { x: 50, y: 70 }
    ]);
    expect(view.child.style.transform).toBe("translate(-50px, -30px)");

    await act(async () => {
      window.dispatchEvent(new PointerEvent("pointermove", { clientX: 0, clientY: 0, pointerId: 1 }));
    });
    expect(view.child.style.transform).toBe("translate(-50px, -30px)");

    await view.unmount();
  });

  it("locks a drag to one axis by default", async () => {
    const apiRef = React.createRef<ScrollViewApi>();
    const view = await render(
      <SingleChildTwoDimensionalScrollView apiRef={apiRef}>
        <div>content</div>
      </SingleChildTwoDimensionalScrollView>
    );

    await drag(view.container, [
      { x: 100, y: 100 },
      { x: 60, y: 70 },
      { x: 50, y: 65 },
      { x: 50, y: 40 }
    ]);

    expect(apiRef.current?.getScroll()).toEqual({ x: 10, y: 0 });
    expect(view.child.style.transform).toBe("translate(-10px, 0px)");
    await view.unmount();
  });

  it("dismisses the keyboard when a drag starts with onDrag", async () => {
    const view = await render(
      <SingleChildTwoDimensionalScrollView keyboardDismissBehavior="onDrag">
        <input data-testid="field" />
      </SingleChildTwoDimensionalScrollView>
    );
    const field = getByTestId(view.host, "field");

    await act(async () => {
      field.focus();
    });
    expect(document.activeElement).toBe(field);

    await drag(view.container, [
      { x: 100, y: 100 },
      { x: 100, y: 60 }
    ]);

    expect(document.activeElement).toBe(document.body);
    await view.unmount();
  });
});
