// JSDOM does not always expose PointerEvent. Drag tests dispatch pointer events, so provide a
// minimal shim backed by MouseEvent so `new PointerEvent(...)` works.
if (typeof globalThis.PointerEvent === "undefined" && typeof globalThis.MouseEvent === "function") {
  class PointerEventShim extends MouseEvent {
    readonly pointerId: number;
    readonly pointerType: string;

    constructor(type: string, init: PointerEventInit = {}) {
      super(type, init);
      this.pointerId = typeof init.pointerId === "number" ? init.pointerId : 1;
      this.pointerType = typeof init.pointerType === "string" ? init.pointerType : "mouse";
    }
  }

  Object.assign(globalThis, { PointerEvent: PointerEventShim });
}

// Lets React know that updates in tests are wrapped in `act`.
Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true });
