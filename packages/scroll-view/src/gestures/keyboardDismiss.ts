export type ScrollViewKeyboardDismissBehavior = "manual" | "onDrag";

/**
 * Blurs the focused element of `ownerDocument` when a drag starts and the behavior is `onDrag`,
 * which closes on-screen keyboards on touch devices. Returns whether focus was dropped.
 */
export function dismissKeyboardOnDrag(behavior: ScrollViewKeyboardDismissBehavior, ownerDocument: Document): boolean {
  if (behavior !== "onDrag") return false;
  const active = ownerDocument.activeElement;
  if (!(active instanceof HTMLElement) || active === ownerDocument.body) return false;
  active.blur();
  return true;
}
