// visibility — pauses off-screen demos. A canvas counts as on screen while it
// is within one of its own heights of the viewport, so it is already running
// when it scrolls into view.

export interface VerticalExtent {
  top: number;
  bottom: number;
  height: number;
}

export function isOnScreen(rect: VerticalExtent, viewportHeight: number): boolean {
  return rect.top >= -rect.height && rect.bottom <= viewportHeight + rect.height;
}

/**
 * Report the element's visibility now, then again whenever it flips on
 * scroll or resize. Returns the unsubscribe function.
 */
export function watchVisibility(
  element: Element,
  onChange: (visible: boolean) => void,
  target: Window = window
): () => void {
  let visible: boolean | null = null;

  const check = (): void => {
    const next = isOnScreen(element.getBoundingClientRect(), target.innerHeight);
    if (next === visible) return;
    visible = next;
    onChange(next);
  };

  target.addEventListener("scroll", check, { passive: true });
  target.addEventListener("resize", check);
  check();

  return () => {
    target.removeEventListener("scroll", check);
    target.removeEventListener("resize", check);
  };
}
